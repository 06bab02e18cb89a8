import { extname } from 'path';
import { ENCODER_PROFILES } from '@booth-capture/common-types';
import type {
  CaptureCapability,
  CaptureDeviceKind,
  EncoderCandidate,
  SessionConfig,
} from '@booth-capture/common-types';

/**
 * キャプチャ入力の種類（エンジンの -f に渡す値）
 * - dshow: Windows DirectShow（映像と音声を1つの入力で指定）
 * - avfoundation: macOS（"映像:音声" のインデックス指定）
 * - v4l2: Linux（音声は別入力）
 */
export type CaptureInputFormat = 'dshow' | 'avfoundation' | 'v4l2';

export const CAPTURE_INPUT_FORMATS: readonly CaptureInputFormat[] = ['dshow', 'avfoundation', 'v4l2'];

export interface EngineInputOptions {
  inputFormat: CaptureInputFormat;
  /** v4l2 の音声入力（alsa, pulse など） */
  audioInputFormat: string;
}

/** フレームレート未指定時にキーフレーム間隔の算出に使う値 */
const ASSUMED_FRAME_RATE = 30;

const PROBE_SOURCE = 'testsrc2=size=256x256:rate=10';
const PROBE_DURATION_SEC = '0.2';

interface VideoInputSpec {
  cameraId: string;
  microphoneId: string | null;
  width: number | null;
  height: number | null;
  frameRate: number | null;
}

/**
 * 録画用のエンジン引数を組み立てる
 */
export function buildRecordingArguments(
  config: SessionConfig,
  encoder: EncoderCandidate,
  input: EngineInputOptions
): string[] {
  const profile = ENCODER_PROFILES[encoder];
  const width = Math.max(16, config.width);
  const height = Math.max(16, config.height);
  const frameRate = config.frameRate !== null ? Math.max(1, config.frameRate) : null;
  const useAudio = config.microphoneId !== null && config.microphoneId.trim() !== '';
  const outputPath = resolveOutputPath(config.outputPath, encoder);

  const args: string[] = ['-hide_banner', '-loglevel', 'warning'];

  // ライブ入力向けに単調増加するPTSを生成
  args.push('-fflags', '+genpts');

  args.push(
    ...captureInputArguments(input, {
      cameraId: config.cameraId,
      microphoneId: useAudio ? config.microphoneId : null,
      width,
      height,
      frameRate,
    })
  );

  // 実際のタイムスタンプ（VFR）を維持して音声とのドリフトを防ぐ
  args.push('-fps_mode', 'vfr');
  args.push('-vf', encoder === 'mjpeg' ? 'format=yuvj420p' : 'format=yuv420p');

  if (useAudio) {
    // 初期オフセットは維持したまま緩やかにドリフト補正
    args.push('-af', 'aresample=async=1:osr=48000');
  }

  args.push('-c:v', profile.codec, ...profile.preset, ...profile.quality);
  args.push('-g', String(keyframeInterval(frameRate)));

  if (useAudio) {
    args.push('-c:a', 'aac', '-b:a', '160k');
  }

  if (isMp4(outputPath)) {
    args.push('-movflags', '+faststart');
  }

  args.push('-y', outputPath);
  return args;
}

/**
 * キーフレーム間隔（実効フレームレートの2倍）
 */
export function keyframeInterval(frameRate: number | null): number {
  const fps = Math.max(1, frameRate ?? ASSUMED_FRAME_RATE);
  return Math.max(2, fps * 2);
}

/**
 * エンコーダに合わせて出力ファイルの拡張子を正規化する
 * H.264 は .mp4、低圧縮(MJPEG)は .mkv
 */
export function resolveOutputPath(outputPath: string, encoder: EncoderCandidate): string {
  const targetExt = encoder === 'mjpeg' ? '.mkv' : '.mp4';
  const currentExt = extname(outputPath);
  if (currentExt.toLowerCase() === targetExt) {
    return outputPath;
  }
  const base = currentExt ? outputPath.slice(0, -currentExt.length) : outputPath;
  return `${base}${targetExt}`;
}

function isMp4(outputPath: string): boolean {
  return extname(outputPath).toLowerCase() === '.mp4';
}

/**
 * 合成パターンを短時間エンコードしてエンコーダの使用可否を確認する引数
 */
export function buildEncoderProbeArguments(encoder: EncoderCandidate): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', 'lavfi',
    '-i', PROBE_SOURCE,
    '-t', PROBE_DURATION_SEC,
    '-c:v', ENCODER_PROFILES[encoder].codec,
    '-f', 'null',
    '-',
  ];
}

export function buildEncoderListArguments(): string[] {
  return ['-hide_banner', '-encoders'];
}

/**
 * デバイス一覧を出力させる引数
 */
export function buildDeviceListArguments(input: EngineInputOptions, kind: CaptureDeviceKind): string[] {
  switch (input.inputFormat) {
    case 'dshow':
      return ['-hide_banner', '-list_devices', 'true', '-f', 'dshow', '-i', 'dummy'];
    case 'avfoundation':
      return ['-hide_banner', '-f', 'avfoundation', '-list_devices', 'true', '-i', ''];
    case 'v4l2':
      return ['-hide_banner', '-sources', kind === 'video' ? 'v4l2' : input.audioInputFormat];
  }
}

/**
 * デバイスの対応モード一覧を出力させる引数
 * avfoundation は一覧を提供しないため null
 */
export function buildModeListArguments(input: EngineInputOptions, cameraId: string): string[] | null {
  switch (input.inputFormat) {
    case 'dshow':
      return ['-hide_banner', '-f', 'dshow', '-list_options', 'true', '-i', `video=${cameraId}`];
    case 'v4l2':
      return ['-hide_banner', '-f', 'v4l2', '-list_formats', 'all', '-i', cameraId];
    case 'avfoundation':
      return null;
  }
}

/**
 * プレビュー用: MJPEGフレームを標準出力に連続して書き出させる引数
 */
export function buildPreviewArguments(
  input: EngineInputOptions,
  cameraId: string,
  capability: CaptureCapability | null
): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    ...captureInputArguments(input, {
      cameraId,
      microphoneId: null,
      width: capability?.width ?? null,
      height: capability?.height ?? null,
      frameRate: capability && capability.frameRate > 0 ? capability.frameRate : null,
    }),
    '-an',
    '-f', 'image2pipe',
    '-c:v', 'mjpeg',
    '-q:v', '5',
    'pipe:1',
  ];
}

function captureInputArguments(input: EngineInputOptions, video: VideoInputSpec): string[] {
  const sizing: string[] = [];
  if (video.width !== null && video.height !== null) {
    sizing.push('-video_size', `${video.width}x${video.height}`);
  }
  if (video.frameRate !== null) {
    sizing.push('-framerate', String(video.frameRate));
  }

  switch (input.inputFormat) {
    case 'dshow': {
      const device = video.microphoneId
        ? `video=${video.cameraId}:audio=${video.microphoneId}`
        : `video=${video.cameraId}`;
      return [
        '-f', 'dshow',
        '-rtbufsize', '256M',
        '-thread_queue_size', '4096',
        '-use_wallclock_as_timestamps', '1',
        ...sizing,
        '-i', device,
      ];
    }
    case 'avfoundation': {
      const device = video.microphoneId ? `${video.cameraId}:${video.microphoneId}` : video.cameraId;
      return ['-f', 'avfoundation', '-thread_queue_size', '4096', ...sizing, '-i', device];
    }
    case 'v4l2': {
      const args = [
        '-f', 'v4l2',
        '-thread_queue_size', '4096',
        '-use_wallclock_as_timestamps', '1',
        ...sizing,
        '-i', video.cameraId,
      ];
      if (video.microphoneId) {
        args.push('-f', input.audioInputFormat, '-thread_queue_size', '4096', '-i', video.microphoneId);
      }
      return args;
    }
  }
}
