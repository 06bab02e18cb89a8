import { CAPTURE_INPUT_FORMATS } from '../engine/EngineArgumentsBuilder.js';
import type { CaptureInputFormat } from '../engine/EngineArgumentsBuilder.js';

/**
 * エンジンプロセスの優先度
 * - normal: 変更しない
 * - high: os.setPriority の PRIORITY_HIGH
 * - highest: PRIORITY_HIGHEST（Windows では実質リアルタイム）
 */
export type EnginePriority = 'normal' | 'high' | 'highest';

export interface RecorderConfig {
  enginePath: string;
  inputFormat: CaptureInputFormat;
  audioInputFormat: string;
  outputDir: string;
  /** null は自動停止なし */
  maxDurationMs: number | null;
  settleDelayMs: number;
  stopTimeoutMs: number;
  forceKillTimeoutMs: number;
  probeTimeoutMs: number;
  countdownSeconds: number;
  preferHardwareEncoder: boolean;
  validateModeBeforeStart: boolean;
  useLowCompressionFallbackCodec: boolean;
  enginePriority: EnginePriority;
  defaultResolutionPreset: string;
}

/**
 * 環境変数から録画設定を取得
 *
 * ENGINE_PATH: エンジンのパス（default: ffmpeg、PATHから解決）
 * CAPTURE_INPUT_FORMAT: dshow | avfoundation | v4l2（default: プラットフォームに応じて選択）
 * MAX_DURATION_SEC: 最大録画時間（0 で自動停止なし）
 */
export function getRecorderConfig(env: NodeJS.ProcessEnv = process.env): RecorderConfig {
  const maxDurationSec = parseNumber(env, 'MAX_DURATION_SEC', 60);

  return {
    enginePath: env.ENGINE_PATH || 'ffmpeg',
    inputFormat: parseInputFormat(env.CAPTURE_INPUT_FORMAT),
    audioInputFormat: env.AUDIO_INPUT_FORMAT || 'alsa',
    outputDir: env.OUTPUT_DIR || './recordings',
    maxDurationMs: maxDurationSec > 0 ? maxDurationSec * 1000 : null,
    settleDelayMs: parseNumber(env, 'SETTLE_DELAY_MS', 300),
    stopTimeoutMs: parseNumber(env, 'STOP_TIMEOUT_MS', 1500),
    forceKillTimeoutMs: parseNumber(env, 'FORCE_KILL_TIMEOUT_MS', 2000),
    probeTimeoutMs: parseNumber(env, 'PROBE_TIMEOUT_MS', 5000),
    countdownSeconds: parseNumber(env, 'COUNTDOWN_SECONDS', 3),
    preferHardwareEncoder: parseBoolean(env.PREFER_HARDWARE_ENCODER, true),
    validateModeBeforeStart: parseBoolean(env.VALIDATE_MODE, false),
    useLowCompressionFallbackCodec: parseBoolean(env.LOW_COMPRESSION_OUTPUT, false),
    enginePriority: parseEnginePriority(env.ENGINE_PRIORITY),
    defaultResolutionPreset: env.DEFAULT_RESOLUTION_PRESET || 'HD',
  };
}

export function defaultInputFormat(platform: NodeJS.Platform = process.platform): CaptureInputFormat {
  switch (platform) {
    case 'win32':
      return 'dshow';
    case 'darwin':
      return 'avfoundation';
    default:
      return 'v4l2';
  }
}

function parseInputFormat(value: string | undefined): CaptureInputFormat {
  if (!value) {
    return defaultInputFormat();
  }
  const format = CAPTURE_INPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new Error(
      `CAPTURE_INPUT_FORMAT must be one of ${CAPTURE_INPUT_FORMATS.join(', ')} (got: ${value})`
    );
  }
  return format;
}

function parseEnginePriority(value: string | undefined): EnginePriority {
  switch (value) {
    case undefined:
    case '':
    case 'normal':
      return 'normal';
    case 'high':
    case 'highest':
      return value;
    default:
      throw new Error(`ENGINE_PRIORITY must be one of normal, high, highest (got: ${value})`);
  }
}

function parseNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number (got: ${raw})`);
  }
  return value;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}
