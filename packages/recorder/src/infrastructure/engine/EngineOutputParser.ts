/**
 * エンジンの人間向けテキスト出力を読み取るパーサ
 *
 * 出力形式はバージョンやプラットフォームで変わるため、すべてベストエフォート
 * 読み取れなかった場合は空（=不明）を返し、エラーにはしない
 */

import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
} from '@booth-capture/common-types';
import type { CaptureInputFormat } from './EngineArgumentsBuilder.js';

/**
 * `-encoders` の出力からエンコーダ名の集合を取り出す
 * 例: " V....D h264_nvenc           NVIDIA NVENC H.264 encoder"
 */
export function parseEncoderList(text: string): Set<string> {
  const encoders = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*[VAS][A-Z.]{5}\s+(\S+)/.exec(line);
    if (match && match[1] !== '=') {
      encoders.add(match[1]);
    }
  }
  return encoders;
}

/**
 * デバイスのモード一覧からケイパビリティを取り出す
 *
 * - dshow: "min s=640x480 fps=5 max s=1280x720 fps=30" の max 側
 * - v4l2: "Raw : yuyv422 : YUYV 4:2:2 : 640x480 1280x720"（フレームレートは不明=0）
 */
export function parseDeviceModes(text: string): CaptureCapability[] {
  const seen = new Set<string>();
  const capabilities: CaptureCapability[] = [];

  const add = (width: number, height: number, frameRate: number) => {
    const key = `${width}x${height}@${frameRate}`;
    if (width > 0 && height > 0 && !seen.has(key)) {
      seen.add(key);
      capabilities.push({ width, height, frameRate });
    }
  };

  for (const line of text.split(/\r?\n/)) {
    const dshow = /max s=(\d+)x(\d+) fps=([\d.]+)/.exec(line);
    if (dshow) {
      add(Number(dshow[1]), Number(dshow[2]), roundFrameRate(Number(dshow[3])));
      continue;
    }

    if (/\b(Raw|Compressed)\s*:/.test(line)) {
      for (const size of line.matchAll(/\b(\d{2,5})x(\d{2,5})\b/g)) {
        add(Number(size[1]), Number(size[2]), 0);
      }
    }
  }

  return capabilities;
}

function roundFrameRate(value: number): number {
  return Number.isFinite(value) ? Math.round(value * 100) / 100 : 0;
}

/**
 * 要求した WIDTHxHEIGHT（と fps）がモード一覧に含まれているか
 */
export function isModeListed(text: string, width: number, height: number, frameRate: number | null): boolean {
  const size = `${width}x${height}`;
  if (frameRate === null) {
    return text.toLowerCase().includes(size);
  }
  const rate = escapeRegExp(String(frameRate));
  const pattern = new RegExp(
    `\\b${size}\\b[^\\n]*?(?:\\bfps=${rate}(?:\\.\\d+)?\\b|\\b${rate}\\s*fps\\b)`,
    'i'
  );
  return pattern.test(text);
}

/**
 * デバイス一覧の出力からデバイスを取り出す
 */
export function parseDeviceList(
  text: string,
  inputFormat: CaptureInputFormat,
  kind: CaptureDeviceKind
): CaptureDeviceInfo[] {
  switch (inputFormat) {
    case 'dshow':
      return parseDshowDevices(text, kind);
    case 'avfoundation':
      return parseAvFoundationDevices(text, kind);
    case 'v4l2':
      return parseAutoDetectedSources(text);
  }
}

/**
 * 新しい形式: [dshow @ ...] "Integrated Camera" (video)
 * 古い形式: "DirectShow video devices" の見出しの後に "Integrated Camera"
 */
function parseDshowDevices(text: string, kind: CaptureDeviceKind): CaptureDeviceInfo[] {
  const devices: CaptureDeviceInfo[] = [];
  let section: CaptureDeviceKind | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.includes('DirectShow video devices')) {
      section = 'video';
      continue;
    }
    if (line.includes('DirectShow audio devices')) {
      section = 'audio';
      continue;
    }
    if (line.includes('Alternative name')) {
      continue;
    }

    const match = /"(.+?)"(?:\s*\((video|audio|none)\))?/.exec(line);
    if (!match) {
      continue;
    }
    const lineKind = match[2] ?? section;
    if (lineKind === kind) {
      devices.push({ id: match[1], displayName: match[1] });
    }
  }

  return devices;
}

/**
 * [AVFoundation indev @ 0x...] AVFoundation video devices:
 * [AVFoundation indev @ 0x...] [0] FaceTime HD Camera
 */
function parseAvFoundationDevices(text: string, kind: CaptureDeviceKind): CaptureDeviceInfo[] {
  const devices: CaptureDeviceInfo[] = [];
  let section: CaptureDeviceKind | null = null;

  for (const line of text.split(/\r?\n/)) {
    if (line.includes('AVFoundation video devices')) {
      section = 'video';
      continue;
    }
    if (line.includes('AVFoundation audio devices')) {
      section = 'audio';
      continue;
    }
    const match = /\]\s*\[(\d+)\]\s+(.+)$/.exec(line);
    if (match && section === kind) {
      devices.push({ id: match[1], displayName: match[2].trim() });
    }
  }

  return devices;
}

/**
 * -sources の出力
 *   /dev/video0 [Integrated Camera]
 * * hw:CARD=PCH,DEV=0 [HDA Intel PCH]
 */
function parseAutoDetectedSources(text: string): CaptureDeviceInfo[] {
  const devices: CaptureDeviceInfo[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*\*?\s*(\S+)\s+\[(.+)\]\s*$/.exec(line);
    if (match) {
      devices.push({ id: match[1], displayName: match[2] });
    }
  }
  return devices;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * 同じデバイスを二重に開いたときにエンジンが出すメッセージ
 */
const DEVICE_CONTENTION_PATTERNS: readonly RegExp[] = [
  /Could not run graph/i,
  /Device or resource busy/i,
  /already in use/i,
  /I\/O error/i,
  /Could not find video device/i,
];

/**
 * 起動直後に終了したエンジンの出力がデバイス競合を示しているか
 */
export function isDeviceContentionOutput(lines: readonly string[]): boolean {
  return lines.some((line) => DEVICE_CONTENTION_PATTERNS.some((pattern) => pattern.test(line)));
}
