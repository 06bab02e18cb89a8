/**
 * キャプチャデバイスが報告する解像度・フレームレートの組
 */
export interface CaptureCapability {
  readonly width: number;
  readonly height: number;
  /** 0 はドライバが値を報告しなかったことを示す */
  readonly frameRate: number;
}

/**
 * 解像度プリセット（ケイパビリティを絞り込むためのバケット）
 */
export interface ResolutionPreset {
  readonly label: string;
  readonly minWidth: number;
  readonly minHeight: number;
  readonly maxWidth: number;
  readonly maxHeight: number;
}

export type CaptureDeviceKind = 'video' | 'audio';

/**
 * デバイス一覧の1エントリ
 */
export interface CaptureDeviceInfo {
  /** エンジンの入力指定にそのまま渡す識別子 */
  id: string;
  displayName: string;
}

/**
 * 解像度プリセット一覧
 * 最後のエントリは範囲無制限のキャッチオール
 */
export const RESOLUTION_PRESETS: readonly ResolutionPreset[] = [
  { label: '4K (3840×2160)', minWidth: 3800, minHeight: 2100, maxWidth: 4096, maxHeight: 2304 },
  { label: '2K/QHD (2560×1440)', minWidth: 2500, minHeight: 1400, maxWidth: 2700, maxHeight: 1520 },
  { label: 'Full HD (1920×1080)', minWidth: 1880, minHeight: 1050, maxWidth: 2000, maxHeight: 1120 },
  { label: 'HD (1280×720)', minWidth: 1240, minHeight: 700, maxWidth: 1300, maxHeight: 760 },
  { label: 'SD (640×480)', minWidth: 620, minHeight: 460, maxWidth: 660, maxHeight: 520 },
  {
    label: 'Best available',
    minWidth: 0,
    minHeight: 0,
    maxWidth: Number.POSITIVE_INFINITY,
    maxHeight: Number.POSITIVE_INFINITY,
  },
];

export const FPS_PRESETS = [60, 30, 25, 15] as const;

export type FpsPreset = (typeof FPS_PRESETS)[number];

export function isFpsPreset(value: number): value is FpsPreset {
  return FPS_PRESETS.some((preset) => preset === value);
}
