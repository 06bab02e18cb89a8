import { RESOLUTION_PRESETS } from '@booth-capture/common-types';
import type { CaptureCapability, ResolutionPreset } from '@booth-capture/common-types';

/**
 * プリセットの範囲に収まるケイパビリティのうち最良のものを選ぶ
 *
 * - 範囲内が1件もなければ全件から選ぶ（プレビュー・録画を拒否しない）
 * - 面積の降順、同面積ならフレームレートの降順
 * - ケイパビリティが空の場合のみ null
 */
export function pickBestCapability(
  capabilities: readonly CaptureCapability[],
  preset: ResolutionPreset
): CaptureCapability | null {
  const filtered = capabilities.filter((c) => isWithinPreset(c, preset));
  const pool = filtered.length > 0 ? filtered : capabilities;

  let best: CaptureCapability | null = null;
  for (const candidate of pool) {
    if (!best || compareCapabilities(candidate, best) < 0) {
      best = candidate;
    }
  }
  return best;
}

export function isWithinPreset(capability: CaptureCapability, preset: ResolutionPreset): boolean {
  return (
    capability.width >= preset.minWidth &&
    capability.height >= preset.minHeight &&
    capability.width <= preset.maxWidth &&
    capability.height <= preset.maxHeight
  );
}

/**
 * 負の値なら a が優先
 */
function compareCapabilities(a: CaptureCapability, b: CaptureCapability): number {
  const areaDiff = b.width * b.height - a.width * a.height;
  if (areaDiff !== 0) {
    return areaDiff;
  }
  return b.frameRate - a.frameRate;
}

/**
 * ラベルの前方一致でプリセットを探す
 * 見つからなければ最後のキャッチオールプリセット
 */
export function findPreset(label: string | undefined): ResolutionPreset {
  const catchAll = RESOLUTION_PRESETS[RESOLUTION_PRESETS.length - 1];
  const normalized = label?.trim().toLowerCase();
  if (!normalized) {
    return catchAll;
  }
  return (
    RESOLUTION_PRESETS.find((p) => p.label.toLowerCase().startsWith(normalized)) ?? catchAll
  );
}
