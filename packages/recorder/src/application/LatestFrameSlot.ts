/**
 * 最新のプレビューフレームを1枚だけ保持するスロット
 *
 * 書き込みは後勝ちでキューにはしない
 * 配信されるフレームはコールバック中のみ有効なので、保持時と取り出し時にコピーする
 */
export class LatestFrameSlot {
  private frame: Uint8Array | null = null;
  private capturedAt: Date | null = null;

  put(frame: Uint8Array): void {
    this.frame = Uint8Array.from(frame);
    this.capturedAt = new Date();
  }

  /**
   * 最新フレームのコピー（なければ null）
   */
  latest(): Uint8Array | null {
    return this.frame ? Uint8Array.from(this.frame) : null;
  }

  getCapturedAt(): Date | null {
    return this.capturedAt;
  }

  hasFrame(): boolean {
    return this.frame !== null;
  }

  clear(): void {
    this.frame = null;
    this.capturedAt = null;
  }
}
