import { NoPendingReviewError } from '@booth-capture/common-types';
import type { IReviewGate } from '@booth-capture/recorder';

/**
 * レビュー依頼の通知先
 */
export interface ReviewRequestNotifier {
  publishReviewRequested(outputPath: string, timeoutMs: number): void;
}

interface PendingReview {
  outputPath: string;
  resolve: (keep: boolean) => void;
  timer: NodeJS.Timeout;
}

/**
 * OperatorReviewGate
 *
 * 録画ファイルのレビューを操作UIに依頼し、採用／撮り直しの決定を待つ
 * 決定がないまま時間切れ・キャンセルになった場合は保持する
 */
export class OperatorReviewGate implements IReviewGate {
  private pending: PendingReview | null = null;

  constructor(
    private readonly notifier: ReviewRequestNotifier,
    private readonly timeoutMs: number
  ) {}

  review(outputPath: string): Promise<boolean> {
    if (this.pending) {
      console.warn(`⚠️ [ReviewGate] Superseding pending review: ${this.pending.outputPath}`);
      this.settle(true);
    }

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        console.warn(`⏰ [ReviewGate] No decision within ${this.timeoutMs}ms, keeping ${outputPath}`);
        this.settle(true);
      }, this.timeoutMs);

      this.pending = { outputPath, resolve, timer };
      console.log(`📝 [ReviewGate] Review requested: ${outputPath}`);
      this.notifier.publishReviewRequested(outputPath, this.timeoutMs);
    });
  }

  /**
   * 操作者の決定を反映する
   * @returns 対象の出力パス
   */
  decide(keep: boolean): string {
    if (!this.pending) {
      throw new NoPendingReviewError('No recording is awaiting review');
    }
    const { outputPath } = this.pending;
    console.log(`📝 [ReviewGate] ${keep ? 'Keep' : 'Discard'}: ${outputPath}`);
    this.settle(keep);
    return outputPath;
  }

  /**
   * 待機中のレビューを保持として閉じる（シャットダウン用）
   */
  cancel(): void {
    if (this.pending) {
      console.log(`📝 [ReviewGate] Review cancelled, keeping ${this.pending.outputPath}`);
      this.settle(true);
    }
  }

  getPendingOutputPath(): string | null {
    return this.pending?.outputPath ?? null;
  }

  private settle(keep: boolean): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(keep);
  }
}
