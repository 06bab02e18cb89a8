const TICK_INTERVAL_MS = 1000;
const ONE_HOUR_MS = 60 * 60 * 1000;

export interface SessionTimerCallbacks {
  onTick?(elapsedMs: number, elapsedLabel: string): void;
  /**
   * 最大録画時間に達したとき（呼び出し前に自動停止は解除済み）
   */
  onAutoStop?(): void;
}

/**
 * 経過時間を mm:ss（1時間以上は hh:mm:ss）に整形
 */
export function formatElapsed(elapsedMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, '0');

  if (elapsedMs >= ONE_HOUR_MS) {
    return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  }
  return `${pad(minutes)}:${pad(seconds)}`;
}

/**
 * SessionTimer
 *
 * 1秒ごとに経過時間を通知し、最大録画時間に達したら自動停止を呼ぶ
 * 自動停止は呼ぶ前に解除するため、停止処理中のティックから再度呼ばれることはない
 */
export class SessionTimer {
  private interval: NodeJS.Timeout | null = null;
  private startedAt: number | null = null;
  private elapsedMs = 0;
  private maxDurationMs: number | null = null;
  private autoStopArmed = false;

  constructor(
    private readonly callbacks: SessionTimerCallbacks = {},
    private readonly now: () => number = () => Date.now()
  ) {}

  /**
   * 経過時間を0から計測し直す
   * maxDurationMs が null なら自動停止なし
   */
  start(maxDurationMs: number | null): void {
    this.stop();
    this.startedAt = this.now();
    this.elapsedMs = 0;
    this.maxDurationMs = maxDurationMs;
    this.autoStopArmed = maxDurationMs !== null;
    this.interval = setInterval(() => this.tick(), TICK_INTERVAL_MS);
  }

  /**
   * 計測を止める（経過時間は保持）
   */
  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    if (this.startedAt !== null) {
      this.elapsedMs = this.now() - this.startedAt;
      this.startedAt = null;
    }
    this.autoStopArmed = false;
  }

  /**
   * 停止して経過時間を0に戻し、0の表示を通知する
   */
  reset(): void {
    this.stop();
    this.elapsedMs = 0;
    this.maxDurationMs = null;
    this.callbacks.onTick?.(0, formatElapsed(0));
  }

  disarm(): void {
    this.autoStopArmed = false;
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  isArmed(): boolean {
    return this.autoStopArmed;
  }

  getElapsedMs(): number {
    if (this.startedAt !== null) {
      return this.now() - this.startedAt;
    }
    return this.elapsedMs;
  }

  getElapsedLabel(): string {
    return formatElapsed(this.getElapsedMs());
  }

  private tick(): void {
    const elapsedMs = this.getElapsedMs();
    this.callbacks.onTick?.(elapsedMs, formatElapsed(elapsedMs));

    if (this.autoStopArmed && this.maxDurationMs !== null && elapsedMs >= this.maxDurationMs) {
      this.autoStopArmed = false;
      this.callbacks.onAutoStop?.();
    }
  }
}
