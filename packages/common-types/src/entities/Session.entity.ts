import type {
  SessionConfig,
  SessionOperation,
  SessionState,
  SessionStatus,
} from '../session.js';
import type { EncoderCandidate } from '../encoder.js';
import { InvalidStateTransitionError } from '../errors/DomainErrors.js';

/**
 * 各操作を開始できる状態
 */
const OPERATION_PRECONDITIONS: Readonly<Record<SessionOperation, readonly SessionState[]>> = {
  startPreview: ['idle'],
  stopPreview: ['previewing'],
  startRecording: ['idle', 'previewing'],
  stopRecording: ['recording'],
  reconcile: ['recording'],
};

/**
 * 各操作の完了時に遷移できる状態
 */
const OPERATION_OUTCOMES: Readonly<Record<SessionOperation, readonly SessionState[]>> = {
  startPreview: ['previewing', 'idle'],
  stopPreview: ['idle'],
  startRecording: ['recording', 'previewing', 'idle'],
  stopRecording: ['idle'],
  reconcile: ['idle'],
};

export interface SessionStatusContext {
  previewActive: boolean;
  cameraId: string | null;
  elapsedMs: number;
  elapsedLabel: string;
}

/**
 * Session ドメインエンティティ
 *
 * ビジネスルール:
 * - 状態を変更する操作は必ず busy を経由する
 * - busy 中は新しい操作をすべて拒否する（二重トリガーに対して冪等）
 * - busy からの遷移先は操作ごとに決まっている
 * - 録画中の設定・エンコーダ・PIDは録画開始時にのみ設定される
 */
export class SessionEntity {
  private state: SessionState = 'idle';
  private operation: SessionOperation | null = null;
  private activeConfig: SessionConfig | null = null;
  private chosenEncoder: EncoderCandidate | null = null;
  private enginePid: number | null = null;
  private maxDurationMs: number | null = null;
  private autoStopArmed = false;
  private mustRestorePreviewAfterStop = false;
  private lastError: string | null = null;

  private constructor() {}

  static create(): SessionEntity {
    return new SessionEntity();
  }

  /**
   * 操作を開始して busy に入る
   * 前提状態を満たさない場合は何もせず false を返す
   */
  tryBegin(operation: SessionOperation): boolean {
    if (!OPERATION_PRECONDITIONS[operation].includes(this.state)) {
      return false;
    }
    this.state = 'busy';
    this.operation = operation;
    return true;
  }

  /**
   * 実行中の操作を完了して busy から抜ける
   */
  complete(next: SessionState): void {
    if (this.state !== 'busy' || !this.operation) {
      throw new InvalidStateTransitionError(
        `Cannot complete an operation from state: ${this.state}. Must be in 'busy' state.`
      );
    }
    if (!OPERATION_OUTCOMES[this.operation].includes(next)) {
      throw new InvalidStateTransitionError(
        `Operation '${this.operation}' cannot complete into state: ${next}.`
      );
    }
    this.state = next;
    this.operation = null;
  }

  /**
   * ビジネスルール: 録画情報の設定
   * startRecording の実行中のみ設定可能
   */
  attachRecording(
    config: SessionConfig,
    encoder: EncoderCandidate,
    enginePid: number | null,
    maxDurationMs: number | null
  ): void {
    if (this.operation !== 'startRecording') {
      throw new InvalidStateTransitionError(
        `Cannot attach a recording outside of 'startRecording' (current: ${this.operation ?? this.state}).`
      );
    }
    this.activeConfig = config;
    this.chosenEncoder = encoder;
    this.enginePid = enginePid;
    this.maxDurationMs = maxDurationMs;
    this.autoStopArmed = maxDurationMs !== null;
  }

  /**
   * 録画情報をクリア（停止・失敗・自動復旧の後）
   */
  detachRecording(): void {
    this.activeConfig = null;
    this.chosenEncoder = null;
    this.enginePid = null;
    this.maxDurationMs = null;
    this.autoStopArmed = false;
  }

  /**
   * 自動停止を解除（タイマーからの再入を防ぐ）
   */
  disarmAutoStop(): void {
    this.autoStopArmed = false;
  }

  markPreviewSuspended(): void {
    this.mustRestorePreviewAfterStop = true;
  }

  /**
   * プレビュー復元フラグを取り出してクリアする
   */
  takePreviewRestore(): boolean {
    const restore = this.mustRestorePreviewAfterStop;
    this.mustRestorePreviewAfterStop = false;
    return restore;
  }

  recordError(message: string): void {
    this.lastError = message;
  }

  clearError(): void {
    this.lastError = null;
  }

  isRecording(): boolean {
    return this.state === 'recording';
  }

  // Getters
  getState(): SessionState {
    return this.state;
  }

  getOperation(): SessionOperation | null {
    return this.operation;
  }

  getActiveConfig(): SessionConfig | null {
    return this.activeConfig;
  }

  getChosenEncoder(): EncoderCandidate | null {
    return this.chosenEncoder;
  }

  getEnginePid(): number | null {
    return this.enginePid;
  }

  isAutoStopArmed(): boolean {
    return this.autoStopArmed;
  }

  mustRestorePreview(): boolean {
    return this.mustRestorePreviewAfterStop;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  /**
   * UI向けのステータスに変換
   */
  toStatus(context: SessionStatusContext): SessionStatus {
    return {
      state: this.state,
      operation: this.operation,
      previewActive: context.previewActive,
      cameraId: context.cameraId,
      outputPath: this.activeConfig?.outputPath ?? null,
      encoder: this.chosenEncoder,
      enginePid: this.enginePid,
      elapsedMs: context.elapsedMs,
      elapsedLabel: context.elapsedLabel,
      maxDurationMs: this.maxDurationMs,
      autoStopArmed: this.autoStopArmed,
      mustRestorePreviewAfterStop: this.mustRestorePreviewAfterStop,
      lastError: this.lastError,
    };
  }
}
