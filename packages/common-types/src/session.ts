import type { EncoderCandidate } from './encoder.js';

/**
 * Session state
 * - idle: 待機中
 * - previewing: プレビュー中
 * - recording: 録画中（プレビューが並行して動いている場合もある）
 * - busy: 複数ステップの操作を実行中（他の操作はすべて拒否される）
 */
export type SessionState = 'idle' | 'previewing' | 'recording' | 'busy';

/**
 * busy に入る操作の種類
 * reconcile はエンジンの予期しない終了に対する自動復旧
 */
export type SessionOperation =
  | 'startPreview'
  | 'stopPreview'
  | 'startRecording'
  | 'stopRecording'
  | 'reconcile';

/**
 * 録画1回分の設定（試行ごとに生成し、試行中は不変）
 */
export interface SessionConfig {
  readonly engineBinaryPath: string;
  readonly cameraId: string;
  /** null は音声なし */
  readonly microphoneId: string | null;
  readonly outputPath: string;
  readonly width: number;
  readonly height: number;
  /** null はドライバのデフォルト */
  readonly frameRate: number | null;
  readonly preferHardwareEncoder: boolean;
  readonly validateModeBeforeStart: boolean;
  readonly useLowCompressionFallbackCodec: boolean;
}

export type RecordingEndReason = 'operator' | 'auto-stop' | 'unexpected-exit' | 'shutdown';

/**
 * UI向けのセッション状態の射影
 */
export interface SessionStatus {
  state: SessionState;
  /** busy 中の操作 */
  operation: SessionOperation | null;
  previewActive: boolean;
  cameraId: string | null;
  outputPath: string | null;
  encoder: EncoderCandidate | null;
  enginePid: number | null;
  elapsedMs: number;
  /** mm:ss（1時間以上は hh:mm:ss） */
  elapsedLabel: string;
  maxDurationMs: number | null;
  autoStopArmed: boolean;
  mustRestorePreviewAfterStop: boolean;
  /** 直近の失敗メッセージ（成功した操作でクリアされる） */
  lastError: string | null;
}
