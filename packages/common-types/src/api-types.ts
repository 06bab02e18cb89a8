/**
 * API Request/Response Type Definitions
 * 操作用HTTP APIで使用する型定義
 */

import type { FpsPreset } from './capture.js';
import type { SessionState, SessionStatus } from './session.js';

/**
 * POST /api/session/preview/start - Request
 */
export interface StartPreviewRequest {
  cameraId: string;
  presetLabel?: string;
}

/**
 * POST /api/session/recording/start - Request
 * microphoneId は null で音声なし、未指定は選択不足として拒否される
 */
export interface StartRecordingRequest {
  cameraId: string;
  microphoneId: string | null;
  /** 出力ディレクトリからの相対パス（ディレクトリ外は拒否） */
  outputPath?: string;
  presetLabel?: string;
  /** null はドライバのデフォルト */
  frameRate?: FpsPreset | null;
  maxDurationSec?: number;
}

/**
 * POST /api/session/review - Request
 */
export interface ReviewDecisionRequest {
  keep: boolean;
}

/**
 * セッション操作のレスポンス
 */
export interface SessionOperationResponse {
  outcome: 'completed' | 'rejected';
  state: SessionState;
  status: SessionStatus;
}
