import type { RecordingEndReason, SessionStatus } from './session.js';

/**
 * WebSocket message: Session status changed
 */
export interface SessionStatusChanged {
  type: 'session_status';
  status: SessionStatus;
  timestamp: string;
}

/**
 * WebSocket message: Countdown before a recording attempt
 * remaining が 0 になった時点で録画開始
 */
export interface CountdownTick {
  type: 'countdown';
  remaining: number;
  timestamp: string;
}

/**
 * WebSocket message: Recording timer tick
 */
export interface TimerTick {
  type: 'timer_tick';
  elapsedMs: number;
  elapsedLabel: string;
}

/**
 * WebSocket message: Engine output line
 */
export interface EngineLogLine {
  type: 'engine_log';
  line: string;
}

/**
 * WebSocket message: Recording finished
 */
export interface RecordingFinished {
  type: 'recording_finished';
  outputPath: string;
  /** レビューで破棄された場合は false */
  kept: boolean;
  reason: RecordingEndReason;
  timestamp: string;
}

/**
 * WebSocket message: Operator review requested
 */
export interface ReviewRequested {
  type: 'review_requested';
  outputPath: string;
  timeoutMs: number;
}

/**
 * WebSocket message: Session error
 */
export interface SessionErrorMessage {
  type: 'session_error';
  code: string;
  message: string;
  timestamp: string;
}
