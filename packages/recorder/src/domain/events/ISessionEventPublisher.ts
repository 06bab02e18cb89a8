/**
 * ISessionEventPublisher - セッションイベント発行インターフェース
 *
 * オーケストレータからUI層へのイベント通知を抽象化
 * （UIスレッドを直接呼ばず、メッセージとして渡す）
 */

import type { RecordingEndReason, SessionStatus } from '@booth-capture/common-types';

export interface ISessionEventPublisher {
  publishStatusChanged(status: SessionStatus): void;

  publishCountdown(remaining: number): void;

  publishTimerTick(elapsedMs: number, elapsedLabel: string): void;

  publishEngineLog(line: string): void;

  publishRecordingFinished(outputPath: string, kept: boolean, reason: RecordingEndReason): void;

  publishError(code: string, message: string): void;
}
