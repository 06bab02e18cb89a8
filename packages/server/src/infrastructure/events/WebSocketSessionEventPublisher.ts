/**
 * WebSocketSessionEventPublisher - WebSocket経由でセッションイベントを発行
 *
 * ISessionEventPublisherの実装
 * WebSocketManagerを使用してリアルタイム通知を送信
 */

import type { RecordingEndReason, SessionStatus } from '@booth-capture/common-types';
import type { ISessionEventPublisher } from '@booth-capture/recorder';
import type { WebSocketManager } from '../websocket/WebSocketManager.js';
import type { ReviewRequestNotifier } from '../services/OperatorReviewGate.js';

export class WebSocketSessionEventPublisher implements ISessionEventPublisher, ReviewRequestNotifier {
  private webSocketManager: WebSocketManager;

  constructor(webSocketManager: WebSocketManager) {
    this.webSocketManager = webSocketManager;
  }

  publishStatusChanged(status: SessionStatus): void {
    this.webSocketManager.emitSessionStatus(status);
  }

  publishCountdown(remaining: number): void {
    this.webSocketManager.emitCountdown(remaining);
  }

  publishTimerTick(elapsedMs: number, elapsedLabel: string): void {
    this.webSocketManager.emitTimerTick(elapsedMs, elapsedLabel);
  }

  publishEngineLog(line: string): void {
    this.webSocketManager.emitEngineLog(line);
  }

  publishRecordingFinished(outputPath: string, kept: boolean, reason: RecordingEndReason): void {
    this.webSocketManager.emitRecordingFinished(outputPath, kept, reason);
  }

  publishError(code: string, message: string): void {
    this.webSocketManager.emitSessionError(code, message);
  }

  publishReviewRequested(outputPath: string, timeoutMs: number): void {
    this.webSocketManager.emitReviewRequested(outputPath, timeoutMs);
  }
}
