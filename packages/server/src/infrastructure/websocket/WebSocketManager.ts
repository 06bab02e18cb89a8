/**
 * WebSocketManager - Socket.IO サーバー管理
 *
 * 操作UIへのリアルタイム通知を管理
 * - セッション状態の変更
 * - カウントダウン・経過時間
 * - エンジン出力・エラー・レビュー依頼
 */

import { Server as SocketIOServer, Socket } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type {
  CountdownTick,
  EngineLogLine,
  RecordingEndReason,
  RecordingFinished,
  ReviewRequested,
  SessionErrorMessage,
  SessionStatus,
  SessionStatusChanged,
  TimerTick,
} from '@booth-capture/common-types';

/**
 * クライアントからサーバーへのイベント
 */
interface ClientToServerEvents {
  /** 接続直後などに現在の状態を要求 */
  request_status: () => void;
}

/**
 * サーバーからクライアントへのイベント
 */
interface ServerToClientEvents {
  session_status: (data: SessionStatusChanged) => void;
  countdown: (data: CountdownTick) => void;
  timer_tick: (data: TimerTick) => void;
  engine_log: (data: EngineLogLine) => void;
  recording_finished: (data: RecordingFinished) => void;
  review_requested: (data: ReviewRequested) => void;
  session_error: (data: SessionErrorMessage) => void;
}

/**
 * 現在のセッション状態を返すコールバック（接続時の初期表示用）
 */
export type StatusProviderCallback = () => SessionStatus;

/**
 * WebSocket Manager
 */
export class WebSocketManager {
  private io: SocketIOServer<ClientToServerEvents, ServerToClientEvents> | null = null;
  private statusProviderCallback: StatusProviderCallback | null = null;

  /**
   * Socket.IOサーバーを初期化
   */
  initialize(httpServer: HTTPServer, corsOrigin: string): void {
    this.io = new SocketIOServer<ClientToServerEvents, ServerToClientEvents>(httpServer, {
      cors: {
        origin: corsOrigin,
        methods: ['GET', 'POST'],
        credentials: true,
      },
      transports: ['websocket', 'polling'],
    });

    this.io.on('connection', (socket) => {
      console.log(`🔌 [WebSocket] Client connected: ${socket.id}`);

      this.handleConnection(socket);
    });

    console.log('✅ [WebSocket] WebSocketManager initialized');
  }

  /**
   * 現在の状態を返すコールバックを設定
   */
  setStatusProviderCallback(callback: StatusProviderCallback): void {
    this.statusProviderCallback = callback;
  }

  private handleConnection(socket: Socket<ClientToServerEvents, ServerToClientEvents>): void {
    this.sendCurrentStatus(socket);

    socket.on('request_status', () => {
      this.sendCurrentStatus(socket);
    });

    socket.on('disconnect', (reason) => {
      console.log(`🔌 [WebSocket] Client disconnected: ${socket.id} (${reason})`);
    });
  }

  private sendCurrentStatus(socket: Socket<ClientToServerEvents, ServerToClientEvents>): void {
    if (!this.statusProviderCallback) {
      return;
    }
    socket.emit('session_status', {
      type: 'session_status',
      status: this.statusProviderCallback(),
      timestamp: new Date().toISOString(),
    });
  }

  emitSessionStatus(status: SessionStatus): void {
    if (!this.io) {
      console.warn('⚠️ [WebSocket] Not initialized, cannot emit session_status');
      return;
    }

    const message: SessionStatusChanged = {
      type: 'session_status',
      status,
      timestamp: new Date().toISOString(),
    };

    console.log(`📡 [WebSocket] Emitting session_status: ${status.state}${status.operation ? ` (${status.operation})` : ''}`);
    this.io.emit('session_status', message);
  }

  emitCountdown(remaining: number): void {
    this.io?.emit('countdown', {
      type: 'countdown',
      remaining,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * 1秒ごとに呼ばれるためログは出さない
   */
  emitTimerTick(elapsedMs: number, elapsedLabel: string): void {
    this.io?.emit('timer_tick', { type: 'timer_tick', elapsedMs, elapsedLabel });
  }

  emitEngineLog(line: string): void {
    this.io?.emit('engine_log', { type: 'engine_log', line });
  }

  emitRecordingFinished(outputPath: string, kept: boolean, reason: RecordingEndReason): void {
    if (!this.io) {
      console.warn('⚠️ [WebSocket] Not initialized, cannot emit recording_finished');
      return;
    }

    const message: RecordingFinished = {
      type: 'recording_finished',
      outputPath,
      kept,
      reason,
      timestamp: new Date().toISOString(),
    };

    console.log('📡 [WebSocket] Emitting recording_finished', message);
    this.io.emit('recording_finished', message);
  }

  emitReviewRequested(outputPath: string, timeoutMs: number): void {
    if (!this.io) {
      console.warn('⚠️ [WebSocket] Not initialized, cannot emit review_requested');
      return;
    }

    console.log(`📡 [WebSocket] Emitting review_requested: ${outputPath}`);
    this.io.emit('review_requested', { type: 'review_requested', outputPath, timeoutMs });
  }

  emitSessionError(code: string, message: string): void {
    if (!this.io) {
      console.warn('⚠️ [WebSocket] Not initialized, cannot emit session_error');
      return;
    }

    const data: SessionErrorMessage = {
      type: 'session_error',
      code,
      message,
      timestamp: new Date().toISOString(),
    };

    console.log(`📡 [WebSocket] Emitting session_error: ${code}`);
    this.io.emit('session_error', data);
  }

  /**
   * Socket.IOサーバーを閉じる（接続先のHTTPサーバーも閉じられる）
   */
  async close(): Promise<void> {
    if (!this.io) {
      return;
    }
    const io = this.io;
    this.io = null;
    await new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
    console.log('🔌 [WebSocket] Closed');
  }
}

let instance: WebSocketManager | null = null;

/**
 * WebSocketManagerのシングルトンを取得
 */
export function getWebSocketManager(): WebSocketManager {
  if (!instance) {
    instance = new WebSocketManager();
  }
  return instance;
}
