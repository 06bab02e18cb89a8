/**
 * ドメインエラーの基底クラス
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // prototypeチェーンの復元（TypeScriptのextends Errorの問題対応）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * 操作対象の選択不足（カメラ・マイク未選択）
 * 状態を変更する前に拒否される
 */
export class InvalidSelectionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_SELECTION');
  }
}

/**
 * HTTPリクエストの形式不正
 */
export class InvalidRequestError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST');
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STATE_TRANSITION');
  }
}

/**
 * エンジンプロセス関連エラー
 */
export class EngineNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'ENGINE_NOT_FOUND');
  }
}

export class AlreadyRunningError extends DomainError {
  constructor(message: string) {
    super(message, 'ALREADY_RUNNING');
  }
}

export class ProcessStartFailureError extends DomainError {
  constructor(message: string, code: string = 'PROCESS_START_FAILURE') {
    super(message, code);
  }
}

/**
 * プレビューとの二重オープンが原因と判断できる起動失敗
 */
export class DeviceContentionError extends ProcessStartFailureError {
  constructor(message: string) {
    super(message, 'DEVICE_CONTENTION');
  }
}

export class StopTimeoutError extends DomainError {
  constructor(message: string) {
    super(message, 'STOP_TIMEOUT');
  }
}

export class UnexpectedProcessExitError extends DomainError {
  constructor(message: string) {
    super(message, 'UNEXPECTED_PROCESS_EXIT');
  }
}

/**
 * キャプチャデバイス関連エラー
 */
export class CaptureDeviceError extends DomainError {
  constructor(message: string) {
    super(message, 'CAPTURE_DEVICE_ERROR');
  }
}

export class NoFrameAvailableError extends DomainError {
  constructor(message: string) {
    super(message, 'NO_FRAME_AVAILABLE');
  }
}

/**
 * レビュー関連エラー
 */
export class NoPendingReviewError extends DomainError {
  constructor(message: string) {
    super(message, 'NO_PENDING_REVIEW');
  }
}
