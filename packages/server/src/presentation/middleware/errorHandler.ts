/**
 * Error Handler Middleware
 *
 * Express用のエラーハンドリングミドルウェア
 */

import type { Request, Response, NextFunction } from 'express';
import { DomainError } from '@booth-capture/common-types';

/**
 * エラーハンドリングミドルウェア
 *
 * ドメインエラーを適切なHTTPステータスコードに変換してレスポンス
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // レスポンスが既に送信されている場合はデフォルトのエラーハンドラーに委譲
  if (res.headersSent) {
    return next(error);
  }

  console.error('[ErrorHandler]', {
    error: error.message,
    path: req.path,
    method: req.method,
  });

  if (error instanceof DomainError) {
    res.status(getStatusCodeForDomainError(error)).json({
      error: error.message,
      code: error.code,
    });
  } else {
    handleGenericError(error, res);
  }
}

/**
 * ドメインエラーコードをHTTPステータスコードに変換
 */
export function getStatusCodeForDomainError(error: DomainError): number {
  switch (error.code) {
    // 400 Bad Request
    case 'INVALID_REQUEST':
    case 'INVALID_SELECTION':
      return 400;

    // 404 Not Found
    case 'NO_FRAME_AVAILABLE':
      return 404;

    // 409 Conflict（現在の状態では実行できない）
    case 'INVALID_STATE_TRANSITION':
    case 'ALREADY_RUNNING':
    case 'DEVICE_CONTENTION':
    case 'NO_PENDING_REVIEW':
      return 409;

    // 502 Bad Gateway（エンジン・キャプチャデバイス側の失敗）
    case 'PROCESS_START_FAILURE':
    case 'UNEXPECTED_PROCESS_EXIT':
    case 'CAPTURE_DEVICE_ERROR':
      return 502;

    // 503 Service Unavailable（エンジンが見つからない）
    case 'ENGINE_NOT_FOUND':
      return 503;

    // 504 Gateway Timeout（エンジンが停止しない）
    case 'STOP_TIMEOUT':
      return 504;

    default:
      return 500;
  }
}

/**
 * 汎用エラーをHTTPレスポンスに変換
 */
function handleGenericError(error: Error, res: Response): void {
  // 本番環境では詳細なエラーメッセージを隠す
  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    error: isDevelopment ? error.message : 'Internal server error',
    ...(isDevelopment && { stack: error.stack }),
  });
}

/**
 * 非同期ルートハンドラーをラップしてエラーを next() に渡す
 *
 * 使用例:
 * router.get('/path', asyncHandler(async (req, res) => {
 *   const result = await someAsyncOperation();
 *   res.json(result);
 * }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
