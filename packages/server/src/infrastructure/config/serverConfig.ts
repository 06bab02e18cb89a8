export interface ServerConfig {
  port: number;
  corsOrigin: string;
  logLevel: string;
  /** レビューの決定を待つ時間（経過後は保持として扱う） */
  reviewTimeoutMs: number;
}

/**
 * 環境変数からサーバー設定を取得
 *
 * PORT: 待ち受けポート（default: 3000）
 * CORS_ORIGIN: 操作UIのオリジン（default: http://localhost:5173）
 * LOG_LEVEL: debug の場合アクセスログを dev 形式にする（default: info）
 * REVIEW_TIMEOUT_SEC: レビュー待ちの上限（default: 120）
 */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || 3000);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be a valid port number (got: ${env.PORT})`);
  }

  const reviewTimeoutSec = Number(env.REVIEW_TIMEOUT_SEC || 120);
  if (!Number.isFinite(reviewTimeoutSec) || reviewTimeoutSec <= 0) {
    throw new Error(`REVIEW_TIMEOUT_SEC must be a positive number (got: ${env.REVIEW_TIMEOUT_SEC})`);
  }

  return {
    port,
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:5173',
    logLevel: env.LOG_LEVEL || 'info',
    reviewTimeoutMs: reviewTimeoutSec * 1000,
  };
}
