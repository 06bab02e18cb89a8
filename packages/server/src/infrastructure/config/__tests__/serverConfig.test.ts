import { describe, it, expect } from 'vitest';
import { getServerConfig } from '../serverConfig.js';

describe('getServerConfig', () => {
  it('未設定なら既定値', () => {
    expect(getServerConfig({})).toEqual({
      port: 3000,
      corsOrigin: 'http://localhost:5173',
      logLevel: 'info',
      reviewTimeoutMs: 120_000,
    });
  });

  it('環境変数の値を反映する', () => {
    const config = getServerConfig({
      PORT: '8080',
      CORS_ORIGIN: 'http://booth.local',
      LOG_LEVEL: 'debug',
      REVIEW_TIMEOUT_SEC: '30',
    });

    expect(config).toEqual({
      port: 8080,
      corsOrigin: 'http://booth.local',
      logLevel: 'debug',
      reviewTimeoutMs: 30_000,
    });
  });

  it('不正なポートやタイムアウトはエラー', () => {
    expect(() => getServerConfig({ PORT: 'abc' })).toThrow('PORT must be a valid port number (got: abc)');
    expect(() => getServerConfig({ REVIEW_TIMEOUT_SEC: '-5' })).toThrow(
      'REVIEW_TIMEOUT_SEC must be a positive number (got: -5)'
    );
  });
});
