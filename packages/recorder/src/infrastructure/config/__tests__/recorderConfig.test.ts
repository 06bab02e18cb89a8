import { describe, it, expect } from 'vitest';
import { defaultInputFormat, getRecorderConfig } from '../recorderConfig.js';

describe('getRecorderConfig', () => {
  it('未設定の項目は既定値になる', () => {
    const config = getRecorderConfig({ CAPTURE_INPUT_FORMAT: 'v4l2' });

    expect(config).toEqual({
      enginePath: 'ffmpeg',
      inputFormat: 'v4l2',
      audioInputFormat: 'alsa',
      outputDir: './recordings',
      maxDurationMs: 60_000,
      settleDelayMs: 300,
      stopTimeoutMs: 1500,
      forceKillTimeoutMs: 2000,
      probeTimeoutMs: 5000,
      countdownSeconds: 3,
      preferHardwareEncoder: true,
      validateModeBeforeStart: false,
      useLowCompressionFallbackCodec: false,
      enginePriority: 'normal',
      defaultResolutionPreset: 'HD',
    });
  });

  it('環境変数の値を反映する', () => {
    const config = getRecorderConfig({
      ENGINE_PATH: '/opt/ffmpeg/bin/ffmpeg',
      CAPTURE_INPUT_FORMAT: 'dshow',
      MAX_DURATION_SEC: '0',
      PREFER_HARDWARE_ENCODER: 'false',
      VALIDATE_MODE: '1',
      ENGINE_PRIORITY: 'high',
    });

    expect(config.enginePath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.inputFormat).toBe('dshow');
    expect(config.maxDurationMs).toBeNull();
    expect(config.preferHardwareEncoder).toBe(false);
    expect(config.validateModeBeforeStart).toBe(true);
    expect(config.enginePriority).toBe('high');
  });

  it('不正な値はエラーにする', () => {
    expect(() => getRecorderConfig({ CAPTURE_INPUT_FORMAT: 'gdigrab' })).toThrow(
      'CAPTURE_INPUT_FORMAT must be one of dshow, avfoundation, v4l2 (got: gdigrab)'
    );
    expect(() => getRecorderConfig({ CAPTURE_INPUT_FORMAT: 'v4l2', SETTLE_DELAY_MS: '-1' })).toThrow(
      'SETTLE_DELAY_MS must be a non-negative number (got: -1)'
    );
    expect(() => getRecorderConfig({ CAPTURE_INPUT_FORMAT: 'v4l2', ENGINE_PRIORITY: 'realtime' })).toThrow(
      'ENGINE_PRIORITY must be one of normal, high, highest (got: realtime)'
    );
  });
});

describe('defaultInputFormat', () => {
  it('プラットフォームごとの入力形式', () => {
    expect(defaultInputFormat('win32')).toBe('dshow');
    expect(defaultInputFormat('darwin')).toBe('avfoundation');
    expect(defaultInputFormat('linux')).toBe('v4l2');
  });
});
