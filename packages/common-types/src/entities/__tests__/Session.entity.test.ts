import { describe, it, expect, beforeEach } from 'vitest';
import { SessionEntity } from '../Session.entity.js';
import { InvalidStateTransitionError } from '../../errors/DomainErrors.js';
import type { SessionConfig } from '../../session.js';

const CONFIG: SessionConfig = {
  engineBinaryPath: 'ffmpeg',
  cameraId: 'Test Camera',
  microphoneId: null,
  outputPath: '/tmp/out.mp4',
  width: 1280,
  height: 720,
  frameRate: 30,
  preferHardwareEncoder: false,
  validateModeBeforeStart: false,
  useLowCompressionFallbackCodec: false,
};

describe('SessionEntity', () => {
  let session: SessionEntity;

  beforeEach(() => {
    session = SessionEntity.create();
  });

  it('idle 状態で作成される', () => {
    expect(session.getState()).toBe('idle');
    expect(session.getOperation()).toBeNull();
  });

  describe('tryBegin', () => {
    it('前提状態を満たす操作は busy に入る', () => {
      expect(session.tryBegin('startPreview')).toBe(true);
      expect(session.getState()).toBe('busy');
      expect(session.getOperation()).toBe('startPreview');
    });

    it('busy 中の操作はすべて拒否される', () => {
      session.tryBegin('startRecording');

      expect(session.tryBegin('startPreview')).toBe(false);
      expect(session.tryBegin('startRecording')).toBe(false);
      expect(session.tryBegin('stopRecording')).toBe(false);
      expect(session.getOperation()).toBe('startRecording');
    });

    it('前提状態を満たさない操作は状態を変えずに拒否される', () => {
      expect(session.tryBegin('stopPreview')).toBe(false);
      expect(session.tryBegin('stopRecording')).toBe(false);
      expect(session.getState()).toBe('idle');
    });

    it('previewing から録画を開始できる', () => {
      session.tryBegin('startPreview');
      session.complete('previewing');

      expect(session.tryBegin('startRecording')).toBe(true);
    });
  });

  describe('complete', () => {
    it('許可された遷移先に遷移する', () => {
      session.tryBegin('startPreview');
      session.complete('previewing');

      expect(session.getState()).toBe('previewing');
      expect(session.getOperation()).toBeNull();
    });

    it('busy でない場合はエラー', () => {
      expect(() => session.complete('idle')).toThrow(InvalidStateTransitionError);
    });

    it('操作ごとに許可されない遷移先はエラー', () => {
      session.tryBegin('stopPreview');
      expect(session.getState()).toBe('idle');

      session.tryBegin('startPreview');
      expect(() => session.complete('recording')).toThrow(
        "Operation 'startPreview' cannot complete into state: recording."
      );
      expect(() => session.complete('busy')).toThrow(InvalidStateTransitionError);
    });

    it('録画の停止と後始末は idle にしか遷移しない', () => {
      session.tryBegin('startRecording');
      session.complete('recording');

      session.tryBegin('stopRecording');
      expect(() => session.complete('previewing')).toThrow(
        "Operation 'stopRecording' cannot complete into state: previewing."
      );
      session.complete('idle');

      session.tryBegin('startRecording');
      session.complete('recording');
      session.tryBegin('reconcile');
      expect(() => session.complete('previewing')).toThrow(InvalidStateTransitionError);
      session.complete('idle');
      expect(session.getState()).toBe('idle');
    });
  });

  describe('attachRecording', () => {
    it('最大時間が設定されていれば自動停止を有効にする', () => {
      session.tryBegin('startRecording');
      session.attachRecording(CONFIG, 'x264', 4242, 5000);
      session.complete('recording');

      expect(session.isRecording()).toBe(true);
      expect(session.getChosenEncoder()).toBe('x264');
      expect(session.getEnginePid()).toBe(4242);
      expect(session.isAutoStopArmed()).toBe(true);
    });

    it('最大時間が null なら自動停止は無効', () => {
      session.tryBegin('startRecording');
      session.attachRecording(CONFIG, 'x264', 1, null);

      expect(session.isAutoStopArmed()).toBe(false);
    });

    it('startRecording 以外の操作中はエラー', () => {
      expect(() => session.attachRecording(CONFIG, 'x264', 1, null)).toThrow(
        InvalidStateTransitionError
      );
    });
  });

  it('takePreviewRestore はフラグを一度だけ返す', () => {
    session.markPreviewSuspended();

    expect(session.mustRestorePreview()).toBe(true);
    expect(session.takePreviewRestore()).toBe(true);
    expect(session.takePreviewRestore()).toBe(false);
  });

  it('toStatus は録画情報とコンテキストを射影する', () => {
    session.tryBegin('startRecording');
    session.attachRecording(CONFIG, 'nvenc', 99, 60000);
    session.complete('recording');

    expect(
      session.toStatus({ previewActive: true, cameraId: 'Test Camera', elapsedMs: 0, elapsedLabel: '00:00' })
    ).toEqual({
      state: 'recording',
      operation: null,
      previewActive: true,
      cameraId: 'Test Camera',
      outputPath: '/tmp/out.mp4',
      encoder: 'nvenc',
      enginePid: 99,
      elapsedMs: 0,
      elapsedLabel: '00:00',
      maxDurationMs: 60000,
      autoStopArmed: true,
      mustRestorePreviewAfterStop: false,
      lastError: null,
    });
  });
});
