import { describe, it, expect } from 'vitest';
import {
  CaptureDeviceError,
  DeviceContentionError,
  EngineNotFoundError,
  InvalidRequestError,
  InvalidSelectionError,
  NoFrameAvailableError,
  NoPendingReviewError,
  ProcessStartFailureError,
  StopTimeoutError,
  UnexpectedProcessExitError,
} from '@booth-capture/common-types';
import { getStatusCodeForDomainError } from '../errorHandler.js';

describe('getStatusCodeForDomainError', () => {
  it('入力の不備は 400', () => {
    expect(getStatusCodeForDomainError(new InvalidRequestError('bad body'))).toBe(400);
    expect(getStatusCodeForDomainError(new InvalidSelectionError('no camera'))).toBe(400);
  });

  it('状態の競合は 409', () => {
    expect(getStatusCodeForDomainError(new DeviceContentionError('busy'))).toBe(409);
    expect(getStatusCodeForDomainError(new NoPendingReviewError('none'))).toBe(409);
  });

  it('エンジン側の失敗', () => {
    expect(getStatusCodeForDomainError(new ProcessStartFailureError('exited'))).toBe(502);
    expect(getStatusCodeForDomainError(new UnexpectedProcessExitError('crashed'))).toBe(502);
    expect(getStatusCodeForDomainError(new CaptureDeviceError('open failed'))).toBe(502);
    expect(getStatusCodeForDomainError(new EngineNotFoundError('missing'))).toBe(503);
    expect(getStatusCodeForDomainError(new StopTimeoutError('stuck'))).toBe(504);
  });

  it('フレームがなければ 404', () => {
    expect(getStatusCodeForDomainError(new NoFrameAvailableError('no frame'))).toBe(404);
  });
});
