import { FPS_PRESETS, InvalidRequestError, InvalidSelectionError, isFpsPreset } from '@booth-capture/common-types';
import type {
  CaptureDeviceKind,
  FpsPreset,
  ReviewDecisionRequest,
  SessionOperationResponse,
  StartPreviewRequest,
  StartRecordingRequest,
} from '@booth-capture/common-types';
import type { OperationOutcome } from '@booth-capture/recorder';

/**
 * JSONボディをオブジェクトとして取り出す
 */
function toRecord(body: unknown): Record<string, unknown> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(body));
}

function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${key} must be a string`);
  }
  return value;
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`${key} must be a string`);
  }
  return value;
}

function optionalNumber(body: Record<string, unknown>, key: string): number | undefined {
  const value = body[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new InvalidRequestError(`${key} must be a non-negative number`);
  }
  return value;
}

/**
 * null はドライバのデフォルト
 */
function optionalFrameRate(body: Record<string, unknown>): FpsPreset | null | undefined {
  const value = body.frameRate;
  if (value === undefined || value === null) {
    return value;
  }
  if (typeof value !== 'number' || !isFpsPreset(value)) {
    throw new InvalidRequestError(`frameRate must be one of ${FPS_PRESETS.join(', ')}`);
  }
  return value;
}

export function parseStartPreviewRequest(body: unknown): StartPreviewRequest {
  const record = toRecord(body);
  return {
    cameraId: requireString(record, 'cameraId'),
    presetLabel: optionalString(record, 'presetLabel'),
  };
}

/**
 * microphoneId は null で音声なし、未指定は選択不足として拒否
 */
export function parseStartRecordingRequest(body: unknown): StartRecordingRequest {
  const record = toRecord(body);

  const rawMicrophoneId = record.microphoneId;
  let microphoneId: string | null;
  if (rawMicrophoneId === undefined) {
    throw new InvalidSelectionError('Select a microphone, or pass null to record without audio');
  } else if (rawMicrophoneId === null) {
    microphoneId = null;
  } else if (typeof rawMicrophoneId === 'string') {
    microphoneId = rawMicrophoneId;
  } else {
    throw new InvalidRequestError('microphoneId must be a string or null');
  }

  return {
    cameraId: requireString(record, 'cameraId'),
    microphoneId,
    outputPath: optionalString(record, 'outputPath'),
    presetLabel: optionalString(record, 'presetLabel'),
    frameRate: optionalFrameRate(record),
    maxDurationSec: optionalNumber(record, 'maxDurationSec'),
  };
}

export function parseReviewDecision(body: unknown): ReviewDecisionRequest {
  const keep = toRecord(body).keep;
  if (typeof keep !== 'boolean') {
    throw new InvalidRequestError('keep must be a boolean');
  }
  return { keep };
}

export function parseDeviceKind(value: unknown): CaptureDeviceKind {
  if (value === undefined || value === 'video') {
    return 'video';
  }
  if (value === 'audio') {
    return 'audio';
  }
  throw new InvalidRequestError('kind must be video or audio');
}

/**
 * 操作結果をHTTPレスポンスに変換
 * failed はエラーとして投げ、errorHandler でステータスコードに変換する
 */
export function toOperationResponse(result: OperationOutcome): { statusCode: number; body: SessionOperationResponse } {
  if (result.outcome === 'failed') {
    throw result.error;
  }
  return {
    statusCode: result.outcome === 'completed' ? 200 : 409,
    body: {
      outcome: result.outcome,
      state: result.status.state,
      status: result.status,
    },
  };
}
