// Entities
export { SessionEntity } from './entities/Session.entity.js';
export type { SessionStatusContext } from './entities/Session.entity.js';

// Domain Errors
export {
  DomainError,
  InvalidSelectionError,
  InvalidRequestError,
  InvalidStateTransitionError,
  EngineNotFoundError,
  AlreadyRunningError,
  ProcessStartFailureError,
  DeviceContentionError,
  StopTimeoutError,
  UnexpectedProcessExitError,
  CaptureDeviceError,
  NoFrameAvailableError,
  NoPendingReviewError,
} from './errors/DomainErrors.js';

// Capture types
export { RESOLUTION_PRESETS, FPS_PRESETS, isFpsPreset } from './capture.js';
export type {
  CaptureCapability,
  ResolutionPreset,
  CaptureDeviceKind,
  CaptureDeviceInfo,
  FpsPreset,
} from './capture.js';

// Encoder types
export { ENCODER_PROFILES, HARDWARE_ENCODER_ORDER } from './encoder.js';
export type { EncoderCandidate, HardwareEncoder, EncoderProfile } from './encoder.js';

// Session types
export type {
  SessionState,
  SessionOperation,
  SessionConfig,
  SessionStatus,
  RecordingEndReason,
} from './session.js';

// API types
export type {
  StartPreviewRequest,
  StartRecordingRequest,
  ReviewDecisionRequest,
  SessionOperationResponse,
} from './api-types.js';

// WebSocket message types
export type {
  SessionStatusChanged,
  CountdownTick,
  TimerTick,
  EngineLogLine,
  RecordingFinished,
  ReviewRequested,
  SessionErrorMessage,
} from './websocket.js';
