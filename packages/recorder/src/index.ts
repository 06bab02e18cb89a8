// Application
export { SessionOrchestrator, defaultOutputName } from './application/SessionOrchestrator.js';
export type {
  OperationOutcome,
  PreviewRequest,
  RecordingRequest,
  SessionOrchestratorDeps,
  SessionOrchestratorOptions,
} from './application/SessionOrchestrator.js';
export { SessionTimer, formatElapsed } from './application/SessionTimer.js';
export { LatestFrameSlot } from './application/LatestFrameSlot.js';
export { createSessionOrchestrator } from './createSessionOrchestrator.js';
export type { RecorderCollaborators } from './createSessionOrchestrator.js';

// Domain
export { pickBestCapability, findPreset, isWithinPreset } from './domain/services/CapabilityResolver.js';
export type { ICaptureDeviceAdapter, ICaptureDeviceHandle, FrameListener } from './domain/services/ICaptureDeviceAdapter.js';
export type { IReviewGate } from './domain/services/IReviewGate.js';
export type { IProcessLauncher, EngineProcess } from './domain/services/IProcessLauncher.js';
export type { ISessionEventPublisher } from './domain/events/ISessionEventPublisher.js';

// Infrastructure
export { getRecorderConfig, defaultInputFormat } from './infrastructure/config/recorderConfig.js';
export type { RecorderConfig, EnginePriority } from './infrastructure/config/recorderConfig.js';
export { EngineIntrospection } from './infrastructure/services/EngineIntrospection.js';
export { EncoderSelector } from './infrastructure/services/EncoderSelector.js';
export { RecordingProcessSupervisor } from './infrastructure/services/RecordingProcessSupervisor.js';
export { NodeProcessLauncher } from './infrastructure/engine/NodeProcessLauncher.js';
export type { CaptureInputFormat, EngineInputOptions } from './infrastructure/engine/EngineArgumentsBuilder.js';
