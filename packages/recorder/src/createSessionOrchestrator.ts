import type { ISessionEventPublisher } from './domain/events/ISessionEventPublisher.js';
import type { IProcessLauncher } from './domain/services/IProcessLauncher.js';
import type { IReviewGate } from './domain/services/IReviewGate.js';
import type { ICaptureDeviceAdapter } from './domain/services/ICaptureDeviceAdapter.js';
import { SessionOrchestrator } from './application/SessionOrchestrator.js';
import type { RecorderConfig } from './infrastructure/config/recorderConfig.js';
import { EngineCaptureDeviceAdapter } from './infrastructure/capture/EngineCaptureDeviceAdapter.js';
import { NodeProcessLauncher } from './infrastructure/engine/NodeProcessLauncher.js';
import type { EngineInputOptions } from './infrastructure/engine/EngineArgumentsBuilder.js';
import { EncoderSelector } from './infrastructure/services/EncoderSelector.js';
import { EngineIntrospection } from './infrastructure/services/EngineIntrospection.js';
import { RecordingProcessSupervisor } from './infrastructure/services/RecordingProcessSupervisor.js';

export interface RecorderCollaborators {
  reviewGate: IReviewGate;
  publisher: ISessionEventPublisher;
  launcher?: IProcessLauncher;
  captureAdapter?: ICaptureDeviceAdapter;
}

/**
 * 設定からオーケストレータと依存を組み立てる
 */
export function createSessionOrchestrator(
  config: RecorderConfig,
  collaborators: RecorderCollaborators
): SessionOrchestrator {
  const launcher = collaborators.launcher ?? new NodeProcessLauncher();
  const input: EngineInputOptions = {
    inputFormat: config.inputFormat,
    audioInputFormat: config.audioInputFormat,
  };
  const introspection = new EngineIntrospection(launcher, input, config.probeTimeoutMs);

  const captureAdapter =
    collaborators.captureAdapter ??
    new EngineCaptureDeviceAdapter(launcher, introspection, {
      enginePath: config.enginePath,
      input,
      stopTimeoutMs: config.stopTimeoutMs,
      forceKillTimeoutMs: config.forceKillTimeoutMs,
    });

  const supervisor = new RecordingProcessSupervisor(launcher, {
    input,
    enginePriority: config.enginePriority,
    forceKillTimeoutMs: config.forceKillTimeoutMs,
  });

  return new SessionOrchestrator(
    {
      captureAdapter,
      introspection,
      encoderSelector: new EncoderSelector(introspection),
      supervisor,
      reviewGate: collaborators.reviewGate,
      publisher: collaborators.publisher,
    },
    config
  );
}
