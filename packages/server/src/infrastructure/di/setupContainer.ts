import {
  EngineIntrospection,
  NodeProcessLauncher,
  createSessionOrchestrator,
  getRecorderConfig,
} from '@booth-capture/recorder';
import type { SessionOrchestrator } from '@booth-capture/recorder';
import { DIContainer } from './DIContainer.js';
import { WebSocketSessionEventPublisher } from '../events/WebSocketSessionEventPublisher.js';
import { OperatorReviewGate } from '../services/OperatorReviewGate.js';
import { getWebSocketManager } from '../websocket/WebSocketManager.js';
import type { ServerConfig } from '../config/serverConfig.js';

// Controllers
import { SessionController } from '../../presentation/controllers/SessionController.js';
import { DiagnosticsController } from '../../presentation/controllers/DiagnosticsController.js';

/**
 * DIコンテナのセットアップ (Server-side)
 *
 * 録画設定は環境変数から読み込む（getRecorderConfig）
 */
export function setupContainer(serverConfig: ServerConfig): DIContainer {
  const container = DIContainer.getInstance();

  // すでにセットアップ済みの場合はスキップ
  if (container.has('SessionOrchestrator')) {
    return container;
  }

  const recorderConfig = getRecorderConfig();
  console.log(
    `🎛️ Recorder: engine=${recorderConfig.enginePath}, input=${recorderConfig.inputFormat}, output=${recorderConfig.outputDir}`
  );

  // Event Publisher / Review Gate
  const publisher = new WebSocketSessionEventPublisher(getWebSocketManager());
  const reviewGate = new OperatorReviewGate(publisher, serverConfig.reviewTimeoutMs);
  container.register<OperatorReviewGate>('OperatorReviewGate', reviewGate);

  // Orchestrator
  const launcher = new NodeProcessLauncher();
  const orchestrator = createSessionOrchestrator(recorderConfig, { reviewGate, publisher, launcher });
  container.register<SessionOrchestrator>('SessionOrchestrator', orchestrator);

  // Diagnostics
  const introspection = new EngineIntrospection(
    launcher,
    { inputFormat: recorderConfig.inputFormat, audioInputFormat: recorderConfig.audioInputFormat },
    recorderConfig.probeTimeoutMs
  );

  // Controllers
  container.register<SessionController>('SessionController', new SessionController(orchestrator, reviewGate));
  container.register<DiagnosticsController>(
    'DiagnosticsController',
    new DiagnosticsController(introspection, recorderConfig.enginePath)
  );

  return container;
}
