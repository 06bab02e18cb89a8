import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import dotenv from 'dotenv';
import { createServer } from 'http';
import type { SessionOrchestrator } from '@booth-capture/recorder';
import { getServerConfig } from './infrastructure/config/serverConfig.js';
import { setupContainer } from './infrastructure/di/setupContainer.js';
import { getWebSocketManager } from './infrastructure/websocket/WebSocketManager.js';
import type { OperatorReviewGate } from './infrastructure/services/OperatorReviewGate.js';
import { createSessionRouter } from './presentation/routes/session.js';
import { createDiagnosticsRouter } from './presentation/routes/diagnostics.js';
import { errorHandler } from './presentation/middleware/errorHandler.js';
import type { SessionController } from './presentation/controllers/SessionController.js';
import type { DiagnosticsController } from './presentation/controllers/DiagnosticsController.js';

// Load environment variables
dotenv.config();

const config = getServerConfig();
const app = express();

// Initialize DI Container
const container = setupContainer(config);
const orchestrator = container.resolve<SessionOrchestrator>('SessionOrchestrator');
const reviewGate = container.resolve<OperatorReviewGate>('OperatorReviewGate');
const sessionController = container.resolve<SessionController>('SessionController');
const diagnosticsController = container.resolve<DiagnosticsController>('DiagnosticsController');

// Middleware
app.use(cors({
  origin: config.corsOrigin,
  credentials: true,
}));
app.use(morgan(config.logLevel === 'debug' ? 'dev' : 'combined'));

// API routes
app.use('/api', createSessionRouter(sessionController));
app.use('/api', createDiagnosticsRouter(diagnosticsController));

// Health check endpoint
app.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    state: orchestrator.getStatus().state,
    timestamp: new Date().toISOString(),
    uptime: process.uptime()
  });
});

// 404 handler
app.use((_req, res) => {
  res.status(404).json({ error: 'Not Found' });
});

// Error handler (must be last)
app.use(errorHandler);

// Create HTTP server
const httpServer = createServer(app);

// Initialize WebSocket
const webSocketManager = getWebSocketManager();
webSocketManager.initialize(httpServer, config.corsOrigin);
webSocketManager.setStatusProviderCallback(() => orchestrator.getStatus());

// Start server
httpServer.listen(config.port, () => {
  console.log(`🚀 Booth Capture Server running on port ${config.port}`);
  console.log(`📊 Log level: ${config.logLevel}`);
  console.log(`🏥 Health check: http://localhost:${config.port}/health`);
  console.log(`🔌 WebSocket enabled`);
});

// 録画開始（カウントダウン）や停止（レビュー待ち）は応答まで時間がかかる
httpServer.timeout = config.reviewTimeoutMs + 60000;
httpServer.keepAliveTimeout = 65000; // 65秒
httpServer.headersTimeout = 66000; // keepAliveTimeoutより長く

console.log(`⏱️  Server timeout: ${httpServer.timeout}ms`);

// Graceful shutdown: エンジン停止 → プレビュー停止 → HTTPサーバー停止
let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`🛑 [Server] ${signal} received, shutting down...`);

  reviewGate.cancel();
  await orchestrator.dispose();
  await webSocketManager.close();
  console.log('👋 [Server] Shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('❌ [Server] Shutdown failed:', err);
        process.exit(1);
      });
  });
}

export { webSocketManager };
export default app;
