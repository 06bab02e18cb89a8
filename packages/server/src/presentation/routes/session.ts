import express from 'express';
import type { SessionController } from '../controllers/SessionController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Session Router
 *
 * NOTE: JSONデータを扱うため、express.json()ミドルウェアを使用
 */
export function createSessionRouter(sessionController: SessionController): express.Router {
  const router = express.Router();

  const jsonParser = express.json();

  /**
   * GET /api/session
   * 現在のセッション状態
   */
  router.get(
    '/session',
    asyncHandler(async (req, res) => {
      await sessionController.getStatus(req, res);
    })
  );

  /**
   * POST /api/session/preview/start
   */
  router.post(
    '/session/preview/start',
    jsonParser,
    asyncHandler(async (req, res) => {
      await sessionController.startPreview(req, res);
    })
  );

  /**
   * POST /api/session/preview/stop
   */
  router.post(
    '/session/preview/stop',
    asyncHandler(async (req, res) => {
      await sessionController.stopPreview(req, res);
    })
  );

  /**
   * POST /api/session/recording/start
   */
  router.post(
    '/session/recording/start',
    jsonParser,
    asyncHandler(async (req, res) => {
      await sessionController.startRecording(req, res);
    })
  );

  /**
   * POST /api/session/recording/stop
   */
  router.post(
    '/session/recording/stop',
    asyncHandler(async (req, res) => {
      await sessionController.stopRecording(req, res);
    })
  );

  /**
   * POST /api/session/review
   * 録画の採用／撮り直し
   */
  router.post(
    '/session/review',
    jsonParser,
    asyncHandler(async (req, res) => {
      await sessionController.submitReview(req, res);
    })
  );

  /**
   * GET /api/session/snapshot
   * 最新のプレビューフレーム（image/jpeg）
   */
  router.get(
    '/session/snapshot',
    asyncHandler(async (req, res) => {
      await sessionController.getSnapshot(req, res);
    })
  );

  /**
   * GET /api/devices?kind=video|audio
   */
  router.get(
    '/devices',
    asyncHandler(async (req, res) => {
      await sessionController.listDevices(req, res);
    })
  );

  return router;
}
