import express from 'express';
import type { DiagnosticsController } from '../controllers/DiagnosticsController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

export function createDiagnosticsRouter(diagnosticsController: DiagnosticsController): express.Router {
  const router = express.Router();

  /**
   * GET /api/diagnostics/devices
   */
  router.get(
    '/diagnostics/devices',
    asyncHandler(async (req, res) => {
      await diagnosticsController.listDevices(req, res);
    })
  );

  /**
   * GET /api/diagnostics/modes/:cameraId
   */
  router.get(
    '/diagnostics/modes/:cameraId',
    asyncHandler(async (req, res) => {
      await diagnosticsController.listModes(req, res);
    })
  );

  return router;
}
