import type { Request, Response } from 'express';
import type { EngineIntrospection } from '@booth-capture/recorder';

/**
 * Diagnostics Controller
 *
 * エンジンのデバイス一覧・モード一覧の生出力を返す（解析に失敗するデバイスの調査用）
 */
export class DiagnosticsController {
  constructor(
    private readonly introspection: EngineIntrospection,
    private readonly enginePath: string
  ) {}

  async listDevices(_req: Request, res: Response): Promise<void> {
    const [video, audio] = await Promise.all([
      this.introspection.listDevicesRaw(this.enginePath, 'video'),
      this.introspection.listDevicesRaw(this.enginePath, 'audio'),
    ]);
    res.json({ video, audio });
  }

  async listModes(req: Request, res: Response): Promise<void> {
    const { cameraId } = req.params;
    const lines = await this.introspection.listModesRaw(this.enginePath, cameraId);
    res.json({ cameraId, lines });
  }
}
