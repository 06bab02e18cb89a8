import type { Request, Response } from 'express';
import type { SessionOrchestrator } from '@booth-capture/recorder';
import type { OperatorReviewGate } from '../../infrastructure/services/OperatorReviewGate.js';
import {
  parseDeviceKind,
  parseReviewDecision,
  parseStartPreviewRequest,
  parseStartRecordingRequest,
  toOperationResponse,
} from './sessionRequestParsers.js';

/**
 * Session Controller
 *
 * HTTPリクエストを受け取り、オーケストレータの操作を実行し、レスポンスを返す
 * エラーハンドリングはミドルウェアに委譲
 */
export class SessionController {
  private orchestrator: SessionOrchestrator;
  private reviewGate: OperatorReviewGate;

  constructor(orchestrator: SessionOrchestrator, reviewGate: OperatorReviewGate) {
    this.orchestrator = orchestrator;
    this.reviewGate = reviewGate;
  }

  async getStatus(_req: Request, res: Response): Promise<void> {
    res.json(this.orchestrator.getStatus());
  }

  async startPreview(req: Request, res: Response): Promise<void> {
    const request = parseStartPreviewRequest(req.body);
    const { statusCode, body } = toOperationResponse(await this.orchestrator.startPreview(request));
    res.status(statusCode).json(body);
  }

  async stopPreview(_req: Request, res: Response): Promise<void> {
    const { statusCode, body } = toOperationResponse(await this.orchestrator.stopPreview());
    res.status(statusCode).json(body);
  }

  /**
   * 録画開始（カウントダウンと起動の待機を含むため数秒かかる）
   */
  async startRecording(req: Request, res: Response): Promise<void> {
    const request = parseStartRecordingRequest(req.body);
    const { statusCode, body } = toOperationResponse(await this.orchestrator.startRecording(request));
    res.status(statusCode).json(body);
  }

  /**
   * 録画停止（レビューの決定を待ってから応答する）
   */
  async stopRecording(_req: Request, res: Response): Promise<void> {
    const { statusCode, body } = toOperationResponse(await this.orchestrator.stopRecording());
    res.status(statusCode).json(body);
  }

  async submitReview(req: Request, res: Response): Promise<void> {
    const { keep } = parseReviewDecision(req.body);
    const outputPath = this.reviewGate.decide(keep);
    res.json({ outputPath, keep });
  }

  async getSnapshot(_req: Request, res: Response): Promise<void> {
    const frame = this.orchestrator.takeSnapshot();
    res.type('image/jpeg').send(Buffer.from(frame));
  }

  async listDevices(req: Request, res: Response): Promise<void> {
    const kind = parseDeviceKind(req.query.kind);
    const devices = await this.orchestrator.listDevices(kind);
    res.json({ kind, devices });
  }
}
