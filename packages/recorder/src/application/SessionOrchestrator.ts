import { mkdir, rm } from 'fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'path';
import {
  CaptureDeviceError,
  DomainError,
  DeviceContentionError,
  InvalidRequestError,
  InvalidSelectionError,
  InvalidStateTransitionError,
  NoFrameAvailableError,
  ProcessStartFailureError,
  SessionEntity,
  UnexpectedProcessExitError,
} from '@booth-capture/common-types';
import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
  EncoderCandidate,
  RecordingEndReason,
  SessionConfig,
  SessionOperation,
  SessionState,
  SessionStatus,
} from '@booth-capture/common-types';
import { findPreset, pickBestCapability } from '../domain/services/CapabilityResolver.js';
import type { ICaptureDeviceAdapter, ICaptureDeviceHandle } from '../domain/services/ICaptureDeviceAdapter.js';
import type { IReviewGate } from '../domain/services/IReviewGate.js';
import type { ISessionEventPublisher } from '../domain/events/ISessionEventPublisher.js';
import type { RecorderConfig } from '../infrastructure/config/recorderConfig.js';
import { resolveOutputPath } from '../infrastructure/engine/EngineArgumentsBuilder.js';
import { isDeviceContentionOutput } from '../infrastructure/engine/EngineOutputParser.js';
import { toError } from '../infrastructure/engine/engineProcess.js';
import type { EncoderSelector } from '../infrastructure/services/EncoderSelector.js';
import type { EngineIntrospection } from '../infrastructure/services/EngineIntrospection.js';
import type { RecordingProcessSupervisor } from '../infrastructure/services/RecordingProcessSupervisor.js';
import { LatestFrameSlot } from './LatestFrameSlot.js';
import { SessionTimer } from './SessionTimer.js';

/**
 * ケイパビリティ一覧が得られないデバイスで録画に使う解像度
 */
const FALLBACK_CAPABILITY: CaptureCapability = { width: 1280, height: 720, frameRate: 0 };

/**
 * 操作の結果
 * - completed: 操作が成功した
 * - rejected: 現在の状態では受け付けない（状態は変化しない）
 * - failed: 実行したが失敗し、安全な状態に戻した
 */
export type OperationOutcome =
  | { outcome: 'completed'; status: SessionStatus }
  | { outcome: 'rejected'; status: SessionStatus }
  | { outcome: 'failed'; status: SessionStatus; error: Error };

export interface PreviewRequest {
  cameraId: string;
  presetLabel?: string;
}

export interface RecordingRequest {
  cameraId: string;
  /** null は音声なし */
  microphoneId: string | null;
  outputPath?: string;
  presetLabel?: string;
  /** 省略時はプレビュー（またはケイパビリティ）の値、null はドライバのデフォルト */
  frameRate?: number | null;
  /** 0 で自動停止なし */
  maxDurationSec?: number;
}

export type SessionOrchestratorOptions = Pick<
  RecorderConfig,
  | 'enginePath'
  | 'outputDir'
  | 'maxDurationMs'
  | 'settleDelayMs'
  | 'stopTimeoutMs'
  | 'countdownSeconds'
  | 'preferHardwareEncoder'
  | 'validateModeBeforeStart'
  | 'useLowCompressionFallbackCodec'
  | 'defaultResolutionPreset'
>;

export interface SessionOrchestratorDeps {
  captureAdapter: ICaptureDeviceAdapter;
  introspection: EngineIntrospection;
  encoderSelector: EncoderSelector;
  supervisor: RecordingProcessSupervisor;
  reviewGate: IReviewGate;
  publisher: ISessionEventPublisher;
}

interface ActivePreview {
  handle: ICaptureDeviceHandle;
  cameraId: string;
  presetLabel?: string;
  capability: CaptureCapability | null;
}

/**
 * SessionOrchestrator
 *
 * プレビュー開始・停止、録画開始・停止をセッションの状態機械を通して実行する
 *
 * ビジネスルール:
 * - すべての操作は busy を経由し、どの経路でも必ず busy から抜ける
 * - 録画開始の1回目はプレビューを動かしたまま試す
 * - 1回目が起動失敗で、プレビューが動いていた場合はプレビューを止めて1回だけ再試行する
 * - エンジンが録画中に単独で終了した場合は自動で後始末して待機状態に戻す
 */
export class SessionOrchestrator {
  private readonly session = SessionEntity.create();
  private readonly frameSlot = new LatestFrameSlot();
  private readonly timer: SessionTimer;
  private preview: ActivePreview | null = null;
  private lastPreviewRequest: PreviewRequest | null = null;
  private inFlight: Promise<OperationOutcome> | null = null;
  private disposed = false;

  constructor(
    private readonly deps: SessionOrchestratorDeps,
    private readonly options: SessionOrchestratorOptions
  ) {
    this.timer = new SessionTimer({
      onTick: (elapsedMs, elapsedLabel) => this.deps.publisher.publishTimerTick(elapsedMs, elapsedLabel),
      onAutoStop: () => this.handleAutoStop(),
    });
    this.deps.supervisor.setOnExitedCallback(() => this.handleEngineExit());
    this.deps.supervisor.setOnOutputCallback((line) => this.deps.publisher.publishEngineLog(line));
  }

  // ===== Operations =====

  async startPreview(request: PreviewRequest): Promise<OperationOutcome> {
    if (!request.cameraId) {
      return this.rejectSelection('No camera selected');
    }

    return this.runGuarded(
      'startPreview',
      async () => {
        // 録画後に残ったプレビューは開き直す
        await this.closePreview();
        await this.openPreview(request);
        return 'previewing';
      },
      () => 'idle'
    );
  }

  async stopPreview(): Promise<OperationOutcome> {
    return this.runGuarded(
      'stopPreview',
      async () => {
        await this.closePreview();
        return 'idle';
      },
      () => 'idle'
    );
  }

  async startRecording(request: RecordingRequest): Promise<OperationOutcome> {
    if (!request.cameraId) {
      return this.rejectSelection('No camera selected');
    }
    if (request.microphoneId !== null && request.microphoneId.trim() === '') {
      return this.rejectSelection('No microphone selected');
    }
    if (request.frameRate !== undefined && request.frameRate !== null && !(request.frameRate > 0)) {
      return this.rejectRequest(new InvalidRequestError('frameRate must be a positive number'));
    }
    let outputPath: string;
    try {
      outputPath = this.resolveRequestedOutputPath(request.outputPath);
    } catch (err) {
      return this.rejectRequest(toError(err));
    }

    return this.runGuarded(
      'startRecording',
      async () => {
        const previewWasActive = this.preview !== null;
        const config = await this.buildSessionConfig(request, outputPath);
        const maxDurationMs = this.resolveMaxDuration(request.maxDurationSec);

        await this.runCountdown();
        this.throwIfDisposed();

        try {
          await this.attemptRecording(config, maxDurationMs);
        } catch (err) {
          if (!previewWasActive || !(err instanceof ProcessStartFailureError)) {
            throw err;
          }
          console.warn(
            `⚠️ [Orchestrator] First attempt failed with preview running (${err.code}), retrying without preview`
          );
          await this.closePreview();
          this.session.markPreviewSuspended();
          await this.attemptRecording(config, maxDurationMs);
        }

        this.timer.start(maxDurationMs);
        console.log(`🔴 [Orchestrator] Recording started: ${this.session.getActiveConfig()?.outputPath ?? ''}`);
        return 'recording';
      },
      () => {
        // 再試行のために止めたプレビューは復元しない
        this.session.takePreviewRestore();
        return this.preview ? 'previewing' : 'idle';
      }
    );
  }

  async stopRecording(reason: RecordingEndReason = 'operator'): Promise<OperationOutcome> {
    return this.runGuarded(
      'stopRecording',
      async () => {
        this.timer.disarm();
        this.session.disarmAutoStop();
        const outputPath = this.session.getActiveConfig()?.outputPath ?? null;

        let stopError: Error | null = null;
        try {
          await this.deps.supervisor.stop(this.options.stopTimeoutMs);
        } catch (err) {
          stopError = toError(err);
        }

        await this.finishRecording();
        if (stopError) {
          throw stopError;
        }
        if (outputPath) {
          await this.reviewOutput(outputPath, reason);
        }
        console.log(`⏹️ [Orchestrator] Recording stopped (${reason})`);
        return 'idle';
      },
      () => 'idle'
    );
  }

  /**
   * 最新のプレビューフレームのコピー
   */
  takeSnapshot(): Uint8Array {
    const frame = this.preview ? this.frameSlot.latest() : null;
    if (!frame) {
      throw new NoFrameAvailableError('No preview frame available');
    }
    return frame;
  }

  async listDevices(kind: CaptureDeviceKind): Promise<CaptureDeviceInfo[]> {
    return this.deps.captureAdapter.listDevices(kind);
  }

  getStatus(): SessionStatus {
    return this.session.toStatus({
      previewActive: this.preview !== null,
      cameraId: this.preview?.cameraId ?? this.session.getActiveConfig()?.cameraId ?? null,
      elapsedMs: this.timer.getElapsedMs(),
      elapsedLabel: this.timer.getElapsedLabel(),
    });
  }

  /**
   * 終了処理（エンジン停止 → プレビュー停止）
   * 状態機械を通さず、失敗してもすべての資源の解放を試みる
   */
  async dispose(): Promise<void> {
    console.log('🧹 [Orchestrator] Disposing session...');
    this.disposed = true;
    // 実行中の操作は次の待機点で中断される
    if (this.inFlight) {
      await this.inFlight;
    }
    this.timer.stop();
    const outputPath = this.session.isRecording() ? this.session.getActiveConfig()?.outputPath ?? null : null;

    try {
      await this.deps.supervisor.stop(this.options.stopTimeoutMs);
    } catch (err) {
      console.error('❌ [Orchestrator] Failed to stop engine during dispose:', toError(err).message);
    }
    try {
      await this.closePreview();
    } catch (err) {
      console.error('❌ [Orchestrator] Failed to stop preview during dispose:', toError(err).message);
    }
    if (outputPath) {
      this.deps.publisher.publishRecordingFinished(outputPath, true, 'shutdown');
    }
    console.log('✅ [Orchestrator] Session disposed');
  }

  // ===== Guard =====

  /**
   * 操作を busy で囲んで実行する
   * 失敗は記録して fallback の状態に遷移し、呼び出し側には結果として返す
   */
  private runGuarded(
    operation: SessionOperation,
    body: () => Promise<SessionState>,
    fallback: () => SessionState
  ): Promise<OperationOutcome> {
    if (this.disposed || !this.session.tryBegin(operation)) {
      console.log(
        `⏭️ [Orchestrator] ${operation} ignored ${this.disposed ? 'after dispose' : `in state: ${this.session.getState()}`}`
      );
      return Promise.resolve({ outcome: 'rejected', status: this.getStatus() });
    }
    const running = this.execute(operation, body, fallback);
    this.inFlight = running;
    return running;
  }

  private async execute(
    operation: SessionOperation,
    body: () => Promise<SessionState>,
    fallback: () => SessionState
  ): Promise<OperationOutcome> {
    this.session.clearError();
    this.publishStatus();

    try {
      const next = await body();
      this.session.complete(next);
      return { outcome: 'completed', status: this.getStatus() };
    } catch (err) {
      const error = toError(err);
      console.error(`❌ [Orchestrator] ${operation} failed:`, error.message);
      this.session.recordError(error.message);
      this.session.complete(fallback());
      this.deps.publisher.publishError(errorCode(error), error.message);
      return { outcome: 'failed', status: this.getStatus(), error };
    } finally {
      this.publishStatus();
    }
  }

  private rejectSelection(message: string): OperationOutcome {
    return this.rejectRequest(new InvalidSelectionError(message));
  }

  private rejectRequest(error: Error): OperationOutcome {
    console.warn(`⚠️ [Orchestrator] ${error.message}`);
    return { outcome: 'failed', status: this.getStatus(), error };
  }

  private throwIfDisposed(): void {
    if (this.disposed) {
      throw new InvalidStateTransitionError('Session is shutting down');
    }
  }

  private publishStatus(): void {
    this.deps.publisher.publishStatusChanged(this.getStatus());
  }

  // ===== Preview =====

  private async openPreview(request: PreviewRequest): Promise<void> {
    let handle: ICaptureDeviceHandle | null = null;
    try {
      handle = await this.deps.captureAdapter.openDevice(request.cameraId);
      const preset = findPreset(request.presetLabel ?? this.options.defaultResolutionPreset);
      const capability = pickBestCapability(handle.capabilities(), preset);
      if (capability) {
        handle.setCapability(capability);
      }

      this.frameSlot.clear();
      const started = handle;
      await handle.start(
        (frame) => this.frameSlot.put(frame),
        () => this.handlePreviewEnded(started)
      );

      this.preview = { handle, cameraId: request.cameraId, presetLabel: request.presetLabel, capability };
      this.lastPreviewRequest = request;
      console.log(
        `👁️ [Orchestrator] Preview started: ${request.cameraId}` +
          (capability ? ` (${capability.width}x${capability.height}@${capability.frameRate})` : ' (driver default)')
      );
    } catch (err) {
      if (handle?.isRunning()) {
        await handle.stop().catch((stopErr: unknown) => {
          console.error('❌ [Orchestrator] Failed to release camera:', toError(stopErr).message);
        });
      }
      if (err instanceof DomainError) {
        throw err;
      }
      throw new CaptureDeviceError(`Failed to start preview: ${toError(err).message}`);
    }
  }

  /**
   * デバイスが完全に停止するまで待つ
   */
  private async closePreview(): Promise<void> {
    const preview = this.preview;
    if (!preview) {
      return;
    }
    this.preview = null;
    this.frameSlot.clear();
    await preview.handle.stop();
    console.log(`👁️ [Orchestrator] Preview stopped: ${preview.cameraId}`);
  }

  /**
   * 録画のために止めたプレビューを戻す（失敗しても録画停止は成功扱い）
   */
  private async restorePreview(): Promise<void> {
    if (this.preview || !this.lastPreviewRequest) {
      return;
    }
    try {
      await this.openPreview(this.lastPreviewRequest);
    } catch (err) {
      console.warn(`⚠️ [Orchestrator] Failed to restore preview: ${toError(err).message}`);
    }
  }

  // ===== Recording =====

  /**
   * 録画1回分の設定を組み立てる
   * プリセット指定がなければ同じカメラのプレビュー設定を引き継ぐ
   */
  private async buildSessionConfig(request: RecordingRequest, outputPath: string): Promise<SessionConfig> {
    const capability = await this.resolveRecordingCapability(request);
    const frameRate =
      request.frameRate !== undefined
        ? request.frameRate
        : capability.frameRate > 0
          ? capability.frameRate
          : null;

    await mkdir(dirname(outputPath), { recursive: true });

    return {
      engineBinaryPath: this.options.enginePath,
      cameraId: request.cameraId,
      microphoneId: request.microphoneId,
      outputPath,
      width: capability.width,
      height: capability.height,
      frameRate,
      preferHardwareEncoder: this.options.preferHardwareEncoder,
      validateModeBeforeStart: this.options.validateModeBeforeStart,
      useLowCompressionFallbackCodec: this.options.useLowCompressionFallbackCodec,
    };
  }

  /**
   * 出力先は出力ディレクトリ配下に限る（相対パスは出力ディレクトリ基準）
   */
  private resolveRequestedOutputPath(requested: string | undefined): string {
    const outputDir = resolve(this.options.outputDir);
    if (requested === undefined) {
      return join(outputDir, defaultOutputName(new Date()));
    }
    const outputPath = resolve(outputDir, requested);
    const inside = relative(outputDir, outputPath);
    if (inside === '' || inside.startsWith('..') || isAbsolute(inside)) {
      throw new InvalidRequestError(`outputPath must be a file inside ${outputDir}`);
    }
    return outputPath;
  }

  private async resolveRecordingCapability(request: RecordingRequest): Promise<CaptureCapability> {
    if (
      request.presetLabel === undefined &&
      this.preview?.cameraId === request.cameraId &&
      this.preview.capability
    ) {
      return this.preview.capability;
    }

    const preset = findPreset(request.presetLabel ?? this.options.defaultResolutionPreset);
    const capabilities =
      this.preview?.cameraId === request.cameraId
        ? this.preview.handle.capabilities()
        : await this.deps.introspection.listCapabilities(this.options.enginePath, request.cameraId);
    return pickBestCapability(capabilities, preset) ?? FALLBACK_CAPABILITY;
  }

  private resolveMaxDuration(maxDurationSec: number | undefined): number | null {
    if (maxDurationSec === undefined) {
      return this.options.maxDurationMs;
    }
    return maxDurationSec > 0 ? maxDurationSec * 1000 : null;
  }

  private async runCountdown(): Promise<void> {
    const seconds = this.options.countdownSeconds;
    if (seconds <= 0) {
      return;
    }
    for (let remaining = seconds; remaining > 0; remaining--) {
      this.deps.publisher.publishCountdown(remaining);
      await delay(1000);
      this.throwIfDisposed();
    }
    this.deps.publisher.publishCountdown(0);
  }

  /**
   * エンコーダを選んでエンジンを起動し、待機後もまだ動いていれば成功
   */
  private async attemptRecording(config: SessionConfig, maxDurationMs: number | null): Promise<void> {
    const encoder = await this.deps.encoderSelector.select(config.engineBinaryPath, {
      preferHardware: config.preferHardwareEncoder,
      useLowCompressionFallback: config.useLowCompressionFallbackCodec,
    });
    const attemptConfig: SessionConfig = { ...config, outputPath: resolveOutputPath(config.outputPath, encoder) };

    if (attemptConfig.validateModeBeforeStart) {
      await this.warnIfModeUnsupported(attemptConfig);
    }

    this.throwIfDisposed();
    const handle = await this.deps.supervisor.start(attemptConfig, encoder);
    await delay(this.options.settleDelayMs);

    if (this.disposed) {
      await this.deps.supervisor.stop(this.options.stopTimeoutMs);
      this.throwIfDisposed();
    }

    if (!this.deps.supervisor.isRunning() || this.deps.supervisor.getHandle() !== handle) {
      await this.deps.supervisor.stop(this.options.stopTimeoutMs);
      throw this.classifyStartFailure(encoder);
    }

    this.session.attachRecording(attemptConfig, encoder, handle.pid, maxDurationMs);
  }

  private async warnIfModeUnsupported(config: SessionConfig): Promise<void> {
    const supported = await this.deps.introspection.isModeSupported(config);
    if (!supported) {
      console.warn(
        `⚠️ [Orchestrator] ${config.width}x${config.height}` +
          (config.frameRate !== null ? `@${config.frameRate}` : '') +
          ` is not listed for ${config.cameraId}, continuing anyway`
      );
    }
  }

  private classifyStartFailure(encoder: EncoderCandidate): ProcessStartFailureError {
    const recent = this.deps.supervisor.getRecentOutput();
    const lastLine = recent.length > 0 ? recent[recent.length - 1] : 'no output';
    if (isDeviceContentionOutput(recent)) {
      return new DeviceContentionError(`Capture device is in use: ${lastLine}`);
    }
    return new ProcessStartFailureError(`Engine (${encoder}) exited during startup: ${lastLine}`);
  }

  /**
   * 録画終了の共通後始末（タイマー・録画情報・プレビュー復元）
   */
  private async finishRecording(): Promise<void> {
    this.timer.reset();
    this.session.detachRecording();
    if (this.session.takePreviewRestore()) {
      await this.restorePreview();
    }
  }

  private async reviewOutput(outputPath: string, reason: RecordingEndReason): Promise<void> {
    let kept = true;
    try {
      kept = await this.deps.reviewGate.review(outputPath);
    } catch (err) {
      console.warn(`⚠️ [Orchestrator] Review failed, keeping ${outputPath}: ${toError(err).message}`);
    }

    if (!kept) {
      try {
        await rm(outputPath, { force: true });
        console.log(`🗑️ [Orchestrator] Discarded ${outputPath}`);
      } catch (err) {
        console.error(`❌ [Orchestrator] Failed to delete ${outputPath}:`, toError(err).message);
      }
    }
    this.deps.publisher.publishRecordingFinished(outputPath, kept, reason);
  }

  // ===== Event handlers =====

  private handleAutoStop(): void {
    console.log('⏱️ [Orchestrator] Max duration reached, stopping recording');
    this.session.disarmAutoStop();
    this.stopRecording('auto-stop').catch((err: unknown) => {
      console.error('❌ [Orchestrator] Auto-stop failed:', toError(err).message);
    });
  }

  /**
   * エンジン終了の通知
   * 録画中以外（停止処理中・起動待機中）は各操作が自分で後始末する
   */
  private handleEngineExit(): void {
    if (this.disposed || !this.session.isRecording()) {
      return;
    }
    this.reconcile().catch((err: unknown) => {
      console.error('❌ [Orchestrator] Reconciliation failed:', toError(err).message);
    });
  }

  /**
   * プレビューのデバイスが停止要求なしに止まった
   */
  private handlePreviewEnded(handle: ICaptureDeviceHandle): void {
    const preview = this.preview;
    if (this.disposed || !preview || preview.handle !== handle) {
      return;
    }
    const error = new CaptureDeviceError(`Preview device stopped unexpectedly: ${preview.cameraId}`);
    console.warn(`⚠️ [Orchestrator] ${error.message}`);
    this.preview = null;
    this.frameSlot.clear();
    this.session.recordError(error.message);
    this.deps.publisher.publishError(error.code, error.message);

    if (this.session.getState() === 'previewing') {
      this.stopPreview().catch((err: unknown) => {
        console.error('❌ [Orchestrator] Failed to leave preview state:', toError(err).message);
      });
    } else {
      this.publishStatus();
    }
  }

  private async reconcile(): Promise<OperationOutcome> {
    return this.runGuarded(
      'reconcile',
      async () => {
        const outputPath = this.session.getActiveConfig()?.outputPath ?? null;
        const error = new UnexpectedProcessExitError('Engine exited while recording');
        console.warn(`⚠️ [Orchestrator] ${error.message}, returning to a safe state`);
        this.session.recordError(error.message);
        this.deps.publisher.publishError(error.code, error.message);

        // ハンドルは終了時に解放済み
        await this.deps.supervisor.stop(this.options.stopTimeoutMs);
        await this.finishRecording();
        if (outputPath) {
          this.deps.publisher.publishRecordingFinished(outputPath, true, 'unexpected-exit');
        }
        return 'idle';
      },
      () => 'idle'
    );
  }
}

/**
 * recording_YYYYMMDD_HHmmss.mp4（ローカル時刻）
 */
export function defaultOutputName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `recording_${day}_${time}.mp4`;
}

function errorCode(error: Error): string {
  return error instanceof DomainError ? error.code : 'INTERNAL_ERROR';
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
