import { randomUUID } from 'crypto';
import { access } from 'fs/promises';
import { constants as osConstants, setPriority } from 'os';
import {
  AlreadyRunningError,
  EngineNotFoundError,
  ProcessStartFailureError,
} from '@booth-capture/common-types';
import type { EncoderCandidate, SessionConfig } from '@booth-capture/common-types';
import { isProcessAlive } from '../../domain/services/IProcessLauncher.js';
import type { EngineProcess, IProcessLauncher } from '../../domain/services/IProcessLauncher.js';
import { buildRecordingArguments, resolveOutputPath } from '../engine/EngineArgumentsBuilder.js';
import type { EngineInputOptions } from '../engine/EngineArgumentsBuilder.js';
import { forwardLines, terminateEngineProcess, toError, waitForSpawn } from '../engine/engineProcess.js';
import type { EnginePriority } from '../config/recorderConfig.js';

/** 起動失敗の分類に使う直近出力行の保持数 */
const OUTPUT_HISTORY_SIZE = 50;

export interface RecordingProcessSupervisorOptions {
  input: EngineInputOptions;
  enginePriority: EnginePriority;
  forceKillTimeoutMs: number;
  platform?: NodeJS.Platform;
}

export type OnEngineExitedCallback = () => void;
export type OnEngineOutputCallback = (line: string) => void;

/**
 * 実行中のエンジンプロセス
 */
export class EngineProcessHandle {
  readonly id = randomUUID();
  readonly startedAt = new Date();
  private exitNotified = false;

  constructor(
    readonly process: EngineProcess,
    readonly encoder: EncoderCandidate,
    readonly outputPath: string
  ) {}

  get pid(): number | null {
    return this.process.pid ?? null;
  }

  isAlive(): boolean {
    return isProcessAlive(this.process);
  }

  /**
   * 終了通知を一度だけ許可する
   */
  claimExitNotification(): boolean {
    if (this.exitNotified) {
      return false;
    }
    this.exitNotified = true;
    return true;
  }
}

/**
 * RecordingProcessSupervisor
 *
 * - 同時に存在できるエンジンプロセスは1つだけ
 * - 標準出力・標準エラーはプロセスが生きている間ずっと行単位で読み続ける
 * - 終了通知は終了の理由（正常・強制・クラッシュ）に関係なくプロセスごとに1回
 */
export class RecordingProcessSupervisor {
  private handle: EngineProcessHandle | null = null;
  private recentOutput: string[] = [];
  private onExitedCallback: OnEngineExitedCallback | null = null;
  private onOutputCallback: OnEngineOutputCallback | null = null;

  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly options: RecordingProcessSupervisorOptions
  ) {}

  /**
   * エンジンを起動する
   * 起動できても出力が正しいとは限らないため、呼び出し側で待機後に isRunning() を確認すること
   */
  async start(config: SessionConfig, encoder: EncoderCandidate): Promise<EngineProcessHandle> {
    if (this.handle) {
      throw new AlreadyRunningError(`Engine process already running (pid: ${this.handle.pid ?? '?'})`);
    }
    await this.ensureEngineExists(config.engineBinaryPath);

    const args = buildRecordingArguments(config, encoder, this.options.input);
    console.log(`🎬 [Supervisor] ${config.engineBinaryPath} ${args.join(' ')}`);

    let proc: EngineProcess;
    try {
      proc = this.launcher.launch(config.engineBinaryPath, args);
    } catch (err) {
      throw new ProcessStartFailureError(`Failed to launch engine: ${toError(err).message}`);
    }

    const handle = new EngineProcessHandle(proc, encoder, resolveOutputPath(config.outputPath, encoder));
    this.handle = handle;
    this.recentOutput = [];

    proc.stdin.on('error', (err) => {
      console.warn(`⚠️ [Supervisor] Engine stdin error: ${err.message}`);
    });
    this.drain(proc);
    proc.once('exit', (code, signal) => this.handleExit(handle, code, signal));

    try {
      await waitForSpawn(proc);
    } catch (err) {
      this.release(handle);
      const error = toError(err);
      if ('code' in error && error.code === 'ENOENT') {
        throw new EngineNotFoundError(`Engine not found: ${config.engineBinaryPath}`);
      }
      throw new ProcessStartFailureError(`Failed to start engine: ${error.message}`);
    }

    proc.on('error', (err) => {
      console.error(`❌ [Supervisor] Engine process error: ${err.message}`);
    });
    this.applyPriority(handle);

    console.log(`✅ [Supervisor] Engine started (pid: ${handle.pid ?? '?'}, encoder: ${encoder})`);
    return handle;
  }

  /**
   * 終了トークンを送り、politeTimeoutMs 以内に終わらなければ強制終了する
   * ハンドルはどの経路でも必ず解放する
   */
  async stop(politeTimeoutMs = 1500): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }

    try {
      const result = await terminateEngineProcess(handle.process, this.launcher, {
        politeTimeoutMs,
        forceTimeoutMs: this.options.forceKillTimeoutMs,
        platform: this.options.platform,
      });
      console.log(`🛑 [Supervisor] Engine stopped (${result})`);
    } finally {
      this.release(handle);
    }
  }

  isRunning(): boolean {
    return this.handle !== null && this.handle.isAlive();
  }

  getHandle(): EngineProcessHandle | null {
    return this.handle;
  }

  /**
   * 直近のエンジン出力行（古い順）
   */
  getRecentOutput(): readonly string[] {
    return this.recentOutput;
  }

  /**
   * エンジン終了時のコールバックを設定
   */
  setOnExitedCallback(callback: OnEngineExitedCallback): void {
    this.onExitedCallback = callback;
  }

  /**
   * エンジン出力行のコールバックを設定
   */
  setOnOutputCallback(callback: OnEngineOutputCallback): void {
    this.onOutputCallback = callback;
  }

  private async ensureEngineExists(enginePath: string): Promise<void> {
    // パス区切りを含まないコマンド名は PATH から解決される（起動時の ENOENT で検出）
    if (!/[\\/]/.test(enginePath)) {
      return;
    }
    try {
      await access(enginePath);
    } catch {
      throw new EngineNotFoundError(`Engine not found: ${enginePath}`);
    }
  }

  private drain(proc: EngineProcess): void {
    const sink = (line: string) => this.handleOutput(line);
    for (const stream of [proc.stdout, proc.stderr]) {
      forwardLines(stream, sink).catch((err: unknown) => {
        console.error('❌ [Supervisor] Failed to read engine output:', toError(err).message);
      });
    }
  }

  private handleOutput(line: string): void {
    console.log(`🎞️ [Engine] ${line}`);
    this.recentOutput.push(line);
    if (this.recentOutput.length > OUTPUT_HISTORY_SIZE) {
      this.recentOutput.shift();
    }
    this.onOutputCallback?.(line);
  }

  private handleExit(handle: EngineProcessHandle, code: number | null, signal: NodeJS.Signals | null): void {
    console.log(`🏁 [Supervisor] Engine exited (pid: ${handle.pid ?? '?'}, code: ${code}, signal: ${signal})`);
    this.release(handle);
    if (!handle.claimExitNotification()) {
      return;
    }
    try {
      this.onExitedCallback?.();
    } catch (err) {
      console.error('❌ [Supervisor] Exit callback failed:', err);
    }
  }

  private release(handle: EngineProcessHandle): void {
    if (this.handle === handle) {
      this.handle = null;
    }
  }

  /**
   * エンジンのスケジューリング優先度を上げる（失敗しても録画は続行）
   */
  private applyPriority(handle: EngineProcessHandle): void {
    if (this.options.enginePriority === 'normal' || handle.pid === null) {
      return;
    }
    const priority = this.options.enginePriority === 'highest'
      ? osConstants.priority.PRIORITY_HIGHEST
      : osConstants.priority.PRIORITY_HIGH;
    try {
      setPriority(handle.pid, priority);
      console.log(`⚡ [Supervisor] Engine priority set to ${this.options.enginePriority}`);
    } catch (err) {
      console.warn(`⚠️ [Supervisor] Failed to set engine priority: ${toError(err).message}`);
    }
  }
}
