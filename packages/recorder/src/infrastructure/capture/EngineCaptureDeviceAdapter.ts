import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
} from '@booth-capture/common-types';
import { CaptureDeviceError } from '@booth-capture/common-types';
import type {
  CaptureEndedListener,
  FrameListener,
  ICaptureDeviceAdapter,
  ICaptureDeviceHandle,
} from '../../domain/services/ICaptureDeviceAdapter.js';
import { isProcessAlive } from '../../domain/services/IProcessLauncher.js';
import type { EngineProcess, IProcessLauncher } from '../../domain/services/IProcessLauncher.js';
import { buildPreviewArguments } from '../engine/EngineArgumentsBuilder.js';
import type { EngineInputOptions } from '../engine/EngineArgumentsBuilder.js';
import { forwardLines, terminateEngineProcess, toError, waitForSpawn } from '../engine/engineProcess.js';
import type { EngineIntrospection } from '../services/EngineIntrospection.js';
import { JpegFrameSplitter } from './JpegFrameSplitter.js';

export interface EngineCaptureDeviceAdapterOptions {
  enginePath: string;
  input: EngineInputOptions;
  stopTimeoutMs: number;
  forceKillTimeoutMs: number;
}

/**
 * EngineCaptureDeviceAdapter
 *
 * エンジン自身を使ったキャプチャデバイスアダプタ
 * - デバイス一覧・ケイパビリティはエンジンの一覧出力から取得
 * - プレビューはエンジンに MJPEG を標準出力へ書かせ、JPEGフレームに切り出して配信
 */
export class EngineCaptureDeviceAdapter implements ICaptureDeviceAdapter {
  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly introspection: EngineIntrospection,
    private readonly options: EngineCaptureDeviceAdapterOptions
  ) {}

  async listDevices(kind: CaptureDeviceKind): Promise<CaptureDeviceInfo[]> {
    return this.introspection.listDevices(this.options.enginePath, kind);
  }

  async openDevice(deviceId: string): Promise<ICaptureDeviceHandle> {
    const capabilities = await this.introspection.listCapabilities(this.options.enginePath, deviceId);
    console.log(`📷 [Capture] ${deviceId}: ${capabilities.length} mode(s) reported`);
    return new EngineCaptureDeviceHandle(deviceId, capabilities, this.launcher, this.options);
  }
}

class EngineCaptureDeviceHandle implements ICaptureDeviceHandle {
  private capability: CaptureCapability | null = null;
  private process: EngineProcess | null = null;

  constructor(
    readonly deviceId: string,
    private readonly reportedCapabilities: readonly CaptureCapability[],
    private readonly launcher: IProcessLauncher,
    private readonly options: EngineCaptureDeviceAdapterOptions
  ) {}

  capabilities(): readonly CaptureCapability[] {
    return this.reportedCapabilities;
  }

  setCapability(capability: CaptureCapability): void {
    this.capability = capability;
  }

  async start(onFrame: FrameListener, onEnded?: CaptureEndedListener): Promise<void> {
    if (this.isRunning()) {
      return;
    }

    const args = buildPreviewArguments(this.options.input, this.deviceId, this.capability);
    let proc: EngineProcess;
    try {
      proc = this.launcher.launch(this.options.enginePath, args);
    } catch (err) {
      throw new CaptureDeviceError(`Failed to open ${this.deviceId}: ${toError(err).message}`);
    }

    const splitter = new JpegFrameSplitter(onFrame);
    proc.stdout.on('data', (chunk: Buffer) => splitter.push(chunk));
    proc.stdin.on('error', (err) => {
      console.warn(`⚠️ [Capture] Preview stdin error: ${err.message}`);
    });
    forwardLines(proc.stderr, (line) => console.log(`📷 [Capture] ${line}`)).catch((err: unknown) => {
      console.error('❌ [Capture] Failed to read preview output:', toError(err).message);
    });
    proc.once('exit', (code) => {
      console.log(`📷 [Capture] Preview process for ${this.deviceId} exited (code: ${code})`);
      // stop() 中は this.process を先に外している
      if (this.process === proc) {
        this.process = null;
        onEnded?.();
      }
    });

    try {
      await waitForSpawn(proc);
    } catch (err) {
      throw new CaptureDeviceError(`Failed to open ${this.deviceId}: ${toError(err).message}`);
    }
    proc.on('error', (err) => {
      console.error(`❌ [Capture] Preview process error: ${err.message}`);
    });
    this.process = proc;
  }

  async stop(): Promise<void> {
    const proc = this.process;
    if (!proc) {
      return;
    }
    this.process = null;
    await terminateEngineProcess(proc, this.launcher, {
      politeTimeoutMs: this.options.stopTimeoutMs,
      forceTimeoutMs: this.options.forceKillTimeoutMs,
    });
  }

  isRunning(): boolean {
    return this.process !== null && isProcessAlive(this.process);
  }
}
