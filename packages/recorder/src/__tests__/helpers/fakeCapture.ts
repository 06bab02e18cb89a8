import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
} from '@booth-capture/common-types';
import type {
  CaptureEndedListener,
  FrameListener,
  ICaptureDeviceAdapter,
  ICaptureDeviceHandle,
} from '../../domain/services/ICaptureDeviceAdapter.js';

export const TEST_CAPABILITIES: readonly CaptureCapability[] = [
  { width: 1920, height: 1080, frameRate: 30 },
  { width: 1280, height: 720, frameRate: 30 },
  { width: 640, height: 480, frameRate: 30 },
];

export class FakeCameraHandle implements ICaptureDeviceHandle {
  chosen: CaptureCapability | null = null;
  startCalls = 0;
  stopCalls = 0;
  /** 次の stop() をこのエラーで失敗させる */
  stopError: Error | null = null;
  private onFrame: FrameListener | null = null;
  private onEnded: CaptureEndedListener | null = null;

  constructor(
    readonly deviceId: string,
    private readonly reported: readonly CaptureCapability[]
  ) {}

  capabilities(): readonly CaptureCapability[] {
    return this.reported;
  }

  setCapability(capability: CaptureCapability): void {
    this.chosen = capability;
  }

  async start(onFrame: FrameListener, onEnded?: CaptureEndedListener): Promise<void> {
    this.startCalls++;
    this.onFrame = onFrame;
    this.onEnded = onEnded ?? null;
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    this.onFrame = null;
    this.onEnded = null;
    const error = this.stopError;
    if (error) {
      this.stopError = null;
      throw error;
    }
  }

  isRunning(): boolean {
    return this.onFrame !== null;
  }

  emitFrame(frame: Uint8Array): void {
    this.onFrame?.(frame);
  }

  /**
   * デバイスが単独で止まったことを再現する
   */
  endUnexpectedly(): void {
    const onEnded = this.onEnded;
    this.onFrame = null;
    this.onEnded = null;
    onEnded?.();
  }
}

export class FakeCaptureAdapter implements ICaptureDeviceAdapter {
  readonly opened: FakeCameraHandle[] = [];

  constructor(private readonly reported: readonly CaptureCapability[] = TEST_CAPABILITIES) {}

  async listDevices(kind: CaptureDeviceKind): Promise<CaptureDeviceInfo[]> {
    return kind === 'video'
      ? [{ id: 'cam-1', displayName: 'Test Camera' }]
      : [{ id: 'mic-1', displayName: 'Test Microphone' }];
  }

  async openDevice(deviceId: string): Promise<FakeCameraHandle> {
    const handle = new FakeCameraHandle(deviceId, this.reported);
    this.opened.push(handle);
    return handle;
  }
}
