/**
 * ICaptureDeviceAdapter - キャプチャデバイスのアダプタインターフェース
 *
 * デバイス列挙・ケイパビリティ取得・フレーム配信を抽象化
 */

import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
} from '@booth-capture/common-types';

/**
 * フレーム配信コールバック
 * frame はコールバック中のみ有効（保持する場合はコピーすること）
 */
export type FrameListener = (frame: Uint8Array) => void;

/**
 * stop() を呼ばずにデバイスが止まったときの通知
 */
export type CaptureEndedListener = () => void;

export interface ICaptureDeviceHandle {
  readonly deviceId: string;

  /**
   * デバイスが報告するケイパビリティ一覧（不明な場合は空）
   */
  capabilities(): readonly CaptureCapability[];

  /**
   * start() の前に呼ぶこと
   */
  setCapability(capability: CaptureCapability): void;

  start(onFrame: FrameListener, onEnded?: CaptureEndedListener): Promise<void>;

  /**
   * デバイスが完全に停止するまで待機する
   */
  stop(): Promise<void>;

  isRunning(): boolean;
}

export interface ICaptureDeviceAdapter {
  listDevices(kind: CaptureDeviceKind): Promise<CaptureDeviceInfo[]>;

  openDevice(deviceId: string): Promise<ICaptureDeviceHandle>;
}
