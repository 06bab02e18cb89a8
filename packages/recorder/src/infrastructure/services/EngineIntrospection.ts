import type {
  CaptureCapability,
  CaptureDeviceInfo,
  CaptureDeviceKind,
  EncoderCandidate,
  SessionConfig,
} from '@booth-capture/common-types';
import type { IProcessLauncher } from '../../domain/services/IProcessLauncher.js';
import {
  buildDeviceListArguments,
  buildEncoderListArguments,
  buildEncoderProbeArguments,
  buildModeListArguments,
} from '../engine/EngineArgumentsBuilder.js';
import type { EngineInputOptions } from '../engine/EngineArgumentsBuilder.js';
import {
  isModeListed,
  parseDeviceList,
  parseDeviceModes,
  parseEncoderList,
} from '../engine/EngineOutputParser.js';
import { runEngineCommand } from '../engine/engineProcess.js';

/**
 * エンジンへの問い合わせ（エンコーダ一覧・デバイス一覧・モード一覧・試験エンコード）
 *
 * テキスト出力の解析はベストエフォートで、失敗は「不明」として扱う
 * 実際に使えるかどうかの判定は試験エンコードの終了コードのみで行う
 */
export class EngineIntrospection {
  constructor(
    private readonly launcher: IProcessLauncher,
    private readonly input: EngineInputOptions,
    private readonly timeoutMs: number
  ) {}

  /**
   * 組み込まれているエンコーダ名の一覧
   */
  async listEncoders(enginePath: string): Promise<Set<string>> {
    const result = await runEngineCommand(this.launcher, enginePath, buildEncoderListArguments(), this.timeoutMs);
    if (result.error) {
      console.warn(`⚠️ [Introspection] Failed to list encoders: ${result.error.message}`);
      return new Set();
    }
    return parseEncoderList(result.lines.join('\n'));
  }

  /**
   * 合成パターンを数フレームエンコードし、終了コード0なら使用可能
   */
  async probeEncoder(enginePath: string, encoder: EncoderCandidate): Promise<boolean> {
    const result = await runEngineCommand(
      this.launcher,
      enginePath,
      buildEncoderProbeArguments(encoder),
      this.timeoutMs
    );
    if (result.exitCode !== 0) {
      const reason = result.error?.message
        ?? (result.timedOut ? `timed out after ${this.timeoutMs}ms` : `exit code ${result.exitCode}`);
      console.log(`🔍 [Introspection] Probe for ${encoder} failed (${reason})`);
      for (const line of result.lines) {
        console.log(`  ${line}`);
      }
      return false;
    }
    return true;
  }

  async listDevices(enginePath: string, kind: CaptureDeviceKind): Promise<CaptureDeviceInfo[]> {
    const lines = await this.listDevicesRaw(enginePath, kind);
    return parseDeviceList(lines.join('\n'), this.input.inputFormat, kind);
  }

  /**
   * デバイス一覧の生出力（診断用）
   */
  async listDevicesRaw(enginePath: string, kind: CaptureDeviceKind): Promise<string[]> {
    const result = await runEngineCommand(
      this.launcher,
      enginePath,
      buildDeviceListArguments(this.input, kind),
      this.timeoutMs
    );
    if (result.error) {
      console.warn(`⚠️ [Introspection] Failed to list ${kind} devices: ${result.error.message}`);
    }
    return result.lines;
  }

  /**
   * モード一覧の生出力（診断用）
   * 一覧を提供しない入力形式では空
   */
  async listModesRaw(enginePath: string, cameraId: string): Promise<string[]> {
    const args = buildModeListArguments(this.input, cameraId);
    if (!args) {
      return [];
    }
    const result = await runEngineCommand(this.launcher, enginePath, args, this.timeoutMs);
    if (result.error) {
      console.warn(`⚠️ [Introspection] Failed to list modes for ${cameraId}: ${result.error.message}`);
    }
    return result.lines;
  }

  async listCapabilities(enginePath: string, cameraId: string): Promise<CaptureCapability[]> {
    const lines = await this.listModesRaw(enginePath, cameraId);
    return parseDeviceModes(lines.join('\n'));
  }

  /**
   * 要求した解像度・フレームレートがモード一覧に含まれるか
   * 一覧が取れない場合は判定できないため true
   */
  async isModeSupported(config: SessionConfig): Promise<boolean> {
    const lines = await this.listModesRaw(config.engineBinaryPath, config.cameraId);
    if (lines.length === 0) {
      return true;
    }
    console.log(`📋 [Introspection] Modes for ${config.cameraId}:`);
    for (const line of lines) {
      console.log(`  ${line}`);
    }
    return isModeListed(lines.join('\n'), config.width, config.height, config.frameRate);
  }
}
