/**
 * IProcessLauncher - エンジンプロセス起動の抽象化
 *
 * child_process の ChildProcessWithoutNullStreams がそのまま満たす最小のインターフェース
 * テストではインプロセスのフェイクに差し替える
 */

import type { Readable, Writable } from 'stream';

export interface EngineProcess {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'spawn', listener: () => void): this;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  off(event: 'spawn', listener: () => void): this;
  off(event: 'error', listener: (err: Error) => void): this;
}

export interface IProcessLauncher {
  launch(command: string, args: readonly string[]): EngineProcess;
}

/**
 * プロセスがまだ終了していないか
 */
export function isProcessAlive(process: EngineProcess): boolean {
  return process.exitCode === null && process.signalCode === null;
}
