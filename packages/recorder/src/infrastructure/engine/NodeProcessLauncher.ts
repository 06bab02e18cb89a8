import { spawn } from 'child_process';
import type { EngineProcess, IProcessLauncher } from '../../domain/services/IProcessLauncher.js';

/**
 * child_process.spawn による起動
 * 標準入出力はすべてパイプ（stdin は終了トークン送信用）
 */
export class NodeProcessLauncher implements IProcessLauncher {
  launch(command: string, args: readonly string[]): EngineProcess {
    return spawn(command, args, { windowsHide: true });
  }
}
