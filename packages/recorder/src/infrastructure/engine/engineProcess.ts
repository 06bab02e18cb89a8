import { once } from 'events';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { StopTimeoutError } from '@booth-capture/common-types';
import { isProcessAlive } from '../../domain/services/IProcessLauncher.js';
import type { EngineProcess, IProcessLauncher } from '../../domain/services/IProcessLauncher.js';

export interface EngineCommandResult {
  /** タイムアウト・起動失敗時は null */
  exitCode: number | null;
  lines: string[];
  timedOut: boolean;
  error?: Error;
}

export interface TerminateOptions {
  /** 終了トークン送信後に自然終了を待つ時間 */
  politeTimeoutMs: number;
  /** 強制終了後に終了を待つ時間 */
  forceTimeoutMs: number;
  platform?: NodeJS.Platform;
}

export type TerminationResult = 'already-exited' | 'graceful' | 'forced';

/** エンジンの終了トークン */
export const QUIT_TOKEN = 'q\n';

/**
 * ストリームを行単位で読み続け、空行以外をsinkに渡す
 * パイプが詰まると子プロセスが停止するため、読み取りは止めない
 */
export function forwardLines(stream: Readable, sink: (line: string) => void): Promise<void> {
  const reader = createInterface({ input: stream, crlfDelay: Infinity });
  reader.on('line', (line) => {
    const trimmed = line.trimEnd();
    if (trimmed.trim().length > 0) {
      sink(trimmed);
    }
  });
  return once(reader, 'close').then(() => undefined);
}

/**
 * 短時間で終わるエンジンコマンドを実行し、全出力行と終了コードを返す
 * 起動失敗・非ゼロ終了はエラーにせず結果として返す
 */
export async function runEngineCommand(
  launcher: IProcessLauncher,
  command: string,
  args: readonly string[],
  timeoutMs: number
): Promise<EngineCommandResult> {
  let proc: EngineProcess;
  try {
    proc = launcher.launch(command, args);
  } catch (err) {
    return { exitCode: null, lines: [], timedOut: false, error: toError(err) };
  }

  const lines: string[] = [];
  const stdoutDone = forwardLines(proc.stdout, (line) => lines.push(line));
  const stderrDone = forwardLines(proc.stderr, (line) => lines.push(line));
  proc.stdin.on('error', () => {
    // 入力を使わないコマンドでは EPIPE は無視してよい
  });
  proc.stdin.end();

  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    proc.kill('SIGKILL');
  }, timeoutMs);

  try {
    const exitCode = await new Promise<number | null>((resolve, reject) => {
      proc.once('error', reject);
      proc.once('exit', (code) => resolve(code));
    });
    await Promise.all([stdoutDone, stderrDone]);
    return { exitCode: timedOut ? null : exitCode, lines, timedOut };
  } catch (err) {
    return { exitCode: null, lines, timedOut, error: toError(err) };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * 起動（spawn）か起動失敗（error）のどちらかを待つ
 */
export function waitForSpawn(proc: EngineProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      proc.off('error', onError);
      resolve();
    };
    const onError = (err: Error) => {
      proc.off('spawn', onSpawn);
      reject(err);
    };
    proc.once('spawn', onSpawn);
    proc.once('error', onError);
  });
}

/**
 * プロセスの終了を待つ（既に終了していれば即座に解決）
 */
export function waitForExit(proc: EngineProcess): Promise<void> {
  if (!isProcessAlive(proc)) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    proc.once('exit', () => resolve());
  });
}

/**
 * 指定時間内に解決すれば true
 */
export async function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true as const), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * 終了トークンで穏やかに止め、時間内に終わらなければプロセスツリーごと強制終了する
 */
export async function terminateEngineProcess(
  proc: EngineProcess,
  launcher: IProcessLauncher,
  options: TerminateOptions
): Promise<TerminationResult> {
  if (!isProcessAlive(proc)) {
    return 'already-exited';
  }

  const exited = waitForExit(proc);

  try {
    if (proc.stdin.writable) {
      proc.stdin.write(QUIT_TOKEN);
    }
  } catch (err) {
    console.warn('⚠️ [Engine] Failed to write quit token:', toError(err).message);
  }

  if (await settlesWithin(exited, options.politeTimeoutMs)) {
    return 'graceful';
  }

  console.warn(
    `⚠️ [Engine] Process ${proc.pid ?? '?'} did not exit within ${options.politeTimeoutMs}ms, forcing termination`
  );
  killProcessTree(proc, launcher, options.platform ?? process.platform);

  if (await settlesWithin(exited, options.forceTimeoutMs)) {
    return 'forced';
  }

  throw new StopTimeoutError(
    `Engine process ${proc.pid ?? '?'} did not exit after forced termination`
  );
}

/**
 * Windows では taskkill /T で子プロセスも含めて終了させる
 */
function killProcessTree(proc: EngineProcess, launcher: IProcessLauncher, platform: NodeJS.Platform): void {
  if (platform === 'win32' && proc.pid !== undefined) {
    try {
      const killer = launcher.launch('taskkill', ['/pid', String(proc.pid), '/T', '/F']);
      killer.once('error', (err) => {
        console.error('❌ [Engine] taskkill failed:', err.message);
        proc.kill('SIGKILL');
      });
      return;
    } catch (err) {
      console.error('❌ [Engine] taskkill failed:', toError(err).message);
    }
  }
  proc.kill('SIGKILL');
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
