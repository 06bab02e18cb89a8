import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { vi } from 'vitest';
import type { EngineProcess, IProcessLauncher } from '../../domain/services/IProcessLauncher.js';

export interface FakeEngineBehavior {
  /** spawn の代わりに error を発火する */
  spawnError?: Error;
  /** 起動直後に標準エラーへ書く行 */
  output?: string[];
  /** 起動直後にこの終了コードで終了する */
  exitAfterSpawn?: number;
  /** 終了トークンで終了するか（default: true） */
  exitOnQuit?: boolean;
  /** kill を無視する */
  ignoreKill?: boolean;
}

/**
 * 子プロセスの代わりにテストで使うインプロセスのエンジン
 */
export class FakeEngineProcess extends EventEmitter implements EngineProcess {
  readonly pid: number | undefined;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly received: string[] = [];
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    pid: number,
    private readonly behavior: FakeEngineBehavior
  ) {
    super();
    this.pid = behavior.spawnError ? undefined : pid;

    this.stdin.on('data', (chunk: Buffer) => {
      const text = chunk.toString();
      this.received.push(text);
      if (text.includes('q') && behavior.exitOnQuit !== false) {
        this.finish(0, null);
      }
    });

    process.nextTick(() => {
      if (behavior.spawnError) {
        this.emit('error', behavior.spawnError);
        return;
      }
      this.emit('spawn');
      for (const line of behavior.output ?? []) {
        this.stderr.write(`${line}\n`);
      }
      if (behavior.exitAfterSpawn !== undefined) {
        this.finish(behavior.exitAfterSpawn, null);
      }
    });
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    if (this.behavior.ignoreKill || this.exitCode !== null || this.signalCode !== null) {
      return false;
    }
    this.finish(null, typeof signal === 'string' ? signal : 'SIGTERM');
    return true;
  }

  /**
   * プロセスの終了を再現する（クラッシュ・外部からの kill など）
   */
  finish(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.stdout.end();
    this.stderr.end();
    this.emit('exit', code, signal);
  }
}

export type BehaviorFactory = (command: string, args: readonly string[]) => FakeEngineBehavior;

export class FakeProcessLauncher implements IProcessLauncher {
  readonly launched: FakeEngineProcess[] = [];
  private nextPid = 1000;

  constructor(private readonly behaviorFor: BehaviorFactory = () => ({})) {}

  launch(command: string, args: readonly string[]): FakeEngineProcess {
    const proc = new FakeEngineProcess(command, args, this.nextPid++, this.behaviorFor(command, args));
    this.launched.push(proc);
    return proc;
  }

  /**
   * 録画用の起動（-fps_mode を含む）だけを返す
   */
  recordings(): FakeEngineProcess[] {
    return this.launched.filter((p) => isRecordingInvocation(p.args));
  }
}

export function isRecordingInvocation(args: readonly string[]): boolean {
  return args.includes('-fps_mode');
}

export function enoent(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

/**
 * フェイクタイマーを進めながら promise の完了を待つ
 * 実際のI/O（mkdir など）が挟まっても進むよう、少しずつ進める
 */
export async function settleWithFakeTimers<T>(promise: Promise<T>, stepMs = 50, maxSteps = 2000): Promise<T> {
  let done = false;
  promise.then(
    () => {
      done = true;
    },
    () => {
      done = true;
    }
  );
  for (let step = 0; step < maxSteps && !done; step++) {
    await vi.advanceTimersByTimeAsync(stepMs);
  }
  return promise;
}
