import { spawn } from 'child_process';
import { Readable } from 'stream';
import { AsyncEventQueue } from '../utils/AsyncEventQueue';
import { ClassifiedLine, OutputLineSplitter } from '../utils/outputClassifier';

/** The subset of ChildProcess the runner relies on; tests supply fakes. */
export interface SpawnedProcess {
  pid?: number;
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => SpawnedProcess;

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export interface RunningProcess {
  pid?: number;
  output: AsyncIterable<ClassifiedLine>;
  exited: Promise<ProcessExit>;
  terminate(graceMs: number): void;
}

export const spawnProcess: ProcessLauncher = (command, args, options) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: { ...process.env, ...options.env },
    stdio: ['ignore', 'pipe', 'pipe'],
  });

/**
 * Splits a command line on whitespace, keeping single- or double-quoted
 * segments together.
 */
export function splitCommandLine(commandLine: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(commandLine)) !== null) {
    args.push(match[1] ?? match[2] ?? match[3]);
  }
  return args;
}

/**
 * Starts a child process and exposes its classified output as one ordered
 * sequence. The sequence ends once both pipes are drained and the process
 * has exited.
 */
export function startProcess(
  launcher: ProcessLauncher,
  command: string,
  args: string[],
  options: LaunchOptions = {},
): RunningProcess {
  const queue = new AsyncEventQueue<ClassifiedLine>();
  let settle: (exit: ProcessExit) => void = () => undefined;
  const exited = new Promise<ProcessExit>((resolve) => {
    settle = resolve;
  });

  let finished = false;
  const finish = (exit: ProcessExit): void => {
    if (finished) return;
    finished = true;
    queue.close();
    settle(exit);
  };

  let child: SpawnedProcess;
  try {
    child = launcher(command, args, options);
  } catch (err) {
    finish({ code: null, signal: null, error: err instanceof Error ? err : new Error(String(err)) });
    return { output: queue, exited, terminate: () => undefined };
  }

  let openStreams = 0;
  let exitInfo: ProcessExit | null = null;
  const maybeFinish = (): void => {
    if (exitInfo && openStreams === 0) finish(exitInfo);
  };

  for (const stream of [child.stdout, child.stderr]) {
    if (!stream) continue;
    openStreams++;
    const splitter = new OutputLineSplitter();
    let closed = false;
    const done = (): void => {
      if (closed) return;
      closed = true;
      splitter.flush().forEach((line) => queue.push(line));
      openStreams--;
      maybeFinish();
    };
    stream.on('data', (chunk: Buffer | string) => {
      splitter.push(chunk).forEach((line) => queue.push(line));
    });
    stream.on('end', done);
    stream.on('close', done);
    stream.on('error', (err: Error) => {
      console.warn(`ProcessRunner: ${command} output stream failed: ${err.message}`);
      done();
    });
  }

  child.on('close', (code, signal) => {
    exitInfo = { code, signal };
    maybeFinish();
  });

  child.on('error', (err) => {
    // Spawn failures never produce 'close'
    if (child.pid === undefined) {
      finish({ code: null, signal: null, error: err });
    } else {
      console.warn(`ProcessRunner: ${command} (pid ${child.pid}) reported: ${err.message}`);
    }
  });

  let killTimer: ReturnType<typeof setTimeout> | null = null;
  const terminate = (graceMs: number): void => {
    if (finished || killTimer) return;
    child.kill('SIGTERM');
    killTimer = setTimeout(() => {
      if (finished) return;
      console.warn(`ProcessRunner: ${command} (pid ${child.pid}) ignored SIGTERM, sending SIGKILL`);
      child.kill('SIGKILL');
    }, graceMs);
  };

  void exited.then(() => {
    if (killTimer) clearTimeout(killTimer);
  });

  return { pid: child.pid, output: queue, exited, terminate };
}
