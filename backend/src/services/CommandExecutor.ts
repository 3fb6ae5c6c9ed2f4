import { v4 as uuidv4 } from 'uuid';
import { CommandSession, CommandSpec, DEFAULT_REPLAY_LIMIT, SessionSummary } from '../models/CommandSession';
import { InvalidCommandError, errorMessage } from '../utils/errors';
import { ClassifiedLine, OutputLineSplitter } from '../utils/outputClassifier';
import { AUTO_PORT, isValidPort } from '../utils/validation';
import { ArtifactLeases } from './ArtifactLeases';
import { FirmwareCatalog, RefreshOutcome } from './FirmwareCatalog';
import { PortLockRegistry } from './PortLockRegistry';
import { ProcessLauncher, splitCommandLine, startProcess } from './ProcessRunner';
import { SerialConnection, SerialOpener, openSerialPort } from './SerialConnection';

export const DEFAULT_ESPTOOL_COMMAND = ['python', '-m', 'esptool'];
export const DEFAULT_FLASH_BAUD_RATE = 921600;
export const DEFAULT_FLASH_ADDRESS = '0x0';
export const DEFAULT_KILL_GRACE_MS = 5000;
export const DEFAULT_SESSION_GRACE_MS = 10 * 60 * 1000;
export const DEFAULT_DIAGNOSTIC_TIMEOUT_MS = 120000;

// Sub-commands that work on files and never open a serial port
const PORTLESS_SUBCOMMANDS = new Set([
  'version',
  'merge-bin',
  'merge_bin',
  'image-info',
  'image_info',
  'elf2image',
]);
const OPTIONS_WITH_VALUE = new Set(['--port', '-p', '--baud', '-b', '--chip', '-c', '--before', '--after']);
const TOOL_NAMES = new Set(['esptool', 'esptool.py']);

export interface CommandExecutorOptions {
  catalog: FirmwareCatalog;
  locks: PortLockRegistry;
  launcher: ProcessLauncher;
  esptoolCommand?: string[];
  baudRate?: number;
  flashAddress?: string;
  killGraceMs?: number;
  sessionGraceMs?: number;
  replayLimit?: number;
  diagnosticTimeoutMs?: number;
  leases?: ArtifactLeases;
  serialOpener?: SerialOpener;
}

interface MonitorStatus {
  opened: boolean;
  closing: boolean;
  stopRequested: boolean;
  failure: string | null;
  // Settles the monitor if the port never reports 'close'
  fallback: ReturnType<typeof setTimeout> | null;
}

interface ProcessPlan {
  args: string[];
  label: string;
  successMessage: string;
  target?: string;
  timeoutMs?: number;
}

/**
 * Settles with the work's result, or with null as soon as the signal aborts.
 * The abort listener is removed once either side settles.
 */
export async function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T | null> {
  if (signal.aborted) return null;
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<null>((resolve) => {
    onAbort = () => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([work, aborted]);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

function findSubcommand(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    if (OPTIONS_WITH_VALUE.has(args[i])) {
      i++;
      continue;
    }
    if (!args[i].startsWith('-')) return args[i];
  }
  return undefined;
}

function findPortArgument(args: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--port' || arg === '-p') {
      const value = args[i + 1];
      if (value === undefined) throw new InvalidCommandError(`Missing value for ${arg}`);
      return value;
    }
    if (arg.startsWith('--port=')) return arg.slice('--port='.length);
  }
  return undefined;
}

/**
 * Turns a typed esptool command line into a diagnostic spec. The port
 * comes from `--port`/`-p`; commands that need a device default to `auto`.
 */
export function parseDiagnosticCommand(commandLine: string, timeoutMs?: number): CommandSpec {
  const args = splitCommandLine(commandLine);
  if (args.length > 0 && TOOL_NAMES.has(args[0])) args.shift();
  if (args.length === 0) {
    throw new InvalidCommandError('No esptool command given');
  }

  const explicitPort = findPortArgument(args);
  if (explicitPort !== undefined && !isValidPort(explicitPort)) {
    throw new InvalidCommandError(`Invalid serial port: ${explicitPort}`);
  }

  const subcommand = findSubcommand(args);
  let port: string | null = explicitPort ?? AUTO_PORT;
  if (explicitPort === undefined && subcommand !== undefined && PORTLESS_SUBCOMMANDS.has(subcommand)) {
    port = null;
  }
  return { kind: 'diagnostic', args, port, timeoutMs };
}

/**
 * Runs flash, diagnostic, update and serial monitor jobs as sessions. Each
 * session is supervised by its own task; the port lock is the only shared
 * state.
 */
export class CommandExecutor {
  private sessions = new Map<string, CommandSession>();
  private removalTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private monitorStops = new Map<string, () => void>();
  private stopped = false;
  private catalog: FirmwareCatalog;
  private locks: PortLockRegistry;
  private launcher: ProcessLauncher;
  private esptoolCommand: string[];
  private baudRate: number;
  private flashAddress: string;
  private killGraceMs: number;
  private sessionGraceMs: number;
  private replayLimit: number;
  private diagnosticTimeoutMs: number;
  private leases: ArtifactLeases;
  private serialOpener: SerialOpener;

  constructor(options: CommandExecutorOptions) {
    this.catalog = options.catalog;
    this.locks = options.locks;
    this.launcher = options.launcher;
    this.esptoolCommand = options.esptoolCommand && options.esptoolCommand.length > 0
      ? options.esptoolCommand
      : DEFAULT_ESPTOOL_COMMAND;
    this.baudRate = options.baudRate ?? DEFAULT_FLASH_BAUD_RATE;
    this.flashAddress = options.flashAddress ?? DEFAULT_FLASH_ADDRESS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.sessionGraceMs = options.sessionGraceMs ?? DEFAULT_SESSION_GRACE_MS;
    this.replayLimit = options.replayLimit ?? DEFAULT_REPLAY_LIMIT;
    this.diagnosticTimeoutMs = options.diagnosticTimeoutMs ?? DEFAULT_DIAGNOSTIC_TIMEOUT_MS;
    this.leases = options.leases ?? new ArtifactLeases();
    this.serialOpener = options.serialOpener ?? openSerialPort;
  }

  /**
   * Creates and starts a session. Throws PortBusyError or
   * InvalidCommandError without creating one.
   */
  start(spec: CommandSpec, channelId: string, sessionId: string = uuidv4()): CommandSession {
    if (this.sessions.has(sessionId)) {
      throw new InvalidCommandError(`Session ${sessionId} already exists`);
    }

    switch (spec.kind) {
      case 'flash': {
        if (!this.catalog.has(spec.firmware)) {
          const session = this.register(new CommandSession(sessionId, channelId, spec, null, this.replayLimit));
          session.finish('Failed', `Firmware '${spec.firmware}' not found in configuration`);
          this.scheduleRemoval(session);
          return session;
        }
        if (!isValidPort(spec.port)) {
          throw new InvalidCommandError(`Invalid serial port: ${spec.port}`);
        }
        const { firmware, port } = spec;
        const session = this.acquireAndRegister(sessionId, channelId, spec, port);
        void this.supervise(session, () => this.runFlash(session, firmware, port));
        return session;
      }
      case 'diagnostic': {
        if (spec.port !== null && !isValidPort(spec.port)) {
          throw new InvalidCommandError(`Invalid serial port: ${spec.port}`);
        }
        const session = this.acquireAndRegister(sessionId, channelId, spec, spec.port);
        const { args } = spec;
        const timeoutMs = spec.timeoutMs ?? this.diagnosticTimeoutMs;
        void this.supervise(session, () => this.runProcess(session, {
          args,
          label: 'Command',
          successMessage: 'Command completed successfully',
          timeoutMs,
        }));
        return session;
      }
      case 'update-all': {
        const session = this.register(new CommandSession(sessionId, channelId, spec, null, this.replayLimit));
        void this.supervise(session, () => this.runUpdateAll(session));
        return session;
      }
      case 'monitor': {
        if (spec.port === AUTO_PORT) {
          throw new InvalidCommandError('Please select a specific serial port for monitoring');
        }
        if (!isValidPort(spec.port)) {
          throw new InvalidCommandError(`Invalid serial port: ${spec.port}`);
        }
        const holder = this.locks.holderOf(spec.port);
        if (holder !== undefined && this.sessions.get(holder)?.spec.kind === 'monitor') {
          throw new InvalidCommandError(`Already monitoring port ${spec.port}`);
        }
        const { port, baudRate } = spec;
        const session = this.acquireAndRegister(sessionId, channelId, spec, port);
        void this.supervise(session, () => this.runMonitor(session, port, baudRate));
        return session;
      }
    }
  }

  /**
   * Ends the channel's monitor on `port` normally. Returns false when the
   * channel has no monitor running there.
   */
  stopMonitor(port: string, channelId: string): boolean {
    for (const session of this.sessions.values()) {
      if (session.spec.kind !== 'monitor' || session.spec.port !== port || session.channelId !== channelId) continue;
      const stop = this.monitorStops.get(session.id);
      if (!stop) continue;
      stop();
      return true;
    }
    return false;
  }

  /** Returns false for unknown or already finished sessions. */
  cancel(sessionId: string, reason?: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    const cancelled = session.requestCancel(reason);
    if (cancelled) {
      console.log(`Executor: session ${sessionId} cancelled (${session.cancelReason})`);
    }
    return cancelled;
  }

  get(sessionId: string): CommandSession | undefined {
    return this.sessions.get(sessionId);
  }

  sessionsForChannel(channelId: string): CommandSession[] {
    return Array.from(this.sessions.values()).filter((session) => session.channelId === channelId);
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values()).map((session) => session.toSummary());
  }

  /** Cancels every live session and waits for their terminal events. */
  async shutdown(): Promise<void> {
    this.stopped = true;
    const live = Array.from(this.sessions.values()).filter((session) => !session.isFinished);
    for (const session of live) {
      session.requestCancel('Server shutting down');
    }
    await Promise.all(live.map((session) => session.done));

    for (const timer of this.removalTimers.values()) {
      clearTimeout(timer);
    }
    this.removalTimers.clear();
    for (const session of this.sessions.values()) {
      session.removeAllListeners();
    }
    this.sessions.clear();
  }

  private acquireAndRegister(sessionId: string, channelId: string, spec: CommandSpec, port: string | null): CommandSession {
    if (port !== null) {
      this.locks.acquire(port, sessionId);
    }
    return this.register(new CommandSession(sessionId, channelId, spec, port, this.replayLimit));
  }

  private register(session: CommandSession): CommandSession {
    this.sessions.set(session.id, session);
    return session;
  }

  private async supervise(session: CommandSession, body: () => Promise<void>): Promise<void> {
    console.log(`Executor: session ${session.id} started (${session.spec.kind}, port ${session.portToken ?? 'none'})`);
    try {
      await body();
    } catch (err) {
      console.error(`Executor: session ${session.id} failed unexpectedly:`, err);
      session.finish('Failed', `Internal error: ${errorMessage(err)}`);
    } finally {
      if (session.portToken !== null) {
        this.locks.release(session.portToken, session.id);
      }
      this.scheduleRemoval(session);
      console.log(`Executor: session ${session.id} finished (${session.state})`);
    }
  }

  private scheduleRemoval(session: CommandSession): void {
    if (this.stopped) return;
    const timer = setTimeout(() => {
      this.removalTimers.delete(session.id);
      this.sessions.delete(session.id);
      session.removeAllListeners();
    }, this.sessionGraceMs);
    timer.unref();
    this.removalTimers.set(session.id, timer);
  }

  private async runFlash(session: CommandSession, name: string, port: string): Promise<void> {
    session.append('info', `Starting flash for ${name}...`);

    let firmware = this.catalog.get(name);
    if (!firmware || !firmware.available) {
      session.append('info', `Firmware ${name} is not cached, resolving...`);
      const outcome: RefreshOutcome | null = await raceAbort(this.catalog.resolve(name), session.signal);
      if (!outcome) {
        session.finish('Failed', `Flash cancelled: ${session.cancelReason}`);
        return;
      }
      if (!outcome.firmware.available) {
        session.finish('Failed', `Firmware ${name} is not available: ${outcome.error ?? 'no artifact on disk'}`);
        return;
      }
      firmware = outcome.firmware;
    }

    const artifact = firmware.local_artifact_path;
    if (artifact === null) {
      session.finish('Failed', `Firmware ${name} has no local artifact`);
      return;
    }

    const args = port === AUTO_PORT ? [] : ['--port', port];
    args.push('--baud', String(this.baudRate), 'write-flash', this.flashAddress, artifact);
    const releaseArtifact = this.leases.lease(artifact);
    try {
      await this.runProcess(session, {
        args,
        label: 'Flash',
        successMessage: `✅ ${name} flashed successfully!`,
        target: name,
      });
    } finally {
      releaseArtifact();
    }
  }

  private async runProcess(session: CommandSession, plan: ProcessPlan): Promise<void> {
    if (session.isCancelled) {
      session.finish('Failed', `${plan.label} cancelled: ${session.cancelReason}`);
      return;
    }

    const [command, ...prefix] = this.esptoolCommand;
    const args = [...prefix, ...plan.args];
    session.append('command-echo', `Executing: ${[command, ...args].join(' ')}`);

    const running = startProcess(this.launcher, command, args);
    if (session.state === 'Starting') {
      session.transition('Running');
    }

    const onAbort = (): void => running.terminate(this.killGraceMs);
    session.signal.addEventListener('abort', onAbort, { once: true });
    let timer: ReturnType<typeof setTimeout> | null = null;
    if (plan.timeoutMs !== undefined && plan.timeoutMs > 0) {
      const timeoutMs = plan.timeoutMs;
      timer = setTimeout(() => {
        this.cancel(session.id, `timed out after ${timeoutMs} ms`);
      }, timeoutMs);
    }

    try {
      for await (const line of running.output) {
        session.append(line.kind, line.text);
      }
      const exit = await running.exited;

      if (session.isCancelled) {
        session.finish('Failed', `${plan.label} cancelled: ${session.cancelReason}`);
      } else if (exit.error) {
        session.finish('Failed', `Failed to start ${command}: ${exit.error.message}`);
      } else if (exit.code === 0) {
        session.finish('Succeeded', plan.successMessage, plan.target);
      } else if (exit.code === null) {
        session.finish('Failed', `${plan.label} terminated by signal ${exit.signal}`);
      } else {
        session.finish('Failed', `${plan.label} failed with code ${exit.code}`);
      }
    } finally {
      if (timer) clearTimeout(timer);
      session.signal.removeEventListener('abort', onAbort);
    }
  }

  private async runUpdateAll(session: CommandSession): Promise<void> {
    session.transition('Running');
    session.append('info', 'Updating all firmware sources...');

    const outcomes = await raceAbort(this.catalog.resolveAll((outcome) => {
      if (outcome.error) {
        session.append('warning', `${outcome.name}: ${outcome.error}`);
      } else {
        session.append('info', `${outcome.name}: ${outcome.firmware.resolved_version ?? 'unknown version'} ready`);
      }
    }), session.signal);

    if (!outcomes) {
      session.finish('Failed', `Firmware update cancelled: ${session.cancelReason}`);
      return;
    }
    const failures = outcomes.filter((outcome) => outcome.error !== undefined).length;
    if (failures === 0) {
      session.finish('Succeeded', `✅ All ${outcomes.length} firmware sources updated`);
    } else {
      session.finish('Failed', `Firmware update finished with ${failures} of ${outcomes.length} sources failing`);
    }
  }

  private async runMonitor(session: CommandSession, port: string, baudRate: number): Promise<void> {
    session.append('command-echo', `Starting serial monitor on ${port} at ${baudRate} baud`);
    if (session.isCancelled) {
      session.finish('Failed', `Monitor cancelled: ${session.cancelReason}`);
      return;
    }

    let connection: SerialConnection;
    try {
      connection = this.serialOpener(port, baudRate);
    } catch (err) {
      session.finish('Failed', `Could not open serial port ${port}: ${errorMessage(err)}`);
      return;
    }

    const splitter = new OutputLineSplitter();
    const status: MonitorStatus = { opened: false, closing: false, stopRequested: false, failure: null, fallback: null };
    let settle: () => void = () => undefined;
    const closed = new Promise<void>((resolve) => {
      settle = resolve;
    });

    // A port that has not opened yet is closed from the 'open' handler
    const closePort = (): void => {
      if (!status.fallback) status.fallback = setTimeout(settle, this.killGraceMs);
      if (status.closing || !status.opened) return;
      status.closing = true;
      connection.close();
    };
    const forward = (lines: ClassifiedLine[]): void => {
      for (const line of lines) {
        if (line.kind !== 'partial') session.append('monitor', line.text);
      }
    };

    connection.on('open', () => {
      status.opened = true;
      if (status.stopRequested || session.isCancelled || session.isFinished) {
        closePort();
        return;
      }
      session.transition('Running');
      session.append('info', `Connected to ${port} at ${baudRate} baud`);
      console.log(`Executor: serial monitor started for ${port}`);
    });
    connection.on('data', (chunk: Buffer) => {
      forward(splitter.push(chunk));
    });
    connection.on('error', (err: Error) => {
      if (status.failure === null && !status.stopRequested && !session.isCancelled) {
        status.failure = status.opened ? `Serial error: ${err.message}` : `Could not open serial port ${port}: ${err.message}`;
      }
      if (status.opened) {
        closePort();
      } else {
        settle();
      }
    });
    connection.on('close', () => settle());

    const onAbort = (): void => closePort();
    session.signal.addEventListener('abort', onAbort, { once: true });
    this.monitorStops.set(session.id, () => {
      status.stopRequested = true;
      closePort();
    });

    try {
      await closed;
      forward(splitter.flush());
    } finally {
      if (status.fallback) clearTimeout(status.fallback);
      session.signal.removeEventListener('abort', onAbort);
      this.monitorStops.delete(session.id);
    }

    if (session.isCancelled) {
      session.finish('Failed', `Monitor cancelled: ${session.cancelReason}`);
    } else if (status.failure !== null) {
      session.finish('Failed', status.failure);
    } else if (status.stopRequested) {
      session.finish('Succeeded', `Serial monitor stopped for ${port}`);
    } else {
      session.finish('Failed', `Serial port ${port} closed unexpectedly`);
    }
  }
}
