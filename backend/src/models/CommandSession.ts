import { EventEmitter } from 'events';
import { StreamEvent, StreamEventKind } from './StreamEvent';

export type CommandState = 'Starting' | 'Running' | 'Succeeded' | 'Failed' | 'Cancelled';

export type CommandSpec =
  | { kind: 'flash'; firmware: string; port: string }
  | { kind: 'diagnostic'; args: string[]; port: string | null; timeoutMs?: number }
  | { kind: 'update-all' }
  | { kind: 'monitor'; port: string; baudRate: number };

export type TerminalOutcome = 'Succeeded' | 'Failed';

export interface SessionSummary {
  id: string;
  channel: string;
  kind: CommandSpec['kind'];
  state: CommandState;
  port: string | null;
  createdAt: string;
  finishedAt: string | null;
}

export const DEFAULT_REPLAY_LIMIT = 2000;

const STATE_RANK: Record<CommandState, number> = {
  Starting: 0,
  Running: 1,
  Succeeded: 2,
  Failed: 2,
  Cancelled: 2,
};

/**
 * One run of an external command. Owns the ordered event log of the run;
 * listeners registered with `onEvent` see every event exactly once, in
 * `seq` order.
 */
export class CommandSession extends EventEmitter {
  readonly id: string;
  readonly channelId: string;
  readonly spec: CommandSpec;
  readonly portToken: string | null;
  readonly createdAt: string;
  finishedAt: string | null = null;
  cancelReason: string | null = null;

  private currentState: CommandState = 'Starting';
  private events: StreamEvent[] = [];
  private nextSeq = 1;
  private terminalSent = false;
  private terminalEvent: StreamEvent | null = null;
  private abortController = new AbortController();
  private readonly replayLimit: number;
  readonly done: Promise<CommandState>;
  private resolveDone: (state: CommandState) => void = () => undefined;

  constructor(
    id: string,
    channelId: string,
    spec: CommandSpec,
    portToken: string | null,
    replayLimit: number = DEFAULT_REPLAY_LIMIT,
  ) {
    super();
    this.id = id;
    this.channelId = channelId;
    this.spec = spec;
    this.portToken = portToken;
    this.replayLimit = replayLimit;
    this.createdAt = new Date().toISOString();
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get state(): CommandState {
    return this.currentState;
  }

  get isFinished(): boolean {
    return this.terminalSent;
  }

  get isCancelled(): boolean {
    return this.currentState === 'Cancelled';
  }

  /** Aborted when the session is cancelled; supervisors listen on it. */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /** The terminal event, once the session has finished. */
  get result(): StreamEvent | null {
    return this.terminalEvent;
  }

  get lastSeq(): number {
    return this.nextSeq - 1;
  }

  transition(next: CommandState): void {
    if (STATE_RANK[next] <= STATE_RANK[this.currentState]) {
      throw new Error(`Session ${this.id}: invalid transition ${this.currentState} -> ${next}`);
    }
    this.currentState = next;
  }

  /**
   * Records a non-terminal event. Returns null once the session has been
   * cancelled or has finished; such events are dropped.
   */
  append(kind: StreamEventKind, message: string): StreamEvent | null {
    if (this.terminalSent || this.isCancelled) return null;
    return this.record(kind, message, false);
  }

  /** Emits the single terminal event and settles `done`. */
  finish(outcome: TerminalOutcome, message: string, target?: string): StreamEvent | null {
    if (this.terminalSent) return null;
    if (!this.isCancelled) {
      this.currentState = outcome;
    }
    const succeeded = this.currentState === 'Succeeded';
    const event = this.record(succeeded ? 'success' : 'error', message, true, succeeded ? target : undefined);
    this.terminalSent = true;
    this.terminalEvent = event;
    this.finishedAt = event.timestamp;
    this.resolveDone(this.currentState);
    return event;
  }

  /** Returns false when the session had already finished or been cancelled. */
  requestCancel(reason: string = 'Cancelled by operator'): boolean {
    if (this.terminalSent || this.isCancelled) return false;
    this.transition('Cancelled');
    this.cancelReason = reason;
    this.abortController.abort(reason);
    return true;
  }

  eventsSince(seq: number): { events: StreamEvent[]; dropped: number } {
    const events = this.events.filter((event) => event.seq > seq);
    const oldest = this.events.length > 0 ? this.events[0].seq : this.nextSeq;
    const dropped = Math.max(0, oldest - seq - 1);
    return { events, dropped };
  }

  onEvent(listener: (event: StreamEvent) => void): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }

  toSummary(): SessionSummary {
    return {
      id: this.id,
      channel: this.channelId,
      kind: this.spec.kind,
      state: this.currentState,
      port: this.portToken,
      createdAt: this.createdAt,
      finishedAt: this.finishedAt,
    };
  }

  private record(kind: StreamEventKind, message: string, terminal: boolean, target?: string): StreamEvent {
    const event: StreamEvent = Object.freeze({
      sessionId: this.id,
      seq: this.nextSeq++,
      kind,
      message,
      timestamp: new Date().toISOString(),
      terminal,
      ...(target !== undefined ? { target } : {}),
    });
    this.events.push(event);
    if (this.events.length > this.replayLimit) {
      this.events.splice(0, this.events.length - this.replayLimit);
    }
    this.emit('event', event);
    return event;
  }
}
