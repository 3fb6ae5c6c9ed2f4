import { IncomingMessage, Server as HttpServer } from 'http';
import { URL } from 'url';
import { v4 as uuidv4 } from 'uuid';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import { CommandSession } from '../models/CommandSession';
import { StreamEvent, WireMessage, channelMessage, toWireMessage } from '../models/StreamEvent';
import { InvalidCommandError, PortBusyError, errorMessage } from '../utils/errors';
import { AUTO_PORT } from '../utils/validation';
import { CommandExecutor, parseDiagnosticCommand } from './CommandExecutor';
import { DEFAULT_MONITOR_BAUD_RATE } from './SerialConnection';

export const TERMINAL_PATH = '/ws/terminal';
const HEARTBEAT_MS = 30000;

interface Channel {
  id: string;
  socket: WebSocket | null;
  isAlive: boolean;
  delivered: Map<string, number>; // sessionId -> last delivered seq
  subscriptions: Map<string, () => void>;
  disconnectedAt: number | null;
}

export interface StreamingBrokerOptions {
  path?: string;
  heartbeatMs?: number;
  channelGraceMs?: number;
}

const InboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('flash'), firmware: z.string().min(1), port: z.string().min(1).default(AUTO_PORT) }),
  z.object({ type: z.literal('esptool'), command: z.string(), timeout_ms: z.number().int().positive().optional() }),
  z.object({ type: z.literal('update_firmware') }),
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('cancel'), session: z.string().min(1) }),
  z.object({
    type: z.literal('monitor'),
    port: z.string().min(1).default(AUTO_PORT),
    baudrate: z.number().int().positive().default(DEFAULT_MONITOR_BAUD_RATE),
  }),
  z.object({ type: z.literal('stop_monitor'), port: z.string().min(1) }),
]);
type InboundMessage = z.infer<typeof InboundMessageSchema>;

const INBOUND_TYPES = new Set(['flash', 'esptool', 'update_firmware', 'ping', 'cancel', 'monitor', 'stop_monitor']);

/**
 * Reads the `since` query parameter: `<session>:<seq>` pairs separated by
 * commas, naming the last event the client has seen of each session.
 */
export function parseResumeCursor(value: string | null): Map<string, number> {
  const cursor = new Map<string, number>();
  if (!value) return cursor;
  for (const entry of value.split(',')) {
    const separator = entry.lastIndexOf(':');
    if (separator <= 0) continue;
    const seq = entry.slice(separator + 1);
    if (!/^\d+$/.test(seq)) continue;
    cursor.set(entry.slice(0, separator), Number(seq));
  }
  return cursor;
}

/**
 * Terminal channels over WebSocket. A channel outlives its socket while any
 * of its sessions runs, and for the grace period after that, so a
 * reconnecting browser gets every event it missed.
 */
export class StreamingBroker {
  private wss: WebSocketServer;
  private channels = new Map<string, Channel>();
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private executor: CommandExecutor;
  private channelGraceMs: number;

  constructor(server: HttpServer, executor: CommandExecutor, options: StreamingBrokerOptions = {}) {
    this.executor = executor;
    this.channelGraceMs = options.channelGraceMs ?? 10 * 60 * 1000;
    this.wss = new WebSocketServer({ server, path: options.path ?? TERMINAL_PATH });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.handleConnection(ws, req);
    });

    this.heartbeatInterval = setInterval(() => {
      this.checkHeartbeats();
      this.pruneChannels();
    }, options.heartbeatMs ?? HEARTBEAT_MS);
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const url = new URL(req.url || '', `http://${req.headers.host || 'localhost'}`);
    const requested = url.searchParams.get('channel');
    const existing = requested ? this.channels.get(requested) : undefined;

    const channel = existing ?? this.createChannel();
    if (channel.socket && channel.socket !== ws) {
      channel.socket.close(4000, 'Replaced by a newer connection');
    }
    channel.socket = ws;
    channel.isAlive = true;
    channel.disconnectedAt = null;

    ws.on('pong', () => {
      channel.isAlive = true;
    });

    ws.on('close', () => {
      if (channel.socket === ws) {
        channel.socket = null;
        channel.disconnectedAt = Date.now();
      }
    });

    ws.on('message', (data: RawData) => {
      this.handleMessage(channel, data.toString());
    });

    ws.on('error', (err) => {
      console.warn(`Broker: socket error on channel ${channel.id}: ${err.message}`);
    });

    this.send(channel, channelMessage(
      'info',
      existing ? 'WebSocket Terminal reconnected' : 'WebSocket Terminal connected',
      { channel: channel.id },
    ));
    if (existing) {
      this.rewind(channel, parseResumeCursor(url.searchParams.get('since')));
      this.replay(channel);
    }
  }

  private createChannel(): Channel {
    const channel: Channel = {
      id: uuidv4(),
      socket: null,
      isAlive: true,
      delivered: new Map(),
      subscriptions: new Map(),
      disconnectedAt: null,
    };
    this.channels.set(channel.id, channel);
    return channel;
  }

  private handleMessage(channel: Channel, raw: string): void {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.send(channel, channelMessage('error', 'Invalid message: expected JSON'));
      return;
    }

    const type = typeof data === 'object' && data !== null && 'type' in data ? data.type : undefined;
    if (typeof type !== 'string') {
      this.send(channel, channelMessage('error', 'Invalid message: missing "type"'));
      return;
    }
    if (!INBOUND_TYPES.has(type)) {
      this.send(channel, channelMessage('error', `Unknown command type: ${type}`));
      return;
    }

    const parsed = InboundMessageSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      this.send(channel, channelMessage('error', `Invalid ${type} message: ${issue.path.join('.')} ${issue.message}`));
      return;
    }

    try {
      this.dispatch(channel, parsed.data);
    } catch (err) {
      if (err instanceof PortBusyError || err instanceof InvalidCommandError) {
        this.send(channel, channelMessage('error', err.message));
        return;
      }
      console.error(`Broker: failed to handle ${type} on channel ${channel.id}:`, err);
      this.send(channel, channelMessage('error', `Internal error: ${errorMessage(err)}`));
    }
  }

  private dispatch(channel: Channel, message: InboundMessage): void {
    switch (message.type) {
      case 'ping':
        this.send(channel, channelMessage('pong', 'Terminal connection alive'));
        return;
      case 'flash':
        this.attach(channel, this.executor.start({ kind: 'flash', firmware: message.firmware, port: message.port }, channel.id));
        return;
      case 'esptool':
        this.attach(channel, this.executor.start(parseDiagnosticCommand(message.command, message.timeout_ms), channel.id));
        return;
      case 'update_firmware':
        this.attach(channel, this.executor.start({ kind: 'update-all' }, channel.id));
        return;
      case 'monitor':
        this.attach(channel, this.executor.start({ kind: 'monitor', port: message.port, baudRate: message.baudrate }, channel.id));
        return;
      case 'stop_monitor':
        if (!this.executor.stopMonitor(message.port, channel.id)) {
          this.send(channel, channelMessage('error', `No monitor running for port ${message.port}`));
        }
        return;
      case 'cancel': {
        const session = this.executor.get(message.session);
        if (!session || session.channelId !== channel.id) {
          this.send(channel, channelMessage('error', `Session ${message.session} not found`));
          return;
        }
        if (!this.executor.cancel(message.session)) {
          this.send(channel, channelMessage('error', `Session ${message.session} is not running`, { session: message.session }));
        }
        return;
      }
    }
  }

  /** Catches up on anything already emitted, then follows the session live. */
  private attach(channel: Channel, session: CommandSession): void {
    channel.delivered.set(session.id, 0);
    for (const event of session.eventsSince(0).events) {
      this.deliver(channel, event);
    }
    if (session.isFinished) return;

    const unsubscribe = session.onEvent((event) => {
      this.deliver(channel, event);
      if (event.terminal) {
        unsubscribe();
        channel.subscriptions.delete(session.id);
      }
    });
    channel.subscriptions.set(session.id, unsubscribe);
  }

  private deliver(channel: Channel, event: StreamEvent): void {
    const lastSeq = channel.delivered.get(event.sessionId) ?? 0;
    if (event.seq <= lastSeq) return;
    if (this.send(channel, toWireMessage(event))) {
      channel.delivered.set(event.sessionId, event.seq);
    }
  }

  /**
   * Moves the delivery cursor back to what the client says it has seen.
   * Events sent on a socket that died before they arrived are replayed.
   */
  private rewind(channel: Channel, cursor: Map<string, number>): void {
    for (const [sessionId, seq] of cursor) {
      const delivered = channel.delivered.get(sessionId);
      if (delivered === undefined) continue;
      channel.delivered.set(sessionId, Math.min(seq, delivered));
    }
  }

  private replay(channel: Channel): void {
    for (const [sessionId, lastSeq] of channel.delivered) {
      const session = this.executor.get(sessionId);
      if (!session) {
        channel.delivered.delete(sessionId);
        continue;
      }
      const { events, dropped } = session.eventsSince(lastSeq);
      if (dropped > 0) {
        this.send(channel, channelMessage('warning', `${dropped} earlier messages of this session are no longer available`, { session: sessionId }));
      }
      for (const event of events) {
        this.deliver(channel, event);
      }
    }
  }

  private send(channel: Channel, message: WireMessage): boolean {
    const ws = channel.socket;
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;
    ws.send(JSON.stringify(message));
    return true;
  }

  private checkHeartbeats(): void {
    for (const channel of this.channels.values()) {
      const ws = channel.socket;
      if (!ws) continue;
      if (!channel.isAlive) {
        console.warn(`Broker: channel ${channel.id} stopped answering pings`);
        ws.terminate();
        continue;
      }
      channel.isAlive = false;
      ws.ping();
    }
  }

  /** Drops disconnected channels whose sessions all ended more than the grace period ago. */
  private pruneChannels(): void {
    const now = Date.now();
    for (const channel of Array.from(this.channels.values())) {
      if (channel.socket || channel.disconnectedAt === null) continue;
      const sessions = this.executor.sessionsForChannel(channel.id);
      if (sessions.some((session) => !session.isFinished)) continue;

      const idleSince = sessions.reduce(
        (latest, session) => Math.max(latest, session.finishedAt ? Date.parse(session.finishedAt) : 0),
        channel.disconnectedAt,
      );
      if (now - idleSince < this.channelGraceMs) continue;
      this.dropChannel(channel);
    }
  }

  private dropChannel(channel: Channel): void {
    for (const unsubscribe of channel.subscriptions.values()) {
      unsubscribe();
    }
    channel.subscriptions.clear();
    this.channels.delete(channel.id);
  }

  isConnected(channelId: string): boolean {
    const socket = this.channels.get(channelId)?.socket;
    return socket !== null && socket !== undefined && socket.readyState === WebSocket.OPEN;
  }

  getChannelCount(): number {
    return this.channels.size;
  }

  close(): void {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
    for (const channel of Array.from(this.channels.values())) {
      channel.socket?.close(1001, 'Server shutting down');
      this.dropChannel(channel);
    }
    this.wss.close();
  }
}
