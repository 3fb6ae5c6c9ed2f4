export const STREAM_EVENT_KINDS = [
  'info',
  'command-echo',
  'output-chunk',
  'progress',
  'partial',
  'success',
  'error',
  'warning',
  'monitor',
] as const;
export type StreamEventKind = typeof STREAM_EVENT_KINDS[number];
// `progress` and `partial` may be collapsed into one line by a renderer;
// the transport always delivers each of them.

export interface StreamEvent {
  readonly sessionId: string;
  readonly seq: number;
  readonly kind: StreamEventKind;
  readonly message: string;
  readonly timestamp: string;
  readonly terminal: boolean;
  readonly target?: string;
}

export type WireMessageType =
  | 'info'
  | 'command'
  | 'output'
  | 'progress'
  | 'partial'
  | 'success'
  | 'error'
  | 'warning'
  | 'monitor'
  | 'pong';

export interface WireMessage {
  type: WireMessageType;
  message: string;
  timestamp: string;
  session?: string;
  seq?: number;
  target?: string;
  channel?: string;
}

const WIRE_TYPES: Record<StreamEventKind, WireMessageType> = {
  'info': 'info',
  'command-echo': 'command',
  'output-chunk': 'output',
  'progress': 'progress',
  'partial': 'partial',
  'success': 'success',
  'error': 'error',
  'warning': 'warning',
  'monitor': 'monitor',
};

export function toWireMessage(event: StreamEvent): WireMessage {
  const message: WireMessage = {
    type: WIRE_TYPES[event.kind],
    message: event.message,
    timestamp: event.timestamp,
    session: event.sessionId,
    seq: event.seq,
  };
  if (event.target !== undefined) {
    message.target = event.target;
  }
  return message;
}

export function channelMessage(type: WireMessageType, message: string, extra: Omit<WireMessage, 'type' | 'message' | 'timestamp'> = {}): WireMessage {
  return { type, message, timestamp: new Date().toISOString(), ...extra };
}
