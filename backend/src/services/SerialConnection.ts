import { EventEmitter } from 'events';
import { SerialPort } from 'serialport';

export const DEFAULT_MONITOR_BAUD_RATE = 115200;

/**
 * An open-on-create serial connection. Emits 'open', 'data' (Buffer),
 * 'error' (Error) and 'close'.
 */
export interface SerialConnection extends EventEmitter {
  close(): void;
}

export type SerialOpener = (path: string, baudRate: number) => SerialConnection;

export const openSerialPort: SerialOpener = (path, baudRate) => new SerialPort({ path, baudRate });
