import { StringDecoder } from 'string_decoder';
import { StreamEventKind } from '../models/StreamEvent';

export interface ClassifiedLine {
  kind: StreamEventKind;
  text: string;
}

// An unterminated fragment longer than this is forwarded as `partial`
const PARTIAL_THRESHOLD = 10;

const ANSI_SEQUENCE = /\x1b\[[0-9;?]*[A-Za-z]|\x1b\][^\x07]*\x07/g;

const INTEGRITY_WARNING = /\b(hash|checksum|md5|digest)\b.*\b(mismatch|differ|invalid|failed)/i;
const ERROR_WORDS = /\b(error|failed|fatal|exception)\b/i;
const WARNING_WORDS = /\bwarn(ing)?\b/i;
const PROGRESS_PATTERNS = [
  /\(\s*\d{1,3}(\.\d+)?\s*%\s*\)/,
  /\b\d{1,3}(\.\d+)?\s*%/,
  /writing at 0x[0-9a-f]+/i,
  /\b\d+\s*\/\s*\d+\s*(bytes|kb|kib|mb|mib)\b/i,
];
const INFO_PATTERNS = [
  /\bconnecting\b/i,
  /\bchip is\b/i,
  /\bdetecting chip\b/i,
  /\bhash of data verified\b/i,
  /\bwrote \d+/i,
  /\bcompressed \d+/i,
  /\bhard resetting\b/i,
  /\bserial port\b/i,
  /\buploading stub\b/i,
  /\brunning stub\b/i,
  /\bstub running\b/i,
];

export function stripAnsi(text: string): string {
  return text.replace(ANSI_SEQUENCE, '');
}

/**
 * Maps one line of tool output to an event kind. Pure; rules are checked
 * in order and the first match wins.
 */
export function classifyLine(line: string): StreamEventKind {
  const text = stripAnsi(line);

  if (INTEGRITY_WARNING.test(text)) return 'warning';
  if (ERROR_WORDS.test(text)) return 'error';
  if (WARNING_WORDS.test(text)) return 'warning';
  if (PROGRESS_PATTERNS.some((pattern) => pattern.test(text))) return 'progress';
  if (INFO_PATTERNS.some((pattern) => pattern.test(text))) return 'info';
  return 'output-chunk';
}

/**
 * Incremental splitter for one output stream. Newline-terminated lines are
 * classified, carriage-return-terminated lines are progress redraws.
 */
export class OutputLineSplitter {
  private decoder = new StringDecoder('utf8');
  private buffer = '';
  private lastProgress: string | null = null;
  private lastPartial: string | null = null;

  push(chunk: Buffer | string): ClassifiedLine[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const lines: ClassifiedLine[] = [];

    for (;;) {
      const newline = this.buffer.indexOf('\n');
      const carriage = this.buffer.indexOf('\r');
      if (newline === -1 && carriage === -1) break;

      if (carriage !== -1 && (newline === -1 || carriage < newline)) {
        // CRLF is an ordinary line ending
        if (carriage + 1 < this.buffer.length && this.buffer[carriage + 1] === '\n') {
          this.emitLine(this.buffer.slice(0, carriage), lines);
          this.buffer = this.buffer.slice(carriage + 2);
          continue;
        }
        // A lone trailing \r may be the first half of CRLF
        if (carriage + 1 === this.buffer.length) break;
        this.emitProgress(this.buffer.slice(0, carriage), lines);
        this.buffer = this.buffer.slice(carriage + 1);
        continue;
      }

      this.emitLine(this.buffer.slice(0, newline), lines);
      this.buffer = this.buffer.slice(newline + 1);
    }

    const pending = this.buffer.endsWith('\r') ? this.buffer.slice(0, -1) : this.buffer;
    const fragment = clean(pending);
    if (fragment.length > PARTIAL_THRESHOLD && !this.buffer.endsWith('\r') && fragment !== this.lastPartial) {
      this.lastPartial = fragment;
      lines.push({ kind: 'partial', text: fragment });
    }
    return lines;
  }

  /** Emits whatever is left once the stream has ended. */
  flush(): ClassifiedLine[] {
    const rest = clean(this.buffer + this.decoder.end());
    this.buffer = '';
    this.lastPartial = null;
    if (rest.length === 0) return [];
    return [{ kind: 'output-chunk', text: rest }];
  }

  private emitLine(raw: string, lines: ClassifiedLine[]): void {
    this.lastPartial = null;
    const text = clean(raw);
    if (text.length === 0) return;
    lines.push({ kind: classifyLine(text), text });
  }

  private emitProgress(raw: string, lines: ClassifiedLine[]): void {
    this.lastPartial = null;
    const text = clean(raw);
    if (text.length === 0 || text === this.lastProgress) return;
    this.lastProgress = text;
    lines.push({ kind: 'progress', text });
  }
}

function clean(raw: string): string {
  const text = stripAnsi(raw).trimEnd();
  return text.trim().length === 0 ? '' : text;
}
