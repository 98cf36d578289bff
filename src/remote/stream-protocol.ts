export const STREAM_PROTOCOL_VERSION = 1;
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

export type ControlKind = 'ready' | 'detach' | 'terminate' | 'exit';

export type ProtocolMessage =
  | {
      type: 'data';
      bytes: Uint8Array;
    }
  | {
      type: 'resize';
      cols: number;
      rows: number;
    }
  | {
      type: 'control';
      kind: ControlKind;
    }
  | {
      type: 'heartbeat';
      timestamp: number;
    }
  | {
      type: 'error';
      reason: string;
    };

export interface DecodedFrame {
  readonly seq: number;
  readonly message: ProtocolMessage;
}

export type FrameRejection =
  | 'malformed-json'
  | 'unsupported-version'
  | 'unknown-type'
  | 'invalid-payload'
  | 'oversize';

export interface FrameDecodeResult {
  readonly frames: DecodedFrame[];
  readonly rejections: FrameRejection[];
}

const NEWLINE = 0x0a;
const CONTROL_KINDS: ReadonlySet<string> = new Set<ControlKind>(['ready', 'detach', 'terminate', 'exit']);
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/u;

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function readString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readNonNegativeInt(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

function readPositiveInt(value: unknown): number | null {
  const parsed = readNonNegativeInt(value);
  return parsed === null || parsed === 0 ? null : parsed;
}

function isControlKind(value: string): value is ControlKind {
  return CONTROL_KINDS.has(value);
}

function envelopeFor(message: ProtocolMessage, seq: number): Record<string, unknown> {
  const base = { v: STREAM_PROTOCOL_VERSION, type: message.type, seq };
  switch (message.type) {
    case 'data':
      return { ...base, data: Buffer.from(message.bytes).toString('base64') };
    case 'resize':
      return { ...base, cols: message.cols, rows: message.rows };
    case 'control':
      return { ...base, kind: message.kind };
    case 'heartbeat':
      return { ...base, timestamp: message.timestamp };
    case 'error':
      return { ...base, reason: message.reason };
  }
}

export function encodeProtocolMessage(message: ProtocolMessage, seq: number): Buffer {
  return Buffer.from(`${JSON.stringify(envelopeFor(message, seq))}\n`, 'utf8');
}

type ParsedEnvelope =
  | {
      ok: true;
      frame: DecodedFrame;
    }
  | {
      ok: false;
      rejection: FrameRejection;
    };

function reject(rejection: FrameRejection): ParsedEnvelope {
  return { ok: false, rejection };
}

function parseMessage(type: string, record: Record<string, unknown>): ProtocolMessage | FrameRejection {
  if (type === 'data') {
    const data = readString(record['data']);
    if (data === null || !BASE64_PATTERN.test(data)) {
      return 'invalid-payload';
    }
    return { type, bytes: Buffer.from(data, 'base64') };
  }
  if (type === 'resize') {
    const cols = readPositiveInt(record['cols']);
    const rows = readPositiveInt(record['rows']);
    if (cols === null || rows === null) {
      return 'invalid-payload';
    }
    return { type, cols, rows };
  }
  if (type === 'control') {
    const kind = readString(record['kind']);
    if (kind === null || !isControlKind(kind)) {
      return 'invalid-payload';
    }
    return { type, kind };
  }
  if (type === 'heartbeat') {
    const timestamp = record['timestamp'];
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
      return 'invalid-payload';
    }
    return { type, timestamp };
  }
  if (type === 'error') {
    const reason = readString(record['reason']);
    if (reason === null) {
      return 'invalid-payload';
    }
    return { type, reason };
  }
  return 'unknown-type';
}

export function parseProtocolEnvelope(value: unknown): ParsedEnvelope {
  const record = asRecord(value);
  if (record === null) {
    return reject('invalid-payload');
  }
  if (record['v'] !== STREAM_PROTOCOL_VERSION) {
    return reject('unsupported-version');
  }
  const type = readString(record['type']);
  if (type === null) {
    return reject('unknown-type');
  }
  const seq = readNonNegativeInt(record['seq']);
  if (seq === null) {
    return reject('invalid-payload');
  }
  const message = parseMessage(type, record);
  if (typeof message === 'string') {
    return reject(message);
  }
  return { ok: true, frame: { seq, message } };
}

function parseFrameLine(line: Buffer): ParsedEnvelope | null {
  const text = line.toString('utf8').trim();
  if (text.length === 0) {
    return null;
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return reject('malformed-json');
  }
  return parseProtocolEnvelope(value);
}

/**
 * Splits a byte stream into newline-delimited frames. Partial frames stay
 * buffered as raw bytes until their newline arrives, so a chunk boundary
 * inside a multi-byte character is harmless.
 */
export class ProtocolFrameDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private discarding = false;

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  get bufferedBytes(): number {
    return this.pending.length;
  }

  push(chunk: Uint8Array): FrameDecodeResult {
    const frames: DecodedFrame[] = [];
    const rejections: FrameRejection[] = [];
    const buffer = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk]);

    let start = 0;
    let newline = buffer.indexOf(NEWLINE, start);
    while (newline !== -1) {
      const line = buffer.subarray(start, newline);
      start = newline + 1;
      newline = buffer.indexOf(NEWLINE, start);

      if (this.discarding) {
        this.discarding = false;
        continue;
      }
      if (line.length > this.maxFrameBytes) {
        rejections.push('oversize');
        continue;
      }
      const parsed = parseFrameLine(line);
      if (parsed === null) {
        continue;
      }
      if (parsed.ok) {
        frames.push(parsed.frame);
      } else {
        rejections.push(parsed.rejection);
      }
    }

    const rest = buffer.subarray(start);
    if (this.discarding) {
      this.pending = Buffer.alloc(0);
    } else if (rest.length > this.maxFrameBytes) {
      // The frame is already too large; drop bytes until its newline shows up.
      rejections.push('oversize');
      this.discarding = true;
      this.pending = Buffer.alloc(0);
    } else {
      this.pending = Buffer.from(rest);
    }

    return { frames, rejections };
  }

  reset(): void {
    this.pending = Buffer.alloc(0);
    this.discarding = false;
  }
}
