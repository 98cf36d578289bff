import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

type EventAttrValue = boolean | number | string;
export type EventAttrs = Readonly<Record<string, EventAttrValue>>;

export type EventLevel = 'debug' | 'info' | 'warn' | 'error';

interface EventLogConfig {
  enabled: boolean;
  filePath?: string;
  minLevel?: EventLevel;
}

interface EventRecord {
  type: 'event';
  level: EventLevel;
  name: string;
  'ts-ms': number;
  attrs?: EventAttrs;
}

interface SpanRecord {
  type: 'span';
  level: EventLevel;
  name: string;
  'start-ms': number;
  'duration-ms': number;
  'span-id': string;
  attrs?: EventAttrs;
}

type LogRecord = EventRecord | SpanRecord;

const DEFAULT_FILE_PATH = '.ciab/events.jsonl';
const DEFAULT_MAX_PENDING_RECORDS = 4096;
const LEVEL_RANK: Readonly<Record<EventLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Records at or above this level reach the file before the call returns.
const SYNC_FLUSH_LEVEL: EventLevel = 'warn';

/** Append-only JSONL file, opened on first flush. */
class JsonlSink {
  private fd: number | null = null;
  private readonly pending: string[] = [];
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(
    readonly filePath: string,
    private readonly maxPending: number
  ) {}

  append(record: LogRecord): void {
    this.pending.push(`${JSON.stringify(record)}\n`);
    if (this.pending.length > this.maxPending) {
      this.pending.shift();
    }
    if (LEVEL_RANK[record.level] >= LEVEL_RANK[SYNC_FLUSH_LEVEL]) {
      this.flush();
      return;
    }
    if (this.flushTimer === null) {
      this.flushTimer = setTimeout(() => {
        this.flushTimer = null;
        this.flush();
      }, 0);
      this.flushTimer.unref();
    }
  }

  flush(): void {
    if (this.flushTimer !== null) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.pending.length === 0) {
      return;
    }
    const chunk = this.pending.join('');
    this.pending.length = 0;
    writeSync(this.descriptor(), chunk);
  }

  close(): void {
    this.flush();
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  private descriptor(): number {
    if (this.fd === null) {
      const resolvedPath = resolve(this.filePath);
      mkdirSync(dirname(resolvedPath), { recursive: true });
      this.fd = openSync(resolvedPath, 'a');
    }
    return this.fd;
  }
}

const state: {
  enabled: boolean;
  filePath: string;
  minLevel: EventLevel;
  nextSpanId: number;
  sink: JsonlSink | null;
} = {
  enabled: false,
  filePath: DEFAULT_FILE_PATH,
  minLevel: 'debug',
  nextSpanId: 1,
  sink: null,
};

function writeRecord(record: LogRecord): void {
  if (!state.enabled) {
    return;
  }
  if (state.sink === null) {
    state.sink = new JsonlSink(state.filePath, DEFAULT_MAX_PENDING_RECORDS);
  }
  state.sink.append(record);
}

function closeSink(): void {
  state.sink?.close();
  state.sink = null;
}

function shouldRecord(level: EventLevel): boolean {
  return state.enabled && LEVEL_RANK[level] >= LEVEL_RANK[state.minLevel];
}

function mergeAttrs(base?: EventAttrs, extra?: EventAttrs): EventAttrs | undefined {
  if (base === undefined) {
    return extra;
  }
  if (extra === undefined) {
    return base;
  }
  return { ...base, ...extra };
}

interface EventSpan {
  end(extraAttrs?: EventAttrs): void;
}

const NOOP_SPAN: EventSpan = {
  end(): void {
    return;
  },
};

class ActiveEventSpan implements EventSpan {
  private ended = false;
  private readonly name: string;
  private readonly level: EventLevel;
  private readonly startedAtMs: number;
  private readonly attrs: EventAttrs | undefined;
  private readonly spanId: string;

  constructor(name: string, level: EventLevel, attrs: EventAttrs | undefined, spanId: string) {
    this.name = name;
    this.level = level;
    this.startedAtMs = performance.now();
    this.attrs = attrs;
    this.spanId = spanId;
  }

  end(extraAttrs?: EventAttrs): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (!shouldRecord(this.level)) {
      return;
    }
    const record: SpanRecord = {
      type: 'span',
      level: this.level,
      name: this.name,
      'start-ms': Math.round(performance.timeOrigin + this.startedAtMs),
      'duration-ms': Math.max(0, performance.now() - this.startedAtMs),
      'span-id': this.spanId,
    };
    const attrs = mergeAttrs(this.attrs, extraAttrs);
    if (attrs !== undefined) {
      record.attrs = attrs;
    }
    writeRecord(record);
  }
}

export function configureEventLog(config: EventLogConfig): void {
  const nextFilePath = config.filePath ?? state.filePath;
  if (!config.enabled || resolve(nextFilePath) !== resolve(state.filePath)) {
    closeSink();
  }
  state.enabled = config.enabled;
  state.filePath = nextFilePath;
  state.minLevel = config.minLevel ?? state.minLevel;
}

export function isEventLogEnabled(): boolean {
  return state.enabled;
}

export function logEvent(level: EventLevel, name: string, attrs?: EventAttrs): void {
  if (!shouldRecord(level)) {
    return;
  }
  const record: EventRecord = {
    type: 'event',
    level,
    name,
    'ts-ms': Date.now(),
  };
  if (attrs !== undefined) {
    record.attrs = attrs;
  }
  writeRecord(record);
}

export function logDebug(name: string, attrs?: EventAttrs): void {
  logEvent('debug', name, attrs);
}

export function logInfo(name: string, attrs?: EventAttrs): void {
  logEvent('info', name, attrs);
}

export function logWarn(name: string, attrs?: EventAttrs): void {
  logEvent('warn', name, attrs);
}

export function logError(name: string, attrs?: EventAttrs): void {
  logEvent('error', name, attrs);
}

export function startEventSpan(name: string, attrs?: EventAttrs, level: EventLevel = 'debug'): EventSpan {
  if (!shouldRecord(level)) {
    return NOOP_SPAN;
  }
  const spanId = `span-${state.nextSpanId}`;
  state.nextSpanId += 1;
  return new ActiveEventSpan(name, level, attrs, spanId);
}

export function shutdownEventLog(): void {
  closeSink();
  state.enabled = false;
}
