import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { homedir } from 'node:os';

export const CIAB_CONFIG_FILE_NAME = 'ciab.config.jsonc';
const CIAB_CONFIG_DIRECTORY_NAME = 'ciab';

export interface CaptureOptions {
  readonly historyLines: number;
  readonly samplingIntervalMs: number;
  readonly includePaneBorders: boolean;
  readonly includeEscapeSequences: boolean;
  readonly joinWrappedLines: boolean;
}

export interface ActivityMarkers {
  readonly waitingForInput: readonly string[];
  readonly running: readonly string[];
  readonly idle: readonly string[];
}

export interface TerminalCapabilities {
  readonly alternateScreen: boolean;
  readonly scrollRegion: boolean;
  readonly insertDelete: boolean;
}

interface CiabTerminalConfig {
  readonly scrollbackLines: number;
  readonly defaultCols: number;
  readonly defaultRows: number;
  readonly capabilities: TerminalCapabilities;
}

interface CiabLocalConfig {
  readonly program: string;
  readonly attachTimeoutMs: number;
  readonly historyLimit: number;
}

export interface CiabRemoteConfig {
  readonly heartbeatIntervalMs: number;
  readonly heartbeatTimeoutMs: number;
  readonly reconnectBaseDelayMs: number;
  readonly reconnectMaxDelayMs: number;
  readonly maxReconnectAttempts: number;
  readonly connectTimeoutMs: number;
  readonly maxQueuedMessages: number;
}

interface CiabDebugLogConfig {
  readonly enabled: boolean;
  readonly filePath: string;
}

export interface CiabConfig {
  readonly capture: CaptureOptions;
  readonly activity: {
    readonly markers: ActivityMarkers;
  };
  readonly terminal: CiabTerminalConfig;
  readonly local: CiabLocalConfig;
  readonly remote: CiabRemoteConfig;
  readonly debug: {
    readonly log: CiabDebugLogConfig;
  };
}

interface LoadedCiabConfig {
  readonly filePath: string;
  readonly config: CiabConfig;
  readonly fromLastKnownGood: boolean;
  readonly error: string | null;
}

export const DEFAULT_CIAB_CONFIG: CiabConfig = {
  capture: {
    historyLines: 40,
    samplingIntervalMs: 1000,
    includePaneBorders: false,
    includeEscapeSequences: false,
    joinWrappedLines: true
  },
  activity: {
    markers: {
      waitingForInput: ['Do you want to proceed?', '(y/n)', '[Y/n]', '[y/N]', 'Press Enter to continue'],
      running: ['esc to interrupt', 'Running…', 'Thinking…'],
      idle: ['? for shortcuts', '$ ']
    }
  },
  terminal: {
    scrollbackLines: 5000,
    defaultCols: 80,
    defaultRows: 24,
    capabilities: {
      alternateScreen: true,
      scrollRegion: true,
      insertDelete: true
    }
  },
  local: {
    program: 'claude',
    attachTimeoutMs: 5000,
    historyLimit: 10000
  },
  remote: {
    heartbeatIntervalMs: 30000,
    heartbeatTimeoutMs: 60000,
    reconnectBaseDelayMs: 2000,
    reconnectMaxDelayMs: 30000,
    maxReconnectAttempts: 10,
    connectTimeoutMs: 5000,
    maxQueuedMessages: 1024
  },
  debug: {
    log: {
      enabled: false,
      filePath: 'logs/ciab-events.jsonl'
    }
  }
};

const JSON_WHITESPACE = new Set([' ', '\t', '\n', '\r']);

// Index just past the closing quote of the string opening at `start`.
function skipJsonString(text: string, start: number): number {
  let idx = start + 1;
  while (idx < text.length) {
    const char = text.charAt(idx);
    idx += char === '\\' ? 2 : 1;
    if (char === '"') {
      return idx;
    }
  }
  return text.length;
}

// Index where a comment opening at `start` ends (a line comment keeps its newline), or null.
function skipJsoncComment(text: string, start: number): number | null {
  if (text.startsWith('//', start)) {
    const newline = text.indexOf('\n', start + 2);
    return newline === -1 ? text.length : newline;
  }
  if (text.startsWith('/*', start)) {
    const close = text.indexOf('*/', start + 2);
    return close === -1 ? text.length : close + 2;
  }
  return null;
}

/**
 * Reduces JSONC to JSON in one pass. A comma is held until the next
 * significant character and dropped when that closes an object or array.
 */
function jsoncToJson(text: string): string {
  const parts: string[] = [];
  let heldComma = false;
  let idx = 0;
  while (idx < text.length) {
    const char = text.charAt(idx);
    const commentEnd = char === '/' ? skipJsoncComment(text, idx) : null;
    if (commentEnd !== null) {
      idx = commentEnd;
      continue;
    }
    if (JSON_WHITESPACE.has(char)) {
      parts.push(char);
      idx += 1;
      continue;
    }
    if (heldComma && char !== '}' && char !== ']') {
      parts.push(',');
    }
    heldComma = char === ',';
    if (heldComma) {
      idx += 1;
    } else if (char === '"') {
      const end = skipJsonString(text, idx);
      parts.push(text.slice(idx, end));
      idx = end;
    } else {
      parts.push(char);
      idx += 1;
    }
  }
  if (heldComma) {
    parts.push(',');
  }
  return parts.join('');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function normalizeNonNegativeInt(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const normalized = Math.floor(value);
  if (normalized < 0) {
    return fallback;
  }
  return normalized;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  const normalized = normalizeNonNegativeInt(value, fallback);
  return normalized === 0 ? fallback : normalized;
}

function normalizeNonEmptyString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function normalizeMarkerList(value: unknown, fallback: readonly string[]): readonly string[] {
  if (!Array.isArray(value)) {
    return fallback;
  }
  const markers: string[] = [];
  for (const entry of value) {
    if (typeof entry === 'string' && entry.length > 0) {
      markers.push(entry);
    }
  }
  return markers;
}

function normalizeCaptureConfig(input: unknown): CaptureOptions {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.capture;
  if (record === null) {
    return defaults;
  }
  return {
    historyLines: normalizePositiveInt(record['historyLines'], defaults.historyLines),
    samplingIntervalMs: normalizePositiveInt(record['samplingIntervalMs'], defaults.samplingIntervalMs),
    includePaneBorders: normalizeBoolean(record['includePaneBorders'], defaults.includePaneBorders),
    includeEscapeSequences: normalizeBoolean(
      record['includeEscapeSequences'],
      defaults.includeEscapeSequences
    ),
    joinWrappedLines: normalizeBoolean(record['joinWrappedLines'], defaults.joinWrappedLines)
  };
}

function normalizeActivityMarkers(input: unknown): ActivityMarkers {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.activity.markers;
  if (record === null) {
    return defaults;
  }
  return {
    waitingForInput: normalizeMarkerList(record['waitingForInput'], defaults.waitingForInput),
    running: normalizeMarkerList(record['running'], defaults.running),
    idle: normalizeMarkerList(record['idle'], defaults.idle)
  };
}

function normalizeTerminalCapabilities(input: unknown): TerminalCapabilities {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.terminal.capabilities;
  if (record === null) {
    return defaults;
  }
  return {
    alternateScreen: normalizeBoolean(record['alternateScreen'], defaults.alternateScreen),
    scrollRegion: normalizeBoolean(record['scrollRegion'], defaults.scrollRegion),
    insertDelete: normalizeBoolean(record['insertDelete'], defaults.insertDelete)
  };
}

function normalizeTerminalConfig(input: unknown): CiabTerminalConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.terminal;
  if (record === null) {
    return defaults;
  }
  return {
    scrollbackLines: normalizeNonNegativeInt(record['scrollbackLines'], defaults.scrollbackLines),
    defaultCols: normalizePositiveInt(record['defaultCols'], defaults.defaultCols),
    defaultRows: normalizePositiveInt(record['defaultRows'], defaults.defaultRows),
    capabilities: normalizeTerminalCapabilities(record['capabilities'])
  };
}

function normalizeLocalConfig(input: unknown): CiabLocalConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.local;
  if (record === null) {
    return defaults;
  }
  return {
    program: normalizeNonEmptyString(record['program'], defaults.program),
    attachTimeoutMs: normalizePositiveInt(record['attachTimeoutMs'], defaults.attachTimeoutMs),
    historyLimit: normalizePositiveInt(record['historyLimit'], defaults.historyLimit)
  };
}

function normalizeRemoteConfig(input: unknown): CiabRemoteConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.remote;
  if (record === null) {
    return defaults;
  }
  const reconnectBaseDelayMs = normalizePositiveInt(
    record['reconnectBaseDelayMs'],
    defaults.reconnectBaseDelayMs
  );
  return {
    heartbeatIntervalMs: normalizePositiveInt(record['heartbeatIntervalMs'], defaults.heartbeatIntervalMs),
    heartbeatTimeoutMs: normalizePositiveInt(record['heartbeatTimeoutMs'], defaults.heartbeatTimeoutMs),
    reconnectBaseDelayMs,
    reconnectMaxDelayMs: Math.max(
      reconnectBaseDelayMs,
      normalizePositiveInt(record['reconnectMaxDelayMs'], defaults.reconnectMaxDelayMs)
    ),
    maxReconnectAttempts: normalizeNonNegativeInt(
      record['maxReconnectAttempts'],
      defaults.maxReconnectAttempts
    ),
    connectTimeoutMs: normalizePositiveInt(record['connectTimeoutMs'], defaults.connectTimeoutMs),
    maxQueuedMessages: normalizePositiveInt(record['maxQueuedMessages'], defaults.maxQueuedMessages)
  };
}

function normalizeDebugLogConfig(input: unknown): CiabDebugLogConfig {
  const record = asRecord(input);
  const defaults = DEFAULT_CIAB_CONFIG.debug.log;
  if (record === null) {
    return defaults;
  }
  return {
    enabled: normalizeBoolean(record['enabled'], defaults.enabled),
    filePath: normalizeNonEmptyString(record['filePath'], defaults.filePath)
  };
}

export function parseCiabConfigText(text: string): CiabConfig {
  const stripped = jsoncToJson(text);
  const parsed: unknown = JSON.parse(stripped);
  const root = asRecord(parsed);
  if (root === null) {
    return DEFAULT_CIAB_CONFIG;
  }

  const activity = asRecord(root['activity']);
  const debug = asRecord(root['debug']);

  return {
    capture: normalizeCaptureConfig(root['capture']),
    activity: {
      markers: normalizeActivityMarkers(activity?.['markers'])
    },
    terminal: normalizeTerminalConfig(root['terminal']),
    local: normalizeLocalConfig(root['local']),
    remote: normalizeRemoteConfig(root['remote']),
    debug: {
      log: normalizeDebugLogConfig(debug?.['log'])
    }
  };
}

function readNonEmptyEnvPath(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

export function resolveCiabConfigDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = readNonEmptyEnvPath(env.CIAB_CONFIG_DIR);
  if (explicit !== null) {
    return resolve(explicit);
  }
  const xdgConfigHome = readNonEmptyEnvPath(env.XDG_CONFIG_HOME);
  if (xdgConfigHome !== null) {
    return resolve(xdgConfigHome, CIAB_CONFIG_DIRECTORY_NAME);
  }
  const home = readNonEmptyEnvPath(env.HOME) ?? homedir();
  return resolve(home, '.config', CIAB_CONFIG_DIRECTORY_NAME);
}

export function resolveCiabConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(resolveCiabConfigDirectory(env), CIAB_CONFIG_FILE_NAME);
}

export function loadCiabConfig(options?: {
  env?: NodeJS.ProcessEnv;
  filePath?: string;
  lastKnownGood?: CiabConfig;
}): LoadedCiabConfig {
  const filePath = options?.filePath ?? resolveCiabConfigPath(options?.env);
  const lastKnownGood = options?.lastKnownGood ?? DEFAULT_CIAB_CONFIG;

  if (!existsSync(filePath)) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: false,
      error: null
    };
  }

  try {
    const raw = readFileSync(filePath, 'utf8');
    return {
      filePath,
      config: parseCiabConfigText(raw),
      fromLastKnownGood: false,
      error: null
    };
  } catch (error: unknown) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: true,
      error: String(error)
    };
  }
}

export function writeFileAtomically(filePath: string, contents: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${randomUUID()}`;
  try {
    writeFileSync(tempPath, contents, 'utf8');
    renameSync(tempPath, filePath);
  } catch (error: unknown) {
    if (existsSync(tempPath)) {
      unlinkSync(tempPath);
    }
    throw error;
  }
}
