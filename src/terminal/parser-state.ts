export type ParserMode = 'ground' | 'escape' | 'csi-param' | 'csi-intermediate' | 'osc-string';

export type StringSequenceKind = 'osc' | 'dcs' | 'apc' | 'pm' | 'sos';

/**
 * Everything the byte parser carries between `feed` calls. A chunk boundary
 * may fall anywhere (inside a UTF-8 sequence, a CSI, or an OSC payload); the
 * next call resumes from this value alone.
 */
export interface ParserState {
  readonly mode: ParserMode;
  readonly pendingUtf8: readonly number[];
  readonly utf8Expected: number;
  readonly escIntermediates: string;
  readonly csiParams: string;
  readonly csiIntermediates: string;
  readonly stringKind: StringSequenceKind | null;
  readonly stringBuffer: string;
  readonly stringEscPending: boolean;
}

export interface MutableParserState {
  mode: ParserMode;
  pendingUtf8: number[];
  utf8Expected: number;
  escIntermediates: string;
  csiParams: string;
  csiIntermediates: string;
  stringKind: StringSequenceKind | null;
  stringBuffer: string;
  stringEscPending: boolean;
}

export interface ParserActions {
  print(char: string, codePoint: number): void;
  execute(code: number): void;
  escDispatch(intermediates: string, final: string): void;
  csiDispatch(params: string, intermediates: string, final: string): void;
  stringDispatch(kind: StringSequenceKind, payload: string): void;
  ignored(): void;
  malformedUtf8(): void;
}

const ESC = 0x1b;
const BEL = 0x07;
const CAN = 0x18;
const SUB = 0x1a;
const DEL = 0x7f;
const REPLACEMENT_CODE_POINT = 0xfffd;
const MAX_CSI_LENGTH = 256;
const MAX_STRING_LENGTH = 4096;

export function createParserState(): MutableParserState {
  return {
    mode: 'ground',
    pendingUtf8: [],
    utf8Expected: 0,
    escIntermediates: '',
    csiParams: '',
    csiIntermediates: '',
    stringKind: null,
    stringBuffer: '',
    stringEscPending: false,
  };
}

export function copyParserState(state: ParserState): ParserState {
  return {
    mode: state.mode,
    pendingUtf8: [...state.pendingUtf8],
    utf8Expected: state.utf8Expected,
    escIntermediates: state.escIntermediates,
    csiParams: state.csiParams,
    csiIntermediates: state.csiIntermediates,
    stringKind: state.stringKind,
    stringBuffer: state.stringBuffer,
    stringEscPending: state.stringEscPending,
  };
}

export function resetParserState(state: MutableParserState): void {
  const fresh = createParserState();
  state.mode = fresh.mode;
  state.pendingUtf8 = fresh.pendingUtf8;
  state.utf8Expected = fresh.utf8Expected;
  state.escIntermediates = fresh.escIntermediates;
  state.csiParams = fresh.csiParams;
  state.csiIntermediates = fresh.csiIntermediates;
  state.stringKind = fresh.stringKind;
  state.stringBuffer = fresh.stringBuffer;
  state.stringEscPending = fresh.stringEscPending;
}

function utf8SequenceLength(leadByte: number): number {
  if (leadByte >= 0xc2 && leadByte <= 0xdf) {
    return 2;
  }
  if (leadByte >= 0xe0 && leadByte <= 0xef) {
    return 3;
  }
  if (leadByte >= 0xf0 && leadByte <= 0xf4) {
    return 4;
  }
  return 0;
}

function decodeUtf8Sequence(bytes: readonly number[]): number | null {
  const [lead = 0, ...rest] = bytes;
  let codePoint: number;
  let minimum: number;
  if (bytes.length === 2) {
    codePoint = lead & 0x1f;
    minimum = 0x80;
  } else if (bytes.length === 3) {
    codePoint = lead & 0x0f;
    minimum = 0x800;
  } else {
    codePoint = lead & 0x07;
    minimum = 0x10000;
  }
  for (const byte of rest) {
    codePoint = (codePoint << 6) | (byte & 0x3f);
  }
  if (codePoint < minimum || codePoint > 0x10ffff) {
    return null;
  }
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) {
    return null;
  }
  return codePoint;
}

function enterEscape(state: MutableParserState): void {
  state.mode = 'escape';
  state.escIntermediates = '';
}

function enterGround(state: MutableParserState): void {
  state.mode = 'ground';
  state.escIntermediates = '';
  state.csiParams = '';
  state.csiIntermediates = '';
  state.stringKind = null;
  state.stringBuffer = '';
  state.stringEscPending = false;
}

function enterString(state: MutableParserState, kind: StringSequenceKind): void {
  state.mode = 'osc-string';
  state.stringKind = kind;
  state.stringBuffer = '';
  state.stringEscPending = false;
}

function stringKindForIntroducer(char: string): StringSequenceKind | null {
  switch (char) {
    case ']':
      return 'osc';
    case 'P':
      return 'dcs';
    case '_':
      return 'apc';
    case '^':
      return 'pm';
    case 'X':
      return 'sos';
    default:
      return null;
  }
}

function finishString(state: MutableParserState, actions: ParserActions): void {
  const kind = state.stringKind ?? 'osc';
  const payload = state.stringBuffer;
  enterGround(state);
  actions.stringDispatch(kind, payload);
}

function stepGround(state: MutableParserState, codePoint: number, actions: ParserActions): void {
  if (codePoint === ESC) {
    enterEscape(state);
    return;
  }
  if (codePoint < 0x20) {
    actions.execute(codePoint);
    return;
  }
  if (codePoint === DEL || (codePoint >= 0x80 && codePoint < 0xa0)) {
    return;
  }
  actions.print(String.fromCodePoint(codePoint), codePoint);
}

function stepEscape(state: MutableParserState, codePoint: number, actions: ParserActions): void {
  if (codePoint === CAN || codePoint === SUB) {
    enterGround(state);
    actions.ignored();
    return;
  }
  if (codePoint === ESC) {
    enterEscape(state);
    return;
  }
  if (codePoint < 0x20) {
    actions.execute(codePoint);
    return;
  }
  const char = String.fromCodePoint(codePoint);
  if (codePoint >= 0x20 && codePoint <= 0x2f) {
    state.escIntermediates += char;
    return;
  }
  if (state.escIntermediates.length === 0) {
    if (char === '[') {
      state.mode = 'csi-param';
      state.csiParams = '';
      state.csiIntermediates = '';
      return;
    }
    const stringKind = stringKindForIntroducer(char);
    if (stringKind !== null) {
      enterString(state, stringKind);
      return;
    }
  }
  if (codePoint >= 0x30 && codePoint <= 0x7e) {
    const intermediates = state.escIntermediates;
    enterGround(state);
    actions.escDispatch(intermediates, char);
    return;
  }
  enterGround(state);
  actions.ignored();
}

function stepCsi(state: MutableParserState, codePoint: number, actions: ParserActions): void {
  if (codePoint === CAN || codePoint === SUB) {
    enterGround(state);
    actions.ignored();
    return;
  }
  if (codePoint === ESC) {
    enterEscape(state);
    actions.ignored();
    return;
  }
  if (codePoint < 0x20) {
    actions.execute(codePoint);
    return;
  }
  if (codePoint === DEL) {
    return;
  }
  const char = String.fromCodePoint(codePoint);
  if (codePoint >= 0x40 && codePoint <= 0x7e) {
    const params = state.csiParams;
    const intermediates = state.csiIntermediates;
    enterGround(state);
    actions.csiDispatch(params, intermediates, char);
    return;
  }
  if (codePoint >= 0x80 || state.csiParams.length + state.csiIntermediates.length >= MAX_CSI_LENGTH) {
    enterGround(state);
    actions.ignored();
    return;
  }
  if (codePoint >= 0x20 && codePoint <= 0x2f) {
    state.mode = 'csi-intermediate';
    state.csiIntermediates += char;
    return;
  }
  if (state.mode === 'csi-intermediate') {
    // Parameter bytes after an intermediate make the sequence malformed; it is
    // still consumed up to its final byte and rejected at dispatch.
    state.csiIntermediates += char;
    return;
  }
  state.csiParams += char;
}

function stepString(state: MutableParserState, codePoint: number, actions: ParserActions): void {
  if (state.stringEscPending) {
    state.stringEscPending = false;
    if (codePoint === 0x5c) {
      finishString(state, actions);
      return;
    }
    finishString(state, actions);
    enterEscape(state);
    stepEscape(state, codePoint, actions);
    return;
  }
  if (codePoint === BEL) {
    finishString(state, actions);
    return;
  }
  if (codePoint === ESC) {
    state.stringEscPending = true;
    return;
  }
  if (codePoint === CAN || codePoint === SUB) {
    enterGround(state);
    actions.ignored();
    return;
  }
  if (state.stringBuffer.length < MAX_STRING_LENGTH) {
    state.stringBuffer += String.fromCodePoint(codePoint);
  }
}

function stepCodePoint(state: MutableParserState, codePoint: number, actions: ParserActions): void {
  switch (state.mode) {
    case 'ground':
      stepGround(state, codePoint, actions);
      return;
    case 'escape':
      stepEscape(state, codePoint, actions);
      return;
    case 'csi-param':
    case 'csi-intermediate':
      stepCsi(state, codePoint, actions);
      return;
    case 'osc-string':
      stepString(state, codePoint, actions);
      return;
  }
}

function flushMalformedUtf8(state: MutableParserState, actions: ParserActions): void {
  if (state.pendingUtf8.length === 0) {
    return;
  }
  state.pendingUtf8 = [];
  state.utf8Expected = 0;
  actions.malformedUtf8();
  stepCodePoint(state, REPLACEMENT_CODE_POINT, actions);
}

/** Advances the parser by one input byte, invoking `actions` for each completed unit. */
export function advanceParser(
  state: MutableParserState,
  byte: number,
  actions: ParserActions,
): void {
  if (byte < 0x80) {
    flushMalformedUtf8(state, actions);
    stepCodePoint(state, byte, actions);
    return;
  }

  if (byte >= 0x80 && byte <= 0xbf) {
    if (state.pendingUtf8.length === 0) {
      actions.malformedUtf8();
      stepCodePoint(state, REPLACEMENT_CODE_POINT, actions);
      return;
    }
    state.pendingUtf8.push(byte);
    if (state.pendingUtf8.length < state.utf8Expected) {
      return;
    }
    const codePoint = decodeUtf8Sequence(state.pendingUtf8);
    state.pendingUtf8 = [];
    state.utf8Expected = 0;
    if (codePoint === null) {
      actions.malformedUtf8();
      stepCodePoint(state, REPLACEMENT_CODE_POINT, actions);
      return;
    }
    stepCodePoint(state, codePoint, actions);
    return;
  }

  flushMalformedUtf8(state, actions);
  const expected = utf8SequenceLength(byte);
  if (expected === 0) {
    actions.malformedUtf8();
    stepCodePoint(state, REPLACEMENT_CODE_POINT, actions);
    return;
  }
  state.pendingUtf8 = [byte];
  state.utf8Expected = expected;
}
