import type { TerminalCapabilities } from '../config/config-core.ts';
import { measureCodePointWidth } from './display-width.ts';
import {
  advanceParser,
  copyParserState,
  createParserState,
  resetParserState,
  type MutableParserState,
  type ParserActions,
  type ParserState,
  type StringSequenceKind,
} from './parser-state.ts';

export type TerminalColor =
  | { readonly kind: 'default' }
  | { readonly kind: 'indexed'; readonly index: number }
  | { readonly kind: 'rgb'; readonly r: number; readonly g: number; readonly b: number };

export interface CellStyle {
  readonly fg: TerminalColor;
  readonly bg: TerminalColor;
  readonly bold: boolean;
  readonly dim: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly inverse: boolean;
}

/**
 * One grid cell. `width` is 2 for the leading half of a wide glyph and 0 for
 * the trailing half it covers. Cells are never mutated in place, so snapshots
 * can share them with the live grid.
 */
export interface ScreenCell {
  readonly glyph: string;
  readonly width: 0 | 1 | 2;
  readonly style: CellStyle;
}

export type ActiveScreen = 'primary' | 'alternate';

export interface SnapshotLine {
  readonly wrapped: boolean;
  readonly text: string;
  readonly cells: readonly ScreenCell[];
}

export interface ScreenSnapshot {
  readonly cols: number;
  readonly rows: number;
  readonly activeScreen: ActiveScreen;
  readonly cursor: {
    readonly row: number;
    readonly col: number;
    readonly visible: boolean;
  };
  readonly title: string;
  readonly lines: readonly string[];
  readonly richLines: readonly SnapshotLine[];
  readonly scrollback: readonly SnapshotLine[];
}

export interface ScreenDiagnostics {
  readonly unrecognizedSequences: number;
  readonly malformedUtf8: number;
}

export interface ScreenModelOptions {
  readonly cols: number;
  readonly rows: number;
  readonly scrollbackLines?: number;
  readonly capabilities?: TerminalCapabilities;
}

const DEFAULT_COLOR: TerminalColor = { kind: 'default' };
const DEFAULT_SCROLLBACK_LINES = 5000;
const TAB_WIDTH = 8;
const MAX_TITLE_LENGTH = 256;

const ALL_CAPABILITIES: TerminalCapabilities = {
  alternateScreen: true,
  scrollRegion: true,
  insertDelete: true,
};

export const DEFAULT_CELL_STYLE: CellStyle = {
  fg: DEFAULT_COLOR,
  bg: DEFAULT_COLOR,
  bold: false,
  dim: false,
  italic: false,
  underline: false,
  inverse: false,
};

export const BLANK_CELL: ScreenCell = { glyph: ' ', width: 1, style: DEFAULT_CELL_STYLE };

// Fills the last column when a wide glyph had to move to the next row.
const WRAP_PADDING_CELL: ScreenCell = { glyph: '', width: 1, style: DEFAULT_CELL_STYLE };

const TOLERATED_PRIVATE_MODES = new Set([1, 12, 1000, 1002, 1003, 1004, 1005, 1006, 1015, 2004, 2026]);

function colorEqual(left: TerminalColor, right: TerminalColor): boolean {
  if (left.kind === 'default' || right.kind === 'default') {
    return left.kind === right.kind;
  }
  if (left.kind === 'indexed') {
    return right.kind === 'indexed' && left.index === right.index;
  }
  return right.kind === 'rgb' && left.r === right.r && left.g === right.g && left.b === right.b;
}

export function styleEqual(left: CellStyle, right: CellStyle): boolean {
  return (
    left.bold === right.bold &&
    left.dim === right.dim &&
    left.italic === right.italic &&
    left.underline === right.underline &&
    left.inverse === right.inverse &&
    colorEqual(left.fg, right.fg) &&
    colorEqual(left.bg, right.bg)
  );
}

export function isBlankCell(cell: ScreenCell): boolean {
  return cell.width === 1 && (cell.glyph === ' ' || cell.glyph === '') && styleEqual(cell.style, DEFAULT_CELL_STYLE);
}

function eraseCellFor(style: CellStyle): ScreenCell {
  if (style.bg.kind === 'default') {
    return BLANK_CELL;
  }
  return { glyph: ' ', width: 1, style: { ...DEFAULT_CELL_STYLE, bg: style.bg } };
}

function clampColor(value: number): number {
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

interface ScreenLine {
  cells: ScreenCell[];
  wrapped: boolean;
  snapshot: SnapshotLine | null;
}

interface ScreenCursor {
  row: number;
  col: number;
}

interface SavedCursor {
  readonly row: number;
  readonly col: number;
  readonly style: CellStyle;
  readonly pendingWrap: boolean;
}

function createLine(cols: number, fill: ScreenCell, wrapped = false): ScreenLine {
  return {
    cells: Array.from({ length: cols }, () => fill),
    wrapped,
    snapshot: null,
  };
}

function cellAt(line: ScreenLine, col: number): ScreenCell {
  return line.cells[col] ?? BLANK_CELL;
}

function lineText(cells: readonly ScreenCell[]): string {
  let text = '';
  for (const cell of cells) {
    if (cell.width === 0) {
      continue;
    }
    text += cell.glyph;
  }
  return text.replace(/ +$/u, '');
}

function materializeLine(line: ScreenLine): SnapshotLine {
  if (line.snapshot !== null) {
    return line.snapshot;
  }
  const cells = line.cells.slice();
  const snapshot: SnapshotLine = {
    wrapped: line.wrapped,
    text: lineText(cells),
    cells,
  };
  line.snapshot = snapshot;
  return snapshot;
}

function isBlankLine(line: ScreenLine): boolean {
  return line.cells.every((cell) => isBlankCell(cell));
}

interface LogicalCursor {
  readonly offset: number;
  readonly pendingWrap: boolean;
}

interface WrappedLogicalLine {
  readonly lines: ScreenLine[];
  readonly cursor: { row: number; col: number; pendingWrap: boolean } | null;
}

function wrapLogicalLine(
  units: readonly ScreenCell[],
  cols: number,
  firstWrapped: boolean,
  logicalCursor: LogicalCursor | null,
): WrappedLogicalLine {
  let line = createLine(cols, BLANK_CELL, firstWrapped);
  const lines: ScreenLine[] = [line];
  let col = 0;
  let consumed = 0;
  let cursor: WrappedLogicalLine['cursor'] = null;

  const startRow = (): void => {
    line = createLine(cols, BLANK_CELL, true);
    lines.push(line);
    col = 0;
  };

  for (const unit of units) {
    const width = unit.width === 2 && cols >= 2 ? 2 : 1;
    if (col + width > cols) {
      if (col < cols) {
        line.cells[col] = WRAP_PADDING_CELL;
      }
      startRow();
    }
    if (
      logicalCursor !== null &&
      cursor === null &&
      logicalCursor.offset >= consumed &&
      logicalCursor.offset < consumed + width
    ) {
      cursor = { row: lines.length - 1, col, pendingWrap: false };
    }
    line.cells[col] = width === unit.width ? unit : { ...unit, width };
    if (width === 2) {
      line.cells[col + 1] = { glyph: '', width: 0, style: unit.style };
    }
    col += width;
    consumed += width;
  }

  if (logicalCursor !== null && cursor === null) {
    let row = lines.length - 1;
    let cursorCol = col + Math.max(0, logicalCursor.offset - consumed);
    if (cursorCol === cols && (logicalCursor.pendingWrap || logicalCursor.offset === consumed)) {
      cursor = { row, col: cols - 1, pendingWrap: true };
    } else {
      while (cursorCol >= cols) {
        cursorCol -= cols;
        row += 1;
      }
      while (lines.length <= row) {
        startRow();
      }
      cursor = { row, col: cursorCol, pendingWrap: false };
    }
  }

  return { lines, cursor };
}

class ScreenBuffer {
  cols: number;
  rows: number;
  lines: ScreenLine[];
  scrollback: ScreenLine[] = [];
  cursor: ScreenCursor = { row: 0, col: 0 };
  pendingWrap = false;
  scrollTop = 0;
  scrollBottom: number;
  private readonly scrollbackLimit: number;

  constructor(cols: number, rows: number, scrollbackLimit: number) {
    this.cols = cols;
    this.rows = rows;
    this.scrollbackLimit = scrollbackLimit;
    this.lines = Array.from({ length: rows }, () => createLine(cols, BLANK_CELL));
    this.scrollBottom = rows - 1;
  }

  reset(): void {
    this.lines = Array.from({ length: this.rows }, () => createLine(this.cols, BLANK_CELL));
    this.scrollback = [];
    this.cursor = { row: 0, col: 0 };
    this.pendingWrap = false;
    this.resetScrollRegion();
  }

  clearScreen(fill: ScreenCell): void {
    this.lines = Array.from({ length: this.rows }, () => createLine(this.cols, fill));
  }

  resetScrollRegion(): void {
    this.scrollTop = 0;
    this.scrollBottom = this.rows - 1;
  }

  setScrollRegion(topOneBased: number, bottomOneBased: number): boolean {
    const top = Math.max(1, Math.min(this.rows, topOneBased)) - 1;
    const bottom = Math.max(1, Math.min(this.rows, bottomOneBased)) - 1;
    if (top >= bottom) {
      return false;
    }
    this.scrollTop = top;
    this.scrollBottom = bottom;
    return true;
  }

  currentLine(): ScreenLine {
    const line = this.lines[this.cursor.row];
    if (line !== undefined) {
      return line;
    }
    const replacement = createLine(this.cols, BLANK_CELL);
    this.lines[this.cursor.row] = replacement;
    return replacement;
  }

  touch(line: ScreenLine): void {
    line.snapshot = null;
  }

  // Blanks the other half of any wide glyph that [start, end) would cut.
  releaseWideNeighbours(line: ScreenLine, start: number, end: number): void {
    if (start > 0 && start < this.cols && cellAt(line, start).width === 0) {
      line.cells[start - 1] = BLANK_CELL;
    }
    if (end > 0 && end < this.cols && cellAt(line, end - 1).width === 2) {
      line.cells[end] = BLANK_CELL;
    }
  }

  lineFeed(fill: ScreenCell): void {
    if (this.cursor.row === this.scrollBottom) {
      this.scrollUp(1, fill);
      return;
    }
    if (this.cursor.row < this.rows - 1) {
      this.cursor.row += 1;
    }
  }

  reverseIndex(fill: ScreenCell): void {
    if (this.cursor.row === this.scrollTop) {
      this.scrollDown(1, fill);
      return;
    }
    if (this.cursor.row > 0) {
      this.cursor.row -= 1;
    }
  }

  scrollUp(count: number, fill: ScreenCell): void {
    const top = this.scrollTop;
    const bottom = this.scrollBottom;
    const lines = Math.max(1, Math.min(count, bottom - top + 1));
    const promote = top === 0 && bottom === this.rows - 1 && this.scrollbackLimit > 0;
    for (let idx = 0; idx < lines; idx += 1) {
      const [removed] = this.lines.splice(top, 1);
      if (removed !== undefined && promote) {
        this.pushScrollback(removed);
      }
      this.lines.splice(bottom, 0, createLine(this.cols, fill));
    }
  }

  scrollDown(count: number, fill: ScreenCell): void {
    const top = this.scrollTop;
    const bottom = this.scrollBottom;
    const lines = Math.max(1, Math.min(count, bottom - top + 1));
    for (let idx = 0; idx < lines; idx += 1) {
      this.lines.splice(bottom, 1);
      this.lines.splice(top, 0, createLine(this.cols, fill));
    }
  }

  putGlyph(glyph: string, width: 1 | 2, style: CellStyle, autowrap: boolean, fill: ScreenCell): void {
    if (this.pendingWrap) {
      this.pendingWrap = false;
      if (autowrap) {
        this.wrapToNextLine(fill);
      }
    }
    const glyphWidth = width === 2 && this.cols >= 2 ? 2 : 1;
    if (glyphWidth === 2 && this.cursor.col === this.cols - 1) {
      if (autowrap) {
        const line = this.currentLine();
        this.releaseWideNeighbours(line, this.cursor.col, this.cursor.col + 1);
        line.cells[this.cursor.col] = WRAP_PADDING_CELL;
        this.touch(line);
        this.wrapToNextLine(fill);
      } else {
        this.cursor.col = this.cols - 2;
      }
    }

    const line = this.currentLine();
    const col = this.cursor.col;
    this.releaseWideNeighbours(line, col, col + glyphWidth);
    line.cells[col] = { glyph, width: glyphWidth, style };
    if (glyphWidth === 2) {
      line.cells[col + 1] = { glyph: '', width: 0, style };
    }
    this.touch(line);

    const nextCol = col + glyphWidth;
    if (nextCol >= this.cols) {
      this.cursor.col = this.cols - 1;
      this.pendingWrap = autowrap;
      return;
    }
    this.cursor.col = nextCol;
  }

  appendCombining(mark: string): void {
    let target = this.pendingWrap ? this.cursor.col : this.cursor.col - 1;
    const line = this.currentLine();
    if (target >= 0 && cellAt(line, target).width === 0) {
      target -= 1;
    }
    if (target < 0) {
      return;
    }
    const cell = cellAt(line, target);
    if (cell.glyph.length === 0) {
      return;
    }
    line.cells[target] = { ...cell, glyph: `${cell.glyph}${mark}` };
    this.touch(line);
  }

  eraseCells(line: ScreenLine, start: number, end: number, fill: ScreenCell): void {
    const from = Math.max(0, Math.min(this.cols, start));
    const to = Math.max(from, Math.min(this.cols, end));
    if (from === to) {
      return;
    }
    this.releaseWideNeighbours(line, from, to);
    for (let col = from; col < to; col += 1) {
      line.cells[col] = fill;
    }
    this.touch(line);
  }

  eraseDisplay(mode: number, fill: ScreenCell): boolean {
    if (mode === 0) {
      this.eraseCells(this.currentLine(), this.cursor.col, this.cols, fill);
      for (let row = this.cursor.row + 1; row < this.rows; row += 1) {
        this.lines[row] = createLine(this.cols, fill);
      }
      return true;
    }
    if (mode === 1) {
      for (let row = 0; row < this.cursor.row; row += 1) {
        this.lines[row] = createLine(this.cols, fill);
      }
      this.eraseCells(this.currentLine(), 0, this.cursor.col + 1, fill);
      return true;
    }
    if (mode === 2) {
      this.clearScreen(fill);
      return true;
    }
    if (mode === 3) {
      this.scrollback = [];
      return true;
    }
    return false;
  }

  eraseLine(mode: number, fill: ScreenCell): boolean {
    const line = this.currentLine();
    if (mode === 0) {
      this.eraseCells(line, this.cursor.col, this.cols, fill);
      return true;
    }
    if (mode === 1) {
      this.eraseCells(line, 0, this.cursor.col + 1, fill);
      return true;
    }
    if (mode === 2) {
      this.eraseCells(line, 0, this.cols, fill);
      return true;
    }
    return false;
  }

  insertLines(count: number, fill: ScreenCell): void {
    if (this.cursor.row < this.scrollTop || this.cursor.row > this.scrollBottom) {
      return;
    }
    const lines = Math.max(1, Math.min(count, this.scrollBottom - this.cursor.row + 1));
    for (let idx = 0; idx < lines; idx += 1) {
      this.lines.splice(this.scrollBottom, 1);
      this.lines.splice(this.cursor.row, 0, createLine(this.cols, fill));
    }
    this.cursor.col = 0;
  }

  deleteLines(count: number, fill: ScreenCell): void {
    if (this.cursor.row < this.scrollTop || this.cursor.row > this.scrollBottom) {
      return;
    }
    const lines = Math.max(1, Math.min(count, this.scrollBottom - this.cursor.row + 1));
    for (let idx = 0; idx < lines; idx += 1) {
      this.lines.splice(this.cursor.row, 1);
      this.lines.splice(this.scrollBottom, 0, createLine(this.cols, fill));
    }
    this.cursor.col = 0;
  }

  insertChars(count: number, fill: ScreenCell): void {
    const line = this.currentLine();
    const col = this.cursor.col;
    const chars = Math.max(1, Math.min(count, this.cols - col));
    this.releaseWideNeighbours(line, col, col);
    line.cells.splice(col, 0, ...Array.from({ length: chars }, () => fill));
    line.cells.length = this.cols;
    if (cellAt(line, this.cols - 1).width === 2) {
      line.cells[this.cols - 1] = BLANK_CELL;
    }
    this.touch(line);
  }

  deleteChars(count: number, fill: ScreenCell): void {
    const line = this.currentLine();
    const col = this.cursor.col;
    const chars = Math.max(1, Math.min(count, this.cols - col));
    this.releaseWideNeighbours(line, col, col + chars);
    line.cells.splice(col, chars);
    for (let idx = 0; idx < chars; idx += 1) {
      line.cells.push(fill);
    }
    if (cellAt(line, col).width === 0) {
      line.cells[col] = BLANK_CELL;
    }
    this.touch(line);
  }

  /**
   * Rewraps scrollback and screen at a new size. Rows are joined into logical
   * lines by their wrap flags, trailing blanks dropped, and re-split at `cols`;
   * the cursor keeps its offset within its logical line.
   */
  reflow(cols: number, rows: number): void {
    const allLines = [...this.scrollback, ...this.lines];
    const cursorIndex = this.scrollback.length + this.cursor.row;

    const logicalLines: Array<{ units: ScreenCell[]; firstWrapped: boolean }> = [];
    let cursorLogicalIndex = 0;
    let cursorOffset = 0;
    let runningWidth = 0;

    allLines.forEach((line, index) => {
      const current = logicalLines[logicalLines.length - 1];
      let target = current;
      if (target === undefined || !line.wrapped) {
        target = { units: [], firstWrapped: line.wrapped };
        logicalLines.push(target);
        runningWidth = 0;
      }
      const cursorCol = this.pendingWrap ? this.cursor.col + 1 : this.cursor.col;
      for (let col = 0; col < line.cells.length; col += 1) {
        if (index === cursorIndex && col === cursorCol) {
          cursorLogicalIndex = logicalLines.length - 1;
          cursorOffset = runningWidth;
        }
        const cell = cellAt(line, col);
        if (cell.width === 0 || cell === WRAP_PADDING_CELL) {
          continue;
        }
        target.units.push(cell);
        runningWidth += cell.width;
      }
      if (index === cursorIndex && cursorCol >= line.cells.length) {
        cursorLogicalIndex = logicalLines.length - 1;
        cursorOffset = runningWidth;
      }
    });

    const rebuilt: ScreenLine[] = [];
    let cursorRow = 0;
    let cursorCol = 0;
    let pendingWrap = false;
    logicalLines.forEach((logical, index) => {
      const units = logical.units;
      let end = units.length;
      while (end > 0) {
        const unit = units[end - 1];
        if (unit === undefined || !isBlankCell(unit)) {
          break;
        }
        end -= 1;
      }
      const isCursorLine = index === cursorLogicalIndex;
      const wrapped = wrapLogicalLine(
        units.slice(0, end),
        cols,
        logical.firstWrapped,
        isCursorLine ? { offset: cursorOffset, pendingWrap: this.pendingWrap } : null,
      );
      if (isCursorLine && wrapped.cursor !== null) {
        cursorRow = rebuilt.length + wrapped.cursor.row;
        cursorCol = wrapped.cursor.col;
        pendingWrap = wrapped.cursor.pendingWrap;
      }
      rebuilt.push(...wrapped.lines);
    });

    while (rebuilt.length - 1 > cursorRow) {
      const last = rebuilt[rebuilt.length - 1];
      if (last === undefined || !isBlankLine(last)) {
        break;
      }
      rebuilt.pop();
    }

    const split = Math.max(0, rebuilt.length - rows);
    const scrollback = rebuilt.slice(0, split);
    const screen = rebuilt.slice(split);
    while (screen.length < rows) {
      screen.push(createLine(cols, BLANK_CELL));
    }
    const overflow = Math.max(0, scrollback.length - this.scrollbackLimit);

    this.cols = cols;
    this.rows = rows;
    this.scrollback = overflow > 0 ? scrollback.slice(overflow) : scrollback;
    this.lines = screen;
    if (cursorRow < split) {
      this.cursor = { row: 0, col: 0 };
      this.pendingWrap = false;
    } else {
      this.cursor = { row: Math.min(rows - 1, cursorRow - split), col: Math.min(cols - 1, cursorCol) };
      this.pendingWrap = pendingWrap;
    }
    this.resetScrollRegion();
  }

  // Resizes without rewrapping: rows above the cursor are dropped when shrinking.
  clip(cols: number, rows: number): void {
    const excess = Math.max(0, this.cursor.row - (rows - 1));
    const kept = this.lines.slice(excess, excess + rows).map((line): ScreenLine => {
      const cells = line.cells.slice(0, cols);
      while (cells.length < cols) {
        cells.push(BLANK_CELL);
      }
      const last = cells[cols - 1];
      if (last !== undefined && last.width === 2) {
        cells[cols - 1] = BLANK_CELL;
      }
      return { cells, wrapped: line.wrapped, snapshot: null };
    });
    while (kept.length < rows) {
      kept.push(createLine(cols, BLANK_CELL));
    }
    this.cols = cols;
    this.rows = rows;
    this.lines = kept;
    const nextCol = Math.min(cols - 1, this.cursor.col);
    this.pendingWrap = this.pendingWrap && nextCol === this.cursor.col;
    this.cursor = { row: this.cursor.row - excess, col: nextCol };
    this.resetScrollRegion();
  }

  private wrapToNextLine(fill: ScreenCell): void {
    this.cursor.col = 0;
    this.lineFeed(fill);
    const line = this.currentLine();
    if (!line.wrapped) {
      line.wrapped = true;
      this.touch(line);
    }
  }

  private pushScrollback(line: ScreenLine): void {
    this.scrollback.push(line);
    const overflow = this.scrollback.length - this.scrollbackLimit;
    if (overflow > 0) {
      this.scrollback.splice(0, overflow);
    }
  }
}

interface ParsedParams {
  readonly values: readonly number[];
  readonly groups: readonly (readonly number[])[];
}

// Empty parameters parse as -1 so callers can apply their own default.
function parseParams(raw: string): ParsedParams | null {
  if (!/^[\d;:]*$/u.test(raw)) {
    return null;
  }
  if (raw.length === 0) {
    return { values: [], groups: [] };
  }
  const groups = raw
    .split(';')
    .map((part) => part.split(':').map((sub) => (sub.length === 0 ? -1 : Number(sub))));
  return {
    values: groups.map((group) => group[0] ?? -1),
    groups,
  };
}

function paramOr(params: ParsedParams, index: number, fallback: number): number {
  const value = params.values[index];
  if (value === undefined || value < 0) {
    return fallback;
  }
  return value;
}

function countParam(params: ParsedParams, index = 0): number {
  return Math.max(1, paramOr(params, index, 1));
}

function indexedColor(index: number): TerminalColor {
  return { kind: 'indexed', index: clampColor(index) };
}

function extendedColor(group: readonly number[]): TerminalColor | null {
  const mode = group[1];
  if (mode === 5) {
    const index = group[2];
    return index === undefined || index < 0 ? null : indexedColor(index);
  }
  if (mode === 2) {
    const channels = group.slice(-3);
    if (group.length < 5 || channels.some((channel) => channel < 0)) {
      return null;
    }
    const [r = 0, g = 0, b = 0] = channels;
    return { kind: 'rgb', r: clampColor(r), g: clampColor(g), b: clampColor(b) };
  }
  return null;
}

function applySgrParams(style: CellStyle, params: ParsedParams): CellStyle {
  let next: CellStyle = style;
  const values = params.values.length === 0 ? [0] : params.values;

  for (let idx = 0; idx < values.length; idx += 1) {
    const group = params.groups[idx] ?? [];
    const param = Math.max(0, values[idx] ?? 0);

    if (group.length > 1) {
      if (param === 38 || param === 48) {
        const color = extendedColor(group);
        if (color !== null) {
          next = param === 38 ? { ...next, fg: color } : { ...next, bg: color };
        }
      } else if (param === 4) {
        next = { ...next, underline: (group[1] ?? 0) > 0 };
      }
      continue;
    }

    if (param === 0) {
      next = DEFAULT_CELL_STYLE;
    } else if (param === 1) {
      next = { ...next, bold: true };
    } else if (param === 2) {
      next = { ...next, dim: true };
    } else if (param === 3) {
      next = { ...next, italic: true };
    } else if (param === 4) {
      next = { ...next, underline: true };
    } else if (param === 7) {
      next = { ...next, inverse: true };
    } else if (param === 22) {
      next = { ...next, bold: false, dim: false };
    } else if (param === 23) {
      next = { ...next, italic: false };
    } else if (param === 24) {
      next = { ...next, underline: false };
    } else if (param === 27) {
      next = { ...next, inverse: false };
    } else if (param >= 30 && param <= 37) {
      next = { ...next, fg: indexedColor(param - 30) };
    } else if (param === 39) {
      next = { ...next, fg: DEFAULT_COLOR };
    } else if (param >= 40 && param <= 47) {
      next = { ...next, bg: indexedColor(param - 40) };
    } else if (param === 49) {
      next = { ...next, bg: DEFAULT_COLOR };
    } else if (param >= 90 && param <= 97) {
      next = { ...next, fg: indexedColor(8 + param - 90) };
    } else if (param >= 100 && param <= 107) {
      next = { ...next, bg: indexedColor(8 + param - 100) };
    } else if (param === 38 || param === 48) {
      const mode = values[idx + 1];
      let color: TerminalColor | null = null;
      if (mode === 5) {
        color = extendedColor([param, 5, values[idx + 2] ?? -1]);
        idx += 2;
      } else if (mode === 2) {
        color = extendedColor([param, 2, values[idx + 2] ?? -1, values[idx + 3] ?? -1, values[idx + 4] ?? -1]);
        idx += 4;
      } else {
        idx += 1;
      }
      if (color !== null) {
        next = param === 38 ? { ...next, fg: color } : { ...next, bg: color };
      }
    }
  }

  return next;
}

export class ScreenModel {
  private readonly primary: ScreenBuffer;
  private readonly alternate: ScreenBuffer;
  private readonly capabilities: TerminalCapabilities;
  private readonly parser: MutableParserState = createParserState();
  private readonly actions: ParserActions;
  private activeScreen: ActiveScreen = 'primary';
  private style: CellStyle = DEFAULT_CELL_STYLE;
  private cursorVisible = true;
  private autowrap = true;
  private savedCursor: SavedCursor | null = null;
  private alternateSavedCursor: SavedCursor | null = null;
  private title = '';
  private unrecognizedSequences = 0;
  private malformedUtf8 = 0;

  constructor(options: ScreenModelOptions) {
    const cols = Math.max(1, Math.floor(options.cols));
    const rows = Math.max(1, Math.floor(options.rows));
    const scrollbackLines = Math.max(0, Math.floor(options.scrollbackLines ?? DEFAULT_SCROLLBACK_LINES));
    this.primary = new ScreenBuffer(cols, rows, scrollbackLines);
    this.alternate = new ScreenBuffer(cols, rows, 0);
    this.capabilities = options.capabilities ?? ALL_CAPABILITIES;
    this.actions = {
      print: (char, codePoint) => {
        this.print(char, codePoint);
      },
      execute: (code) => {
        this.execute(code);
      },
      escDispatch: (intermediates, final) => {
        this.escDispatch(intermediates, final);
      },
      csiDispatch: (params, intermediates, final) => {
        this.csiDispatch(params, intermediates, final);
      },
      stringDispatch: (kind, payload) => {
        this.stringDispatch(kind, payload);
      },
      ignored: () => {
        this.unrecognizedSequences += 1;
      },
      malformedUtf8: () => {
        this.malformedUtf8 += 1;
      },
    };
  }

  get cols(): number {
    return this.primary.cols;
  }

  get rows(): number {
    return this.primary.rows;
  }

  feed(data: Uint8Array | string): void {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    for (const byte of bytes) {
      advanceParser(this.parser, byte, this.actions);
    }
  }

  snapshot(): ScreenSnapshot {
    const buffer = this.buffer();
    const richLines = buffer.lines.map((line) => materializeLine(line));
    return {
      cols: buffer.cols,
      rows: buffer.rows,
      activeScreen: this.activeScreen,
      cursor: {
        row: buffer.cursor.row,
        col: buffer.cursor.col,
        visible: this.cursorVisible,
      },
      title: this.title,
      lines: richLines.map((line) => line.text),
      richLines,
      scrollback: buffer.scrollback.map((line) => materializeLine(line)),
    };
  }

  /** Returns false and leaves the model untouched for non-positive or non-integer sizes. */
  resize(cols: number, rows: number): boolean {
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols <= 0 || rows <= 0) {
      return false;
    }
    if (cols === this.cols && rows === this.rows) {
      return true;
    }
    this.primary.reflow(cols, rows);
    this.alternate.clip(cols, rows);
    return true;
  }

  parserState(): ParserState {
    return copyParserState(this.parser);
  }

  diagnostics(): ScreenDiagnostics {
    return {
      unrecognizedSequences: this.unrecognizedSequences,
      malformedUtf8: this.malformedUtf8,
    };
  }

  /** Plain text of the last `lineCount` non-empty-terminated rows of the active screen. */
  tailText(lineCount: number): string {
    const buffer = this.buffer();
    const texts = [...buffer.scrollback, ...buffer.lines].map((line) => materializeLine(line).text);
    let end = texts.length;
    while (end > 0 && (texts[end - 1] ?? '').trim().length === 0) {
      end -= 1;
    }
    const start = Math.max(0, end - Math.max(0, Math.floor(lineCount)));
    return texts.slice(start, end).join('\n');
  }

  reset(): void {
    resetParserState(this.parser);
    this.hardReset();
    this.unrecognizedSequences = 0;
    this.malformedUtf8 = 0;
  }

  private buffer(): ScreenBuffer {
    return this.activeScreen === 'primary' ? this.primary : this.alternate;
  }

  private fill(): ScreenCell {
    return eraseCellFor(this.style);
  }

  private print(char: string, codePoint: number): void {
    const buffer = this.buffer();
    const width = measureCodePointWidth(codePoint);
    if (width === 0) {
      buffer.appendCombining(char);
      return;
    }
    buffer.putGlyph(char, width, this.style, this.autowrap, this.fill());
  }

  private execute(code: number): void {
    const buffer = this.buffer();
    switch (code) {
      case 0x08:
        buffer.cursor.col = Math.max(0, buffer.cursor.col - 1);
        buffer.pendingWrap = false;
        return;
      case 0x09:
        buffer.cursor.col = Math.min(
          buffer.cols - 1,
          (Math.floor(buffer.cursor.col / TAB_WIDTH) + 1) * TAB_WIDTH,
        );
        buffer.pendingWrap = false;
        return;
      case 0x0a:
      case 0x0b:
      case 0x0c:
        buffer.lineFeed(this.fill());
        buffer.pendingWrap = false;
        return;
      case 0x0d:
        buffer.cursor.col = 0;
        buffer.pendingWrap = false;
        return;
      default:
        return;
    }
  }

  private escDispatch(intermediates: string, final: string): void {
    const buffer = this.buffer();
    if (intermediates.length > 0) {
      if (intermediates.length === 1 && '()*+-./'.includes(intermediates)) {
        return;
      }
      this.unrecognizedSequences += 1;
      return;
    }
    switch (final) {
      case '7':
        this.savedCursor = this.captureCursor();
        return;
      case '8':
        this.restoreCursor(this.savedCursor);
        return;
      case 'D':
        buffer.lineFeed(this.fill());
        buffer.pendingWrap = false;
        return;
      case 'E':
        buffer.cursor.col = 0;
        buffer.lineFeed(this.fill());
        buffer.pendingWrap = false;
        return;
      case 'M':
        buffer.reverseIndex(this.fill());
        buffer.pendingWrap = false;
        return;
      case 'c':
        this.hardReset();
        return;
      case '=':
      case '>':
        return;
      default:
        this.unrecognizedSequences += 1;
    }
  }

  private csiDispatch(rawParams: string, intermediates: string, final: string): void {
    const marker = /^[<=>?]/u.test(rawParams) ? rawParams.charAt(0) : '';
    const params = parseParams(marker.length > 0 ? rawParams.slice(1) : rawParams);
    if (params === null) {
      this.unrecognizedSequences += 1;
      return;
    }

    if (intermediates.length > 0) {
      // DECSCUSR cursor shape: accepted, not modelled.
      if (intermediates === ' ' && final === 'q' && marker.length === 0) {
        return;
      }
      this.unrecognizedSequences += 1;
      return;
    }

    if (marker === '?') {
      if (final === 'h' || final === 'l') {
        this.applyPrivateModes(params.values, final === 'h');
        return;
      }
      this.unrecognizedSequences += 1;
      return;
    }
    if (marker.length > 0) {
      this.unrecognizedSequences += 1;
      return;
    }
    if (final !== 'm' && rawParams.includes(':')) {
      this.unrecognizedSequences += 1;
      return;
    }

    if (!this.applyCsi(params, final)) {
      this.unrecognizedSequences += 1;
    }
  }

  private applyCsi(params: ParsedParams, final: string): boolean {
    const buffer = this.buffer();
    const cursor = buffer.cursor;
    const fill = this.fill();

    switch (final) {
      case 'm':
        this.style = applySgrParams(this.style, params);
        return true;
      case 'A': {
        const top = cursor.row >= buffer.scrollTop ? buffer.scrollTop : 0;
        cursor.row = Math.max(top, cursor.row - countParam(params));
        break;
      }
      case 'B': {
        const bottom = cursor.row <= buffer.scrollBottom ? buffer.scrollBottom : buffer.rows - 1;
        cursor.row = Math.min(bottom, cursor.row + countParam(params));
        break;
      }
      case 'C':
        cursor.col = Math.min(buffer.cols - 1, cursor.col + countParam(params));
        break;
      case 'D':
        cursor.col = Math.max(0, cursor.col - countParam(params));
        break;
      case 'E':
        cursor.row = Math.min(buffer.rows - 1, cursor.row + countParam(params));
        cursor.col = 0;
        break;
      case 'F':
        cursor.row = Math.max(0, cursor.row - countParam(params));
        cursor.col = 0;
        break;
      case 'G':
        cursor.col = Math.min(buffer.cols - 1, countParam(params) - 1);
        break;
      case 'H':
      case 'f':
        cursor.row = Math.min(buffer.rows - 1, countParam(params, 0) - 1);
        cursor.col = Math.min(buffer.cols - 1, countParam(params, 1) - 1);
        break;
      case 'd':
        cursor.row = Math.min(buffer.rows - 1, countParam(params) - 1);
        break;
      case 'J':
        return buffer.eraseDisplay(paramOr(params, 0, 0), fill);
      case 'K':
        return buffer.eraseLine(paramOr(params, 0, 0), fill);
      case 'S':
        buffer.scrollUp(countParam(params), fill);
        return true;
      case 'T':
        buffer.scrollDown(countParam(params), fill);
        return true;
      case 'L':
        if (!this.capabilities.insertDelete) {
          return false;
        }
        buffer.insertLines(countParam(params), fill);
        break;
      case 'M':
        if (!this.capabilities.insertDelete) {
          return false;
        }
        buffer.deleteLines(countParam(params), fill);
        break;
      case '@':
        if (!this.capabilities.insertDelete) {
          return false;
        }
        buffer.insertChars(countParam(params), fill);
        break;
      case 'P':
        if (!this.capabilities.insertDelete) {
          return false;
        }
        buffer.deleteChars(countParam(params), fill);
        break;
      case 'X':
        buffer.eraseCells(buffer.currentLine(), cursor.col, cursor.col + countParam(params), fill);
        break;
      case 'r': {
        if (!this.capabilities.scrollRegion) {
          return false;
        }
        const top = paramOr(params, 0, 1);
        const bottom = paramOr(params, 1, buffer.rows);
        if (buffer.setScrollRegion(Math.max(1, top), bottom === 0 ? buffer.rows : bottom)) {
          cursor.row = 0;
          cursor.col = 0;
        }
        break;
      }
      case 's':
        if (params.values.length > 0) {
          return false;
        }
        this.savedCursor = this.captureCursor();
        return true;
      case 'u':
        if (params.values.length > 0) {
          return false;
        }
        this.restoreCursor(this.savedCursor);
        return true;
      default:
        return false;
    }
    buffer.pendingWrap = false;
    return true;
  }

  private applyPrivateModes(values: readonly number[], enabled: boolean): void {
    for (const value of values) {
      if (value === 25) {
        this.cursorVisible = enabled;
        continue;
      }
      if (value === 7) {
        this.autowrap = enabled;
        if (!enabled) {
          this.buffer().pendingWrap = false;
        }
        continue;
      }
      if (value === 1049 || value === 1047 || value === 47) {
        if (!this.capabilities.alternateScreen) {
          this.unrecognizedSequences += 1;
          continue;
        }
        this.switchScreen(value, enabled);
        continue;
      }
      if (TOLERATED_PRIVATE_MODES.has(value)) {
        continue;
      }
      this.unrecognizedSequences += 1;
    }
  }

  private switchScreen(mode: number, enabled: boolean): void {
    const target: ActiveScreen = enabled ? 'alternate' : 'primary';
    if (target === this.activeScreen) {
      return;
    }
    if (enabled) {
      if (mode === 1049) {
        this.alternateSavedCursor = this.captureCursor();
        this.alternate.reset();
      } else {
        if (mode === 1047) {
          this.alternate.clearScreen(BLANK_CELL);
        }
        this.alternate.cursor = { ...this.primary.cursor };
        this.alternate.pendingWrap = false;
        this.alternate.resetScrollRegion();
      }
      this.activeScreen = 'alternate';
      return;
    }

    this.activeScreen = 'primary';
    if (mode === 1049) {
      this.restoreCursor(this.alternateSavedCursor);
      this.alternateSavedCursor = null;
      return;
    }
    this.primary.cursor = {
      row: Math.min(this.primary.rows - 1, this.alternate.cursor.row),
      col: Math.min(this.primary.cols - 1, this.alternate.cursor.col),
    };
    this.primary.pendingWrap = false;
    if (mode === 1047) {
      this.alternate.clearScreen(BLANK_CELL);
    }
  }

  private stringDispatch(kind: StringSequenceKind, payload: string): void {
    if (kind !== 'osc') {
      this.unrecognizedSequences += 1;
      return;
    }
    const separator = payload.indexOf(';');
    const command = separator >= 0 ? payload.slice(0, separator) : payload;
    const value = separator >= 0 ? payload.slice(separator + 1) : '';
    if (command === '0' || command === '2') {
      this.title = value.slice(0, MAX_TITLE_LENGTH);
      return;
    }
    if (command === '1') {
      return;
    }
    this.unrecognizedSequences += 1;
  }

  private captureCursor(): SavedCursor {
    const buffer = this.buffer();
    return {
      row: buffer.cursor.row,
      col: buffer.cursor.col,
      style: this.style,
      pendingWrap: buffer.pendingWrap,
    };
  }

  private restoreCursor(saved: SavedCursor | null): void {
    const buffer = this.buffer();
    if (saved === null) {
      buffer.cursor = { row: 0, col: 0 };
      buffer.pendingWrap = false;
      return;
    }
    buffer.cursor = {
      row: Math.min(buffer.rows - 1, saved.row),
      col: Math.min(buffer.cols - 1, saved.col),
    };
    buffer.pendingWrap = saved.pendingWrap && buffer.cursor.col === buffer.cols - 1;
    this.style = saved.style;
  }

  private hardReset(): void {
    this.primary.reset();
    this.alternate.reset();
    this.activeScreen = 'primary';
    this.style = DEFAULT_CELL_STYLE;
    this.cursorVisible = true;
    this.autowrap = true;
    this.savedCursor = null;
    this.alternateSavedCursor = null;
    this.title = '';
  }
}
