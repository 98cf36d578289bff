import { stripAnsiSequences } from '../activity/activity-detector.ts';
import type { CaptureOptions } from '../config/config-core.ts';
import { measureDisplayWidth } from './display-width.ts';
import {
  BLANK_CELL,
  isBlankCell,
  styleEqual,
  type CellStyle,
  type ScreenSnapshot,
  type SnapshotLine,
  type TerminalColor,
} from './screen-model.ts';

type CapturePreviewOptions = Pick<
  CaptureOptions,
  'historyLines' | 'includePaneBorders' | 'includeEscapeSequences' | 'joinWrappedLines'
>;

function colorToParams(color: TerminalColor, isBackground: boolean): number[] {
  if (color.kind === 'default') {
    return [isBackground ? 49 : 39];
  }

  if (color.kind === 'indexed') {
    if (color.index >= 0 && color.index <= 7) {
      return [(isBackground ? 40 : 30) + color.index];
    }
    if (color.index >= 8 && color.index <= 15) {
      return [(isBackground ? 100 : 90) + (color.index - 8)];
    }
    return [isBackground ? 48 : 38, 5, color.index];
  }

  return [isBackground ? 48 : 38, 2, color.r, color.g, color.b];
}

export function styleToAnsi(style: CellStyle): string {
  const params: number[] = [0];
  if (style.bold) {
    params.push(1);
  }
  if (style.dim) {
    params.push(2);
  }
  if (style.italic) {
    params.push(3);
  }
  if (style.underline) {
    params.push(4);
  }
  if (style.inverse) {
    params.push(7);
  }
  params.push(...colorToParams(style.fg, false));
  params.push(...colorToParams(style.bg, true));
  return `\u001b[${params.join(';')}m`;
}

export function renderLineAnsi(line: SnapshotLine | undefined, cols: number): string {
  if (line === undefined) {
    return `${styleToAnsi(BLANK_CELL.style)}${' '.repeat(cols)}\u001b[0m`;
  }

  let output = '';
  let previousStyle: CellStyle | null = null;

  for (let col = 0; col < cols; col += 1) {
    const cell = line.cells[col] ?? BLANK_CELL;
    if (cell.width === 0) {
      continue;
    }

    if (previousStyle === null || !styleEqual(previousStyle, cell.style)) {
      output += styleToAnsi(cell.style);
      previousStyle = cell.style;
    }

    output += cell.glyph.length === 0 ? ' ' : cell.glyph;
    if (cell.width === 2) {
      col += 1;
    }
  }

  output += '\u001b[0m';
  return output;
}

export function renderSnapshotAnsiRow(snapshot: ScreenSnapshot, rowIndex: number, cols = snapshot.cols): string {
  return renderLineAnsi(snapshot.richLines[rowIndex], cols);
}

export function renderSnapshotText(snapshot: ScreenSnapshot): string {
  return snapshot.lines.join('\n');
}

function contentWidth(line: SnapshotLine): number {
  let end = line.cells.length;
  while (end > 0) {
    const cell = line.cells[end - 1];
    if (cell === undefined || !isBlankCell(cell)) {
      break;
    }
    end -= 1;
  }
  return end;
}

function rowText(line: SnapshotLine, trimTrailing: boolean): string {
  if (trimTrailing) {
    return line.text;
  }
  let text = '';
  for (const cell of line.cells) {
    if (cell.width !== 0) {
      text += cell.glyph.length === 0 ? ' ' : cell.glyph;
    }
  }
  return text;
}

function rowOutput(line: SnapshotLine, escapes: boolean, trimTrailing: boolean): string {
  if (!escapes) {
    return rowText(line, trimTrailing);
  }
  return renderLineAnsi(line, trimTrailing ? contentWidth(line) : line.cells.length);
}

/**
 * Text preview of the last `historyLines` lines of a session, the way the
 * sampler and `capture` present it.
 */
export function renderCapturePreview(snapshot: ScreenSnapshot, options: CapturePreviewOptions): string {
  const rows = [...snapshot.scrollback, ...snapshot.richLines];
  let end = rows.length;
  while (end > 0 && (rows[end - 1]?.text ?? '').trim().length === 0) {
    end -= 1;
  }

  const entries: string[] = [];
  for (let index = 0; index < end; index += 1) {
    const line = rows[index];
    if (line === undefined) {
      continue;
    }
    const nextWrapped = options.joinWrappedLines && (rows[index + 1]?.wrapped ?? false) && index + 1 < end;
    const output = rowOutput(line, options.includeEscapeSequences, !nextWrapped);
    const previous = entries[entries.length - 1];
    if (options.joinWrappedLines && line.wrapped && previous !== undefined) {
      entries[entries.length - 1] = `${previous}${output}`;
      continue;
    }
    entries.push(output);
  }

  const visible = entries.slice(Math.max(0, entries.length - Math.max(0, options.historyLines)));
  if (!options.includePaneBorders) {
    return visible.join('\n');
  }

  const widths = visible.map((entry) => measureDisplayWidth(stripAnsiSequences(entry)));
  const innerWidth = Math.max(snapshot.cols, ...widths);
  const horizontal = '─'.repeat(innerWidth);
  const body = visible.map((entry, index) => {
    const pad = ' '.repeat(Math.max(0, innerWidth - (widths[index] ?? 0)));
    return `│${entry}${pad}│`;
  });
  return [`┌${horizontal}┐`, ...body, `└${horizontal}┘`].join('\n');
}
