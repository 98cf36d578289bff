import type { ActivityMarkers } from '../config/config-core.ts';

export type ActivityState = 'idle' | 'running' | 'waiting-for-input' | 'unknown';

export interface ActivityDetectorOptions {
  readonly markers: ActivityMarkers;
  readonly historyLines: number;
}

function isFinalByte(char: string): boolean {
  return char >= '@' && char <= '~';
}

export function stripAnsiSequences(value: string): string {
  let output = '';
  let index = 0;
  while (index < value.length) {
    const char = value.charAt(index);
    if (char !== '\u001b') {
      output += char;
      index += 1;
      continue;
    }
    const introducer = value.charAt(index + 1);
    if (introducer === '[') {
      index += 2;
      while (index < value.length) {
        const nextChar = value.charAt(index);
        index += 1;
        if (isFinalByte(nextChar)) {
          break;
        }
      }
      continue;
    }
    if (introducer === ']' || introducer === 'P' || introducer === '_' || introducer === '^') {
      index += 2;
      while (index < value.length) {
        const nextChar = value.charAt(index);
        if (nextChar === '\u0007') {
          index += 1;
          break;
        }
        if (nextChar === '\u001b' && value.charAt(index + 1) === '\\') {
          index += 2;
          break;
        }
        index += 1;
      }
      continue;
    }
    index += introducer.length > 0 ? 2 : 1;
  }
  return output;
}

/**
 * Returns up to `count` lines from the end of `text`, ANSI-stripped, ignoring
 * trailing blank lines. Walks backwards so the cost depends on `count`, not on
 * the size of the capture.
 */
export function tailNonBlankLines(text: string, count: number): string[] {
  const lines: string[] = [];
  let end = text.length;
  while (end >= 0 && lines.length < count) {
    const start = end === 0 ? 0 : text.lastIndexOf('\n', end - 1) + 1;
    const line = stripAnsiSequences(text.slice(start, end)).replace(/\r$/u, '');
    if (lines.length > 0 || line.trim().length > 0) {
      lines.push(line);
    }
    if (start === 0) {
      break;
    }
    end = start - 1;
  }
  return lines.reverse();
}

function containsAnyMarker(text: string, markers: readonly string[]): boolean {
  for (const marker of markers) {
    if (marker.length > 0 && text.includes(marker)) {
      return true;
    }
  }
  return false;
}

export function classifyActivity(
  capturedText: string,
  options: ActivityDetectorOptions
): ActivityState {
  if (capturedText.length === 0 || options.historyLines <= 0) {
    return 'unknown';
  }
  const tail = tailNonBlankLines(capturedText, options.historyLines).join('\n');
  if (tail.length === 0) {
    return 'unknown';
  }
  if (containsAnyMarker(tail, options.markers.waitingForInput)) {
    return 'waiting-for-input';
  }
  if (containsAnyMarker(tail, options.markers.running)) {
    return 'running';
  }
  if (containsAnyMarker(tail, options.markers.idle)) {
    return 'idle';
  }
  return 'unknown';
}
