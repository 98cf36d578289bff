const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f],
  [0x2329, 0x232a],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1f64f],
  [0x1f680, 0x1f6ff],
  [0x1f900, 0x1faff],
  [0x20000, 0x3fffd],
];

const ZERO_WIDTH_CODE_POINTS = new Set([0x200b, 0x200c, 0x200d, 0x2060, 0xfeff]);

export function isWideCodePoint(codePoint: number): boolean {
  for (const [start, end] of WIDE_RANGES) {
    if (codePoint >= start && codePoint <= end) {
      return true;
    }
  }
  return false;
}

function isZeroWidthCodePoint(codePoint: number, char: string): boolean {
  if (ZERO_WIDTH_CODE_POINTS.has(codePoint)) {
    return true;
  }
  if (codePoint >= 0xfe00 && codePoint <= 0xfe0f) {
    return true;
  }
  return /\p{Mark}/u.test(char);
}

/** Columns occupied by a single code point: 0 for controls and combining marks, else 1 or 2. */
export function measureCodePointWidth(codePoint: number): 0 | 1 | 2 {
  if (codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0)) {
    return 0;
  }
  if (codePoint < 0x300) {
    return 1;
  }
  if (isZeroWidthCodePoint(codePoint, String.fromCodePoint(codePoint))) {
    return 0;
  }
  return isWideCodePoint(codePoint) ? 2 : 1;
}

export function measureDisplayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) {
      continue;
    }
    width += measureCodePointWidth(codePoint);
  }
  return width;
}

export function truncateToDisplayWidth(text: string, width: number): string {
  const safeWidth = Math.max(0, Math.floor(width));
  let output = '';
  let consumed = 0;
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    const charWidth = codePoint === undefined ? 0 : measureCodePointWidth(codePoint);
    if (consumed + charWidth > safeWidth) {
      break;
    }
    output += char;
    consumed += charWidth;
  }
  return output;
}

export function padToDisplayWidth(text: string, width: number): string {
  const truncated = truncateToDisplayWidth(text, width);
  const missing = Math.max(0, width - measureDisplayWidth(truncated));
  return `${truncated}${' '.repeat(missing)}`;
}
