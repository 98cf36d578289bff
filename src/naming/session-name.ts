export const SESSION_NAME_PREFIX = 'ciab_';

const RESERVED_LABEL_CHARS = new Set(['/', '\\', ':', ';', '|', '&', '(', ')', '<', '>', '"', "'"]);

export function sanitizeSessionLabel(label: string): string {
  let sanitized = '';
  for (const char of label) {
    sanitized += RESERVED_LABEL_CHARS.has(char) ? '_' : char;
  }
  return sanitized;
}

export function canonicalSessionName(label: string): string {
  return `${SESSION_NAME_PREFIX}${sanitizeSessionLabel(label)}`;
}

export function isCanonicalSessionName(name: string): boolean {
  return name.startsWith(SESSION_NAME_PREFIX) && !containsReservedLabelChar(name);
}

export function containsReservedLabelChar(value: string): boolean {
  for (const char of value) {
    if (RESERVED_LABEL_CHARS.has(char)) {
      return true;
    }
  }
  return false;
}
