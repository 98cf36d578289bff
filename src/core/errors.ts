export type CiabErrorKind =
  | 'pty-creation-failed'
  | 'tmux-not-installed'
  | 'session-exists'
  | 'session-not-found'
  | 'attach-failed'
  | 'session-busy'
  | 'invalid-transition'
  | 'invalid-label'
  | 'transport-io'
  | 'connection-failed'
  | 'protocol-error';

export interface CiabErrorShape {
  readonly kind: CiabErrorKind;
  readonly message: string;
  readonly sessionName: string | null;
}

interface CiabErrorOptions {
  readonly sessionName?: string;
  readonly cause?: unknown;
}

export class CiabError extends Error {
  readonly kind: CiabErrorKind;
  readonly sessionName: string | null;

  constructor(kind: CiabErrorKind, message: string, options: CiabErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CiabError';
    this.kind = kind;
    this.sessionName = options.sessionName ?? null;
  }
}

export class PtyCreationFailedError extends CiabError {
  constructor(detail: string, options: CiabErrorOptions = {}) {
    super('pty-creation-failed', `pty creation failed: ${detail}`, options);
  }
}

export class TmuxNotInstalledError extends CiabError {
  constructor(options: CiabErrorOptions = {}) {
    super('tmux-not-installed', 'tmux is not installed on this host', options);
  }
}

export class SessionExistsError extends CiabError {
  constructor(sessionName: string, detail?: string) {
    super(
      'session-exists',
      detail === undefined
        ? `session already exists: ${sessionName}`
        : `session already exists: ${sessionName} (${detail})`,
      { sessionName },
    );
  }
}

export class SessionNotFoundError extends CiabError {
  constructor(sessionName: string) {
    super('session-not-found', `session not found: ${sessionName}`, { sessionName });
  }
}

export class AttachFailedError extends CiabError {
  constructor(sessionName: string, detail: string, cause?: unknown) {
    super('attach-failed', `attach failed for ${sessionName}: ${detail}`, {
      sessionName,
      cause,
    });
  }
}

export class SessionBusyError extends CiabError {
  constructor(sessionName: string, inFlight: string) {
    super('session-busy', `session ${sessionName} is busy (${inFlight} in progress)`, {
      sessionName,
    });
  }
}

export class InvalidTransitionError extends CiabError {
  constructor(sessionName: string, from: string, requested: string) {
    super('invalid-transition', `cannot ${requested} session ${sessionName} while ${from}`, {
      sessionName,
    });
  }
}

export class InvalidLabelError extends CiabError {
  constructor(label: string, detail: string) {
    super('invalid-label', `invalid session label ${JSON.stringify(label)}: ${detail}`);
  }
}

export class ConnectionFailedError extends CiabError {
  constructor(endpoint: string, detail: string, options: CiabErrorOptions = {}) {
    super('connection-failed', `connection to ${endpoint} failed: ${detail}`, options);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function wrapTransportError(
  sessionName: string,
  context: string,
  error: unknown,
): CiabError {
  if (error instanceof CiabError) {
    return error;
  }
  return new CiabError('transport-io', `${context}: ${errorMessage(error)}`, {
    sessionName,
    cause: error,
  });
}

export function toCiabErrorShape(error: unknown): CiabErrorShape {
  if (error instanceof CiabError) {
    return {
      kind: error.kind,
      message: error.message,
      sessionName: error.sessionName,
    };
  }
  return {
    kind: 'transport-io',
    message: errorMessage(error),
    sessionName: null,
  };
}
