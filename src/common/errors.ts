// errors.ts - Error taxonomy shared by the collaborators and the workflow

/**
 * Missing or invalid credentials, or a malformed rules file. Fatal: raised
 * before any call reaches the device API.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** The remote side rejected the configured credentials. */
export class AuthError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'AuthError';
    this.status = status;
  }
}

/**
 * A collaborator call failed at the network or HTTP level. Components catch
 * it at their boundary and fold it into their own result shape.
 */
export class TransportError extends Error {
  readonly status?: number;
  readonly operation: string;

  constructor(operation: string, message: string, status?: number) {
    super(message);
    this.name = 'TransportError';
    this.operation = operation;
    this.status = status;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
