// Fatal before dispatch: bad mode, bad inventory, bad config files
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Resolution produced no targets
export class InventoryError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'InventoryError';
  }
}

// Per-device failures, recorded in the device outcome

export class ConnectFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectFailure';
  }
}

export class AuthFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthFailure';
  }
}

export class ExecFailure extends Error {
  readonly transcript: string;

  constructor(message: string, transcript = '') {
    super(message);
    this.name = 'ExecFailure';
    this.transcript = transcript;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
