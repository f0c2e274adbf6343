export type GatewayErrorCode =
  | 'DIRECTORY_NOT_FOUND'
  | 'FILE_UNREADABLE'
  | 'UNCLASSIFIABLE_FILE'
  | 'MISSING_FIELD'
  | 'EMPTY_PANEL'
  | 'INVALID_SNAPSHOT'
  | 'INSUFFICIENT_DATA';

export class GatewayError extends Error {
  readonly code: GatewayErrorCode;

  constructor(code: GatewayErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DirectoryNotFoundError extends GatewayError {
  constructor(readonly dir: string) {
    super('DIRECTORY_NOT_FOUND', `Data directory not found: ${dir}`);
  }
}

export class FileUnreadableError extends GatewayError {
  constructor(readonly file: string, detail = 'file is empty or could not be decoded') {
    super('FILE_UNREADABLE', `${file}: ${detail}`);
  }
}

export class UnclassifiableFileError extends GatewayError {
  constructor(readonly file: string) {
    super('UNCLASSIFIABLE_FILE', `${file}: could not tell spot from futures`);
  }
}

export class MissingFieldError extends GatewayError {
  constructor(readonly field: 'date' | 'price', readonly identifier: string, detail?: string) {
    super('MISSING_FIELD', detail ? `${identifier}: ${detail}` : `No ${field} column found for ${identifier}`);
  }
}

export class EmptyPanelError extends GatewayError {
  constructor() {
    super('EMPTY_PANEL', 'No series were loaded; the unified panel is empty');
  }
}

export class InvalidSnapshotError extends GatewayError {
  constructor(readonly file: string, detail: string) {
    super('INVALID_SNAPSHOT', `Invalid snapshot ${file}: ${detail}`);
  }
}

export class InsufficientDataError extends GatewayError {
  constructor(readonly required: number, readonly actual: number, what = 'spot observations') {
    super('INSUFFICIENT_DATA', `Need at least ${required} ${what}, found ${actual}`);
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
