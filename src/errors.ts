export type ErrorCode =
  | 'PACKAGE_NOT_FOUND'
  | 'TEMPLATE_SYNTAX'
  | 'TARGET_UNREACHABLE'
  | 'INVALID_CONFIG'
  | 'STOW_NOT_FOUND';

export class DotstowError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PackageNotFoundError extends DotstowError {
  constructor(readonly packageName: string, location?: string) {
    super(
      'PACKAGE_NOT_FOUND',
      location ? `Package directory not found: ${location}` : `Package not found: ${packageName}`
    );
  }
}

export class TemplateSyntaxError extends DotstowError {
  constructor(readonly line: number, readonly column: number, detail: string) {
    super('TEMPLATE_SYNTAX', `${detail} at line ${line}, column ${column}`);
  }
}

export class TargetUnreachableError extends DotstowError {
  constructor(readonly target: string) {
    super('TARGET_UNREACHABLE', `Failed to change to directory: ${target}`);
  }
}

export class ConfigValidationError extends DotstowError {
  constructor(detail: string) {
    super('INVALID_CONFIG', `Invalid options: ${detail}`);
  }
}

export class StowNotFoundError extends DotstowError {
  constructor(command: string) {
    super('STOW_NOT_FOUND', `'${command}' not found. Install GNU Stow and make sure it is on your PATH`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
