export class CliError extends Error {
  constructor(message: string, public readonly exitCode = 1) {
    super(message);
    this.name = new.target.name;
  }
}

/** The input file or stream could not be read. */
export class InputError extends CliError {}

export class SettingsError extends CliError {}

export class UsageError extends CliError {
  constructor(message: string) {
    super(message, 2);
  }
}

export function describeError(error: unknown) {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
