export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'TOOL_NOT_FOUND'
  | 'PROCESS_FAILED'
  | 'VERIFICATION_FAILED';

export class ProvisionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid override, missing or empty manifest, unknown filter name. */
export class ConfigurationError extends ProvisionError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class ToolNotFoundError extends ProvisionError {
  constructor(message: string) {
    super('TOOL_NOT_FOUND', message);
  }
}

export class ExternalProcessError extends ProvisionError {
  readonly command: string[];
  readonly exitCode: number;
  readonly output: string;

  constructor(command: string[], exitCode: number, output: string) {
    super('PROCESS_FAILED', `Command failed with exit code ${exitCode}: ${command.join(' ')}`);
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class VerificationError extends ProvisionError {
  readonly dependency: string;
  /** Compiler or probe output, when the failure came from running one. */
  readonly output: string | null;

  constructor(dependency: string, message: string, output: string | null = null) {
    super('VERIFICATION_FAILED', `Verification failed for ${dependency}: ${message}`);
    this.dependency = dependency;
    this.output = output;
  }
}

/** Output captured from the process behind an error, if any. */
export function capturedOutput(err: unknown): string | null {
  if (err instanceof ExternalProcessError || err instanceof VerificationError) {
    return err.output || null;
  }
  return null;
}

export function isProvisionError(err: unknown): err is ProvisionError {
  return err instanceof ProvisionError;
}
