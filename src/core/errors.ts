/**
 * Entrypoint error types
 * Every fatal condition carries the exit code the container should report
 */

/**
 * Process exit codes used by the entrypoint
 */
export const EXIT_CODES = {
  OK: 0,
  GENERIC_FAILURE: 1,
  SUPERVISOR_FAILURE: 70, // EX_SOFTWARE
  CONFIGURATION: 78, // EX_CONFIG
  COMMAND_NOT_EXECUTABLE: 126,
  COMMAND_NOT_FOUND: 127,
} as const;

/**
 * Base error class for all entrypoint errors
 */
export abstract class EntrypointError extends Error {
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context ?? {};
  }

  toJSON(): { name: string; code: string; message: string; context: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================================================
// Resolution errors (exit 78)
// ============================================================================

export abstract class ConfigurationError extends EntrypointError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, EXIT_CODES.CONFIGURATION, context);
  }
}

/**
 * Malformed environment values
 */
export class SettingsError extends ConfigurationError {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`, 'INVALID_SETTINGS', { issues });
  }
}

export class ModuleResolutionError extends ConfigurationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MODULE_UNRESOLVED', context);
  }
}

export type TlsRole = 'certificate' | 'key';

export class CertificateMissingError extends ConfigurationError {
  constructor(
    public readonly role: TlsRole,
    public readonly searchRoot: string,
    public readonly pattern: string,
    overrideVariable: string
  ) {
    super(
      `No TLS ${role} found: nothing matching "${pattern}" under ${searchRoot}. ` +
        `Mount one there or set ${overrideVariable}.`,
      'TLS_NOT_FOUND',
      { role, searchRoot, pattern }
    );
  }
}

export class CertificateAmbiguousError extends ConfigurationError {
  constructor(
    public readonly role: TlsRole,
    public readonly candidates: readonly string[],
    overrideVariable: string
  ) {
    super(
      `Ambiguous TLS ${role}: ${candidates.length} files match (${candidates.join(', ')}). ` +
        `Set ${overrideVariable} to choose one.`,
      'TLS_AMBIGUOUS',
      { role, candidates: [...candidates] }
    );
  }
}

export class CertificateInvalidError extends ConfigurationError {
  constructor(
    public readonly role: TlsRole,
    public readonly path: string,
    reason: string
  ) {
    super(`TLS ${role} at ${path} is unusable: ${reason}`, 'TLS_INVALID', { role, path });
  }
}

// ============================================================================
// Child process errors
// ============================================================================

export class ChildStartError extends EntrypointError {
  constructor(command: string, cause: Error & { code?: string }) {
    super(
      `Failed to start ${command}: ${cause.message}`,
      'CHILD_START_FAILED',
      childStartExitCode(cause.code),
      { command, errno: cause.code }
    );
  }
}

export class ChildCrashError extends EntrypointError {
  constructor(exitCode: number) {
    super(`Server process exited with code ${exitCode}`, 'CHILD_CRASHED', exitCode);
  }
}

function childStartExitCode(errno: string | undefined): number {
  switch (errno) {
    case 'ENOENT':
      return EXIT_CODES.COMMAND_NOT_FOUND;
    case 'EACCES':
      return EXIT_CODES.COMMAND_NOT_EXECUTABLE;
    default:
      return EXIT_CODES.GENERIC_FAILURE;
  }
}
