/**
 * Error kinds raised by configuration loading, command execution and the
 * backup / restore flows. Every kind is terminal for the current run except
 * failures inside the post-restore health check, which only ever warn.
 */

export class KeeperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeeperError";
  }
}

/** Environment file or compose file is missing */
export class ConfigNotFound extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigNotFound";
  }
}

/** Compose file is not valid YAML or has no services mapping */
export class ConfigParseError extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigParseError";
  }
}

/** Deployment is not in a state a backup can start from */
export class EnvironmentNotReady extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvironmentNotReady";
  }
}

export class CommandFailed extends KeeperError {
  readonly command: string;
  readonly exitCode: number;

  constructor(command: string, exitCode: number, stderr?: string) {
    const detail = stderr ? `: ${stderr}` : "";
    super(`Command failed with exit code ${exitCode}: ${command}${detail}`);
    this.name = "CommandFailed";
    this.command = command;
    this.exitCode = exitCode;
  }
}

export class DatabaseBackupFailed extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatabaseBackupFailed";
  }
}

export class InvalidArchive extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidArchive";
  }
}

export class InvalidBackup extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidBackup";
  }
}

export class DatabaseRestoreFailed extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatabaseRestoreFailed";
  }
}

export class FilesystemBackupMissing extends KeeperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FilesystemBackupMissing";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
