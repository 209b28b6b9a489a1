export interface SsoSyncErrorOptions {
  path?: string;
  suggestions?: string[];
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base class for every failure this tool reports.  `path` names the file the
 * failure concerns and `rolledBack` records whether a write to it was undone
 * before the error surfaced.
 */
export class SsoSyncError extends Error {
  path?: string;
  rolledBack = false;
  readonly suggestions: string[];
  readonly context: Record<string, unknown>;

  constructor(message: string, options: SsoSyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SsoSyncError";
    this.path = options.path;
    this.suggestions = options.suggestions ?? [];
    this.context = options.context ?? {};
  }
}

export class MalformedDocumentError extends SsoSyncError {
  readonly lineNumber: number;
  readonly line: string;

  constructor(message: string, lineNumber: number, line: string, path?: string) {
    super(`${message} at line ${lineNumber}: ${line.trim()}`, {
      path,
      context: { lineNumber, line },
      suggestions: ["Fix or remove the offending line, then run the command again"],
    });
    this.name = "MalformedDocumentError";
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export class InvalidSectionError extends SsoSyncError {
  readonly header: string;

  constructor(header: string, reason: string) {
    super(`Invalid section [${header}]: ${reason}`, { context: { header } });
    this.name = "InvalidSectionError";
    this.header = header;
  }
}

export class UnsupportedShellError extends SsoSyncError {
  readonly shell: string;

  constructor(shell: string, supported: readonly string[]) {
    super(`Unsupported shell: ${shell}`, {
      context: { shell, supported },
      suggestions: [
        `Supported shells: ${supported.join(", ")}`,
        "Pass --shell to pick one explicitly, or add the sp function to your startup file manually",
      ],
    });
    this.name = "UnsupportedShellError";
    this.shell = shell;
  }
}

export type BackupOperation = "snapshot" | "restore" | "prune";

export class BackupError extends SsoSyncError {
  readonly operation: BackupOperation;

  constructor(operation: BackupOperation, path: string, details: string, cause?: unknown) {
    super(`Backup ${operation} failed for ${path}: ${details}`, {
      path,
      cause,
      context: { operation, details },
    });
    this.name = "BackupError";
    this.operation = operation;
  }
}

export class WriteError extends SsoSyncError {
  readonly code?: string;

  constructor(path: string, details: string, code?: string, cause?: unknown) {
    super(`Failed to write ${path}: ${details}`, {
      path,
      cause,
      context: { code },
      suggestions: ["Check the file permissions and the free disk space"],
    });
    this.name = "WriteError";
    this.code = code;
  }
}

export class LockTimeoutError extends SsoSyncError {
  readonly timeoutMs: number;
  readonly retryable = true;

  constructor(path: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for the lock on ${path}`, {
      path,
      context: { timeoutMs },
      suggestions: ["Another ssosync process is updating this file; retry in a moment"],
    });
    this.name = "LockTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class SsoSessionNotFoundError extends SsoSyncError {
  constructor(sessionName: string, path: string) {
    super(`SSO session '${sessionName}' is not defined in ${path}`, {
      path,
      suggestions: [
        `Run: ssosync session set ${sessionName} --start-url <url> --region <region>`,
      ],
    });
    this.name = "SsoSessionNotFoundError";
  }
}

export class SsoTokenNotFoundError extends SsoSyncError {
  constructor(sessionName: string, cacheDir: string) {
    super(`No valid SSO access token found for session '${sessionName}'`, {
      path: cacheDir,
      suggestions: [
        `Run: aws sso login --sso-session ${sessionName}`,
        "Unset AWS_PROFILE if the login keeps failing",
      ],
    });
    this.name = "SsoTokenNotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Render an error for the terminal: the message, the affected file, whether
 * the file was rolled back, and any suggestions.
 */
export function formatError(err: unknown): string {
  if (!(err instanceof SsoSyncError)) {
    return `Error: ${errorMessage(err)}`;
  }

  const lines = [`Error: ${err.message}`];
  if (err.path) {
    lines.push(`  File: ${err.path}`);
    lines.push(
      err.rolledBack
        ? "  Rollback: the file was restored to its previous content"
        : "  Rollback: not needed, the file was not modified"
    );
  }
  for (const suggestion of err.suggestions) {
    lines.push(`  Hint: ${suggestion}`);
  }
  return lines.join("\n");
}
