/**
 * @file errors - Coordinator error taxonomy
 * @description Typed failures with the exit code the CLI reports for each
 */

export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  Usage: 2,
  Launch: 3,
  SessionTimeout: 4,
  Template: 5,
  ViewerUnavailable: 6,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export abstract class SyncBridgeError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A process (viewer, editor, build) could not be created. */
export class LaunchError extends SyncBridgeError {
  readonly code = 'LAUNCH_FAILED';
  readonly exitCode = ExitCode.Launch;

  constructor(
    readonly command: readonly string[],
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to launch "${command.join(' ')}": ${reason}`, options);
  }
}

/** The viewer did not register the document within the allotted time. */
export class SessionTimeoutError extends SyncBridgeError {
  readonly code = 'SESSION_TIMEOUT';
  readonly exitCode = ExitCode.SessionTimeout;

  constructor(
    readonly documentPath: string,
    readonly timeoutMs: number
  ) {
    super(`Viewer did not open ${documentPath} within ${timeoutMs}ms`);
  }
}

export class TemplateError extends SyncBridgeError {
  readonly code = 'TEMPLATE_INVALID';
  readonly exitCode = ExitCode.Template;

  constructor(
    message: string,
    readonly template: readonly string[]
  ) {
    super(message);
  }
}

/** A backward-search signal carried an unusable payload. Never fatal. */
export class NotificationParseError extends SyncBridgeError {
  readonly code = 'NOTIFICATION_INVALID';
  readonly exitCode = ExitCode.Unexpected;

  constructor(
    message: string,
    readonly payload: unknown
  ) {
    super(message);
  }
}

/** The viewer's IPC surface (session bus, registry daemon) is not reachable. */
export class ViewerUnavailableError extends SyncBridgeError {
  readonly code = 'VIEWER_UNAVAILABLE';
  readonly exitCode = ExitCode.ViewerUnavailable;
}

export class ConfigError extends SyncBridgeError {
  readonly code = 'CONFIG_INVALID';
  readonly exitCode = ExitCode.Usage;
}

export function isSyncBridgeError(error: unknown): error is SyncBridgeError {
  return error instanceof SyncBridgeError;
}
