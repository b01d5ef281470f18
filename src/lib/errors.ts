import { BackupStage } from '../interfaces';

/**
 * Error types for the transport and the backup pipeline
 */

export class ConnectError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectError';
  }
}

export class ExecutionError extends Error {
  readonly exitCode?: number;
  readonly stderr?: string;

  constructor(
    message: string,
    details: { exitCode?: number; stderr?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ExecutionError';
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class CloseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CloseError';
  }
}

const STAGE_MESSAGES: Record<BackupStage, string> = {
  connect: 'failed to connect',
  export: 'failed to export configuration',
  write: 'failed to write output',
};

/**
 * A failure of one backup stage. The original error stays reachable
 * through `cause`.
 */
export class BackupError extends Error {
  readonly stage: BackupStage;

  constructor(stage: BackupStage, cause: unknown) {
    super(`${STAGE_MESSAGES[stage]}: ${describeError(cause)}`, { cause });
    this.name = 'BackupError';
    this.stage = stage;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Walks the `cause` chain looking for `target`, by identity.
 */
export function hasCause(error: unknown, target: unknown): boolean {
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current !== undefined && current !== null && !seen.has(current)) {
    if (current === target) {
      return true;
    }
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return false;
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}
