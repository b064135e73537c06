/**
 * Deployment error taxonomy
 *
 * Every failure surfaced by the deployer is one of these classes, whatever
 * the underlying cause (fs error, SDK service exception, waiter error).
 * The original error is kept as `cause`.
 */

import { StackFailureSignal } from './types';

export type DeployErrorCode =
  | 'TEMPLATE_READ_FAILED'
  | 'CREATE_REJECTED'
  | 'STACK_CREATE_FAILED'
  | 'WAIT_TIMEOUT';

export abstract class DeployError extends Error {
  abstract readonly code: DeployErrorCode;
  public readonly stackName: string;

  constructor(message: string, stackName: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.stackName = stackName;
  }
}

export class TemplateReadError extends DeployError {
  public readonly code = 'TEMPLATE_READ_FAILED';
  public readonly templatePath: string;

  constructor(stackName: string, templatePath: string, cause?: unknown) {
    super(`Failed to read template '${templatePath}': ${describeCause(cause)}`, stackName, cause);
    this.name = 'TemplateReadError';
    this.templatePath = templatePath;
  }
}

export class StackCreateRejectedError extends DeployError {
  public readonly code = 'CREATE_REJECTED';
  /** Name of the remote exception, e.g. AlreadyExistsException */
  public readonly reason: string;

  constructor(stackName: string, cause?: unknown) {
    super(`Stack ${stackName} creation was rejected: ${describeCause(cause)}`, stackName, cause);
    this.name = 'StackCreateRejectedError';
    this.reason = isErrorLike(cause) && typeof cause.name === 'string' ? cause.name : 'UnknownError';
  }
}

export class StackCreateFailedError extends DeployError {
  public readonly code = 'STACK_CREATE_FAILED';
  public readonly failureSignals: StackFailureSignal[];

  constructor(stackName: string, failureSignals: StackFailureSignal[] = [], cause?: unknown) {
    const firstReason = failureSignals[0]?.statusReason;
    super(
      firstReason
        ? `Stack ${stackName} failed to create: ${failureSignals[0].logicalId}: ${firstReason}`
        : `Stack ${stackName} failed to create`,
      stackName,
      cause
    );
    this.name = 'StackCreateFailedError';
    this.failureSignals = failureSignals;
  }
}

export class StackWaitTimeoutError extends DeployError {
  public readonly code = 'WAIT_TIMEOUT';
  public readonly maxWaitSeconds?: number;

  constructor(stackName: string, maxWaitSeconds?: number, cause?: unknown) {
    super(
      maxWaitSeconds === undefined
        ? `Timed out waiting for stack ${stackName} to be created`
        : `Timed out after ${maxWaitSeconds}s waiting for stack ${stackName} to be created`,
      stackName,
      cause
    );
    this.name = 'StackWaitTimeoutError';
    this.maxWaitSeconds = maxWaitSeconds;
  }
}

export function isDeployError(error: unknown): error is DeployError {
  return error instanceof DeployError;
}

/**
 * Matches errors from any realm. Under a vm context (e.g. Jest), errors
 * raised by Node's own modules fail `instanceof Error`.
 */
export function isErrorLike(value: unknown): value is { name?: unknown; message: string } {
  return (
    value instanceof Error ||
    (typeof value === 'object' &&
      value !== null &&
      'message' in value &&
      typeof value.message === 'string')
  );
}

function describeCause(cause: unknown): string {
  if (isErrorLike(cause)) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}
