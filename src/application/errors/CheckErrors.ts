export type BalanceCheckErrorCode =
  | 'check_timeout'
  | 'session_failure'
  | 'locate_failure'
  | 'check_aborted'
  | 'notify_delivery_failure';

export class BalanceCheckError extends Error {
  constructor(
    readonly code: BalanceCheckErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CheckTimeoutError extends BalanceCheckError {
  constructor(readonly timeoutMs: number) {
    super('check_timeout', `Balance check did not finish within ${timeoutMs} ms`);
  }
}

export class SessionFailureError extends BalanceCheckError {
  constructor(cause: unknown) {
    super('session_failure', 'Browser session could not be started', { cause });
  }
}

export class LocateFailureError extends BalanceCheckError {
  constructor(
    readonly control: string,
    readonly attempts: string[],
  ) {
    super('locate_failure', `Could not locate ${control} (tried ${attempts.length} locators)`);
  }
}

export class CheckAbortedError extends BalanceCheckError {
  constructor() {
    super('check_aborted', 'Balance check was cancelled');
  }
}

export class NotifyDeliveryError extends BalanceCheckError {
  constructor(
    readonly subscriberId: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super('notify_delivery_failure', `Could not deliver notification to ${subscriberId}: ${detail}`, options);
  }
}

export const failureReasonOf = (error: unknown): BalanceCheckErrorCode | 'unexpected_error' =>
  error instanceof BalanceCheckError ? error.code : 'unexpected_error';
