/** A standard-API parameter carried a `type` outside string / enum / number / array. */
export class UnsupportedParameterTypeError extends Error {
  override readonly name = 'UnsupportedParameterTypeError';

  constructor(readonly type: unknown) {
    super(`Unsupported parameter type: ${String(type)}`);
  }
}

/** A parameter, tool or task schema does not have the expected shape. */
export class InvalidSchemaError extends Error {
  override readonly name = 'InvalidSchemaError';
}

export class ImplementationNotFoundError extends Error {
  override readonly name = 'ImplementationNotFoundError';

  constructor(readonly attempts: number) {
    super(`No implementation was produced after ${attempts} attempt(s)`);
  }
}

export class CallTimeoutError extends Error {
  override readonly name = 'CallTimeoutError';

  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class CallAbortedError extends Error {
  override readonly name = 'CallAbortedError';

  constructor(readonly label: string) {
    super(`${label} was aborted`);
  }
}

/** Conversations take one message at a time. */
export class ConversationBusyError extends Error {
  override readonly name = 'ConversationBusyError';

  constructor() {
    super('Conversation is already processing a message');
  }
}

export class BackendRequestError extends Error {
  override readonly name = 'BackendRequestError';

  constructor(
    readonly provider: string,
    readonly status: number,
    detail?: string,
  ) {
    super(`${provider} request failed with status ${status}${detail ? `: ${detail}` : ''}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
