export type BackfillErrorKind =
  | 'TransportError'
  | 'DecodeError'
  | 'RetryExhausted'
  | 'HeadNotFound'
  | 'RootParseError'
  | 'SinkCommitError'
  | 'InvalidRange'
  | 'ConfigError';

/**
 * Base class for every failure the backfill pipeline can raise.
 * `slot` is set when the failure can be pinned to one slot.
 */
export class BackfillError extends Error {
  readonly kind: BackfillErrorKind;
  readonly slot: number | undefined;

  constructor(kind: BackfillErrorKind, message: string, slot?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.slot = slot;
  }
}

// Retryable; only escapes the fetch client as the cause of RetryExhaustedError.
export class TransportError extends BackfillError {
  constructor(readonly url: string, cause: unknown) {
    super('TransportError', `GET ${url} failed: ${describeError(cause)}`, undefined, { cause });
  }
}

export class DecodeError extends BackfillError {
  constructor(message: string, slot?: number, cause?: unknown) {
    super('DecodeError', message, slot, { cause });
  }
}

export class RetryExhaustedError extends BackfillError {
  constructor(readonly attempts: number, slot?: number, lastError?: TransportError) {
    const target = slot === undefined ? 'head headers' : `slot ${slot}`;
    super('RetryExhausted', `${attempts} retries failed for ${target}`, slot, { cause: lastError });
  }
}

export class HeadNotFoundError extends BackfillError {
  constructor() {
    super('HeadNotFound', 'no headers found when resolving the head slot');
  }
}

export class RootParseError extends BackfillError {
  constructor(slot: number, root: string, reason: string) {
    super('RootParseError', `invalid block root "${root}" for slot ${slot}: ${reason}`, slot);
  }
}

export class SinkCommitError extends BackfillError {
  constructor(sink: string, fromSlot: number | undefined, cause: unknown) {
    super('SinkCommitError', `${sink} sink failed to commit window: ${describeError(cause)}`, fromSlot, { cause });
  }
}

export class InvalidRangeError extends BackfillError {
  constructor(fromSlot: number, toSlot: number) {
    super('InvalidRange', `end slot ${toSlot} precedes start slot ${fromSlot}`);
  }
}

export class ConfigError extends BackfillError {
  constructor(readonly issues: string[]) {
    super('ConfigError', `Configuration validation failed: ${issues.join('; ')}`);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
