import type { Address, Nonce } from "./types";

export const SchedulerErrorCodes = {
  /** Presented nonce differs from the account's counter */
  INVALID_NONCE: "INVALID_NONCE",
  /** Height outside the schedulable range */
  INVALID_HEIGHT: "INVALID_HEIGHT",
  /** Execution sink rejected the delegated call */
  DISPATCH_FAILED: "DISPATCH_FAILED",
  /** Stored or wire bytes could not be decoded */
  CODEC_ERROR: "CODEC_ERROR",
  /** Persisted queue links point at missing records */
  CORRUPT_QUEUE: "CORRUPT_QUEUE",
  /** Configuration failed validation */
  CONFIG_ERROR: "CONFIG_ERROR",
} as const;

export type SchedulerErrorCode =
  (typeof SchedulerErrorCodes)[keyof typeof SchedulerErrorCodes];

/**
 * Base class for every error raised by the scheduler.
 */
export class SchedulerError extends Error {
  public readonly code: SchedulerErrorCode;

  constructor(message: string, code: SchedulerErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "SchedulerError";
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Admission failure. Nothing is written when this is returned; the caller
 * may resubmit with `expected`.
 */
export class InvalidNonceError extends SchedulerError {
  public readonly account: Address;
  public readonly expected: Nonce;
  public readonly presented: Nonce;

  constructor(account: Address, expected: Nonce, presented: Nonce) {
    super(
      `invalid nonce for ${account}: expected ${expected}, got ${presented}`,
      SchedulerErrorCodes.INVALID_NONCE,
    );
    this.name = "InvalidNonceError";
    this.account = account;
    this.expected = expected;
    this.presented = presented;
  }
}

export class InvalidHeightError extends SchedulerError {
  constructor(message: string) {
    super(message, SchedulerErrorCodes.INVALID_HEIGHT);
    this.name = "InvalidHeightError";
  }
}

/** Opaque failure reported by an execution sink. */
export class DispatchError extends SchedulerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, SchedulerErrorCodes.DISPATCH_FAILED, options);
    this.name = "DispatchError";
  }
}

export class CodecError extends SchedulerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, SchedulerErrorCodes.CODEC_ERROR, options);
    this.name = "CodecError";
  }
}

export class CorruptQueueError extends SchedulerError {
  constructor(message: string) {
    super(message, SchedulerErrorCodes.CORRUPT_QUEUE);
    this.name = "CorruptQueueError";
  }
}

export class ConfigError extends SchedulerError {
  constructor(message: string) {
    super(message, SchedulerErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

/** Wrap anything a sink throws so it can be recorded like a returned error. */
export const toDispatchError = (e: unknown): DispatchError => {
  if (e instanceof DispatchError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new DispatchError(message, { cause: e });
};
