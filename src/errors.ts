import type { ReplicateId } from "./types/result-types";

/** Base class for every error raised while reading engine output or geocoding it. */
export class ResponseReaderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A value, coordinate or response line that does not match the engine's text format. */
export class FormatError extends ResponseReaderError {
  /** The offending input, untouched. */
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(`${message}: ${raw}`);
    this.raw = raw;
  }
}

/**
 * A well-formed line that breaks replicate bookkeeping, such as an end record for
 * a replicate that was never opened or has already completed.
 */
export class ProtocolViolationError extends ResponseReaderError {
  readonly replicate: ReplicateId;

  constructor(message: string, replicate: ReplicateId) {
    super(message);
    this.replicate = replicate;
  }
}

export class InvalidArgumentError extends ResponseReaderError {}

/** Failure reported by the engine itself through an error record. */
export class EngineError extends ResponseReaderError {
  constructor(readonly engineMessage: string) {
    super(`Engine error: ${engineMessage}`);
  }
}

export class MissingAttributeError extends ResponseReaderError {
  constructor(readonly attribute: string) {
    super(`Value for attribute ${attribute} not found`);
  }
}
