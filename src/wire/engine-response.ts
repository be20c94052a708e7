import { PAIR_SEPARATOR, VALUE_ESCAPE } from "../constants";
import { FormatError } from "../errors";
import type { AttributeValue, ReplicateId } from "../types/result-types";

/** Target and attributes carried by a datum record, before they become an OutputDatum. */
export interface RawDatum {
  target: string;
  attributes: Map<string, AttributeValue>;
}

/** One decoded line of the engine's response stream. */
export type EngineResponse =
  | { type: "datum"; replicate: ReplicateId; datum: RawDatum }
  | { type: "end"; replicate: ReplicateId }
  | { type: "progress"; steps: number }
  | { type: "error"; message: string };

/** Decodes one complete line; null means the line carries nothing to act on. */
export type LineParser = (line: string) => EngineResponse | null;

const END_PATTERN = /^\[end (\d+)\]$/;
const EMPTY_PATTERN = /^\[(\d+)\]$/;
const ERROR_PATTERN = /^\[error\] (.+)$/;
const PROGRESS_PATTERN = /^\[progress (\d+)\]$/;
const DATUM_PATTERN = /^\[(\d+)\] (.+)$/;

const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

function parseAttributeValue(value: string): AttributeValue {
  return NUMBER_PATTERN.test(value) ? Number(value) : value;
}

/**
 * Decode the body of a datum record: target:key1=value1\tkey2=value2...
 * Empty pairs are skipped so a trailing separator is harmless.
 */
export function parseDatum(body: string): RawDatum {
  const colon = body.indexOf(":");
  if (colon === -1) {
    throw new FormatError("Datum must contain a colon separator", body);
  }
  if (colon === 0) {
    throw new FormatError("Datum must have a non-empty target before colon", body);
  }

  const target = body.substring(0, colon);
  const attributes = new Map<string, AttributeValue>();
  for (const pair of body.substring(colon + 1).split(PAIR_SEPARATOR)) {
    if (pair === "") continue;
    const equals = pair.indexOf("=");
    if (equals === -1) {
      throw new FormatError("Invalid key-value pair format", pair);
    }
    if (equals === 0) {
      throw new FormatError("Key cannot be empty in key-value pair", pair);
    }
    attributes.set(pair.substring(0, equals), parseAttributeValue(pair.substring(equals + 1)));
  }

  return { target, attributes };
}

/**
 * Encode a datum body in the engine's wire format. Tabs and newlines inside
 * values become four spaces so they cannot be read as separators.
 */
export function serializeDatum(target: string, attributes: Map<string, AttributeValue>): string {
  const pairs = Array.from(attributes, ([key, value]) => {
    const safe = String(value).replace(/[\t\n]/g, VALUE_ESCAPE);
    return `${key}=${safe}`;
  });
  return `${target}:${pairs.join(PAIR_SEPARATOR)}`;
}

/**
 * Decode one line of the engine's response stream.
 *
 *   [end N]            replicate N has completed
 *   [progress N]       the engine has reached step N
 *   [error] message    the engine failed
 *   [N] body           datum for replicate N
 *   [N]                empty datum, ignored
 *
 * Blank lines return null. Anything else is a FormatError.
 */
export function parseEngineResponse(line: string): EngineResponse | null {
  const trimmed = line.trim();
  if (trimmed === "") return null;

  const end = END_PATTERN.exec(trimmed);
  if (end) return { type: "end", replicate: Number(end[1]) };

  if (EMPTY_PATTERN.test(trimmed)) return null;

  const error = ERROR_PATTERN.exec(trimmed);
  if (error) return { type: "error", message: error[1] };

  const progress = PROGRESS_PATTERN.exec(trimmed);
  if (progress) return { type: "progress", steps: Number(progress[1]) };

  const datum = DATUM_PATTERN.exec(trimmed);
  if (datum) {
    return { type: "datum", replicate: Number(datum[1]), datum: parseDatum(datum[2]) };
  }

  throw new FormatError("Invalid engine response format", line);
}
