import { FormatError } from "../errors";

/** A magnitude paired with its units as the engine prints it, e.g. "30 m". */
export interface EngineValue {
  readonly value: number;
  readonly units: string;
}

/** A longitude/latitude pair read from a grid start or end string. */
export interface CoordinatePair {
  readonly longitude: EngineValue;
  readonly latitude: EngineValue;
}

const FLOAT_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function parseFloatToken(token: string, raw: string): number {
  if (!FLOAT_PATTERN.test(token)) {
    throw new FormatError("Invalid number in engine value", raw);
  }
  return Number(token);
}

/**
 * Parse a value like "30 m" or "36.5 degrees". Everything after the first space
 * is kept as the units.
 */
export function parseEngineValue(text: string): EngineValue {
  const trimmed = text.trim();
  const space = trimmed.indexOf(" ");
  if (space === -1) {
    throw new FormatError("Invalid engine value string format", text);
  }
  const units = trimmed.substring(space + 1);
  if (units === "") {
    throw new FormatError("Invalid engine value string format", text);
  }
  return {
    value: parseFloatToken(trimmed.substring(0, space), text),
    units,
  };
}

/**
 * Parse a start or end string such as
 * "36.519 degrees latitude, -118.672 degrees longitude".
 *
 * Either side may come first: the first side is latitude when its third token
 * contains "latitude", otherwise it is longitude.
 */
export function parseCoordinatePair(text: string): CoordinatePair {
  const parts = text.trim().split(",");
  if (parts.length !== 2) {
    throw new FormatError("Invalid start/end string format", text);
  }

  const firstTokens = parts[0].trim().split(" ");
  const secondTokens = parts[1].trim().split(" ");
  if (firstTokens.length < 3 || secondTokens.length < 3) {
    throw new FormatError("Invalid coordinate format", text);
  }

  const first: EngineValue = { value: parseFloatToken(firstTokens[0], text), units: firstTokens[1] };
  const second: EngineValue = { value: parseFloatToken(secondTokens[0], text), units: secondTokens[1] };

  if (firstTokens[2].includes("latitude")) {
    return { longitude: second, latitude: first };
  }
  return { longitude: first, latitude: second };
}
