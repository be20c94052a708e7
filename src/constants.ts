// ── Geodesy ──

/** Mean Earth radius in meters used by the spherical model. */
export const EARTH_RADIUS_METERS = 6_371_000;

/** Degrees to radians conversion factor. */
export const DEG_TO_RAD = Math.PI / 180;

/** Attribute holding the grid-space column of a datum, in patches from the left edge. */
export const POSITION_X = "position.x";

/** Attribute holding the grid-space row of a datum, in patches from the top edge. */
export const POSITION_Y = "position.y";

/** Attribute written by geocoding with the datum's longitude in degrees. */
export const POSITION_LONGITUDE = "position.longitude";

/** Attribute written by geocoding with the datum's latitude in degrees. */
export const POSITION_LATITUDE = "position.latitude";

// ── Wire format ──

/** Line terminator separating records in the engine's response stream. */
export const LINE_TERMINATOR = "\n";

/** Separator between key=value pairs within a datum record. */
export const PAIR_SEPARATOR = "\t";

/** Replacement for tabs and newlines inside serialized attribute values. */
export const VALUE_ESCAPE = "    ";

// ── Response reader defaults ──

/** Default first step of a simulation, subtracted from reported progress. */
export const DEFAULT_START_STEP = 0;

/** Default handling of malformed or out-of-protocol lines. */
export const DEFAULT_ERROR_POLICY = "throw";
