import { DEG_TO_RAD, EARTH_RADIUS_METERS } from "../constants";
import { InvalidArgumentError } from "../errors";

/** A position on Earth in degrees. Positive longitude is east, positive latitude north. */
export interface EarthPoint {
  readonly longitude: number;
  readonly latitude: number;
}

export type Direction = "N" | "S" | "E" | "W";

export function earthPoint(longitude: number, latitude: number): EarthPoint {
  return Object.freeze({ longitude, latitude });
}

/**
 * Great-circle distance in meters on a spherical Earth (Haversine).
 * h = sin²(Δφ/2) + cos φ1 · cos φ2 · sin²(Δλ/2), d = 2R · atan2(√h, √(1−h))
 */
export function getDistanceMeters(start: EarthPoint, end: EarthPoint): number {
  const lat1 = start.latitude * DEG_TO_RAD;
  const lat2 = end.latitude * DEG_TO_RAD;
  const deltaLat = lat2 - lat1;
  const deltaLon = (end.longitude - start.longitude) * DEG_TO_RAD;

  const sinHalfLat = Math.sin(deltaLat / 2);
  const sinHalfLon = Math.sin(deltaLon / 2);
  const h = sinHalfLat * sinHalfLat + Math.cos(lat1) * Math.cos(lat2) * sinHalfLon * sinHalfLon;

  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Point reached by moving a distance due N, S, E or W from start.
 *
 * North/south moves change latitude only. East/west moves change longitude only,
 * scaled by 1 / cos(latitude) for meridian convergence. This is an
 * equirectangular step, not a great-circle bearing projection; getDistanceMeters
 * inverts it to well under a millimeter at patch-sized distances.
 */
export function getAtDistanceFrom(
  start: EarthPoint,
  distanceMeters: number,
  direction: Direction | string,
): EarthPoint {
  const angularDeg = distanceMeters / EARTH_RADIUS_METERS / DEG_TO_RAD;

  switch (direction) {
    case "N":
      return earthPoint(start.longitude, start.latitude + angularDeg);
    case "S":
      return earthPoint(start.longitude, start.latitude - angularDeg);
    case "E":
      return earthPoint(start.longitude + angularDeg / Math.cos(start.latitude * DEG_TO_RAD), start.latitude);
    case "W":
      return earthPoint(start.longitude - angularDeg / Math.cos(start.latitude * DEG_TO_RAD), start.latitude);
    default:
      throw new InvalidArgumentError(`Unsupported direction: ${direction}`);
  }
}
