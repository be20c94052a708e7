import { POSITION_LATITUDE, POSITION_LONGITUDE, POSITION_X, POSITION_Y } from "../constants";
import type { SimulationResults } from "../model/simulation-result";
import type { SimulationMetadata } from "../types/result-types";
import { EarthPoint, earthPoint, getAtDistanceFrom } from "./earth-math";

/** Top-left (north-west) corner of the simulation grid. */
export function getTopLeft(metadata: SimulationMetadata): EarthPoint {
  return earthPoint(metadata.minLongitude, metadata.maxLatitude);
}

/**
 * Earth position of a grid-space point: x patches east of the top-left corner,
 * then y patches south of that.
 */
export function gridToEarth(x: number, y: number, metadata: SimulationMetadata): EarthPoint {
  const east = getAtDistanceFrom(getTopLeft(metadata), x * metadata.patchSizeMeters, "E");
  return getAtDistanceFrom(east, y * metadata.patchSizeMeters, "S");
}

/**
 * Add position.longitude and position.latitude to every datum that reports both
 * position.x and position.y, overwriting earlier values. Datums missing either
 * coordinate are left alone. Every replicate is assumed to share the same grid.
 *
 * Modifies the results in place and returns them.
 */
export function addPositions(results: SimulationResults, metadata: SimulationMetadata): SimulationResults {
  for (const result of results) {
    for (const datum of result.getData()) {
      const x = datum.getNumber(POSITION_X);
      const y = datum.getNumber(POSITION_Y);
      if (x === undefined || y === undefined) continue;

      const point = gridToEarth(x, y, metadata);
      datum.setValue(POSITION_LONGITUDE, point.longitude);
      datum.setValue(POSITION_LATITUDE, point.latitude);
    }
  }
  return results;
}
