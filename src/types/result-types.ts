/** Value of one exported attribute; numeric-looking wire values are stored as numbers. */
export type AttributeValue = number | string;

/** Identifier the engine gives a replicate. Only ever compared for equality. */
export type ReplicateId = number | string;

/** Extent of the grid-space positions seen in one replicate, in patches. */
export interface PositionBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * Grid bounds of a simulation and their Earth-space bounding box, as parsed by
 * the metadata layer. Read-only input to geocoding.
 */
export interface SimulationMetadata {
  readonly startX: number;
  readonly startY: number;
  readonly endX: number;
  readonly endY: number;
  /** Length of one side of a patch in meters. */
  readonly patchSizeMeters: number;
  readonly minLongitude: number;
  readonly minLatitude: number;
  readonly maxLongitude: number;
  readonly maxLatitude: number;
}
