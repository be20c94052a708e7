export * from "./constants";
export * from "./errors";
export type { AttributeValue, PositionBounds, ReplicateId, SimulationMetadata } from "./types/result-types";
export { OutputDatum } from "./model/output-datum";
export { SimulationResult, SimulationResultBuilder } from "./model/simulation-result";
export type { SimulationResults } from "./model/simulation-result";
export { parseCoordinatePair, parseEngineValue } from "./wire/engine-value";
export type { CoordinatePair, EngineValue } from "./wire/engine-value";
export { parseDatum, parseEngineResponse, serializeDatum } from "./wire/engine-response";
export type { EngineResponse, LineParser, RawDatum } from "./wire/engine-response";
export { ResponseReader } from "./wire/response-reader";
export type { ErrorPolicy, ProgressObserver, ReplicateObserver, ResponseReaderOptions } from "./wire/response-reader";
export { readResponseStream } from "./wire/read-response-stream";
export type { ResponseSource } from "./wire/read-response-stream";
export { earthPoint, getAtDistanceFrom, getDistanceMeters } from "./geodesy/earth-math";
export type { Direction, EarthPoint } from "./geodesy/earth-math";
export { addPositions, getTopLeft, gridToEarth } from "./geodesy/geocode";
