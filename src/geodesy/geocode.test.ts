import { addPositions, getTopLeft, gridToEarth } from "./geocode";
import { earthPoint, getDistanceMeters } from "./earth-math";
import { OutputDatum } from "../model/output-datum";
import { SimulationResultBuilder } from "../model/simulation-result";
import type { AttributeValue, SimulationMetadata } from "../types/result-types";

const ORIGIN_METADATA: SimulationMetadata = {
  startX: 0,
  startY: 0,
  endX: 10,
  endY: 10,
  patchSizeMeters: 1000,
  minLongitude: 0,
  minLatitude: -0.09,
  maxLongitude: 0.09,
  maxLatitude: 0,
};

const ONE_KM_DEG = 1000 / 6371000 / (Math.PI / 180);

function datum(target: string, values: [string, AttributeValue][]): OutputDatum {
  return new OutputDatum(target, new Map(values));
}

describe("getTopLeft", () => {
  it("uses the minimum longitude and maximum latitude", () => {
    const metadata = { ...ORIGIN_METADATA, minLongitude: -118.7, maxLatitude: 36.5 };
    expect(getTopLeft(metadata)).toEqual(earthPoint(-118.7, 36.5));
  });
});

describe("gridToEarth", () => {
  it("places (1, 1) one patch east and one patch south of the corner", () => {
    const point = gridToEarth(1, 1, ORIGIN_METADATA);
    expect(point.longitude).toBeCloseTo(ONE_KM_DEG, 12);
    expect(point.latitude).toBeCloseTo(-ONE_KM_DEG, 12);

    const corner = getTopLeft(ORIGIN_METADATA);
    const east = earthPoint(point.longitude, corner.latitude);
    expect(getDistanceMeters(corner, east)).toBeCloseTo(1000, 6);
    expect(getDistanceMeters(east, point)).toBeCloseTo(1000, 6);
  });

  it("returns the corner for (0, 0)", () => {
    expect(gridToEarth(0, 0, ORIGIN_METADATA)).toEqual(earthPoint(0, 0));
  });
});

describe("addPositions", () => {
  function buildResults(datums: OutputDatum[]) {
    const builder = new SimulationResultBuilder();
    for (const item of datums) builder.add(item);
    return [builder.build()];
  }

  it("adds longitude and latitude to datums with grid positions", () => {
    const patch = datum("patches", [["position.x", 1], ["position.y", 1]]);
    const results = buildResults([patch]);

    addPositions(results, ORIGIN_METADATA);

    expect(patch.getValue("position.longitude")).toBeCloseTo(ONE_KM_DEG, 12);
    expect(patch.getValue("position.latitude")).toBeCloseTo(-ONE_KM_DEG, 12);
  });

  it("reads positions reported as text", () => {
    const patch = datum("patches", [["position.x", "2"], ["position.y", "0"]]);
    addPositions(buildResults([patch]), ORIGIN_METADATA);
    expect(patch.getValue("position.longitude")).toBeCloseTo(2 * ONE_KM_DEG, 12);
    expect(patch.getValue("position.latitude")).toBe(0);
  });

  it("overwrites earlier values", () => {
    const patch = datum("patches", [
      ["position.x", 0],
      ["position.y", 0],
      ["position.longitude", 99],
      ["position.latitude", 99],
    ]);
    addPositions(buildResults([patch]), ORIGIN_METADATA);
    expect(patch.getValue("position.longitude")).toBe(0);
    expect(patch.getValue("position.latitude")).toBe(0);
  });

  it("leaves datums without both coordinates alone", () => {
    const onlyX = datum("patches", [["position.x", 1]]);
    const sim = datum("simulation", [["step", 3]]);
    addPositions(buildResults([onlyX, sim]), ORIGIN_METADATA);
    expect(onlyX.getAttributeNames()).toEqual(["position.x"]);
    expect(sim.getAttributeNames()).toEqual(["step"]);
  });

  it("covers every replicate and returns the same results", () => {
    const first = datum("patches", [["position.x", 0], ["position.y", 1]]);
    const second = datum("patches", [["position.x", 1], ["position.y", 0]]);
    const results = [...buildResults([first]), ...buildResults([second])];

    expect(addPositions(results, ORIGIN_METADATA)).toBe(results);
    expect(first.hasValue("position.latitude")).toBe(true);
    expect(second.hasValue("position.longitude")).toBe(true);
  });
});
