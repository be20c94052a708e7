import { POSITION_X, POSITION_Y } from "../constants";
import type { PositionBounds } from "../types/result-types";
import type { OutputDatum } from "./output-datum";

/** Finished output of a single replicate. The datum sequence never changes after build. */
export class SimulationResult {
  private readonly data: readonly OutputDatum[];
  private readonly attributesByTarget: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly bounds: PositionBounds | null;

  constructor(
    data: readonly OutputDatum[],
    attributesByTarget: ReadonlyMap<string, ReadonlySet<string>>,
    bounds: PositionBounds | null,
  ) {
    this.data = Object.freeze([...data]);
    this.attributesByTarget = attributesByTarget;
    this.bounds = bounds;
  }

  /** Every datum of the replicate in arrival order. */
  getData(): readonly OutputDatum[] {
    return this.data;
  }

  /** Target names in order of first appearance. */
  getTargets(): string[] {
    return Array.from(this.attributesByTarget.keys());
  }

  getDataForTarget(target: string): OutputDatum[] {
    return this.data.filter((datum) => datum.getTarget() === target);
  }

  /** Union of attribute names reported for a target, empty for unknown targets. */
  getAttributeNames(target: string): string[] {
    const names = this.attributesByTarget.get(target);
    return names === undefined ? [] : Array.from(names);
  }

  /** Grid-space extent of the positions seen, or null when no datum had both x and y. */
  getBounds(): PositionBounds | null {
    return this.bounds === null ? null : { ...this.bounds };
  }
}

/** Results of a run, one element per completed replicate in completion order. */
export type SimulationResults = readonly SimulationResult[];

/**
 * Accumulates the datums of one in-flight replicate. Arrival order is
 * preserved; once built the builder refuses further datums.
 */
export class SimulationResultBuilder {
  private readonly data: OutputDatum[] = [];
  private readonly attributesByTarget = new Map<string, Set<string>>();
  private bounds: PositionBounds | null = null;
  private built = false;

  add(datum: OutputDatum): void {
    if (this.built) {
      throw new Error("Cannot add to a replicate that has already been built");
    }
    this.data.push(datum);

    let names = this.attributesByTarget.get(datum.getTarget());
    if (names === undefined) {
      names = new Set();
      this.attributesByTarget.set(datum.getTarget(), names);
    }
    for (const name of datum.getAttributeNames()) names.add(name);

    this.updateBounds(datum);
  }

  /** Number of datums added so far. */
  size(): number {
    return this.data.length;
  }

  build(): SimulationResult {
    this.built = true;
    const attributes = new Map<string, ReadonlySet<string>>();
    for (const [target, names] of this.attributesByTarget) {
      attributes.set(target, new Set(names));
    }
    return new SimulationResult(this.data, attributes, this.bounds);
  }

  // Datums without both coordinates do not move the bounds.
  private updateBounds(datum: OutputDatum): void {
    const x = datum.getNumber(POSITION_X);
    const y = datum.getNumber(POSITION_Y);
    if (x === undefined || y === undefined) return;

    if (this.bounds === null) {
      this.bounds = { minX: x, minY: y, maxX: x, maxY: y };
      return;
    }
    this.bounds.minX = Math.min(this.bounds.minX, x);
    this.bounds.minY = Math.min(this.bounds.minY, y);
    this.bounds.maxX = Math.max(this.bounds.maxX, x);
    this.bounds.maxY = Math.max(this.bounds.maxY, y);
  }
}
