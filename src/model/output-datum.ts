import { MissingAttributeError } from "../errors";
import type { AttributeValue } from "../types/result-types";

/**
 * One observation exported by the engine: a target such as "patches" plus the
 * attribute values reported for it at one point in a replicate's timeline.
 */
export class OutputDatum {
  private readonly target: string;
  private readonly attributes: Map<string, AttributeValue>;

  constructor(target: string, attributes: Map<string, AttributeValue>) {
    this.target = target;
    this.attributes = attributes;
  }

  getTarget(): string {
    return this.target;
  }

  getAttributeNames(): string[] {
    return Array.from(this.attributes.keys());
  }

  hasValue(name: string): boolean {
    return this.attributes.has(name);
  }

  getValue(name: string): AttributeValue {
    const value = this.attributes.get(name);
    if (value === undefined) throw new MissingAttributeError(name);
    return value;
  }

  /**
   * Numeric view of an attribute. Returns undefined when the attribute is absent
   * or holds text that does not read as a finite number.
   */
  getNumber(name: string): number | undefined {
    const value = this.attributes.get(name);
    if (value === undefined) return undefined;
    if (typeof value === "number") return value;
    if (value.trim() === "") return undefined;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }

  /** Overwrites or adds an attribute. Only geocoding writes to finished results. */
  setValue(name: string, value: AttributeValue): void {
    this.attributes.set(name, value);
  }
}
