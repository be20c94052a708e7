import { parseDatum, parseEngineResponse, serializeDatum } from "./engine-response";
import { FormatError } from "../errors";

describe("parseEngineResponse", () => {
  it("ignores blank lines", () => {
    expect(parseEngineResponse("")).toBeNull();
    expect(parseEngineResponse("   ")).toBeNull();
  });

  it("reads an end record", () => {
    expect(parseEngineResponse("[end 3]")).toEqual({ type: "end", replicate: 3 });
  });

  it("ignores an empty datum", () => {
    expect(parseEngineResponse("[2]")).toBeNull();
  });

  it("reads an error record", () => {
    expect(parseEngineResponse("[error] out of memory")).toEqual({ type: "error", message: "out of memory" });
  });

  it("reads a progress record", () => {
    expect(parseEngineResponse("[progress 12]")).toEqual({ type: "progress", steps: 12 });
  });

  it("reads a datum record", () => {
    const response = parseEngineResponse("[1] patches:position.x=4\tposition.y=2.5\tcover=grass");
    expect(response?.type).toBe("datum");
    if (response?.type !== "datum") return;
    expect(response.replicate).toBe(1);
    expect(response.datum.target).toBe("patches");
    expect(Array.from(response.datum.attributes.entries())).toEqual([
      ["position.x", 4],
      ["position.y", 2.5],
      ["cover", "grass"],
    ]);
  });

  it("trims surrounding whitespace and carriage returns", () => {
    expect(parseEngineResponse("  [end 0]\r")).toEqual({ type: "end", replicate: 0 });
  });

  it("rejects unrecognized lines", () => {
    expect(() => parseEngineResponse("hello")).toThrow(FormatError);
    expect(() => parseEngineResponse("[x] patches:a=1")).toThrow(FormatError);
  });
});

describe("parseDatum", () => {
  it("keeps an empty attribute set", () => {
    const datum = parseDatum("simulation:");
    expect(datum.target).toBe("simulation");
    expect(datum.attributes.size).toBe(0);
  });

  it("skips empty pairs", () => {
    const datum = parseDatum("patches:a=1\t\tb=2\t");
    expect(Array.from(datum.attributes.keys())).toEqual(["a", "b"]);
  });

  it("keeps only the first '=' as the separator", () => {
    const datum = parseDatum("patches:expr=a=b");
    expect(datum.attributes.get("expr")).toBe("a=b");
  });

  it("reads negative and exponent numbers", () => {
    const datum = parseDatum("patches:a=-3\tb=1.5e3\tc=1.2.3");
    expect(datum.attributes.get("a")).toBe(-3);
    expect(datum.attributes.get("b")).toBe(1500);
    expect(datum.attributes.get("c")).toBe("1.2.3");
  });

  it("rejects a missing target", () => {
    expect(() => parseDatum(":a=1")).toThrow(FormatError);
    expect(() => parseDatum("a=1")).toThrow(FormatError);
  });

  it("rejects malformed pairs", () => {
    expect(() => parseDatum("patches:novalue")).toThrow(FormatError);
    expect(() => parseDatum("patches:=1")).toThrow(FormatError);
  });
});

describe("serializeDatum", () => {
  it("escapes tabs and newlines inside values", () => {
    const body = serializeDatum("patches", new Map<string, string | number>([
      ["note", "a\tb\nc"],
      ["position.x", 3],
    ]));
    expect(body).toBe("patches:note=a    b    c\tposition.x=3");
  });

  it("is read back by parseDatum", () => {
    const datum = parseDatum(serializeDatum("entities", new Map([["name", "oak tree"]])));
    expect(datum.target).toBe("entities");
    expect(datum.attributes.get("name")).toBe("oak tree");
  });
});
