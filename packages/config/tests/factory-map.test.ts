import { describe, it, expect } from "vitest";
import type { FactoryDefinition } from "@locus-sdk/types";
import { FeatureNotFoundError, MultipleFeatureDefaultsError } from "@locus-sdk/common";
import { DictionaryFactoryMap } from "../src/factory-map";

function feature(interfaceId: string, isDefault = false, factoryId = "test.Impl"): FactoryDefinition {
  return { factoryId, interfaceId, args: [], kwargs: {}, isDefault };
}

describe("DictionaryFactoryMap", () => {
  it("should look definitions up by exact name", () => {
    const a = feature("test.IFace");
    const map = new DictionaryFactoryMap({ a });

    expect(map.getByName("a")).toBe(a);
    expect(() => map.getByName("A")).toThrow(FeatureNotFoundError);
  });

  it("should look definitions up by interface", () => {
    const a = feature("test.IFace");
    const map = new DictionaryFactoryMap({ a });

    expect(map.getByType("test.IFace")).toEqual({ name: "a", definition: a });
  });

  it("should fail for an unknown interface", () => {
    const map = new DictionaryFactoryMap({ a: feature("test.IFace") });

    expect(() => map.getByType("test.Other")).toThrow(
      "Feature test.Other was not found in factory map",
    );
  });

  it("should pick the last definition when none is default", () => {
    const map = new DictionaryFactoryMap({
      first: feature("test.IFace"),
      second: feature("test.IFace"),
      third: feature("test.IFace"),
    });

    expect(map.getByType("test.IFace").name).toBe("third");
  });

  it("should pick the default wherever it appears", () => {
    const early = new DictionaryFactoryMap({
      chosen: feature("test.IFace", true),
      later: feature("test.IFace"),
    });
    const late = new DictionaryFactoryMap({
      earlier: feature("test.IFace"),
      chosen: feature("test.IFace", true),
      last: feature("test.IFace"),
    });

    expect(early.getByType("test.IFace").name).toBe("chosen");
    expect(late.getByType("test.IFace").name).toBe("chosen");
  });

  it("should fail at construction with two defaults for one interface", () => {
    expect(
      () =>
        new DictionaryFactoryMap({
          a: feature("test.IFace", true),
          b: feature("test.Other", true),
          c: feature("test.IFace", true),
        }),
    ).toThrow(new MultipleFeatureDefaultsError("test.IFace"));
  });

  it("should keep interfaces independent", () => {
    const map = new DictionaryFactoryMap(
      new Map([
        ["storage", feature("test.Storage", false, "test.FileStorage")],
        ["metrics", feature("test.Metrics", true, "test.LogMetrics")],
      ]),
    );

    expect(map.getByType("test.Storage").definition.factoryId).toBe("test.FileStorage");
    expect(map.getByType("test.Metrics").definition.factoryId).toBe("test.LogMetrics");
    expect(map.names()).toEqual(["storage", "metrics"]);
  });
});
