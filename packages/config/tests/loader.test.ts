import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { LocusLogger } from "@locus-sdk/types";
import {
  ConfigFileNotFoundError,
  FeatureConfigError,
  MultipleFeatureDefaultsError,
} from "@locus-sdk/common";
import { setRootLogger } from "@locus-sdk/telemetry";
import {
  factoryDefinitionFromJson,
  factoryMapFromFile,
  factoryMapFromJson,
  loadFactoryMap,
} from "../src/loader";
import { PropertyResolver, STANDARD_PROPERTY_RESOLVER } from "../src/property-resolver";
import { commandLineProvider, environmentProvider } from "../src/providers";

function createMockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn<LocusLogger["child"]>(),
    withContext: vi.fn<LocusLogger["withContext"]>(),
  };
  logger.child.mockReturnValue(logger);
  logger.withContext.mockReturnValue(logger);
  return logger;
}

const CONFIG = {
  version: 1,
  features: {
    a: { factory: "pkg.Impl", implements: "pkg.IFace", args: [1, "$P=5"], kwargs: {} },
  },
};

describe("factoryDefinitionFromJson", () => {
  it("should apply defaults for optional fields", () => {
    const definition = factoryDefinitionFromJson(
      { factory: "pkg.Impl", implements: "pkg.IFace" },
      new PropertyResolver([]),
    );

    expect(definition).toEqual({
      factoryId: "pkg.Impl",
      interfaceId: "pkg.IFace",
      args: [],
      kwargs: {},
      isDefault: false,
    });
  });

  it("should resolve properties in args and kwargs", () => {
    const resolver = new PropertyResolver([environmentProvider({ ROOT: "/srv" })]);

    const definition = factoryDefinitionFromJson(
      {
        factory: "pkg.Impl",
        implements: "pkg.IFace",
        args: ["$ROOT"],
        kwargs: { namespace: "$NS=default-ns" },
        default: true,
      },
      resolver,
    );

    expect(definition.args).toEqual(["/srv"]);
    expect(definition.kwargs).toEqual({ namespace: "default-ns" });
    expect(definition.isDefault).toBe(true);
  });

  it("should reject entries without a factory", () => {
    expect(() => factoryDefinitionFromJson({ implements: "pkg.IFace" })).toThrow(
      FeatureConfigError,
    );
  });
});

describe("factoryMapFromJson", () => {
  it("should resolve $P to its default when unset everywhere", () => {
    const resolver = new PropertyResolver([commandLineProvider([]), environmentProvider({})]);

    const map = factoryMapFromJson(structuredClone(CONFIG), resolver);

    expect(map.getByName("a").args).toEqual([1, "5"]);
    expect(map.getByType("pkg.IFace").name).toBe("a");
  });

  it("should resolve $P from the environment", () => {
    const resolver = new PropertyResolver([commandLineProvider([]), environmentProvider({ P: "9" })]);

    const map = factoryMapFromJson(structuredClone(CONFIG), resolver);

    expect(map.getByName("a").args).toEqual([1, "9"]);
  });

  it("should let the command line win over the environment", () => {
    const resolver = new PropertyResolver([
      commandLineProvider(["--P=7"]),
      environmentProvider({ P: "9" }),
    ]);

    const map = factoryMapFromJson(structuredClone(CONFIG), resolver);

    expect(map.getByName("a").args).toEqual([1, "7"]);
  });

  it("should treat a missing version as 0", () => {
    expect(() => factoryMapFromJson({ features: {} })).toThrow(
      "Incorrect feature version in config 0, but required 1",
    );
  });

  it("should reject other versions", () => {
    expect(() => factoryMapFromJson({ version: 2, features: {} })).toThrow(
      "Incorrect feature version in config 2, but required 1",
    );
  });

  it("should reject malformed features", () => {
    expect(() =>
      factoryMapFromJson({ version: 1, features: { a: { factory: "x", implements: 3 } } }),
    ).toThrow(FeatureConfigError);
  });

  it("should surface duplicate defaults", () => {
    const json = {
      version: 1,
      features: {
        a: { factory: "pkg.A", implements: "pkg.IFace", default: true },
        b: { factory: "pkg.B", implements: "pkg.IFace", default: true },
      },
    };

    expect(() => factoryMapFromJson(json, new PropertyResolver([]))).toThrow(
      MultipleFeatureDefaultsError,
    );
  });
});

describe("files", () => {
  let dir: string;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "locus-config-"));
    logger = createMockLogger();
    setRootLogger(logger);
  });

  afterEach(() => {
    setRootLogger(null);
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  describe("factoryMapFromFile", () => {
    it("should load a config file and log where from", () => {
      const file = path.join(dir, "features.json");
      writeFileSync(file, JSON.stringify(CONFIG));

      const map = factoryMapFromFile(file, new PropertyResolver([]));

      expect(map.getByName("a").args).toEqual([1, "5"]);
      expect(logger.info).toHaveBeenCalledWith(`Reading factory map file from ${file}`);
    });

    it("should report config errors against the file", () => {
      const file = path.join(dir, "features.json");
      writeFileSync(file, JSON.stringify({ features: {} }));

      expect(() => factoryMapFromFile(file)).toThrow(
        `Problem with file '${file}': Incorrect feature version in config 0, but required 1`,
      );
    });

    it("should report invalid JSON as a config error", () => {
      const file = path.join(dir, "features.json");
      writeFileSync(file, "{ not json");

      expect(() => factoryMapFromFile(file)).toThrow(FeatureConfigError);
    });
  });

  describe("loadFactoryMap", () => {
    it("should read the file named by FEATURES_CONFIG", () => {
      vi.stubEnv("FEATURES_CONFIG", "custom.json");
      vi.stubEnv("P", "9");
      writeFileSync(path.join(dir, "custom.json"), JSON.stringify(CONFIG));

      const map = loadFactoryMap({ paths: [dir], resolver: STANDARD_PROPERTY_RESOLVER });

      expect(map.getByName("a").args).toEqual([1, "9"]);
    });

    it("should fail when no directory holds the file", () => {
      expect(() => loadFactoryMap({ fileName: "absent.json", paths: [dir] })).toThrow(
        ConfigFileNotFoundError,
      );
    });
  });
});
