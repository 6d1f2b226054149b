import { describe, it, expectTypeOf } from "vitest";
import type { Readable } from "node:stream";
import type {
  Blob,
  BlobStorage,
  DeletableBlobStorage,
  FactoryDefinition,
  Primitive,
  Provider,
} from "../src/index";

describe("@locus-sdk/types", () => {
  it("should narrow namespaces of deletable stores to deletable stores", () => {
    expectTypeOf<DeletableBlobStorage>().toMatchTypeOf<BlobStorage>();
    expectTypeOf<ReturnType<DeletableBlobStorage["namespace"]>>().toEqualTypeOf<
      Promise<DeletableBlobStorage>
    >();
  });

  it("should iterate blob storage as blobs", () => {
    expectTypeOf<BlobStorage>().toMatchTypeOf<AsyncIterable<Blob>>();
    expectTypeOf<Parameters<Blob["withStream"]>[0]>().parameter(0).toEqualTypeOf<Readable>();
  });

  it("should only allow primitive factory arguments", () => {
    expectTypeOf<FactoryDefinition["args"]>().toEqualTypeOf<Primitive[]>();
    expectTypeOf<{ nested: { value: 1 } }>().not.toMatchTypeOf<Primitive>();
  });

  it("should accept classes and factory functions as providers", () => {
    class Store {}

    expectTypeOf({ useClass: Store }).toMatchTypeOf<Provider>();
    expectTypeOf({ useFactory: () => new Store() }).toMatchTypeOf<Provider>();
  });
});
