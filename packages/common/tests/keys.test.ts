import { describe, it, expect } from "vitest";
import { sanitiseKey, joinKey, toBlobKey, stripKeyPrefix } from "../src/keys";
import { BlobStorageError } from "../src/errors";

describe("sanitiseKey", () => {
  it("strips a leading slash", () => {
    expect(sanitiseKey("/a/b.txt")).toBe("a/b.txt");
  });

  it("strips a trailing slash", () => {
    expect(sanitiseKey("folder/")).toBe("folder");
  });

  it("strips repeated slashes at both ends", () => {
    expect(sanitiseKey("//double/namespace//")).toBe("double/namespace");
  });

  it("leaves inner slashes alone", () => {
    expect(sanitiseKey("a/b/c")).toBe("a/b/c");
  });

  it("returns an empty string for the root key", () => {
    expect(sanitiseKey("/")).toBe("");
  });
});

describe("joinKey", () => {
  it("joins a prefix and key", () => {
    expect(joinKey("datasets", "/a.csv")).toBe("datasets/a.csv");
  });

  it("returns the key when there is no prefix", () => {
    expect(joinKey("", "/a.csv")).toBe("a.csv");
  });

  it("returns the prefix when the key is the root", () => {
    expect(joinKey("datasets", "/")).toBe("datasets");
  });

  it("sanitises the prefix as well", () => {
    expect(joinKey("/one/two/", "three")).toBe("one/two/three");
  });
});

describe("toBlobKey", () => {
  it("adds a leading slash", () => {
    expect(toBlobKey("a/b.txt")).toBe("/a/b.txt");
  });

  it("does not double an existing leading slash", () => {
    expect(toBlobKey("/a/b.txt")).toBe("/a/b.txt");
  });
});

describe("stripKeyPrefix", () => {
  it("removes the namespace prefix", () => {
    expect(stripKeyPrefix("ns/inner/file.txt", "ns")).toBe("inner/file.txt");
  });

  it("returns the key unchanged without a prefix", () => {
    expect(stripKeyPrefix("file.txt", "")).toBe("file.txt");
  });

  it("rejects keys outside the namespace", () => {
    expect(() => stripKeyPrefix("other/file.txt", "ns")).toThrow(BlobStorageError);
    expect(() => stripKeyPrefix("other/file.txt", "ns")).toThrow(
      "Blob namespace 'ns' does not match blob name 'other/file.txt'",
    );
  });

  it("does not treat a sibling with the same leading characters as inside", () => {
    expect(() => stripKeyPrefix("nsx/file.txt", "ns")).toThrow(BlobStorageError);
  });
});
