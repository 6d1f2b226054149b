import { vi } from "vitest";
import type { BlobStorage, LocusLogger } from "@locus-sdk/types";
import { readText } from "../src/transcoding";

/** Reads every blob in a store into a key → text record. */
export async function collect(storage: BlobStorage): Promise<Record<string, string>> {
  const contents: Record<string, string> = {};
  for await (const blob of storage) {
    contents[blob.key] = await blob.withStream((stream) => readText(stream));
  }
  return contents;
}

export function createMockLogger() {
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

export function createMockInstrumentation() {
  return {
    registerReport: vi.fn(),
    registerGauge: vi.fn(),
    registerCounter: vi.fn(),
    report: vi.fn(),
    updateGauge: vi.fn(),
    increaseCounter: vi.fn(),
  };
}
