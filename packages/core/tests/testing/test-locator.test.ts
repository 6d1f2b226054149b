import { describe, it, expect, vi } from "vitest";
import type { LocusLogger } from "@locus-sdk/types";
import { FactoryRegistry } from "../../src/di/registry";
import { defineInterface, methodGuard } from "../../src/di/interfaces";
import { ServiceLocator } from "../../src/locator/service-locator";
import { withTestServiceLocator } from "../../src/testing/test-locator";

interface Clock {
  now(): number;
  close(): void;
}

const CLOCK = defineInterface("test.Clock", methodGuard<Clock>("now", "close"));

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

describe("withTestServiceLocator", () => {
  it("should configure the process-wide locator from definitions", async () => {
    // Arrange
    const close = vi.fn();
    const registry = new FactoryRegistry().registerFactory("test.FixedClock", (at: number) => ({
      now: () => at,
      close,
    }));
    const definitions = {
      clock: {
        factoryId: "test.FixedClock",
        interfaceId: "test.Clock",
        args: [42],
        kwargs: {},
        isDefault: false,
      },
    };

    // Act
    const seen = await withTestServiceLocator(
      definitions,
      () => ServiceLocator.service(CLOCK).now(),
      { registry, logger: createMockLogger() },
    );

    // Assert
    expect(seen).toBe(42);
    expect(close).toHaveBeenCalledTimes(1);
    expect(ServiceLocator.isConfigured()).toBe(false);
  });

  it("should reset even when the callback throws", async () => {
    await expect(
      withTestServiceLocator(
        {},
        () => {
          throw new Error("test failure");
        },
        { logger: createMockLogger() },
      ),
    ).rejects.toThrow("test failure");
    expect(ServiceLocator.isConfigured()).toBe(false);
  });
});
