import { afterEach, describe, expect, it, vi } from "vitest";
import logger from "../logger";

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe("logger", () => {
  it("writes the level, message and metadata on one line", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    logger.info("Router ready", { threshold: 0.6 });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\[INFO\] \S+ Router ready \{"threshold":0\.6\}$/);
  });

  it("prefixes child loggers with their context", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.child({ component: "intent-router" }).warn("Verification failed");

    expect(warn.mock.calls[0][0]).toMatch(/ \{"component":"intent-router"\} Verification failed$/);
  });

  it("drops debug output in production", () => {
    vi.stubEnv("NODE_ENV", "production");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    logger.debug("hidden");

    expect(debug).not.toHaveBeenCalled();
  });
});
