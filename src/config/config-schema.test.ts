import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../types/config.js";

describe("config validation", () => {
  it("applies defaults when nothing is provided", () => {
    const config = resolveConfig();
    expect(config).toEqual({
      connectTimeoutMs: 1000,
      connectRetryScheduleMs: [500, 500, 1500, 5000],
      channelOpenTimeoutMs: 1000,
      auxiliaryHelloTimeoutMs: 1000,
      dvrRecordSeconds: 60,
    });
  });

  it("applies defaults for omitted fields", () => {
    const config = resolveConfig({ connectTimeoutMs: 250 });
    expect(config.connectTimeoutMs).toBe(250);
    expect(config.channelOpenTimeoutMs).toBe(DEFAULT_CONFIG.channelOpenTimeoutMs);
  });

  it("copies the retry schedule instead of sharing the default array", () => {
    const config = resolveConfig();
    expect(config.connectRetryScheduleMs).not.toBe(DEFAULT_CONFIG.connectRetryScheduleMs);
  });

  it("accepts an empty retry schedule (single attempt)", () => {
    const config = resolveConfig({ connectRetryScheduleMs: [] });
    expect(config.connectRetryScheduleMs).toEqual([]);
  });

  it("accepts zero for auxiliaryHelloTimeoutMs (skip the wait)", () => {
    const config = resolveConfig({ auxiliaryHelloTimeoutMs: 0 });
    expect(config.auxiliaryHelloTimeoutMs).toBe(0);
  });

  it("rejects zero for positive-required fields", () => {
    expect(() => resolveConfig({ connectTimeoutMs: 0 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ channelOpenTimeoutMs: 0 })).toThrow("Invalid configuration");
  });

  it("rejects negative retry delays", () => {
    expect(() => resolveConfig({ connectRetryScheduleMs: [500, -1] })).toThrow(
      "Invalid configuration",
    );
  });

  it("rejects non-integer timeouts", () => {
    expect(() => resolveConfig({ connectTimeoutMs: 12.5 })).toThrow("Invalid configuration");
  });

  it("rejects DVR lengths outside 1..600 seconds", () => {
    expect(() => resolveConfig({ dvrRecordSeconds: 0 })).toThrow("Invalid configuration");
    expect(() => resolveConfig({ dvrRecordSeconds: 601 })).toThrow("Invalid configuration");
  });
});
