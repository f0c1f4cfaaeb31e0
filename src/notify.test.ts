import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleNotifier } from "./notify.js";

describe("ConsoleNotifier", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the failure and the kept state", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    new ConsoleNotifier(false).syncFailed("Light API error 503: Request failed", {
      power: true,
      brightness: 70,
      temperature: 200,
    });

    expect(error.mock.calls).toEqual([
      ["Light update failed: Light API error 503: Request failed"],
      ['  desired state kept: {"power":true,"brightness":70,"temperature":200}'],
    ]);
    expect(write).not.toHaveBeenCalled();
  });

  it("rings the bell when enabled", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    new ConsoleNotifier(true).syncFailed("boom", { power: false, brightness: 3, temperature: 143 });

    expect(write).toHaveBeenCalledWith("\u0007");
  });
});
