import { describe, expect, it } from "vitest";
import { LightEndpointError, describeError } from "./errors.js";

describe("describeError", () => {
  it("uses the message of an Error", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
  });

  it("appends the cause message", () => {
    const err = new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND light.test") });
    expect(describeError(err)).toBe("fetch failed: getaddrinfo ENOTFOUND light.test");
  });

  it("does not repeat a cause already in the message", () => {
    const cause = new Error("socket hang up");
    const err = new LightEndpointError("Light unreachable: socket hang up", { cause });
    expect(describeError(err)).toBe("Light unreachable: socket hang up");
  });

  it("stringifies non-errors", () => {
    expect(describeError("plain")).toBe("plain");
    expect(describeError(404)).toBe("404");
  });
});

describe("LightEndpointError", () => {
  it("carries the status and name", () => {
    const err = new LightEndpointError("Light API error 404: Request failed", { status: 404 });
    expect(err.name).toBe("LightEndpointError");
    expect(err.status).toBe(404);
    expect(err).toBeInstanceOf(Error);
  });
});
