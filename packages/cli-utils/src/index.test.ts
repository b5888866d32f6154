import { afterEach, describe, expect, it, vi } from "vitest";
import { CliUsageError, reportFatal, usageError } from "./index";

describe("cli-utils", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("usageError appends the help text", () => {
    const err = usageError("Unknown option: --x", "Usage:\n  tool");
    expect(err).toBeInstanceOf(CliUsageError);
    expect(err.name).toBe("CliUsageError");
    expect(err.exitCode).toBe(2);
    expect(err.message).toBe("Unknown option: --x\n\nUsage:\n  tool");
  });

  it("reportFatal prints only the message for errors with an exit code", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(reportFatal(new CliUsageError("bad flag"))).toBe(2);
    expect(spy).toHaveBeenCalledWith("bad flag");
  });

  it("reportFatal prints the stack and exits 1 otherwise", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const err = new Error("boom");
    expect(reportFatal(err)).toBe(1);
    expect(spy).toHaveBeenCalledWith(String(err.stack));

    expect(reportFatal("plain")).toBe(1);
    expect(spy).toHaveBeenLastCalledWith("plain");
  });
});
