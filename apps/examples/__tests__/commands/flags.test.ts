import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { FlagsCommand } from "../../src/commands/flags.js";

describe("FlagsCommand", () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should parse an explicit boolean and apply switch defaults", async () => {
    const exitCode = await new FlagsCommand().execute(["--boolean", "True"]);

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('{"boolean":true,"flag_a":false,"flag_b":true}');
  });

  it("should flip switches", async () => {
    const exitCode = await new FlagsCommand().execute(["--boolean", "False", "--flag-a", "--no-flag-b"]);

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('{"boolean":false,"flag_a":true,"flag_b":false}');
  });

  it("should report a missing required flag with exit code 2", async () => {
    const exitCode = await new FlagsCommand().execute([]);

    expect(exitCode).toBe(2);
    expect(errorSpy).toHaveBeenCalledTimes(3);
    expect(errorSpy.mock.calls[2]).toEqual(["error: Missing required argument: --boolean"]);
  });

  it("should print help", async () => {
    const exitCode = await new FlagsCommand().execute(["--help"]);

    expect(exitCode).toBe(0);
    expect(String(logSpy.mock.calls[0][0]).split("\n")[2]).toBe(
      "Booleans as explicit values and as --flag/--no-flag switches",
    );
  });
});
