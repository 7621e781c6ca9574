import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { JsonCommand } from "../../src/commands/json.js";

describe("JsonCommand", () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should parse a JSON object", async () => {
    const exitCode = await new JsonCommand().execute(["--config", '{"lr": 0.1}']);

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith('{"config":{"lr":0.1},"overrides":{}}');
  });

  it("should reject JSON that is not an object", async () => {
    const exitCode = await new JsonCommand().execute(["--config", "[1]"]);

    expect(exitCode).toBe(2);
    expect(errorSpy.mock.calls[2]).toEqual(['error: Invalid value for --config: ["[1]"]: expected a JSON object']);
  });

  it("should report malformed JSON", async () => {
    const exitCode = await new JsonCommand().execute(["--config", "{"]);

    expect(exitCode).toBe(2);
    expect(String(errorSpy.mock.calls[2][0]).startsWith('error: Invalid value for --config: ["{"]: ')).toBe(true);
  });
});
