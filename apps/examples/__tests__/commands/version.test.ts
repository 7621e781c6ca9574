import { describe, it, expect, vi, afterEach } from "vitest";
import { VersionCommand } from "../../src/commands/version.js";

describe("VersionCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should print the package version", async () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const exitCode = await new VersionCommand().execute([]);

    expect(exitCode).toBe(0);
    expect(consoleSpy.mock.calls).toEqual([["shapeargs-examples v0.1.0"]]);
  });

  it("should print runtime details with --verbose", async () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const exitCode = await new VersionCommand().execute(["--verbose"]);

    expect(exitCode).toBe(0);
    expect(consoleSpy).toHaveBeenCalledWith(`Node.js ${process.version}`);
    expect(consoleSpy).toHaveBeenCalledWith(`Platform: ${process.platform} ${process.arch}`);
  });
});
