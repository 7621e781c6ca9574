/**
 * Version command - display version information.
 */

import { readFile } from "node:fs/promises";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parseCli } from "@shapeargs/core";
import { PROGRAM, report, type ExampleCommand } from "./base.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const PackageManifest = z.object({ version: z.string() });

const VersionArgs = z.object({
  verbose: z.boolean().default(false).describe("Also print the runtime and platform."),
});

export class VersionCommand implements ExampleCommand {
  name = "version";
  description = "Display version information";

  async execute(argv: string[]): Promise<number> {
    const outcome = parseCli(VersionArgs, { prog: `${PROGRAM} ${this.name}`, args: argv });
    if (outcome.kind !== "value") return report(outcome, () => "");

    try {
      const pkgPath = resolve(__dirname, "../../package.json");
      const pkg = PackageManifest.parse(JSON.parse(await readFile(pkgPath, "utf-8")));

      console.log(`${PROGRAM} v${pkg.version}`);

      if (outcome.value.verbose) {
        console.log(`Node.js ${process.version}`);
        console.log(`Platform: ${process.platform} ${process.arch}`);
      }

      return 0;
    } catch (err) {
      console.error(`Failed to read version information: ${err instanceof Error ? err.message : String(err)}`);
      return 1;
    }
  }
}
