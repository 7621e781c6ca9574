/**
 * Base command interface for the example programs.
 */

import type { CliOutcome } from "@shapeargs/core";

export const PROGRAM = "shapeargs-examples";

export interface ExampleCommand {
  /** Command name (e.g., "flags") */
  name: string;

  /** Command description for the command list */
  description: string;

  /** Run with the arguments that follow the command name. Resolves to the exit code. */
  execute(argv: string[]): Promise<number>;
}

/**
 * Print an outcome the way `cli()` does, but hand back the exit code
 * instead of exiting.
 */
export function report<T>(outcome: CliOutcome<T>, show: (value: T) => string): number {
  switch (outcome.kind) {
    case "value":
      console.log(show(outcome.value));
      return 0;
    case "help":
      console.log(outcome.text);
      return 0;
    case "error":
      console.error(outcome.usage);
      console.error("");
      console.error(`error: ${outcome.error.message}`);
      return 2;
  }
}
