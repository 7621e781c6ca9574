/**
 * Routes the first argument to an example command.
 */

import { PROGRAM, type ExampleCommand } from "./commands/base.js";
import { FlagsCommand } from "./commands/flags.js";
import { JsonCommand } from "./commands/json.js";
import { TrainCommand } from "./commands/train.js";
import { VersionCommand } from "./commands/version.js";

export const COMMANDS: readonly ExampleCommand[] = [
  new FlagsCommand(),
  new TrainCommand(),
  new JsonCommand(),
  new VersionCommand(),
];

export function formatCommandList(): string {
  const width = Math.max(...COMMANDS.map((cmd) => cmd.name.length));
  return [
    `usage: ${PROGRAM} <command> [args...]`,
    "",
    "commands:",
    ...COMMANDS.map((cmd) => `  ${cmd.name.padEnd(width)}  ${cmd.description}`),
  ].join("\n");
}

export async function run(argv: string[]): Promise<number> {
  const [commandName, ...rest] = argv;

  if (commandName === "-h" || commandName === "--help") {
    console.log(formatCommandList());
    return 0;
  }

  if (commandName === undefined) {
    console.error(formatCommandList());
    return 2;
  }

  const command = COMMANDS.find((cmd) => cmd.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.error(`Available commands: ${COMMANDS.map((cmd) => cmd.name).join(", ")}`);
    return 2;
  }

  return command.execute(rest);
}
