import { Command, CommanderError } from "commander";

import { configureExtractCommand, type ExtractIo } from "./cli/extract.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./core/error-format.js";

export const PROGRAM_NAME = "composition-inventory";
export const PROGRAM_VERSION = "0.1.0";

export function buildCli(io?: ExtractIo): Command {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description("Inventory the managed resources produced by Crossplane Compositions")
    .version(PROGRAM_VERSION)
    .option("--debug", "Show error details and stack traces", false);

  if (io) {
    program.configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });
  }

  return configureExtractCommand(program, io);
}

export async function main(argv: string[], io?: ExtractIo): Promise<number> {
  const program = buildCli(io).exitOverride();
  const stderr = io?.stderr ?? process.stderr;

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already printed help, version, or usage errors.
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const debug = program.opts<{ debug?: boolean }>().debug === true;
    const lines = formatErrorLines(err, { mode: debug ? "debug" : "short" });
    const format = createAnsiFormatter(resolveColorEnabled({ stream: stderr }));
    stderr.write(`${renderErrorLines(lines, format)}\n`);
    return 1;
  }
}
