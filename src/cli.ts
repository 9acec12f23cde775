import { Command, CommanderError } from "commander";
import { StorageService } from "./storage";
import { Tracker, type Clock } from "./tracker";
import { resolveStorePaths, type StorePaths } from "./paths";
import { describeCause } from "./errors";
import { formatPeriodLine, formatTimestamp } from "./periodUtils";

export const VERSION = "0.1.0";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export interface CliOptions {
  paths?: StorePaths;
  now?: Clock;
  output?: CliOutput;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function createProgram(tracker: Tracker, output: CliOutput): Command {
  const program = new Command();

  program
    .name("tracc")
    .description("Track the periods you spend working")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    });

  program
    .command("begin")
    .description("Start a new work period")
    .action(async () => {
      const { previous } = await tracker.begin();
      output.log(
        previous?.end
          ? `Starting new period. Last one ended at ${formatTimestamp(
              previous.end
            )}`
          : "Starting new period."
      );
    });

  program
    .command("end")
    .description("End the running work period")
    .action(async () => {
      const { period } = await tracker.end();
      output.log(`Ending period started at ${formatTimestamp(period.start)}`);
    });

  program
    .command("show")
    .description("List all recorded work periods")
    .action(async () => {
      const periods = await tracker.list();
      for (const period of periods) {
        output.log(formatPeriodLine(period));
      }
    });

  return program;
}

/**
 * Runs one invocation of the CLI and resolves to its exit code. Failures are
 * reported on the error output, never thrown.
 */
export async function run(
  argv: string[],
  options: CliOptions = {}
): Promise<number> {
  const output = options.output ?? consoleOutput;
  const storage = new StorageService(options.paths ?? resolveStorePaths());
  const tracker = new Tracker(storage, options.now);
  const program = createProgram(tracker, output);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Usage errors were already written through configureOutput
      return err.exitCode;
    }
    output.error(`tracc: ${describeCause(err)}`);
    return 1;
  }
}
