import { Command, CommanderError, InvalidArgumentError } from "commander";
import { ConfigurationError } from "../errors.js";
import {
  runDumpCommand,
  type DumpCommandOptions,
} from "./dump-command.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

interface CliOptions {
  readonly format?: string;
  readonly ext?: string;
  readonly allText?: boolean;
  readonly exclude?: string;
  readonly allFiles?: boolean;
  readonly maxBytes?: number;
  readonly structure: boolean;
  readonly structureMax?: number;
  readonly includeExcluded?: boolean;
  readonly splitBytes?: number;
  readonly splitMb?: number;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
}

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

export interface RunCliOptions {
  readonly version: string;
  readonly io?: CliIo;
  /** Passed through to the dump, mainly for tests. */
  readonly command?: Pick<DumpCommandOptions, "cwd" | "lister">;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/** Runs the command line and resolves to the process exit code. */
export async function runCli(
  argv: readonly string[],
  options: RunCliOptions,
): Promise<number> {
  const io = options.io ?? processIo;
  let exitCode = EXIT_OK;
  const program = new Command();

  program
    .name("dirdump")
    .version(options.version)
    .description(
      "Dump a directory's structure and text file contents into md/txt files (binaries skipped).",
    )
    .argument("[project]", "Project root directory", ".")
    .argument("[target]", "Target under the project, or '.' for all of it", ".")
    .argument("[output]", "Output file (default: <project>/<target>_dump.<format>)")
    .option("--format <format>", "Output format (md|txt)")
    .option("--ext <csv>", "Comma-separated extensions to include")
    .option("--all-text", "Include every file that is not binary (ignores --ext)")
    .option("--exclude <csv>", "Directory names or paths to exclude")
    .option("--all-files", "Walk the filesystem even inside a git repository")
    .option("--max-bytes <n>", "Skip files larger than n bytes", parseCount)
    .option("--no-structure", "Omit the structure listing")
    .option("--structure-max <n>", "Limit structure entries", parseCount)
    .option(
      "--include-excluded",
      "List excluded directories in the structure without expanding them",
    )
    .option("--split-bytes <n>", "Split output into parts of n bytes", parseCount)
    .option("--split-mb <n>", "Split output into parts of n MiB", parseCount)
    .option("--config <path>", "Configuration file (default: <project>/.dirdump.yaml)")
    .option("--verbose", "Verbose output")
    .option("--quiet", "Suppress non-essential output")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(
      async (
        project: string,
        target: string,
        output: string | undefined,
        cli: CliOptions,
      ) => {
        try {
          const result = await runDumpCommand({
            ...options.command,
            project,
            target,
            output,
            format: cli.format,
            ext: cli.ext,
            allText: cli.allText ? true : undefined,
            exclude: cli.exclude,
            allFiles: cli.allFiles ? true : undefined,
            maxBytes: cli.maxBytes,
            structure: cli.structure ? undefined : false,
            structureMax: cli.structureMax,
            includeExcluded: cli.includeExcluded ? true : undefined,
            splitBytes: cli.splitBytes,
            splitMb: cli.splitMb,
            config: cli.config,
            log: cli.verbose
              ? (message) => io.stderr(`[dirdump] ${message}\n`)
              : undefined,
          });

          if (!cli.quiet) {
            for (const part of result.parts) {
              io.stdout(`OK: ${part}\n`);
            }
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          io.stderr(`[ERROR] ${message}\n`);
          exitCode =
            error instanceof ConfigurationError ? EXIT_USAGE : EXIT_FAILURE;
        }
      },
    );

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    // --help and --version end here too, with exit code 0.
    return error.exitCode === EXIT_OK ? EXIT_OK : EXIT_USAGE;
  }
  return exitCode;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}
