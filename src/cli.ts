#!/usr/bin/env -S npx tsx
/**
 * Command-line entry point
 *
 * Usage:
 *   npx tsx src/cli.ts [options]
 *   npm run pipeline -- [options]
 *
 * Options:
 *   -c, --config <file>     JSON configuration (default: built-in defaults)
 *   -o, --output-root <dir> Run into this directory instead of a new timestamped one
 *   --resume                Skip stages whose completion marker and artifacts exist
 *   -j, --parallelism <n>   Samples processed at once (default: 1)
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Pipeline completed
 *   1 - Configuration, stage or data error
 */

import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { createRunContext } from "./config/run-context";
import { type ConfigOverrides, loadConfig } from "./config/loader";
import { ConfigurationError, PipelineError } from "./errors";
import { executePipeline } from "./pipeline/orchestrator";

const USAGE = `
Usage: pipeline [options]

Options:
  -c, --config <file>      JSON configuration (default: built-in defaults)
  -o, --output-root <dir>  Run into this directory instead of a new timestamped one
  --resume                 Skip stages whose completion marker and artifacts exist
  -j, --parallelism <n>    Samples processed at once (default: 1)
  -h, --help               Show this help message
`;

export interface CliOptions {
  readonly help: boolean;
  readonly configPath?: string;
  readonly overrides: ConfigOverrides;
}

const CLI_OPTIONS = {
  config: { type: "string", short: "c" },
  "output-root": { type: "string", short: "o" },
  resume: { type: "boolean", default: false },
  parallelism: { type: "string", short: "j" },
  help: { type: "boolean", short: "h", default: false },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: CLI_OPTIONS }).values;
  } catch (error) {
    throw new ConfigurationError(
      error instanceof Error ? error.message : String(error),
      "command line"
    );
  }
}

/**
 * @throws {ConfigurationError} On unknown options or a malformed value
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = readArgs(argv);

  let parallelism: number | undefined;
  if (values.parallelism !== undefined) {
    parallelism = Number(values.parallelism);
    if (!Number.isInteger(parallelism) || parallelism < 1) {
      throw new ConfigurationError(
        `--parallelism must be a positive integer, got '${values.parallelism}'`,
        "command line"
      );
    }
  }

  return {
    help: values.help === true,
    ...(values.config !== undefined && { configPath: values.config }),
    overrides: {
      ...(values["output-root"] !== undefined && { outputRoot: values["output-root"] }),
      ...(values.resume === true && { resume: true }),
      ...(parallelism !== undefined && { parallelism }),
    },
  };
}

export async function main(argv: readonly string[]): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const { config } = await loadConfig({
      ...(options.configPath !== undefined && { configPath: options.configPath }),
      overrides: options.overrides,
    });
    const context = await createRunContext(config);
    const report = await executePipeline(context);

    console.log(`Pipeline finished: ${report.samples.length} sample(s) in ${report.outputRoot}`);
    return 0;
  } catch (error) {
    if (error instanceof PipelineError) {
      console.error(error.toString());
    } else {
      console.error(error);
    }
    return 1;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
