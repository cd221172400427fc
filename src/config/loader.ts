/**
 * Configuration loading
 *
 * A JSON file is merged section by section over DEFAULT_CONFIG, command-line
 * overrides are applied on top, and the result is validated once. Relative
 * manifest paths are resolved against the configuration file's directory.
 */

import { type } from "arktype";
import { dirname, resolve } from "node:path";
import { ConfigurationError } from "../errors";
import { readToString } from "../io/file-reader";
import { DEFAULT_CONFIG } from "./defaults";
import { CONFIG_SECTIONS, type PipelineConfig, PipelineConfigSchema } from "./schema";

/**
 * Values supplied on the command line; they win over the file
 */
export interface ConfigOverrides {
  readonly outputRoot?: string;
  readonly resume?: boolean;
  readonly parallelism?: number;
}

export interface LoadConfigOptions {
  /** JSON configuration file; defaults apply when omitted */
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
  /** Directory relative paths resolve against when there is no file (default: cwd) */
  readonly baseDirectory?: string;
}

export interface LoadedConfig {
  readonly config: PipelineConfig;
  readonly source: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge raw configuration over the defaults and validate it
 *
 * @throws {ConfigurationError} When the merged configuration is invalid
 */
export function resolveConfig(
  input: unknown,
  overrides: ConfigOverrides = {},
  source = "<defaults>"
): PipelineConfig {
  if (!isRecord(input)) {
    throw new ConfigurationError("Configuration must be a JSON object", source);
  }

  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG, ...input };
  for (const section of CONFIG_SECTIONS) {
    const value = input[section];
    if (isRecord(value)) {
      merged[section] = { ...DEFAULT_CONFIG[section], ...value };
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const result = PipelineConfigSchema(merged);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid configuration: ${result.summary}`, source);
  }
  return result;
}

/**
 * Load, merge, validate and path-resolve the run configuration
 *
 * @throws {ConfigurationError} When the file is unreadable, not JSON, or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { configPath, overrides } = options;

  let raw: unknown = {};
  let baseDirectory = resolve(options.baseDirectory ?? ".");
  let source = "<defaults>";

  if (configPath !== undefined) {
    source = resolve(configPath);
    baseDirectory = dirname(source);

    let text: string;
    try {
      text = await readToString(source);
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file: ${error instanceof Error ? error.message : String(error)}`,
        source
      );
    }
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigurationError(
        `Configuration file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        source
      );
    }
  }

  const config = resolveConfig(raw, overrides, source);
  return {
    config: {
      ...config,
      manifests: {
        samples: resolve(baseDirectory, config.manifests.samples),
        auxiliary: resolve(baseDirectory, config.manifests.auxiliary),
      },
    },
    source,
  };
}
