/**
 * Logger selection for a pipeline run
 *
 * The orchestrator logs through Effect's logger with `sample` and `stage`
 * annotations and one span per stage; this layer picks how those records
 * are rendered and which levels pass.
 */

import { Layer, Logger, LogLevel } from "effect";
import type { LogFormatName, LogLevelName } from "./config/schema";

const LOG_LEVELS: Readonly<Record<LogLevelName, LogLevel.LogLevel>> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

const LOG_FORMATS: Readonly<Record<LogFormatName, Layer.Layer<never>>> = {
  pretty: Logger.pretty,
  logfmt: Logger.logFmt,
  json: Logger.json,
};

export function loggerLayer(level: LogLevelName, format: LogFormatName): Layer.Layer<never> {
  return Layer.merge(LOG_FORMATS[format], Logger.minimumLogLevel(LOG_LEVELS[level]));
}
