import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type Level, type LoggerOptions } from "pino";

interface LogSettings {
  level: string;
  file?: string;
}

function readSettings(env: NodeJS.ProcessEnv): LogSettings {
  const file = env.LOG_FILE?.trim();
  return {
    level: env.LOG_LEVEL ?? "info",
    file: file === undefined || file === "" ? undefined : file,
  };
}

const STREAM_LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

// "silent" and custom levels fall back to info for the multistream entries
function streamLevel(level: string): Level {
  return STREAM_LEVELS.find((candidate) => candidate === level) ?? "info";
}

/**
 * stdout plus the log file when LOG_FILE is set, stdout only otherwise
 */
function fileDestination(settings: LogSettings): DestinationStream | undefined {
  if (settings.file === undefined) return undefined;

  const logDir = dirname(settings.file);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level = streamLevel(settings.level);
  return pino.multistream([
    { level, stream: process.stdout },
    { level, stream: pino.destination({ dest: settings.file, sync: false }) },
  ]);
}

const settings = readSettings(process.env);
const destination = fileDestination(settings);

const options: LoggerOptions = {
  name: "dental-qr",
  level: settings.level,
};

export const logger =
  destination === undefined ? pino(options) : pino(options, destination);

// Same settings for the preview server's request logging
export const fastifyLoggerConfig = {
  ...options,
  ...(destination === undefined ? {} : { stream: destination }),
};

export const registryLogger = logger.child({ module: "registry" });
export const sourceLogger = logger.child({ module: "source" });
export const buildLogger = logger.child({ module: "build" });
export const serverLogger = logger.child({ module: "server" });

if (settings.file !== undefined) {
  logger.debug({ logFile: settings.file, logLevel: settings.level }, "File logging enabled");
}
