import { mkdirSync } from "node:fs";
import path from "node:path";
import { pino, destination, multistream, type Logger, type StreamEntry } from "pino";
import pinoPretty from "pino-pretty";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Pretty output on stderr (stdout carries answers and listings) and,
 * when enabled, JSON lines in <dataDir>/logs/archivist.log.
 */
export function createLogger(config: AppConfig, options: { verbose?: boolean } = {}): Logger {
  const level = options.verbose ? "debug" : config.logging.level;

  const streams: StreamEntry[] = [
    {
      level: options.verbose ? "debug" : "warn",
      stream: pinoPretty({
        colorize: process.stderr.isTTY,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname,service",
        destination: 2,
        sync: true,
      }),
    },
  ];

  if (config.logging.file && level !== "silent") {
    mkdirSync(config.paths.logsDir, { recursive: true });
    streams.push({
      level: "debug",
      stream: destination({
        dest: path.join(config.paths.logsDir, "archivist.log"),
        append: true,
        mkdir: true,
      }),
    });
  }

  return pino(
    {
      level,
      base: { service: "archivist" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
