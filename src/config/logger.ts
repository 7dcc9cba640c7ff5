/**
 * Logger configuration
 * pino-based structured logging
 *
 * Features:
 * - JSON lines on stdout, optionally pretty-printed for local development
 * - optional file output when LOG_DIR is set: one rotating file per
 *   service plus a shared error.log, in dated directories
 * - `skip_file_log` keeps noisy lines (health checks) out of the files
 *
 * File layout:
 * - LOG_DIR/YYYY-MM-DD/server.log
 * - LOG_DIR/YYYY-MM-DD/error.log
 * - daily rotation, 30 days kept
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { z } from "zod";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "server";

/**
 * Rotating stream writing LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(logDir: string, prefix: string): RotatingFileStream {
  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(logDir, dateDir);
      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      path: logDir,
      maxFiles: 30,
      compress: false,
      maxSize: "100M",
    },
  );
}

const RoutedLineSchema = z.object({
  level: z.union([z.string(), z.number()]).optional(),
  service_name: z.string().optional(),
  skip_file_log: z.boolean().optional(),
});

type RoutedLine = z.infer<typeof RoutedLineSchema>;

function parseRoutedLine(chunk: string): RoutedLine | null {
  try {
    const result = RoutedLineSchema.safeParse(JSON.parse(chunk));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

/**
 * Per-service file routing
 * Error lines are written to error.log as well.
 */
class ServiceRoutingStream implements DestinationStream {
  private readonly streams = new Map<string, RotatingFileStream>();
  private readonly errorStream: RotatingFileStream;

  constructor(private readonly logDir: string) {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    this.errorStream = createRotatingStream(logDir, "error");
  }

  write(chunk: string): boolean {
    const line = parseRoutedLine(chunk);
    if (line?.skip_file_log === true) {
      return true;
    }

    if (line?.level === "error" || line?.level === "fatal") {
      this.errorStream.write(chunk);
    }

    const serviceName = line?.service_name ?? "server";
    this.getOrCreateStream(serviceName).write(chunk);
    return true;
  }

  private getOrCreateStream(serviceName: string): RotatingFileStream {
    const existing = this.streams.get(serviceName);
    if (existing) return existing;
    const stream = createRotatingStream(this.logDir, serviceName);
    this.streams.set(serviceName, stream);
    return stream;
  }
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "listing_scanner",
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

function buildLogger(): pino.Logger {
  const streams: pino.StreamEntry[] = [];

  if (NODE_ENV === "development" && LOG_PRETTY) {
    streams.push({
      level: "trace",
      stream: pino.transport({
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:HH:MM:ss" },
      }),
    });
  } else {
    streams.push({ level: "trace", stream: process.stdout });
  }

  if (LOG_DIR) {
    streams.push({ level: "trace", stream: new ServiceRoutingStream(LOG_DIR) });
  }

  return pino(baseConfig, pino.multistream(streams));
}

/**
 * Root logger
 */
const logger: pino.Logger = buildLogger();

export { logger };

export type Logger = pino.Logger;
