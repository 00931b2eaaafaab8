import pino from "pino";
import pinoPretty from "pino-pretty";
import * as fs from "fs";
import * as path from "path";
import { config } from "../config";

export interface LoggerOptions {
  level: string;
  pretty: boolean;
  // JSON copy of every line, the harvester's errors.log
  file?: string;
}

const STREAM_LEVELS: readonly pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function streamLevel(level: string): pino.Level {
  return STREAM_LEVELS.find((candidate) => candidate === level) ?? "info";
}

function consoleStream(pretty: boolean): pino.DestinationStream {
  if (pretty) {
    return pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      sync: true,
    });
  }
  return pino.destination({ dest: 1, sync: false });
}

/**
 * Logger writing to the console and, when `file` is set, appending JSON lines
 * to that file. Errors logged under `error` are serialized with their stack
 * and status code.
 */
export function createLogger(
  { level, pretty, file }: LoggerOptions,
  destination: pino.DestinationStream = consoleStream(pretty)
) {
  const streams: pino.StreamEntry[] = [{ level: streamLevel(level), stream: destination }];

  if (file) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    streams.push({
      level: streamLevel(level),
      stream: pino.destination({ dest: file, append: true, sync: true }),
    });
  }

  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { error: pino.stdSerializers.err },
    },
    pino.multistream(streams)
  );
}

export type Logger = ReturnType<typeof createLogger>;

export const logger: Logger = createLogger(config.log);
