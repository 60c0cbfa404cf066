import { Injectable } from "@nestjs/common";
import fs from "fs";
import { createRequire } from "module";
import path from "path";
import pino, {
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from "pino";
import type { LoggingConfig, LoggingDestination } from "@runstream/config";

const DEFAULT_LOG_FILE = ".runstream/logs/runstream.log";

const moduleRequire = createRequire(import.meta.url);

function hasPrettyPrinter(): boolean {
  try {
    moduleRequire.resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

/**
 * Owns the root pino logger. Scoped loggers are children bound to
 * `{ scope }`; they keep the root's level and destination from the time
 * they were created.
 */
@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private signature = "";

  /** Rebuilds the root logger unless `config` matches the current one. */
  configure(config?: LoggingConfig): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.signature) {
      return this.rootLogger;
    }

    this.rootLogger = this.buildLogger(config);
    this.signature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    const root = this.rootLogger ?? this.configure();
    return scope ? root.child({ scope }) : root;
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp:
        config?.enableTimestamps === false ? false : pino.stdTimeFunctions.isoTime,
    };

    const destination = config?.destination;
    if (this.wantsPretty(destination)) {
      options.transport = {
        target: "pino-pretty",
        options: {
          colorize: destination?.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: destination?.type === "stderr" ? 2 : 1,
        },
      };
      return pino(options);
    }

    const stream = this.openDestination(destination);
    return stream ? pino(options, stream) : pino(options);
  }

  private wantsPretty(destination?: LoggingDestination): boolean {
    if (destination?.type === "file") {
      return false;
    }
    const pretty = destination?.pretty ?? process.stdout.isTTY;
    return pretty === true && hasPrettyPrinter();
  }

  private openDestination(
    destination?: LoggingDestination
  ): DestinationStream | undefined {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(destination.path ?? DEFAULT_LOG_FILE);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }
}
