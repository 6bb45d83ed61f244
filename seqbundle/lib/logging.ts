import winston from "winston";

export type LoggingOptions = {
  // when set, everything down to debug is also written here
  logFile?: string;

  // the console level
  level?: string;
};

function field(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

/**
 * The console gets just the messages (at info and above) while the
 * optional log file gets debug and above with timestamps and components.
 */
export function createLogger(options: LoggingOptions = {}): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: options.level ?? "info",
      format: winston.format.printf((info) => String(info.message)),
      stderrLevels: [],
    }),
  ];

  if (options.logFile)
    transports.push(
      new winston.transports.File({
        filename: options.logFile,
        level: "debug",
        format: winston.format.combine(
          winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
          winston.format.printf(
            (info) =>
              `${field(info.timestamp, "")} - ${field(info.component, "seqbundle")} - ${info.level.toUpperCase()} - ${String(info.message)}`,
          ),
        ),
      }),
    );

  return winston.createLogger({ level: "debug", transports });
}

/**
 * A logger that writes nowhere.
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}
