import winston from "winston";

const lineFormat = winston.format.printf((info) => {
  const { level, message, timestamp, ...meta } = info;
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${suffix}`;
});

/**
 * Process-wide logger. Every record goes to the console; `configureLogger`
 * adds a file transport once the CLI has read its configuration.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: winston.format.combine(
    winston.format.errors({ stack: false }),
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    lineFormat,
  ),
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
});

export function configureLogger(options: { level: string; file?: string }): void {
  logger.level = options.level;
  if (options.file) {
    logger.add(new winston.transports.File({ filename: options.file }));
  }
}

/** Log a multi-line tool output block one line at a time (journal tails, docker info). */
export function logPlainOutput(level: "info" | "error", output: string): void {
  for (const line of output.split("\n")) {
    if (line.trim() === "") continue;
    logger.log(level, `  | ${line}`);
  }
}
