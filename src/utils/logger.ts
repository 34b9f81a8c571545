import winston from "winston";
import path from "path";

const LOG_DIR = path.resolve(process.cwd(), process.env.LOG_DIR ?? "logs");

function scopeTag(scope: unknown): string {
  return typeof scope === "string" ? `[${scope}] ` : "";
}

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message, scope }) => {
    return `[${timestamp}] [${level.toUpperCase()}] ${scopeTag(scope)}${message}`;
  }),
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  transports: [
    // failed searches, rejected orders, broker errors
    new winston.transports.File({
      filename: path.join(LOG_DIR, "error.log"),
      level: "error",
      format: fileFormat,
    }),
    new winston.transports.File({
      filename: path.join(LOG_DIR, "combined.log"),
      format: fileFormat,
    }),
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.printf(({ timestamp, level, message, scope }) => {
          const prefix = level === "info" ? "" : `${level}: `;
          return `[${timestamp}] ${prefix}${scopeTag(scope)}${message}`;
        }),
      ),
    }),
  ],
});

/** Child logger whose lines carry a `[scope]` tag. */
export function scopedLogger(scope: string): winston.Logger {
  return logger.child({ scope });
}

export default logger;
