import pino, { type Logger } from "pino";

export type LoggerOptions = {
  level: string;
  file?: string;
};

const redactPaths = [
  "clientSecret",
  "*.clientSecret",
  "secret",
  "*.secret",
  "accessToken",
  "*.accessToken",
  "access_token",
  "*.access_token",
  "headers.sign",
  "headers.access_token"
];

export const createLogger = (options: LoggerOptions): Logger =>
  pino({
    level: options.level,
    redact: { paths: redactPaths, censor: "[REDACTED]" },
    ...(options.file
      ? {
          transport: {
            target: "pino/file",
            options: {
              destination: options.file,
              mkdir: true
            }
          }
        }
      : {})
  });

export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  file: process.env.LOG_FILE?.trim() || undefined
});
