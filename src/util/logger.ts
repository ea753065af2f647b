import pino, { type Logger, type LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Structured logger shared by the brief pipeline and the Lambda handlers.
 * - Local runs: pretty-printed through pino-pretty
 * - Lambda/prod and tests: plain JSON lines
 */
const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || (isProduction() ? "info" : "debug"),
  base: {
    service: "market-brief",
    stage: getStage(),
  },
  redact: {
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

// The pretty transport runs in a worker thread; keep it out of test runs
const options: LoggerOptions =
  isLocal() && !isProduction() && !isTest()
    ? {
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            singleLine: false,
            ignore: "pid,hostname",
          },
        },
      }
    : baseOptions;

const rootLogger: Logger = pino(options);

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Child logger carrying the Lambda request context fields.
 */
export function withRequestContext(
  moduleName: string | undefined,
  request: {
    awsRequestId?: string;
    functionName?: string;
    functionVersion?: string;
  }
): Logger {
  return getLogger(moduleName).child({
    requestId: request.awsRequestId,
    functionName: request.functionName,
    functionVersion: request.functionVersion,
  });
}

export default rootLogger;
