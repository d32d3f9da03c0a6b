import pino, { DestinationStream, Logger } from "pino";
import { AppConfig } from "./config";

export type { Logger } from "pino";

export type LoggerSettings = Pick<AppConfig, "NODE_ENV" | "LOG_LEVEL" | "SERVICE_NAME">;

export function makeLogger(settings: LoggerSettings, destination?: DestinationStream): Logger {
    const options = {
        level: settings.LOG_LEVEL,
        // Jest sets NODE_ENV=test
        enabled: settings.NODE_ENV !== "test",
        base: { service: settings.SERVICE_NAME },
        messageKey: "msg",
        timestamp: pino.stdTimeFunctions.isoTime
    };
    return destination ? pino(options, destination) : pino(options);
}
