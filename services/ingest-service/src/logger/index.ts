import pino from "pino";
import { loadLogSettings, LogSettings } from "../config/env";

export function createLogger(settings: LogSettings) {
    return pino({
        name: "ingest-service",
        level: settings.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
        transport: settings.pretty
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    });
}

// Built before the settings file is read; main re-applies the configured level
export const logger = createLogger(loadLogSettings());
