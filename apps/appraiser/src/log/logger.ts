import pino from "pino";
import { env } from "../config/env.js";

export const logger = pino({
    level: env.LOG_LEVEL,
    transport:
        env.NODE_ENV === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    base: {
        service: "appraiser",
    },
});

export type Logger = typeof logger;

export function createChildLogger(bindings: Record<string, unknown>): Logger {
    return logger.child(bindings);
}
