import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

/**
 * Create a named logger. The level comes from MESHSTEP_LOG_LEVEL
 * unless given explicitly.
 */
export function createLogger(name: string, level?: string): Logger {
    return pino({
        name,
        level: level ?? process.env.MESHSTEP_LOG_LEVEL ?? "info",
    });
}

/** A logger that drops everything; components fall back to it when none is injected. */
export const silentLogger: Logger = pino({ level: "silent" });
