export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

/** What registries, tables and publishers log through. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    info(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}

/** Numeric rank per level, lowest first. */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};
