import type { LogEntry, LogHandler, LoggerContext } from "./types";

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    constructor(handlers: Iterable<LogHandler> = []) {
        for (const handler of handlers) {
            this.handlers.add(handler);
        }
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogEntry["level"], code: string, message: string, details?: Record<string, unknown>): void {
        if (this.handlers.size === 0) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
