import { LOG_LEVEL_RANK, type LogEntry, type LogHandler, type LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

export type ConsoleHandlerOptions = {
    /** Entries below this level are dropped. Defaults to `"debug"`. */
    level?: LogLevel;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

/** `ancestors` holds the objects being rendered above `value`; revisiting one prints `[Circular]`. */
function colorizeValue(value: unknown, ancestors: WeakSet<object> = new WeakSet()): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (typeof value === "symbol") return `${magenta}${value.toString()}${reset}`;
    if (value instanceof Error) return `${magenta}${value.name}${reset}${dim}(${reset}${value.message}${dim})${reset}`;
    if (typeof value !== "object") return String(value);
    if (ancestors.has(value)) return `${dim}[Circular]${reset}`;

    ancestors.add(value);
    try {
        if (Array.isArray(value)) {
            if (value.length === 0) return "[]";
            return `[${value.map((item) => colorizeValue(item, ancestors)).join(`${dim},${reset} `)}]`;
        }
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v, ancestors)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    } finally {
        ancestors.delete(value);
    }
}

export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const threshold = LOG_LEVEL_RANK[options.level ?? "debug"];

    return (entry: LogEntry) => {
        if (LOG_LEVEL_RANK[entry.level] < threshold) return;

        const time = formatTime(entry.timestamp);
        const tag = entry.level === "debug" ? "overhear" : entry.level;
        const detailsPart = entry.details ? ` ${colorizeValue(entry.details)}` : "";
        const line = `${time} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
