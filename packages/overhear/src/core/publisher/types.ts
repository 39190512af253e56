/** Anything that emits named events through `on` / `off`, such as a Node.js `EventEmitter`. */
export interface EventSource {
    on(eventName: string, listener: (...args: unknown[]) => void): unknown;
    off(eventName: string, listener: (...args: unknown[]) => void): unknown;
}

/** Fields published by {@link Publisher.connect} for every forwarded emission. */
export type ForwardedFields = {
    source: EventSource;
    args: unknown[];
};
