import type { ListenerEntry } from "./types";

/** The side of a table a handle talks to. */
export interface HandleOwner<TArgs extends unknown[]> {
    unregister(entry: ListenerEntry<TArgs>): boolean;
    contains(entry: ListenerEntry<TArgs>): boolean;
}

/**
 * Cancellation token for exactly one registration.
 *
 * Returned by every `listen*` / `eavesdrop*` call. `stopListening()` is
 * idempotent: a second call, or a call after a fire-once entry removed
 * itself, does nothing.
 */
export class ListenerHandle<TArgs extends unknown[] = unknown[]> {
    constructor(
        private readonly owner: HandleOwner<TArgs>,
        private readonly entry: ListenerEntry<TArgs>,
    ) {}

    /** Whether the registration is still in its table. */
    get active(): boolean {
        return this.owner.contains(this.entry);
    }

    stopListening(): void {
        this.owner.unregister(this.entry);
    }
}
