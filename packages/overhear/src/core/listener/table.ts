import { eventIdName } from "../event/resolve";
import type { EventId } from "../event/types";
import type { LoggerContext } from "../logger/types";
import { type HandleOwner, ListenerHandle } from "./handle";
import type { Callback, DispatchFailureHandler, ListenerEntry } from "./types";

/**
 * Ordered mapping from event id to the callbacks registered for it.
 *
 * Registration order is dispatch order. `TArgs` is what each callback is
 * invoked with: `[payload]` for listeners, `[payload, origin]` for eavesdroppers.
 */
export class ListenerTable<TArgs extends unknown[]> implements HandleOwner<TArgs> {
    private readonly entries: Map<EventId, Set<ListenerEntry<TArgs>>> = new Map();
    /** Fire-once entries currently being invoked. */
    private readonly claimed: WeakSet<ListenerEntry<TArgs>> = new WeakSet();

    constructor(
        readonly name: string,
        private readonly logger?: LoggerContext,
    ) {}

    register(id: EventId, callback: Callback<TArgs>, once = false): ListenerHandle<TArgs> {
        const entry: ListenerEntry<TArgs> = { id, callback, once };
        let entries = this.entries.get(id);
        if (!entries) {
            entries = new Set();
            this.entries.set(id, entries);
        }
        entries.add(entry);
        return new ListenerHandle(this, entry);
    }

    /** Remove `entry` if it is still registered. Returns whether anything was removed. */
    unregister(entry: ListenerEntry<TArgs>): boolean {
        const entries = this.entries.get(entry.id);
        if (!entries?.delete(entry)) {
            this.logger?.debug("listener", "Handle released an entry that is no longer registered", {
                table: this.name,
                event: eventIdName(entry.id),
            });
            return false;
        }
        if (entries.size === 0) {
            this.entries.delete(entry.id);
        }
        return true;
    }

    contains(entry: ListenerEntry<TArgs>): boolean {
        return this.entries.get(entry.id)?.has(entry) ?? false;
    }

    /**
     * Invoke every callback registered for `id` when the pass starts.
     *
     * The pass walks a snapshot: registrations and cancellations made by a
     * callback take effect from the next dispatch on. A fire-once entry is
     * claimed while it runs (a re-entrant dispatch skips it) and removed once
     * it returns; if it throws it stays registered.
     *
     * Failures are never swallowed. With `onFailure` the table hands the error
     * and the failing entry over; without it the error propagates as is.
     *
     * @returns the number of callbacks invoked
     */
    dispatch(id: EventId, args: TArgs, onFailure?: DispatchFailureHandler<TArgs>): number {
        const entries = this.entries.get(id);
        if (!entries) return 0;

        let invoked = 0;
        for (const entry of [...entries]) {
            if (entry.once && this.claimed.has(entry)) continue;
            if (entry.once) this.claimed.add(entry);

            try {
                entry.callback(...args);
            } catch (err) {
                if (entry.once) this.claimed.delete(entry);
                if (onFailure) onFailure(err, entry);
                throw err;
            }

            invoked++;
            if (entry.once) {
                this.removeFired(entry);
            }
        }
        return invoked;
    }

    count(id: EventId): number {
        return this.entries.get(id)?.size ?? 0;
    }

    has(id: EventId): boolean {
        return this.count(id) > 0;
    }

    /** Drop every registration. Outstanding handles become no-ops. */
    clear(): void {
        this.entries.clear();
    }

    /** Fired fire-once entries stay claimed so an in-flight snapshot never runs them again. */
    private removeFired(entry: ListenerEntry<TArgs>): void {
        const entries = this.entries.get(entry.id);
        if (!entries?.delete(entry)) return;
        if (entries.size === 0) {
            this.entries.delete(entry.id);
        }
    }
}
