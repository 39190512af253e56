import { ListenerInvocationError } from "../errors";
import { resolveEvent, resolveEventRef } from "../event/resolve";
import type { CallbackRole, EventId, EventRef, PublishInput } from "../event/types";
import type { ListenerHandle } from "../listener/handle";
import { ListenerTable } from "../listener/table";
import type { ListenerEntry, StoppableCallback } from "../listener/types";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import type { Publisher } from "../publisher/publisher";
import {
    type EavesdropperCallback,
    GLOBAL_ORIGIN,
    type ListenerCallback,
    type ListenOptions,
    type Origin,
    type RegistryConfig,
} from "./types";

export type ListenerArgs = [payload: unknown];
export type EavesdropperArgs = [payload: unknown, origin: Origin];

function callbackName(callback: { readonly name: string }): string {
    return callback.name || "anonymous";
}

/**
 * Owns the global listener table and the eavesdropper table, and is the one
 * dispatch path for every publish.
 *
 * Dispatch order is fixed: scoped listeners (the publisher's, or the global
 * table's) in registration order, then eavesdroppers in registration order.
 * Failure policy is fail-fast: the first callback that throws stops the pass
 * and `publish` rethrows it wrapped in a {@link ListenerInvocationError}.
 */
export class EventRegistry {
    readonly logger: Logger;
    private readonly listeners: ListenerTable<ListenerArgs>;
    private readonly eavesdroppers: ListenerTable<EavesdropperArgs>;

    constructor(config?: RegistryConfig) {
        this.logger = new Logger(config?.logger?.handlers);

        const consoleOptions = config?.logger?.console ?? { level: "warn" };
        if (consoleOptions !== false) {
            this.logger.addHandler(createConsoleHandler(consoleOptions === true ? {} : consoleOptions));
        }

        this.listeners = new ListenerTable("global", this.logger);
        this.eavesdroppers = new ListenerTable("eavesdroppers", this.logger);
    }

    /** Create a listener table bound to this registry's logger. Used by {@link Publisher}. */
    createTable(name: string): ListenerTable<ListenerArgs> {
        return new ListenerTable(name, this.logger);
    }

    /**
     * Publish an event to `publisher`'s listeners (or the global table when
     * omitted), then to every eavesdropper of its id.
     *
     * @throws InvalidEventError before any callback runs, when the input does not name an event
     * @throws ListenerInvocationError when a callback throws
     */
    publish(input: PublishInput, fields?: Readonly<Record<string, unknown>>, publisher?: Publisher): void {
        const { id, name, payload } = resolveEvent(input, fields);
        const origin: Origin = publisher ?? GLOBAL_ORIGIN;
        const scoped = publisher ? publisher.listenerTable : this.listeners;

        scoped.dispatch(id, [payload], (err, entry) => this.fail(err, "listener", id, name, entry));
        this.eavesdroppers.dispatch(id, [payload, origin], (err, entry) =>
            this.fail(err, "eavesdropper", id, name, entry),
        );
    }

    listen<R extends EventRef>(ref: R, callback: ListenerCallback<R>, options?: ListenOptions): ListenerHandle {
        return this.listeners.register(resolveEventRef(ref), callback, options?.once ?? false);
    }

    listenOnce<R extends EventRef>(ref: R, callback: ListenerCallback<R>): ListenerHandle {
        return this.listen(ref, callback, { once: true });
    }

    eavesdrop<R extends EventRef>(ref: R, callback: EavesdropperCallback<R>, options?: ListenOptions): ListenerHandle {
        return this.eavesdroppers.register(resolveEventRef(ref), callback, options?.once ?? false);
    }

    eavesdropOnce<R extends EventRef>(ref: R, callback: EavesdropperCallback<R>): ListenerHandle {
        return this.eavesdrop(ref, callback, { once: true });
    }

    /** Register `callback` as an eavesdropper and return it with `stopListening()` attached. */
    asEavesdropper<R extends EventRef, C extends EavesdropperCallback<R>>(
        ref: R,
        callback: C,
        options?: ListenOptions,
    ): StoppableCallback<C> {
        const handle = this.eavesdrop(ref, callback, options);
        return Object.assign(callback, { stopListening: () => handle.stopListening() });
    }

    /** Number of global listeners registered for `ref`. */
    listenerCount(ref: EventRef): number {
        return this.listeners.count(resolveEventRef(ref));
    }

    eavesdropperCount(ref: EventRef): number {
        return this.eavesdroppers.count(resolveEventRef(ref));
    }

    private fail(
        err: unknown,
        role: CallbackRole,
        id: EventId,
        name: string,
        entry: ListenerEntry<ListenerArgs> | ListenerEntry<EavesdropperArgs>,
    ): never {
        // Nested publishes already wrapped and logged their own failure.
        if (err instanceof ListenerInvocationError) throw err;

        const cbName = callbackName(entry.callback);
        const wrapped = new ListenerInvocationError(id, name, role, cbName, err);
        try {
            this.logger.error("dispatch", `${role} "${cbName}" threw while handling "${name}"`, {
                event: name,
                role,
                callback: cbName,
                error: err,
            });
        } catch (logErr) {
            // A failing log handler must not replace the callback failure.
            wrapped.suppressed.push(logErr);
        }
        throw wrapped;
    }
}

export function createRegistry(config?: RegistryConfig): EventRegistry {
    return new EventRegistry(config);
}
