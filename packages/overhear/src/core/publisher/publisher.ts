import { resolveEventRef } from "../event/resolve";
import type { EventRef, PublishInput } from "../event/types";
import type { ListenerHandle } from "../listener/handle";
import type { ListenerTable } from "../listener/table";
import type { StoppableCallback } from "../listener/types";
import { globalRegistry } from "../registry/global";
import type { EventRegistry, ListenerArgs } from "../registry/registry";
import type { ListenerCallback, ListenOptions } from "../registry/types";
import type { EventSource, ForwardedFields } from "./types";

let nextPublisherId = 0;

/**
 * A scope that owns its own listeners.
 *
 * Publishing through a publisher reaches only its own listeners, plus every
 * eavesdropper of the registry, which sees the publisher as the event's origin.
 * Two publishers never share listener state.
 *
 * Subclass it to give a component its own events:
 *
 * ```ts
 * class Downloader extends Publisher {
 *     finish(path: string) {
 *         this.publish(Downloaded.create({ path }));
 *     }
 * }
 * ```
 */
export class Publisher {
    /** @internal Read by the registry when dispatching. */
    readonly listenerTable: ListenerTable<ListenerArgs>;
    protected readonly registry: EventRegistry;

    constructor(registry: EventRegistry = globalRegistry) {
        this.registry = registry;
        this.listenerTable = registry.createTable(`publisher#${++nextPublisherId}`);
    }

    /**
     * Publish an event from this publisher.
     *
     * - a declared event instance: `publish(Pinged.create({ count: 3 }))`
     * - a name and fields: `publish("greet", { msg: "hi" })`, delivered as `{ event: "greet", msg: "hi" }`
     * - a mapping with an `event` key: `publish({ event: "greet", msg: "hi" })`
     */
    publish(input: PublishInput, fields?: Readonly<Record<string, unknown>>): void {
        this.registry.publish(input, fields, this);
    }

    listen<R extends EventRef>(ref: R, callback: ListenerCallback<R>): ListenerHandle {
        return this.register(ref, callback, false);
    }

    listenOnce<R extends EventRef>(ref: R, callback: ListenerCallback<R>): ListenerHandle {
        return this.register(ref, callback, true);
    }

    /** Register `callback` on this publisher and return it with `stopListening()` attached. */
    asListener<R extends EventRef, C extends ListenerCallback<R>>(
        ref: R,
        callback: C,
        options?: ListenOptions,
    ): StoppableCallback<C> {
        const handle = this.register(ref, callback, options?.once ?? false);
        return Object.assign(callback, { stopListening: () => handle.stopListening() });
    }

    /**
     * Forward `eventName` emissions of `source` as events of this publisher.
     *
     * Each emission is published as `alias` (default `eventName`) with the fields
     * `{ source, args }`. Returns a function that disconnects the forwarding.
     */
    connect(source: EventSource, eventName: string, alias: string = eventName): () => void {
        const forward = (...args: unknown[]) => {
            const fields: ForwardedFields = { source, args };
            this.publish(alias, fields);
        };
        source.on(eventName, forward);
        return () => {
            source.off(eventName, forward);
        };
    }

    listenerCount(ref: EventRef): number {
        return this.listenerTable.count(resolveEventRef(ref));
    }

    /** Drop every listener registered on this publisher. Outstanding handles become no-ops. */
    dispose(): void {
        this.listenerTable.clear();
    }

    private register<R extends EventRef>(ref: R, callback: ListenerCallback<R>, once: boolean): ListenerHandle {
        return this.listenerTable.register(resolveEventRef(ref), callback, once);
    }
}
