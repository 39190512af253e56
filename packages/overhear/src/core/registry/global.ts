import type { EventRef, PublishInput } from "../event/types";
import type { ListenerHandle } from "../listener/handle";
import type { StoppableCallback } from "../listener/types";
import { EventRegistry } from "./registry";
import type { EavesdropperCallback, ListenerCallback, ListenOptions } from "./types";

/**
 * Process-wide registry behind the free functions below. Built once when the
 * module loads and never replaced. Add log handlers through
 * `globalRegistry.logger`.
 */
export const globalRegistry = new EventRegistry();

/** Publish an event globally. Global listeners run first, then eavesdroppers with {@link GLOBAL_ORIGIN}. */
export function publish(input: PublishInput, fields?: Readonly<Record<string, unknown>>): void {
    globalRegistry.publish(input, fields);
}

export function listen<R extends EventRef>(ref: R, callback: ListenerCallback<R>): ListenerHandle {
    return globalRegistry.listen(ref, callback);
}

export function listenOnce<R extends EventRef>(ref: R, callback: ListenerCallback<R>): ListenerHandle {
    return globalRegistry.listenOnce(ref, callback);
}

/** Observe `ref` from every publisher and from global publishes. */
export function eavesdrop<R extends EventRef>(ref: R, callback: EavesdropperCallback<R>): ListenerHandle {
    return globalRegistry.eavesdrop(ref, callback);
}

export function eavesdropOnce<R extends EventRef>(ref: R, callback: EavesdropperCallback<R>): ListenerHandle {
    return globalRegistry.eavesdropOnce(ref, callback);
}

export function asEavesdropper<R extends EventRef, C extends EavesdropperCallback<R>>(
    ref: R,
    callback: C,
    options?: ListenOptions,
): StoppableCallback<C> {
    return globalRegistry.asEavesdropper(ref, callback, options);
}
