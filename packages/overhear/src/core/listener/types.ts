import type { EventId } from "../event/types";

/**
 * Callback stored in a table.
 *
 * Declared through a method signature so typed callbacks such as
 * `(evt: NamedEvent) => void` can be stored next to type-erased ones.
 */
export type Callback<TArgs extends unknown[]> = {
    bivarianceHack(...args: TArgs): void;
}["bivarianceHack"];

export type ListenerEntry<TArgs extends unknown[]> = {
    readonly id: EventId;
    readonly callback: Callback<TArgs>;
    readonly once: boolean;
};

/**
 * Receives the failure of one callback during a dispatch pass, together with
 * the entry that raised it. Must throw: dispatch does not resume afterwards.
 */
export type DispatchFailureHandler<TArgs extends unknown[]> = (error: unknown, entry: ListenerEntry<TArgs>) => never;

/** A registered callback returned with a `stopListening()` method attached. */
export type StoppableCallback<TCallback> = TCallback & { stopListening(): void };
