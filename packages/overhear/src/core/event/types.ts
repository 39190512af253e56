/** Identifies one event shape: a name, or the symbol issued by {@link defineEvent}. */
export type EventId = string | symbol;

/** Reserved payload key that carries the name of a mapping-form event. */
export const EVENT_KEY = "event";

/** Symbol-keyed back reference from an event instance to its declared type. */
export const EVENT_TYPE: unique symbol = Symbol("overhear.eventType");

export type CallbackRole = "listener" | "eavesdropper";

/** Fields of a declared event. */
export type EventFields = object;

/** Field set of an event declared without fields. */
export type NoFields = Record<never, never>;

/** Normalized payload of a named or mapping-form event. */
export type NamedEvent = {
    readonly event: string;
    readonly [field: string]: unknown;
};

/** An instance produced by {@link EventType.create}. Fields are readable by name. */
export type EventOf<T extends EventFields> = Readonly<T> & {
    readonly [EVENT_TYPE]: EventTypeInfo;
};

/** Type-erased event instance, for heterogeneous handling. */
export interface AnyEventInstance {
    readonly [EVENT_TYPE]: EventTypeInfo;
}

/** Type-erased view of a declared event type. */
export interface EventTypeInfo {
    readonly id: symbol;
    readonly name: string;
    /** Field names known from the declaration's defaults. */
    readonly fields: readonly string[];
}

type CreateArgs<TInput> = NoFields extends TInput ? [fields?: TInput] : [fields: TInput];

/**
 * Public interface returned by {@link defineEvent}.
 *
 * `TInput` is what `create()` takes: the full field set, or a partial one when
 * the type was declared with defaults.
 */
export interface EventType<T extends EventFields = NoFields, TInput = T> extends EventTypeInfo {
    readonly defaults: Readonly<Partial<T>> | undefined;
    create(...args: CreateArgs<TInput>): EventOf<T>;
    is(value: unknown): value is EventOf<T>;
    /** @internal Phantom method for payload type extraction. Never called. */
    payload(): T;
}

/** Anything listeners subscribe with: a declared event type or an event name. */
export type EventRef = EventTypeInfo | string;

/** Payload type delivered for a given {@link EventRef}. */
export type PayloadOf<R extends EventRef> = R extends { payload(): infer T extends EventFields }
    ? EventOf<T>
    : R extends string
      ? NamedEvent
      : AnyEventInstance;

/** Plain record published directly. Must carry {@link EVENT_KEY}; checked at publish time. */
export type EventMapping = Readonly<Record<string, unknown>>;

/** Input accepted by `publish`: an event instance, a name, or a mapping carrying {@link EVENT_KEY}. */
export type PublishInput = AnyEventInstance | string | EventMapping;

/**
 * Tagged form of a publish input, classified once at the dispatcher boundary.
 */
export type EventInput =
    | { kind: "instance"; instance: AnyEventInstance }
    | { kind: "named"; name: string; fields: Readonly<Record<string, unknown>> }
    | { kind: "mapping"; name: string; mapping: EventMapping };

/** Output of {@link resolveEvent}: the dispatch key plus the normalized payload. */
export type ResolvedEvent = {
    id: EventId;
    /** Human-readable name, used in errors and logs. */
    name: string;
    payload: unknown;
};
