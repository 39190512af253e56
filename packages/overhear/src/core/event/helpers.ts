import { EVENT_TYPE, type EventFields, type EventOf, type EventType, type NoFields } from "./types";

/**
 * Declares a typed event.
 *
 * Each declaration receives its own symbol id, so two declarations never
 * collide, even under the same name, and never clash with a plain event name.
 * Declaring touches no listener table.
 *
 * @overload Explicit generic: `defineEvent<{ count: number }>("Pinged")`
 * @overload Infer from defaults: `defineEvent("Pinged", { count: 0 })`
 */
export function defineEvent<T extends EventFields = NoFields>(name: string): EventType<T>;
export function defineEvent<T extends EventFields>(name: string, defaults: T): EventType<T, Partial<T>>;
export function defineEvent(name: string, defaults?: EventFields): EventType<EventFields, EventFields> {
    if (!name || name.trim().length === 0) throw new Error("defineEvent: name is required");

    const frozenDefaults = defaults ? Object.freeze({ ...defaults }) : undefined;

    const type: EventType<EventFields, EventFields> = {
        id: Symbol(name),
        name,
        fields: Object.freeze(frozenDefaults ? Object.keys(frozenDefaults) : []),
        defaults: frozenDefaults,
        create(fields?: EventFields): EventOf<EventFields> {
            return Object.freeze({ ...frozenDefaults, ...fields, [EVENT_TYPE]: type });
        },
        is(value: unknown): value is EventOf<EventFields> {
            return typeof value === "object" && value !== null && EVENT_TYPE in value && value[EVENT_TYPE] === type;
        },
        payload() {
            throw new Error("phantom method: not callable");
        },
    };
    return Object.freeze(type);
}
