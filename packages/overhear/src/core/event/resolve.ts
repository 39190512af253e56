import { isPlainObject } from "es-toolkit";
import { InvalidEventError } from "../errors";
import {
    type AnyEventInstance,
    EVENT_KEY,
    EVENT_TYPE,
    type EventId,
    type EventInput,
    type EventRef,
    type ResolvedEvent,
} from "./types";

function describe(value: unknown): string {
    if (typeof value === "string") return `"${value}"`;
    if (typeof value === "symbol") return value.toString();
    if (value === null) return "null";
    if (typeof value === "object") return value.constructor?.name ?? "object";
    return String(value);
}

function isEventName(value: unknown): value is string {
    return typeof value === "string" && value.trim().length > 0;
}

/** True when `value` was produced by a declared event type's `create()`. */
export function isEventInstance(value: unknown): value is AnyEventInstance {
    if (typeof value !== "object" || value === null || !(EVENT_TYPE in value)) return false;
    const info = value[EVENT_TYPE];
    return (
        typeof info === "object" &&
        info !== null &&
        "id" in info &&
        typeof info.id === "symbol" &&
        "name" in info &&
        typeof info.name === "string"
    );
}

/**
 * Classifies a publish input into one of the three accepted forms.
 *
 * `fields` are only meaningful next to an event name.
 */
export function classifyEvent(input: unknown, fields?: Readonly<Record<string, unknown>>): EventInput {
    if (typeof input === "string") {
        if (!isEventName(input)) throw new InvalidEventError("Event name must be a non-empty string", input);
        return { kind: "named", name: input, fields: fields ?? {} };
    }

    if (fields !== undefined) {
        throw new InvalidEventError(`Fields can only be published with an event name, got ${describe(input)}`, input);
    }

    if (isEventInstance(input)) {
        return { kind: "instance", instance: input };
    }

    if (isPlainObject(input)) {
        if (!(EVENT_KEY in input)) {
            throw new InvalidEventError(`Missing "${EVENT_KEY}" key in published mapping`, input);
        }
        const name: unknown = input[EVENT_KEY];
        if (!isEventName(name)) {
            throw new InvalidEventError(`"${EVENT_KEY}" key must hold a non-empty event name`, input);
        }
        return { kind: "mapping", name, mapping: input };
    }

    throw new InvalidEventError(`${describe(input)} is not a valid event`, input);
}

/**
 * Resolves a publish input to its dispatch id and normalized payload.
 *
 * - event instance: the type's symbol id, the instance as payload
 * - name + fields: the name, a fresh `{ ...fields, event: name }` payload
 * - mapping: `mapping.event`, the mapping itself as payload
 *
 * @throws InvalidEventError for anything else
 */
export function resolveEvent(input: unknown, fields?: Readonly<Record<string, unknown>>): ResolvedEvent {
    const classified = classifyEvent(input, fields);
    switch (classified.kind) {
        case "instance": {
            const info = classified.instance[EVENT_TYPE];
            return { id: info.id, name: info.name, payload: classified.instance };
        }
        case "named":
            // The explicit name always wins over a `fields.event` value.
            return {
                id: classified.name,
                name: classified.name,
                payload: { ...classified.fields, [EVENT_KEY]: classified.name },
            };
        case "mapping":
            return { id: classified.name, name: classified.name, payload: classified.mapping };
    }
}

/** Maps what a listener subscribes with to the id dispatch uses. */
export function resolveEventRef(ref: EventRef): EventId {
    if (typeof ref === "string") {
        if (!isEventName(ref)) throw new InvalidEventError("Event name must be a non-empty string", ref);
        return ref;
    }
    if (typeof ref !== "object" || ref === null || typeof ref.id !== "symbol") {
        throw new InvalidEventError(`${describe(ref)} is not an event type or name`, ref);
    }
    return ref.id;
}

/** Human-readable form of an id, for logs and errors. */
export function eventIdName(id: EventId): string {
    return typeof id === "string" ? id : (id.description ?? id.toString());
}
