import type { CallbackRole, EventId } from "./event/types";

/** Thrown when `publish` (or a listen call) is given something that does not name an event. */
export class InvalidEventError extends Error {
    override readonly name = "InvalidEventError";

    constructor(
        message: string,
        readonly input: unknown,
    ) {
        super(message);
    }
}

/**
 * Wraps the failure of a listener or eavesdropper callback.
 *
 * Dispatch is fail-fast: once this is thrown no further callback of the same
 * `publish` call runs, and the error propagates out of `publish`.
 */
export class ListenerInvocationError extends Error {
    override readonly name = "ListenerInvocationError";
    /** Errors raised while reporting this failure, such as a throwing log handler. */
    readonly suppressed: unknown[] = [];

    constructor(
        readonly eventId: EventId,
        readonly eventName: string,
        readonly role: CallbackRole,
        readonly callbackName: string,
        cause: unknown,
    ) {
        super(`${role === "listener" ? "Listener" : "Eavesdropper"} "${callbackName}" failed on "${eventName}"`, {
            cause,
        });
    }
}
