import type { EventRef, PayloadOf } from "../event/types";
import type { ConsoleHandlerOptions } from "../logger/console-handler";
import type { LogHandler } from "../logger/types";
import type { Publisher } from "../publisher/publisher";

/** Origin reported to eavesdroppers for events published without a publisher. */
export const GLOBAL_ORIGIN: unique symbol = Symbol("overhear.global");

/** Where an event came from: the publishing {@link Publisher}, or {@link GLOBAL_ORIGIN}. */
export type Origin = Publisher | typeof GLOBAL_ORIGIN;

/**
 * Invoked synchronously by `publish`. A returned promise is not awaited, so an
 * async callback must catch its own rejections.
 */
export type ListenerCallback<R extends EventRef = EventRef> = (payload: PayloadOf<R>) => void;

/** Like {@link ListenerCallback}, with the event's origin. Async callbacks must catch their own rejections. */
export type EavesdropperCallback<R extends EventRef = EventRef> = (payload: PayloadOf<R>, origin: Origin) => void;

export type ListenOptions = {
    /** Remove the registration after its first successful invocation. */
    once?: boolean;
};

export type RegistryConfig = {
    logger?: {
        handlers?: LogHandler[];
        /**
         * Console output. `false` disables it, an options object tunes it.
         * Defaults to a console handler at level `"warn"`.
         */
        console?: boolean | ConsoleHandlerOptions;
    };
};
