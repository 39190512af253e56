// ── Errors ──────────────────────────────────────────────────────────
export { InvalidEventError, ListenerInvocationError } from "./core/errors";
// ── Events ──────────────────────────────────────────────────────────
export { defineEvent } from "./core/event/helpers";
export { isEventInstance, resolveEvent } from "./core/event/resolve";
export { EVENT_KEY, EVENT_TYPE } from "./core/event/types";
export type {
    AnyEventInstance,
    CallbackRole,
    EventFields,
    EventId,
    EventMapping,
    EventOf,
    EventRef,
    EventType,
    EventTypeInfo,
    NamedEvent,
    NoFields,
    PayloadOf,
    PublishInput,
    ResolvedEvent,
} from "./core/event/types";
// ── Listeners ───────────────────────────────────────────────────────
export { ListenerHandle } from "./core/listener/handle";
export type { StoppableCallback } from "./core/listener/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LoggerContext, LogLevel } from "./core/logger/types";
// ── Publisher ───────────────────────────────────────────────────────
export { Publisher } from "./core/publisher/publisher";
export type { EventSource, ForwardedFields } from "./core/publisher/types";
// ── Registry ────────────────────────────────────────────────────────
export {
    asEavesdropper,
    eavesdrop,
    eavesdropOnce,
    globalRegistry,
    listen,
    listenOnce,
    publish,
} from "./core/registry/global";
export { createRegistry, EventRegistry } from "./core/registry/registry";
export { GLOBAL_ORIGIN } from "./core/registry/types";
export type {
    EavesdropperCallback,
    ListenerCallback,
    ListenOptions,
    Origin,
    RegistryConfig,
} from "./core/registry/types";
