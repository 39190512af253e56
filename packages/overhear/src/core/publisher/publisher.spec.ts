/**
 * Contract: Publisher -- a scope owning its own listeners.
 *
 * Sections:
 *   1. listen / listenOnce / publish
 *   2. Isolation between publishers
 *   3. asListener
 *   4. connect (forwarding external emitters)
 *   5. dispose
 *   6. Subclassing and the default registry
 */
import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { defineEvent } from "../event/helpers";
import type { NamedEvent } from "../event/types";
import { globalRegistry } from "../registry/global";
import { createRegistry, type EventRegistry } from "../registry/registry";
import { Publisher } from "./publisher";

function quietRegistry(): EventRegistry {
    return createRegistry({ logger: { console: false } });
}

describe("Publisher", () => {
    describe("listen / listenOnce / publish", () => {
        it("delivers its own publishes to its listeners", () => {
            const p = new Publisher(quietRegistry());
            const cb = vi.fn();
            p.listen("greet", cb);
            p.publish("greet", { msg: "hi" });
            expect(cb).toHaveBeenCalledExactlyOnceWith({ event: "greet", msg: "hi" });
        });

        it("listenOnce fires on the first publish only", () => {
            const p = new Publisher(quietRegistry());
            const cb = vi.fn();
            const handle = p.listenOnce("greet", cb);
            p.publish("greet");
            p.publish("greet");
            expect(cb).toHaveBeenCalledOnce();
            expect(handle.active).toBe(false);
            expect(p.listenerCount("greet")).toBe(0);
        });

        it("delivers typed events", () => {
            const Downloaded = defineEvent<{ path: string }>("Downloaded");
            const p = new Publisher(quietRegistry());
            const paths: string[] = [];
            p.listen(Downloaded, (evt) => paths.push(evt.path));
            p.publish(Downloaded.create({ path: "/tmp/a" }));
            expect(paths).toEqual(["/tmp/a"]);
        });

        it("stopListening cancels one registration", () => {
            const p = new Publisher(quietRegistry());
            const cb = vi.fn();
            const handle = p.listen("greet", cb);
            p.listen("greet", cb);
            handle.stopListening();
            p.publish("greet");
            expect(cb).toHaveBeenCalledOnce();
            expect(p.listenerCount("greet")).toBe(1);
        });
    });

    describe("Isolation between publishers", () => {
        it("listeners on P never see publishes from Q", () => {
            const registry = quietRegistry();
            const p = new Publisher(registry);
            const q = new Publisher(registry);
            const onP = vi.fn();
            const onQ = vi.fn();
            p.listen("greet", onP);
            q.listen("greet", onQ);
            q.publish("greet");
            expect(onP).not.toHaveBeenCalled();
            expect(onQ).toHaveBeenCalledOnce();
        });

        it("listeners on P never see global publishes", () => {
            const registry = quietRegistry();
            const p = new Publisher(registry);
            const cb = vi.fn();
            p.listen("greet", cb);
            registry.publish("greet");
            expect(cb).not.toHaveBeenCalled();
        });
    });

    describe("asListener", () => {
        it("returns the callback with stopListening attached", () => {
            const p = new Publisher(quietRegistry());
            const seen: string[] = [];
            const onGreet = p.asListener("greet", (evt: NamedEvent) => {
                seen.push(evt.event);
            });
            p.publish("greet");
            onGreet.stopListening();
            p.publish("greet");
            expect(seen).toEqual(["greet"]);
        });

        it("honours once", () => {
            const p = new Publisher(quietRegistry());
            const cb = vi.fn();
            p.asListener("greet", cb, { once: true });
            p.publish("greet");
            p.publish("greet");
            expect(cb).toHaveBeenCalledOnce();
        });
    });

    describe("connect", () => {
        it("publishes emitter events with { source, args }", () => {
            const p = new Publisher(quietRegistry());
            const emitter = new EventEmitter();
            const cb = vi.fn();
            p.listen("click", cb);
            p.connect(emitter, "click");
            emitter.emit("click", 10, 20);
            expect(cb).toHaveBeenCalledExactlyOnceWith({ event: "click", source: emitter, args: [10, 20] });
        });

        it("publishes under an alias", () => {
            const p = new Publisher(quietRegistry());
            const emitter = new EventEmitter();
            const cb = vi.fn();
            p.listen("button:pressed", cb);
            p.connect(emitter, "click", "button:pressed");
            emitter.emit("click");
            expect(cb).toHaveBeenCalledExactlyOnceWith({ event: "button:pressed", source: emitter, args: [] });
        });

        it("stops forwarding once disconnected", () => {
            const p = new Publisher(quietRegistry());
            const emitter = new EventEmitter();
            const cb = vi.fn();
            p.listen("click", cb);
            const disconnect = p.connect(emitter, "click");
            disconnect();
            emitter.emit("click");
            expect(cb).not.toHaveBeenCalled();
            expect(emitter.listenerCount("click")).toBe(0);
        });
    });

    describe("dispose", () => {
        it("drops every registration and leaves handles harmless", () => {
            const registry = quietRegistry();
            const p = new Publisher(registry);
            const cb = vi.fn();
            const eavesdropper = vi.fn();
            const handle = p.listen("greet", cb);
            registry.eavesdrop("greet", eavesdropper);
            p.dispose();
            p.publish("greet");
            expect(cb).not.toHaveBeenCalled();
            expect(eavesdropper).toHaveBeenCalledOnce();
            expect(() => handle.stopListening()).not.toThrow();
        });
    });

    describe("Subclassing and the default registry", () => {
        it("subclasses publish through their own scope", () => {
            const Finished = defineEvent("Finished", { path: "" });

            class Downloader extends Publisher {
                finish(path: string): void {
                    this.publish(Finished.create({ path }));
                }
            }

            const registry = quietRegistry();
            const downloader = new Downloader(registry);
            const origins: unknown[] = [];
            registry.eavesdrop(Finished, (evt, origin) => {
                origins.push(origin);
                expect(evt.path).toBe("/tmp/file");
            });
            downloader.finish("/tmp/file");
            expect(origins).toEqual([downloader]);
        });

        it("uses the global registry when none is given", () => {
            const p = new Publisher();
            const spy = vi.fn();
            const handle = globalRegistry.eavesdrop("publisher:default", spy);
            p.publish("publisher:default");
            handle.stopListening();
            expect(spy).toHaveBeenCalledExactlyOnceWith({ event: "publisher:default" }, p);
        });
    });
});
