import {
    defineEvent,
    eavesdrop,
    GLOBAL_ORIGIN,
    globalRegistry,
    ListenerInvocationError,
    listen,
    type Origin,
    Publisher,
    publish,
} from "overhear";

const Downloaded = defineEvent("Downloaded", { path: "", bytes: 0 });

class Downloader extends Publisher {
    constructor(readonly label: string) {
        super();
    }

    finish(path: string, bytes: number): void {
        this.publish(Downloaded.create({ path, bytes }));
    }
}

function describeOrigin(origin: Origin): string {
    return origin === GLOBAL_ORIGIN ? "global" : origin instanceof Downloader ? origin.label : "publisher";
}

globalRegistry.logger.info("example", "Quickstart running");

const images = new Downloader("images");
const videos = new Downloader("videos");

const onImage = images.listen(Downloaded, (evt) => {
    console.log(`images finished ${evt.path} (${evt.bytes} bytes)`);
});
images.listenOnce(Downloaded, () => console.log("first image done"));

eavesdrop(Downloaded, (evt, origin) => {
    console.log(`[audit] ${describeOrigin(origin)} → ${evt.path}`);
});

images.finish("/tmp/cat.png", 2048);
images.finish("/tmp/dog.png", 4096);
videos.finish("/tmp/intro.mp4", 1 << 20);

onImage.stopListening();
onImage.stopListening();

listen("greet", (evt) => console.log(`greeting: ${String(evt.msg)}`));
publish("greet", { msg: "hi" });
publish({ event: "greet", msg: "hello again" });

listen("explode", function explode() {
    throw new Error("boom");
});
try {
    publish("explode");
} catch (err) {
    if (!(err instanceof ListenerInvocationError)) throw err;
    console.log(`caught ${err.name}: ${err.message}`);
}
