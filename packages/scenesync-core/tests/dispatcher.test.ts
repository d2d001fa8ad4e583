import { expect, test } from "vitest";

import type { NativeHandle, ReplicaSession, TranslatorContext, TryCreateResult } from "../src/index.js";
import { BaseTranslator, EventDispatcher, ReplicaObject, ValueProperty, createLogger, makeReplicaId } from "../src/index.js";
import { FakeSession, createTestContext } from "./fake-session.js";

class RecordingTranslator extends BaseTranslator {
  readonly events: string[] = [];

  constructor(
    ctx: TranslatorContext,
    readonly name: string,
    private readonly failOn: string | null = null
  ) {
    super(ctx);
  }

  override onSessionConnect(session: ReplicaSession): void {
    super.onSessionConnect(session);
    this.record("connect");
  }

  override onSessionDisconnect(): void {
    super.onSessionDisconnect();
    this.record("disconnect");
  }

  override onCreate(obj: ReplicaObject, childIndex: number): void {
    this.record(`create ${obj.type} ${childIndex}`);
  }

  override onPropertyChange(): void {
    this.record("propertyChange");
  }

  override update(): void {
    this.record("update");
  }

  override tryCreate(native: NativeHandle): TryCreateResult {
    if (native.nativeKind !== "scene") return { handled: false };
    this.record("tryCreate");
    return { handled: true, obj: null };
  }

  private record(event: string): void {
    if (this.failOn !== null && event.startsWith(this.failOn)) throw new Error(`${this.name} broke on ${event}`);
    this.events.push(event);
  }
}

function setup(failOn: string | null = null) {
  const { ctx, engine, lines } = createTestContext();
  const dispatcher = new EventDispatcher({
    registry: ctx.registry,
    log: createLogger({ debug: true, log: (line) => lines.push(line) }),
    logEvents: { create: true },
  });
  const nodes = new RecordingTranslator(ctx, "node", failOn);
  const components = new RecordingTranslator(ctx, "component");
  dispatcher.register("node", nodes);
  dispatcher.register("component", components);
  const session = new FakeSession();
  return { ctx, engine, lines, dispatcher, nodes, components, session };
}

test("events are routed by object type", () => {
  const { dispatcher, nodes, components, session } = setup();
  dispatcher.start(session);
  const node = new ReplicaObject(makeReplicaId(1, 1), "node");
  const component = new ReplicaObject(makeReplicaId(1, 2), "component");

  session.events.emit("create", (h) => h(node, -1));
  session.events.emit("create", (h) => h(component, 0));
  expect(nodes.events).toEqual(["connect", "create node -1"]);
  expect(components.events).toEqual(["connect", "create component 0"]);
});

test("property events go to the translator of the owning object", () => {
  const { dispatcher, nodes, components, session } = setup();
  dispatcher.start(session);
  const component = new ReplicaObject(makeReplicaId(1, 2), "component");
  component.properties.set("range", new ValueProperty(3));
  const range = component.properties.get("range");
  if (!range) throw new Error("missing range");

  session.events.emit("propertyChange", (h) => h(range));
  expect(components.events).toEqual(["connect", "propertyChange"]);
  expect(nodes.events).toEqual(["connect"]);
});

test("a throwing translator is logged and does not stop the others", () => {
  const { dispatcher, nodes, components, lines, session } = setup("update");
  dispatcher.start(session);
  dispatcher.update();

  expect(nodes.events).toEqual(["connect"]);
  expect(components.events).toEqual(["connect", "update"]);
  expect(lines.some((line) => line.startsWith("node update failed: Error: node broke on update"))).toBe(true);
});

test("unknown types and duplicate registrations are reported", () => {
  const { ctx, dispatcher, lines, session } = setup();
  dispatcher.register("node", new RecordingTranslator(ctx, "other"));
  dispatcher.start(session);
  session.events.emit("delete", (h) => h(new ReplicaObject(makeReplicaId(1, 9), "light")));

  expect(lines).toContain("translator already registered for type node");
  expect(lines).toContain("unknown object type light");
});

test("traces only the flagged events", () => {
  const { dispatcher, lines, session } = setup();
  dispatcher.start(session);
  const node = new ReplicaObject(makeReplicaId(1, 1), "node");
  session.events.emit("create", (h) => h(node, 2));
  session.events.emit("delete", (h) => h(node));

  expect(lines).toEqual(["create node:0x0000000100000001 at 2"]);
});

test("stop unsubscribes and disconnects every translator", () => {
  const { engine, dispatcher, nodes, session } = setup();
  dispatcher.start(session);
  expect(dispatcher.tryCreate(engine.createScene("Main"))).toBeNull();
  dispatcher.stop();
  session.events.emit("create", (h) => h(new ReplicaObject(makeReplicaId(1, 1), "node"), 0));

  expect(dispatcher.isStarted).toBe(false);
  expect(nodes.events).toEqual(["connect", "tryCreate", "disconnect"]);
});
