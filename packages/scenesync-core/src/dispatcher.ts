import type { Logger } from "./logger.js";
import type { NativeHandle, Unsubscribe } from "./native.js";
import type { ReplicaObject } from "./object.js";
import type { Property } from "./properties.js";
import type { ObjectRegistry } from "./registry.js";
import type { ReplicaSession, SessionEventName } from "./session.js";
import type { Translator } from "./translators/base.js";

/** Inbound events to trace at debug level. */
export type EventLogFlags = Partial<Record<SessionEventName, boolean>>;

export type EventDispatcherOptions = {
  registry: ObjectRegistry;
  log: Logger;
  logEvents?: EventLogFlags;
};

function describeProperty(property: Property): string {
  const owner = property.owner;
  return `${owner ? owner.toString() : "<detached>"}/${property.path().join(".")}`;
}

/**
 * Routes session events to the translator registered for the object's type, and runs the tick
 * hooks of every translator in registration order. A throwing translator is logged and skipped.
 */
export class EventDispatcher {
  private readonly translators = new Map<string, Translator>();
  private readonly ordered: Translator[] = [];
  private readonly unsubscribers: Unsubscribe[] = [];
  private session: ReplicaSession | null = null;

  constructor(private readonly opts: EventDispatcherOptions) {}

  get isStarted(): boolean {
    return this.session !== null;
  }

  register(type: string, translator: Translator): void {
    if (this.translators.has(type)) {
      this.opts.log.error(`translator already registered for type ${type}`);
      return;
    }
    this.translators.set(type, translator);
    if (!this.ordered.includes(translator)) this.ordered.push(translator);
  }

  getTranslator(type: string): Translator | undefined {
    const translator = this.translators.get(type);
    if (!translator) this.opts.log.error(`unknown object type ${type}`);
    return translator;
  }

  initializeTranslators(): void {
    for (const translator of this.ordered) this.call(translator, "initialize", () => translator.initialize());
  }

  start(session: ReplicaSession): void {
    if (this.session) this.stop();
    this.session = session;
    const on = this.unsubscribers;

    on.push(
      session.on("create", (obj, childIndex) => {
        this.trace("create", () => `${obj.toString()} at ${childIndex}`);
        this.route(obj, "onCreate", (t) => t.onCreate(obj, childIndex));
      }),
      session.on("confirmCreate", (obj) => {
        this.trace("confirmCreate", () => obj.toString());
        this.route(obj, "onConfirmCreate", (t) => t.onConfirmCreate(obj));
      }),
      session.on("delete", (obj) => {
        this.trace("delete", () => obj.toString());
        this.route(obj, "onDelete", (t) => t.onDelete(obj));
      }),
      session.on("confirmDelete", (obj, unsubscribed) => {
        this.trace("confirmDelete", () => `${obj.toString()} unsubscribed=${unsubscribed}`);
        this.route(obj, "onConfirmDelete", (t) => t.onConfirmDelete(obj, unsubscribed));
      }),
      session.on("lock", (obj) => {
        this.trace("lock", () => `${obj.toString()} owner=${obj.lockOwner ?? "-"}`);
        this.route(obj, "onLock", (t) => t.onLock(obj));
      }),
      session.on("unlock", (obj) => {
        this.trace("unlock", () => obj.toString());
        this.route(obj, "onUnlock", (t) => t.onUnlock(obj));
      }),
      session.on("lockOwnerChange", (obj) => {
        this.trace("lockOwnerChange", () => `${obj.toString()} owner=${obj.lockOwner ?? "-"}`);
        this.route(obj, "onLockOwnerChange", (t) => t.onLockOwnerChange(obj));
      }),
      session.on("parentChange", (obj, childIndex) => {
        this.trace("parentChange", () => `${obj.toString()} under ${obj.parent?.toString() ?? "-"} at ${childIndex}`);
        this.route(obj, "onParentChange", (t) => t.onParentChange(obj, childIndex));
      }),
      session.on("propertyChange", (property) => {
        this.trace("propertyChange", () => describeProperty(property));
        this.route(property.owner, "onPropertyChange", (t) => t.onPropertyChange(property));
      }),
      session.on("removeField", (dictionary, name) => {
        this.trace("removeField", () => `${describeProperty(dictionary)} ${name}`);
        this.route(dictionary.owner, "onRemoveField", (t) => t.onRemoveField(dictionary, name));
      }),
      session.on("listAdd", (list, index, count) => {
        this.trace("listAdd", () => `${describeProperty(list)} ${index}+${count}`);
        this.route(list.owner, "onListAdd", (t) => t.onListAdd(list, index, count));
      }),
      session.on("listRemove", (list, index, count) => {
        this.trace("listRemove", () => `${describeProperty(list)} ${index}-${count}`);
        this.route(list.owner, "onListRemove", (t) => t.onListRemove(list, index, count));
      })
    );

    for (const translator of this.ordered) {
      this.call(translator, "onSessionConnect", () => translator.onSessionConnect(session));
    }
  }

  stop(): void {
    if (!this.session) return;
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.session = null;
    for (const translator of this.ordered) {
      this.call(translator, "onSessionDisconnect", () => translator.onSessionDisconnect());
    }
  }

  /** Offers an unsynced native to each translator until one claims it. */
  tryCreate(native: NativeHandle): ReplicaObject | null {
    const current = this.opts.registry.getReplica(native);
    if (current?.isSyncing) return null;
    for (const translator of this.ordered) {
      const result = this.call(translator, "tryCreate", () => translator.tryCreate(native));
      if (result?.handled) return result.obj;
    }
    return null;
  }

  preUpdate(): void {
    for (const translator of this.ordered) this.call(translator, "preUpdate", () => translator.preUpdate());
  }

  update(): void {
    for (const translator of this.ordered) this.call(translator, "update", () => translator.update());
  }

  onSelect(native: NativeHandle): void {
    this.routeNative(native, "onSelect", (t) => t.onSelect(native));
  }

  onDeselect(native: NativeHandle): void {
    this.routeNative(native, "onDeselect", (t) => t.onDeselect(native));
  }

  onReplace(oldNative: NativeHandle, newNative: NativeHandle): void {
    const obj = this.opts.registry.getReplica(oldNative);
    if (!obj) return;
    this.route(obj, "onReplace", (t) => t.onReplace(obj, oldNative, newNative));
  }

  private routeNative(native: NativeHandle, event: string, invoke: (translator: Translator) => void): void {
    const obj = this.opts.registry.getReplica(native);
    if (obj) this.route(obj, event, invoke);
  }

  private route(obj: ReplicaObject | null, event: string, invoke: (translator: Translator) => void): void {
    if (!obj) return;
    const translator = this.getTranslator(obj.type);
    if (translator) this.call(translator, event, () => invoke(translator));
  }

  private call<T>(translator: Translator, event: string, fn: () => T): T | undefined {
    try {
      return fn();
    } catch (err) {
      this.opts.log.error(`${translator.name} ${event} failed`, err);
      return undefined;
    }
  }

  private trace(event: SessionEventName, describe: () => string): void {
    if (this.opts.logEvents?.[event]) this.opts.log.debug(`${event} ${describe()}`);
  }
}
