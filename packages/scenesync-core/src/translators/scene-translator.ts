import type { NativeHandle, NativeScene } from "../native.js";
import { isScene } from "../native.js";
import { ObjectType, Prop, ReplicaObject } from "../object.js";
import { ValueProperty, readString } from "../properties.js";
import type { ReplicaSession } from "../session.js";
import type { TranslatorContext, TryCreateResult } from "./base.js";
import { BaseTranslator } from "./base.js";
import type { NodeTranslator } from "./node-translator.js";

/**
 * Scenes are root replicas of type `scene`, matched to local scenes by `#name`. Their node
 * children are the scene's root nodes.
 */
export class SceneTranslator extends BaseTranslator {
  readonly name = "scene";

  constructor(
    ctx: TranslatorContext,
    private readonly nodes: NodeTranslator
  ) {
    super(ctx);
  }

  override onSessionConnect(session: ReplicaSession): void {
    super.onSessionConnect(session);
    const bound = new Set<NativeScene>();
    for (const root of session.rootObjects()) {
      if (root.type !== ObjectType.scene) continue;
      const scene = this.bindScene(root);
      if (scene) bound.add(scene);
    }
    for (const scene of this.ctx.engine.scenes()) {
      if (!bound.has(scene)) this.uploadScene(scene);
    }
  }

  override tryCreate(native: NativeHandle): TryCreateResult {
    if (!isScene(native)) return { handled: false };
    return { handled: true, obj: this.uploadScene(native) };
  }

  /** A scene created locally while connected. */
  onSceneCreated(scene: NativeScene): void {
    if (this.session) this.uploadScene(scene);
  }

  override onCreate(obj: ReplicaObject): void {
    this.bindScene(obj);
  }

  override onDelete(obj: ReplicaObject): void {
    this.ctx.log.info(`scene ${readString(obj.properties, Prop.name) ?? obj.toString()} was deleted`);
    this.unbindSubtree(obj);
  }

  override onConfirmDelete(obj: ReplicaObject, unsubscribed: boolean): void {
    if (unsubscribed) this.unbindSubtree(obj);
    else obj.clear();
  }

  /**
   * Binds a server scene to the local scene of the same name, creating it when missing. Local
   * root nodes the server does not know are uploaded, never destroyed.
   */
  private bindScene(obj: ReplicaObject): NativeScene | undefined {
    const { engine, registry, log } = this.ctx;
    const name = readString(obj.properties, Prop.name);
    if (name === undefined) {
      log.warn(`scene ${obj.toString()} has no name`);
      return undefined;
    }
    const scene = engine.findScene(name) ?? engine.createScene(name);
    const current = registry.getReplica(scene);
    if (current && current !== obj && current.isSyncing) {
      const session = this.connected;
      log.warn(`${obj.toString()} duplicates scene ${current.toString()}`);
      if (current.isCreated) {
        this.retargetReferences(obj, current);
        session.delete(obj);
        return scene;
      }
      this.retargetReferences(current, obj);
      session.delete(current);
      registry.unbindReplica(current);
    }
    registry.bind(obj, scene);
    this.nodes.initializeChildren(obj, scene, false);
    return scene;
  }

  private uploadScene(scene: NativeScene): ReplicaObject | null {
    const { engine, registry } = this.ctx;
    if (registry.getReplica(scene)?.isSyncing) return null;
    const session = this.connected;
    const obj = registry.getOrCreate(scene, () => new ReplicaObject(session.allocateId(), ObjectType.scene));
    for (const stale of [...obj.children]) obj.detachChild(stale);
    obj.properties.set(Prop.name, new ValueProperty(engine.sceneName(scene)));
    for (const root of engine.children(scene)) {
      const child = this.nodes.createNodeObject(root);
      if (child) obj.attachChild(child);
    }
    session.create(obj, null);
    return obj;
  }

  private unbindSubtree(obj: ReplicaObject): void {
    this.ctx.registry.unbindReplica(obj);
    for (const o of obj.descendants()) this.ctx.registry.unbindReplica(o);
  }
}
