import type { EventLogFlags } from "./dispatcher.js";
import { EventDispatcher } from "./dispatcher.js";
import type { PreferMove } from "./hierarchy.js";
import { HierarchyReconciler } from "./hierarchy.js";
import type { LogLevel, Logger } from "./logger.js";
import { createLogger, scopedLogger } from "./logger.js";
import type { LockIndicator } from "./locks.js";
import { LockCoordinator } from "./locks.js";
import type { NativeChange, NativeComponent, NativeHandle, NativeNode, SceneEngine, Unsubscribe } from "./native.js";
import { ObjectType } from "./object.js";
import type { ReplicaObject } from "./object.js";
import { ObjectRegistry } from "./registry.js";
import { PropertySerializer } from "./serializer.js";
import type { ReplicaSession } from "./session.js";
import { TemplateRevisions } from "./template-revisions.js";
import { AssetPathTranslator } from "./translators/asset-path-translator.js";
import type { TranslatorContext } from "./translators/base.js";
import { ComponentTranslator } from "./translators/component-translator.js";
import type { SyncAllOptions } from "./translators/node-translator.js";
import { NodeTranslator } from "./translators/node-translator.js";
import { SceneTranslator } from "./translators/scene-translator.js";

export type SceneReplicatorOptions = {
  debug?: boolean;
  log?: (line: string, level: LogLevel) => void;
  /** Inbound session events to trace at debug level. */
  logEvents?: EventLogFlags;
  preferMove?: PreferMove;
  isSyncable?: (node: NativeNode) => boolean;
  componentIsSyncable?: (component: NativeComponent) => boolean;
  lockIndicator?: LockIndicator;
  onObjectLimit?: (type: string, limit: number) => void;
};

/**
 * Keeps one native scene engine in step with one replica session.
 *
 * Engine changes are staged as they happen and sent on the next `tick`; session events are
 * applied as they arrive, with ordering work left to the post-phase of `tick`.
 */
export class SceneReplicator {
  readonly log: Logger;
  readonly registry = new ObjectRegistry();
  readonly locks: LockCoordinator;
  readonly hierarchy: HierarchyReconciler;
  readonly revisions: TemplateRevisions;
  readonly dispatcher: EventDispatcher;
  readonly assets: AssetPathTranslator;
  readonly nodes: NodeTranslator;
  readonly components: ComponentTranslator;
  readonly scenes: SceneTranslator;

  private session: ReplicaSession | null = null;
  private unsubscribeEngine: Unsubscribe | null = null;

  constructor(
    readonly engine: SceneEngine,
    opts: SceneReplicatorOptions = {}
  ) {
    this.log = createLogger({ debug: opts.debug, log: opts.log }, "scenesync");
    const { registry, log } = this;

    this.locks = new LockCoordinator({
      engine,
      registry,
      indicator: opts.lockIndicator,
      log: scopedLogger(log, "locks"),
    });
    const serializer = new PropertySerializer({
      engine,
      registry,
      lookup: (id) => this.session?.getObject(id),
    });
    this.revisions = new TemplateRevisions({ engine, registry, log: scopedLogger(log, "templates") });
    this.hierarchy = new HierarchyReconciler({
      engine,
      registry,
      log: scopedLogger(log, "hierarchy"),
      preferMove: opts.preferMove,
      onStructuralChange: (parent) => this.revisions.increment(parent),
    });
    this.dispatcher = new EventDispatcher({ registry, log, logEvents: opts.logEvents });

    const ctx: TranslatorContext = {
      engine,
      registry,
      locks: this.locks,
      serializer,
      hierarchy: this.hierarchy,
      revisions: this.revisions,
      log,
    };
    this.assets = new AssetPathTranslator(ctx);
    this.components = new ComponentTranslator(ctx, { isSyncable: opts.componentIsSyncable });
    this.nodes = new NodeTranslator(ctx, this.components, {
      isSyncable: opts.isSyncable,
      onObjectLimit: opts.onObjectLimit,
    });
    this.scenes = new SceneTranslator(ctx, this.nodes);

    this.dispatcher.register(ObjectType.asset, this.assets);
    this.dispatcher.register(ObjectType.node, this.nodes);
    this.dispatcher.register(ObjectType.component, this.components);
    this.dispatcher.register(ObjectType.scene, this.scenes);
    this.dispatcher.initializeTranslators();
  }

  get isStarted(): boolean {
    return this.session !== null;
  }

  start(session: ReplicaSession): void {
    if (this.session) this.stop();
    this.session = session;
    this.locks.attach(session);
    this.revisions.attach(session);
    this.dispatcher.start(session);
    this.unsubscribeEngine = this.engine.onChange((change) => this.routeChange(change));
    this.log.debug(`started as user ${session.userId}`);
  }

  stop(): void {
    if (!this.session) return;
    this.unsubscribeEngine?.();
    this.unsubscribeEngine = null;
    this.dispatcher.stop();
    this.hierarchy.clear();
    this.revisions.detach();
    this.locks.detach();
    this.registry.clear();
    this.session = null;
  }

  /** Sends staged local changes, then applies ordering work queued by server changes. */
  tick(): void {
    if (!this.session) return;
    this.dispatcher.preUpdate();
    this.locks.update();
    this.dispatcher.update();
  }

  isSyncable(node: NativeNode): boolean {
    return this.nodes.isSyncable(node);
  }

  /** Replicates `native` right away instead of on the next tick. */
  createObject(native: NativeHandle): ReplicaObject | null {
    return this.dispatcher.tryCreate(native);
  }

  syncAll(node: NativeNode, opts?: SyncAllOptions): void {
    this.nodes.syncAll(node, opts);
  }

  applyServerState(node: NativeNode, recursive = true): void {
    this.nodes.applyServerState(node, recursive);
  }

  private routeChange(change: NativeChange): void {
    try {
      switch (change.kind) {
        case "selection":
          for (const node of change.deselected) this.dispatcher.onDeselect(node);
          for (const node of change.selected) this.dispatcher.onSelect(node);
          return;
        case "assetSaved":
          this.assets.onAssetSaved(change.asset);
          return;
        case "sceneCreated":
          this.scenes.onSceneCreated(change.scene);
          return;
        default:
          this.nodes.onNativeChange(change);
      }
    } catch (err) {
      this.log.error(`failed to stage ${change.kind} change`, err);
    }
  }
}
