import type {
  FieldOwner,
  FieldValue,
  NativeAsset,
  NativeChange,
  NativeComponent,
  NativeHandle,
  NativeNode,
  NativeParent,
  NativeScene,
  SceneEngine,
  Unsubscribe,
} from "./native.js";

let nextHandleId = 1;

export class MemoryScene implements NativeScene {
  readonly nativeKind = "scene" as const;
  readonly handleId = nextHandleId++;
  readonly roots: MemoryNode[] = [];

  constructor(public name: string) {}
}

export class MemoryNode implements NativeNode {
  readonly nativeKind = "node" as const;
  readonly handleId = nextHandleId++;
  parent: MemoryNode | MemoryScene | null = null;
  readonly children: MemoryNode[] = [];
  readonly components: MemoryComponent[] = [];
  readonly fields = new Map<string, FieldValue>();
  editable = true;
  destroyed = false;
  /** Protected nodes refuse to be destroyed. */
  protected_ = false;
  templatePath: string | undefined;
  source: MemoryNode | null = null;
  assetPart = false;
  fileId = 0;

  constructor(public name: string) {}

  toString(): string {
    return `node#${this.handleId}(${this.name})`;
  }
}

export class MemoryComponent implements NativeComponent {
  readonly nativeKind = "component" as const;
  readonly handleId = nextHandleId++;
  readonly fields = new Map<string, FieldValue>();
  editable = true;
  destroyed = false;
  source: MemoryComponent | null = null;
  fileId = 0;

  constructor(
    readonly type: string,
    public node: MemoryNode
  ) {}
}

export class MemoryAsset implements NativeAsset {
  readonly nativeKind = "asset" as const;
  readonly handleId = nextHandleId++;

  constructor(
    readonly path: string,
    public persisted: boolean
  ) {}
}

export type MemorySceneEngineOptions = {
  /** Default field values per component type, applied on add and on reset. */
  componentDefaults?: Record<string, Record<string, FieldValue>>;
};

/**
 * In-process scene engine. Backs the tests and the benchmark, and doubles as a reference for
 * what a native engine binding must provide.
 */
export class MemorySceneEngine implements SceneEngine {
  private readonly listeners = new Set<(change: NativeChange) => void>();
  private readonly sceneList: MemoryScene[] = [];
  private readonly templates = new Map<string, MemoryNode>();
  private readonly assets = new Map<string, MemoryAsset>();
  private readonly selection = new Set<MemoryNode>();
  private readonly componentDefaults: Record<string, Record<string, FieldValue>>;
  private nextFileId = 1;

  /** Number of `moveNode` calls made through the engine port. */
  moves = 0;

  /** User-originated edits. Unlike the port methods these raise change notifications. */
  readonly edits: MemorySceneEdits;

  constructor(opts: MemorySceneEngineOptions = {}) {
    this.componentDefaults = opts.componentDefaults ?? {};
    this.edits = new MemorySceneEdits(this);
  }

  onChange(listener: (change: NativeChange) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  emit(change: NativeChange): void {
    for (const listener of Array.from(this.listeners)) listener(change);
  }

  scenes(): MemoryScene[] {
    return [...this.sceneList];
  }

  sceneName(scene: NativeScene): string {
    return asScene(scene).name;
  }

  findScene(name: string): MemoryScene | undefined {
    return this.sceneList.find((s) => s.name === name);
  }

  createScene(name: string): MemoryScene {
    if (this.findScene(name)) throw new Error(`scene already exists: ${name}`);
    const scene = new MemoryScene(name);
    this.sceneList.push(scene);
    return scene;
  }

  children(parent: NativeParent): MemoryNode[] {
    const p = asParent(parent);
    return p instanceof MemoryScene ? [...p.roots] : [...p.children];
  }

  parentOf(node: NativeNode): MemoryNode | MemoryScene | null {
    const n = asNode(node);
    return n.destroyed ? null : n.parent;
  }

  createNode(parent: NativeParent | null, index: number, name = "Node"): MemoryNode {
    const node = new MemoryNode(name);
    if (parent) {
      this.insert(node, asParent(parent), index);
      node.assetPart = isInAsset(node);
      if (node.assetPart) node.fileId = this.nextFileId++;
    } else {
      node.assetPart = true;
      node.fileId = this.nextFileId++;
    }
    return node;
  }

  moveNode(node: NativeNode, parent: NativeParent, index: number): void {
    this.relocate(asNode(node), asParent(parent), index);
    this.moves++;
  }

  relocate(node: MemoryNode, parent: MemoryNode | MemoryScene, index: number): void {
    this.detach(node);
    this.insert(node, parent, index);
  }

  destroyNode(node: NativeNode): void {
    const n = asNode(node);
    if (n.protected_) throw new Error(`${n.toString()} cannot be destroyed`);
    this.detach(n);
    this.markDestroyed(n);
  }

  isDestroyed(handle: NativeHandle): boolean {
    if (handle instanceof MemoryNode || handle instanceof MemoryComponent) return handle.destroyed;
    return false;
  }

  nodeName(node: NativeNode): string {
    return asNode(node).name;
  }

  setNodeName(node: NativeNode, name: string): void {
    asNode(node).name = name;
  }

  components(node: NativeNode): MemoryComponent[] {
    return [...asNode(node).components];
  }

  componentNode(component: NativeComponent): MemoryNode {
    return asComponent(component).node;
  }

  componentType(component: NativeComponent): string {
    return asComponent(component).type;
  }

  addComponent(node: NativeNode, type: string): MemoryComponent {
    const n = asNode(node);
    const component = new MemoryComponent(type, n);
    for (const [name, value] of Object.entries(this.componentDefaults[type] ?? {})) {
      component.fields.set(name, value);
    }
    if (n.assetPart) component.fileId = this.nextFileId++;
    n.components.push(component);
    return component;
  }

  destroyComponent(component: NativeComponent): void {
    const c = asComponent(component);
    const idx = c.node.components.indexOf(c);
    if (idx >= 0) c.node.components.splice(idx, 1);
    c.destroyed = true;
  }

  moveComponent(component: NativeComponent, index: number): void {
    const c = asComponent(component);
    const list = c.node.components;
    const from = list.indexOf(c);
    if (from < 0) throw new Error("component is not attached");
    list.splice(from, 1);
    list.splice(Math.min(index, list.length), 0, c);
  }

  readFields(owner: FieldOwner): Record<string, FieldValue> {
    return Object.fromEntries(asOwner(owner).fields);
  }

  writeField(owner: FieldOwner, name: string, value: FieldValue): void {
    asOwner(owner).fields.set(name, value);
  }

  resetField(owner: FieldOwner, name: string): void {
    const o = asOwner(owner);
    const fallback = o instanceof MemoryComponent ? this.componentDefaults[o.type]?.[name] : undefined;
    if (fallback === undefined) o.fields.delete(name);
    else o.fields.set(name, fallback);
  }

  isEditable(handle: FieldOwner): boolean {
    return asOwner(handle).editable;
  }

  setEditable(handle: FieldOwner, editable: boolean): void {
    asOwner(handle).editable = editable;
  }

  isSelected(node: NativeNode): boolean {
    return node instanceof MemoryNode && this.selection.has(node);
  }

  templatePath(node: NativeNode): string | undefined {
    return asNode(node).templatePath;
  }

  findTemplate(path: string): MemoryNode | undefined {
    const t = this.templates.get(path);
    return t && !t.destroyed ? t : undefined;
  }

  createTemplate(path: string, base?: NativeNode): MemoryNode {
    if (this.findTemplate(path)) throw new Error(`template already exists: ${path}`);
    let root: MemoryNode;
    if (base) {
      root = this.cloneTree(asNode(base), null, true);
    } else {
      root = new MemoryNode(path.replace(/^.*\//, "").replace(/\.[^.]*$/, ""));
      root.assetPart = true;
      root.fileId = this.nextFileId++;
    }
    root.templatePath = path;
    this.templates.set(path, root);
    return root;
  }

  instantiate(template: NativeNode, parent: NativeParent, index: number): MemoryNode {
    const p = asParent(parent);
    const inAsset = !(p instanceof MemoryScene) && p.assetPart;
    const root = this.cloneTree(asNode(template), null, inAsset);
    this.insert(root, p, index);
    return root;
  }

  nodeSource(node: NativeNode): MemoryNode | null {
    return asNode(node).source;
  }

  componentSource(component: NativeComponent): MemoryComponent | null {
    return asComponent(component).source;
  }

  isTemplateAssetPart(node: NativeNode): boolean {
    return asNode(node).assetPart;
  }

  fileId(handle: FieldOwner): number {
    return asOwner(handle).fileId;
  }

  instancesOf(template: NativeNode): MemoryNode[] {
    const t = asNode(template);
    const out: MemoryNode[] = [];
    const visit = (n: MemoryNode) => {
      if (n.source === t && n !== t) out.push(n);
      for (const c of n.children) visit(c);
    };
    for (const scene of this.sceneList) for (const r of scene.roots) visit(r);
    for (const root of this.templates.values()) if (!root.destroyed) visit(root);
    return out;
  }

  refreshInstances(template: NativeNode): void {
    for (const instance of this.instancesOf(template)) {
      this.refreshFromSource(instance);
      if (instance.templatePath) this.refreshInstances(instance);
    }
  }

  assetPath(asset: NativeAsset): string {
    return asAsset(asset).path;
  }

  loadAsset(path: string): MemoryAsset | undefined {
    return this.assets.get(path);
  }

  isPersisted(asset: NativeAsset): boolean {
    return asAsset(asset).persisted;
  }

  createAsset(path: string, persisted = true): MemoryAsset {
    const asset = new MemoryAsset(path, persisted);
    this.assets.set(path, asset);
    return asset;
  }

  setSelection(nodes: readonly MemoryNode[]): { selected: MemoryNode[]; deselected: MemoryNode[] } {
    const next = new Set(nodes);
    const selected = nodes.filter((n) => !this.selection.has(n));
    const deselected = Array.from(this.selection).filter((n) => !next.has(n));
    this.selection.clear();
    for (const n of next) this.selection.add(n);
    return { selected, deselected };
  }

  /** Marks a node as protected so `destroyNode` throws for it. */
  protect(node: NativeNode, value = true): void {
    asNode(node).protected_ = value;
  }

  private insert(node: MemoryNode, parent: MemoryNode | MemoryScene, index: number): void {
    if (parent instanceof MemoryNode) {
      for (let p: MemoryNode | MemoryScene | null = parent; p instanceof MemoryNode; p = p.parent) {
        if (p === node) throw new Error(`cannot move ${node.toString()} under its own descendant`);
      }
    }
    const list = parent instanceof MemoryScene ? parent.roots : parent.children;
    list.splice(Math.max(0, Math.min(index, list.length)), 0, node);
    node.parent = parent;
  }

  private detach(node: MemoryNode): void {
    const p = node.parent;
    if (!p) return;
    const list = p instanceof MemoryScene ? p.roots : p.children;
    const idx = list.indexOf(node);
    if (idx >= 0) list.splice(idx, 1);
    node.parent = null;
  }

  revive(node: MemoryNode): void {
    node.destroyed = false;
    for (const c of node.components) c.destroyed = false;
    for (const child of node.children) this.revive(child);
  }

  private markDestroyed(node: MemoryNode): void {
    node.destroyed = true;
    this.selection.delete(node);
    for (const c of node.components) c.destroyed = true;
    for (const child of node.children) this.markDestroyed(child);
  }

  private cloneTree(source: MemoryNode, parent: MemoryNode | null, inAsset: boolean): MemoryNode {
    const node = new MemoryNode(source.name);
    node.source = source;
    node.assetPart = inAsset;
    if (inAsset) node.fileId = this.nextFileId++;
    for (const [k, v] of source.fields) node.fields.set(k, v);
    for (const sc of source.components) {
      const c = new MemoryComponent(sc.type, node);
      c.source = sc;
      if (inAsset) c.fileId = this.nextFileId++;
      for (const [k, v] of sc.fields) c.fields.set(k, v);
      node.components.push(c);
    }
    if (parent) {
      parent.children.push(node);
      node.parent = parent;
    }
    for (const child of source.children) this.cloneTree(child, node, inAsset);
    return node;
  }

  private refreshFromSource(node: MemoryNode): void {
    const source = node.source;
    if (!source) return;
    for (const [k, v] of source.fields) node.fields.set(k, v);
    for (const sc of source.components) {
      let c = node.components.find((x) => x.source === sc);
      if (!c) {
        c = new MemoryComponent(sc.type, node);
        c.source = sc;
        if (node.assetPart) c.fileId = this.nextFileId++;
        node.components.push(c);
      }
      for (const [k, v] of sc.fields) c.fields.set(k, v);
    }
    for (const sourceChild of source.children) {
      const existing = node.children.find((c) => c.source === sourceChild);
      if (existing) this.refreshFromSource(existing);
      else this.cloneTree(sourceChild, node, node.assetPart);
    }
  }
}

/** User edits against a `MemorySceneEngine`, each raising the matching change notification. */
export class MemorySceneEdits {
  constructor(private readonly engine: MemorySceneEngine) {}

  createScene(name: string): MemoryScene {
    const scene = this.engine.createScene(name);
    this.engine.emit({ kind: "sceneCreated", scene });
    return scene;
  }

  createNode(parent: MemoryNode | MemoryScene, name: string, index = Number.MAX_SAFE_INTEGER): MemoryNode {
    const node = this.engine.createNode(parent, index, name);
    this.engine.emit({ kind: "created", node });
    return node;
  }

  instantiate(template: MemoryNode, parent: MemoryNode | MemoryScene, index = Number.MAX_SAFE_INTEGER): MemoryNode {
    const node = this.engine.instantiate(template, parent, index);
    this.engine.emit({ kind: "created", node });
    return node;
  }

  move(node: MemoryNode, parent: MemoryNode | MemoryScene, index: number): void {
    const oldParent = node.parent;
    this.engine.relocate(node, parent, index);
    this.engine.emit({ kind: "moved", node, oldParent });
  }

  /** Brings a destroyed node back under `parent`, as an undo of `destroy` would. */
  restore(node: MemoryNode, parent: MemoryNode | MemoryScene, index = Number.MAX_SAFE_INTEGER): void {
    this.engine.revive(node);
    this.engine.relocate(node, parent, index);
    this.engine.emit({ kind: "created", node });
  }

  destroy(node: MemoryNode): void {
    const parent = node.parent;
    this.engine.destroyNode(node);
    this.engine.emit({ kind: "destroyed", node, parent });
  }

  setField(owner: MemoryNode | MemoryComponent, name: string, value: FieldValue): void {
    this.engine.writeField(owner, name, value);
    this.engine.emit({ kind: "fields", owner });
  }

  rename(node: MemoryNode, name: string): void {
    node.name = name;
    this.engine.emit({ kind: "fields", owner: node });
  }

  addComponent(node: MemoryNode, type: string): MemoryComponent {
    const component = this.engine.addComponent(node, type);
    this.engine.emit({ kind: "components", node });
    return component;
  }

  removeComponent(component: MemoryComponent): void {
    const node = component.node;
    this.engine.destroyComponent(component);
    this.engine.emit({ kind: "components", node });
  }

  moveComponent(component: MemoryComponent, index: number): void {
    this.engine.moveComponent(component, index);
    this.engine.emit({ kind: "componentOrder", node: component.node });
  }

  select(...nodes: MemoryNode[]): void {
    const { selected, deselected } = this.engine.setSelection(nodes);
    if (selected.length > 0 || deselected.length > 0) {
      this.engine.emit({ kind: "selection", selected, deselected });
    }
  }

  saveAsset(asset: MemoryAsset): void {
    asset.persisted = true;
    this.engine.emit({ kind: "assetSaved", asset });
  }
}

function isInAsset(node: MemoryNode): boolean {
  for (let p = node.parent; p; p = p instanceof MemoryNode ? p.parent : null) {
    if (p instanceof MemoryScene) return false;
    if (p.assetPart) return true;
  }
  return false;
}

function asNode(handle: NativeNode): MemoryNode {
  if (handle instanceof MemoryNode) return handle;
  throw new Error("foreign node handle");
}

function asComponent(handle: NativeComponent): MemoryComponent {
  if (handle instanceof MemoryComponent) return handle;
  throw new Error("foreign component handle");
}

function asScene(handle: NativeScene): MemoryScene {
  if (handle instanceof MemoryScene) return handle;
  throw new Error("foreign scene handle");
}

function asAsset(handle: NativeAsset): MemoryAsset {
  if (handle instanceof MemoryAsset) return handle;
  throw new Error("foreign asset handle");
}

function asParent(handle: NativeParent): MemoryNode | MemoryScene {
  if (handle instanceof MemoryNode || handle instanceof MemoryScene) return handle;
  throw new Error("foreign parent handle");
}

function asOwner(handle: FieldOwner): MemoryNode | MemoryComponent {
  if (handle instanceof MemoryNode || handle instanceof MemoryComponent) return handle;
  throw new Error("foreign field owner");
}
