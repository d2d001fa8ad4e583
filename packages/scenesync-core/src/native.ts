import type { Scalar } from "./properties.js";

export type Unsubscribe = () => void;

// Opaque handles into the native scene engine. Engines hand out their own objects and narrow them
// back on the way in.
export type NativeNode = { readonly nativeKind: "node" };
export type NativeComponent = { readonly nativeKind: "component" };
export type NativeScene = { readonly nativeKind: "scene" };
export type NativeAsset = { readonly nativeKind: "asset" };
export type NativeHandle = NativeNode | NativeComponent | NativeScene | NativeAsset;
export type NativeParent = NativeNode | NativeScene;
export type FieldOwner = NativeNode | NativeComponent;

/** A serialized field pointing at another native object. */
export class FieldRef {
  constructor(readonly target: NativeHandle | null) {}
}

export type FieldRecord = { readonly [name: string]: FieldValue };
export type FieldValue = Scalar | FieldRef | readonly FieldValue[] | FieldRecord;

export function isFieldRecord(value: FieldValue): value is FieldRecord {
  return typeof value === "object" && value !== null && !(value instanceof FieldRef) && !Array.isArray(value);
}

/** Change notifications raised by native-side edits. */
export type NativeChange =
  | { kind: "created"; node: NativeNode }
  | { kind: "destroyed"; node: NativeNode; parent: NativeParent | null }
  | { kind: "moved"; node: NativeNode; oldParent: NativeParent | null }
  | { kind: "fields"; owner: FieldOwner }
  | { kind: "components"; node: NativeNode }
  | { kind: "componentOrder"; node: NativeNode }
  | { kind: "selection"; selected: NativeNode[]; deselected: NativeNode[] }
  | { kind: "assetSaved"; asset: NativeAsset }
  | { kind: "sceneCreated"; scene: NativeScene };

/**
 * Port to the native scene-graph engine.
 *
 * Mutating calls made through this interface are silent: they never raise `NativeChange`
 * notifications, so applying server state does not echo back as local edits.
 */
export interface SceneEngine {
  onChange(listener: (change: NativeChange) => void): Unsubscribe;

  scenes(): NativeScene[];
  sceneName(scene: NativeScene): string;
  findScene(name: string): NativeScene | undefined;
  createScene(name: string): NativeScene;

  children(parent: NativeParent): NativeNode[];
  /** `null` for template asset roots and destroyed nodes. */
  parentOf(node: NativeNode): NativeParent | null;
  createNode(parent: NativeParent | null, index: number): NativeNode;
  moveNode(node: NativeNode, parent: NativeParent, index: number): void;
  /** Throws when the node cannot be removed. */
  destroyNode(node: NativeNode): void;
  isDestroyed(handle: NativeHandle): boolean;
  nodeName(node: NativeNode): string;
  setNodeName(node: NativeNode, name: string): void;

  components(node: NativeNode): NativeComponent[];
  componentNode(component: NativeComponent): NativeNode;
  componentType(component: NativeComponent): string;
  addComponent(node: NativeNode, type: string): NativeComponent;
  destroyComponent(component: NativeComponent): void;
  moveComponent(component: NativeComponent, index: number): void;

  readFields(owner: FieldOwner): Record<string, FieldValue>;
  writeField(owner: FieldOwner, name: string, value: FieldValue): void;
  resetField(owner: FieldOwner, name: string): void;

  isEditable(handle: FieldOwner): boolean;
  setEditable(handle: FieldOwner, editable: boolean): void;
  isSelected(node: NativeNode): boolean;

  // Templates: reusable node trees stored as assets, placed in scenes as instances.
  templatePath(node: NativeNode): string | undefined;
  findTemplate(path: string): NativeNode | undefined;
  createTemplate(path: string, base?: NativeNode): NativeNode;
  instantiate(template: NativeNode, parent: NativeParent, index: number): NativeNode;
  /** Counterpart of a node in the template it was instantiated from, or `null`. */
  nodeSource(node: NativeNode): NativeNode | null;
  componentSource(component: NativeComponent): NativeComponent | null;
  isTemplateAssetPart(node: NativeNode): boolean;
  /** Identity of a node or component inside its own template asset, 0 outside assets. */
  fileId(handle: FieldOwner): number;
  instancesOf(template: NativeNode): NativeNode[];
  refreshInstances(template: NativeNode): void;

  assetPath(asset: NativeAsset): string;
  loadAsset(path: string): NativeAsset | undefined;
  isPersisted(asset: NativeAsset): boolean;
}

export function isNode(handle: NativeHandle | null | undefined): handle is NativeNode {
  return handle?.nativeKind === "node";
}

export function isComponent(handle: NativeHandle | null | undefined): handle is NativeComponent {
  return handle?.nativeKind === "component";
}

export function isScene(handle: NativeHandle | null | undefined): handle is NativeScene {
  return handle?.nativeKind === "scene";
}

export function isAsset(handle: NativeHandle | null | undefined): handle is NativeAsset {
  return handle?.nativeKind === "asset";
}
