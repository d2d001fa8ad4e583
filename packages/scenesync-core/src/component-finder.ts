import type { NativeComponent, NativeNode, SceneEngine } from "./native.js";
import type { ReplicaObject } from "./object.js";
import { Prop } from "./object.js";
import { readNumber, readString } from "./properties.js";

export type ComponentCandidate = {
  component: NativeComponent;
  type: string;
  /** Identity within the source template when the node is an instance, else 0. */
  sourceFileId: number;
  /** Identity within the node's own template asset, else 0. */
  fileId: number;
};

export type ComponentMatch = {
  component: NativeComponent;
  /** The match was made on type alone although a file id was requested. */
  fileIdMismatch: boolean;
};

/**
 * Matches a node's native components to the ReplicaObjects that should own them. Each candidate
 * is handed out at most once.
 */
export class ComponentFinder {
  private readonly candidates: ComponentCandidate[];
  private _inOrder = true;

  constructor(candidates: ComponentCandidate[]) {
    this.candidates = candidates;
  }

  static forNode(
    engine: SceneEngine,
    node: NativeNode,
    isSyncable: (component: NativeComponent) => boolean = () => true
  ): ComponentFinder {
    const isInstance = engine.nodeSource(node) !== null;
    const isAssetPart = engine.isTemplateAssetPart(node) && !isInstance;
    const candidates: ComponentCandidate[] = [];
    let first = true;
    for (const component of engine.components(node)) {
      if (!isSyncable(component)) continue;
      let sourceFileId = 0;
      if (isInstance && !first) {
        const source = engine.componentSource(component);
        if (source) sourceFileId = engine.fileId(source);
      }
      candidates.push({
        component,
        type: engine.componentType(component),
        sourceFileId,
        fileId: isAssetPart ? engine.fileId(component) : 0,
      });
      first = false;
    }
    return new ComponentFinder(candidates);
  }

  /** False once any match was taken out of request order. */
  get inOrder(): boolean {
    return this._inOrder;
  }

  get count(): number {
    return this.candidates.length;
  }

  remaining(): NativeComponent[] {
    return this.candidates.map((c) => c.component);
  }

  find(
    type: string,
    sourceFileId: number,
    fileId: number,
    destroy: (component: NativeComponent) => void
  ): ComponentMatch | null {
    if (fileId !== 0) {
      const idx = this.candidates.findIndex((c) => c.fileId === fileId);
      const hit = this.candidates[idx];
      if (hit) {
        this.candidates.splice(idx, 1);
        if (hit.type === type && hit.sourceFileId === sourceFileId) {
          if (idx !== 0) this._inOrder = false;
          return { component: hit.component, fileIdMismatch: false };
        }
        // Same file id but a different component: it is stale.
        destroy(hit.component);
      }
    }

    const idx = this.candidates.findIndex((c) => c.type === type && c.sourceFileId === sourceFileId);
    const match = this.candidates[idx];
    if (!match) {
      if (this.candidates.length > 0) this._inOrder = false;
      return null;
    }
    this.candidates.splice(idx, 1);
    if (idx !== 0) this._inOrder = false;
    return { component: match.component, fileIdMismatch: fileId !== 0 };
  }

  findFor(obj: ReplicaObject, destroy: (component: NativeComponent) => void): ComponentMatch | null {
    const type = readString(obj.properties, Prop.type);
    if (type === undefined) return null;
    return this.find(
      type,
      readNumber(obj.properties, Prop.sourceFileId) ?? 0,
      readNumber(obj.properties, Prop.fileId) ?? 0,
      destroy
    );
  }
}
