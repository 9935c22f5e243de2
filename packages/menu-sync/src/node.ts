import type { PropertyMap, PropertyValue } from "./types.js";

export function propertyValuesEqual(a: PropertyValue, b: PropertyValue): boolean {
  if (a === b) return true;
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array) || !(b instanceof Uint8Array)) return false;
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    return a.length === b.length && a.every((v, i) => {
      const other = b[i];
      return other !== undefined && propertyValuesEqual(v, other);
    });
  }
  if (typeof a === "object" && typeof b === "object") {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && propertyValuesEqual(left, right);
    });
  }
  return false;
}

/**
 * One menu item. Nodes reference each other by id only; the owning {@link MenuTree} maps ids to
 * instances and is the only thing that should call the mutating methods.
 */
export class MenuNode {
  readonly id: number;
  private parent: number | null;
  private readonly childIds: number[] = [];
  private readonly props = new Map<string, PropertyValue>();
  private realizedFlag = false;

  constructor(id: number, parentId: number | null) {
    this.id = id;
    this.parent = parentId;
  }

  get parentId(): number | null {
    return this.parent;
  }

  get realized(): boolean {
    return this.realizedFlag;
  }

  get children(): readonly number[] {
    return this.childIds;
  }

  property(key: string): PropertyValue | undefined {
    return this.props.get(key);
  }

  hasProperty(key: string): boolean {
    return this.props.has(key);
  }

  propertyKeys(): string[] {
    return Array.from(this.props.keys());
  }

  properties(): PropertyMap {
    return Object.fromEntries(this.props);
  }

  /** @internal */
  setProperty(key: string, value: PropertyValue): boolean {
    const current = this.props.get(key);
    if (current !== undefined && propertyValuesEqual(current, value)) return false;
    this.props.set(key, value);
    return true;
  }

  /** @internal */
  removeProperty(key: string): boolean {
    return this.props.delete(key);
  }

  /** @internal */
  insertChild(id: number, position: number): number {
    const at = Math.max(0, Math.min(position, this.childIds.length));
    this.childIds.splice(at, 0, id);
    return at;
  }

  /** @internal */
  moveChild(id: number, position: number): { from: number; to: number } | null {
    const from = this.childIds.indexOf(id);
    if (from < 0) return null;
    this.childIds.splice(from, 1);
    const to = this.insertChild(id, position);
    return { from, to };
  }

  /** @internal */
  removeChild(id: number): boolean {
    const at = this.childIds.indexOf(id);
    if (at < 0) return false;
    this.childIds.splice(at, 1);
    return true;
  }

  /** @internal */
  markRealized(): void {
    this.realizedFlag = true;
  }
}

export type MenuTreeObserver = {
  childMoved?: (parent: MenuNode, child: MenuNode, position: number, oldPosition: number) => void;
  childRemoved?: (parent: MenuNode, child: MenuNode) => void;
  propertyChanged?: (node: MenuNode, key: string, value: PropertyValue | undefined) => void;
  nodeRealized?: (node: MenuNode) => void;
};

/**
 * Arena of menu nodes keyed by id. Freeing a node drops its whole subtree from the arena; an
 * instance is live only while the arena still maps its id to it.
 */
export class MenuTree {
  private readonly nodes = new Map<number, MenuNode>();

  constructor(private readonly observer: MenuTreeObserver = {}) {}

  get size(): number {
    return this.nodes.size;
  }

  get(id: number): MenuNode | undefined {
    return this.nodes.get(id);
  }

  isLive(node: MenuNode): boolean {
    return this.nodes.get(node.id) === node;
  }

  parentOf(node: MenuNode): MenuNode | null {
    if (node.parentId === null) return null;
    return this.nodes.get(node.parentId) ?? null;
  }

  childrenOf(node: MenuNode): MenuNode[] {
    const out: MenuNode[] = [];
    for (const id of node.children) {
      const child = this.nodes.get(id);
      if (child) out.push(child);
    }
    return out;
  }

  createRoot(id: number): MenuNode {
    this.assertFree(id);
    const node = new MenuNode(id, null);
    this.nodes.set(id, node);
    return node;
  }

  createChild(parent: MenuNode, id: number, position: number): MenuNode {
    this.assertFree(id);
    const node = new MenuNode(id, parent.id);
    this.nodes.set(id, node);
    parent.insertChild(id, position);
    return node;
  }

  moveChild(parent: MenuNode, child: MenuNode, position: number): void {
    const moved = parent.moveChild(child.id, position);
    if (!moved || moved.from === moved.to) return;
    this.observer.childMoved?.(parent, child, moved.to, moved.from);
  }

  removeChild(parent: MenuNode, child: MenuNode): void {
    if (!parent.removeChild(child.id)) return;
    this.observer.childRemoved?.(parent, child);
    this.free(child);
  }

  /** Removes a node from wherever it sits, parent or not, and frees its subtree. */
  detach(node: MenuNode): void {
    const parent = this.parentOf(node);
    if (parent) {
      this.removeChild(parent, node);
      return;
    }
    this.free(node);
  }

  free(node: MenuNode): void {
    const stack: MenuNode[] = [node];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      if (this.nodes.get(current.id) === current) this.nodes.delete(current.id);
      for (const id of current.children) {
        const child = this.nodes.get(id);
        if (child && child.parentId === current.id) stack.push(child);
      }
    }
  }

  clear(): void {
    this.nodes.clear();
  }

  setProperty(node: MenuNode, key: string, value: PropertyValue): void {
    if (node.setProperty(key, value)) this.observer.propertyChanged?.(node, key, value);
  }

  removeProperty(node: MenuNode, key: string): void {
    if (node.removeProperty(key)) this.observer.propertyChanged?.(node, key, undefined);
  }

  mergeProperties(node: MenuNode, properties: PropertyMap): void {
    for (const [key, value] of Object.entries(properties)) this.setProperty(node, key, value);
  }

  replaceProperties(node: MenuNode, properties: PropertyMap): void {
    for (const key of node.propertyKeys()) {
      if (!Object.prototype.hasOwnProperty.call(properties, key)) this.removeProperty(node, key);
    }
    this.mergeProperties(node, properties);
  }

  markRealized(node: MenuNode): void {
    if (node.realized) return;
    node.markRealized();
    this.observer.nodeRealized?.(node);
  }

  /** Pre-order walk from `root`, children in menu order. */
  walk(root: MenuNode): MenuNode[] {
    const out: MenuNode[] = [];
    const stack: MenuNode[] = [root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      out.push(node);
      const children = this.childrenOf(node);
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
    }
    return out;
  }

  private assertFree(id: number): void {
    if (this.nodes.has(id)) throw new Error(`menu item ${id} already exists in this tree`);
  }
}
