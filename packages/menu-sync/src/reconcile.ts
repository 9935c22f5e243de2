import { MenuSyncError } from "./errors.js";
import type { MenuLogger } from "./log.js";
import type { MenuNode, MenuTree } from "./node.js";
import type { LayoutNode } from "./types.js";

export type ReconcileHooks = {
  /** A node was created and needs its first property fetch. */
  created: (node: MenuNode) => void;
  /** A node survived the reconcile and its properties should be re-read. */
  recycled: (node: MenuNode) => void;
};

/**
 * Brings a subtree in line with a layout description, keeping every node whose id is still
 * present under the same parent.
 */
export class TreeReconciler {
  constructor(
    private readonly tree: MenuTree,
    private readonly hooks: ReconcileHooks,
    private readonly logger: MenuLogger
  ) {}

  reconcile(existing: MenuNode | null, layout: LayoutNode, isRoot: boolean): MenuNode {
    if (existing && existing.id !== layout.id) {
      throw new MenuSyncError("ProtocolMismatch", `layout for ${layout.id} does not describe item ${existing.id}`);
    }

    let top: MenuNode;
    if (existing) {
      top = existing;
      if (isRoot) this.hooks.recycled(top);
    } else {
      top = this.tree.createRoot(layout.id);
      this.hooks.created(top);
    }

    const stack: Array<{ node: MenuNode; layout: LayoutNode }> = [{ node: top, layout }];
    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;

      this.syncChildren(entry.node, entry.layout);

      const children = this.tree.childrenOf(entry.node);
      const expected = entry.layout.children;
      if (children.length !== expected.length) {
        this.logger.warn(
          `sync failed on item ${entry.node.id}: ${children.length} children locally, ${expected.length} in layout`
        );
      }

      const count = Math.min(children.length, expected.length);
      for (let i = count - 1; i >= 0; i--) {
        const child = children[i];
        const childLayout = expected[i];
        if (!child || !childLayout) continue;
        if (child.id !== childLayout.id) {
          this.logger.warn(`sync failed on item ${entry.node.id}: slot ${i} holds ${child.id}, expected ${childLayout.id}`);
          continue;
        }
        stack.push({ node: child, layout: childLayout });
      }
    }

    return top;
  }

  private syncChildren(node: MenuNode, layout: LayoutNode): void {
    const leftovers = new Set(node.children);

    layout.children.forEach((childLayout, position) => {
      if (leftovers.delete(childLayout.id)) {
        const child = this.tree.get(childLayout.id);
        if (!child) return;
        this.logger.debug(`recycling item ${child.id} at position ${position} under ${node.id}`);
        this.tree.moveChild(node, child, position);
        this.hooks.recycled(child);
        return;
      }

      const stale = this.tree.get(childLayout.id);
      if (stale) {
        this.logger.debug(`item ${stale.id} moved from ${String(stale.parentId)} to ${node.id}, rebuilding it`);
        this.tree.detach(stale);
      }

      this.logger.debug(`building new item ${childLayout.id} at position ${position} under ${node.id}`);
      const child = this.tree.createChild(node, childLayout.id, position);
      this.hooks.created(child);
    });

    for (const id of leftovers) {
      const child = this.tree.get(id);
      if (!child) continue;
      this.logger.debug(`removing item ${id} from ${node.id}`);
      this.tree.removeChild(node, child);
    }
  }
}
