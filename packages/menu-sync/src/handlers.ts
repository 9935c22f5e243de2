import { errorMessage } from "./errors.js";
import type { MenuLogger } from "./log.js";
import type { MenuNode } from "./node.js";
import { PROP_TYPE, TYPE_DEFAULT } from "./types.js";

export type TypeHandlerRealize<Owner> = (node: MenuNode, parent: MenuNode | null, owner: Owner) => boolean | void;

/**
 * Builds whatever a node of one `type` needs before it is announced. Returning `true` from
 * `realize` means the handler took care of the node and the generic `newNode` event is skipped.
 */
export type TypeHandler<Owner> = {
  realize: TypeHandlerRealize<Owner>;
  release?: (type: string, owner: Owner) => void;
};

export function typeTagOf(node: MenuNode): string {
  const type = node.property(PROP_TYPE);
  return typeof type === "string" ? type : TYPE_DEFAULT;
}

export class TypeHandlerRegistry<Owner> {
  private readonly handlers = new Map<string, TypeHandler<Owner>>();

  constructor(
    private readonly owner: Owner,
    private readonly logger: MenuLogger
  ) {}

  get size(): number {
    return this.handlers.size;
  }

  has(type: string): boolean {
    return this.handlers.has(type);
  }

  register(type: string, handler: TypeHandler<Owner> | TypeHandlerRealize<Owner>): boolean {
    if (this.handlers.has(type)) {
      this.logger.warn(`type handler for '${type}' already registered`);
      return false;
    }
    this.handlers.set(type, typeof handler === "function" ? { realize: handler } : handler);
    return true;
  }

  unregister(type: string): boolean {
    const handler = this.handlers.get(type);
    if (!handler) return false;
    this.handlers.delete(type);
    this.release(type, handler);
    return true;
  }

  clear(): void {
    const entries = Array.from(this.handlers);
    this.handlers.clear();
    for (const [type, handler] of entries) this.release(type, handler);
  }

  /** Runs the handler for the node's type; true only when one ran and claimed the node. */
  dispatch(node: MenuNode, parent: MenuNode | null): boolean {
    const type = typeTagOf(node);
    const handler = this.handlers.get(type);
    if (!handler) return false;

    try {
      return handler.realize(node, parent, this.owner) === true;
    } catch (err) {
      this.logger.warn(`type handler for '${type}' failed on item ${node.id}: ${errorMessage(err)}`);
      return false;
    }
  }

  private release(type: string, handler: TypeHandler<Owner>): void {
    if (!handler.release) return;
    try {
      handler.release(type, this.owner);
    } catch (err) {
      this.logger.warn(`releasing type handler for '${type}' failed: ${errorMessage(err)}`);
    }
  }
}
