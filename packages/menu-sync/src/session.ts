import { PropertyRequestBatcher, type FlushScheduler } from "./batcher.js";
import { errorMessage, isMenuSyncError, toTransportFailure, type MenuSyncError } from "./errors.js";
import { TypeHandlerRegistry } from "./handlers.js";
import { createMenuLogger, type MenuLogger, type MenuLogOptions } from "./log.js";
import { MenuTree, type MenuNode } from "./node.js";
import { TreeReconciler } from "./reconcile.js";
import { DEFAULT_MENU_PATH } from "./rpc.js";
import {
  ROOT_ID,
  type ItemProperties,
  type ItemPropertyKeys,
  type LayoutReply,
  type MenuRemote,
  type MenuSignal,
  type PropertyValue,
  type Unsubscribe,
} from "./types.js";
import { assertUniqueLayoutIds } from "./validate.js";

export type MenuClientEvents = {
  rootChanged: [root: MenuNode | null];
  layoutUpdated: [];
  newNode: [node: MenuNode];
  nodeRealized: [node: MenuNode];
  propertyChanged: [node: MenuNode, key: string, value: PropertyValue | undefined];
  childAdded: [parent: MenuNode, child: MenuNode, position: number];
  childMoved: [parent: MenuNode, child: MenuNode, position: number, oldPosition: number];
  childRemoved: [parent: MenuNode, child: MenuNode];
  itemActivationRequested: [node: MenuNode, timestamp: number];
  eventResult: [node: MenuNode, eventId: string, data: PropertyValue, timestamp: number, error: MenuSyncError | null];
};

export type MenuClientEvent = keyof MenuClientEvents;

type ListenerSets = { [K in MenuClientEvent]?: Set<(...args: MenuClientEvents[K]) => void> };

export type MenuClientOptions = MenuLogOptions & {
  /** Used for log prefixes only; the remote is already bound to its path. */
  menuPath?: string;
  rootId?: number;
  maxBatchSize?: number;
  schedule?: FlushScheduler;
  /** Whether the remote is present at construction. */
  connected?: boolean;
};

/**
 * Keeps a local {@link MenuTree} in step with a remote menu: refreshes the layout when the remote
 * revision moves ahead, batches property fetches for the nodes a refresh creates, and reports
 * changes to listeners once the affected nodes are realized.
 */
export class MenuClient {
  readonly tree: MenuTree;
  readonly typeHandlers: TypeHandlerRegistry<MenuClient>;

  private readonly logger: MenuLogger;
  private readonly batcher: PropertyRequestBatcher;
  private readonly reconciler: TreeReconciler;
  private listeners: ListenerSets = {};
  private readonly realizing = new Set<MenuNode>();
  private readonly rootId: number;

  private rootNode: MenuNode | null = null;
  private remoteRevisionValue = 0;
  private localRevisionValue = 0;
  private refreshInFlightFlag = false;
  private refreshGeneration = 0;
  private connected: boolean;
  private disposed = false;
  private detachSignals: Unsubscribe | null = null;

  constructor(
    private readonly remote: MenuRemote,
    opts: MenuClientOptions = {}
  ) {
    const scope = opts.menuPath ?? DEFAULT_MENU_PATH;
    this.logger = createMenuLogger(scope, opts);
    this.rootId = opts.rootId ?? ROOT_ID;
    this.connected = opts.connected ?? true;

    this.tree = new MenuTree({
      childMoved: (parent, child, position, oldPosition) => {
        if (child.realized) this.emit("childMoved", parent, child, position, oldPosition);
      },
      childRemoved: (parent, child) => {
        if (child.realized) this.emit("childRemoved", parent, child);
      },
      propertyChanged: (node, key, value) => {
        if (node.realized) this.emit("propertyChanged", node, key, value);
      },
      nodeRealized: (node) => this.emit("nodeRealized", node),
    });

    this.batcher = new PropertyRequestBatcher((ids) => this.remote.getGroupProperties(ids, []), {
      ...opts,
      scope: `${scope}:properties`,
    });
    this.typeHandlers = new TypeHandlerRegistry<MenuClient>(this, this.logger);
    this.reconciler = new TreeReconciler(
      this.tree,
      {
        created: (node) => this.realize(node),
        recycled: (node) => this.refreshProperties(node),
      },
      this.logger
    );
  }

  get root(): MenuNode | null {
    return this.rootNode;
  }

  get remoteRevision(): number {
    return this.remoteRevisionValue;
  }

  get localRevision(): number {
    return this.localRevisionValue;
  }

  get refreshInFlight(): boolean {
    return this.refreshInFlightFlag;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  findNode(id: number): MenuNode | undefined {
    return this.tree.get(id);
  }

  on<K extends MenuClientEvent>(event: K, listener: (...args: MenuClientEvents[K]) => void): Unsubscribe {
    const listeners: { [P in K]?: Set<(...args: MenuClientEvents[P]) => void> } = this.listeners;
    const set = listeners[event] ?? new Set<(...args: MenuClientEvents[K]) => void>();
    listeners[event] = set;
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  /** Subscribes to remote notifications and asks for the first layout. */
  start(): Unsubscribe {
    if (!this.detachSignals) {
      this.detachSignals = this.remote.onSignal((signal) => this.handleSignal(signal));
    }
    this.requestRefresh();
    return () => {
      this.detachSignals?.();
      this.detachSignals = null;
    };
  }

  requestRefresh(): void {
    if (this.disposed || !this.connected || this.refreshInFlightFlag) return;

    this.refreshInFlightFlag = true;
    const generation = ++this.refreshGeneration;
    this.logger.debug(`requesting layout (generation ${generation})`);

    let request: Promise<LayoutReply>;
    try {
      request = this.remote.getLayout(this.rootId);
    } catch (err) {
      request = Promise.reject(err);
    }
    void request.then(
      (reply) => this.onRefreshComplete(generation, reply),
      (err: unknown) => this.onRefreshFailed(generation, err)
    );
  }

  onRevisionNotice(revision: number): void {
    this.remoteRevisionValue = revision;
    if (this.remoteRevisionValue > this.localRevisionValue) this.requestRefresh();
  }

  /** Re-reads every property of one item and merges the result in place. */
  onNodeChanged(id: number): void {
    const node = this.tree.get(id);
    if (!node) {
      this.logger.debug(`update for unknown item ${id}`);
      return;
    }
    void this.batcher.request(id).then(
      (properties) => {
        if (this.tree.isLive(node)) this.tree.mergeProperties(node, properties);
      },
      (err: unknown) => this.report(err, `unable to update properties of item ${id}`)
    );
  }

  onPropertyChanged(id: number, key: string, value: PropertyValue): void {
    const node = this.tree.get(id);
    if (!node) {
      this.logger.debug(`property '${key}' changed on unknown item ${id}`);
      return;
    }
    this.tree.setProperty(node, key, value);
  }

  onPropertiesChanged(updated: ItemProperties[], removed: ItemPropertyKeys[]): void {
    for (const item of removed) {
      const node = this.tree.get(item.id);
      if (!node) continue;
      for (const key of item.keys) this.tree.removeProperty(node, key);
    }
    for (const item of updated) {
      const node = this.tree.get(item.id);
      if (!node) continue;
      this.tree.mergeProperties(node, item.properties);
    }
  }

  onActivationRequested(id: number, timestamp: number): void {
    if (!this.rootNode) {
      this.logger.warn(`activation of item ${id} requested before a menu structure exists`);
      return;
    }
    const node = this.tree.get(id);
    if (!node) {
      this.logger.warn(`activation requested for unknown item ${id}`);
      return;
    }
    this.emit("itemActivationRequested", node, timestamp);
  }

  async sendEvent(id: number, eventId: string, data: PropertyValue = 0, timestamp: number = Date.now()): Promise<void> {
    const node = this.tree.get(id);
    if (!node) {
      this.logger.warn(`not sending '${eventId}' to unknown item ${id}`);
      return;
    }

    let error: MenuSyncError | null = null;
    try {
      await this.remote.event(id, eventId, data, timestamp);
    } catch (err) {
      error = toTransportFailure(err);
      this.logger.warn(`unable to send '${eventId}' to item ${id}: ${error.message}`);
    }
    this.emit("eventResult", node, eventId, data, timestamp, error);
  }

  /** Tells the remote a submenu is about to open; refreshes when it reports pending changes. */
  async aboutToShow(id: number): Promise<boolean> {
    let needUpdate: boolean;
    try {
      needUpdate = await this.remote.aboutToShow(id);
    } catch (err) {
      this.report(err, `about-to-show for item ${id} failed`);
      return false;
    }
    if (needUpdate) this.requestRefresh();
    return needUpdate;
  }

  onConnectionLost(): void {
    this.connected = false;
    this.refreshGeneration++;
    this.refreshInFlightFlag = false;
    this.remoteRevisionValue = 0;
    this.localRevisionValue = 0;

    const root = this.rootNode;
    if (!root) return;
    this.rootNode = null;
    this.tree.free(root);
    this.emit("rootChanged", null);
    this.emit("layoutUpdated");
  }

  onConnectionRestored(): void {
    this.connected = true;
    this.requestRefresh();
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.refreshGeneration++;
    this.refreshInFlightFlag = false;

    this.detachSignals?.();
    this.detachSignals = null;
    this.batcher.close();
    this.typeHandlers.clear();
    this.realizing.clear();

    const root = this.rootNode;
    this.rootNode = null;
    if (root) this.tree.free(root);
    this.tree.clear();

    this.listeners = {};
  }

  private onRefreshComplete(generation: number, reply: LayoutReply): void {
    if (generation !== this.refreshGeneration || this.disposed) {
      this.logger.debug(`discarding layout from superseded refresh ${generation}`);
      return;
    }
    this.refreshInFlightFlag = false;

    try {
      assertUniqueLayoutIds(reply.layout);
    } catch (err) {
      this.report(err, "rejecting layout");
      return;
    }

    // Requests queued before this layout go out on their own, so a rebuilt node can queue its id again.
    this.batcher.flush();

    const previous = this.rootNode;
    let base = previous;
    if (previous && previous.id !== reply.layout.id) {
      this.logger.warn(`layout root ${reply.layout.id} replaces root ${previous.id}`);
      this.rootNode = null;
      this.tree.free(previous);
      base = null;
    }

    let root: MenuNode;
    try {
      root = this.reconciler.reconcile(base, reply.layout, true);
    } catch (err) {
      this.report(err, "unable to apply layout");
      return;
    } finally {
      this.batcher.flush();
    }

    this.rootNode = root;
    this.localRevisionValue = reply.revision;
    if (reply.revision > this.remoteRevisionValue) this.remoteRevisionValue = reply.revision;

    if (root !== previous) this.emit("rootChanged", root);
    this.emit("layoutUpdated");

    if (this.localRevisionValue < this.remoteRevisionValue) {
      this.logger.debug(`layout ${this.localRevisionValue} is behind ${this.remoteRevisionValue}, refreshing again`);
      this.requestRefresh();
    }
  }

  private onRefreshFailed(generation: number, err: unknown): void {
    if (generation !== this.refreshGeneration || this.disposed) return;
    this.refreshInFlightFlag = false;
    this.report(err, "getting layout failed");
  }

  private realize(node: MenuNode): void {
    this.realizing.add(node);
    void this.batcher.request(node.id).then(
      (properties) => {
        this.realizing.delete(node);
        if (!this.tree.isLive(node)) return;

        this.tree.replaceProperties(node, properties);
        const parent = this.tree.parentOf(node);
        const handled = this.typeHandlers.dispatch(node, parent);
        this.tree.markRealized(node);
        if (parent) this.emit("childAdded", parent, node, parent.children.indexOf(node.id));
        if (!handled) this.emit("newNode", node);
      },
      (err: unknown) => {
        this.realizing.delete(node);
        this.report(err, `error getting properties for new item ${node.id}`);
      }
    );
  }

  private refreshProperties(node: MenuNode): void {
    if (!node.realized && !this.realizing.has(node)) {
      this.realize(node);
      return;
    }
    void this.batcher.request(node.id).then(
      (properties) => {
        if (this.tree.isLive(node)) this.tree.replaceProperties(node, properties);
      },
      (err: unknown) => this.report(err, `unable to refresh properties of item ${node.id}`)
    );
  }

  private handleSignal(signal: MenuSignal): void {
    switch (signal.case) {
      case "layoutUpdated":
        this.onRevisionNotice(signal.value.revision);
        return;
      case "itemPropertyUpdated":
        this.onPropertyChanged(signal.value.id, signal.value.key, signal.value.value);
        return;
      case "itemsPropertiesUpdated":
        this.onPropertiesChanged(signal.value.updated, signal.value.removed);
        return;
      case "itemUpdated":
        this.onNodeChanged(signal.value.id);
        return;
      case "itemActivationRequested":
        this.onActivationRequested(signal.value.id, signal.value.timestamp);
        return;
      default: {
        const _exhaustive: never = signal;
        throw new Error(`unknown signal: ${String(_exhaustive)}`);
      }
    }
  }

  private emit<K extends MenuClientEvent>(event: K, ...args: MenuClientEvents[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const listener of Array.from(set)) {
      try {
        listener(...args);
      } catch (err) {
        this.logger.warn(`${event} listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private report(err: unknown, context: string): void {
    if (isMenuSyncError(err, "Shutdown")) {
      this.logger.debug(`${context}: ${err.message}`);
      return;
    }
    this.logger.warn(`${context}: ${errorMessage(err)}`);
  }
}
