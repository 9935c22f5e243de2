import { MenuSyncError, toTransportFailure } from "./errors.js";
import { createMenuLogger, type MenuLogger, type MenuLogOptions } from "./log.js";
import type { ItemProperties, PropertyMap } from "./types.js";

export const MAX_PROPERTIES_TO_QUEUE = 100;

export type PropertyBatchFetcher = (ids: number[]) => Promise<ItemProperties[]>;

/** Schedules `flush` for a later turn of the event loop; returns a canceller. */
export type FlushScheduler = (flush: () => void) => () => void;

export type PropertyRequestBatcherOptions = MenuLogOptions & {
  scope?: string;
  maxBatchSize?: number;
  schedule?: FlushScheduler;
};

type Listener = {
  id: number;
  resolve: (properties: PropertyMap) => void;
  reject: (err: MenuSyncError) => void;
  replied: boolean;
};

type Batch = Map<number, Listener>;

export const scheduleOnNextTick: FlushScheduler = (flush) => {
  const timer = setTimeout(flush, 0);
  return () => clearTimeout(timer);
};

/**
 * Coalesces per-item property requests into group fetches. Requests made in the same turn share
 * one fetch; a full queue goes out immediately.
 */
export class PropertyRequestBatcher {
  private pending: Batch = new Map();
  private readonly inFlight = new Set<Batch>();
  private cancelScheduled: (() => void) | null = null;
  private closed = false;
  private readonly maxBatchSize: number;
  private readonly schedule: FlushScheduler;
  private readonly logger: MenuLogger;

  constructor(
    private readonly fetch: PropertyBatchFetcher,
    opts: PropertyRequestBatcherOptions = {}
  ) {
    this.maxBatchSize = Math.max(1, opts.maxBatchSize ?? MAX_PROPERTIES_TO_QUEUE);
    this.schedule = opts.schedule ?? scheduleOnNextTick;
    this.logger = createMenuLogger(opts.scope ?? "batcher", opts);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    let count = 0;
    for (const batch of this.inFlight) count += batch.size;
    return count;
  }

  request(id: number): Promise<PropertyMap> {
    if (this.closed) {
      return Promise.reject(new MenuSyncError("Shutdown", `property request for ${id} after shutdown`));
    }
    if (this.pending.has(id)) {
      this.logger.warn(`asking for properties from same id twice: ${id}`);
      return Promise.reject(new MenuSyncError("DuplicateRequest", `properties for ${id} are already queued`));
    }

    return new Promise<PropertyMap>((resolve, reject) => {
      this.pending.set(id, { id, resolve, reject, replied: false });
      if (this.pending.size >= this.maxBatchSize) {
        this.flush();
        return;
      }
      if (!this.cancelScheduled) {
        this.cancelScheduled = this.schedule(() => {
          this.cancelScheduled = null;
          this.flush();
        });
      }
    });
  }

  flush(): void {
    if (this.cancelScheduled) {
      this.cancelScheduled();
      this.cancelScheduled = null;
    }
    if (this.pending.size === 0) return;

    const batch = this.pending;
    this.pending = new Map();
    this.inFlight.add(batch);

    const ids = Array.from(batch.keys());
    this.logger.debug(`requesting properties for ${ids.length} items`);

    let request: Promise<ItemProperties[]>;
    try {
      request = this.fetch(ids);
    } catch (err) {
      request = Promise.reject(err);
    }
    void request.then(
      (items) => this.deliver(batch, items),
      (err: unknown) => this.fail(batch, err)
    );
  }

  /** Rejects every listener still waiting, queued or in flight. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.cancelScheduled) {
      this.cancelScheduled();
      this.cancelScheduled = null;
    }

    const batches = [this.pending, ...this.inFlight];
    this.pending = new Map();
    this.inFlight.clear();

    const shutdown = new MenuSyncError("Shutdown", "property batcher closed");
    for (const batch of batches) {
      for (const listener of batch.values()) {
        if (listener.replied) continue;
        listener.replied = true;
        listener.reject(shutdown);
      }
    }
  }

  private deliver(batch: Batch, items: ItemProperties[]): void {
    if (!this.inFlight.delete(batch)) return;

    for (const item of items) {
      const listener = batch.get(item.id);
      if (!listener) {
        this.logger.warn(`unable to find listener for id ${item.id}`);
        continue;
      }
      if (listener.replied) {
        this.logger.warn(`already replied to the listener on id ${item.id}`);
        continue;
      }
      listener.replied = true;
      listener.resolve(item.properties);
    }

    for (const listener of batch.values()) {
      if (listener.replied) continue;
      listener.replied = true;
      this.logger.debug(`no properties returned for id ${listener.id}`);
      listener.reject(new MenuSyncError("PropertiesUnavailable", `properties unavailable for id ${listener.id}`));
    }
  }

  private fail(batch: Batch, err: unknown): void {
    if (!this.inFlight.delete(batch)) return;

    const failure = toTransportFailure(err);
    this.logger.warn(`group properties request for ${batch.size} items failed: ${failure.message}`);
    for (const listener of batch.values()) {
      if (listener.replied) continue;
      listener.replied = true;
      listener.reject(failure);
    }
  }
}
