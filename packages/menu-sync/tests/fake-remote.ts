import type {
  ItemProperties,
  LayoutNode,
  LayoutReply,
  MenuRemote,
  MenuSignal,
  PropertyMap,
  PropertyValue,
  Unsubscribe,
} from "../src/types.js";

export function layout(id: number, children: LayoutNode[] = []): LayoutNode {
  return { id, children };
}

export async function tick(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}

export async function settle(rounds = 3): Promise<void> {
  for (let i = 0; i < rounds; i++) await tick();
}

type LayoutCall = {
  parentId: number;
  resolve: (reply: LayoutReply) => void;
  reject: (err: unknown) => void;
};

/**
 * Scriptable remote menu. Layout calls wait until the test answers them; property calls answer
 * straight from `properties`, defaulting to `{ label: "item <id>" }`.
 */
export class FakeMenuRemote implements MenuRemote {
  readonly layoutCalls: LayoutCall[] = [];
  readonly groupCalls: number[][] = [];
  readonly events: Array<{ id: number; eventId: string; data: PropertyValue; timestamp: number }> = [];
  readonly aboutToShowCalls: number[] = [];
  readonly properties = new Map<number, PropertyMap>();
  readonly withheld = new Set<number>();
  failGroupCalls = false;
  failEvents = false;
  failAboutToShow = false;
  holdGroupCalls = false;
  needUpdate = false;
  private readonly signalHandlers = new Set<(signal: MenuSignal) => void>();

  getLayout(parentId: number): Promise<LayoutReply> {
    return new Promise((resolve, reject) => {
      this.layoutCalls.push({ parentId, resolve, reject });
    });
  }

  answerLayout(index: number, revision: number, tree: LayoutNode): void {
    const call = this.layoutCalls[index];
    if (!call) throw new Error(`no layout call #${index}`);
    call.resolve({ revision, layout: tree });
  }

  failLayout(index: number, err: unknown = new Error("layout unavailable")): void {
    const call = this.layoutCalls[index];
    if (!call) throw new Error(`no layout call #${index}`);
    call.reject(err);
  }

  async getGroupProperties(ids: number[], _propertyNames: string[]): Promise<ItemProperties[]> {
    this.groupCalls.push([...ids]);
    if (this.failGroupCalls) throw new Error("group call failed");
    if (this.holdGroupCalls) return new Promise<ItemProperties[]>(() => {});
    return ids
      .filter((id) => !this.withheld.has(id))
      .map((id) => ({ id, properties: { ...(this.properties.get(id) ?? { label: `item ${id}` }) } }));
  }

  async event(id: number, eventId: string, data: PropertyValue, timestamp: number): Promise<void> {
    this.events.push({ id, eventId, data, timestamp });
    if (this.failEvents) throw new Error("no such item");
  }

  async aboutToShow(id: number): Promise<boolean> {
    this.aboutToShowCalls.push(id);
    if (this.failAboutToShow) throw new Error("item vanished");
    return this.needUpdate;
  }

  onSignal(handler: (signal: MenuSignal) => void): Unsubscribe {
    this.signalHandlers.add(handler);
    return () => {
      this.signalHandlers.delete(handler);
    };
  }

  get signalSubscribers(): number {
    return this.signalHandlers.size;
  }

  signal(signal: MenuSignal): void {
    for (const handler of this.signalHandlers) handler(signal);
  }
}
