export type PropertyValue =
  | string
  | number
  | boolean
  | Uint8Array
  | PropertyValue[]
  | { [key: string]: PropertyValue };

export type PropertyMap = Record<string, PropertyValue>;

export type LayoutNode = {
  id: number;
  children: LayoutNode[];
};

export type ItemProperties = {
  id: number;
  properties: PropertyMap;
};

export type ItemPropertyKeys = {
  id: number;
  keys: string[];
};

export type LayoutReply = {
  revision: number;
  layout: LayoutNode;
};

export type MenuMethods = {
  GetLayout: {
    params: { parentId: number };
    result: LayoutReply;
  };
  GetGroupProperties: {
    params: { ids: number[]; propertyNames: string[] };
    result: { items: ItemProperties[] };
  };
  Event: {
    params: { id: number; eventId: string; data: PropertyValue; timestamp: number };
    result: Record<string, never>;
  };
  AboutToShow: {
    params: { id: number };
    result: { needUpdate: boolean };
  };
};

export type MenuMethod = keyof MenuMethods;

export type MenuCall = {
  [M in MenuMethod]: { callId: number; method: M; params: MenuMethods[M]["params"] };
}[MenuMethod];

export type MenuReply = {
  callId: number;
  result: unknown;
};

export type MenuFault = {
  callId: number;
  message: string;
};

export type MenuSignal =
  | { case: "layoutUpdated"; value: { revision: number; parentId: number } }
  | { case: "itemPropertyUpdated"; value: { id: number; key: string; value: PropertyValue } }
  | { case: "itemsPropertiesUpdated"; value: { updated: ItemProperties[]; removed: ItemPropertyKeys[] } }
  | { case: "itemUpdated"; value: { id: number } }
  | { case: "itemActivationRequested"; value: { id: number; timestamp: number } };

export type MenuMessagePayload =
  | { case: "call"; value: MenuCall }
  | { case: "reply"; value: MenuReply }
  | { case: "fault"; value: MenuFault }
  | { case: "signal"; value: MenuSignal };

export type MenuEnvelope = {
  v: 0;
  menuPath: string;
  payload: MenuMessagePayload;
};

export type Unsubscribe = () => void;

/**
 * What the session needs from the far side of the bus. The WebSocket/in-memory client in
 * `rpc.ts` implements it; tests substitute their own.
 */
export interface MenuRemote {
  getLayout(parentId: number): Promise<LayoutReply>;
  getGroupProperties(ids: number[], propertyNames: string[]): Promise<ItemProperties[]>;
  event(id: number, eventId: string, data: PropertyValue, timestamp: number): Promise<void>;
  aboutToShow(id: number): Promise<boolean>;
  onSignal(handler: (signal: MenuSignal) => void): Unsubscribe;
}

export const ROOT_ID = 0;

export const PROP_TYPE = "type";
export const PROP_LABEL = "label";
export const PROP_ENABLED = "enabled";
export const PROP_VISIBLE = "visible";
export const PROP_ICON_NAME = "icon-name";
export const PROP_ICON_DATA = "icon-data";
export const PROP_TOGGLE_TYPE = "toggle-type";
export const PROP_TOGGLE_STATE = "toggle-state";
export const PROP_CHILDREN_DISPLAY = "children-display";
export const PROP_SHORTCUT = "shortcut";
export const PROP_DISPOSITION = "disposition";
export const PROP_ACCESSIBLE_DESC = "accessible-desc";

export const TYPE_DEFAULT = "standard";
export const TYPE_SEPARATOR = "separator";

export const EVENT_CLICKED = "clicked";
export const EVENT_HOVERED = "hovered";
export const EVENT_OPENED = "opened";
export const EVENT_CLOSED = "closed";
