import type { DragDetails, UserScrollDirection } from "./core";
import type { ScrollMetrics } from "./metrics";

interface NotificationBase {
  readonly metrics: ScrollMetrics;
  /** Label of the position that dispatched it. */
  readonly source: string;
}

export interface ScrollStartNotification extends NotificationBase {
  readonly type: "scrollStart";
  readonly dragDetails: DragDetails | null;
}

export interface ScrollUpdateNotification extends NotificationBase {
  readonly type: "scrollUpdate";
  readonly scrollDelta: number;
  readonly dragDetails: DragDetails | null;
}

export interface OverscrollNotification extends NotificationBase {
  readonly type: "overscroll";
  /** Refused part of the move; positive past the trailing edge. */
  readonly overscroll: number;
  readonly velocity: number;
  readonly dragDetails: DragDetails | null;
}

export interface ScrollEndNotification extends NotificationBase {
  readonly type: "scrollEnd";
  readonly dragDetails: DragDetails | null;
}

export interface UserScrollNotification extends NotificationBase {
  readonly type: "userScroll";
  readonly direction: UserScrollDirection;
}

export type ScrollNotification =
  | ScrollStartNotification
  | ScrollUpdateNotification
  | OverscrollNotification
  | ScrollEndNotification
  | UserScrollNotification;

export type ScrollNotificationType = ScrollNotification["type"];
