// Raw interaction kinds delivered by the host's accessibility/input layer
export enum InteractionKind {
  Click = 'click',
  LongClick = 'long-click',
  Scroll = 'scroll',
  GestureStart = 'gesture-start',
  GestureEnd = 'gesture-end',
  Focus = 'focus',
  Select = 'select',
  TextChange = 'text-change'
}

export enum TouchAction {
  Click = 'CLICK',
  LongClick = 'LONG_CLICK',
  Scroll = 'SCROLL',
  GestureStart = 'GESTURE_START',
  GestureEnd = 'GESTURE_END',
  Focus = 'FOCUS',
  Select = 'SELECT',
  TextChange = 'TEXT_CHANGE'
}

export enum SwipeDirection {
  Up = 'UP',
  Down = 'DOWN',
  Left = 'LEFT',
  Right = 'RIGHT'
}

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export interface InteractionNotification {
  kind: InteractionKind
  bounds: Rect
}

export interface TouchEvent {
  readonly type: 'touch'
  readonly action: TouchAction
  readonly x: number
  readonly y: number
  readonly timestamp: number
}

export interface SwipeEvent {
  readonly type: 'swipe'
  readonly startX: number
  readonly startY: number
  readonly endX: number
  readonly endY: number
  readonly durationMs: number
  /** Pixels per second */
  readonly velocity: number
  readonly direction: SwipeDirection
  /** End time of the swipe */
  readonly timestamp: number
}

export type TimelineEntry = TouchEvent | SwipeEvent

export type SwipeTrackingState =
  | { status: 'idle' }
  | { status: 'pending'; startX: number; startY: number; startTime: number }

export enum OverlayState {
  Hidden = 'hidden',
  Visible = 'visible'
}

/** Display rotation in degrees */
export type Orientation = 0 | 90 | 180 | 270

export interface ScreenSize {
  width: number
  height: number
}
