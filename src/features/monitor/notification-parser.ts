import { InteractionKind, type InteractionNotification, type Rect } from '../../types/interaction'

const INTERACTION_KINDS = new Set<string>(Object.values(InteractionKind))

export function isInteractionKind(value: unknown): value is InteractionKind {
  return typeof value === 'string' && INTERACTION_KINDS.has(value)
}

const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value)

/**
 * Accepts `{ x, y, width, height }`, or edge form `{ left, top, right, bottom }`
 * as accessibility layers usually report bounds.
 */
export function parseRect(value: unknown): Rect | null {
  if (typeof value !== 'object' || value === null) return null

  if ('width' in value && 'height' in value && 'x' in value && 'y' in value) {
    const { x, y, width, height } = value
    if (!isNumber(x) || !isNumber(y) || !isNumber(width) || !isNumber(height)) return null
    return { x, y, width, height }
  }

  if ('left' in value && 'top' in value && 'right' in value && 'bottom' in value) {
    const { left, top, right, bottom } = value
    if (!isNumber(left) || !isNumber(top) || !isNumber(right) || !isNumber(bottom)) return null
    return { x: left, y: top, width: right - left, height: bottom - top }
  }

  return null
}

/**
 * Narrows a loosely-typed payload into a notification, or null when the kind
 * is unknown or the bounds are unreadable. Empty bounds still parse; the
 * classifier drops them.
 */
export function parseNotification(payload: unknown): InteractionNotification | null {
  if (typeof payload !== 'object' || payload === null) return null
  if (!('kind' in payload) || !('bounds' in payload)) return null

  const { kind } = payload
  if (!isInteractionKind(kind)) return null

  const bounds = parseRect(payload.bounds)
  if (!bounds) return null

  return { kind, bounds }
}
