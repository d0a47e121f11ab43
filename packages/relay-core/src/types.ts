/**
 * Identity assigned to a peer by the relay when it connects.
 * A random RFC 4122 v4 UUID (128 bits), never reused within a relay process.
 */
export type PeerId = string

/**
 * A peer's published state. The relay forwards it untouched; only the
 * presentation layer gives the fields any meaning.
 */
export interface Circle {
  position: { x: number; y: number }
  color: { r: number; g: number; b: number }
  radius: number
}

// ---------------------------------------------------------------------------
// Wire protocol: the shared contract between peers and the relay.
// Defined once in core so both sides always agree.
// ---------------------------------------------------------------------------

/** Messages sent from a peer to the relay. */
export type OutboundMessage =
  | { type: 'disconnect' }
  | { type: 'ping' }
  | { type: 'player:changed'; circle: Circle }

/** Messages sent from the relay to a peer. */
export type InboundMessage =
  | { type: 'handshake'; peerId: PeerId }
  | { type: 'peer:joined'; peerId: PeerId }
  | { type: 'peer:left'; peerId: PeerId }
  | { type: 'ping' }
  | { type: 'peer:changed'; peerId: PeerId; circle: Circle }

/**
 * Narrows a decoded value to one message shape. The codec rejects any payload
 * the guard does not accept.
 */
export type MessageGuard<T> = (value: unknown) => value is T

/**
 * - `'connected'`: the facade can submit and may still receive messages.
 * - `'disconnected'`: the connection is gone for good; build a new facade.
 */
export type ConnectionStatus = 'connected' | 'disconnected'

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number'
}

function isPeerId(value: unknown): value is PeerId {
  return typeof value === 'string' && value.length > 0
}

export function isCircle(value: unknown): value is Circle {
  if (!isRecord(value)) return false
  const { position, color, radius } = value
  return (
    isRecord(position) &&
    isNumber(position.x) &&
    isNumber(position.y) &&
    isRecord(color) &&
    isNumber(color.r) &&
    isNumber(color.g) &&
    isNumber(color.b) &&
    isNumber(radius)
  )
}

export function isOutboundMessage(value: unknown): value is OutboundMessage {
  if (!isRecord(value)) return false
  switch (value.type) {
    case 'disconnect':
    case 'ping':
      return true
    case 'player:changed':
      return isCircle(value.circle)
    default:
      return false
  }
}

export function isInboundMessage(value: unknown): value is InboundMessage {
  if (!isRecord(value)) return false
  switch (value.type) {
    case 'handshake':
    case 'peer:joined':
    case 'peer:left':
      return isPeerId(value.peerId)
    case 'ping':
      return true
    case 'peer:changed':
      return isPeerId(value.peerId) && isCircle(value.circle)
    default:
      return false
  }
}
