/**
 * Circle table: keeps every known peer's circle up to date from the events
 * a `PeerClient` delivers, and answers keepalive pings.
 *
 * This is the bookkeeping a presentation layer does between frames; the
 * state lives in a TanStack Store so a renderer can read or observe it.
 */

import { Store } from '@tanstack/store'
import type { Circle, PeerId } from '@circle-relay/core'
import type { PeerClient } from './client.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CircleTableOptions {
  /**
   * Circle given to a peer when it joins, until it publishes its own.
   * @default magenta unit-half circle at the origin
   */
  defaultCircle?: Circle
  /**
   * Answer every relay `ping` with a `ping` of our own.
   * @default true
   */
  replyToPing?: boolean
}

export interface SyncResult {
  /** Messages taken from the client during this call. */
  readonly processed: number
  /** Whether the client reported that it is torn down. */
  readonly disconnected: boolean
}

export interface CircleTable {
  /** Known peers and their latest circle. */
  readonly store: Store<ReadonlyMap<PeerId, Circle>>
  /** Drain every message the client has buffered and apply it. */
  sync(): SyncResult
}

export const DEFAULT_CIRCLE: Circle = {
  position: { x: 0, y: 0 },
  color: { r: 1, g: 0, b: 1 },
  radius: 0.5,
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * @example
 * const table = createCircleTable(client)
 *
 * // once per frame
 * table.sync()
 * for (const circle of table.store.state.values()) draw(circle)
 */
export function createCircleTable(
  client: Pick<PeerClient, 'poll' | 'submit'>,
  options: CircleTableOptions = {},
): CircleTable {
  const { defaultCircle = DEFAULT_CIRCLE, replyToPing = true } = options

  const store = new Store<ReadonlyMap<PeerId, Circle>>(new Map())

  function commit(updated: Map<PeerId, Circle> | null): void {
    if (updated) store.setState(() => updated)
  }

  function sync(): SyncResult {
    let processed = 0
    // Copied on first write so the store only changes when something did.
    let next: Map<PeerId, Circle> | null = null

    for (;;) {
      const result = client.poll()
      if (result === undefined) break
      if (!result.ok) {
        commit(next)
        return { processed, disconnected: true }
      }
      processed++

      const message = result.value
      switch (message.type) {
        case 'handshake':
          break
        case 'peer:joined':
          next ??= new Map(store.state)
          next.set(message.peerId, defaultCircle)
          break
        case 'peer:left':
          next ??= new Map(store.state)
          next.delete(message.peerId)
          break
        case 'peer:changed':
          // Peers that joined before us are never announced, so their
          // changes are dropped until a join for them arrives.
          if ((next ?? store.state).has(message.peerId)) {
            next ??= new Map(store.state)
            next.set(message.peerId, message.circle)
          }
          break
        case 'ping':
          if (replyToPing) client.submit({ type: 'ping' })
          break
      }
    }

    commit(next)
    return { processed, disconnected: false }
  }

  return { store, sync }
}
