import type { AsyncQueue, InboundMessage, PeerId } from '@circle-relay/core'

export interface RelayRegistry {
  /**
   * Add a peer and the queue its messages go to.
   * Throws if `peerId` is already registered.
   */
  join(peerId: PeerId, queue: AsyncQueue<InboundMessage>): void
  /**
   * Remove a peer and end its queue so whatever drains it can shut down.
   * Returns `false` if the peer was not registered.
   */
  leave(peerId: PeerId): boolean
  has(peerId: PeerId): boolean
  get(peerId: PeerId): AsyncQueue<InboundMessage> | undefined
  /**
   * Queue `message` for every registered peer. A peer whose queue refuses the
   * push is skipped; its own teardown will remove it.
   */
  broadcast(message: InboundMessage): void
  /** Registered peer ids, in join order. */
  peers(): PeerId[]
  /** End every queue and forget all peers. */
  clear(): void
  readonly size: number
}

export function createRegistry(): RelayRegistry {
  // peerId → outbound queue
  const entries = new Map<PeerId, AsyncQueue<InboundMessage>>()

  return {
    join(peerId, queue) {
      if (entries.has(peerId)) {
        throw new Error(`[relay] Peer ${peerId} is already registered`)
      }
      entries.set(peerId, queue)
    },

    leave(peerId) {
      const queue = entries.get(peerId)
      if (!queue) return false
      entries.delete(peerId)
      queue.end()
      return true
    },

    has(peerId) {
      return entries.has(peerId)
    },

    get(peerId) {
      return entries.get(peerId)
    },

    broadcast(message) {
      for (const queue of Array.from(entries.values())) {
        queue.push(message)
      }
    },

    peers() {
      return Array.from(entries.keys())
    },

    clear() {
      for (const queue of entries.values()) queue.end()
      entries.clear()
    },

    get size() {
      return entries.size
    },
  }
}
