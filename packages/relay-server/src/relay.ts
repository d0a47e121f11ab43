import { createServer } from 'net'
import type { AddressInfo, Socket } from 'net'
import { randomUUID } from 'crypto'
import {
  createFramedConnection,
  createHeartbeat,
  createQueue,
  isOutboundMessage,
  runPump,
  DEFAULT_HEARTBEAT_INTERVAL,
  MAX_FRAME_LENGTH,
} from '@circle-relay/core'
import type {
  AsyncQueue,
  FramedConnection,
  InboundMessage,
  OutboundMessage,
  PeerId,
} from '@circle-relay/core'
import { createRegistry } from './registry.js'

export const DEFAULT_HOST = '127.0.0.1'
export const DEFAULT_PORT = 1234

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RelayOptions {
  /**
   * Interface to listen on.
   * @default '127.0.0.1'
   */
  host?: string
  /**
   * TCP port to listen on. `0` picks a free port; read it back from `address()`.
   * @default 1234
   */
  port?: number
  /**
   * Period of the keepalive `ping` broadcast, in milliseconds.
   * @default 1000
   */
  heartbeatInterval?: number
  /**
   * Largest frame payload accepted from a remote peer, in bytes.
   * @default MAX_FRAME_LENGTH
   */
  maxFrameLength?: number
}

/** The peer embedded in the relay process, wired through in-process queues. */
export interface LocalPeer {
  readonly peerId: PeerId
  /** Everything the relay sends to this peer, starting with its handshake. */
  readonly inbound: AsyncQueue<InboundMessage>
  /** Hand a message to the relay. Returns `false` once the relay is closed. */
  submit(message: OutboundMessage): boolean
}

export interface Relay {
  /** Bind the listener and start the heartbeat. */
  listen(): Promise<AddressInfo>
  /** The bound address, or `null` before `listen()` resolves. */
  address(): AddressInfo | null
  /**
   * Register the embedded peer. Its traffic never touches the codec: the
   * relay writes straight into `inbound` and `submit` feeds the event loop.
   */
  registerLocalPeer(): LocalPeer
  /** Peer ids currently registered, in join order. */
  peers(): PeerId[]
  /**
   * Stop accepting, end every peer's queue, drop every connection and wait
   * for all connection pumps to exit.
   */
  close(): Promise<void>
}

// ---------------------------------------------------------------------------
// Event loop input. Everything that reaches the registry goes through here.
// ---------------------------------------------------------------------------

type RelayEvent =
  | { type: 'connection'; socket: Socket }
  | { type: 'local'; peerId: PeerId; queue: AsyncQueue<InboundMessage> }
  | { type: 'message'; peerId: PeerId; message: OutboundMessage }
  | { type: 'tick' }

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Creates the relay: a TCP listener plus a single event loop that owns the
 * peer registry. Connection pumps, the heartbeat and the local peer only ever
 * talk to the loop through its inbox, one event per iteration.
 *
 * @example
 * const relay = createRelay({ port: 0, heartbeatInterval: 500 })
 * const local = relay.registerLocalPeer()
 * const { port } = await relay.listen()
 */
export function createRelay(options: RelayOptions = {}): Relay {
  const {
    host = DEFAULT_HOST,
    port = DEFAULT_PORT,
    heartbeatInterval = DEFAULT_HEARTBEAT_INTERVAL,
    maxFrameLength = MAX_FRAME_LENGTH,
  } = options

  const registry = createRegistry()
  const inbox = createQueue<RelayEvent>()
  const server = createServer()

  // Live pump per remote peer; an entry disappears once its pump settles.
  const connections = new Map<PeerId, FramedConnection>()
  const tasks = new Set<Promise<void>>()

  let closing = false
  let closed: Promise<void> | null = null
  // At most one tick waits in the inbox; a stalled loop never builds a backlog.
  let tickPending = false

  const heartbeat = createHeartbeat({
    interval: heartbeatInterval,
    onTick() {
      if (tickPending) return
      tickPending = inbox.push({ type: 'tick' })
    },
  })

  server.on('connection', (socket) => {
    if (!inbox.push({ type: 'connection', socket })) socket.destroy()
  })

  function admit(peerId: PeerId, queue: AsyncQueue<InboundMessage>): void {
    queue.push({ type: 'handshake', peerId })
    registry.join(peerId, queue)
    registry.broadcast({ type: 'peer:joined', peerId })
  }

  function spawnPump(
    peerId: PeerId,
    socket: Socket,
    outbound: AsyncQueue<InboundMessage>,
  ): void {
    const connection = createFramedConnection(socket, { maxFrameLength })
    connections.set(peerId, connection)

    const task: Promise<void> = runPump({
      connection,
      outbound,
      guard: isOutboundMessage,
      deliver: (message) => inbox.push({ type: 'message', peerId, message }),
    })
      .catch((err: unknown) => {
        if (closing) return
        console.warn(`[relay] ${peerId}: ${describeError(err)}`)
        inbox.push({ type: 'message', peerId, message: { type: 'disconnect' } })
      })
      .finally(() => {
        tasks.delete(task)
        connections.delete(peerId)
      })
    tasks.add(task)
  }

  function handlePeerMessage(peerId: PeerId, message: OutboundMessage): void {
    switch (message.type) {
      case 'disconnect': {
        registry.leave(peerId)
        registry.broadcast({ type: 'peer:left', peerId })
        break
      }
      case 'ping': {
        // Liveness only, nothing to relay
        break
      }
      case 'player:changed': {
        registry.broadcast({ type: 'peer:changed', peerId, circle: message.circle })
        break
      }
    }
  }

  function handleEvent(event: RelayEvent): void {
    switch (event.type) {
      case 'connection': {
        if (closing) {
          event.socket.destroy()
          return
        }
        const peerId = randomUUID()
        const outbound = createQueue<InboundMessage>()
        admit(peerId, outbound)
        spawnPump(peerId, event.socket, outbound)
        break
      }
      case 'local': {
        admit(event.peerId, event.queue)
        break
      }
      case 'message': {
        if (!registry.has(event.peerId)) return
        handlePeerMessage(event.peerId, event.message)
        break
      }
      case 'tick': {
        tickPending = false
        registry.broadcast({ type: 'ping' })
        break
      }
    }
  }

  async function run(): Promise<void> {
    for (;;) {
      const event = await inbox.next()
      if (event === undefined) return
      try {
        handleEvent(event)
      } catch (err) {
        console.error('[relay] event handler error', err)
      }
    }
  }

  const loop = run()

  async function shutdown(): Promise<void> {
    closing = true
    heartbeat.stop()
    inbox.end()
    await loop
    registry.clear()
    for (const connection of connections.values()) connection.destroy()
    await Promise.allSettled(Array.from(tasks))
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
    }
  }

  const relay: Relay = {
    async listen() {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject)
        server.listen(port, host, () => {
          server.off('error', reject)
          resolve()
        })
      })
      server.on('error', (err) => {
        console.error('[relay] listener error', err)
      })
      heartbeat.start()
      const bound = relay.address()
      if (!bound) throw new Error('[relay] Listener has no address after bind')
      return bound
    },

    address() {
      const bound = server.address()
      return bound !== null && typeof bound === 'object' ? bound : null
    },

    registerLocalPeer() {
      const peerId = randomUUID()
      const inbound = createQueue<InboundMessage>()
      if (!inbox.push({ type: 'local', peerId, queue: inbound })) inbound.end()
      return {
        peerId,
        inbound,
        submit: (message) => inbox.push({ type: 'message', peerId, message }),
      }
    },

    peers() {
      return registry.peers()
    },

    close() {
      closed ??= shutdown()
      return closed
    },
  }

  return relay
}
