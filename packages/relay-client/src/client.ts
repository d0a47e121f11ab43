import { createConnection } from 'net'
import type { Socket } from 'net'
import { Store } from '@tanstack/store'
import {
  createFramedConnection,
  createQueue,
  isInboundMessage,
  runPump,
  DisconnectedError,
  ProtocolViolationError,
} from '@circle-relay/core'
import type {
  AsyncQueue,
  ConnectionStatus,
  InboundMessage,
  OutboundMessage,
  PeerId,
  Result,
} from '@circle-relay/core'
import { createRelay, DEFAULT_HOST, DEFAULT_PORT } from '@circle-relay/server'
import type { Relay, RelayOptions } from '@circle-relay/server'

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export type PeerRole = 'relay' | 'remote'

/**
 * The whole surface a presentation layer needs: push local changes, drain
 * remote events, know who it is. Neither call ever waits.
 */
export interface PeerClient {
  /** Identity the relay assigned to this peer. */
  readonly peerId: PeerId
  readonly role: PeerRole
  /** Where the relay listens. */
  readonly address: { host: string; port: number }
  /** TanStack Store holding the connection status. */
  readonly store: Store<ConnectionStatus>
  /**
   * Queue a message for the relay. Fails with `DisconnectedError` once the
   * connection is gone for good.
   */
  submit(message: OutboundMessage): Result<void, DisconnectedError>
  /**
   * Take the next buffered message.
   *
   * - `undefined`: nothing buffered right now.
   * - `{ ok: true, value }`: the next message, in arrival order.
   * - `{ ok: false, error }`: torn down; every later call returns this too.
   */
  poll(): Result<InboundMessage, DisconnectedError> | undefined
  /**
   * Drop this peer. In remote role the connection is shut down and the relay
   * announces the departure; in relay role the whole relay closes.
   */
  close(): Promise<void>
}

export interface HostSession extends PeerClient {
  readonly role: 'relay'
  /** The embedded relay. */
  readonly relay: Relay
}

export type HostSessionOptions = RelayOptions

export interface JoinSessionOptions {
  /** @default '127.0.0.1' */
  host?: string
  /** @default 1234 */
  port?: number
  /**
   * Largest frame payload accepted from the relay, in bytes.
   * @default MAX_FRAME_LENGTH
   */
  maxFrameLength?: number
}

// ---------------------------------------------------------------------------
// Facade
// ---------------------------------------------------------------------------

interface FacadeParts {
  peerId: PeerId
  role: PeerRole
  address: { host: string; port: number }
  store: Store<ConnectionStatus>
  inbound: AsyncQueue<InboundMessage>
  send: (message: OutboundMessage) => boolean
  close: () => Promise<void>
}

function createFacade(parts: FacadeParts): PeerClient {
  const { inbound, send, store } = parts
  const disconnected = new DisconnectedError()

  function markDisconnected(): { ok: false; error: DisconnectedError } {
    if (store.state !== 'disconnected') store.setState(() => 'disconnected')
    return { ok: false, error: disconnected }
  }

  return {
    peerId: parts.peerId,
    role: parts.role,
    address: parts.address,
    store,

    submit(message) {
      if (!send(message)) return markDisconnected()
      return { ok: true, value: undefined }
    },

    poll() {
      const next = inbound.tryShift()
      switch (next.status) {
        case 'value':
          return { ok: true, value: next.value }
        case 'empty':
          return undefined
        case 'closed':
          return markDisconnected()
      }
    },

    close: parts.close,
  }
}

// ---------------------------------------------------------------------------
// Relay role
// ---------------------------------------------------------------------------

/**
 * Start a relay in this process and join it as its first peer.
 *
 * The local peer is wired to the relay by in-process queues, so its own
 * traffic is never encoded. Its first two messages are `handshake` and its
 * own `peer:joined`.
 *
 * @example
 * const host = await hostSession({ port: 1234 })
 * host.submit({ type: 'player:changed', circle })
 */
export async function hostSession(
  options: HostSessionOptions = {},
): Promise<HostSession> {
  const relay = createRelay(options)
  const local = relay.registerLocalPeer()

  let bound: { address: string; port: number }
  try {
    bound = await relay.listen()
  } catch (err) {
    await relay.close()
    throw err
  }

  const store = new Store<ConnectionStatus>('connected')
  const facade = createFacade({
    peerId: local.peerId,
    role: 'relay',
    address: { host: bound.address, port: bound.port },
    store,
    inbound: local.inbound,
    send: local.submit,
    async close() {
      await relay.close()
      store.setState(() => 'disconnected')
    },
  })

  return { ...facade, role: 'relay', relay }
}

// ---------------------------------------------------------------------------
// Remote role
// ---------------------------------------------------------------------------

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function connect(host: string, port: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host, port })
    socket.once('error', reject)
    socket.once('connect', () => {
      socket.off('error', reject)
      resolve(socket)
    })
  })
}

/**
 * Connect to a relay and complete the handshake.
 *
 * Rejects with `ProtocolViolationError` when the relay's first frame is not a
 * handshake, and with the underlying error when the connection or the first
 * read fails. Nothing keeps running after a rejection.
 *
 * @example
 * const peer = await joinSession({ host: '127.0.0.1', port: 1234 })
 * console.log(peer.peerId)
 */
export async function joinSession(
  options: JoinSessionOptions = {},
): Promise<PeerClient> {
  const { host = DEFAULT_HOST, port = DEFAULT_PORT, maxFrameLength } = options

  const socket = await connect(host, port)
  const connection = createFramedConnection(socket, { maxFrameLength })

  let first: InboundMessage
  try {
    first = await connection.readMessage(isInboundMessage)
  } catch (err) {
    connection.destroy()
    throw err
  }
  if (first.type !== 'handshake') {
    connection.destroy()
    throw new ProtocolViolationError(first.type)
  }
  const { peerId } = first

  const outbound = createQueue<OutboundMessage>()
  const inbound = createQueue<InboundMessage>()
  const store = new Store<ConnectionStatus>('connected')
  let closing = false

  const pump = runPump({
    connection,
    outbound,
    guard: isInboundMessage,
    deliver: (message) => inbound.push(message),
  })
    .catch((err: unknown) => {
      if (closing) return
      console.warn(`[relay:client] ${peerId}: ${describeError(err)}`)
    })
    .finally(() => {
      // Buffered messages stay readable; poll() reports the disconnect after them.
      inbound.end()
      store.setState(() => 'disconnected')
    })

  return createFacade({
    peerId,
    role: 'remote',
    address: { host, port },
    store,
    inbound,
    send: (message) => outbound.push(message),
    async close() {
      closing = true
      outbound.end()
      inbound.cancel()
      await pump
    },
  })
}
