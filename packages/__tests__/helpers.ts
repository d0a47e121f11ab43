/**
 * Loopback socket and polling helpers shared by the socket suites.
 */

import { createConnection, createServer } from 'net'
import type { Server, Socket } from 'net'
import { createFramedConnection, isInboundMessage } from '@circle-relay/core'
import type {
  DisconnectedError,
  FramedConnection,
  InboundMessage,
  Result,
} from '@circle-relay/core'

export interface SocketPair {
  /** The connecting side. */
  client: Socket
  /** The accepted side. */
  server: Socket
  /** Destroy both sockets and stop the listener. */
  close(): Promise<void>
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close(() => resolve())
  })
}

export async function listenLoopback(server: Server): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => {
      server.off('error', reject)
      resolve()
    })
  })
  const address = server.address()
  if (address === null || typeof address === 'string') {
    throw new Error('loopback listener has no port')
  }
  return address.port
}

export async function socketPair(): Promise<SocketPair> {
  const listener = createServer()
  const accepted = new Promise<Socket>((resolve) => {
    listener.once('connection', resolve)
  })
  const port = await listenLoopback(listener)
  const client = createConnection({ host: '127.0.0.1', port })
  await new Promise<void>((resolve, reject) => {
    client.once('error', reject)
    client.once('connect', () => {
      client.off('error', reject)
      resolve()
    })
  })
  const server = await accepted

  return {
    client,
    server,
    async close() {
      client.destroy()
      server.destroy()
      await closeServer(listener)
    },
  }
}

/** Open a raw framed connection to a relay, bypassing the client facade. */
export async function connectRaw(port: number): Promise<FramedConnection> {
  const socket = createConnection({ host: '127.0.0.1', port })
  await new Promise<void>((resolve, reject) => {
    socket.once('error', reject)
    socket.once('connect', () => {
      socket.off('error', reject)
      resolve()
    })
  })
  return createFramedConnection(socket)
}

/** Next relay message that is not a keepalive `ping`. */
export async function readEvent(
  connection: FramedConnection,
): Promise<InboundMessage> {
  for (;;) {
    const message = await connection.readMessage(isInboundMessage)
    if (message.type !== 'ping') return message
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Retry `check` until it returns something other than `undefined`. */
export async function eventually<T>(
  check: () => T | undefined,
  timeout = 2000,
): Promise<T> {
  const deadline = Date.now() + timeout
  for (;;) {
    const value = check()
    if (value !== undefined) return value
    if (Date.now() > deadline) throw new Error('timed out waiting for condition')
    await delay(5)
  }
}

interface Pollable {
  poll(): Result<InboundMessage, DisconnectedError> | undefined
}

/**
 * Wait for the next result from `client.poll()`, skipping keepalive pings.
 * An error result is returned as-is.
 */
export function pollEvent(
  client: Pollable,
  timeout?: number,
): Promise<Result<InboundMessage, DisconnectedError>> {
  return eventually(() => {
    for (;;) {
      const result = client.poll()
      if (result === undefined) return undefined
      if (!result.ok || result.value.type !== 'ping') return result
    }
  }, timeout)
}

/** Like `pollEvent`, but fails the test on a disconnect. */
export async function nextEvent(
  client: Pollable,
  timeout?: number,
): Promise<InboundMessage> {
  const result = await pollEvent(client, timeout)
  if (!result.ok) throw result.error
  return result.value
}
