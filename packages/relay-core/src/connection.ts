import type { Socket } from 'net'
import { readMessage, writeMessage } from './codec.js'
import type { ByteSink, ByteSource, DecodeOptions, WireMessage } from './codec.js'
import { ConnectionClosedError, TruncatedStreamError } from './errors.js'
import type { MessageGuard } from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FramedConnectionOptions = DecodeOptions

/**
 * A TCP socket seen as a frame stream. Reads are buffered so no byte the peer
 * sent is lost between one reader and the next (e.g. a handshake read
 * followed by a pump).
 */
export interface FramedConnection extends ByteSource, ByteSink {
  readonly socket: Socket
  /** Read and decode the next frame. */
  readMessage<T>(guard: MessageGuard<T>): Promise<T>
  /** Encode and write one frame. */
  writeMessage(message: WireMessage): Promise<void>
  /**
   * Abandon the in-flight read (it rejects with `ConnectionClosedError`) and
   * refuse further reads. Bytes already buffered are discarded.
   */
  cancelReads(): void
  /** Half-close the write side once buffered writes flush, then release the socket. */
  shutdown(): Promise<void>
  /** Tear the socket down immediately. */
  destroy(): void
}

interface PendingRead {
  readonly length: number
  readonly resolve: (bytes: Uint8Array) => void
  readonly reject: (err: Error) => void
}

// 'end' means the peer finished writing; anything else is the error every
// later read fails with.
type ReadTermination = 'end' | Error

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createFramedConnection(
  socket: Socket,
  options: FramedConnectionOptions = {},
): FramedConnection {
  const chunks: Buffer[] = []
  let buffered = 0
  let pending: PendingRead | null = null
  let termination: ReadTermination | null = null

  function take(length: number): Uint8Array {
    const out = new Uint8Array(length)
    let offset = 0
    while (offset < length) {
      const chunk = chunks[0]
      if (!chunk) break
      const needed = length - offset
      if (chunk.length <= needed) {
        out.set(chunk, offset)
        offset += chunk.length
        chunks.shift()
      } else {
        out.set(chunk.subarray(0, needed), offset)
        chunks[0] = chunk.subarray(needed)
        offset += needed
      }
    }
    buffered -= length
    return out
  }

  function failure(length: number): Error | null {
    if (termination === null) return null
    return termination === 'end'
      ? new TruncatedStreamError(length, buffered)
      : termination
  }

  function settle(): void {
    if (!pending) return
    const read = pending
    if (buffered >= read.length) {
      pending = null
      read.resolve(take(read.length))
      return
    }
    const err = failure(read.length)
    if (err) {
      pending = null
      read.reject(err)
    }
  }

  function terminate(reason: ReadTermination): void {
    termination ??= reason
    settle()
  }

  socket.on('data', (chunk: Buffer) => {
    if (termination !== null && termination !== 'end') return
    chunks.push(chunk)
    buffered += chunk.length
    settle()
  })
  socket.on('end', () => terminate('end'))
  socket.on('error', (err) => terminate(err))
  // A locally destroyed socket emits 'close' without 'end'.
  socket.on('close', () => terminate('end'))

  const connection: FramedConnection = {
    socket,

    readExact(length) {
      if (pending) {
        return Promise.reject(
          new Error('[relay] readExact() called while another read is in flight'),
        )
      }
      return new Promise<Uint8Array>((resolve, reject) => {
        pending = { length, resolve, reject }
        settle()
      })
    },

    write(bytes) {
      return new Promise<void>((resolve, reject) => {
        if (socket.destroyed || socket.writableEnded) {
          reject(new ConnectionClosedError())
          return
        }
        socket.write(bytes, (err) => {
          if (err) reject(err)
          else resolve()
        })
      })
    },

    readMessage(guard) {
      return readMessage(connection, guard, options)
    },

    writeMessage(message) {
      return writeMessage(connection, message)
    },

    cancelReads() {
      if (termination === null || termination === 'end') {
        termination = new ConnectionClosedError()
      }
      chunks.length = 0
      buffered = 0
      settle()
    },

    async shutdown() {
      connection.cancelReads()
      if (!socket.destroyed && !socket.writableEnded) {
        // end()'s callback also fires on error; either way the socket is done.
        await new Promise<void>((resolve) => {
          socket.end(() => resolve())
        })
      }
      socket.destroy()
    },

    destroy() {
      connection.cancelReads()
      socket.destroy()
    },
  }

  return connection
}
