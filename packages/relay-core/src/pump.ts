import type { WireMessage } from './codec.js'
import type { FramedConnection } from './connection.js'
import type { AsyncQueue } from './queue.js'
import type { MessageGuard } from './types.js'

export interface PumpOptions<TSend extends WireMessage, TRecv> {
  /** The socket this pump owns. It is closed by the time the pump settles. */
  connection: FramedConnection
  /** Messages to encode and write, in order. Ending it shuts the stream down. */
  outbound: AsyncQueue<TSend>
  /**
   * Receives every decoded inbound message. Return `false` when the consumer
   * is gone; the pump then stops reading and shuts the stream down.
   */
  deliver: (message: TRecv) => boolean
  /** Shape every inbound frame must have. */
  guard: MessageGuard<TRecv>
}

/**
 * Run the read/write loops for one connection until it terminates.
 *
 * The writer and the reader run concurrently: a slow write never holds up a
 * frame that is being read, and the other way round.
 *
 * - Resolves after an orderly shutdown, when `outbound` ends or `deliver`
 *   refuses a message.
 * - Rejects with the I/O or codec error that broke the connection. The caller
 *   must treat that as a disconnect.
 *
 * Either way the outbound queue is cancelled on exit, so producers see their
 * pushes fail from then on.
 */
export async function runPump<TSend extends WireMessage, TRecv>(
  options: PumpOptions<TSend, TRecv>,
): Promise<void> {
  const { connection, outbound, deliver, guard } = options
  let stopped = false

  const writing = (async () => {
    for (;;) {
      const message = await outbound.next()
      if (message === undefined || stopped) return
      await connection.writeMessage(message)
    }
  })()

  const reading = (async () => {
    for (;;) {
      const message = await connection.readMessage(guard)
      if (stopped || !deliver(message)) return
    }
  })()

  try {
    // race() attaches to both loops, so the one that loses cannot surface as
    // an unhandled rejection once it is cancelled below.
    await Promise.race([writing, reading])
  } catch (err) {
    stopped = true
    outbound.cancel()
    connection.destroy()
    throw err
  }

  stopped = true
  outbound.cancel()
  await connection.shutdown()
}
