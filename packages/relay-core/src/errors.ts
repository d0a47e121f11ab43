export type RelayErrorCode =
  | 'TRUNCATED_STREAM'
  | 'MALFORMED_PAYLOAD'
  | 'PROTOCOL_VIOLATION'
  | 'DISCONNECTED'
  | 'CONNECTION_CLOSED'

/** Base class for every error the relay protocol raises. */
export class RelayError extends Error {
  readonly code: RelayErrorCode

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** The byte stream ended before a complete frame was read. */
export class TruncatedStreamError extends RelayError {
  constructor(expected: number, received: number) {
    super(
      'TRUNCATED_STREAM',
      `[relay] Stream ended after ${received} of ${expected} bytes`,
    )
  }
}

/** A frame's payload did not decode to the expected message shape. */
export class MalformedPayloadError extends RelayError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('MALFORMED_PAYLOAD', `[relay] Malformed payload: ${reason}`, options)
  }
}

/** The relay's first frame was not a handshake. */
export class ProtocolViolationError extends RelayError {
  constructor(received: string) {
    super(
      'PROTOCOL_VIOLATION',
      `[relay] Expected a handshake as the first message, got "${received}"`,
    )
  }
}

/**
 * The connection behind a client facade is gone for good. The only recovery
 * is to build a new facade.
 */
export class DisconnectedError extends RelayError {
  constructor() {
    super('DISCONNECTED', '[relay] The relay has disconnected')
  }
}

/** A pending read was abandoned because its owner closed the connection. */
export class ConnectionClosedError extends RelayError {
  constructor() {
    super('CONNECTION_CLOSED', '[relay] Connection closed by its owner')
  }
}
