/**
 * Wire codec: length-prefixed CBOR frames.
 *
 * Frame layout:
 * - length: 8 bytes, unsigned big-endian, the exact payload byte count
 * - payload: `length` bytes of CBOR (RFC 8949) holding one tagged message
 *   object, e.g. `{ type: 'peer:joined', peerId: '…' }`
 *
 * The codec works over any ordered byte stream (`ByteSource` / `ByteSink`),
 * not just sockets, so tests can drive it from plain arrays.
 */

import { Encoder } from 'cbor-x'
import { MalformedPayloadError, TruncatedStreamError } from './errors.js'
import type { InboundMessage, MessageGuard, OutboundMessage } from './types.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const FRAME_HEADER_LENGTH = 8

/** Largest payload a reader accepts before treating the prefix as corrupt. */
export const MAX_FRAME_LENGTH = 16 * 1024 * 1024

// ---------------------------------------------------------------------------
// Stream abstractions
// ---------------------------------------------------------------------------

export interface ByteSource {
  /**
   * Resolve exactly `length` bytes, in stream order.
   * Rejects with `TruncatedStreamError` if the stream ends first.
   */
  readExact(length: number): Promise<Uint8Array>
}

export interface ByteSink {
  /** Resolves once the sink has accepted every byte. */
  write(bytes: Uint8Array): Promise<void>
}

export type WireMessage = OutboundMessage | InboundMessage

export interface DecodeOptions {
  /** @default MAX_FRAME_LENGTH */
  maxFrameLength?: number
}

// Plain CBOR maps sized to their key count: no cbor-x record extension, so
// any CBOR decoder can read the payload. Numbers with an integer value go out
// as CBOR integers, so -0 decodes as 0.
const cbor = new Encoder({
  useRecords: false,
  mapsAsObjects: true,
  variableMapSize: true,
})

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/** Encode one message as a complete frame (prefix + payload). */
export function encode(message: WireMessage): Uint8Array {
  const payload = cbor.encode(message)
  const frame = new Uint8Array(FRAME_HEADER_LENGTH + payload.length)
  new DataView(frame.buffer).setBigUint64(0, BigInt(payload.length))
  frame.set(payload, FRAME_HEADER_LENGTH)
  return frame
}

export async function writeMessage(
  sink: ByteSink,
  message: WireMessage,
): Promise<void> {
  await sink.write(encode(message))
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function readLength(header: Uint8Array, maxFrameLength: number): number {
  const view = new DataView(header.buffer, header.byteOffset, header.byteLength)
  const length = view.getBigUint64(0)
  if (length > BigInt(maxFrameLength)) {
    throw new MalformedPayloadError(
      `frame length ${length} exceeds the ${maxFrameLength}-byte limit`,
    )
  }
  return Number(length)
}

function decodePayload<T>(payload: Uint8Array, guard: MessageGuard<T>): T {
  let value: unknown
  try {
    value = cbor.decode(payload)
  } catch (err) {
    throw new MalformedPayloadError('invalid CBOR', { cause: err })
  }
  if (!guard(value)) {
    throw new MalformedPayloadError('unexpected message shape')
  }
  return value
}

/**
 * Decode the frame at the start of `bytes`. Anything after that frame is
 * ignored.
 */
export function decode<T>(
  bytes: Uint8Array,
  guard: MessageGuard<T>,
  options: DecodeOptions = {},
): T {
  const { maxFrameLength = MAX_FRAME_LENGTH } = options
  if (bytes.length < FRAME_HEADER_LENGTH) {
    throw new TruncatedStreamError(FRAME_HEADER_LENGTH, bytes.length)
  }
  const length = readLength(bytes.subarray(0, FRAME_HEADER_LENGTH), maxFrameLength)
  const end = FRAME_HEADER_LENGTH + length
  if (bytes.length < end) {
    throw new TruncatedStreamError(end, bytes.length)
  }
  return decodePayload(bytes.subarray(FRAME_HEADER_LENGTH, end), guard)
}

/** Read and decode exactly one frame from `source`. */
export async function readMessage<T>(
  source: ByteSource,
  guard: MessageGuard<T>,
  options: DecodeOptions = {},
): Promise<T> {
  const { maxFrameLength = MAX_FRAME_LENGTH } = options
  const header = await source.readExact(FRAME_HEADER_LENGTH)
  const length = readLength(header, maxFrameLength)
  const payload = await source.readExact(length)
  return decodePayload(payload, guard)
}

/** A `ByteSource` over bytes already in memory. */
export function createBufferSource(bytes: Uint8Array): ByteSource {
  let offset = 0
  return {
    async readExact(length) {
      const available = bytes.length - offset
      if (available < length) {
        offset = bytes.length
        throw new TruncatedStreamError(length, available)
      }
      const chunk = bytes.subarray(offset, offset + length)
      offset += length
      return chunk
    },
  }
}
