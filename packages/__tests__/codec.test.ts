/**
 * Tests for the wire codec: length-prefixed CBOR frames.
 */

import { describe, it, expect } from 'vitest'
import { Encoder } from 'cbor-x'
import {
  createBufferSource,
  decode,
  encode,
  isInboundMessage,
  isOutboundMessage,
  readMessage,
  FRAME_HEADER_LENGTH,
  MalformedPayloadError,
  TruncatedStreamError,
} from '@circle-relay/core'
import type { Circle, InboundMessage, OutboundMessage } from '@circle-relay/core'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const circle: Circle = {
  position: { x: 1, y: 2 },
  color: { r: 0, g: 0, b: 1 },
  radius: 0.5,
}

const peerId = '6f1c2b7e-3d4a-4b8f-9a1e-2c3d4e5f6a7b'

const outboundMessages: OutboundMessage[] = [
  { type: 'disconnect' },
  { type: 'ping' },
  { type: 'player:changed', circle },
]

const inboundMessages: InboundMessage[] = [
  { type: 'handshake', peerId },
  { type: 'peer:joined', peerId },
  { type: 'peer:left', peerId },
  { type: 'ping' },
  { type: 'peer:changed', peerId, circle },
]

const cbor = new Encoder({ useRecords: false, mapsAsObjects: true })

/** Wrap arbitrary payload bytes in a frame header. */
function frame(payload: Uint8Array): Uint8Array {
  const bytes = new Uint8Array(FRAME_HEADER_LENGTH + payload.length)
  new DataView(bytes.buffer).setBigUint64(0, BigInt(payload.length))
  bytes.set(payload, FRAME_HEADER_LENGTH)
  return bytes
}

function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0))
  let offset = 0
  for (const part of parts) {
    out.set(part, offset)
    offset += part.length
  }
  return out
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('encode', () => {
  it('prefixes the payload with its exact byte count as a big-endian u64', () => {
    const bytes = encode({ type: 'player:changed', circle })
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    expect(view.getBigUint64(0)).toBe(BigInt(bytes.length - FRAME_HEADER_LENGTH))
  })

  it('produces a payload any CBOR decoder reads back as the message', () => {
    const bytes = encode({ type: 'peer:changed', peerId, circle })
    expect(cbor.decode(bytes.subarray(FRAME_HEADER_LENGTH))).toEqual({
      type: 'peer:changed',
      peerId,
      circle,
    })
  })
})

describe('decode', () => {
  for (const message of outboundMessages) {
    it(`round-trips outbound ${message.type}`, () => {
      expect(decode(encode(message), isOutboundMessage)).toEqual(message)
    })
  }

  for (const message of inboundMessages) {
    it(`round-trips inbound ${message.type}`, () => {
      expect(decode(encode(message), isInboundMessage)).toEqual(message)
    })
  }

  it('reports every proper prefix of a frame as a truncated stream', () => {
    const bytes = encode({ type: 'peer:changed', peerId, circle })
    for (let cut = 0; cut < bytes.length; cut++) {
      expect(() => decode(bytes.subarray(0, cut), isInboundMessage)).toThrow(
        TruncatedStreamError,
      )
    }
  })

  it('ignores bytes after the first frame', () => {
    const bytes = concat(
      encode({ type: 'peer:left', peerId }),
      encode({ type: 'ping' }),
    )
    expect(decode(bytes, isInboundMessage)).toEqual({ type: 'peer:left', peerId })
  })

  it('rejects a payload that is not valid CBOR', () => {
    // text(4) announced, one byte present
    const bytes = frame(new Uint8Array([0x64, 0x74]))
    expect(() => decode(bytes, isInboundMessage)).toThrow(MalformedPayloadError)
  })

  it('rejects an unknown message type', () => {
    const bytes = frame(cbor.encode({ type: 'teleport', peerId }))
    expect(() => decode(bytes, isInboundMessage)).toThrow(MalformedPayloadError)
  })

  it('rejects a message meant for the other direction', () => {
    const bytes = encode({ type: 'player:changed', circle })
    expect(() => decode(bytes, isInboundMessage)).toThrow(MalformedPayloadError)
  })

  it('rejects a circle with a non-numeric field', () => {
    const bytes = frame(
      cbor.encode({
        type: 'player:changed',
        circle: { ...circle, radius: 'large' },
      }),
    )
    expect(() => decode(bytes, isOutboundMessage)).toThrow(MalformedPayloadError)
  })

  it('carries NaN and infinite circle fields unchanged', () => {
    const odd: Circle = {
      position: { x: Number.NaN, y: Number.POSITIVE_INFINITY },
      color: { r: Number.NEGATIVE_INFINITY, g: 0, b: 1 },
      radius: Number.POSITIVE_INFINITY,
    }
    const back = decode(
      encode({ type: 'peer:changed', peerId, circle: odd }),
      isInboundMessage,
    )
    expect(back).toEqual({ type: 'peer:changed', peerId, circle: odd })
    if (back.type !== 'peer:changed') return
    expect(Number.isNaN(back.circle.position.x)).toBe(true)
    expect(back.circle.color.r).toBe(Number.NEGATIVE_INFINITY)
  })

  it('writes negative zero as integer zero', () => {
    const back = decode(
      encode({
        type: 'player:changed',
        circle: { ...circle, position: { x: -0, y: 2 } },
      }),
      isOutboundMessage,
    )
    if (back.type !== 'player:changed') throw new Error(`got ${back.type}`)
    expect(Object.is(back.circle.position.x, 0)).toBe(true)
  })

  it('rejects a length prefix above the frame limit', () => {
    const bytes = encode({ type: 'player:changed', circle })
    expect(() =>
      decode(bytes, isOutboundMessage, { maxFrameLength: 16 }),
    ).toThrow(MalformedPayloadError)
  })

  it('tags errors with their taxonomy code', () => {
    let caught: unknown
    try {
      decode(new Uint8Array(3), isInboundMessage)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(TruncatedStreamError)
    expect(caught).toMatchObject({
      name: 'TruncatedStreamError',
      code: 'TRUNCATED_STREAM',
    })
  })
})

describe('readMessage', () => {
  it('reads consecutive frames from one source in order', async () => {
    const source = createBufferSource(
      concat(
        encode({ type: 'handshake', peerId }),
        encode({ type: 'peer:joined', peerId }),
      ),
    )
    expect(await readMessage(source, isInboundMessage)).toEqual({
      type: 'handshake',
      peerId,
    })
    expect(await readMessage(source, isInboundMessage)).toEqual({
      type: 'peer:joined',
      peerId,
    })
  })

  it('rejects with TruncatedStreamError when the source runs dry', async () => {
    const bytes = encode({ type: 'ping' })
    const source = createBufferSource(bytes.subarray(0, bytes.length - 1))
    await expect(readMessage(source, isInboundMessage)).rejects.toBeInstanceOf(
      TruncatedStreamError,
    )
  })

  it('rejects with TruncatedStreamError at a clean end of stream', async () => {
    const source = createBufferSource(encode({ type: 'ping' }))
    await readMessage(source, isOutboundMessage)
    await expect(readMessage(source, isOutboundMessage)).rejects.toBeInstanceOf(
      TruncatedStreamError,
    )
  })
})
