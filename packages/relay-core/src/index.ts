export type {
  PeerId,
  Circle,
  OutboundMessage,
  InboundMessage,
  MessageGuard,
  ConnectionStatus,
  Result,
} from './types.js'
export { isCircle, isOutboundMessage, isInboundMessage } from './types.js'
export {
  RelayError,
  TruncatedStreamError,
  MalformedPayloadError,
  ProtocolViolationError,
  DisconnectedError,
  ConnectionClosedError,
} from './errors.js'
export type { RelayErrorCode } from './errors.js'
export {
  encode,
  decode,
  readMessage,
  writeMessage,
  createBufferSource,
  FRAME_HEADER_LENGTH,
  MAX_FRAME_LENGTH,
} from './codec.js'
export type { ByteSource, ByteSink, WireMessage, DecodeOptions } from './codec.js'
export { createQueue } from './queue.js'
export type { AsyncQueue, TryShiftResult } from './queue.js'
export { createFramedConnection } from './connection.js'
export type { FramedConnection, FramedConnectionOptions } from './connection.js'
export { runPump } from './pump.js'
export type { PumpOptions } from './pump.js'
export {
  createHeartbeat,
  nextTickDelay,
  DEFAULT_HEARTBEAT_INTERVAL,
} from './heartbeat.js'
export type { Heartbeat, HeartbeatOptions } from './heartbeat.js'
