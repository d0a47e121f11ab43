export { hostSession, joinSession } from './client.js'
export type {
  PeerClient,
  PeerRole,
  HostSession,
  HostSessionOptions,
  JoinSessionOptions,
} from './client.js'
export { createCircleTable, DEFAULT_CIRCLE } from './circleTable.js'
export type { CircleTable, CircleTableOptions, SyncResult } from './circleTable.js'
