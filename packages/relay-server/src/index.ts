export { createRelay, DEFAULT_HOST, DEFAULT_PORT } from './relay.js'
export type { Relay, RelayOptions, LocalPeer } from './relay.js'
export { createRegistry } from './registry.js'
export type { RelayRegistry } from './registry.js'
