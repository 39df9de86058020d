/**
 * Test helpers for the RPC client: an in-process msgpack-RPC peer that
 * answers the handshake and records what the client sends.
 */

export {
  startFakeNvim,
  testSocketPath,
  DEFAULT_TYPES,
  DEFAULT_ERROR_TYPES,
  type FakeNvim,
  type FakeNvimOptions,
  type PeerConnection,
  type PeerRequestHandler,
  type TypeTable,
} from "./server.ts";
