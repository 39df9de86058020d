/**
 * @nvrpc/protocol
 *
 * Message types, errors, codec, and framing for msgpack-RPC.
 */

// Types and utilities
export * from "./types.ts";

// Errors
export {
  RpcError,
  ConnectionError,
  ProtocolError,
  EncodingError,
  RemoteError,
  HandlerError,
  DuplicateHandlerError,
  RequestTimeoutError,
  describeError,
} from "./errors.ts";

// Codec
export {
  createCodec,
  createExtValue,
  isExtValue,
  ExtValue,
  RemoteObjectKind,
  type RpcCodec,
} from "./codec.ts";

// Framing
export {
  buildFrame,
  parseFrame,
  decodeFrames,
  messageToWire,
  messageFromWire,
} from "./framing.ts";
