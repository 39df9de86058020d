/**
 * @nvrpc/client
 *
 * msgpack-RPC client for Neovim and peers speaking the same protocol.
 */

export { connect, attach } from "./connection.ts";
export {
  createTransport,
  createSocket,
  resolveAddress,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_MAX_READ_SIZE,
  type Transport,
  type TransportOptions,
  type OutboundItem,
} from "./transport.ts";
export { createCorrelator, type Correlator, type SubmitOptions } from "./correlator.ts";
export { createDispatcher, type Dispatcher } from "./dispatcher.ts";
export {
  parseApiInfo,
  performHandshake,
  DEFAULT_CLIENT_NAME,
  DEFAULT_CLIENT_VERSION,
  DEFAULT_REQUIRED_EXT_TYPES,
  type ApiInfo,
  type ApiMetadata,
} from "./handshake.ts";
export { createCapabilityCache, type CapabilityCache } from "./capabilities.ts";
export {
  defineRequest,
  defineNotification,
  callFunction,
  extValueSchema,
  getVar,
  hasVar,
  setVar,
  delVar,
  type Result,
  type Schema,
} from "./api.ts";
export {
  createRpcRegistry,
  remoteNameFor,
  luaDefinition,
  vimDefinition,
  type RpcRegistry,
  type RpcHandlerSpec,
  type DrainResult,
} from "./registry.ts";
export type {
  AttachOptions,
  ClientState,
  ClientVersion,
  ConnectOptions,
  NotificationHandler,
  RequestHandler,
  RequestOptions,
  RpcClient,
  SocketOptions,
} from "./types.ts";
export {
  ExtValue,
  RemoteObjectKind,
  RpcError,
  ConnectionError,
  ProtocolError,
  EncodingError,
  RemoteError,
  HandlerError,
  DuplicateHandlerError,
  RequestTimeoutError,
} from "@nvrpc/protocol";
