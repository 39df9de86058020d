/**
 * Types for the RPC client.
 */

import type { CapabilityCache } from "./capabilities.ts";
import type { ApiInfo } from "./handshake.ts";

/** Handler for an inbound notification. Its result is ignored. */
export type NotificationHandler = (...params: unknown[]) => void | Promise<void>;

/** Handler for an inbound request. Its result becomes the response. */
export type RequestHandler = (...params: unknown[]) => unknown;

/**
 * Where to connect.
 */
export interface SocketOptions {
  /** Unix socket path (or named pipe) */
  socket?: string;
  /** TCP host, used with `port` (default: 127.0.0.1) */
  host?: string;
  /** TCP port */
  port?: number;
  /** Connection timeout in ms (default: 30000) */
  timeout?: number;
}

export interface ClientVersion {
  major: number;
  minor: number;
  patch: number;
}

/**
 * Options shared by `connect` and `attach`.
 */
export interface AttachOptions {
  /** Name announced through nvim_set_client_info (default: "nvrpc") */
  name?: string;
  /** Version announced through nvim_set_client_info (default: 0.1.0) */
  version?: ClientVersion;
  /**
   * Remote object kinds the peer must describe in its API metadata
   * (default: Buffer, Window, Tabpage)
   */
  requiredExtTypes?: string[];
  /** Default deadline for every request in ms (default: none) */
  requestTimeout?: number;
  /** Maximum chunk size fed to the decoder (default: 1,000,000 bytes) */
  maxReadSize?: number;
  /** Handlers registered before the handshake starts */
  notificationHandlers?: Record<string, NotificationHandler>;
  /** Handlers registered before the handshake starts */
  requestHandlers?: Record<string, RequestHandler>;
}

/**
 * Options for connecting to a peer by address.
 */
export interface ConnectOptions extends SocketOptions, AttachOptions {}

export interface RequestOptions {
  /** Deadline for this call in ms; overrides `requestTimeout` */
  timeout?: number;
}

/**
 * Handshake progress.
 */
export type ClientState =
  | "connecting"
  | "handshake-client-info"
  | "handshake-capabilities"
  | "handshake-ext-types"
  | "ready"
  | "failed"
  | "closed";

/**
 * A connected, ready client.
 */
export interface RpcClient {
  /** Channel id the peer assigned to this connection */
  readonly channel: number;
  /** Metadata from the handshake */
  readonly apiInfo: ApiInfo;
  /** Feature checks, memoised per client */
  readonly capabilities: CapabilityCache;
  /** Settles once the connection has ended, for whatever reason */
  readonly closed: Promise<void>;

  /**
   * Send a notification. Fire and forget.
   * @throws ConnectionError if the connection is closed
   * @throws EncodingError if a parameter cannot be encoded
   */
  notify(method: string, ...params: unknown[]): void;

  /**
   * Send a request and wait for its result.
   * Rejects with RemoteError when the peer answers with an error.
   */
  request(method: string, ...params: unknown[]): Promise<unknown>;

  /** `request` with per-call options */
  requestWithOptions(
    method: string,
    params: unknown[],
    options: RequestOptions
  ): Promise<unknown>;

  /** @throws DuplicateHandlerError if the method already has a handler */
  onNotify(method: string, handler: NotificationHandler): void;

  /** @throws DuplicateHandlerError if the method already has a handler */
  onRequest(method: string, handler: RequestHandler): void;

  state(): ClientState;

  isConnected(): boolean;

  /** Close the connection; pending requests reject with ConnectionError */
  close(): Promise<void>;
}
