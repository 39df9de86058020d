/**
 * Connection handling for the RPC client.
 */

import type { Duplex } from "node:stream";
import {
  buildFrame,
  createCodec,
  createNotification,
  ConnectionError,
  MessageType,
  ProtocolError,
  type Message,
} from "@nvrpc/protocol";
import { createSocket, createTransport } from "./transport.ts";
import { createCorrelator } from "./correlator.ts";
import { createDispatcher } from "./dispatcher.ts";
import { createCapabilityCache } from "./capabilities.ts";
import {
  performHandshake,
  DEFAULT_CLIENT_NAME,
  DEFAULT_CLIENT_VERSION,
  DEFAULT_REQUIRED_EXT_TYPES,
} from "./handshake.ts";
import type {
  AttachOptions,
  ClientState,
  ConnectOptions,
  RequestOptions,
  RpcClient,
} from "./types.ts";

/** Deadline for nvim_get_api_info when no requestTimeout is configured */
const HANDSHAKE_TIMEOUT = 30000;

interface ConnectionState {
  state: ClientState;
  connected: boolean;
}

/**
 * Connect to a peer by socket path, TCP address, or `$NVIM`, and complete
 * the handshake.
 */
export async function connect(options: ConnectOptions = {}): Promise<RpcClient> {
  const socket = await createSocket(options);
  return attach(socket, options);
}

/**
 * Run the client over an already-open stream (a socket, or the stdio pipes
 * of an embedded peer joined into one duplex) and complete the handshake.
 *
 * Rejects if any handshake step fails; the stream is closed in that case.
 */
export async function attach(
  stream: Duplex,
  options: AttachOptions = {}
): Promise<RpcClient> {
  const codec = createCodec();
  const transport = createTransport(stream, codec, {
    maxReadSize: options.maxReadSize,
  });

  const state: ConnectionState = {
    state: "connecting",
    connected: true,
  };

  function send(message: Message): boolean {
    const frame = buildFrame(codec, message);
    if (!transport.enqueue(frame)) {
      return false;
    }
    transport.enqueue(null);
    return true;
  }

  const correlator = createCorrelator(send, () => ConnectionError.closed());
  const dispatcher = createDispatcher(send);

  for (const [method, handler] of Object.entries(options.notificationHandlers ?? {})) {
    dispatcher.onNotify(method, handler);
  }
  for (const [method, handler] of Object.entries(options.requestHandlers ?? {})) {
    dispatcher.onRequest(method, handler);
  }

  function handleMessage(message: Message): void {
    if (message.type === MessageType.RESPONSE) {
      correlator.resolve(message.id, message.error, message.result);
    } else {
      dispatcher.handle(message);
    }
  }

  function teardown(reason: Error): void {
    if (!state.connected) {
      return;
    }
    state.connected = false;
    state.state = state.state === "ready" ? "closed" : "failed";
    transport.close();
    correlator.rejectAll(reason);
    dispatcher.close();
  }

  const closed = transport.run(handleMessage).then(
    () => teardown(ConnectionError.closed()),
    (err: unknown) => {
      const reason =
        err instanceof Error ? err : new ConnectionError(String(err));
      console.error("Connection terminated:", reason);
      teardown(reason);
    }
  );

  function notify(method: string, ...params: unknown[]): void {
    if (!state.connected || !send(createNotification(method, params))) {
      throw ConnectionError.closed();
    }
  }

  function requestWithOptions(
    method: string,
    params: unknown[],
    requestOptions: RequestOptions
  ): Promise<unknown> {
    return correlator.submit(method, params, {
      timeout: requestOptions.timeout ?? options.requestTimeout,
    });
  }

  function request(method: string, ...params: unknown[]): Promise<unknown> {
    return requestWithOptions(method, params, {});
  }

  async function close(): Promise<void> {
    transport.close();
    await closed;
  }

  const apiInfo = await performHandshake({
    codec,
    notify,
    request: (method, ...params) =>
      requestWithOptions(method, params, {
        timeout: options.requestTimeout ?? HANDSHAKE_TIMEOUT,
      }),
    setState: (next) => {
      state.state = next;
    },
    name: options.name ?? DEFAULT_CLIENT_NAME,
    version: options.version ?? DEFAULT_CLIENT_VERSION,
    requiredExtTypes: options.requiredExtTypes ?? DEFAULT_REQUIRED_EXT_TYPES,
  }).catch(async (err: unknown): Promise<never> => {
    const reason =
      err instanceof Error ? err : new ProtocolError(`Handshake failed: ${String(err)}`);
    teardown(reason);
    await closed;
    throw reason;
  });

  // The peer may have hung up right after answering
  state.state = state.connected ? "ready" : "closed";
  dispatcher.ready();

  return {
    channel: apiInfo.channelId,
    apiInfo,
    capabilities: createCapabilityCache(request),
    closed,
    notify,
    request,
    requestWithOptions,
    onNotify: (method, handler) => dispatcher.onNotify(method, handler),
    onRequest: (method, handler) => dispatcher.onRequest(method, handler),
    state: () => state.state,
    isConnected: () => state.connected,
    close,
  };
}
