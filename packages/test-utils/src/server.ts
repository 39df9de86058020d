import { createServer, type Server, type Socket } from "node:net";
import { rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  buildFrame,
  createCodec,
  createNotification,
  createRequest,
  createResponse,
  decodeFrames,
  describeError,
  MessageType,
  RemoteError,
  type Message,
  type RequestMessage,
  type RpcCodec,
} from "@nvrpc/protocol";

export type TypeTable = Record<string, { id: number }>;

export const DEFAULT_TYPES: TypeTable = {
  Buffer: { id: 0 },
  Window: { id: 1 },
  Tabpage: { id: 2 },
};

export const DEFAULT_ERROR_TYPES: TypeTable = {
  Exception: { id: 0 },
  Validation: { id: 1 },
};

export type PeerRequestHandler = (...params: unknown[]) => unknown;

export interface FakeNvimOptions {
  /** Socket path (default: a fresh path in the OS temp directory) */
  socketPath?: string;
  /** Channel id returned by nvim_get_api_info (default: 1) */
  channelId?: number;
  /** Types map of the API metadata (default: Buffer 0, Window 1, Tabpage 2) */
  types?: TypeTable;
  /** Replaces the whole nvim_get_api_info result */
  apiInfo?: unknown;
  /** Runs for each new connection before any message is handled */
  onConnect?: (peer: PeerConnection) => void | Promise<void>;
}

/**
 * The peer's end of one client connection.
 */
export interface PeerConnection {
  /** Codec with the peer's types registered */
  codec: RpcCodec;
  /** Every message received from the client, in order */
  received: Message[];
  /** Last socket or decode error, if any */
  error?: unknown;
  /** Send a notification to the client */
  notify(method: string, ...params: unknown[]): void;
  /** Send a request to the client; rejects with RemoteError on an error response */
  request(method: string, ...params: unknown[]): Promise<unknown>;
  /** Answer a request the client sent */
  respond(id: number, error: unknown, result: unknown): void;
  /** Write bytes as they are */
  sendRaw(data: Uint8Array): void;
  /** Resolve with the first received message (past or future) matching */
  waitFor(predicate: (message: Message) => boolean): Promise<Message>;
  /** Resolve with the first request for `method` */
  waitForRequest(method: string): Promise<RequestMessage>;
  /** Close the socket from the peer's side */
  close(): void;
}

export interface FakeNvim {
  socketPath: string;
  /**
   * Answer requests for `method` automatically. A returned value becomes the
   * result; a thrown error becomes `[0, message]`.
   */
  handle(method: string, handler: PeerRequestHandler): void;
  /** Resolve with the next connection, or the first one if it already exists */
  connection(): Promise<PeerConnection>;
  connections(): PeerConnection[];
  close(): Promise<void>;
}

let socketCounter = 0;

export function testSocketPath(name: string): string {
  socketCounter++;
  return path.join(tmpdir(), `nvrpc-${name}-${process.pid}-${socketCounter}.sock`);
}

/**
 * Start an in-process peer that speaks msgpack-RPC on a Unix socket.
 * It answers the handshake and records everything a client sends.
 *
 * @example
 * const nvim = await startFakeNvim({ channelId: 3 });
 * nvim.handle("nvim_eval", (expr) => (expr === "1 + 1" ? 2 : null));
 *
 * const client = await connect({ socket: nvim.socketPath });
 * await client.request("nvim_eval", "1 + 1"); // 2
 *
 * await client.close();
 * await nvim.close();
 */
export async function startFakeNvim(options: FakeNvimOptions = {}): Promise<FakeNvim> {
  const socketPath = options.socketPath ?? testSocketPath("peer");
  const types = options.types ?? DEFAULT_TYPES;
  const handlers = new Map<string, PeerRequestHandler>();
  const peers: PeerConnection[] = [];
  const sockets = new Set<Socket>();
  const connectionWaiters: Array<(peer: PeerConnection) => void> = [];

  handlers.set("nvim_get_api_info", () =>
    options.apiInfo ?? [
      options.channelId ?? 1,
      {
        version: { major: 0, minor: 10, patch: 0, api_level: 12 },
        types,
        error_types: DEFAULT_ERROR_TYPES,
        functions: [],
      },
    ]
  );

  function accept(socket: Socket): void {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));

    const codec = createCodec();
    for (const [kind, entry] of Object.entries(types)) {
      codec.registerExtType(entry.id, kind);
    }

    const pending = new Map<
      number,
      { resolve: (value: unknown) => void; reject: (error: Error) => void }
    >();
    const waiters: Array<{
      predicate: (message: Message) => boolean;
      resolve: (message: Message) => void;
    }> = [];
    let nextRequestId = 1;

    function write(message: Message): void {
      if (!socket.destroyed) {
        socket.write(buildFrame(codec, message));
      }
    }

    const peer: PeerConnection = {
      codec,
      received: [],

      notify(method, ...params) {
        write(createNotification(method, params));
      },

      request(method, ...params) {
        const id = nextRequestId++;
        return new Promise((resolve, reject) => {
          pending.set(id, { resolve, reject });
          write(createRequest(id, method, params));
        });
      },

      respond(id, error, result) {
        write(createResponse(id, error, result));
      },

      sendRaw(data) {
        if (!socket.destroyed) {
          socket.write(data);
        }
      },

      waitFor(predicate) {
        const seen = peer.received.find(predicate);
        if (seen) {
          return Promise.resolve(seen);
        }
        return new Promise((resolve) => {
          waiters.push({ predicate, resolve });
        });
      },

      async waitForRequest(method) {
        const message = await peer.waitFor(
          (m) => m.type === MessageType.REQUEST && m.method === method
        );
        if (message.type !== MessageType.REQUEST) {
          throw new Error(`Expected a request for ${method}`);
        }
        return message;
      },

      close() {
        socket.end();
      },
    };

    async function onMessage(message: Message): Promise<void> {
      peer.received.push(message);
      for (const waiter of [...waiters]) {
        if (waiter.predicate(message)) {
          waiters.splice(waiters.indexOf(waiter), 1);
          waiter.resolve(message);
        }
      }

      if (message.type === MessageType.RESPONSE) {
        const call = pending.get(message.id);
        if (call) {
          pending.delete(message.id);
          if (message.error !== null) {
            call.reject(new RemoteError(message.error));
          } else {
            call.resolve(message.result);
          }
        }
        return;
      }

      if (message.type === MessageType.REQUEST) {
        const handler = handlers.get(message.method);
        if (!handler) {
          return;
        }
        try {
          peer.respond(message.id, null, (await handler(...message.params)) ?? null);
        } catch (err) {
          peer.respond(message.id, [0, describeError(err)], null);
        }
      }
    }

    socket.on("error", (err) => {
      peer.error = err;
    });

    void (async () => {
      try {
        await options.onConnect?.(peer);
        for await (const message of decodeFrames(socket, codec)) {
          await onMessage(message);
        }
      } catch (err) {
        peer.error ??= err;
      } finally {
        for (const [, call] of pending) {
          call.reject(new Error("Connection closed"));
        }
        pending.clear();
      }
    })();

    peers.push(peer);
    const waiter = connectionWaiters.shift();
    waiter?.(peer);
  }

  rmSync(socketPath, { force: true });
  const server: Server = createServer(accept);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => {
      server.removeListener("error", reject);
      resolve();
    });
  });

  let claimed = 0;

  return {
    socketPath,

    handle(method, handler) {
      handlers.set(method, handler);
    },

    connection() {
      const existing = peers[claimed];
      claimed++;
      if (existing) {
        return Promise.resolve(existing);
      }
      return new Promise((resolve) => {
        connectionWaiters.push(resolve);
      });
    },

    connections: () => [...peers],

    async close() {
      for (const socket of sockets) {
        socket.destroy();
      }
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      rmSync(socketPath, { force: true });
    },
  };
}
