/**
 * Byte transport for the RPC client.
 *
 * One duplex stream, two loops:
 * - the send loop drains the outbound queue into the stream in FIFO order
 * - the receive loop reads chunks, decodes them into messages and hands
 *   each message to the client as soon as it is complete
 *
 * `run()` settles once both loops have stopped. A local `close()` lets the
 * send loop write what is already queued, ends the stream and then stops
 * the receive loop. When the receive loop stops first (peer hung up, bad
 * input) whatever is still queued is dropped.
 */

import { connect as netConnect, type Socket } from "node:net";
import type { Duplex } from "node:stream";
import {
  decodeFrames,
  ConnectionError,
  type Message,
  type RpcCodec,
} from "@nvrpc/protocol";
import { createChannel } from "./channel.ts";
import type { SocketOptions } from "./types.ts";

export const DEFAULT_CONNECT_TIMEOUT = 30000;

/** Upper bound on the size of one chunk handed to the decoder */
export const DEFAULT_MAX_READ_SIZE = 1_000_000;

/**
 * Outbound queue entry. `null` asks the send loop to flush what it has
 * written so far.
 */
export type OutboundItem = Uint8Array | null;

export interface TransportOptions {
  /** Maximum chunk size fed to the decoder (default: 1,000,000 bytes) */
  maxReadSize?: number;
}

export interface Transport {
  /**
   * Queue bytes (or a flush) for the send loop.
   * Returns false once the transport is closing.
   */
  enqueue(item: OutboundItem): boolean;

  /**
   * Start both loops. Resolves when the peer closes the stream or `close()`
   * is called; rejects with the error that stopped the connection.
   */
  run(onMessage: (message: Message) => void): Promise<void>;

  /**
   * Stop accepting items, write what is already queued, end the stream and
   * stop both loops. Safe to call repeatedly.
   */
  close(): void;

  isClosed(): boolean;
}

// ============================================================================
// Socket
// ============================================================================

type Address = { path: string } | { host: string; port: number };

/**
 * Work out where to connect: an explicit socket path, then TCP host/port,
 * then the `NVIM` environment variable Neovim sets for its children.
 */
export function resolveAddress(
  options: SocketOptions,
  env: NodeJS.ProcessEnv = process.env
): Address | undefined {
  if (options.socket) {
    return { path: options.socket };
  }
  if (options.port !== undefined) {
    return { host: options.host ?? "127.0.0.1", port: options.port };
  }

  const fromEnv = env.NVIM;
  if (!fromEnv) {
    return undefined;
  }
  const tcp = /^([^/\\]+):(\d+)$/.exec(fromEnv);
  if (tcp?.[1] !== undefined && tcp[2] !== undefined) {
    return { host: tcp[1], port: parseInt(tcp[2], 10) };
  }
  return { path: fromEnv };
}

function describeAddress(address: Address): string {
  return "path" in address ? address.path : `${address.host}:${address.port}`;
}

/**
 * Create a socket connection.
 */
export function createSocket(options: SocketOptions): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const address = resolveAddress(options);
    if (!address) {
      reject(
        new ConnectionError(
          "No address to connect to: pass a socket path or port, or set NVIM"
        )
      );
      return;
    }

    const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT;
    const target = describeAddress(address);

    const onError = (err: Error) => {
      clearTimeout(timeoutId);
      reject(new ConnectionError(`Failed to connect to ${target}: ${err.message}`, { cause: err }));
    };

    const onConnect = () => {
      clearTimeout(timeoutId);
      socket.removeListener("error", onError);
      resolve(socket);
    };

    const socket =
      "path" in address
        ? netConnect(address.path, onConnect)
        : netConnect(address.port, address.host, onConnect);

    socket.on("error", onError);

    // Connection timeout
    const timeoutId = setTimeout(() => {
      socket.removeListener("error", onError);
      socket.destroy();
      reject(new ConnectionError(`Connection to ${target} timed out after ${timeout}ms`));
    }, timeout);
  });
}

// ============================================================================
// Transport
// ============================================================================

export function createTransport(
  stream: Duplex,
  codec: RpcCodec,
  options: TransportOptions = {}
): Transport {
  const maxReadSize = options.maxReadSize ?? DEFAULT_MAX_READ_SIZE;
  const outbound = createChannel<OutboundItem>();
  let stopping = false;
  // Set when the receive loop ended first; queued output goes nowhere
  let aborted = false;
  let started = false;
  let streamError: Error | undefined;

  stream.on("error", (err: Error) => {
    streamError ??= err;
  });

  function stopSending(): void {
    stopping = true;
    outbound.close();
  }

  function abortSending(): void {
    aborted = true;
    stopSending();
  }

  function stopReceiving(): void {
    stopping = true;
    if (!stream.destroyed) {
      stream.destroy();
    }
  }

  async function sendLoop(): Promise<void> {
    let corked = false;

    for await (const item of outbound) {
      if (aborted || stream.destroyed) {
        break;
      }

      if (item === null) {
        if (corked) {
          stream.uncork();
          corked = false;
        }
        if (stream.writableNeedDrain) {
          await waitForDrain(stream);
        }
        continue;
      }

      if (!corked) {
        stream.cork();
        corked = true;
      }
      stream.write(item);
    }

    if (corked && !stream.destroyed) {
      stream.uncork();
    }
    if (!aborted) {
      await endStream(stream);
    }
  }

  async function* readChunks(): AsyncGenerator<Uint8Array> {
    try {
      for await (const chunk of stream) {
        if (!(chunk instanceof Uint8Array)) {
          throw new ConnectionError("Stream delivered text instead of bytes");
        }
        const bytes = new Uint8Array(chunk);
        for (let offset = 0; offset < bytes.length; offset += maxReadSize) {
          yield bytes.subarray(offset, offset + maxReadSize);
        }
      }
    } catch (err) {
      if (err instanceof ConnectionError) {
        throw err;
      }
      // Destroying the stream ourselves ends the iterator with a premature close
      if (stopping && streamError === undefined) {
        return;
      }
      const cause = streamError ?? err;
      const message = cause instanceof Error ? cause.message : String(cause);
      throw new ConnectionError(`Connection lost: ${message}`, { cause });
    }
  }

  async function receiveLoop(onMessage: (message: Message) => void): Promise<void> {
    for await (const message of decodeFrames(readChunks(), codec)) {
      onMessage(message);
    }
  }

  return {
    enqueue(item: OutboundItem): boolean {
      if (stopping) {
        return false;
      }
      return outbound.send(item);
    },

    async run(onMessage: (message: Message) => void): Promise<void> {
      if (started) {
        throw new Error("Transport is already running");
      }
      started = true;

      const results = await Promise.allSettled([
        sendLoop().finally(stopReceiving),
        receiveLoop(onMessage).finally(abortSending),
      ]);

      for (const result of results) {
        if (result.status === "rejected") {
          throw result.reason;
        }
      }
    },

    close(): void {
      stopSending();
      if (!started) {
        stopReceiving();
      }
    },

    isClosed: () => stopping,
  };
}

/** Resolves once buffered writes are flushed, or the stream is gone */
function endStream(stream: Duplex): Promise<void> {
  return new Promise((resolve) => {
    if (stream.destroyed || stream.writableFinished) {
      resolve();
      return;
    }
    stream.once("close", () => resolve());
    stream.once("finish", () => resolve());
    if (!stream.writableEnded) {
      stream.end();
    }
  });
}

function waitForDrain(stream: Duplex): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      stream.removeListener("drain", onDrain);
      stream.removeListener("close", onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(ConnectionError.closed());
    };
    stream.on("drain", onDrain);
    stream.on("close", onClose);
  });
}
