/**
 * Frame builder and streaming frame decoder for msgpack-RPC.
 *
 * msgpack-RPC has no length prefix: a frame ends where its msgpack array
 * ends. The streaming decoder therefore keeps partial data across reads
 * and resumes decoding when the next chunk arrives.
 */

import { decodeMultiStream } from "@msgpack/msgpack";
import {
  MessageType,
  getMessageTypeName,
  type Message,
} from "./types.ts";
import type { RpcCodec } from "./codec.ts";
import { ProtocolError, RpcError } from "./errors.ts";

// ============================================================================
// Wire Shapes
// ============================================================================

/**
 * Array form of a message as it goes on the wire.
 */
export function messageToWire(message: Message): unknown[] {
  switch (message.type) {
    case MessageType.REQUEST:
      return [message.type, message.id, message.method, message.params];
    case MessageType.RESPONSE:
      return [message.type, message.id, message.error, message.result];
    case MessageType.NOTIFICATION:
      return [message.type, message.method, message.params];
  }
}

/**
 * Validate a decoded value and turn it into a message.
 * @throws ProtocolError if the value is not one of the three frame shapes
 */
export function messageFromWire(value: unknown): Message {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ProtocolError("Malformed frame: expected a non-empty array");
  }

  const frame: unknown[] = value;
  const [type] = frame;
  switch (type) {
    case MessageType.REQUEST: {
      const [, id, method, params] = frame;
      expectArity(frame, 4, MessageType.REQUEST);
      expectId(id, MessageType.REQUEST);
      expectMethod(method, MessageType.REQUEST);
      expectParams(params, MessageType.REQUEST);
      return { type: MessageType.REQUEST, id, method, params };
    }

    case MessageType.RESPONSE: {
      const [, id, error, result] = frame;
      expectArity(frame, 4, MessageType.RESPONSE);
      expectId(id, MessageType.RESPONSE);
      return {
        type: MessageType.RESPONSE,
        id,
        error: error ?? null,
        result: result ?? null,
      };
    }

    case MessageType.NOTIFICATION: {
      const [, method, params] = frame;
      expectArity(frame, 3, MessageType.NOTIFICATION);
      expectMethod(method, MessageType.NOTIFICATION);
      expectParams(params, MessageType.NOTIFICATION);
      return { type: MessageType.NOTIFICATION, method, params };
    }

    default:
      throw new ProtocolError(`Malformed frame: unknown type tag ${String(type)}`);
  }
}

function expectArity(value: unknown[], arity: number, type: number): void {
  if (value.length !== arity) {
    throw new ProtocolError(
      `Malformed ${getMessageTypeName(type)}: expected ${arity} elements, got ${value.length}`
    );
  }
}

function expectId(id: unknown, type: number): asserts id is number {
  if (typeof id !== "number" || !Number.isInteger(id) || id < 0) {
    throw new ProtocolError(
      `Malformed ${getMessageTypeName(type)}: invalid id ${String(id)}`
    );
  }
}

function expectMethod(method: unknown, type: number): asserts method is string {
  if (typeof method !== "string") {
    throw new ProtocolError(
      `Malformed ${getMessageTypeName(type)}: method must be a string`
    );
  }
}

function expectParams(params: unknown, type: number): asserts params is unknown[] {
  if (!Array.isArray(params)) {
    throw new ProtocolError(
      `Malformed ${getMessageTypeName(type)}: params must be an array`
    );
  }
}

// ============================================================================
// Frame Building
// ============================================================================

/**
 * Build a frame from a message.
 *
 * @throws EncodingError if a value in the message cannot be encoded
 */
export function buildFrame(codec: RpcCodec, message: Message): Uint8Array {
  return codec.encode(messageToWire(message));
}

// ============================================================================
// Frame Parsing
// ============================================================================

/**
 * Parse a single complete frame.
 *
 * @throws ProtocolError if the frame is malformed or uses an unknown ext code
 */
export function parseFrame(codec: RpcCodec, data: Uint8Array): Message {
  let value: unknown;
  try {
    value = codec.decode(data);
  } catch (err) {
    throw asProtocolError(err);
  }
  return messageFromWire(value);
}

/**
 * Decode messages from a stream of byte chunks.
 *
 * Usage:
 * ```ts
 * for await (const message of decodeFrames(socket, codec)) {
 *   handleMessage(message);
 * }
 * ```
 *
 * Chunk boundaries do not need to line up with frames. The generator ends
 * when the source ends. Errors raised by the source that are already
 * {@link RpcError}s pass through; anything the decoder raises becomes a
 * {@link ProtocolError}.
 */
export async function* decodeFrames(
  source: AsyncIterable<Uint8Array>,
  codec: RpcCodec
): AsyncGenerator<Message> {
  const values = decodeMultiStream(source, {
    extensionCodec: codec.extensionCodec,
  });

  try {
    while (true) {
      let next: IteratorResult<unknown>;
      try {
        next = await values.next();
      } catch (err) {
        throw asProtocolError(err);
      }
      if (next.done) {
        return;
      }
      yield messageFromWire(next.value);
    }
  } finally {
    await values.return(undefined);
  }
}

function asProtocolError(err: unknown): RpcError {
  if (err instanceof RpcError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProtocolError(`Failed to decode frame: ${message}`, { cause: err });
}
