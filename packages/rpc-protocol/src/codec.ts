/**
 * MessagePack codec with peer-defined extension types.
 *
 * The peer announces its remote object kinds (Buffer, Window, Tabpage, ...)
 * and their ext type codes during the handshake. Each code is registered
 * here and maps to an {@link ExtValue} carrying the raw payload.
 */

import { encode, decode, ExtensionCodec, ExtData } from "@msgpack/msgpack";
import { EncodingError, ProtocolError } from "./errors.ts";

// ============================================================================
// Extension Values
// ============================================================================

/**
 * Remote object kinds a client needs to decode.
 */
export const RemoteObjectKind = {
  BUFFER: "Buffer",
  WINDOW: "Window",
  TABPAGE: "Tabpage",
} as const;

export type RemoteObjectKind =
  (typeof RemoteObjectKind)[keyof typeof RemoteObjectKind];

/**
 * Opaque handle to a remote object. The payload is never interpreted here.
 */
export class ExtValue {
  readonly kind: string;
  readonly code: number;
  readonly data: Uint8Array;

  constructor(kind: string, code: number, data: Uint8Array) {
    this.kind = kind;
    this.code = code;
    this.data = data;
  }

  equals(other: unknown): boolean {
    if (!isExtValue(other) || other.code !== this.code) {
      return false;
    }
    if (other.data.length !== this.data.length) {
      return false;
    }
    return this.data.every((byte, i) => other.data[i] === byte);
  }

  toString(): string {
    const hex = Array.from(this.data, (b) => b.toString(16).padStart(2, "0"));
    return `${this.kind}(${hex.join("")})`;
  }
}

export function isExtValue(value: unknown): value is ExtValue {
  return value instanceof ExtValue;
}

// ============================================================================
// Extension Codec
// ============================================================================

/**
 * ExtensionCodec that refuses what it does not know instead of passing it
 * through: unknown ext codes on decode, and unregistered handles or
 * class instances on encode.
 */
class RemoteExtensionCodec extends ExtensionCodec {
  readonly kinds = new Map<number, string>();

  override tryToEncode(object: unknown, context: undefined): ExtData | null {
    const ext = super.tryToEncode(object, context);
    if (ext !== null) {
      return ext;
    }
    if (isExtValue(object)) {
      throw new EncodingError(
        `Unregistered ext type code ${object.code} for ${object.kind}`
      );
    }
    if (!isEncodableObject(object)) {
      throw new EncodingError(
        `Cannot encode ${Object.prototype.toString.call(object)}: not a plain object`
      );
    }
    return null;
  }

  override decode(data: Uint8Array, type: number, context: undefined): unknown {
    // Negative codes are reserved by msgpack itself (timestamp)
    if (type >= 0 && !this.kinds.has(type)) {
      throw new ProtocolError(`Unregistered ext type code: ${type}`);
    }
    return super.decode(data, type, context);
  }
}

function isEncodableObject(value: unknown): boolean {
  if (typeof value !== "object" || value === null) {
    return true;
  }
  if (Array.isArray(value) || ArrayBuffer.isView(value)) {
    return true;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Codec bound to one connection's ext type table.
 */
export interface RpcCodec {
  /** The underlying msgpack extension codec */
  readonly extensionCodec: ExtensionCodec;

  /**
   * Register an ext type code for a remote object kind.
   * @throws Error if the code is already bound to a different kind
   */
  registerExtType(code: number, kind: string): void;

  /** Kind registered for a code, if any */
  kindOf(code: number): string | undefined;

  /** Code registered for a kind, if any */
  codeOf(kind: string): number | undefined;

  encode(value: unknown): Uint8Array;

  decode(data: Uint8Array): unknown;
}

/**
 * Create a codec with an empty ext type table.
 */
export function createCodec(): RpcCodec {
  const extensionCodec = new RemoteExtensionCodec();

  function registerExtType(code: number, kind: string): void {
    if (!Number.isInteger(code) || code < 0 || code > 127) {
      throw new Error(`Invalid ext type code for ${kind}: ${code}`);
    }
    const existing = extensionCodec.kinds.get(code);
    if (existing !== undefined) {
      if (existing !== kind) {
        throw new Error(
          `Ext type code ${code} already registered for ${existing}`
        );
      }
      return;
    }

    extensionCodec.kinds.set(code, kind);
    extensionCodec.register({
      type: code,
      encode: (value: unknown): Uint8Array | null => {
        if (isExtValue(value) && value.code === code) {
          return value.data;
        }
        return null;
      },
      decode: (data: Uint8Array): ExtValue => {
        // Copy: the decoder hands out a view into its read buffer
        return new ExtValue(kind, code, new Uint8Array(data));
      },
    });
  }

  function codeOf(kind: string): number | undefined {
    for (const [code, registered] of extensionCodec.kinds) {
      if (registered === kind) {
        return code;
      }
    }
    return undefined;
  }

  return {
    extensionCodec,
    registerExtType,
    kindOf: (code) => extensionCodec.kinds.get(code),
    codeOf,
    encode: (value) => encode(value, { extensionCodec }),
    decode: (data) => decode(data, { extensionCodec }),
  };
}

// ============================================================================
// Helper Functions for Creating Extension Values
// ============================================================================

/**
 * Create a handle for a registered kind.
 * @throws EncodingError if the kind has no registered code
 */
export function createExtValue(
  codec: RpcCodec,
  kind: string,
  data: Uint8Array
): ExtValue {
  const code = codec.codeOf(kind);
  if (code === undefined) {
    throw new EncodingError(`No ext type code registered for ${kind}`);
  }
  return new ExtValue(kind, code, data);
}
