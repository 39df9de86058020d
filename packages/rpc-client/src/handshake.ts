/**
 * Startup handshake: announce the client, fetch API metadata, register
 * the ext type codes the peer uses for remote objects.
 */

import { z } from "zod";
import { ProtocolError, RemoteObjectKind, type RpcCodec } from "@nvrpc/protocol";
import type { ClientState, ClientVersion } from "./types.ts";

export const DEFAULT_CLIENT_NAME = "nvrpc";

export const DEFAULT_CLIENT_VERSION: ClientVersion = { major: 0, minor: 1, patch: 0 };

export const DEFAULT_REQUIRED_EXT_TYPES: readonly string[] = [
  RemoteObjectKind.BUFFER,
  RemoteObjectKind.WINDOW,
  RemoteObjectKind.TABPAGE,
];

// ============================================================================
// Schemas
// ============================================================================

const TypeEntrySchema = z
  .object({
    id: z.number().int().min(0).max(127),
    prefix: z.string().optional(),
  })
  .passthrough();

export const ApiMetadataSchema = z
  .object({
    types: z.record(z.string(), TypeEntrySchema),
    error_types: z.record(z.string(), z.object({ id: z.number().int() }).passthrough()),
    version: z
      .object({
        major: z.number().int(),
        minor: z.number().int(),
        patch: z.number().int(),
        api_level: z.number().int().optional(),
      })
      .passthrough()
      .optional(),
    functions: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const ApiInfoSchema = z.tuple([z.number().int().min(0), ApiMetadataSchema]);

export type ApiMetadata = z.infer<typeof ApiMetadataSchema>;

export interface ApiInfo {
  channelId: number;
  metadata: ApiMetadata;
}

/**
 * Validate the result of nvim_get_api_info.
 * @throws ProtocolError if it is not `[channelId, metadata]`
 */
export function parseApiInfo(value: unknown): ApiInfo {
  const parsed = ApiInfoSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Malformed API metadata: ${issues}`);
  }
  const [channelId, metadata] = parsed.data;
  return { channelId, metadata };
}

// ============================================================================
// Handshake
// ============================================================================

export interface HandshakeContext {
  codec: RpcCodec;
  notify(method: string, ...params: unknown[]): void;
  request(method: string, ...params: unknown[]): Promise<unknown>;
  setState(state: ClientState): void;
  name: string;
  version: ClientVersion;
  requiredExtTypes: readonly string[];
}

export async function performHandshake(ctx: HandshakeContext): Promise<ApiInfo> {
  ctx.setState("handshake-client-info");
  const { major, minor, patch } = ctx.version;
  ctx.notify("nvim_set_client_info", ctx.name, { major, minor, patch }, "remote", [], {});

  ctx.setState("handshake-capabilities");
  const apiInfo = parseApiInfo(await ctx.request("nvim_get_api_info"));

  const missing = ctx.requiredExtTypes.filter(
    (kind) => apiInfo.metadata.types[kind] === undefined
  );
  if (missing.length > 0) {
    throw new ProtocolError(
      `API metadata does not describe required types: ${missing.join(", ")}`
    );
  }

  ctx.setState("handshake-ext-types");
  for (const [kind, entry] of Object.entries(apiInfo.metadata.types)) {
    try {
      ctx.codec.registerExtType(entry.id, kind);
    } catch (err) {
      throw new ProtocolError(
        `Cannot register ext type ${kind}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  return apiInfo;
}
