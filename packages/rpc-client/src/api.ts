/**
 * Typed wrappers over `request` / `notify`.
 *
 * Each API call is declared once with its method name and a zod schema for
 * its result:
 *
 * ```ts
 * const getCurrentBuf = defineRequest<[], ExtValue>(
 *   "nvim_get_current_buf",
 *   extValueSchema("Buffer")
 * );
 * const buf = await getCurrentBuf(client);
 * ```
 */

import { z } from "zod";
import { ExtValue, ProtocolError, RemoteError } from "@nvrpc/protocol";
import type { RpcClient } from "./types.ts";

type Caller = Pick<RpcClient, "request" | "notify">;

export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Outcome of a call whose failure is an expected answer, not an exception */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

function validate<T>(method: string, schema: Schema<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<result>"}: ${issue.message}`)
      .join("; ");
    throw new ProtocolError(`Unexpected result from ${method}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Schema for a remote object handle of one kind.
 */
export function extValueSchema(kind: string): Schema<ExtValue> {
  return z
    .instanceof(ExtValue)
    .refine((value) => value.kind === kind, { message: `Expected a ${kind} handle` });
}

export function defineRequest<P extends unknown[], T>(
  method: string,
  result: Schema<T>
): (client: Caller, ...params: P) => Promise<T> {
  return async (client, ...params) => {
    const value = await client.request(method, ...params);
    return validate(method, result, value);
  };
}

export function defineNotification<P extends unknown[]>(
  method: string
): (client: Caller, ...params: P) => void {
  return (client, ...params) => {
    client.notify(method, ...params);
  };
}

/**
 * Call a Vimscript function through nvim_call_function.
 */
export async function callFunction<T>(
  client: Caller,
  name: string,
  args: unknown[],
  result: Schema<T>
): Promise<T> {
  const value = await client.request("nvim_call_function", name, args);
  return validate(`${name}()`, result, value);
}

/**
 * Read a global variable. A variable that does not exist is an `ok: false`
 * result carrying the peer's error, not an exception.
 */
export async function getVar<T>(
  client: Caller,
  name: string,
  schema: Schema<T>
): Promise<Result<T, RemoteError>> {
  try {
    const value = await client.request("nvim_get_var", name);
    return { ok: true, value: validate("nvim_get_var", schema, value) };
  } catch (err) {
    if (err instanceof RemoteError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export async function hasVar(client: Caller, name: string): Promise<boolean> {
  const result = await getVar(client, name, z.unknown());
  return result.ok;
}

export async function setVar(client: Caller, name: string, value: unknown): Promise<void> {
  await client.request("nvim_set_var", name, value);
}

export async function delVar(client: Caller, name: string): Promise<void> {
  await client.request("nvim_del_var", name);
}
