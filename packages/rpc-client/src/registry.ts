/**
 * Plugin-side handler registry.
 *
 * Handlers are collected before a channel exists. Binding them to a client
 * registers them with the dispatcher and defines a Lua function (plus a
 * Vimscript wrapper) in the peer that calls back into this channel, so
 * editor code can invoke them by name.
 */

import { randomUUID } from "node:crypto";
import { DuplicateHandlerError } from "@nvrpc/protocol";
import type { NotificationHandler, RequestHandler, RpcClient } from "./types.ts";

export type RpcHandlerSpec =
  | { name: string; remoteName: string; blocking: true; handler: RequestHandler }
  | { name: string; remoteName: string; blocking: false; handler: NotificationHandler };

export interface DrainResult {
  /** Lua sources defining one global function per handler */
  lua: string[];
  /** Vimscript sources defining `Name(...)` wrappers around the Lua functions */
  vim: string[];
  specs: RpcHandlerSpec[];
}

export interface RpcRegistry {
  /** Handler answered through rpcrequest; its result goes back to the editor */
  request(name: string, handler: RequestHandler): RpcHandlerSpec;
  /** Handler invoked through rpcnotify */
  notify(name: string, handler: NotificationHandler): RpcHandlerSpec;
  /** Remove every registered handler and return its definitions for `channel` */
  drain(channel: number): DrainResult;
  /** Drain into a connected client and install the definitions in the peer */
  bind(client: Pick<RpcClient, "channel" | "request" | "onRequest" | "onNotify">): Promise<RpcHandlerSpec[]>;
  size(): number;
}

const HANDLER_NAME = /^[A-Za-z_][\w.]*$/;

/**
 * Unique global function name for a handler: `my.handler` becomes
 * `My_handler_<32 hex chars>`.
 */
export function remoteNameFor(name: string): string {
  const raw = `${name}_${randomUUID().replace(/-/g, "")}`.replace(/\./g, "_");
  return raw.charAt(0).toUpperCase() + raw.slice(1).toLowerCase();
}

export function luaDefinition(channel: number, spec: RpcHandlerSpec): string {
  const op = spec.blocking ? "request" : "notify";
  const invoke = `return vim.rpc${op}(${channel}, '${spec.name}', {...})`;
  return `${spec.remoteName} = function (...) ${invoke} end`;
}

export function vimDefinition(spec: RpcHandlerSpec): string {
  return [
    `function! ${spec.remoteName}(...)`,
    `  call v:lua.${spec.remoteName}(a:000)`,
    "endfunction",
  ].join("\n");
}

export function createRpcRegistry(): RpcRegistry {
  const handlers = new Map<string, RpcHandlerSpec>();

  function add(spec: RpcHandlerSpec): RpcHandlerSpec {
    if (!HANDLER_NAME.test(spec.name)) {
      throw new Error(`Invalid handler name: ${JSON.stringify(spec.name)}`);
    }
    if (handlers.has(spec.name)) {
      throw new DuplicateHandlerError(spec.name);
    }
    handlers.set(spec.name, spec);
    return spec;
  }

  function drain(channel: number): DrainResult {
    const specs = [...handlers.values()];
    handlers.clear();
    return {
      lua: specs.map((spec) => luaDefinition(channel, spec)),
      vim: specs.map(vimDefinition),
      specs,
    };
  }

  return {
    request(name, handler) {
      return add({ name, remoteName: remoteNameFor(name), blocking: true, handler });
    },

    notify(name, handler) {
      return add({ name, remoteName: remoteNameFor(name), blocking: false, handler });
    },

    drain,

    async bind(client) {
      const { lua, vim, specs } = drain(client.channel);

      for (const spec of specs) {
        if (spec.blocking) {
          client.onRequest(spec.name, spec.handler);
        } else {
          client.onNotify(spec.name, spec.handler);
        }
      }

      for (const source of lua) {
        await client.request("nvim_exec_lua", source, []);
      }
      for (const source of vim) {
        await client.request("nvim_exec2", source, { output: false });
      }

      return specs;
    },

    size: () => handlers.size,
  };
}
