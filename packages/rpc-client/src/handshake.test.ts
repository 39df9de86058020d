import { describe, it } from "node:test";
import assert from "node:assert";
import { createCodec, ProtocolError } from "@nvrpc/protocol";
import { parseApiInfo, performHandshake, type HandshakeContext } from "./handshake.ts";
import type { ClientState } from "./types.ts";

const METADATA = {
  version: { major: 0, minor: 10, patch: 0, api_level: 12 },
  types: {
    Buffer: { id: 0, prefix: "nvim_buf_" },
    Window: { id: 1, prefix: "nvim_win_" },
    Tabpage: { id: 2, prefix: "nvim_tabpage_" },
  },
  error_types: { Exception: { id: 0 }, Validation: { id: 1 } },
  functions: [],
};

function setup(apiInfo: unknown, requiredExtTypes: readonly string[] = ["Buffer", "Window", "Tabpage"]) {
  const calls: Array<{ kind: "notify" | "request"; method: string; params: unknown[] }> = [];
  const states: ClientState[] = [];
  const codec = createCodec();
  const ctx: HandshakeContext = {
    codec,
    notify(method, ...params) {
      calls.push({ kind: "notify", method, params });
    },
    async request(method, ...params) {
      calls.push({ kind: "request", method, params });
      return apiInfo;
    },
    setState(state) {
      states.push(state);
    },
    name: "test-client",
    version: { major: 1, minor: 2, patch: 3 },
    requiredExtTypes,
  };
  return { ctx, calls, states, codec };
}

describe("parseApiInfo", () => {
  it("should split channel id and metadata", () => {
    const info = parseApiInfo([3, METADATA]);

    assert.strictEqual(info.channelId, 3);
    assert.strictEqual(info.metadata.types["Window"]?.id, 1);
    assert.deepStrictEqual(info.metadata.error_types, METADATA.error_types);
  });

  it("should keep fields it does not know", () => {
    const info = parseApiInfo([1, { ...METADATA, ui_events: [] }]);

    assert.deepStrictEqual(info.metadata["ui_events"], []);
  });

  it("should reject a result that is not a pair", () => {
    assert.throws(() => parseApiInfo("nope"), {
      name: "ProtocolError",
      message: "Malformed API metadata: <root>: Expected array, received string",
    });
  });

  it("should reject an ext code outside 0..127", () => {
    assert.throws(
      () => parseApiInfo([1, { ...METADATA, types: { Buffer: { id: 200 } } }]),
      ProtocolError
    );
  });

  it("should reject metadata without error_types", () => {
    assert.throws(() => parseApiInfo([1, { types: METADATA.types }]), {
      message: "Malformed API metadata: 1.error_types: Required",
    });
  });
});

describe("performHandshake", () => {
  it("should announce the client before asking for API info", async () => {
    const { ctx, calls } = setup([3, METADATA]);

    await performHandshake(ctx);

    assert.deepStrictEqual(calls, [
      {
        kind: "notify",
        method: "nvim_set_client_info",
        params: ["test-client", { major: 1, minor: 2, patch: 3 }, "remote", [], {}],
      },
      { kind: "request", method: "nvim_get_api_info", params: [] },
    ]);
  });

  it("should walk through the handshake states", async () => {
    const { ctx, states } = setup([3, METADATA]);

    await performHandshake(ctx);

    assert.deepStrictEqual(states, [
      "handshake-client-info",
      "handshake-capabilities",
      "handshake-ext-types",
    ]);
  });

  it("should register every described type", async () => {
    const { ctx, codec } = setup([3, METADATA]);

    const info = await performHandshake(ctx);

    assert.strictEqual(info.channelId, 3);
    assert.strictEqual(codec.kindOf(0), "Buffer");
    assert.strictEqual(codec.kindOf(1), "Window");
    assert.strictEqual(codec.kindOf(2), "Tabpage");
  });

  it("should fail when a required kind is missing", async () => {
    const { ctx, codec } = setup([1, { ...METADATA, types: { Buffer: { id: 0 } } }]);

    await assert.rejects(performHandshake(ctx), {
      name: "ProtocolError",
      message: "API metadata does not describe required types: Window, Tabpage",
    });
    assert.strictEqual(codec.kindOf(0), undefined);
  });

  it("should accept fewer kinds when fewer are required", async () => {
    const { ctx, codec } = setup([1, { ...METADATA, types: { Buffer: { id: 0 } } }], ["Buffer"]);

    await performHandshake(ctx);

    assert.strictEqual(codec.codeOf("Buffer"), 0);
  });

  it("should fail when two kinds share a code", async () => {
    const { ctx } = setup(
      [1, { ...METADATA, types: { Buffer: { id: 0 }, Window: { id: 0 }, Tabpage: { id: 2 } } }]
    );

    await assert.rejects(performHandshake(ctx), {
      name: "ProtocolError",
      message: "Cannot register ext type Window: Ext type code 0 already registered for Buffer",
    });
  });
});
