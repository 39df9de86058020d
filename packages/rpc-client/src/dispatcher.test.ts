import { describe, it, mock, afterEach } from "node:test";
import assert from "node:assert";
import {
  createNotification,
  createRequest,
  DuplicateHandlerError,
  EncodingError,
  type ResponseMessage,
} from "@nvrpc/protocol";
import { createDispatcher } from "./dispatcher.ts";

function setup() {
  const responses: ResponseMessage[] = [];
  const dispatcher = createDispatcher((response) => {
    responses.push(response);
    return true;
  });
  return { dispatcher, responses };
}

function nextMacrotask(): Promise<void> {
  return new Promise((resolve) => setImmediate(() => resolve()));
}

describe("dispatcher", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe("requests", () => {
    it("should respond with the handler result", async () => {
      const { dispatcher, responses } = setup();
      dispatcher.onRequest("add", (a, b) => Number(a) + Number(b));
      dispatcher.ready();

      dispatcher.handle(createRequest(5, "add", [1, 2]));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [{ type: 1, id: 5, error: null, result: 3 }]);
    });

    it("should respond with null when the handler returns nothing", async () => {
      const { dispatcher, responses } = setup();
      dispatcher.onRequest("noop", () => undefined);
      dispatcher.ready();

      dispatcher.handle(createRequest(1, "noop", []));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [{ type: 1, id: 1, error: null, result: null }]);
    });

    it("should respond with the error description when the handler throws", async () => {
      mock.method(console, "error", () => {});
      const { dispatcher, responses } = setup();
      dispatcher.onRequest("ping", () => {
        throw new Error("boom");
      });
      dispatcher.ready();

      dispatcher.handle(createRequest(7, "ping", []));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [
        { type: 1, id: 7, error: "Error: boom", result: null },
      ]);
    });

    it("should respond with the error description when an async handler rejects", async () => {
      mock.method(console, "error", () => {});
      const { dispatcher, responses } = setup();
      dispatcher.onRequest("check", async () => {
        throw new TypeError("bad arg");
      });
      dispatcher.ready();

      dispatcher.handle(createRequest(2, "check", []));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [
        { type: 1, id: 2, error: "TypeError: bad arg", result: null },
      ]);
    });

    it("should send a fallback error when the result cannot be encoded", async () => {
      mock.method(console, "error", () => {});
      const responses: ResponseMessage[] = [];
      let attempts = 0;
      const dispatcher = createDispatcher((response) => {
        attempts++;
        if (attempts === 1) {
          throw new EncodingError("Cannot encode [object Map]: not a plain object");
        }
        responses.push(response);
        return true;
      });
      dispatcher.onRequest("get", () => new Map());
      dispatcher.ready();

      dispatcher.handle(createRequest(3, "get", []));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [
        {
          type: 1,
          id: 3,
          error: "EncodingError: Cannot encode [object Map]: not a plain object",
          result: null,
        },
      ]);
    });

    it("should leave a request without handler unanswered", async () => {
      const warn = mock.method(console, "warn", () => {});
      const { dispatcher, responses } = setup();
      dispatcher.ready();

      dispatcher.handle(createRequest(9, "unknown", [1]));
      await dispatcher.idle();

      assert.deepStrictEqual(responses, []);
      assert.deepStrictEqual(warn.mock.calls[0]?.arguments, [
        "No handler for request: unknown (id 9)",
        [1],
      ]);
    });

    it("should not wait for one handler before starting the next", async () => {
      const { dispatcher, responses } = setup();
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const order: string[] = [];

      dispatcher.onRequest("slow", async () => {
        await gate;
        order.push("slow");
        return "slow";
      });
      dispatcher.onNotify("fast", () => {
        order.push("fast");
      });
      dispatcher.ready();

      dispatcher.handle(createRequest(1, "slow", []));
      dispatcher.handle(createNotification("fast", []));
      assert.deepStrictEqual(order, ["fast"]);

      release();
      await dispatcher.idle();
      assert.deepStrictEqual(order, ["fast", "slow"]);
      assert.deepStrictEqual(responses, [{ type: 1, id: 1, error: null, result: "slow" }]);
    });
  });

  describe("notifications", () => {
    it("should call the handler with the params", async () => {
      const { dispatcher, responses } = setup();
      const calls: unknown[][] = [];
      dispatcher.onNotify("nvim_buf_lines_event", (...params) => {
        calls.push(params);
      });
      dispatcher.ready();

      dispatcher.handle(createNotification("nvim_buf_lines_event", [1, "a"]));
      await dispatcher.idle();

      assert.deepStrictEqual(calls, [[1, "a"]]);
      assert.deepStrictEqual(responses, []);
    });

    it("should log a failing handler and keep going", async () => {
      const error = mock.method(console, "error", () => {});
      const { dispatcher } = setup();
      const calls: unknown[] = [];
      dispatcher.onNotify("event", (value) => {
        if (value === "bad") throw new Error("bad value");
        calls.push(value);
      });
      dispatcher.ready();

      dispatcher.handle(createNotification("event", ["bad"]));
      dispatcher.handle(createNotification("event", ["good"]));
      await dispatcher.idle();

      assert.deepStrictEqual(calls, ["good"]);
      assert.strictEqual(error.mock.callCount(), 1);
      assert.strictEqual(error.mock.calls[0]?.arguments[0], "Notification handler failed: event");
    });

    it("should warn about a notification without handler", async () => {
      const warn = mock.method(console, "warn", () => {});
      const { dispatcher } = setup();
      dispatcher.ready();

      dispatcher.handle(createNotification("unknown", ["x"]));

      assert.deepStrictEqual(warn.mock.calls[0]?.arguments, [
        "No handler for notification: unknown",
        ["x"],
      ]);
    });
  });

  describe("registration", () => {
    it("should reject a second request handler for the same method", () => {
      const { dispatcher } = setup();
      dispatcher.onRequest("ping", () => "pong");

      assert.throws(
        () => dispatcher.onRequest("ping", () => "again"),
        (err: unknown) => {
          assert.ok(err instanceof DuplicateHandlerError);
          assert.strictEqual(err.message, "Handler already registered for method: ping");
          return true;
        }
      );
    });

    it("should reject a second notification handler for the same method", () => {
      const { dispatcher } = setup();
      dispatcher.onNotify("event", () => {});

      assert.throws(() => dispatcher.onNotify("event", () => {}), DuplicateHandlerError);
    });

    it("should keep request and notification handlers apart", () => {
      const { dispatcher } = setup();
      dispatcher.onNotify("both", () => {});

      assert.doesNotThrow(() => dispatcher.onRequest("both", () => null));
    });
  });

  describe("before ready", () => {
    it("should hold a message until its handler is registered", async () => {
      const { dispatcher } = setup();
      const calls: unknown[] = [];

      dispatcher.handle(createNotification("early", [1]));
      assert.strictEqual(calls.length, 0);

      dispatcher.onNotify("early", (value) => {
        calls.push(value);
      });
      await dispatcher.idle();

      assert.deepStrictEqual(calls, [1]);
    });

    it("should answer a held request once its handler is registered", async () => {
      const { dispatcher, responses } = setup();

      dispatcher.handle(createRequest(4, "early", []));
      dispatcher.onRequest("early", () => "late answer");
      await dispatcher.idle();

      assert.deepStrictEqual(responses, [
        { type: 1, id: 4, error: null, result: "late answer" },
      ]);
    });

    it("should route what is still held on the macrotask after ready", async () => {
      const warn = mock.method(console, "warn", () => {});
      const { dispatcher } = setup();
      const calls: unknown[] = [];

      dispatcher.handle(createNotification("registered-late", ["a"]));
      dispatcher.handle(createNotification("never-registered", ["b"]));
      dispatcher.ready();
      dispatcher.onNotify("registered-late", (value) => {
        calls.push(value);
      });
      assert.strictEqual(warn.mock.callCount(), 0);

      await nextMacrotask();

      assert.deepStrictEqual(calls, ["a"]);
      assert.strictEqual(warn.mock.callCount(), 1);
      assert.strictEqual(
        warn.mock.calls[0]?.arguments[0],
        "No handler for notification: never-registered"
      );
    });

    it("should drop held messages on close", async () => {
      const warn = mock.method(console, "warn", () => {});
      const { dispatcher, responses } = setup();

      dispatcher.handle(createRequest(1, "late", []));
      dispatcher.close();
      dispatcher.onRequest("late", () => "ignored");
      dispatcher.ready();
      dispatcher.handle(createRequest(2, "late", []));
      await nextMacrotask();
      await dispatcher.idle();

      assert.deepStrictEqual(responses, []);
      assert.strictEqual(warn.mock.callCount(), 0);
    });
  });
});
