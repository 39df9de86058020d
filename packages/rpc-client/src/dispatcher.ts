/**
 * Routes inbound notifications and requests to registered handlers.
 *
 * Each invocation runs on its own: the receive loop never waits for a
 * handler. Request handlers answer with a response message; a handler that
 * throws answers with its error description instead.
 */

import {
  createResponse,
  describeError,
  DuplicateHandlerError,
  HandlerError,
  MessageType,
  type InboundCall,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from "@nvrpc/protocol";
import type { NotificationHandler, RequestHandler } from "./types.ts";

export interface Dispatcher {
  /** @throws DuplicateHandlerError if the method already has a notification handler */
  onNotify(method: string, handler: NotificationHandler): void;

  /** @throws DuplicateHandlerError if the method already has a request handler */
  onRequest(method: string, handler: RequestHandler): void;

  /** Route one inbound message. Never throws and never waits for the handler. */
  handle(message: InboundCall): void;

  /**
   * Stop buffering unhandled messages. Messages still buffered are routed
   * on the next macrotask, after callers had a chance to register.
   */
  ready(): void;

  /** Drop buffered messages and ignore further input */
  close(): void;

  /** Settles when every handler invocation started so far has finished */
  idle(): Promise<void>;
}

/**
 * @param respond - queues a response frame; returns false if the connection is gone
 */
export function createDispatcher(
  respond: (response: ResponseMessage) => boolean
): Dispatcher {
  const notificationHandlers = new Map<string, NotificationHandler>();
  const requestHandlers = new Map<string, RequestHandler>();
  const inFlight = new Set<Promise<void>>();
  // Messages that arrived before the client was ready and had no handler yet
  let buffered: InboundCall[] = [];
  let isReady = false;
  let closed = false;

  function track(work: Promise<void>): void {
    inFlight.add(work);
    void work.finally(() => inFlight.delete(work));
  }

  function handlerFor(message: InboundCall): boolean {
    return message.type === MessageType.REQUEST
      ? requestHandlers.has(message.method)
      : notificationHandlers.has(message.method);
  }

  function dispatchNotification(message: NotificationMessage): void {
    const handler = notificationHandlers.get(message.method);
    if (!handler) {
      console.warn(`No handler for notification: ${message.method}`, message.params);
      return;
    }

    track(
      (async () => {
        try {
          await handler(...message.params);
        } catch (err) {
          console.error(`Notification handler failed: ${message.method}`, err);
        }
      })()
    );
  }

  function dispatchRequest(message: RequestMessage): void {
    const handler = requestHandlers.get(message.method);
    if (!handler) {
      // The peer's call stays unanswered; that is for the caller to deal with
      console.warn(
        `No handler for request: ${message.method} (id ${message.id})`,
        message.params
      );
      return;
    }

    track(
      (async () => {
        let response: ResponseMessage;
        try {
          const result = await handler(...message.params);
          response = createResponse(message.id, null, result ?? null);
        } catch (err) {
          const failure = new HandlerError(message.method, err);
          console.error(`Request handler failed: ${message.method}`, err);
          response = createResponse(message.id, failure.message, null);
        }

        try {
          if (!respond(response)) {
            console.warn(
              `Connection closed before responding to ${message.method} (id ${message.id})`
            );
          }
        } catch (err) {
          // The result could not be encoded; tell the peer instead of leaving it waiting
          console.error(`Failed to send response for ${message.method}`, err);
          respond(createResponse(message.id, describeError(err), null));
        }
      })()
    );
  }

  function dispatch(message: InboundCall): void {
    if (message.type === MessageType.REQUEST) {
      dispatchRequest(message);
    } else {
      dispatchNotification(message);
    }
  }

  function flushBuffered(method: string): void {
    const matching = buffered.filter((m) => m.method === method && handlerFor(m));
    if (matching.length === 0) {
      return;
    }
    buffered = buffered.filter((m) => !matching.includes(m));
    for (const message of matching) {
      dispatch(message);
    }
  }

  function register<H>(
    handlers: Map<string, H>,
    method: string,
    handler: H
  ): void {
    if (handlers.has(method)) {
      throw new DuplicateHandlerError(method);
    }
    handlers.set(method, handler);
    flushBuffered(method);
  }

  return {
    onNotify(method, handler) {
      register(notificationHandlers, method, handler);
    },

    onRequest(method, handler) {
      register(requestHandlers, method, handler);
    },

    handle(message) {
      if (closed) {
        return;
      }
      if (!isReady && !handlerFor(message)) {
        buffered.push(message);
        return;
      }
      dispatch(message);
    },

    ready() {
      if (isReady) {
        return;
      }
      isReady = true;
      setImmediate(() => {
        const remaining = buffered;
        buffered = [];
        for (const message of remaining) {
          if (!closed) dispatch(message);
        }
      });
    },

    close() {
      closed = true;
      buffered = [];
    },

    async idle() {
      while (inFlight.size > 0) {
        await Promise.allSettled(inFlight);
      }
    },
  };
}
