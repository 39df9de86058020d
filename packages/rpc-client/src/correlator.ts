/**
 * Matches outbound requests to their responses.
 */

import {
  createRequest,
  RemoteError,
  RequestTimeoutError,
  type RequestMessage,
} from "@nvrpc/protocol";

interface PendingRequest {
  method: string;
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
}

export interface SubmitOptions {
  /** Reject with RequestTimeoutError if no response arrives in time (ms) */
  timeout?: number;
}

export interface Correlator {
  /**
   * Allocate an id, record the call and hand the request to `send`.
   * The returned promise settles with the response.
   */
  submit(method: string, params: unknown[], options?: SubmitOptions): Promise<unknown>;

  /**
   * Settle the call with this id. Returns false (and logs) if no call is
   * waiting for it.
   */
  resolve(id: number, error: unknown, result: unknown): boolean;

  /** Reject every outstanding call; later submits reject with the same reason. */
  rejectAll(reason: Error): void;

  /** Number of calls waiting for a response */
  pendingCount(): number;
}

/**
 * @param send - writes the request; returns false if it could not be queued
 * @param closedError - error for calls submitted when `send` refuses
 */
export function createCorrelator(
  send: (request: RequestMessage) => boolean,
  closedError: () => Error
): Correlator {
  const pendingRequests = new Map<number, PendingRequest>();
  let nextRequestId = 1;
  let rejectedWith: Error | undefined;

  function submit(
    method: string,
    params: unknown[],
    options: SubmitOptions = {}
  ): Promise<unknown> {
    return new Promise((resolve, reject) => {
      if (rejectedWith) {
        reject(rejectedWith);
        return;
      }

      const id = nextRequestId++;
      const pending: PendingRequest = { method, resolve, reject };

      if (options.timeout !== undefined) {
        const timeout = options.timeout;
        pending.timeoutId = setTimeout(() => {
          pendingRequests.delete(id);
          reject(new RequestTimeoutError(method, timeout));
        }, timeout);
      }

      pendingRequests.set(id, pending);

      let queued: boolean;
      try {
        queued = send(createRequest(id, method, params));
      } catch (err) {
        // Encoding failed: nothing went out for this id
        settle(id);
        reject(err);
        return;
      }
      if (!queued) {
        settle(id);
        reject(closedError());
      }
    });
  }

  function settle(id: number): PendingRequest | undefined {
    const pending = pendingRequests.get(id);
    if (pending) {
      pendingRequests.delete(id);
      if (pending.timeoutId) clearTimeout(pending.timeoutId);
    }
    return pending;
  }

  function resolve(id: number, error: unknown, result: unknown): boolean {
    const pending = settle(id);
    if (!pending) {
      console.warn(`No pending request for response id: ${id}`);
      return false;
    }

    if (error !== null && error !== undefined) {
      pending.reject(new RemoteError(error, pending.method));
    } else {
      pending.resolve(result);
    }
    return true;
  }

  function rejectAll(reason: Error): void {
    rejectedWith ??= reason;
    for (const [id, pending] of pendingRequests) {
      if (pending.timeoutId) clearTimeout(pending.timeoutId);
      pendingRequests.delete(id);
      pending.reject(reason);
    }
  }

  return {
    submit,
    resolve,
    rejectAll,
    pendingCount: () => pendingRequests.size,
  };
}
