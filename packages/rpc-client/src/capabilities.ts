/**
 * Per-client cache of `has()` feature checks.
 */

import { ProtocolError } from "@nvrpc/protocol";

export interface CapabilityCache {
  /** Whether the peer reports the feature (e.g. "nvim-0.10", "win32") */
  has(feature: string): Promise<boolean>;
  /** Answers already known, without asking the peer */
  peek(feature: string): boolean | undefined;
  clear(): void;
}

type Requester = (method: string, ...params: unknown[]) => Promise<unknown>;

export function createCapabilityCache(request: Requester): CapabilityCache {
  const known = new Map<string, boolean>();
  const inFlight = new Map<string, Promise<boolean>>();
  // Bumped by clear(); answers to lookups started earlier are not kept
  let generation = 0;

  async function lookup(feature: string): Promise<boolean> {
    const answer = await request("nvim_call_function", "has", [feature]);
    if (typeof answer === "boolean") {
      return answer;
    }
    if (typeof answer === "number") {
      return answer !== 0;
    }
    throw new ProtocolError(`Unexpected answer to has(${feature}): ${String(answer)}`);
  }

  return {
    has(feature: string): Promise<boolean> {
      const cached = known.get(feature);
      if (cached !== undefined) {
        return Promise.resolve(cached);
      }

      const pending = inFlight.get(feature);
      if (pending) {
        return pending;
      }

      const startedIn = generation;
      const query: Promise<boolean> = lookup(feature)
        .then((answer) => {
          if (startedIn === generation) {
            known.set(feature, answer);
          }
          return answer;
        })
        .finally(() => {
          if (inFlight.get(feature) === query) {
            inFlight.delete(feature);
          }
        });
      inFlight.set(feature, query);
      return query;
    },

    peek: (feature) => known.get(feature),

    clear(): void {
      generation++;
      known.clear();
      inFlight.clear();
    },
  };
}
