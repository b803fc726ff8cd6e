/**
 * Mocha bootstrap keeping the suite hermetic:
 *
 * 1. `Math.random` is replaced by a Park–Miller generator seeded from
 *    `TEST_RANDOM_SEED` so any randomised helper replays identically.
 * 2. Outbound connections through `net.Socket#connect` and `fetch` throw an
 *    `E-NETWORK-BLOCKED` error. The engine never needs the network.
 *
 * The original implementations are restored once the run finishes.
 */

import { after, before } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

export const DEFAULT_TEST_RANDOM_SEED = process.env.TEST_RANDOM_SEED ?? "nodegraph::tests";

/** Folds the token into a strictly positive 31-bit seed. */
function deriveSeed(token: string): number {
  let hash = 0;
  for (let index = 0; index < token.length; index += 1) {
    hash = (hash * 31 + token.charCodeAt(index)) % 2147483647;
  }
  return hash > 0 ? hash : 1;
}

function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 48271) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

class NetworkBlockedError extends Error {
  readonly code = "E-NETWORK-BLOCKED";

  constructor(channel: string) {
    super(`network access via ${channel} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

before(() => {
  const originalRandom = Math.random;
  Math.random = seededRandom(deriveSeed(DEFAULT_TEST_RANDOM_SEED));
  restores.push(() => {
    Math.random = originalRandom;
  });

  const originalConnect = Socket.prototype.connect;
  Socket.prototype.connect = function blockedConnect(): never {
    throw new NetworkBlockedError("net.Socket#connect");
  };
  restores.push(() => {
    Socket.prototype.connect = originalConnect;
  });

  const originalFetch = globalThis.fetch;
  globalThis.fetch = async (): Promise<never> => {
    throw new NetworkBlockedError("fetch");
  };
  restores.push(() => {
    globalThis.fetch = originalFetch;
  });
});

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
