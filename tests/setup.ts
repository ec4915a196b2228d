/**
 * Mocha bootstrap keeping the suite hermetic:
 *
 * 1. `GCM_*` variables exported in the developer's shell are removed for the
 *    duration of the run so toolchain and logging defaults are predictable.
 * 2. Outbound socket connections fail fast with `E-NETWORK-BLOCKED`. The
 *    pipeline only talks to its children through pipes, which never call
 *    `Socket#connect`.
 */
import { Socket } from "node:net";
import process from "node:process";

import { after, before } from "mocha";

import type { ErrnoException } from "../src/nodePrimitives.js";

const savedEnv = new Map<string, string | undefined>();
const originalConnect = Socket.prototype.connect;

before(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith("GCM_")) {
      savedEnv.set(key, process.env[key]);
      delete process.env[key];
    }
  }

  Socket.prototype.connect = function blockedConnect(): never {
    const error: ErrnoException = new Error("network access via net.Socket is disabled during tests");
    error.code = "E-NETWORK-BLOCKED";
    throw error;
  };
});

after(() => {
  Socket.prototype.connect = originalConnect;
  for (const [key, value] of savedEnv) {
    if (value !== undefined) {
      process.env[key] = value;
    }
  }
});
