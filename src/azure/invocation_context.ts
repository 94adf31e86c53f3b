import type { FastifyInstance, FastifyRequest } from "fastify";

import type { InnerRequest } from "./envelope_decoder";
import type { EnvelopeProfile } from "./envelope_profile";
import { withHandle, type InvocationLog, type InvocationLogHandle } from "./invocation_log";

/**
 * Everything the adapter keeps for one invocation. Lives on the request and
 * dies with it.
 */
export type InvocationContext = {
  // Run-once marker: the adapter installation that claimed this request.
  owner: symbol;
  profile: EnvelopeProfile;
  log: InvocationLog | null;
  inner: InnerRequest | null;
  bodySource: "inner" | "outer" | null;
  encoded: boolean;
};

declare module "fastify" {
  interface FastifyRequest {
    invocation: InvocationContext | null;
  }

  interface FastifyContextConfig {
    // false: the route speaks plain HTTP, e.g. the host's readiness probe.
    invocationEnvelope?: boolean;
  }
}

export function outsideEnvelope(request: FastifyRequest): boolean {
  return request.routeOptions.config.invocationEnvelope === false;
}

export function ensureInvocationDecorator(app: FastifyInstance): void {
  if (!app.hasRequestDecorator("invocation")) {
    app.decorateRequest("invocation", null);
  }
}

export function requireInvocationLog(request: FastifyRequest): InvocationLog {
  const log = request.invocation?.log;
  if (!log) {
    throw new Error("invocation adapter is not installed for this route");
  }
  return log;
}

/**
 * Lends the invocation log to `fn`. The handle is released when `fn` settles,
 * so it cannot outlive the handler that asked for it. Send the reply after
 * this resolves, not from inside `fn`: the envelope is sealed while sending.
 */
export function withInvocationLog<T>(
  request: FastifyRequest,
  fn: (log: InvocationLogHandle) => Promise<T> | T
): Promise<T> {
  return withHandle(requireInvocationLog(request), fn);
}
