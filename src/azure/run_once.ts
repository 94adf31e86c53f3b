import type { FastifyRequest } from "fastify";

import type { EnvelopeProfile } from "./envelope_profile";
import type { InvocationContext } from "./invocation_context";

export function hasRun(request: FastifyRequest): boolean {
  return request.invocation !== null;
}

export function markRun(
  request: FastifyRequest,
  owner: symbol,
  profile: EnvelopeProfile
): InvocationContext {
  const ctx: InvocationContext = {
    owner,
    profile,
    log: null,
    inner: null,
    bodySource: null,
    encoded: false,
  };
  request.invocation = ctx;
  return ctx;
}

/** The context, but only for the installation that marked the request. */
export function ownedBy(request: FastifyRequest, owner: symbol): InvocationContext | null {
  const ctx = request.invocation;
  return ctx && ctx.owner === owner ? ctx : null;
}
