import { STATUS_CODES } from "node:http";
import { performance } from "node:perf_hooks";

import type { FastifyInstance, FastifyRequest } from "fastify";

import { ensureInvocationDecorator, outsideEnvelope } from "./invocation_context";
import type { InvocationLogHandle } from "./invocation_log";

export type ObservedFailure = {
  message: string;
  type: string;
};

export type Observation = {
  // Run-once marker of the observer installation.
  owner: symbol;
  startedAt: number;
  // Borrowed once the adapter has built the invocation log.
  handle: InvocationLogHandle | null;
  failure: ObservedFailure | null;
  reported: boolean;
};

declare module "fastify" {
  interface FastifyRequest {
    invocationObservation: Observation | null;
  }
}

const statusText = (status: number) => `${status} - ${STATUS_CODES[status] ?? "Unknown"}`;

export function formatObservation(args: {
  status: number;
  elapsedMs: number;
  failure: ObservedFailure | null;
}): string | null {
  const { status, elapsedMs, failure } = args;
  let kind: string;
  if (status >= 500) {
    kind = "Internal error.";
  } else if (status >= 400) {
    kind = "Client error.";
  } else {
    return null;
  }

  const detail = failure
    ? ` message: ${JSON.stringify(failure.message)}, error_type: ${JSON.stringify(failure.type)},`
    : "";
  return `${kind}${detail} status: ${statusText(status)}, duration: ${elapsedMs.toFixed(3)}ms`;
}

function ownObservation(request: FastifyRequest, token: symbol): Observation | null {
  const observation = request.invocationObservation;
  return observation && observation.owner === token ? observation : null;
}

function attach(observation: Observation, request: FastifyRequest): void {
  const log = request.invocation?.log;
  if (observation.handle || !log || log.isFinalized) return;
  observation.handle = log.borrow();
}

/**
 * Appends one diagnostic line to the invocation log for every 4xx/5xx reply,
 * including failures raised while the body is parsed or validated.
 * Never changes the status or the body.
 *
 * Requires the invocation adapter on the same routes, installed after this
 * observer (or on a parent), so the observer's onSend runs before the
 * adapter encodes the envelope.
 */
export function installErrorObserver(app: FastifyInstance): void {
  const token = Symbol("error-observer");

  ensureInvocationDecorator(app);
  if (!app.hasRequestDecorator("invocationObservation")) {
    app.decorateRequest("invocationObservation", null);
  }

  app.addHook("onRequest", async (request) => {
    if (request.invocationObservation || outsideEnvelope(request)) return;
    request.invocationObservation = {
      owner: token,
      startedAt: performance.now(),
      handle: null,
      failure: null,
      reported: false,
    };
  });

  // The body has been decoded and parsed by now.
  app.addHook("preValidation", async (request) => {
    const observation = ownObservation(request, token);
    if (!observation) return;
    if (!request.invocation?.log) {
      throw new Error("error observer requires the invocation adapter");
    }
    attach(observation, request);
  });

  app.addHook("onError", async (request, _reply, error) => {
    const observation = ownObservation(request, token);
    if (!observation) return;
    observation.failure = { message: error.message, type: error.name };
    attach(observation, request);
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const observation = ownObservation(request, token);
    if (!observation || observation.reported) return payload;
    observation.reported = true;

    attach(observation, request);
    const handle = observation.handle;
    if (!handle) return payload;

    try {
      const line = formatObservation({
        status: reply.statusCode,
        elapsedMs: performance.now() - observation.startedAt,
        failure: observation.failure,
      });
      if (line) {
        handle.log(line);
      }
    } finally {
      handle.release();
    }
    return payload;
  });
}
