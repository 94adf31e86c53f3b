import { PassThrough, type Readable } from "node:stream";

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import { decodeEnvelope, invocationIdFromHeaders, type DecodedInvocation } from "./envelope_decoder";
import { encodeEnvelope, payloadToText, readStream, selectHeaders } from "./envelope_encoder";
import { DEFAULT_ENVELOPE_PROFILE, type EnvelopeProfile } from "./envelope_profile";
import {
  ensureInvocationDecorator,
  outsideEnvelope,
  type InvocationContext,
} from "./invocation_context";
import { InvocationLog } from "./invocation_log";
import { hasRun, markRun, ownedBy } from "./run_once";

export type InvocationAdapterOptions = {
  profile?: EnvelopeProfile;
};

const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

const newLog = (request: FastifyRequest, invocationId: string) =>
  new InvocationLog(invocationId, { mirror: request.log });

function decodeOrRecord(
  request: FastifyRequest,
  ctx: InvocationContext,
  raw: Buffer
): DecodedInvocation {
  try {
    return decodeEnvelope(raw, request.headers, ctx.profile);
  } catch (error) {
    // The reply still goes out as an envelope, carrying this line.
    const log = newLog(request, invocationIdFromHeaders(request.headers, ctx.profile));
    log.append(`InvocationAdapter Error: ${error instanceof Error ? error.message : String(error)}`);
    ctx.log = log;
    request.log.warn(
      { evt: "azure.envelope.decode_failed", invocationId: log.invocationId },
      "azure.envelope.decode_failed"
    );
    throw error;
  }
}

async function decodeStage(
  request: FastifyRequest,
  ctx: InvocationContext,
  payload: Readable
): Promise<Readable> {
  const decoded = decodeOrRecord(request, ctx, await readStream(payload));

  const log = newLog(request, decoded.invocationId);
  for (const line of decoded.diagnostics) {
    log.append(line);
  }
  ctx.log = log;
  ctx.inner = decoded.inner;
  ctx.bodySource = decoded.bodySource;

  // The body parser picks its parser and checks the length from these headers.
  const headers = request.raw.headers;
  if (decoded.contentType) {
    headers["content-type"] = decoded.contentType;
  }
  headers["content-length"] = String(decoded.body.length);
  delete headers["transfer-encoding"];

  const stream = new PassThrough();
  stream.end(decoded.body);
  return stream;
}

async function encodeStage(
  request: FastifyRequest,
  reply: FastifyReply,
  ctx: InvocationContext,
  payload: unknown
): Promise<string> {
  const log = ctx.log ?? newLog(request, invocationIdFromHeaders(request.headers, ctx.profile));

  let logs: string[];
  try {
    logs = log.finalize();
  } catch (error) {
    request.log.fatal(
      { evt: "azure.invocation_log.ownership_violation", invocationId: log.invocationId, err: error },
      "azure.invocation_log.ownership_violation"
    );
    throw error;
  }

  const envelope = encodeEnvelope(
    {
      statusCode: reply.statusCode,
      headers: selectHeaders(reply.getHeaders(), ctx.profile.output.headers),
      body: await payloadToText(payload),
    },
    logs,
    ctx.profile
  );

  reply.removeHeader("content-length");
  reply.header("content-type", JSON_CONTENT_TYPE);
  if (ctx.profile.forceOkStatus) {
    reply.code(200);
  }

  return JSON.stringify(envelope);
}

/**
 * Speaks the Azure Functions custom handler protocol on behalf of the routes
 * of `app` (and of its child contexts).
 *
 * The function's `function.json` must name its bindings `req` (httpTrigger,
 * in) and `res` (http, out), matching the profile's pointers.
 *
 * Installing this on a parent and again on a nested plugin is allowed: the
 * outermost installation claims the request and the others pass it through.
 * Routes declared with `config: { invocationEnvelope: false }` are left alone.
 */
export function installInvocationAdapter(
  app: FastifyInstance,
  opts: InvocationAdapterOptions = {}
): void {
  const profile = opts.profile ?? DEFAULT_ENVELOPE_PROFILE;
  const token = Symbol("invocation-adapter");

  ensureInvocationDecorator(app);

  app.addHook("onRequest", async (request) => {
    if (hasRun(request) || outsideEnvelope(request)) return;
    markRun(request, token, profile);
  });

  app.addHook("preParsing", async (request, _reply, payload) => {
    const ctx = ownedBy(request, token);
    if (!ctx) return payload;
    return decodeStage(request, ctx, payload);
  });

  app.addHook("onSend", async (request, reply, payload) => {
    const ctx = ownedBy(request, token);
    // Error replies produced while encoding come back through here untouched.
    if (!ctx || ctx.encoded) return payload;
    ctx.encoded = true;
    return encodeStage(request, reply, ctx, payload);
  });
}
