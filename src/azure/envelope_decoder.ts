import type { IncomingHttpHeaders } from "node:http";

import { EnvelopeDecodeError } from "./errors";
import type { EnvelopeProfile } from "./envelope_profile";
import { MISSING_INVOCATION_ID } from "./invocation_log";
import { isJsonObject, normalizePointer, resolvePointer } from "./json_pointer";

/** The external request as the host describes it inside the envelope. */
export type InnerRequest = {
  method: string | null;
  url: string | null;
  headers: Record<string, string>;
  query: Record<string, string>;
};

export type DecodedInvocation = {
  invocationId: string;
  body: Buffer;
  bodySource: "inner" | "outer";
  // Content type of the inner body; null when the outer body is passed through.
  contentType: string | null;
  inner: InnerRequest;
  diagnostics: string[];
};

// An inner string body without a declared type is handed on as text.
const INNER_TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

const lastValue = (value: unknown): string | null => {
  if (Array.isArray(value)) {
    return lastValue(value[value.length - 1]);
  }
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
};

const flattenMap = (value: unknown, lowerCaseKeys: boolean): Record<string, string> => {
  const out: Record<string, string> = {};
  if (!isJsonObject(value)) return out;
  for (const [key, raw] of Object.entries(value)) {
    const flat = lastValue(raw);
    if (flat !== null) {
      out[lowerCaseKeys ? key.toLowerCase() : key] = flat;
    }
  }
  return out;
};

/**
 * Invocation id from the transport header. Used on its own when the envelope
 * cannot be parsed at all.
 */
export function invocationIdFromHeaders(
  headers: IncomingHttpHeaders,
  profile: EnvelopeProfile
): string {
  if (profile.invocationId.source !== "header") return MISSING_INVOCATION_ID;
  const value = lastValue(headers[profile.invocationId.header.toLowerCase()]);
  return value && value.trim().length > 0 ? value.trim() : MISSING_INVOCATION_ID;
}

function invocationIdFromDocument(doc: unknown, pointer: string): string {
  const value = resolvePointer(doc, pointer);
  if (value === undefined || value === null) return MISSING_INVOCATION_ID;
  const rendered = typeof value === "string" ? value.trim() : JSON.stringify(value);
  return rendered.length > 0 ? rendered : MISSING_INVOCATION_ID;
}

export function parseEnvelope(raw: Buffer): unknown {
  const text = raw.toString("utf8");
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new EnvelopeDecodeError(
      `invocation envelope is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Turns the host's invocation envelope back into the request the external
 * caller made. Never fails for a missing id or body: those become diagnostics
 * and the outer body is passed through unchanged.
 */
export function decodeEnvelope(
  raw: Buffer,
  headers: IncomingHttpHeaders,
  profile: EnvelopeProfile
): DecodedInvocation {
  const doc = parseEnvelope(raw);
  const diagnostics: string[] = [];

  const invocationId =
    profile.invocationId.source === "header"
      ? invocationIdFromHeaders(headers, profile)
      : invocationIdFromDocument(doc, profile.invocationId.pointer);

  const innerDoc = resolvePointer(doc, profile.innerRequest.pointer);
  const inner: InnerRequest = isJsonObject(innerDoc)
    ? {
        method: lastValue(innerDoc.Method),
        url: lastValue(innerDoc.Url),
        headers: flattenMap(innerDoc.Headers, true),
        query: flattenMap(innerDoc.Query, false),
      }
    : { method: null, url: null, headers: {}, query: {} };

  const bodySpec = profile.innerRequest.body;
  const pointer = normalizePointer(bodySpec.pointer);
  const extracted = resolvePointer(doc, pointer);

  if (extracted === undefined) {
    diagnostics.push(`InvocationAdapter Error: "${pointer}" not found, check function.json`);
  } else if (bodySpec.as === "string" && typeof extracted === "string") {
    return {
      invocationId,
      body: Buffer.from(extracted, "utf8"),
      bodySource: "inner",
      contentType: inner.headers["content-type"] ?? INNER_TEXT_CONTENT_TYPE,
      inner,
      diagnostics,
    };
  } else if (bodySpec.as === "object" && isJsonObject(extracted)) {
    return {
      invocationId,
      body: Buffer.from(JSON.stringify(extracted), "utf8"),
      bodySource: "inner",
      contentType: "application/json",
      inner,
      diagnostics,
    };
  } else {
    const expected = bodySpec.as === "string" ? "a String" : "an Object";
    diagnostics.push(`InvocationAdapter Error: "${pointer}" not ${expected}, check function.json`);
  }

  return {
    invocationId,
    body: raw,
    bodySource: "outer",
    contentType: null,
    inner,
    diagnostics,
  };
}
