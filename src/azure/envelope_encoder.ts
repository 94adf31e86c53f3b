import { Readable } from "node:stream";

import type { EnvelopeProfile } from "./envelope_profile";

export type CapturedResponse = {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
};

export type OutputsEnvelope = {
  Outputs: Record<string, CapturedResponse>;
  Logs: string[];
};

export type ReturnValueEnvelope = {
  ReturnValue: string;
  Logs: string[];
};

export type OutboundEnvelope = OutputsEnvelope | ReturnValueEnvelope;

type HeaderBag = Record<string, number | string | string[] | undefined>;

// Framing headers describe the envelope reply, not the external response.
const FRAMING_HEADERS = new Set(["content-length", "transfer-encoding", "connection"]);

const headerText = (value: number | string | string[]): string =>
  Array.isArray(value) ? value.join(", ") : String(value);

export function selectHeaders(
  headers: HeaderBag,
  mode: EnvelopeProfile["output"]["headers"]
): Record<string, string> {
  const out: Record<string, string> = {};

  if (mode === "location") {
    const location = headers.location;
    if (location !== undefined) {
      out.location = headerText(location);
    }
    return out;
  }

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const key = name.toLowerCase();
    if (FRAMING_HEADERS.has(key)) continue;
    out[key] = headerText(value);
  }
  return out;
}

export async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

/** Reads whatever Fastify is about to send as UTF-8 text. */
export async function payloadToText(payload: unknown): Promise<string> {
  if (payload === null || payload === undefined) return "";
  if (typeof payload === "string") return payload;
  if (Buffer.isBuffer(payload)) return payload.toString("utf8");

  if (payload instanceof Readable) {
    return (await readStream(payload)).toString("utf8");
  }

  return JSON.stringify(payload);
}

export function encodeEnvelope(
  response: CapturedResponse,
  logs: string[],
  profile: EnvelopeProfile
): OutboundEnvelope {
  if (profile.output.shape === "return-value") {
    return {
      ReturnValue: response.body,
      Logs: logs,
    };
  }

  return {
    Outputs: {
      [profile.output.binding]: {
        statusCode: response.statusCode,
        headers: response.headers,
        body: response.body,
      },
    },
    Logs: logs,
  };
}
