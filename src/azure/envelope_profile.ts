import { z } from "zod";

export const INVOCATION_ID_HEADER = "x-azure-functions-invocationid";

const InvocationIdSourceSchema = z.discriminatedUnion("source", [
  z.object({
    source: z.literal("header"),
    header: z.string().min(1).default(INVOCATION_ID_HEADER),
  }).strict(),
  z.object({
    source: z.literal("pointer"),
    pointer: z.string().min(1),
  }).strict(),
]);

/**
 * How one deployment lays out its invocation envelopes.
 *
 * The binding names inside the pointers (`req`, `res`) must match the names
 * declared in the function's `function.json`.
 */
export const EnvelopeProfileSchema = z.object({
  name: z.string().min(1),
  invocationId: InvocationIdSourceSchema,
  innerRequest: z.object({
    // Object holding Method / Url / Headers / Query of the external request.
    pointer: z.string().min(1),
    body: z.object({
      pointer: z.string().min(1),
      as: z.enum(["string", "object"]),
    }).strict(),
  }).strict(),
  output: z.object({
    shape: z.enum(["outputs", "return-value"]),
    binding: z.string().min(1).default("res"),
    headers: z.enum(["location", "all"]),
  }).strict(),
  // The host drops `Logs` for any transport status other than 200.
  forceOkStatus: z.boolean(),
}).strict();

export type EnvelopeProfile = z.infer<typeof EnvelopeProfileSchema>;
export type EnvelopeProfileName = "http" | "metadata" | "return-value";

export const ENVELOPE_PROFILES: Record<EnvelopeProfileName, EnvelopeProfile> = {
  http: {
    name: "http",
    invocationId: { source: "header", header: INVOCATION_ID_HEADER },
    innerRequest: {
      pointer: "/Data/req",
      body: { pointer: "/Data/req/Body", as: "string" },
    },
    output: { shape: "outputs", binding: "res", headers: "location" },
    forceOkStatus: true,
  },
  // Legacy: id carried in the envelope metadata, every response header forwarded.
  metadata: {
    name: "metadata",
    invocationId: { source: "pointer", pointer: "/Metadata/Id" },
    innerRequest: {
      pointer: "/Data/req",
      body: { pointer: "/Data/req/Body", as: "string" },
    },
    output: { shape: "outputs", binding: "res", headers: "all" },
    forceOkStatus: true,
  },
  // Legacy: JSON body delivered as a sub-object, reply through `$return`.
  "return-value": {
    name: "return-value",
    invocationId: { source: "pointer", pointer: "/Metadata/Id" },
    innerRequest: {
      pointer: "/Data/req",
      body: { pointer: "/Data/req/Body", as: "object" },
    },
    output: { shape: "return-value", binding: "res", headers: "location" },
    forceOkStatus: false,
  },
};

export const DEFAULT_ENVELOPE_PROFILE = ENVELOPE_PROFILES.http;

export function resolveEnvelopeProfile(
  name: EnvelopeProfileName,
  overrides: { forceOkStatus?: boolean } = {}
): EnvelopeProfile {
  const base = ENVELOPE_PROFILES[name];
  return EnvelopeProfileSchema.parse({
    ...base,
    ...(overrides.forceOkStatus !== undefined ? { forceOkStatus: overrides.forceOkStatus } : {}),
  });
}
