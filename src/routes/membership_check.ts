import type { FastifyInstance } from "fastify";

import { z } from "zod";

import { withInvocationLog } from "../azure/invocation_context";
import type { InvocationLogHandle } from "../azure/invocation_log";
import type { MemberDirectory } from "../members/member_directory";

type MembershipCheckOptions = {
  members: MemberDirectory;
};

type Outcome = {
  status: number;
  body: string | Record<string, unknown>;
};

const MembershipCheckInput = z.object({
  email: z.string().trim().min(1),
});

// The body is JSON whatever content type the external caller declared.
const jsonBody = (body: unknown): unknown => {
  if (typeof body !== "string") return body;
  try {
    return JSON.parse(body);
  } catch {
    // Left as text, it fails the schema below.
    return body;
  }
};

const ACTIVE_STATUSES = new Set(["pending", "subscribed"]);

async function checkMembership(
  members: MemberDirectory,
  input: { innerMethod: string | null; body: unknown },
  log: InvocationLogHandle
): Promise<Outcome> {
  if (input.innerMethod && input.innerMethod.toUpperCase() !== "POST") {
    log.log(`Request method was not allowed. Was: ${input.innerMethod}`);
    return { status: 405, body: "Method Not Allowed" };
  }

  const parsed = MembershipCheckInput.safeParse(jsonBody(input.body));
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: "invalid_request", details: parsed.error.flatten() },
    };
  }

  const { email } = parsed.data;
  log.log(`Membership check - Email: ${email}`);

  const result = await members.lookup(email);

  switch (result.outcome) {
    case "found":
      return {
        status: 200,
        body: {
          membership: ACTIVE_STATUSES.has(result.member.status) ? "active" : "expired",
          expiration: result.member.mergeFields.EXPIRES ?? null,
        },
      };
    case "not_found":
      log.log(`No such member: ${email}`);
      return { status: 404, body: "No such member" };
    case "failed":
      if (result.status >= 400 && result.status < 500) {
        log.log(`Client error: ${result.status} - ${result.detail}`);
        return { status: 500, body: "Internal Server Error: member directory client error" };
      }
      log.log(`Unknown status: ${result.status} - ${result.detail}`);
      return { status: 500, body: "Internal Server Error: unknown member directory status" };
  }
}

/**
 * Membership-Check function: is this address a member, and until when.
 * The path matches the directory holding the function's `function.json`.
 */
export async function membershipCheckRoutes(app: FastifyInstance, opts: MembershipCheckOptions) {
  app.post("/Membership-Check", async (req, reply) => {
    // The log handle is released before the reply goes out.
    const outcome = await withInvocationLog(req, (log) =>
      checkMembership(
        opts.members,
        { innerMethod: req.invocation?.inner?.method ?? null, body: req.body },
        log
      )
    );

    if (typeof outcome.body === "string") {
      return reply.code(outcome.status).type("text/plain; charset=utf-8").send(outcome.body);
    }
    return reply.code(outcome.status).send(outcome.body);
  });
}
