import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";

import { installInvocationAdapter } from "./azure/adapter";
import { DEFAULT_ENVELOPE_PROFILE, type EnvelopeProfile } from "./azure/envelope_profile";
import { installErrorObserver } from "./azure/error_observer";
import type { MemberDirectory } from "./members/member_directory";
import { membershipCheckRoutes } from "./routes/membership_check";
import { pingRoutes } from "./routes/ping";

export type BuildServerOptions = {
  logger?: FastifyBaseLogger;
  envelopeProfile?: EnvelopeProfile;
  members?: MemberDirectory;
};

/**
 * Every route except the host's probe answers in envelopes, unknown paths
 * included. `/Membership-Check` needs a `MemberDirectory`: pass an
 * implementation of that interface as `members` to serve it.
 */
export function buildServer(opts: BuildServerOptions = {}): FastifyInstance {
  const app = opts.logger ? Fastify({ logger: opts.logger }) : Fastify({ logger: false });
  const profile = opts.envelopeProfile ?? DEFAULT_ENVELOPE_PROFILE;

  // The observer goes first so it reports before the envelope is sealed.
  installErrorObserver(app);
  installInvocationAdapter(app, { profile });

  app.register(pingRoutes);

  if (opts.members) {
    app.register(membershipCheckRoutes, { members: opts.members });
  } else {
    app.log.error(
      { evt: "functions.membership_check.disabled" },
      "functions.membership_check.disabled"
    );
  }

  return app;
}
