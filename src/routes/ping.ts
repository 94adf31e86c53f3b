import type { FastifyInstance } from "fastify";

// The host probes the root path with a bare GET to learn that the custom handler is listening.
export async function pingRoutes(app: FastifyInstance) {
  app.get("/", { config: { invocationEnvelope: false } }, async (_req, reply) =>
    reply.code(200).send()
  );
}
