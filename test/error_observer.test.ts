import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Fastify, { type FastifyInstance } from "fastify";

import { installInvocationAdapter } from "../src/azure/adapter";
import { formatObservation, installErrorObserver } from "../src/azure/error_observer";

const invoke = (app: FastifyInstance, url: string, invocationId: string) =>
  app.inject({
    method: "POST",
    url,
    headers: {
      "content-type": "application/json",
      "x-azure-functions-invocationid": invocationId,
    },
    payload: JSON.stringify({
      Data: { req: { Headers: { "Content-Type": ["text/plain"] }, Body: "x" } },
    }),
  });

const invokeJson = (app: FastifyInstance, url: string, invocationId: string, body: string) =>
  app.inject({
    method: "POST",
    url,
    headers: {
      "content-type": "application/json",
      "x-azure-functions-invocationid": invocationId,
    },
    payload: JSON.stringify({
      Data: { req: { Headers: { "Content-Type": ["application/json"] }, Body: body } },
    }),
  });

const makeApp = () => {
  const app = Fastify({ logger: false });
  installErrorObserver(app);
  installInvocationAdapter(app);

  app.post("/ok", async () => ({ ok: true }));
  app.post("/missing", async (_req, reply) => reply.code(404).send({ error: "not_found" }));
  app.post("/boom", async () => {
    throw new TypeError("bad thing");
  });
  app.register(async (child) => {
    installErrorObserver(child);
    child.post("/nested-missing", async (_req, reply) => reply.code(404).send("gone"));
  });

  return app;
};

describe("error observer", () => {
  const app = makeApp();

  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it("adds nothing for successful replies", async () => {
    const response = await invoke(app, "/ok", "obs-1");

    expect(response.json().Logs).toEqual([]);
  });

  it("logs client errors without touching the reply", async () => {
    const response = await invoke(app, "/missing", "obs-2");
    const envelope = response.json();

    expect(envelope.Outputs.res.statusCode).toBe(404);
    expect(envelope.Outputs.res.body).toBe('{"error":"not_found"}');
    expect(envelope.Logs).toHaveLength(1);
    expect(envelope.Logs[0]).toMatch(
      /^obs-2 Client error\. status: 404 - Not Found, duration: \d+\.\d{3}ms$/
    );
  });

  it("logs the thrown error's message and type for server errors", async () => {
    const response = await invoke(app, "/boom", "obs-3");
    const envelope = response.json();

    expect(envelope.Outputs.res.statusCode).toBe(500);
    expect(envelope.Logs).toHaveLength(1);
    expect(envelope.Logs[0]).toMatch(
      /^obs-3 Internal error\. message: "bad thing", error_type: "TypeError", status: 500 - Internal Server Error, duration: \d+\.\d{3}ms$/
    );
  });

  it("logs a body the route never saw because it failed to parse", async () => {
    const response = await invokeJson(app, "/ok", "obs-5", "{bad");
    const envelope = response.json();

    expect(envelope.Outputs.res.statusCode).toBe(400);
    expect(envelope.Logs).toHaveLength(1);
    expect(envelope.Logs[0]).toMatch(
      /^obs-5 Client error\. message: ".+", error_type: ".+", status: 400 - Bad Request, duration: \d+\.\d{3}ms$/
    );
  });

  it("logs an unknown path answered by the not-found handler", async () => {
    const response = await invoke(app, "/nowhere", "obs-6");
    const envelope = response.json();

    expect(envelope.Outputs.res.statusCode).toBe(404);
    expect(envelope.Logs).toHaveLength(1);
    expect(envelope.Logs[0]).toMatch(
      /^obs-6 Client error\. status: 404 - Not Found, duration: \d+\.\d{3}ms$/
    );
  });

  it("logs a malformed envelope once, with the decode error", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/ok",
      headers: {
        "content-type": "application/json",
        "x-azure-functions-invocationid": "obs-7",
      },
      payload: "{oops",
    });
    const envelope = response.json();

    expect(envelope.Outputs.res.statusCode).toBe(500);
    expect(envelope.Logs).toHaveLength(2);
    expect(envelope.Logs[0].startsWith(
      "obs-7 InvocationAdapter Error: invocation envelope is not valid JSON"
    )).toBe(true);
    expect(envelope.Logs[1]).toMatch(
      /^obs-7 Internal error\. message: "invocation envelope is not valid JSON: .+", error_type: "EnvelopeDecodeError", status: 500 - Internal Server Error, duration: /
    );
  });

  it("reports once when installed on a parent and a child", async () => {
    const response = await invoke(app, "/nested-missing", "obs-4");

    expect(response.json().Logs).toHaveLength(1);
  });

  it("requires the invocation adapter", async () => {
    const bare = Fastify({ logger: false });
    installErrorObserver(bare);
    bare.get("/x", async () => "never");

    try {
      const response = await bare.inject({ method: "GET", url: "/x" });

      expect(response.statusCode).toBe(500);
      expect(response.json().message).toBe("error observer requires the invocation adapter");
    } finally {
      await bare.close();
    }
  });
});

describe("formatObservation", () => {
  it("returns null below 400", () => {
    expect(formatObservation({ status: 302, elapsedMs: 1, failure: null })).toBeNull();
  });

  it("formats a server error without detail", () => {
    expect(formatObservation({ status: 503, elapsedMs: 1.5, failure: null })).toBe(
      "Internal error. status: 503 - Service Unavailable, duration: 1.500ms"
    );
  });

  it("quotes the error detail", () => {
    expect(
      formatObservation({
        status: 422,
        elapsedMs: 0.25,
        failure: { message: 'field "email" missing', type: "ValidationError" },
      })
    ).toBe(
      'Client error. message: "field \\"email\\" missing", error_type: "ValidationError", status: 422 - Unprocessable Entity, duration: 0.250ms'
    );
  });
});
