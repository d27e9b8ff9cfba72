import type { FastifyInstance } from "fastify";

import { errorMessage } from "../../shared/errors.js";

export async function registerHealthRoutes(app: FastifyInstance) {
  app.get("/healthz", async (_request, reply) => reply.send({ status: "ok" }));

  // Ready once a directory token can be obtained.
  app.get("/readyz", async (request, reply) => {
    try {
      await app.directory.authenticate();
    } catch (error) {
      request.log.warn({ err: error }, "directory authentication failed during readiness check");
      return reply.code(503).send({ status: "unavailable", message: errorMessage(error) });
    }
    return reply.send({ status: "ready" });
  });
}
