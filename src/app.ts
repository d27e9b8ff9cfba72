import fastify from "fastify";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import type { AuditSink } from "./audit/audit-service.js";
import type { DirectoryClient } from "./directory/types.js";

import { createAuditSink } from "./audit/audit-service.js";
import { loadConfig, type EnvConfig } from "./config/index.js";
import { createAccessTokenProvider, resolveCredential } from "./directory/credentials.js";
import { createGraphDirectoryClient } from "./directory/graph-client.js";
import { HttpError } from "./shared/errors.js";
import { registerRoutes } from "./web/routes/index.js";

declare module "fastify" {
  interface FastifyInstance {
    config: EnvConfig;
    directory: DirectoryClient;
    audit: AuditSink;
  }
}

export interface BuildAppOptions {
  config?: EnvConfig;
  directory?: DirectoryClient;
  audit?: AuditSink;
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();
  const app = fastify({ logger: options.logger === false ? false : { level: config.LOG_LEVEL } });

  const directory =
    options.directory ??
    createGraphDirectoryClient(config, createAccessTokenProvider(resolveCredential(config), config), app.log);
  const audit = options.audit ?? createAuditSink(config, app.log);

  app.decorate("config", config);
  app.decorate("directory", directory);
  app.decorate("audit", audit);

  // Set before any plugin registers so the route contexts inherit it.
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof HttpError) {
      if (error.statusCode >= 500) {
        app.log.error(error);
      }
      return reply
        .status(error.statusCode)
        .send(error.details ? { message: error.message, details: error.details } : { message: error.message });
    }
    if (error.validation) {
      return reply.status(400).send({ message: error.message });
    }
    app.log.error(error);
    return reply.status(500).send({ message: "Internal Server Error" });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Tenant License Tools API",
        version: "0.1.0",
      },
    },
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  await app.register(async (instance) => {
    await instance.register(registerRoutes, { prefix: "/api/v1" });
  });

  return app;
}
