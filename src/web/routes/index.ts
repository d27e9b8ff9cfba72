import type { FastifyInstance } from "fastify";

import { registerCatalogRoutes } from "./catalog.js";
import { registerHealthRoutes } from "./health.js";
import { registerLicenseRoutes } from "./licenses.js";

export async function registerRoutes(app: FastifyInstance) {
  await registerHealthRoutes(app);
  await registerLicenseRoutes(app);
  await registerCatalogRoutes(app);
}
