import type { FastifyInstance } from "fastify";

import { diffLicenseCatalog, listLicenseCatalog } from "../../catalog/catalog-differ.js";
import { PRIVILEGES, requireOperator } from "../plugins/auth-operator.js";

export async function registerCatalogRoutes(app: FastifyInstance) {
  app.get("/catalog/skus", async (request, reply) => {
    await requireOperator(request, app.config, PRIVILEGES.catalogRead);

    const items = await listLicenseCatalog({ directory: app.directory, logger: request.log });
    return reply.send({
      items: items.map((row) => ({
        sku_part_number: row.skuPartNumber,
        service_plans: row.servicePlans,
        service_plan_count: row.servicePlanCount,
      })),
    });
  });

  app.post("/catalog/diff", async (request, reply) => {
    await requireOperator(request, app.config, PRIVILEGES.catalogDiff);

    const result = await diffLicenseCatalog(
      { directory: app.directory, logger: request.log },
      { snapshotPath: app.config.SNAPSHOT_PATH },
    );
    return reply.send({
      sku_count: result.skuCount,
      previous_snapshot_found: result.previousSnapshotFound,
      changes: result.changes.map((change) => ({
        type: change.type,
        sku_part_number: change.skuPartNumber,
        new_service_plans: change.newServicePlans,
      })),
    });
  });
}
