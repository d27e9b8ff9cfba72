import type { FastifyInstance } from "fastify";

import { z } from "zod";

import { copyUserLicense } from "../../licensing/license-copier.js";
import { ValidationError } from "../../shared/errors.js";
import { PRIVILEGES, requireOperator } from "../plugins/auth-operator.js";

const copyBodySchema = z.object({
  source: z.string().trim().min(1),
  targets: z.array(z.string().trim().min(1)).min(1),
  dry_run: z.boolean().default(false),
});

export async function registerLicenseRoutes(app: FastifyInstance) {
  app.post("/licenses/copy", async (request, reply) => {
    const operator = await requireOperator(request, app.config, PRIVILEGES.licensesCopy);

    const body = copyBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      throw new ValidationError("source and a non-empty targets list are required");
    }

    const results = await copyUserLicense(
      { directory: app.directory, audit: app.audit, logger: request.log },
      {
        source: body.data.source,
        targets: body.data.targets,
        dryRun: body.data.dry_run,
        actor: operator.operatorId,
      },
    );

    return reply.send({
      dry_run: body.data.dry_run,
      results: results.map((result) => ({
        target: result.target,
        user_principal_name: result.userPrincipalName,
        status: result.status,
        added: result.added,
        updated: result.updated,
        unchanged: result.unchanged,
        retained: result.retained,
        error: result.error ?? null,
      })),
    });
  });
}
