import type { FastifyRequest } from "fastify";

import { jwtVerify } from "jose";
import { z } from "zod";

import type { EnvConfig } from "../../config/index.js";

import { ForbiddenError, UnauthorizedError } from "../../shared/errors.js";

export const PRIVILEGES = {
  licensesCopy: "licenses.copy",
  catalogDiff: "catalog.diff",
  catalogRead: "catalog.read",
} as const;

export type Privilege = (typeof PRIVILEGES)[keyof typeof PRIVILEGES];

const operatorClaimsSchema = z.object({
  sub: z.string().min(1),
  privileges: z.array(z.string()).default([]),
});

export type OperatorClaims = z.infer<typeof operatorClaimsSchema>;

export interface OperatorContext {
  operatorId: string;
  privileges: string[];
}

export async function verifyOperatorJwt(token: string, config: EnvConfig): Promise<OperatorClaims> {
  const secret = new TextEncoder().encode(config.JWT_SECRET);
  const { payload } = await jwtVerify(token, secret, {
    issuer: config.JWT_ISSUER,
    audience: config.JWT_AUDIENCE,
  });

  const claims = operatorClaimsSchema.safeParse(payload);
  if (!claims.success) {
    throw new UnauthorizedError("Operator token is missing required claims");
  }
  return claims.data;
}

export async function requireOperator(
  request: FastifyRequest,
  config: EnvConfig,
  privilege: Privilege,
): Promise<OperatorContext> {
  const header = request.headers.authorization;
  if (!header?.startsWith("Bearer ")) {
    throw new UnauthorizedError();
  }

  const token = header.slice("Bearer ".length);
  let claims: OperatorClaims;
  try {
    claims = await verifyOperatorJwt(token, config);
  } catch {
    throw new UnauthorizedError();
  }

  const operator: OperatorContext = { operatorId: claims.sub, privileges: claims.privileges };
  request.log.debug({ operator: operator.operatorId, privilege }, "operator authenticated");

  if (!operator.privileges.includes(privilege)) {
    throw new ForbiddenError(`Missing privilege ${privilege}`);
  }
  return operator;
}
