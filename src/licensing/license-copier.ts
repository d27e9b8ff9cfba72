import type { BaseLogger } from "pino";

import type { AuditEntry, AuditSink } from "../audit/audit-service.js";
import type { DirectoryClient } from "../directory/types.js";

import { AuthenticationError, ValidationError, errorMessage } from "../shared/errors.js";
import { pendingAssignments, planLicenseChanges, toLicenseMap, type LicenseMap } from "./license-merge.js";

export type CopyTargetStatus = "succeeded" | "planned" | "failed";

export interface CopyTargetResult {
  target: string;
  userPrincipalName: string | null;
  status: CopyTargetStatus;
  added: string[];
  updated: string[];
  unchanged: string[];
  retained: string[];
  error?: string;
}

export interface CopyUserLicenseInput {
  source: string;
  targets: string[];
  dryRun?: boolean;
  actor?: string | null;
}

export interface LicenseCopierDeps {
  directory: DirectoryClient;
  audit: AuditSink;
  logger: BaseLogger;
}

function uniqueTargets(targets: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of targets) {
    const target = raw.trim();
    const key = target.toLowerCase();
    if (!target || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(target);
  }
  return result;
}

function failedResult(target: string, error: string, userPrincipalName: string | null = null): CopyTargetResult {
  return {
    target,
    userPrincipalName,
    status: "failed",
    added: [],
    updated: [],
    unchanged: [],
    retained: [],
    error,
  };
}

/**
 * Copies the source user's SKUs, with their disabled plans, onto each target. SKUs a target
 * holds that the source does not are left in place. Targets are processed one at a time and
 * a failing target does not stop the rest.
 */
export async function copyUserLicense(deps: LicenseCopierDeps, input: CopyUserLicenseInput): Promise<CopyTargetResult[]> {
  const { directory, audit, logger } = deps;
  const targets = uniqueTargets(input.targets);
  if (targets.length === 0) {
    throw new ValidationError("At least one target user is required");
  }

  await directory.authenticate();

  const sourceUser = await directory.getUser(input.source);
  const sourceLicenses = toLicenseMap(sourceUser.assignedLicenses);
  logger.info(
    { source: sourceUser.userPrincipalName, skuCount: sourceLicenses.size, targetCount: targets.length },
    "copying license assignment",
  );

  const results: CopyTargetResult[] = [];
  for (const target of targets) {
    const result = await copyToTarget(deps, {
      target,
      sourceId: sourceUser.id,
      sourceLicenses,
      dryRun: input.dryRun ?? false,
    });
    results.push(result);

    const entry: AuditEntry = {
      action: input.dryRun ? "license.copy.plan" : "license.copy",
      objectRef: `user:${result.userPrincipalName ?? target}`,
      actor: input.actor ?? null,
      metadata: {
        source: sourceUser.userPrincipalName,
        status: result.status,
        added: result.added,
        updated: result.updated,
        ...(result.error ? { error: result.error } : {}),
      },
    };
    // Audit failures are logged; the remaining targets still run.
    try {
      await audit.record(entry);
    } catch (error) {
      logger.error({ target, audit: entry, err: error }, `audit record failed for ${target}: ${errorMessage(error)}`);
    }
  }

  return results;
}

async function copyToTarget(
  deps: LicenseCopierDeps,
  params: {
    target: string;
    sourceId: string;
    sourceLicenses: LicenseMap;
    dryRun: boolean;
  },
): Promise<CopyTargetResult> {
  const { directory, logger } = deps;
  const { target } = params;

  let userPrincipalName: string | null = null;
  try {
    const targetUser = await directory.getUser(target);
    userPrincipalName = targetUser.userPrincipalName;
    if (targetUser.id.toLowerCase() === params.sourceId.toLowerCase()) {
      return failedResult(target, "Target is the source user", userPrincipalName);
    }

    const plan = planLicenseChanges(params.sourceLicenses, toLicenseMap(targetUser.assignedLicenses));
    const pending = pendingAssignments(plan);

    if (!params.dryRun && pending.length > 0) {
      await directory.assignLicenses(targetUser.id, pending, []);
    }

    logger.info(
      {
        target: userPrincipalName,
        added: plan.added,
        updated: plan.updated,
        retained: plan.retained,
        dryRun: params.dryRun,
      },
      pending.length === 0
        ? "license assignment already matches source"
        : params.dryRun
          ? "license assignment planned"
          : "license assignment applied",
    );

    return {
      target,
      userPrincipalName,
      status: params.dryRun ? "planned" : "succeeded",
      added: plan.added,
      updated: plan.updated,
      unchanged: plan.unchanged,
      retained: plan.retained,
    };
  } catch (error) {
    if (error instanceof AuthenticationError) {
      throw error;
    }
    logger.warn({ target, err: error }, `license copy failed for ${target}: ${errorMessage(error)}`);
    return failedResult(target, errorMessage(error), userPrincipalName);
  }
}
