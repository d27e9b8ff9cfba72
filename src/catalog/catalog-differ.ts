import type { BaseLogger } from "pino";

import type { DirectoryClient } from "../directory/types.js";

import { EmptyCatalogError } from "../shared/errors.js";
import { diffCatalogSnapshots, normalizeCatalog, type CatalogSnapshot, type ChangeRecord } from "./catalog-snapshot.js";
import { readSnapshot, writeSnapshot } from "./snapshot-store.js";

export interface CatalogDifferDeps {
  directory: DirectoryClient;
  logger: BaseLogger;
}

export interface CatalogDiffResult {
  changes: ChangeRecord[];
  skuCount: number;
  previousSnapshotFound: boolean;
  snapshotPath: string;
}

export async function listLicenseCatalog(deps: CatalogDifferDeps): Promise<CatalogSnapshot> {
  await deps.directory.authenticate();
  const skus = await deps.directory.listSubscribedSkus();
  if (skus.length === 0) {
    throw new EmptyCatalogError();
  }
  return normalizeCatalog(skus);
}

export async function diffLicenseCatalog(
  deps: CatalogDifferDeps,
  params: { snapshotPath: string },
): Promise<CatalogDiffResult> {
  const { logger } = deps;
  const current = await listLicenseCatalog(deps);
  const previous = await readSnapshot(params.snapshotPath);

  const changes = previous ? diffCatalogSnapshots(previous, current) : [];
  if (!previous) {
    logger.info({ snapshotPath: params.snapshotPath }, "no previous catalog snapshot, writing the first one");
  }
  for (const change of changes) {
    logger.info(change, `${change.type} ${change.skuPartNumber}: ${change.newServicePlans.join(", ")}`);
  }

  await writeSnapshot(params.snapshotPath, current);
  logger.info({ skuCount: current.length, changeCount: changes.length }, "catalog snapshot updated");

  return {
    changes,
    skuCount: current.length,
    previousSnapshotFound: previous !== null,
    snapshotPath: params.snapshotPath,
  };
}
