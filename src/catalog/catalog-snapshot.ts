import type { SubscribedSku } from "../directory/types.js";

export const SERVICE_PLAN_SEPARATOR = ";";

export interface CatalogSnapshotRow {
  skuPartNumber: string;
  servicePlans: string;
  servicePlanCount: number;
}

export type CatalogSnapshot = CatalogSnapshotRow[];

export type ChangeType = "NewSku" | "NewServicePlan";

export interface ChangeRecord {
  type: ChangeType;
  skuPartNumber: string;
  newServicePlans: string[];
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b);
}

export function joinServicePlans(planNames: readonly string[]): string {
  return [...planNames].sort(compareText).join(SERVICE_PLAN_SEPARATOR);
}

export function splitServicePlans(joined: string): string[] {
  return joined
    .split(SERVICE_PLAN_SEPARATOR)
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function normalizeCatalog(skus: readonly SubscribedSku[]): CatalogSnapshot {
  return skus
    .map((sku) => {
      const planNames = sku.servicePlans.map((plan) => plan.servicePlanName);
      return {
        skuPartNumber: sku.skuPartNumber,
        servicePlans: joinServicePlans(planNames),
        servicePlanCount: planNames.length,
      };
    })
    .sort((a, b) => compareText(a.skuPartNumber, b.skuPartNumber));
}

/**
 * Reports SKUs and service plans present in `current` but not in `previous`. SKUs that
 * disappeared are not reported. New SKUs come first, then new plans on existing SKUs.
 */
export function diffCatalogSnapshots(previous: CatalogSnapshot, current: CatalogSnapshot): ChangeRecord[] {
  const previousByPartNumber = new Map<string, CatalogSnapshotRow>();
  for (const row of previous) {
    if (!previousByPartNumber.has(row.skuPartNumber)) {
      previousByPartNumber.set(row.skuPartNumber, row);
    }
  }

  const newSkus: ChangeRecord[] = [];
  const newPlans: ChangeRecord[] = [];

  for (const row of [...current].sort((a, b) => compareText(a.skuPartNumber, b.skuPartNumber))) {
    const match = previousByPartNumber.get(row.skuPartNumber);
    if (!match) {
      newSkus.push({
        type: "NewSku",
        skuPartNumber: row.skuPartNumber,
        newServicePlans: splitServicePlans(row.servicePlans).sort(compareText),
      });
      continue;
    }

    if (match.servicePlans === row.servicePlans) {
      continue;
    }

    const known = new Set(splitServicePlans(match.servicePlans));
    const added = splitServicePlans(row.servicePlans)
      .filter((name) => !known.has(name))
      .sort(compareText);
    if (added.length > 0) {
      newPlans.push({ type: "NewServicePlan", skuPartNumber: row.skuPartNumber, newServicePlans: added });
    }
  }

  return [...newSkus, ...newPlans];
}
