import type { SkuAssignment } from "../directory/types.js";

export type LicenseMap = ReadonlyMap<string, ReadonlySet<string>>;

export type SkuChangeKind = "added" | "updated" | "unchanged" | "retained";

export interface LicensePlan {
  merged: Map<string, Set<string>>;
  added: string[];
  updated: string[];
  unchanged: string[];
  retained: string[];
}

export function toLicenseMap(assignments: readonly SkuAssignment[]): Map<string, Set<string>> {
  const map = new Map<string, Set<string>>();
  for (const assignment of assignments) {
    map.set(normalizeId(assignment.skuId), new Set(assignment.disabledPlans.map(normalizeId)));
  }
  return map;
}

/**
 * Additive merge: every SKU of the source with the source's disabled plans, plus every
 * SKU only the target holds, untouched. Inputs are never mutated.
 */
export function mergeLicenseAssignments(source: LicenseMap, target: LicenseMap): Map<string, Set<string>> {
  const merged = new Map<string, Set<string>>();
  for (const [skuId, disabledPlans] of target) {
    if (!source.has(skuId)) {
      merged.set(skuId, new Set(disabledPlans));
    }
  }
  for (const [skuId, disabledPlans] of source) {
    merged.set(skuId, new Set(disabledPlans));
  }
  return merged;
}

export function planLicenseChanges(source: LicenseMap, target: LicenseMap): LicensePlan {
  const plan: LicensePlan = {
    merged: mergeLicenseAssignments(source, target),
    added: [],
    updated: [],
    unchanged: [],
    retained: [],
  };

  for (const skuId of plan.merged.keys()) {
    plan[classifySku(skuId, source, target)].push(skuId);
  }

  plan.added.sort();
  plan.updated.sort();
  plan.unchanged.sort();
  plan.retained.sort();
  return plan;
}

function classifySku(skuId: string, source: LicenseMap, target: LicenseMap): SkuChangeKind {
  const sourcePlans = source.get(skuId);
  const targetPlans = target.get(skuId);
  if (!sourcePlans) {
    return "retained";
  }
  if (!targetPlans) {
    return "added";
  }
  return sameMembers(sourcePlans, targetPlans) ? "unchanged" : "updated";
}

function sameMembers(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const value of a) {
    if (!b.has(value)) {
      return false;
    }
  }
  return true;
}

/** SKUs that have to be sent to the directory to reach the merged state. */
export function pendingAssignments(plan: LicensePlan): SkuAssignment[] {
  return [...plan.added, ...plan.updated].sort().map((skuId) => ({
    skuId,
    disabledPlans: [...(plan.merged.get(skuId) ?? [])].sort(),
  }));
}

// Directory object ids are GUIDs and compare case-insensitively.
function normalizeId(value: string): string {
  return value.trim().toLowerCase();
}
