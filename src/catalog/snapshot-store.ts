import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import type { CatalogSnapshot } from "./catalog-snapshot.js";

import { SnapshotReadError, SnapshotWriteError, errorMessage } from "../shared/errors.js";

export const SNAPSHOT_COLUMNS = ["SkuPartNumber", "ServicePlans", "ServicePlanCount"] as const;

const snapshotRowSchema = z.object({
  SkuPartNumber: z.string().min(1),
  ServicePlans: z.string(),
  ServicePlanCount: z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform((value) => Number.parseInt(value, 10)),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseSnapshot(content: string, source = "snapshot"): CatalogSnapshot {
  let records: string[][];
  try {
    records = parse(content, {
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new SnapshotReadError(`Unable to parse ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const [header = [], ...rows] = records;
  const missing = SNAPSHOT_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new SnapshotReadError(`Malformed ${source}: missing column ${missing.join(", ")}`);
  }

  const parsed = z
    .array(snapshotRowSchema)
    .safeParse(rows.map((row) => Object.fromEntries(header.map((column, index) => [column, row[index]]))));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const [rowIndex, ...field] = issue?.path ?? [];
    throw new SnapshotReadError(
      `Malformed ${source}: row ${Number(rowIndex ?? 0) + 1} ${field.join(".")}: ${issue?.message ?? "invalid row"}`,
    );
  }

  return parsed.data.map((row) => ({
    skuPartNumber: row.SkuPartNumber,
    servicePlans: row.ServicePlans,
    servicePlanCount: row.ServicePlanCount,
  }));
}

export function serializeSnapshot(snapshot: CatalogSnapshot): string {
  return stringify(
    snapshot.map((row) => ({
      SkuPartNumber: row.skuPartNumber,
      ServicePlans: row.servicePlans,
      ServicePlanCount: row.servicePlanCount,
    })),
    { header: true, columns: [...SNAPSHOT_COLUMNS] },
  );
}

/** Returns null when no snapshot has been written yet. */
export async function readSnapshot(filePath: string): Promise<CatalogSnapshot | null> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw new SnapshotReadError(`Unable to read snapshot ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseSnapshot(content, `snapshot ${filePath}`);
}

/** Writes beside the target and renames over it, so readers never see a partial file. */
export async function writeSnapshot(filePath: string, snapshot: CatalogSnapshot): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await writeFile(tempPath, serializeSnapshot(snapshot), "utf-8");
  } catch (error) {
    throw new SnapshotWriteError(`Unable to write snapshot ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  try {
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new SnapshotWriteError(`Unable to replace snapshot ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}
