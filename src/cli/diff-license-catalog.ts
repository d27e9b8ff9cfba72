#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import type { Logger } from "pino";

import type { CredentialOverrides } from "../directory/credentials.js";

import { diffLicenseCatalog } from "../catalog/catalog-differ.js";
import { loadDirectoryConfig } from "../config/index.js";
import {
  CREDENTIAL_OPTIONS,
  createCliLogger,
  createDirectory,
  credentialOverrides,
  reportFatal,
  writeReport,
} from "./runtime.js";

export interface DiffCliArgs {
  snapshotPath: string | null;
  overrides: CredentialOverrides;
}

export function parseDiffArgs(argv: string[]): DiffCliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      snapshot: { type: "string", short: "f" },
      ...CREDENTIAL_OPTIONS,
    },
  });

  return {
    snapshotPath: values.snapshot?.trim() || null,
    overrides: credentialOverrides(values),
  };
}

async function main() {
  let logger: Logger | null = null;
  try {
    const args = parseDiffArgs(process.argv.slice(2));
    const config = loadDirectoryConfig();
    logger = createCliLogger(config);

    const result = await diffLicenseCatalog(
      { directory: createDirectory(config, args.overrides, logger), logger },
      { snapshotPath: args.snapshotPath ?? config.SNAPSHOT_PATH },
    );
    writeReport(result);
  } catch (error) {
    reportFatal(logger, error);
  }
}

const __filename = fileURLToPath(import.meta.url);
const isEntrypoint = process.argv[1] && path.resolve(process.argv[1]) === __filename;

if (isEntrypoint) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}
