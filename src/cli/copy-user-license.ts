#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import type { Logger } from "pino";

import type { CredentialOverrides } from "../directory/credentials.js";

import { createAuditSink } from "../audit/audit-service.js";
import { loadDirectoryConfig } from "../config/index.js";
import { closePool } from "../db/pool.js";
import { copyUserLicense } from "../licensing/license-copier.js";
import { ValidationError } from "../shared/errors.js";
import {
  CREDENTIAL_OPTIONS,
  EXIT_PARTIAL_FAILURE,
  createCliLogger,
  createDirectory,
  credentialOverrides,
  reportFatal,
  writeReport,
} from "./runtime.js";

const USAGE = "usage: copy-user-license --source <user> --target <user> [--target <user> ...] [--dry-run]";

export interface CopyCliArgs {
  source: string;
  targets: string[];
  dryRun: boolean;
  overrides: CredentialOverrides;
}

export function parseCopyArgs(argv: string[]): CopyCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      source: { type: "string", short: "s" },
      target: { type: "string", short: "t", multiple: true },
      "dry-run": { type: "boolean", default: false },
      ...CREDENTIAL_OPTIONS,
    },
  });

  const source = values.source?.trim();
  const targets = [...(values.target ?? []), ...positionals];
  if (!source || targets.length === 0) {
    throw new ValidationError(USAGE);
  }

  return {
    source,
    targets,
    dryRun: values["dry-run"] ?? false,
    overrides: credentialOverrides(values),
  };
}

async function main() {
  let logger: Logger | null = null;
  try {
    const args = parseCopyArgs(process.argv.slice(2));
    const config = loadDirectoryConfig();
    logger = createCliLogger(config);

    const results = await copyUserLicense(
      {
        directory: createDirectory(config, args.overrides, logger),
        audit: createAuditSink(config, logger),
        logger,
      },
      { source: args.source, targets: args.targets, dryRun: args.dryRun },
    );

    writeReport({ dry_run: args.dryRun, results });
    if (results.some((result) => result.status === "failed")) {
      process.exitCode = EXIT_PARTIAL_FAILURE;
    }
  } catch (error) {
    reportFatal(logger, error);
  } finally {
    await closePool();
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
