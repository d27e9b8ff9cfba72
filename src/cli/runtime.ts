import { pino, type Logger } from "pino";

import type { DirectoryConfig } from "../config/index.js";
import type { CredentialOverrides } from "../directory/credentials.js";
import type { DirectoryClient } from "../directory/types.js";

import { createAccessTokenProvider, resolveCredential } from "../directory/credentials.js";
import { createGraphDirectoryClient } from "../directory/graph-client.js";
import { HttpError, errorMessage } from "../shared/errors.js";

export const CREDENTIAL_OPTIONS = {
  "access-token": { type: "string" },
  "tenant-id": { type: "string" },
  "client-id": { type: "string" },
  "client-secret": { type: "string" },
} as const;

export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export function credentialOverrides(values: {
  "access-token"?: string;
  "tenant-id"?: string;
  "client-id"?: string;
  "client-secret"?: string;
}): CredentialOverrides {
  return {
    accessToken: values["access-token"],
    tenantId: values["tenant-id"],
    clientId: values["client-id"],
    clientSecret: values["client-secret"],
  };
}

// Logs go to stderr so stdout carries only the JSON report.
export function createCliLogger(config: DirectoryConfig): Logger {
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}

export function createDirectory(
  config: DirectoryConfig,
  overrides: CredentialOverrides,
  logger: Logger,
): DirectoryClient {
  const credential = resolveCredential(config, overrides);
  return createGraphDirectoryClient(config, createAccessTokenProvider(credential, config), logger);
}

export function writeReport(report: unknown) {
  process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

export function reportFatal(logger: Logger | null, error: unknown) {
  const message = errorMessage(error);
  if (logger) {
    logger.fatal({ err: error, status: error instanceof HttpError ? error.statusCode : undefined }, message);
    logger.flush();
  } else {
    console.error(message);
  }
  process.exitCode = EXIT_FATAL;
}
