import type { BaseLogger } from "pino";

import type { DirectoryConfig } from "../config/index.js";

import { getPool } from "../db/pool.js";

export interface AuditEntry {
  action: string;
  objectRef: string;
  actor: string | null;
  metadata: Record<string, unknown>;
}

export interface AuditSink {
  record(entry: AuditEntry): Promise<void>;
}

export interface AuditQueryable {
  query(text: string, values: unknown[]): Promise<unknown>;
}

export class PgAuditSink implements AuditSink {
  constructor(private readonly db: AuditQueryable) {}

  async record(entry: AuditEntry): Promise<void> {
    await this.db.query(
      "insert into audit_log (action, object_ref, actor, metadata) values ($1, $2, $3, $4)",
      [entry.action, entry.objectRef, entry.actor, entry.metadata],
    );
  }
}

export class LogAuditSink implements AuditSink {
  constructor(private readonly logger: BaseLogger) {}

  async record(entry: AuditEntry): Promise<void> {
    this.logger.info({ audit: entry }, `audit ${entry.action} ${entry.objectRef}`);
  }
}

export function createAuditSink(config: DirectoryConfig, logger: BaseLogger): AuditSink {
  if (config.DATABASE_URL) {
    return new PgAuditSink(getPool(config.DATABASE_URL));
  }
  return new LogAuditSink(logger);
}
