import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { SignJWT } from "jose";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { EnvConfig } from "../src/config/index.js";

import { buildApp } from "../src/app.js";
import { DirectoryError } from "../src/shared/errors.js";
import { InMemoryDirectory, MemoryAuditSink, sku } from "./support/in-memory-directory.js";

const JWT_SECRET = "test-secret-test-secret";

async function operatorToken(privileges: string[], overrides: { audience?: string } = {}) {
  return new SignJWT({ privileges })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject("ops@contoso.test")
    .setIssuer("tenant-license-tools")
    .setAudience(overrides.audience ?? "tlt-operator")
    .setIssuedAt()
    .setExpirationTime("5m")
    .sign(new TextEncoder().encode(JWT_SECRET));
}

describe("HTTP API", () => {
  let dir: string;
  let config: EnvConfig;
  let directory: InMemoryDirectory;
  let audit: MemoryAuditSink;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tlt-routes-"));
    config = {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      PORT: 0,
      AZURE_AUTHORITY_HOST: "https://login.test",
      GRAPH_BASE_URL: "https://graph.test/v1.0",
      GRAPH_MAX_RETRIES: 0,
      GRAPH_RETRY_DELAY_MS: 0,
      SNAPSHOT_PATH: path.join(dir, "catalog.csv"),
      JWT_SECRET,
      JWT_ISSUER: "tenant-license-tools",
      JWT_AUDIENCE: "tlt-operator",
    };
    directory = new InMemoryDirectory();
    audit = new MemoryAuditSink();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createApp() {
    return buildApp({ config, directory, audit, logger: false });
  }

  it("answers health checks without a token", async () => {
    const app = await createApp();

    const response = await app.inject({ method: "GET", url: "/api/v1/healthz" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
    await app.close();
  });

  it("is ready only when the directory accepts our credential", async () => {
    const app = await createApp();

    const ready = await app.inject({ method: "GET", url: "/api/v1/readyz" });
    directory.authFails = true;
    const unavailable = await app.inject({ method: "GET", url: "/api/v1/readyz" });

    expect(ready.json()).toEqual({ status: "ready" });
    expect(unavailable.statusCode).toBe(503);
    expect(unavailable.json()).toEqual({ status: "unavailable", message: "Token request failed with status 401" });
    await app.close();
  });

  it("rejects requests without a valid operator token", async () => {
    const app = await createApp();

    const missing = await app.inject({ method: "POST", url: "/api/v1/catalog/diff" });
    const wrongAudience = await app.inject({
      method: "POST",
      url: "/api/v1/catalog/diff",
      headers: { authorization: `Bearer ${await operatorToken(["catalog.diff"], { audience: "someone-else" })}` },
    });

    expect(missing.statusCode).toBe(401);
    expect(wrongAudience.statusCode).toBe(401);
    await app.close();
  });

  it("rejects operators without the route privilege", async () => {
    const app = await createApp();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/licenses/copy",
      headers: { authorization: `Bearer ${await operatorToken(["catalog.read"])}` },
      payload: { source: "source", targets: ["alice"] },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({ message: "Missing privilege licenses.copy" });
    await app.close();
  });

  it("copies licenses and reports per-target outcomes", async () => {
    directory.addUser("source", [{ skuId: "e3", disabledPlans: ["yammer"] }]);
    directory.addUser("alice", [{ skuId: "project", disabledPlans: [] }]);
    const app = await createApp();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/licenses/copy",
      headers: { authorization: `Bearer ${await operatorToken(["licenses.copy"])}` },
      payload: { source: "source", targets: ["alice", "ghost"] },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      dry_run: false,
      results: [
        {
          target: "alice",
          user_principal_name: "alice@contoso.test",
          status: "succeeded",
          added: ["e3"],
          updated: [],
          unchanged: [],
          retained: ["project"],
          error: null,
        },
        {
          target: "ghost",
          user_principal_name: null,
          status: "failed",
          added: [],
          updated: [],
          unchanged: [],
          retained: [],
          error: "User not found: ghost",
        },
      ],
    });
    expect(audit.entries.map((entry) => entry.actor)).toEqual(["ops@contoso.test", "ops@contoso.test"]);
    await app.close();
  });

  it("returns 404 when the source user does not exist", async () => {
    const app = await createApp();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/licenses/copy",
      headers: { authorization: `Bearer ${await operatorToken(["licenses.copy"])}` },
      payload: { source: "missing", targets: ["alice"] },
    });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ message: "User not found: missing" });
    await app.close();
  });

  it("hides the message of unexpected errors", async () => {
    directory.failingUserIds.add("source");
    const app = await createApp();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/licenses/copy",
      headers: { authorization: `Bearer ${await operatorToken(["licenses.copy"])}` },
      payload: { source: "source", targets: ["alice"] },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ message: "Internal Server Error" });
    await app.close();
  });

  it("passes the upstream status of directory failures", async () => {
    vi.spyOn(directory, "listSubscribedSkus").mockRejectedValueOnce(new DirectoryError("Service unavailable", 503));
    const app = await createApp();

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/catalog/skus",
      headers: { authorization: `Bearer ${await operatorToken(["catalog.read"])}` },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ message: "Service unavailable", details: { upstream_status: 503 } });
    await app.close();
  });

  it("validates the copy request body", async () => {
    const app = await createApp();

    const response = await app.inject({
      method: "POST",
      url: "/api/v1/licenses/copy",
      headers: { authorization: `Bearer ${await operatorToken(["licenses.copy"])}` },
      payload: { source: "source", targets: [] },
    });

    expect(response.statusCode).toBe(400);
    await app.close();
  });

  it("diffs the catalog against the configured snapshot", async () => {
    directory.skus = [sku("SKU_A", ["P1", "P2"])];
    const app = await createApp();
    const headers = { authorization: `Bearer ${await operatorToken(["catalog.diff"])}` };

    const first = await app.inject({ method: "POST", url: "/api/v1/catalog/diff", headers });
    directory.skus = [sku("SKU_A", ["P1", "P2", "P3"]), sku("SKU_B", ["P4"])];
    const second = await app.inject({ method: "POST", url: "/api/v1/catalog/diff", headers });

    expect(first.json()).toEqual({ sku_count: 1, previous_snapshot_found: false, changes: [] });
    expect(second.json()).toEqual({
      sku_count: 2,
      previous_snapshot_found: true,
      changes: [
        { type: "NewSku", sku_part_number: "SKU_B", new_service_plans: ["P4"] },
        { type: "NewServicePlan", sku_part_number: "SKU_A", new_service_plans: ["P3"] },
      ],
    });
    expect(await readFile(config.SNAPSHOT_PATH, "utf-8")).toBe(
      "SkuPartNumber,ServicePlans,ServicePlanCount\nSKU_A,P1;P2;P3,3\nSKU_B,P4,1\n",
    );
    await app.close();
  });

  it("reports an empty catalog as a bad gateway", async () => {
    const app = await createApp();

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/catalog/skus",
      headers: { authorization: `Bearer ${await operatorToken(["catalog.read"])}` },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({ message: "Directory returned no subscribed SKUs" });
    await app.close();
  });

  it("lists the normalized catalog", async () => {
    directory.skus = [sku("SKU_B", ["P4"]), sku("SKU_A", ["P2", "P1"])];
    const app = await createApp();

    const response = await app.inject({
      method: "GET",
      url: "/api/v1/catalog/skus",
      headers: { authorization: `Bearer ${await operatorToken(["catalog.read"])}` },
    });

    expect(response.json()).toEqual({
      items: [
        { sku_part_number: "SKU_A", service_plans: "P1;P2", service_plan_count: 2 },
        { sku_part_number: "SKU_B", service_plans: "P4", service_plan_count: 1 },
      ],
    });
    await app.close();
  });
});
