import { setTimeout as delay } from "node:timers/promises";

import type { BaseLogger } from "pino";
import { z } from "zod";

import type { DirectoryConfig } from "../config/index.js";
import type { AccessTokenProvider } from "./credentials.js";
import type { DirectoryClient, DirectoryUser, SkuAssignment, SubscribedSku } from "./types.js";

import {
  AuthenticationError,
  DirectoryError,
  ForbiddenError,
  NotFoundError,
  errorMessage,
} from "../shared/errors.js";

const RETRYABLE_STATUSES = new Set([429, 502, 503, 504]);
const DEFAULT_MAX_RETRY_DELAY_MS = 60_000;
const USER_SELECT = "id,userPrincipalName,displayName,assignedLicenses";

const skuAssignmentSchema = z.object({
  skuId: z.string(),
  disabledPlans: z.array(z.string()).default([]),
});

const subscribedSkusSchema = z.object({
  value: z.array(
    z.object({
      skuId: z.string(),
      skuPartNumber: z.string(),
      servicePlans: z
        .array(
          z.object({
            servicePlanId: z.string(),
            servicePlanName: z.string(),
          }),
        )
        .default([]),
    }),
  ),
});

const userSchema = z.object({
  id: z.string(),
  userPrincipalName: z.string(),
  displayName: z.string().nullable().default(null),
  assignedLicenses: z.array(skuAssignmentSchema).default([]),
});

const graphErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

export interface GraphDirectoryClientOptions {
  baseUrl: string;
  tokenProvider: AccessTokenProvider;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Upper bound for a single wait, including one asked for by `Retry-After`. */
  maxRetryDelayMs?: number;
  logger?: BaseLogger;
}

interface RequestOptions {
  method?: "GET" | "POST";
  body?: unknown;
  notFoundMessage?: string;
}

export class GraphDirectoryClient implements DirectoryClient {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly maxRetryDelayMs: number;

  constructor(private readonly options: GraphDirectoryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.maxRetryDelayMs = options.maxRetryDelayMs ?? DEFAULT_MAX_RETRY_DELAY_MS;
  }

  async authenticate(): Promise<void> {
    await this.options.tokenProvider.getAccessToken();
  }

  async listSubscribedSkus(): Promise<SubscribedSku[]> {
    const payload = await this.request("/subscribedSkus");
    const parsed = subscribedSkusSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DirectoryError("Unexpected subscribedSkus response shape");
    }
    return parsed.data.value;
  }

  async getUser(userId: string): Promise<DirectoryUser> {
    const payload = await this.request(`/users/${encodeURIComponent(userId)}?$select=${USER_SELECT}`, {
      notFoundMessage: `User not found: ${userId}`,
    });
    const parsed = userSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DirectoryError(`Unexpected user response shape for ${userId}`);
    }
    return parsed.data;
  }

  async assignLicenses(userId: string, addLicenses: SkuAssignment[], removeLicenses: string[]): Promise<void> {
    await this.request(`/users/${encodeURIComponent(userId)}/assignLicense`, {
      method: "POST",
      body: { addLicenses, removeLicenses },
      notFoundMessage: `User not found: ${userId}`,
    });
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = options.method ?? "GET";
    const url = `${this.baseUrl}${path}`;

    for (let attempt = 0; ; attempt += 1) {
      const accessToken = await this.options.tokenProvider.getAccessToken();
      const headers: Record<string, string> = {
        authorization: `Bearer ${accessToken}`,
        accept: "application/json",
      };
      if (options.body !== undefined) {
        headers["content-type"] = "application/json";
      }

      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers,
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
        });
      } catch (error) {
        throw new DirectoryError(`Directory request ${method} ${path} failed: ${errorMessage(error)}`);
      }

      if (RETRYABLE_STATUSES.has(response.status) && attempt < this.maxRetries) {
        const waitMs = this.retryWait(response, attempt);
        await response.body?.cancel();
        this.options.logger?.warn({ status: response.status, path, attempt: attempt + 1, waitMs }, "retrying directory request");
        await delay(waitMs);
        continue;
      }

      if (response.ok) {
        if (response.status === 204) {
          return null;
        }
        const text = await response.text();
        return text ? parseJson(text, path) : null;
      }

      throw await this.toError(response, options.notFoundMessage);
    }
  }

  private retryWait(response: Response, attempt: number): number {
    const retryAfter = Number(response.headers.get("retry-after"));
    const waitMs =
      Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : this.retryDelayMs * 2 ** attempt;
    return Math.min(waitMs, this.maxRetryDelayMs);
  }

  private async toError(response: Response, notFoundMessage?: string): Promise<Error> {
    const upstreamMessage = await readGraphErrorMessage(response);

    switch (response.status) {
      case 401:
        return new AuthenticationError(upstreamMessage ?? "Directory rejected the access token");
      case 403:
        return new ForbiddenError(upstreamMessage ?? "Directory denied the request");
      case 404:
        return new NotFoundError(notFoundMessage ?? upstreamMessage ?? "Directory object not found");
      default:
        return new DirectoryError(
          upstreamMessage ?? `Directory request failed with status ${response.status}`,
          response.status,
        );
    }
  }
}

function parseJson(text: string, path: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new DirectoryError(`Directory returned invalid JSON for ${path}`);
  }
}

async function readGraphErrorMessage(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }
  if (!text) {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = graphErrorSchema.safeParse(body);
  return parsed.success ? (parsed.data.error.message ?? null) : null;
}

export function createGraphDirectoryClient(
  config: DirectoryConfig,
  tokenProvider: AccessTokenProvider,
  logger?: BaseLogger,
): GraphDirectoryClient {
  return new GraphDirectoryClient({
    baseUrl: config.GRAPH_BASE_URL,
    tokenProvider,
    maxRetries: config.GRAPH_MAX_RETRIES,
    retryDelayMs: config.GRAPH_RETRY_DELAY_MS,
    logger,
  });
}
