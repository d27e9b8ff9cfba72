import { decodeJwt } from "jose";
import { z } from "zod";

import type { DirectoryConfig } from "../config/index.js";

import { AuthenticationError, ConfigurationError, errorMessage } from "../shared/errors.js";

export const GRAPH_DEFAULT_SCOPE = "https://graph.microsoft.com/.default";

const TOKEN_REFRESH_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().optional(),
});

export type Credential =
  | { kind: "session"; accessToken: string }
  | { kind: "client_secret"; tenantId: string; clientId: string; clientSecret: string };

export interface CredentialOverrides {
  accessToken?: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
}

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Picks the credential an operation runs with: explicit overrides, then an existing
 * session token, then the app registration's client secret.
 */
export function resolveCredential(config: DirectoryConfig, overrides: CredentialOverrides = {}): Credential {
  const accessToken = overrides.accessToken ?? config.GRAPH_ACCESS_TOKEN;
  if (accessToken) {
    return { kind: "session", accessToken };
  }

  const tenantId = overrides.tenantId ?? config.AZURE_TENANT_ID;
  const clientId = overrides.clientId ?? config.AZURE_CLIENT_ID;
  const clientSecret = overrides.clientSecret ?? config.AZURE_CLIENT_SECRET;
  if (tenantId && clientId && clientSecret) {
    return { kind: "client_secret", tenantId, clientId, clientSecret };
  }

  throw new ConfigurationError(
    "No directory credential configured: set GRAPH_ACCESS_TOKEN or AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
  );
}

export class SessionTokenProvider implements AccessTokenProvider {
  constructor(
    private readonly accessToken: string,
    private readonly now: () => number = Date.now,
  ) {}

  async getAccessToken(): Promise<string> {
    const expiresAt = readJwtExpiry(this.accessToken);
    if (expiresAt !== null && expiresAt <= this.now()) {
      throw new AuthenticationError("Session token has expired");
    }
    return this.accessToken;
  }
}

// Opaque tokens are not JWTs; they are passed through unchecked.
function readJwtExpiry(token: string): number | null {
  try {
    const { exp } = decodeJwt(token);
    return typeof exp === "number" ? exp * 1000 : null;
  } catch {
    return null;
  }
}

export class ClientSecretTokenProvider implements AccessTokenProvider {
  private cached: { token: string; expiresAt: number } | null = null;

  constructor(
    private readonly credential: Extract<Credential, { kind: "client_secret" }>,
    private readonly authorityHost: string,
    private readonly now: () => number = Date.now,
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - TOKEN_REFRESH_MARGIN_MS > this.now()) {
      return this.cached.token;
    }

    const tokenEndpoint = `${this.authorityHost.replace(/\/+$/, "")}/${encodeURIComponent(this.credential.tenantId)}/oauth2/v2.0/token`;
    const tokenBody = new URLSearchParams();
    tokenBody.set("grant_type", "client_credentials");
    tokenBody.set("client_id", this.credential.clientId);
    tokenBody.set("client_secret", this.credential.clientSecret);
    tokenBody.set("scope", GRAPH_DEFAULT_SCOPE);

    let tokenResponse: Response;
    try {
      tokenResponse = await fetch(tokenEndpoint, {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: tokenBody,
      });
    } catch (error) {
      throw new AuthenticationError(`Token endpoint unreachable: ${errorMessage(error)}`);
    }

    if (!tokenResponse.ok) {
      throw new AuthenticationError(`Token request failed with status ${tokenResponse.status}`);
    }

    const tokenPayload = tokenResponseSchema.safeParse(await tokenResponse.json());
    if (!tokenPayload.success) {
      throw new AuthenticationError("Token endpoint did not return access_token");
    }

    const expiresIn = tokenPayload.data.expires_in ?? 3600;
    this.cached = { token: tokenPayload.data.access_token, expiresAt: this.now() + expiresIn * 1000 };
    return tokenPayload.data.access_token;
  }
}

export function createAccessTokenProvider(credential: Credential, config: DirectoryConfig): AccessTokenProvider {
  if (credential.kind === "session") {
    return new SessionTokenProvider(credential.accessToken);
  }
  return new ClientSecretTokenProvider(credential, config.AZURE_AUTHORITY_HOST);
}
