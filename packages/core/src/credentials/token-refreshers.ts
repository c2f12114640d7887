import { google } from "googleapis";
import { z } from "zod";
import { ProbeError } from "../probes/probe-error.js";
import { InvalidGrantError, type RefreshedTokens, type TokenRefresher } from "./credential-manager.js";

// ---------------------------------------------------------------------------
// Claude (JSON token endpoint)
// ---------------------------------------------------------------------------

export const CLAUDE_TOKEN_URL = "https://platform.claude.com/v1/oauth/token";
export const CLAUDE_OAUTH_CLIENT_ID = "9d1c250a-e61b-44d9-88ed-5944d1962f5e";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).nullish(),
  expires_in: z.number().nullish(),
});

const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface JsonRefresherOptions {
  tokenUrl: string;
  clientId: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  now?: () => Date;
}

export function createJsonTokenRefresher(options: JsonRefresherOptions): TokenRefresher {
  const fetchImpl = options.fetch ?? fetch;
  const now = options.now ?? (() => new Date());

  return async (refreshToken: string): Promise<RefreshedTokens> => {
    let response: Response;
    try {
      response = await fetchImpl(options.tokenUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          grant_type: "refresh_token",
          refresh_token: refreshToken,
          client_id: options.clientId,
        }),
        signal: AbortSignal.timeout(options.timeoutMs ?? 10_000),
      });
    } catch (err) {
      throw ProbeError.executionFailed(`Token refresh request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const body: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const oauthError = oauthErrorSchema.safeParse(body);
      if (oauthError.success && oauthError.data.error === "invalid_grant") {
        throw new InvalidGrantError(oauthError.data.error_description ?? oauthError.data.error);
      }
      if (response.status === 401) throw new InvalidGrantError("HTTP 401");
      throw ProbeError.executionFailed(`Token refresh failed: HTTP ${response.status}`);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) throw ProbeError.parseFailed("Invalid token refresh response");

    const { access_token, refresh_token, expires_in } = parsed.data;
    return {
      accessToken: access_token,
      refreshToken: refresh_token ?? null,
      expiresAt: expires_in ? new Date(now().getTime() + expires_in * 1000) : null,
    };
  };
}

export function createClaudeRefresher(options: Omit<JsonRefresherOptions, "tokenUrl" | "clientId"> = {}): TokenRefresher {
  return createJsonTokenRefresher({ tokenUrl: CLAUDE_TOKEN_URL, clientId: CLAUDE_OAUTH_CLIENT_ID, ...options });
}

// ---------------------------------------------------------------------------
// Google (Gemini CLI credentials)
// ---------------------------------------------------------------------------

export function createGoogleRefresher(clientId: string, clientSecret: string): TokenRefresher {
  return async (refreshToken: string): Promise<RefreshedTokens> => {
    const client = new google.auth.OAuth2(clientId, clientSecret);
    client.setCredentials({ refresh_token: refreshToken });
    try {
      const { credentials } = await client.refreshAccessToken();
      if (!credentials.access_token) throw ProbeError.parseFailed("Google refresh returned no access token");
      return {
        accessToken: credentials.access_token,
        refreshToken: credentials.refresh_token ?? null,
        expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date) : null,
      };
    } catch (err) {
      if (err instanceof ProbeError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      if (message.includes("invalid_grant")) throw new InvalidGrantError(message);
      throw ProbeError.executionFailed(`Google token refresh failed: ${message}`);
    }
  };
}
