import type { Logger } from "pino";
import { logger as rootLogger } from "./logger.js";
import type { TokenResult } from "./tuyaTypes.js";

type CachedToken = {
  accessToken: string;
  expiresAtMs: number;
};

/** A token is reused only while it has more than this much life left. */
export const TOKEN_REFRESH_MARGIN_MS = 60_000;

export type TokenManagerOptions = {
  fetchToken: () => Promise<TokenResult>;
  now?: () => number;
  logger?: Logger;
};

/**
 * Holds the single bearer token shared by every caller. Refreshes are
 * single-flight: callers that arrive while a refresh is running await the
 * same promise instead of issuing their own fetch.
 */
export class TuyaTokenManager {
  private token: CachedToken | null = null;
  private inflight: Promise<CachedToken> | null = null;
  private readonly fetchToken: () => Promise<TokenResult>;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: TokenManagerOptions) {
    this.fetchToken = options.fetchToken;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: "tuya-auth" });
  }

  private validToken(nowMs = this.now()) {
    if (!this.token) return null;
    return this.token.expiresAtMs > nowMs + TOKEN_REFRESH_MARGIN_MS ? this.token : null;
  }

  async getToken(): Promise<string> {
    const cached = this.validToken();
    if (cached) {
      return cached.accessToken;
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }

    const token = await this.inflight;
    return token.accessToken;
  }

  getStatus() {
    const now = this.now();
    return {
      hasToken: !!this.token,
      refreshing: !!this.inflight,
      expiresAt: this.token ? new Date(this.token.expiresAtMs).toISOString() : undefined,
      secondsRemaining: this.token ? Math.max(0, Math.floor((this.token.expiresAtMs - now) / 1000)) : 0
    };
  }

  private async refresh(): Promise<CachedToken> {
    const requestedAtMs = this.now();
    this.log.info("Fetching new Tuya access token");

    // On failure nothing is installed; the next caller starts over.
    const result = await this.fetchToken();

    const token: CachedToken = {
      accessToken: result.access_token,
      expiresAtMs: requestedAtMs + result.expire_time * 1000
    };
    this.token = token;

    this.log.info({ expiresInSec: result.expire_time }, "Refreshed Tuya access token");
    return token;
  }
}
