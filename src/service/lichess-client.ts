/**
 * Service - HTTP Game Server Client
 *
 * `GameService` over the lichess.org bot API. Requests carry the bot's
 * bearer token and a timeout; a 429 becomes a RateLimitedError, any other
 * non-2xx a GameServiceError. Challenge creation is the exception: its
 * error bodies are returned so the scheduler can react to them.
 */

import {
  GameServiceError,
  RateLimitedError,
  type ChallengeParams,
  type ChallengeResponse,
  type FetchFn,
  type GameService,
  type PerfStats,
  type UserProfile,
} from "./game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LichessClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

type Json = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DEFAULT_TIMEOUT_MS = 10_000;
/** The server asks clients to back off a full minute after a 429 */
const DEFAULT_RETRY_AFTER_MS = 60_000;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function isJson(value: unknown): value is Json {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toPerfs(value: unknown): Record<string, PerfStats> {
  const perfs: Record<string, PerfStats> = {};
  if (!isJson(value)) return perfs;
  for (const [category, raw] of Object.entries(value)) {
    if (!isJson(raw)) continue;
    perfs[category] = {
      rating: typeof raw.rating === "number" ? raw.rating : undefined,
      games: typeof raw.games === "number" ? raw.games : undefined,
    };
  }
  return perfs;
}

export function toProfile(value: unknown): UserProfile | null {
  if (!isJson(value)) return null;
  const username = typeof value.username === "string" ? value.username : value.id;
  if (typeof username !== "string") return null;
  return {
    username,
    perfs: toPerfs(value.perfs),
    blocking: value.blocking === true,
  };
}

function retryAfterMs(response: Response): number {
  const header = Number.parseInt(response.headers.get("retry-after") ?? "", 10);
  return Number.isFinite(header) && header > 0 ? header * 1000 : DEFAULT_RETRY_AFTER_MS;
}

/**
 * Turn a challenge error body into flags. The server names the
 * rate-limited account in the error text; anything else is ours.
 */
export function toChallengeResponse(body: unknown, opponent: string): ChallengeResponse {
  if (!isJson(body)) return { error: "Malformed challenge response" };

  const challenge = isJson(body.challenge) ? body.challenge : body;
  if (typeof challenge.id === "string" && challenge.id) {
    return { id: challenge.id };
  }

  const error = typeof body.error === "string" ? body.error : JSON.stringify(body);
  const response: ChallengeResponse = { error };
  const ratelimit = body.ratelimit;
  if (isJson(ratelimit)) {
    const limitSeconds = ratelimit.seconds;
    response.rateLimitTimeoutMs = typeof limitSeconds === "number" ? limitSeconds * 1000 : DEFAULT_RETRY_AFTER_MS;
    if (error.toLowerCase().includes(opponent.toLowerCase())) {
      response.opponentIsRateLimited = true;
    } else {
      response.botIsRateLimited = true;
    }
  }
  return response;
}

// ---------------------------------------------------------------------------
// LichessClient
// ---------------------------------------------------------------------------

export class LichessClient implements GameService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: LichessClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async createChallenge(opponent: string, params: ChallengeParams): Promise<ChallengeResponse> {
    const form = new URLSearchParams({ rated: String(params.rated), variant: params.variant });
    if (params.days !== undefined) form.set("days", String(params.days));
    if (params.clockLimitSeconds !== undefined) form.set("clock.limit", String(params.clockLimitSeconds));
    if (params.clockIncrementSeconds !== undefined) {
      form.set("clock.increment", String(params.clockIncrementSeconds));
    }

    const response = await this.request("POST", `/api/challenge/${encodeURIComponent(opponent)}`, form);
    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return { error: `HTTP ${response.status}: ${text.slice(0, 200)}` };
    }
    return toChallengeResponse(body, opponent);
  }

  async cancelChallenge(challengeId: string): Promise<void> {
    await this.expectOk(await this.request("POST", `/api/challenge/${encodeURIComponent(challengeId)}/cancel`));
  }

  async acceptChallenge(challengeId: string): Promise<void> {
    await this.expectOk(await this.request("POST", `/api/challenge/${encodeURIComponent(challengeId)}/accept`));
  }

  async listOnlineBots(): Promise<UserProfile[]> {
    const response = await this.expectOk(await this.request("GET", "/api/bot/online"));
    const bots: UserProfile[] = [];
    for (const line of (await response.text()).split("\n")) {
      if (!line.trim()) continue;
      try {
        const profile = toProfile(JSON.parse(line));
        if (profile) bots.push(profile);
      } catch (err) {
        console.warn(`[lichess] Skipping malformed bot entry: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return bots;
  }

  async getPublicProfile(username: string): Promise<UserProfile> {
    return this.profileAt(`/api/user/${encodeURIComponent(username)}`);
  }

  async getOwnProfile(): Promise<UserProfile> {
    return this.profileAt("/api/account");
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async profileAt(path: string): Promise<UserProfile> {
    const response = await this.expectOk(await this.request("GET", path));
    const profile = toProfile(await response.json());
    if (!profile) {
      throw new GameServiceError(`Malformed profile at ${path}`, response.status);
    }
    return profile;
  }

  private async request(method: "GET" | "POST", path: string, form?: URLSearchParams): Promise<Response> {
    const response = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: { Authorization: `Bearer ${this.options.token}` },
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 429) {
      throw new RateLimitedError(`Rate limited on ${method} ${path}`, retryAfterMs(response));
    }
    return response;
  }

  private async expectOk(response: Response): Promise<Response> {
    if (!response.ok) {
      const body = await response.text();
      throw new GameServiceError(`HTTP ${response.status} from ${response.url || "game server"}`, response.status, body);
    }
    return response;
  }
}
