/**
 * Service - Game Server Interface
 *
 * Everything the matchmaker needs from the game server. The scheduler and
 * the challenge acceptor only ever talk to this interface; `LichessClient`
 * is the HTTP implementation.
 */

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

export interface PerfStats {
  rating?: number;
  games?: number;
}

export interface UserProfile {
  username: string;
  /** Rating pools keyed by category ("blitz", "atomic", ...) */
  perfs?: Record<string, PerfStats>;
  /** Set on public profiles when that account blocks us */
  blocking?: boolean;
}

// ---------------------------------------------------------------------------
// Challenges
// ---------------------------------------------------------------------------

export interface ChallengeParams {
  rated: boolean;
  variant: string;
  clockLimitSeconds?: number;
  clockIncrementSeconds?: number;
  days?: number;
}

export interface ChallengeResponse {
  id?: string;
  botIsRateLimited?: boolean;
  opponentIsRateLimited?: boolean;
  rateLimitTimeoutMs?: number;
  error?: string;
}

/** A challenge sent to us, waiting in the acceptance queue */
export interface IncomingChallenge {
  id: string;
  speed: string;
  variant: string;
  rated: boolean;
  /** True when we sent it ourselves */
  fromSelf: boolean;
  challenger: {
    name: string;
    isBot: boolean;
  };
}

/** A challenge the server reports as declined */
export interface DeclinedChallenge {
  id: string;
  speed: string;
  variant: string;
  rated: boolean;
  fromSelf: boolean;
  /** Name of the account the challenge was sent to */
  opponent: string;
  declineReason: string;
  declineReasonKey: string;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class GameServiceError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string = ""
  ) {
    super(message);
    this.name = "GameServiceError";
  }
}

export class RateLimitedError extends Error {
  constructor(
    message: string,
    readonly retryAfterMs: number
  ) {
    super(message);
    this.name = "RateLimitedError";
  }
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

/** The slice of `fetch` the HTTP parts use, injectable for tests */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface GameService {
  /** Throws RateLimitedError when our account is over its request budget */
  createChallenge(opponent: string, params: ChallengeParams): Promise<ChallengeResponse>;
  cancelChallenge(challengeId: string): Promise<void>;
  acceptChallenge(challengeId: string): Promise<void>;
  listOnlineBots(): Promise<UserProfile[]>;
  getPublicProfile(username: string): Promise<UserProfile>;
  getOwnProfile(): Promise<UserProfile>;
}
