/**
 * Tests - shared fakes
 */

import { defaultMatchmakingConfig, type MatchmakingConfig } from "../src/config/config.js";
import type { Clock } from "../src/matchmaking/timer.js";
import type { RandomSource } from "../src/matchmaking/random.js";
import type {
  ChallengeParams,
  ChallengeResponse,
  GameService,
  IncomingChallenge,
  UserProfile,
} from "../src/service/game-service.js";

export class FakeClock implements Clock {
  private t = 1_000_000;

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/** Cycles through `values` */
export function sequenceRandom(values: number[]): RandomSource {
  let i = 0;
  return {
    next: () => values[i++ % values.length],
  };
}

export class FakeGameService implements GameService {
  bots: UserProfile[] = [];
  publicProfiles = new Map<string, UserProfile>();
  ownProfile: UserProfile = { username: "test_bot", perfs: {} };
  /** Consumed in order; an Error is thrown instead of returned */
  challengeResponses: Array<ChallengeResponse | Error> = [];
  acceptErrors = new Map<string, Error>();
  listError: Error | null = null;

  created: Array<{ opponent: string; params: ChallengeParams }> = [];
  cancelled: string[] = [];
  accepted: string[] = [];
  listCalls = 0;

  private nextId = 1;

  async createChallenge(opponent: string, params: ChallengeParams): Promise<ChallengeResponse> {
    this.created.push({ opponent, params });
    const next = this.challengeResponses.shift();
    if (next instanceof Error) throw next;
    return next ?? { id: `challenge_${this.nextId++}` };
  }

  async cancelChallenge(challengeId: string): Promise<void> {
    this.cancelled.push(challengeId);
  }

  async acceptChallenge(challengeId: string): Promise<void> {
    const error = this.acceptErrors.get(challengeId);
    if (error) throw error;
    this.accepted.push(challengeId);
  }

  async listOnlineBots(): Promise<UserProfile[]> {
    this.listCalls++;
    if (this.listError) throw this.listError;
    return this.bots;
  }

  async getPublicProfile(username: string): Promise<UserProfile> {
    return this.publicProfiles.get(username) ?? { username, blocking: false };
  }

  async getOwnProfile(): Promise<UserProfile> {
    return this.ownProfile;
  }
}

export function bot(username: string, category: string, rating: number, games = 10): UserProfile {
  return { username, perfs: { [category]: { rating, games } } };
}

export function incoming(id: string, isBot: boolean, speed: string): IncomingChallenge {
  return {
    id,
    speed,
    variant: "standard",
    rated: true,
    fromSelf: false,
    challenger: { name: `${id}_player`, isBot },
  };
}

/** Matchmaking enabled, standard rated games, 1 minute post-game cooldown */
export function matchmakingConfig(overrides: Partial<MatchmakingConfig> = {}): MatchmakingConfig {
  return {
    ...defaultMatchmakingConfig(),
    allowMatchmaking: true,
    allowDuringGames: true,
    challengeVariant: "standard",
    challengeMode: "rated",
    challengeTimeoutMinutes: 1,
    challengeInitialTime: [60, 600],
    challengeIncrement: [0],
    challengeDays: [1],
    challengeFilter: "fine",
    ...overrides,
  };
}
