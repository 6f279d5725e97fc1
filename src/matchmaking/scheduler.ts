/**
 * Matchmaking - Challenge Scheduler
 *
 * Decides, once per poll tick, whether to send an outgoing challenge and
 * with which lanes in mind. All gating is done with passive timers:
 *
 *   challenge created  25s   an unanswered challenge is cancelled after this
 *   min wait           60s   spacing between challenges
 *   max wait           10m   spacing while games are running (no slot accounting)
 *   post-game          cfg   cooldown after a game ends
 *   rate limit         srv   cooldown the server asked for
 *
 * With slot accounting the scheduler also keeps a background target of
 * outgoing correspondence games topped up.
 */

import { Timer, seconds, minutes, years, systemClock, type Clock } from "./timer.js";
import { gameCategory, type BotLane, type TimeControl } from "./categories.js";
import { AcceptanceMemory, declineAspect, DEFAULT_SUPPRESSION_MS } from "./acceptance.js";
import { OnlineBlocklist } from "./blocklist.js";
import { OpponentSelector, type OpponentChoice } from "./opponents.js";
import type { SlotTracker, ActiveGames } from "./slots.js";
import type { RandomSource } from "./random.js";
import type { MatchmakingConfig, ChallengeMode } from "../config/config.js";
import {
  RateLimitedError,
  type ChallengeParams,
  type ChallengeResponse,
  type DeclinedChallenge,
  type FetchFn,
  type GameService,
  type IncomingChallenge,
  type UserProfile,
} from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchedulerDeps {
  service: GameService;
  config: Readonly<MatchmakingConfig>;
  variants: readonly string[];
  slots: SlotTracker;
  userProfile: UserProfile;
  clock?: Clock;
  random?: RandomSource;
  /** Used by the online blocklist */
  fetchFn?: FetchFn;
}

export interface ChallengeTerms extends TimeControl {
  variant: string;
  mode: ChallengeMode;
}

export interface EligibilityOptions {
  ignorePostgame?: boolean;
  ignoreMinWait?: boolean;
}

// ---------------------------------------------------------------------------
// Intervals (ms)
// ---------------------------------------------------------------------------

/** The server drops unanswered challenges after ~20s */
const CHALLENGE_EXPIRY = seconds(25);
const MIN_WAIT = seconds(60);
const MAX_WAIT_DURING_GAMES = minutes(10);
const PROFILE_REFRESH = minutes(5);
const DEFAULT_RATE_LIMIT = minutes(1);

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

// ---------------------------------------------------------------------------
// MatchmakingScheduler
// ---------------------------------------------------------------------------

export class MatchmakingScheduler {
  readonly memory: AcceptanceMemory;
  readonly selector: OpponentSelector;
  readonly maxBackgroundCorrespondenceGames: number;

  private readonly service: GameService;
  private readonly config: Readonly<MatchmakingConfig>;
  private readonly slots: SlotTracker;
  private readonly clock: Clock;
  private readonly minWaitMs = MIN_WAIT;
  private readonly maxWaitMs: number;

  private lastChallengeCreated: Timer;
  private lastGameEnded: Timer;
  private profileRefresh: Timer;
  private rateLimit: Timer;

  private userProfile: UserProfile;
  private challengeId = "";
  private forceImmediateChallenge = false;

  constructor(deps: SchedulerDeps) {
    this.service = deps.service;
    this.config = deps.config;
    this.slots = deps.slots;
    this.clock = deps.clock ?? systemClock;
    this.userProfile = deps.userProfile;

    this.lastChallengeCreated = new Timer(CHALLENGE_EXPIRY, this.clock);
    this.lastGameEnded = new Timer(minutes(this.config.challengeTimeoutMinutes), this.clock);
    this.profileRefresh = new Timer(PROFILE_REFRESH, this.clock);
    this.rateLimit = new Timer(0, this.clock);
    this.maxWaitMs = this.config.allowDuringGames ? MAX_WAIT_DURING_GAMES : years(10);
    this.maxBackgroundCorrespondenceGames = this.config.maxBackgroundCorrespondenceGames;

    this.memory = new AcceptanceMemory(this.clock);
    for (const name of this.config.blockList) {
      this.addToBlockList(name);
    }

    this.selector = new OpponentSelector({
      service: this.service,
      config: this.config,
      variants: deps.variants,
      memory: this.memory,
      onlineBlocklist: new OnlineBlocklist(this.config.onlineBlockList, {
        clock: this.clock,
        fetchFn: deps.fetchFn,
      }),
      ownProfile: () => this.userProfile,
      random: deps.random,
    });
  }

  /** Id of the challenge we are waiting on, "" when none */
  get outstandingChallengeId(): string {
    return this.challengeId;
  }

  get profile(): UserProfile {
    return this.userProfile;
  }

  // -------------------------------------------------------------------------
  // Eligibility
  // -------------------------------------------------------------------------

  /**
   * Whether a challenge may be created now. Cancels (and frees the slot of)
   * an outstanding challenge that has outlived its expiry window.
   */
  async shouldCreateChallenge(options: EligibilityOptions = {}): Promise<boolean> {
    const { ignorePostgame = false, ignoreMinWait = false } = options;

    const postgameOk = ignorePostgame || this.lastGameEnded.isExpired();
    const cooledDown = postgameOk && this.rateLimit.isExpired();
    const challengeExpired = this.lastChallengeCreated.isExpired() && this.challengeId !== "";
    const minWaitPassed = ignoreMinWait || this.lastChallengeCreated.timeSinceReset() > this.minWaitMs;

    if (challengeExpired) {
      const expiredId = this.challengeId;
      try {
        await this.service.cancelChallenge(expiredId);
        console.log(`[matchmaking] Challenge id ${expiredId} cancelled.`);
      } catch (err) {
        console.warn(`[matchmaking] Failed to cancel challenge ${expiredId}: ${errorMessage(err)}`);
      }
      this.discardChallenge(expiredId);
      this.slots.release(expiredId);
      this.showEarliestChallengeTime();
    }

    return this.config.allowMatchmaking && cooledDown && (minWaitPassed || challengeExpired);
  }

  // -------------------------------------------------------------------------
  // Per-tick decision
  // -------------------------------------------------------------------------

  /**
   * Run one matchmaking decision. Queued incoming challenges take priority:
   * nothing is sent while any is waiting to be accepted.
   */
  async challenge(
    activeGames: ActiveGames,
    challengeQueue: readonly IncomingChallenge[],
    maxGames: number
  ): Promise<void> {
    if (challengeQueue.length > 0) return;

    if (await this.replenishBackgroundCorrespondence(activeGames)) return;

    const maxGamesForMatchmaking = this.config.allowDuringGames ? maxGames : Math.min(1, maxGames);
    const gameCount = activeGames.size;
    if (gameCount >= maxGamesForMatchmaking) return;

    const allowedLanes = this.slots.availableBotLanes(activeGames);
    if (allowedLanes.size === 0) return;

    // Slot accounting fills a missing lane quickly
    const cooldownWhileGamesActive = this.slots.accountingEnabled ? this.minWaitMs : this.maxWaitMs;
    if (gameCount > 0 && this.lastChallengeCreated.timeSinceReset() < cooldownWhileGamesActive) return;

    if (!(await this.shouldCreateChallenge())) return;

    await this.createMatchmakingChallenge(activeGames, allowedLanes, false);
  }

  /** Send a correspondence challenge when below the background target. */
  async replenishBackgroundCorrespondence(activeGames: ActiveGames): Promise<boolean> {
    if (!this.slots.accountingEnabled) return false;
    if (this.slots.correspondenceReservationCount() >= this.maxBackgroundCorrespondenceGames) return false;

    const ignoreMinWait = this.forceImmediateChallenge;
    this.forceImmediateChallenge = false;
    if (!(await this.shouldCreateChallenge({ ignorePostgame: true, ignoreMinWait }))) return false;

    return this.createMatchmakingChallenge(activeGames, null, true);
  }

  async createMatchmakingChallenge(
    activeGames: ActiveGames,
    allowedLanes: ReadonlySet<BotLane> | null,
    correspondenceOnly: boolean
  ): Promise<boolean> {
    // One outstanding challenge at a time; it is cancelled once it expires
    if (this.challengeId) {
      console.log(`[matchmaking] Still waiting on challenge ${this.challengeId}`);
      return false;
    }
    console.log("[matchmaking] Challenging a random bot");
    await this.updateUserProfile();

    const choice: OpponentChoice = await this.selector.chooseOpponent(allowedLanes, correspondenceOnly);
    const { opponent, ...terms } = choice;
    if (!opponent) return false;

    // Incoming challenges may have taken the lane while we were choosing
    const speed = gameCategory("standard", terms.baseTime, terms.increment, terms.days);
    if (!this.slots.canAcceptBotSpeed(speed, activeGames)) {
      console.log(`[matchmaking] No free ${speed} slot anymore, skipping challenge to ${opponent}`);
      return false;
    }

    console.log(`[matchmaking] Will challenge ${opponent} for a ${terms.variant} game.`);
    const challengeId = await this.createChallenge(opponent, terms);
    console.log(`[matchmaking] Challenge id is ${challengeId || "None"}.`);
    this.challengeId = challengeId;
    if (challengeId) {
      this.slots.reserveOutgoingChallenge(challengeId, speed);
    }
    return challengeId !== "";
  }

  /** Send one challenge. Returns its id, or "" when none was created. */
  async createChallenge(username: string, terms: ChallengeTerms): Promise<string> {
    const params: ChallengeParams = { rated: terms.mode === "rated", variant: terms.variant };
    if (terms.days) {
      params.days = terms.days;
    } else if (terms.baseTime || terms.increment) {
      params.clockLimitSeconds = terms.baseTime;
      params.clockIncrementSeconds = terms.increment;
    } else {
      console.error(
        "[matchmaking] At least one of challengeDays, challengeInitialTime, or challengeIncrement " +
          "must be greater than zero in the matchmaking section of your config file."
      );
      return "";
    }

    try {
      this.lastChallengeCreated.reset();
      const response = await this.service.createChallenge(username, params);
      const challengeId = response.id ?? "";
      if (!challengeId) {
        this.handleChallengeErrorResponse(response, username);
      }
      return challengeId;
    } catch (err) {
      if (err instanceof RateLimitedError) {
        console.warn(`[matchmaking] ${err.message}`);
        this.rateLimit = new Timer(err.retryAfterMs, this.clock);
      } else {
        console.debug(`[matchmaking] Challenge request failed: ${errorMessage(err)}`);
      }
    }

    console.warn("[matchmaking] Could not create challenge");
    this.showEarliestChallengeTime();
    return "";
  }

  handleChallengeErrorResponse(response: ChallengeResponse, username: string): void {
    console.error(`[matchmaking] Challenge to ${username} rejected: ${response.error ?? JSON.stringify(response)}`);
    if (response.botIsRateLimited) {
      this.rateLimit = new Timer(response.rateLimitTimeoutMs ?? DEFAULT_RATE_LIMIT, this.clock);
    } else if (response.opponentIsRateLimited) {
      this.addChallengeFilter(username, "", response.rateLimitTimeoutMs);
    } else {
      this.addChallengeFilter(username, "");
    }
    this.showEarliestChallengeTime();
  }

  async updateUserProfile(): Promise<void> {
    if (!this.profileRefresh.isExpired()) return;
    this.profileRefresh.reset();
    try {
      this.userProfile = await this.service.getOwnProfile();
    } catch (err) {
      console.debug(`[matchmaking] Profile refresh failed: ${errorMessage(err)}`);
    }
  }

  // -------------------------------------------------------------------------
  // Challenge lifecycle
  // -------------------------------------------------------------------------

  discardChallenge(challengeId: string): void {
    if (this.challengeId === challengeId) {
      this.challengeId = "";
    }
  }

  acceptedChallenge(gameId: string): void {
    this.discardChallenge(gameId);
    this.slots.confirmGameStart(gameId);
  }

  declinedChallenge(challenge: DeclinedChallenge): void {
    console.log(`[matchmaking] ${challenge.opponent} declined ${challenge.id}: ${challenge.declineReason}`);
    this.discardChallenge(challenge.id);
    if (challenge.fromSelf) {
      this.slots.release(challenge.id);
    }
    if (!challenge.fromSelf || this.config.challengeFilter === "none") return;

    const { aspect, known } = declineAspect(challenge);
    if (!known) {
      console.warn(`[matchmaking] Unknown decline reason received: ${challenge.declineReasonKey.toLowerCase()}`);
    }
    const gameProblem = this.config.challengeFilter === "fine" ? aspect : "";
    this.addChallengeFilter(challenge.opponent, gameProblem);
    console.log(
      `[matchmaking] Will not challenge ${challenge.opponent} to another${gameProblem ? ` ${gameProblem}` : ""} game today.`
    );

    this.showEarliestChallengeTime();
  }

  gameDone(): void {
    this.lastGameEnded.reset();
    this.showEarliestChallengeTime();
  }

  /** The next tick replaces the finished correspondence game without waiting. */
  correspondenceGameDone(): void {
    this.forceImmediateChallenge = true;
  }

  // -------------------------------------------------------------------------
  // Block list and filters
  // -------------------------------------------------------------------------

  addToBlockList(username: string): void {
    this.memory.block(username);
  }

  inBlockList(username: string): boolean {
    return this.selector.isBlocked(username);
  }

  addChallengeFilter(username: string, gameAspect: string, durationMs?: number): void {
    this.memory.suppress(username, gameAspect, durationMs || DEFAULT_SUPPRESSION_MS);
  }

  shouldAcceptChallenge(username: string, gameAspect: string): boolean {
    return this.memory.isAcceptable(username, gameAspect);
  }

  // -------------------------------------------------------------------------
  // Reporting
  // -------------------------------------------------------------------------

  /** Milliseconds until every cooldown allows a new challenge */
  timeUntilNextChallenge(): number {
    const minWaitLeft = this.minWaitMs - this.lastChallengeCreated.timeSinceReset();
    return Math.max(this.lastGameEnded.remaining(), minWaitLeft, this.rateLimit.remaining(), 0);
  }

  showEarliestChallengeTime(): void {
    if (!this.config.allowMatchmaking) return;
    const earliest = new Date(Date.now() + this.timeUntilNextChallenge());
    console.log(`[matchmaking] Next challenge will be created after ${earliest.toLocaleString()}`);
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createMatchmakingScheduler(deps: SchedulerDeps): MatchmakingScheduler {
  return new MatchmakingScheduler(deps);
}
