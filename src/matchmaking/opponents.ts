/**
 * Matchmaking - Opponent Selection
 *
 * Picks whom to challenge and on what terms:
 *   1. pick a named config override (or none) and overlay it
 *   2. resolve "random" variant / mode
 *   3. pick a time control allowed by the open lanes
 *   4. filter online bots by blocklists, experience and rating window
 *   5. prefer bots that have not declined this kind of game lately
 *   6. weighted draw by rating preference
 *   7. make sure the chosen bot does not block us
 */

import { applyOverride, type MatchmakingConfig, type ChallengeMode } from "../config/config.js";
import { configuredTimeControls, gameCategory, type BotLane, type TimeControl } from "./categories.js";
import { choice, weightedChoice, mathRandom, type RandomSource } from "./random.js";
import type { AcceptanceMemory } from "./acceptance.js";
import type { OnlineBlocklist } from "./blocklist.js";
import type { GameService, UserProfile } from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OpponentChoice extends TimeControl {
  /** null when nobody suitable was found */
  opponent: string | null;
  variant: string;
  mode: ChallengeMode;
}

export interface OpponentSelectorDeps {
  service: GameService;
  config: Readonly<MatchmakingConfig>;
  /** Variants we play; "fromPosition" is never offered */
  variants: readonly string[];
  memory: AcceptanceMemory;
  onlineBlocklist: OnlineBlocklist;
  /** Our latest profile, for the username and own ratings */
  ownProfile: () => UserProfile;
  random?: RandomSource;
}

interface RatingWindow {
  min: number;
  max: number;
}

const MODES: readonly ChallengeMode[] = ["casual", "rated"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function perfRating(profile: UserProfile, category: string): number {
  return profile.perfs?.[category]?.rating ?? 0;
}

function perfGames(profile: UserProfile, category: string): number {
  return profile.perfs?.[category]?.games ?? 0;
}

/**
 * Selection weight per candidate. With "high" a bot at the top of the
 * window is about twice as likely as one at the bottom; "low" mirrors it.
 * Weights are never negative.
 */
export function getWeights(
  candidates: readonly UserProfile[],
  ratingPreference: string,
  minRating: number,
  maxRating: number,
  category: string
): number[] {
  if (ratingPreference === "high") {
    const reduceBy = Math.min(minRating - (maxRating - minRating), minRating - 1);
    return candidates.map((bot) => Math.max(perfRating(bot, category) - reduceBy, 0));
  }
  if (ratingPreference === "low") {
    const reduceBy = Math.max(maxRating - (minRating - maxRating), maxRating + 1);
    return candidates.map((bot) => Math.max(reduceBy - perfRating(bot, category), 0));
  }
  return candidates.map(() => 1);
}

// ---------------------------------------------------------------------------
// OpponentSelector
// ---------------------------------------------------------------------------

export class OpponentSelector {
  private readonly random: RandomSource;
  private readonly variants: string[];

  constructor(private readonly deps: OpponentSelectorDeps) {
    this.random = deps.random ?? mathRandom;
    const variants = deps.variants.filter((v) => v !== "fromPosition");
    this.variants = variants.length > 0 ? variants : ["standard"];
  }

  /** The base config with one randomly picked override (or none) applied. */
  effectiveConfig(): Readonly<MatchmakingConfig> {
    const names: Array<string | null> = [...Object.keys(this.deps.config.overrides), null];
    const picked = choice(names, this.random);
    console.log(`[matchmaking] Using the ${picked ?? "default"} matchmaking configuration.`);
    return picked === null
      ? this.deps.config
      : applyOverride(this.deps.config, this.deps.config.overrides[picked]);
  }

  resolveVariant(config: Readonly<MatchmakingConfig>): string {
    return config.challengeVariant === "random"
      ? choice(this.variants, this.random)
      : config.challengeVariant;
  }

  resolveMode(config: Readonly<MatchmakingConfig>): ChallengeMode {
    return config.challengeMode === "random" ? choice(MODES, this.random) : config.challengeMode;
  }

  ratingWindow(config: Readonly<MatchmakingConfig>, category: string): RatingWindow {
    const ownRating = perfRating(this.deps.ownProfile(), category);
    const diff = config.opponentRatingDifference;
    if (diff !== null && ownRating > 0) {
      return { min: ownRating - diff, max: ownRating + diff };
    }
    return { min: config.opponentMinRating, max: config.opponentMaxRating };
  }

  isBlocked(username: string): boolean {
    return this.deps.memory.isBlocked(username) || this.deps.onlineBlocklist.has(username);
  }

  async chooseOpponent(
    allowedLanes: ReadonlySet<BotLane> | null,
    correspondenceOnly: boolean
  ): Promise<OpponentChoice> {
    const config = this.effectiveConfig();
    const variant = this.resolveVariant(config);
    const mode = this.resolveMode(config);
    const none: OpponentChoice = { opponent: null, baseTime: 0, increment: 0, days: 0, variant, mode };

    const controls = configuredTimeControls(config, allowedLanes, correspondenceOnly).filter((c) =>
      correspondenceOnly ? c.days > 0 : c.days === 0
    );
    if (controls.length === 0) {
      console.error("[matchmaking] No valid time controls are available for matchmaking with the current settings.");
      return none;
    }

    const control = choice(controls, this.random);
    const terms: OpponentChoice = { ...none, ...control };
    const category = gameCategory(variant, control.baseTime, control.increment, control.days);
    const { min, max } = this.ratingWindow(config, category);
    console.log(`[matchmaking] Seeking ${category} game with opponent rating in [${min}, ${max}] ...`);

    let candidates: UserProfile[] = [];
    try {
      await this.deps.onlineBlocklist.refresh();
      const ownName = this.deps.ownProfile().username;
      const online = await this.deps.service.listOnlineBots();
      candidates = online.filter((bot) => {
        const rating = perfRating(bot, category);
        return (
          bot.username !== ownName &&
          !this.isBlocked(bot.username) &&
          perfGames(bot, category) > 0 &&
          min <= rating &&
          rating <= max
        );
      });

      if (config.challengeFilter === "fine") {
        const aspects = [variant, category, mode];
        const ready = candidates.filter((bot) =>
          aspects.every((aspect) => this.deps.memory.isAcceptable(bot.username, aspect))
        );
        if (ready.length > 0) candidates = ready;
      }

      if (candidates.length === 0) {
        console.error("[matchmaking] No suitable bots found to challenge.");
        return terms;
      }

      const weights = getWeights(candidates, config.ratingPreference, min, max, category);
      const bot = weightedChoice(candidates, weights, this.random);
      const publicProfile = await this.deps.service.getPublicProfile(bot.username);
      if (publicProfile.blocking) {
        console.log(`[matchmaking] ${bot.username} blocks us, adding to block list`);
        this.deps.memory.block(bot.username);
        return terms;
      }
      return { ...terms, opponent: bot.username };
    } catch (err) {
      if (candidates.length > 0) {
        console.error(`[matchmaking] Error choosing opponent: ${err instanceof Error ? err.message : String(err)}`);
      } else {
        console.error("[matchmaking] No suitable bots found to challenge.");
      }
      return terms;
    }
  }
}
