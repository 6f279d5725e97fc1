/**
 * Matchmaking - Rating Categories, Lanes and Time Controls
 *
 * The server keeps one rating pool per variant, and for standard chess one
 * per speed. Bot games are further split into a short lane (fast clocks)
 * and a long lane (slow clocks) for slot accounting.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BotLane = "short" | "long";

export type Lane = "human" | "bot-short" | "bot-long" | "correspondence" | "any";

export interface TimeControl {
  /** Seconds on the clock at the start */
  baseTime: number;
  /** Seconds added per move */
  increment: number;
  /** Days per move, 0 for real-time */
  days: number;
}

export interface TimeControlConfig {
  challengeInitialTime: readonly number[];
  challengeIncrement: readonly number[];
  challengeDays: readonly number[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const BOT_SHORT_SPEEDS: ReadonlySet<string> = new Set(["ultraBullet", "bullet", "blitz"]);
export const BOT_LONG_SPEEDS: ReadonlySet<string> = new Set(["rapid", "classical"]);
export const CORRESPONDENCE_SPEED = "correspondence";

export const ALL_BOT_LANES: ReadonlySet<BotLane> = new Set<BotLane>(["short", "long"]);

/** Moves assumed per game when turning base + increment into one duration */
const EXPECTED_MOVES = 40;

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

export function botLaneForSpeed(speed: string): BotLane {
  return BOT_SHORT_SPEEDS.has(speed) ? "short" : "long";
}

export function isCorrespondenceSpeed(speed: string): boolean {
  return speed === CORRESPONDENCE_SPEED;
}

/**
 * Rating category of a game: the variant name for non-standard games,
 * "correspondence" when days are set, otherwise a speed derived from the
 * estimated game duration.
 */
export function gameCategory(
  variant: string,
  baseTime: number,
  increment: number,
  days: number
): string {
  if (variant !== "standard") return variant;
  if (days) return CORRESPONDENCE_SPEED;

  const duration = baseTime + increment * EXPECTED_MOVES;
  if (duration < 179) return "bullet";
  if (duration < 479) return "blitz";
  if (duration < 1499) return "rapid";
  return "classical";
}

// ---------------------------------------------------------------------------
// Configured time controls
// ---------------------------------------------------------------------------

/**
 * Every configured time control. Real-time controls are the cross product
 * of base times and increments; each day count is its own correspondence
 * control. With `allowedLanes` set, real-time controls must fall in an
 * allowed lane and correspondence controls need the long lane.
 */
export function configuredTimeControls(
  config: TimeControlConfig,
  allowedLanes: ReadonlySet<BotLane> | null = null,
  includeCorrespondence = true
): TimeControl[] {
  const baseTimes = config.challengeInitialTime.length ? config.challengeInitialTime : [0];
  const increments = config.challengeIncrement.length ? config.challengeIncrement : [0];

  const controls: TimeControl[] = [];
  for (const baseTime of baseTimes) {
    for (const increment of increments) {
      if (!(baseTime || increment)) continue;
      const speed = gameCategory("standard", baseTime, increment, 0);
      if (allowedLanes === null || allowedLanes.has(botLaneForSpeed(speed))) {
        controls.push({ baseTime, increment, days: 0 });
      }
    }
  }

  if (includeCorrespondence) {
    for (const days of config.challengeDays) {
      if (!days) continue;
      if (allowedLanes === null || allowedLanes.has("long")) {
        controls.push({ baseTime: 0, increment: 0, days });
      }
    }
  }

  return controls;
}
