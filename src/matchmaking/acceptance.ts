/**
 * Matchmaking - Challenge Acceptance Memory
 *
 * Remembers which opponents recently declined which kind of challenge so we
 * stop offering it for a while. An entry is keyed by opponent and "aspect":
 * a speed, a variant, a mode ("rated"/"casual"), or the empty string, which
 * means "do not challenge this opponent at all" (a block).
 */

import { Timer, days, years, systemClock, type Clock } from "./timer.js";
import type { DeclinedChallenge } from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ChallengeFilter = "none" | "coarse" | "fine";

export interface DeclineAspect {
  aspect: string;
  /** False when the server sent a reason key we do not recognise */
  known: boolean;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_SUPPRESSION_MS = days(1);
export const BLOCK_DURATION_MS = years(10);

type AspectSource = "none" | "speed" | "mode" | "variant";

const DECLINE_REASONS: Record<string, AspectSource> = {
  generic: "none",
  later: "none",
  nobot: "none",
  toofast: "speed",
  tooslow: "speed",
  timecontrol: "speed",
  rated: "mode",
  casual: "mode",
  standard: "variant",
  variant: "variant",
};

// ---------------------------------------------------------------------------
// Decline reasons
// ---------------------------------------------------------------------------

/**
 * Map a server decline reason to the aspect of the challenge the opponent
 * objected to. Generic and unknown reasons map to "".
 */
export function declineAspect(challenge: DeclinedChallenge): DeclineAspect {
  const key = challenge.declineReasonKey.toLowerCase();
  const source = Object.hasOwn(DECLINE_REASONS, key) ? DECLINE_REASONS[key] : undefined;

  switch (source) {
    case undefined:
      return { aspect: "", known: false };
    case "speed":
      return { aspect: challenge.speed, known: true };
    case "mode":
      return { aspect: challenge.rated ? "rated" : "casual", known: true };
    case "variant":
      return { aspect: challenge.variant, known: true };
    case "none":
      return { aspect: "", known: true };
  }
}

// ---------------------------------------------------------------------------
// AcceptanceMemory
// ---------------------------------------------------------------------------

export class AcceptanceMemory {
  private entries = new Map<string, Map<string, Timer>>();

  constructor(private readonly clock: Clock = systemClock) {}

  /** Do not offer `aspect` to `username` until `durationMs` has passed. */
  suppress(username: string, aspect: string, durationMs: number = DEFAULT_SUPPRESSION_MS): void {
    let aspects = this.entries.get(username);
    if (!aspects) {
      aspects = new Map();
      this.entries.set(username, aspects);
    }
    aspects.set(aspect, new Timer(durationMs, this.clock));
  }

  /** Whether `username` is likely to accept a challenge with `aspect`. Never inserts. */
  isAcceptable(username: string, aspect: string): boolean {
    const timer = this.entries.get(username)?.get(aspect);
    return timer === undefined || timer.isExpired();
  }

  block(username: string): void {
    this.suppress(username, "", BLOCK_DURATION_MS);
  }

  isBlocked(username: string): boolean {
    return !this.isAcceptable(username, "");
  }

  /** Drop expired entries. Returns how many were removed. */
  prune(): number {
    let pruned = 0;
    for (const [username, aspects] of this.entries) {
      for (const [aspect, timer] of aspects) {
        if (timer.isExpired()) {
          aspects.delete(aspect);
          pruned++;
        }
      }
      if (aspects.size === 0) this.entries.delete(username);
    }
    return pruned;
  }
}
