/**
 * Challenges - Slot-Aware Acceptance
 *
 * Drains the incoming challenge queue into free slots. Human challengers go
 * first; a challenge whose lane is full stays queued for a later tick.
 * Under lane accounting correspondence challenges ignore the game limit and
 * are not added to `activeGames`.
 */

import type { SlotTracker } from "../matchmaking/slots.js";
import { isCorrespondenceSpeed } from "../matchmaking/categories.js";
import { GameServiceError, type GameService, type IncomingChallenge } from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AcceptResult {
  accepted: string[];
  dropped: string[];
}

// ---------------------------------------------------------------------------
// Acceptance
// ---------------------------------------------------------------------------

/** Humans before bots, otherwise queue order. */
export function prioritise(queue: readonly IncomingChallenge[]): IncomingChallenge[] {
  return [...queue].sort((a, b) => Number(a.challenger.isBot) - Number(b.challenger.isBot));
}

/**
 * Accept every queued challenge that fits the slot policy. Accepted ids are
 * removed from `queue`, given a lane reservation and, unless they ride
 * alongside, added to `activeGames`.
 * A challenge the server no longer knows is removed from the queue.
 */
export async function acceptChallenges(
  service: GameService,
  queue: IncomingChallenge[],
  activeGames: Set<string>,
  maxGames: number,
  slots: SlotTracker
): Promise<AcceptResult> {
  const result: AcceptResult = { accepted: [], dropped: [] };

  for (const challenge of prioritise(queue)) {
    const ridesAlongside = slots.accountingEnabled && isCorrespondenceSpeed(challenge.speed);
    if (!ridesAlongside && activeGames.size >= maxGames) continue;

    if (challenge.fromSelf) {
      removeFromQueue(queue, challenge.id);
      result.dropped.push(challenge.id);
      continue;
    }
    if (!slots.canAcceptChallenge(challenge, activeGames)) continue;

    removeFromQueue(queue, challenge.id);
    try {
      console.log(`[accept] Accept ${challenge.id} from ${challenge.challenger.name} (${challenge.speed})`);
      await service.acceptChallenge(challenge.id);
      if (!ridesAlongside) activeGames.add(challenge.id);
      slots.reserveGame(challenge.id, challenge.challenger.isBot, challenge.speed);
      result.accepted.push(challenge.id);
    } catch (err) {
      if (err instanceof GameServiceError && err.status === 404) {
        console.log(`[accept] Skip missing ${challenge.id}`);
      } else {
        console.error(`[accept] Failed to accept ${challenge.id}: ${err instanceof Error ? err.message : String(err)}`);
      }
      result.dropped.push(challenge.id);
    }
  }

  return result;
}

function removeFromQueue(queue: IncomingChallenge[], challengeId: string): void {
  const index = queue.findIndex((c) => c.id === challengeId);
  if (index !== -1) queue.splice(index, 1);
}
