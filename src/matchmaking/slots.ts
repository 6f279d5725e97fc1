/**
 * Matchmaking - Slot Tracker
 *
 * Splits the concurrent game budget into lanes. Strict lane accounting only
 * applies at a capacity of exactly three: one slot for a human opponent, one
 * for a short-clock bot game and one for a long-clock bot game, with
 * correspondence games riding alongside. Any other capacity is a single pool
 * gated by the active game count, and every mutation is a no-op.
 *
 * Reservation lifecycle:
 *   reserveGame / reserveOutgoingChallenge -> confirmGameStart -> release
 */

import {
  botLaneForSpeed,
  isCorrespondenceSpeed,
  ALL_BOT_LANES,
  CORRESPONDENCE_SPEED,
  type BotLane,
  type Lane,
} from "./categories.js";
import type { IncomingChallenge } from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const ACCOUNTED_CAPACITY = 3;
const MAX_BOT_LANE_RESERVATIONS = 2;

export type ActiveGames = ReadonlySet<string>;

// ---------------------------------------------------------------------------
// SlotTracker
// ---------------------------------------------------------------------------

export class SlotTracker {
  readonly accountingEnabled: boolean;
  private reservations = new Map<string, Lane>();
  private pendingOutgoingChallenges = new Set<string>();
  private pendingOutgoingCorrespondence = new Set<string>();

  constructor(readonly capacity: number) {
    this.accountingEnabled = capacity === ACCOUNTED_CAPACITY;
  }

  laneFor(isBotGame: boolean, speed: string): Lane {
    if (isCorrespondenceSpeed(speed)) return "correspondence";
    if (!this.accountingEnabled) return "any";
    if (!isBotGame) return "human";
    return botLaneForSpeed(speed) === "short" ? "bot-short" : "bot-long";
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  reserveGame(id: string, isBotGame: boolean, speed: string): void {
    if (!this.accountingEnabled) return;
    this.reservations.set(id, this.laneFor(isBotGame, speed));
    this.pendingOutgoingChallenges.delete(id);
    this.pendingOutgoingCorrespondence.delete(id);
  }

  /** Hold a lane for a challenge we sent until it is accepted or dropped. */
  reserveOutgoingChallenge(id: string, speed: string): void {
    if (!this.accountingEnabled) return;
    this.reservations.set(id, this.laneFor(true, speed));
    if (isCorrespondenceSpeed(speed)) {
      this.pendingOutgoingCorrespondence.add(id);
    } else {
      this.pendingOutgoingChallenges.add(id);
    }
  }

  confirmGameStart(id: string): void {
    if (!this.accountingEnabled) return;
    this.pendingOutgoingChallenges.delete(id);
    this.pendingOutgoingCorrespondence.delete(id);
  }

  release(id: string): void {
    if (!this.accountingEnabled) return;
    this.pendingOutgoingChallenges.delete(id);
    this.pendingOutgoingCorrespondence.delete(id);
    this.reservations.delete(id);
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  hasReservation(id: string): boolean {
    if (!this.accountingEnabled) return false;
    return this.reservations.has(id);
  }

  isCorrespondence(id: string): boolean {
    if (!this.accountingEnabled) return false;
    return this.reservations.get(id) === CORRESPONDENCE_SPEED;
  }

  isPendingOutgoing(id: string): boolean {
    return this.pendingOutgoingChallenges.has(id) || this.pendingOutgoingCorrespondence.has(id);
  }

  /**
   * Active games plus real-time challenges we sent that have not become a
   * game yet. Pending correspondence challenges are not counted.
   */
  usedSlots(activeGames: ActiveGames): number {
    if (!this.accountingEnabled) return activeGames.size;
    let pending = 0;
    for (const id of this.pendingOutgoingChallenges) {
      if (!activeGames.has(id)) pending++;
    }
    return activeGames.size + pending;
  }

  hasCorrespondenceReservation(): boolean {
    return this.correspondenceReservationCount() > 0;
  }

  needsCorrespondenceGame(): boolean {
    return this.accountingEnabled && !this.hasCorrespondenceReservation();
  }

  correspondenceReservationCount(): number {
    if (!this.accountingEnabled) return 0;
    let count = 0;
    for (const lane of this.reservations.values()) {
      if (lane === "correspondence") count++;
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Capacity checks
  // -------------------------------------------------------------------------

  canAcceptHuman(activeGames: ActiveGames): boolean {
    return this.usedSlots(activeGames) < this.capacity;
  }

  canAcceptCorrespondence(activeGames: ActiveGames): boolean {
    if (!this.accountingEnabled) return this.usedSlots(activeGames) < this.capacity;
    return true;
  }

  canAcceptBotSpeed(speed: string, activeGames: ActiveGames): boolean {
    if (isCorrespondenceSpeed(speed)) return this.canAcceptCorrespondence(activeGames);
    if (this.usedSlots(activeGames) >= this.capacity) return false;
    if (!this.accountingEnabled) return true;

    const { short, long } = this.botLaneCounts();
    if (short + long >= MAX_BOT_LANE_RESERVATIONS) return false;
    return botLaneForSpeed(speed) === "short" ? short === 0 : long === 0;
  }

  canAcceptChallenge(challenge: IncomingChallenge, activeGames: ActiveGames): boolean {
    if (isCorrespondenceSpeed(challenge.speed)) return this.canAcceptCorrespondence(activeGames);
    if (challenge.challenger.isBot) return this.canAcceptBotSpeed(challenge.speed, activeGames);
    return this.canAcceptHuman(activeGames);
  }

  /** Bot lanes an outgoing matchmaking challenge may fill right now. */
  availableBotLanes(activeGames: ActiveGames): Set<BotLane> {
    if (this.usedSlots(activeGames) >= this.capacity) return new Set();
    if (!this.accountingEnabled) return new Set(ALL_BOT_LANES);

    const { short, long } = this.botLaneCounts();
    const lanes = new Set<BotLane>();
    if (short + long >= MAX_BOT_LANE_RESERVATIONS) return lanes;
    if (short === 0) lanes.add("short");
    if (long === 0) lanes.add("long");
    return lanes;
  }

  /** A correspondence move borrows the compute of a free bot lane. */
  canStartCorrespondenceMove(activeGames: ActiveGames): boolean {
    if (this.usedSlots(activeGames) >= this.capacity) return false;
    if (!this.accountingEnabled) return true;
    return this.availableBotLanes(activeGames).size > 0;
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private botLaneCounts(): { short: number; long: number } {
    let short = 0;
    let long = 0;
    for (const lane of this.reservations.values()) {
      if (lane === "bot-short") short++;
      else if (lane === "bot-long") long++;
    }
    return { short, long };
  }
}
