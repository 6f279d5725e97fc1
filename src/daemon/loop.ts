/**
 * Main Matchmaking Loop
 *
 * Periodic operations:
 * - Accept queued incoming challenges that fit a free slot
 * - Run one matchmaking decision
 * - Health log and acceptance-memory pruning
 *
 * Host events (challenges, declines, game start/finish) are routed through
 * `handleEvent`. Ticks never overlap: an interval that fires while the
 * previous tick is still waiting on the game server is skipped.
 */

import { acceptChallenges } from "../challenges/acceptor.js";
import { SlotTracker } from "../matchmaking/slots.js";
import { createMatchmakingScheduler, type MatchmakingScheduler } from "../matchmaking/scheduler.js";
import { isCorrespondenceSpeed } from "../matchmaking/categories.js";
import type { Clock } from "../matchmaking/timer.js";
import type { RandomSource } from "../matchmaking/random.js";
import type { BotConfig } from "../config/config.js";
import type {
  DeclinedChallenge,
  FetchFn,
  GameService,
  IncomingChallenge,
  UserProfile,
} from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MatchmakerContext {
  config: BotConfig;
  service: GameService;
  slots: SlotTracker;
  scheduler: MatchmakingScheduler;
  /** Games holding a real-time slot */
  activeGames: Set<string>;
  /** Correspondence games, which ride alongside the slots under lane accounting */
  correspondenceGames: Set<string>;
  challengeQueue: IncomingChallenge[];
  shutdownRequested: boolean;
}

export interface GameInfo {
  id: string;
  speed: string;
  opponentIsBot: boolean;
}

export type BotEvent =
  | { type: "challenge"; challenge: IncomingChallenge }
  | { type: "challengeCanceled"; challengeId: string }
  | { type: "challengeDeclined"; challenge: DeclinedChallenge }
  | { type: "gameStart"; game: GameInfo }
  | { type: "gameFinish"; game: GameInfo };

export interface ContextOptions {
  clock?: Clock;
  random?: RandomSource;
  fetchFn?: FetchFn;
}

interface LoopTimers {
  tick: ReturnType<typeof setInterval> | null;
  healthCheck: ReturnType<typeof setInterval> | null;
}

interface LoopStats {
  startedAt: number;
  ticks: number;
  skippedTicks: number;
  challengesAccepted: number;
}

// ---------------------------------------------------------------------------
// Intervals (ms)
// ---------------------------------------------------------------------------

const HEALTH_CHECK_INTERVAL = 5 * 60_000; // 5 minutes

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

const timers: LoopTimers = {
  tick: null,
  healthCheck: null,
};

const stats: LoopStats = {
  startedAt: 0,
  ticks: 0,
  skippedTicks: 0,
  challengesAccepted: 0,
};

let tickInProgress = false;

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export function createMatchmakerContext(
  config: BotConfig,
  service: GameService,
  userProfile: UserProfile,
  options: ContextOptions = {}
): MatchmakerContext {
  const slots = new SlotTracker(config.concurrency);
  const scheduler = createMatchmakingScheduler({
    service,
    config: config.matchmaking,
    variants: config.variants,
    slots,
    userProfile,
    clock: options.clock,
    random: options.random,
    fetchFn: options.fetchFn,
  });

  return {
    config,
    service,
    slots,
    scheduler,
    activeGames: new Set(),
    correspondenceGames: new Set(),
    challengeQueue: [],
    shutdownRequested: false,
  };
}

// ---------------------------------------------------------------------------
// Loop control
// ---------------------------------------------------------------------------

export function startMatchmakingLoop(ctx: MatchmakerContext): void {
  stats.startedAt = Date.now();
  console.log(
    `[loop] Matchmaking every ${ctx.config.pollIntervalMs}ms ` +
      `(concurrency=${ctx.config.concurrency}, slot accounting ${ctx.slots.accountingEnabled ? "on" : "off"})`
  );

  timers.tick = setInterval(() => {
    if (ctx.shutdownRequested) return;
    void runTick(ctx);
  }, ctx.config.pollIntervalMs);

  timers.healthCheck = setInterval(() => {
    if (ctx.shutdownRequested) return;
    healthCheck(ctx);
  }, HEALTH_CHECK_INTERVAL);
}

export function stopMatchmakingLoop(): void {
  if (timers.tick) clearInterval(timers.tick);
  if (timers.healthCheck) clearInterval(timers.healthCheck);
  timers.tick = null;
  timers.healthCheck = null;
}

export function getLoopStats(): LoopStats {
  return { ...stats };
}

// ---------------------------------------------------------------------------
// Loop operations
// ---------------------------------------------------------------------------

/** One tick. Returns false when skipped because another tick is running. */
export async function runTick(ctx: MatchmakerContext): Promise<boolean> {
  if (tickInProgress) {
    stats.skippedTicks++;
    return false;
  }
  tickInProgress = true;
  stats.ticks++;
  try {
    const { accepted } = await acceptChallenges(
      ctx.service,
      ctx.challengeQueue,
      ctx.activeGames,
      ctx.config.concurrency,
      ctx.slots
    );
    stats.challengesAccepted += accepted.length;

    await ctx.scheduler.challenge(ctx.activeGames, ctx.challengeQueue, ctx.config.concurrency);
  } catch (err) {
    console.error(`[loop] Tick error: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    tickInProgress = false;
  }
  return true;
}

export function handleEvent(ctx: MatchmakerContext, event: BotEvent): void {
  switch (event.type) {
    case "challenge": {
      const { challenge } = event;
      if (challenge.fromSelf) return;
      if (ctx.challengeQueue.some((c) => c.id === challenge.id)) return;
      ctx.challengeQueue.push(challenge);
      console.log(`[loop] Queued challenge ${challenge.id} from ${challenge.challenger.name}`);
      return;
    }

    case "challengeCanceled":
      removeQueued(ctx, event.challengeId);
      ctx.scheduler.discardChallenge(event.challengeId);
      if (!ctx.activeGames.has(event.challengeId) && !ctx.correspondenceGames.has(event.challengeId)) {
        ctx.slots.release(event.challengeId);
      }
      return;

    case "challengeDeclined":
      removeQueued(ctx, event.challenge.id);
      ctx.scheduler.declinedChallenge(event.challenge);
      return;

    case "gameStart": {
      const { game } = event;
      if (ridesAlongside(ctx, game)) {
        ctx.correspondenceGames.add(game.id);
      } else {
        ctx.activeGames.add(game.id);
      }
      ctx.scheduler.acceptedChallenge(game.id);
      // Games we did not reserve for (e.g. running before a restart)
      if (!ctx.slots.hasReservation(game.id)) {
        ctx.slots.reserveGame(game.id, game.opponentIsBot, game.speed);
      }
      console.log(`[loop] Game ${game.id} started (${game.speed}), ${ctx.activeGames.size} active`);
      return;
    }

    case "gameFinish": {
      const { game } = event;
      const wasCorrespondence = ctx.slots.isCorrespondence(game.id) || isCorrespondenceSpeed(game.speed);
      ctx.activeGames.delete(game.id);
      ctx.correspondenceGames.delete(game.id);
      ctx.slots.release(game.id);
      ctx.scheduler.gameDone();
      if (wasCorrespondence) {
        ctx.scheduler.correspondenceGameDone();
      }
      console.log(`[loop] Game ${game.id} finished, ${ctx.activeGames.size} active`);
      return;
    }
  }
}

function ridesAlongside(ctx: MatchmakerContext, game: GameInfo): boolean {
  if (!ctx.slots.accountingEnabled) return false;
  return ctx.slots.isCorrespondence(game.id) || isCorrespondenceSpeed(game.speed);
}

function removeQueued(ctx: MatchmakerContext, challengeId: string): void {
  const index = ctx.challengeQueue.findIndex((c) => c.id === challengeId);
  if (index !== -1) ctx.challengeQueue.splice(index, 1);
}

function healthCheck(ctx: MatchmakerContext): void {
  const uptime = Math.floor((Date.now() - stats.startedAt) / 1000);
  const pruned = ctx.scheduler.memory.prune();
  console.log(
    `[loop] Health: uptime=${uptime}s active=${ctx.activeGames.size} correspondence=${ctx.correspondenceGames.size} ` +
      `queued=${ctx.challengeQueue.length} used=${ctx.slots.usedSlots(ctx.activeGames)}/${ctx.config.concurrency} ` +
      `ticks=${stats.ticks} skipped=${stats.skippedTicks} accepted=${stats.challengesAccepted} pruned=${pruned}`
  );
}
