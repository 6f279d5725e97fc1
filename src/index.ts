/**
 * bot-matchmaker - library entry point
 *
 * Wires the HTTP client, slot tracker and scheduler together for a host
 * that streams game-server events into `handleEvent`.
 */

import { loadConfig, type BotConfig } from "./config/config.js";
import { LichessClient } from "./service/lichess-client.js";
import { createMatchmakerContext, type ContextOptions, type MatchmakerContext } from "./daemon/loop.js";

export * from "./config/config.js";
export * from "./service/game-service.js";
export * from "./service/lichess-client.js";
export * from "./matchmaking/timer.js";
export * from "./matchmaking/categories.js";
export * from "./matchmaking/slots.js";
export * from "./matchmaking/acceptance.js";
export * from "./matchmaking/blocklist.js";
export * from "./matchmaking/random.js";
export * from "./matchmaking/opponents.js";
export * from "./matchmaking/scheduler.js";
export * from "./challenges/acceptor.js";
export * from "./daemon/loop.js";

/**
 * Build a ready-to-run context against the configured game server.
 * Fetches our own profile first; that request failing is fatal.
 */
export async function createMatchmaker(
  config: BotConfig = loadConfig(),
  options: ContextOptions = {}
): Promise<MatchmakerContext> {
  const service = new LichessClient({
    baseUrl: config.url,
    token: config.token,
    fetchFn: options.fetchFn,
  });
  const profile = await service.getOwnProfile();
  console.log(`[matchmaker] Logged in as ${profile.username}`);
  return createMatchmakerContext(config, service, profile, options);
}
