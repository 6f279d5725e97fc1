/**
 * Matchmaking - Online Blocklist
 *
 * Usernames published as plain-text lists (one per line) at configured
 * URLs. Lists are refetched at most once per refresh interval; a URL that
 * fails keeps the names it served last time.
 */

import { Timer, hours, systemClock, type Clock } from "./timer.js";
import type { FetchFn } from "../service/game-service.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OnlineBlocklistOptions {
  refreshIntervalMs?: number;
  fetchTimeoutMs?: number;
  clock?: Clock;
  fetchFn?: FetchFn;
}

// ---------------------------------------------------------------------------
// OnlineBlocklist
// ---------------------------------------------------------------------------

export class OnlineBlocklist {
  private listsByUrl = new Map<string, Set<string>>();
  private refreshTimer: Timer;
  private readonly refreshIntervalMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly clock: Clock;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly urls: readonly string[],
    options: OnlineBlocklistOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.refreshIntervalMs = options.refreshIntervalMs ?? hours(1);
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10_000;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    // Zero-length timer: the first refresh always runs
    this.refreshTimer = new Timer(0, this.clock);
  }

  /** Refetch every list if the refresh interval has passed. */
  async refresh(): Promise<void> {
    if (this.urls.length === 0 || !this.refreshTimer.isExpired()) return;
    this.refreshTimer = new Timer(this.refreshIntervalMs, this.clock);

    for (const url of this.urls) {
      try {
        const response = await this.fetchFn(url, {
          signal: AbortSignal.timeout(this.fetchTimeoutMs),
        });
        if (!response.ok) {
          console.warn(`[blocklist] ${url} returned ${response.status}, keeping previous list`);
          continue;
        }
        const names = parseBlocklist(await response.text());
        this.listsByUrl.set(url, names);
        console.log(`[blocklist] Loaded ${names.size} names from ${url}`);
      } catch (err) {
        console.warn(`[blocklist] Failed to fetch ${url}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  has(username: string): boolean {
    for (const names of this.listsByUrl.values()) {
      if (names.has(username)) return true;
    }
    return false;
  }

  get size(): number {
    const all = new Set<string>();
    for (const names of this.listsByUrl.values()) {
      for (const name of names) all.add(name);
    }
    return all.size;
  }
}

export function parseBlocklist(text: string): Set<string> {
  const names = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const name = line.trim();
    if (name) names.add(name);
  }
  return names;
}
