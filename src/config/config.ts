/**
 * Config - Bot and Matchmaking Configuration
 *
 * Loaded from TOML and merged over defaults, then normalised field by field
 * into typed values. A value of the wrong type falls back to that field's
 * default rather than failing the whole file.
 *
 * Example (config/default.toml):
 *
 *   concurrency = 3
 *   variants = ["standard", "chess960"]
 *
 *   [matchmaking]
 *   allowMatchmaking = true
 *   challengeInitialTime = [60, 600]
 *   challengeIncrement = [0]
 *   challengeDays = [1]
 *
 *   [matchmaking.overrides.fast]
 *   challengeInitialTime = [30]
 */

import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseToml } from "toml";

import type { ChallengeFilter } from "../matchmaking/acceptance.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ChallengeMode = "casual" | "rated";
export type RatingPreference = "high" | "low" | "none";

export interface MatchmakingConfig {
  allowMatchmaking: boolean;
  /** When false, only challenge while no game is running */
  allowDuringGames: boolean;
  /** Post-game cooldown */
  challengeTimeoutMinutes: number;
  challengeInitialTime: number[];
  challengeIncrement: number[];
  challengeDays: number[];
  /** A variant name or "random" */
  challengeVariant: string;
  challengeMode: ChallengeMode | "random";
  opponentMinRating: number;
  opponentMaxRating: number;
  /** Recentres the rating window on our own rating when set */
  opponentRatingDifference: number | null;
  ratingPreference: RatingPreference;
  challengeFilter: ChallengeFilter;
  blockList: string[];
  /** URLs of plain-text username lists */
  onlineBlockList: string[];
  overrides: Record<string, MatchmakingOverride>;
  /** Outgoing correspondence games to keep running, may be Infinity */
  maxBackgroundCorrespondenceGames: number;
}

/** Fields an override may replace */
export type MatchmakingOverride = Partial<
  Omit<MatchmakingConfig, "overrides" | "blockList" | "onlineBlockList" | "maxBackgroundCorrespondenceGames">
>;

export interface BotConfig {
  /** Game server base URL */
  url: string;
  token: string;
  /** Total simultaneous games */
  concurrency: number;
  /** Variants we are willing to play */
  variants: string[];
  pollIntervalMs: number;
  matchmaking: MatchmakingConfig;
}

type RawTable = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function defaultMatchmakingConfig(): MatchmakingConfig {
  return {
    allowMatchmaking: false,
    allowDuringGames: false,
    challengeTimeoutMinutes: 30,
    challengeInitialTime: [60, 180],
    challengeIncrement: [1, 2],
    challengeDays: [],
    challengeVariant: "random",
    challengeMode: "random",
    opponentMinRating: 600,
    opponentMaxRating: 4000,
    opponentRatingDifference: null,
    ratingPreference: "none",
    challengeFilter: "coarse",
    blockList: [],
    onlineBlockList: [],
    overrides: {},
    maxBackgroundCorrespondenceGames: 1,
  };
}

export function defaultConfig(): BotConfig {
  return {
    url: "https://lichess.org",
    token: "",
    concurrency: 1,
    variants: ["standard"],
    pollIntervalMs: 10_000,
    matchmaking: defaultMatchmakingConfig(),
  };
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

export function loadConfig(configPath?: string): BotConfig {
  const raw: RawTable = {};
  const configDir = join(homedir(), ".bot-matchmaker");

  const paths = [
    configPath,
    join(configDir, "config.toml"),
    join(process.cwd(), "config", "default.toml"),
  ].filter((p): p is string => typeof p === "string" && p.length > 0);

  for (const p of paths) {
    if (existsSync(p)) {
      try {
        mergeConfig(raw, parseTomlTable(readFileSync(p, "utf-8")));
        console.log(`[config] Loaded config from ${p}`);
        break;
      } catch (err) {
        console.error(`[config] Failed to parse config at ${p}: ${err}`);
      }
    }
  }

  return parseConfig(raw);
}

/** Parse TOML text into a typed config. Throws on TOML syntax errors. */
export function parseConfigText(text: string): BotConfig {
  return parseConfig(parseTomlTable(text));
}

function parseTomlTable(text: string): RawTable {
  const parsed: unknown = parseToml(text);
  return isTable(parsed) ? parsed : {};
}

export function mergeConfig(target: RawTable, source: RawTable): void {
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = target[key];
    if (isTable(srcVal) && isTable(tgtVal)) {
      mergeConfig(tgtVal, srcVal);
    } else {
      target[key] = srcVal;
    }
  }
}

export function parseConfig(raw: RawTable): BotConfig {
  const defaults = defaultConfig();
  const concurrency = integer(raw.concurrency, defaults.concurrency);

  return {
    url: str(raw.url, defaults.url).replace(/\/+$/, ""),
    token: str(raw.token, process.env.BOT_TOKEN ?? defaults.token),
    concurrency: concurrency > 0 ? concurrency : defaults.concurrency,
    variants: stringList(raw.variants, defaults.variants),
    pollIntervalMs: integer(raw.pollIntervalMs, defaults.pollIntervalMs),
    matchmaking: parseMatchmakingConfig(isTable(raw.matchmaking) ? raw.matchmaking : {}),
  };
}

export function parseMatchmakingConfig(raw: RawTable): MatchmakingConfig {
  const base = { ...defaultMatchmakingConfig(), ...parseOverride(raw) };

  const overrides: Record<string, MatchmakingOverride> = {};
  if (isTable(raw.overrides)) {
    for (const [name, value] of Object.entries(raw.overrides)) {
      if (isTable(value)) overrides[name] = parseOverride(value);
    }
  }

  return {
    ...base,
    blockList: stringList(raw.blockList, []),
    onlineBlockList: stringList(raw.onlineBlockList, []),
    overrides,
    maxBackgroundCorrespondenceGames: parseMaxBackgroundCorrespondenceGames(
      raw.maxBackgroundCorrespondenceGames
    ),
  };
}

/** Only the fields present (and well-typed) in `raw` */
export function parseOverride(raw: RawTable): MatchmakingOverride {
  const o: MatchmakingOverride = {};

  if (typeof raw.allowMatchmaking === "boolean") o.allowMatchmaking = raw.allowMatchmaking;
  if (typeof raw.allowDuringGames === "boolean") o.allowDuringGames = raw.allowDuringGames;
  if (isNumber(raw.challengeTimeoutMinutes)) o.challengeTimeoutMinutes = raw.challengeTimeoutMinutes;
  if (isNumberList(raw.challengeInitialTime)) o.challengeInitialTime = raw.challengeInitialTime;
  if (isNumberList(raw.challengeIncrement)) o.challengeIncrement = raw.challengeIncrement;
  if (isNumberList(raw.challengeDays)) o.challengeDays = raw.challengeDays;
  if (typeof raw.challengeVariant === "string") o.challengeVariant = raw.challengeVariant;
  if (raw.challengeMode === "casual" || raw.challengeMode === "rated" || raw.challengeMode === "random") {
    o.challengeMode = raw.challengeMode;
  }
  if (isNumber(raw.opponentMinRating)) o.opponentMinRating = raw.opponentMinRating;
  if (isNumber(raw.opponentMaxRating)) o.opponentMaxRating = raw.opponentMaxRating;
  if (isNumber(raw.opponentRatingDifference)) o.opponentRatingDifference = raw.opponentRatingDifference;
  if (raw.ratingPreference === "high" || raw.ratingPreference === "low") {
    o.ratingPreference = raw.ratingPreference;
  } else if (typeof raw.ratingPreference === "string") {
    o.ratingPreference = "none";
  }
  if (raw.challengeFilter === "none" || raw.challengeFilter === "coarse" || raw.challengeFilter === "fine") {
    o.challengeFilter = raw.challengeFilter;
  }

  return o;
}

/** Unset -> 1; "inf"/"unlimited"/Infinity -> Infinity; negative -> 0 */
export function parseMaxBackgroundCorrespondenceGames(value: unknown): number {
  if (value === undefined || value === null) return 1;
  if (value === Infinity) return Infinity;
  if (typeof value === "string") {
    const lowered = value.trim().toLowerCase();
    if (lowered === "inf" || lowered === "infinity" || lowered === "unlimited") return Infinity;
    const parsed = Number.parseInt(lowered, 10);
    return Number.isFinite(parsed) ? Math.max(0, parsed) : 1;
  }
  if (isNumber(value)) return Math.max(0, Math.trunc(value));
  return 1;
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

/** Overlay the fields present in `override`; `base` is left untouched. */
export function applyOverride(
  base: Readonly<MatchmakingConfig>,
  override: MatchmakingOverride
): Readonly<MatchmakingConfig> {
  const effective: MatchmakingConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(effective, { [key]: value });
    }
  }
  return Object.freeze(effective);
}

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

function isTable(value: unknown): value is RawTable {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(isNumber);
}

function str(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function integer(value: unknown, fallback: number): number {
  return isNumber(value) ? Math.trunc(value) : fallback;
}

function stringList(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  return value.filter((v): v is string => typeof v === "string");
}
