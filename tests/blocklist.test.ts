/**
 * Tests - Online blocklist
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OnlineBlocklist, parseBlocklist } from "../src/matchmaking/blocklist.js";
import { hours } from "../src/matchmaking/timer.js";
import { FakeClock } from "./helpers.js";

const LIST_URL = "https://lists.example.test/bots.txt";

describe("OnlineBlocklist", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function setup() {
    const clock = new FakeClock();
    const fetchFn = vi.fn(async (_input: string, _init?: RequestInit) => new Response("bad_one\n\n  bad_two \r\n"));
    const blocklist = new OnlineBlocklist([LIST_URL], { clock, fetchFn });
    return { clock, fetchFn, blocklist };
  }

  it("should load names on the first refresh", async () => {
    const { fetchFn, blocklist } = setup();

    await blocklist.refresh();

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(LIST_URL);
    expect(blocklist.has("bad_one")).toBe(true);
    expect(blocklist.has("bad_two")).toBe(true);
    expect(blocklist.has("good_bot")).toBe(false);
    expect(blocklist.size).toBe(2);
  });

  it("should refetch only after the refresh interval", async () => {
    const { clock, fetchFn, blocklist } = setup();

    await blocklist.refresh();
    await blocklist.refresh();
    expect(fetchFn).toHaveBeenCalledTimes(1);

    clock.advance(hours(1));
    await blocklist.refresh();
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("should keep the previous list when a refresh fails", async () => {
    const { clock, fetchFn, blocklist } = setup();
    await blocklist.refresh();

    fetchFn.mockResolvedValueOnce(new Response("oops", { status: 500 }));
    clock.advance(hours(1));
    await blocklist.refresh();
    expect(blocklist.has("bad_one")).toBe(true);

    fetchFn.mockRejectedValueOnce(new Error("offline"));
    clock.advance(hours(1));
    await blocklist.refresh();
    expect(blocklist.has("bad_two")).toBe(true);
    expect(console.warn).toHaveBeenCalledWith(`[blocklist] Failed to fetch ${LIST_URL}: offline`);
  });

  it("should not fetch without URLs", async () => {
    const fetchFn = vi.fn(async (_input: string, _init?: RequestInit) => new Response(""));
    const blocklist = new OnlineBlocklist([], { fetchFn });

    await blocklist.refresh();

    expect(fetchFn).not.toHaveBeenCalled();
    expect(blocklist.size).toBe(0);
  });
});

describe("parseBlocklist", () => {
  it("should trim lines and skip blanks", () => {
    expect(parseBlocklist(" one \r\n\n two\nthree\n")).toEqual(new Set(["one", "two", "three"]));
  });
});
