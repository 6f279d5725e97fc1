/**
 * Tests - Timers, random choice and the acceptance memory
 */

import { describe, it, expect } from "vitest";
import { Timer, days, hours, years } from "../src/matchmaking/timer.js";
import { choice, weightedChoice } from "../src/matchmaking/random.js";
import { AcceptanceMemory, declineAspect } from "../src/matchmaking/acceptance.js";
import type { DeclinedChallenge } from "../src/service/game-service.js";
import { FakeClock, sequenceRandom } from "./helpers.js";

function declined(declineReasonKey: string, overrides: Partial<DeclinedChallenge> = {}): DeclinedChallenge {
  return {
    id: "c1",
    speed: "blitz",
    variant: "atomic",
    rated: true,
    fromSelf: true,
    opponent: "alpha",
    declineReason: "No thanks",
    declineReasonKey,
    ...overrides,
  };
}

describe("Timer", () => {
  it("should expire once its duration has passed", () => {
    const clock = new FakeClock();
    const timer = new Timer(1000, clock);

    expect(timer.isExpired()).toBe(false);
    clock.advance(999);
    expect(timer.isExpired()).toBe(false);
    expect(timer.remaining()).toBe(1);

    clock.advance(1);
    expect(timer.isExpired()).toBe(true);
    expect(timer.remaining()).toBe(0);
    expect(timer.timeSinceReset()).toBe(1000);
  });

  it("should restart on reset", () => {
    const clock = new FakeClock();
    const timer = new Timer(1000, clock);
    clock.advance(5000);

    timer.reset();
    expect(timer.isExpired()).toBe(false);
    expect(timer.timeSinceReset()).toBe(0);
  });

  it("should treat a zero duration as already expired", () => {
    expect(new Timer(0, new FakeClock()).isExpired()).toBe(true);
  });
});

describe("Random choice", () => {
  it("should index uniformly", () => {
    expect(choice(["a", "b", "c"], sequenceRandom([0.5]))).toBe("b");
    expect(choice(["a", "b", "c"], sequenceRandom([0.9999]))).toBe("c");
    expect(() => choice([], sequenceRandom([0]))).toThrow("Cannot choose from an empty list");
  });

  it("should sample by cumulative weight", () => {
    expect(weightedChoice(["a", "b", "c"], [1, 0, 3], sequenceRandom([0.2]))).toBe("a");
    // target 1.0 lands past "a" and the zero-weight "b"
    expect(weightedChoice(["a", "b", "c"], [1, 0, 3], sequenceRandom([0.25]))).toBe("c");
  });

  it("should treat negative weights as zero", () => {
    expect(weightedChoice(["a", "b"], [-5, 2], sequenceRandom([0]))).toBe("b");
  });

  it("should reject unusable weights", () => {
    expect(() => weightedChoice(["a", "b"], [0, -1], sequenceRandom([0]))).toThrow("Total weight must be positive");
    expect(() => weightedChoice(["a", "b"], [1], sequenceRandom([0]))).toThrow("Expected 2 weights, got 1");
  });
});

describe("declineAspect", () => {
  it("should map speed reasons to the challenge speed", () => {
    expect(declineAspect(declined("tooFast"))).toEqual({ aspect: "blitz", known: true });
    expect(declineAspect(declined("tooSlow"))).toEqual({ aspect: "blitz", known: true });
    expect(declineAspect(declined("timeControl"))).toEqual({ aspect: "blitz", known: true });
  });

  it("should map mode reasons to the mode we offered", () => {
    expect(declineAspect(declined("casual", { rated: true }))).toEqual({ aspect: "rated", known: true });
    expect(declineAspect(declined("rated", { rated: false }))).toEqual({ aspect: "casual", known: true });
  });

  it("should map variant reasons to the variant", () => {
    expect(declineAspect(declined("variant"))).toEqual({ aspect: "atomic", known: true });
    expect(declineAspect(declined("standard"))).toEqual({ aspect: "atomic", known: true });
  });

  it("should map generic reasons to the whole opponent", () => {
    expect(declineAspect(declined("generic"))).toEqual({ aspect: "", known: true });
    expect(declineAspect(declined("later"))).toEqual({ aspect: "", known: true });
    expect(declineAspect(declined("noBot"))).toEqual({ aspect: "", known: true });
  });

  it("should flag unknown reasons", () => {
    expect(declineAspect(declined("tooManyPawns"))).toEqual({ aspect: "", known: false });
    expect(declineAspect(declined("constructor"))).toEqual({ aspect: "", known: false });
  });
});

describe("AcceptanceMemory", () => {
  it("should treat unknown opponents as acceptable", () => {
    const memory = new AcceptanceMemory(new FakeClock());

    expect(memory.isAcceptable("alpha", "blitz")).toBe(true);
    expect(memory.isBlocked("alpha")).toBe(false);
  });

  it("should suppress an aspect for a day by default", () => {
    const clock = new FakeClock();
    const memory = new AcceptanceMemory(clock);
    memory.suppress("alpha", "blitz");

    expect(memory.isAcceptable("alpha", "blitz")).toBe(false);
    expect(memory.isAcceptable("alpha", "rapid")).toBe(true);
    expect(memory.isAcceptable("beta", "blitz")).toBe(true);

    clock.advance(hours(23));
    expect(memory.isAcceptable("alpha", "blitz")).toBe(false);
    clock.advance(hours(1));
    expect(memory.isAcceptable("alpha", "blitz")).toBe(true);
  });

  it("should keep a block for years", () => {
    const clock = new FakeClock();
    const memory = new AcceptanceMemory(clock);
    memory.block("alpha");

    clock.advance(years(5));
    expect(memory.isBlocked("alpha")).toBe(true);
    expect(memory.isAcceptable("alpha", "blitz")).toBe(true);
  });

  it("should prune expired entries only", () => {
    const clock = new FakeClock();
    const memory = new AcceptanceMemory(clock);
    memory.suppress("alpha", "blitz", 1000);
    memory.suppress("alpha", "rapid", days(2));
    memory.suppress("beta", "", 1000);

    expect(memory.prune()).toBe(0);
    clock.advance(1000);
    expect(memory.prune()).toBe(2);
    expect(memory.isAcceptable("alpha", "rapid")).toBe(false);
    expect(memory.prune()).toBe(0);
  });
});
