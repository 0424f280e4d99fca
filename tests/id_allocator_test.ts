import { describe, expect, it } from "vitest";
import { AllocationExhaustedError } from "../src/models/errors.ts";
import { CodeAllocator, deriveCode, hashIdentifier } from "../src/services/id_allocator.ts";

describe("hashIdentifier", () => {
  it("matches the FNV-1a 64-bit reference values", () => {
    expect(hashIdentifier("")).toBe(0xcbf29ce484222325n);
    expect(hashIdentifier("a")).toBe(0xaf63dc4c8601ec8cn);
  });

  it("hashes UTF-8 bytes rather than UTF-16 code units", () => {
    expect(hashIdentifier("müller@example.com")).toBe(0x2232b2fccda7e7e1n);
  });
});

describe("deriveCode", () => {
  it("takes the last idLength digits of hash plus offset", () => {
    expect(deriveCode("room1@example.com", 0)).toBe(19372);
    expect(deriveCode("room1@example.com", 1)).toBe(19373);
    expect(deriveCode("a", 0, 3)).toBe(996);
    expect(deriveCode("a", 0, 1)).toBe(6);
  });

  it("is stable across calls", () => {
    const first = deriveCode("lobby@conference.example.org", 0);
    expect(deriveCode("lobby@conference.example.org", 0)).toBe(first);
    expect(first).toBe(49035);
  });
});

describe("CodeAllocator", () => {
  it("returns the offset-0 candidate when it is free", () => {
    const allocator = new CodeAllocator();
    expect(allocator.allocate("room1@example.com", () => false)).toEqual({ code: 19372, offset: 0, collisions: 0 });
  });

  it("probes the next offset on collision", () => {
    const allocator = new CodeAllocator();
    const taken = new Set([19372]);
    expect(allocator.allocate("room1@example.com", (code) => taken.has(code))).toEqual({
      code: 19373,
      offset: 1,
      collisions: 1,
    });
  });

  it("skips zero candidates", () => {
    // "a" with one digit probes 6, 7, 8, 9, 0, 1, ...
    const allocator = new CodeAllocator({ idLength: 1 });
    const taken = new Set([6, 7, 8, 9]);
    expect(allocator.allocate("a", (code) => taken.has(code))).toEqual({ code: 1, offset: 5, collisions: 4 });
  });

  it("is deterministic against the same occupied set", () => {
    const taken = new Set([19372, 19373]);
    const first = new CodeAllocator().allocate("room1@example.com", (code) => taken.has(code));
    const second = new CodeAllocator().allocate("room1@example.com", (code) => taken.has(code));
    expect(second).toEqual(first);
    expect(first.code).toBe(19374);
  });

  it("throws AllocationExhaustedError when the whole space is taken", () => {
    const allocator = new CodeAllocator({ idLength: 1 });
    expect(() => allocator.allocate("a", () => true)).toThrow(AllocationExhaustedError);
    expect(allocator.stats()).toEqual({ allocations: 0, collisions: 9, exhaustions: 1 });
  });

  it("stops after maxProbes", () => {
    const allocator = new CodeAllocator({ maxProbes: 2 });
    const taken = new Set([19372, 19373]);

    let caught: unknown;
    try {
      allocator.allocate("room1@example.com", (code) => taken.has(code));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AllocationExhaustedError);
    expect(caught).toMatchObject({ identifier: "room1@example.com", probes: 2 });
  });

  it("keeps running totals", () => {
    const allocator = new CodeAllocator();
    const taken = new Set([19372]);
    allocator.allocate("room1@example.com", (code) => taken.has(code));
    allocator.allocate("room2@example.com", () => false);
    expect(allocator.stats()).toEqual({ allocations: 2, collisions: 1, exhaustions: 0 });
  });

  it("rejects out-of-range settings", () => {
    expect(() => new CodeAllocator({ idLength: 0 })).toThrow(RangeError);
    expect(() => new CodeAllocator({ idLength: 16 })).toThrow(RangeError);
    expect(() => new CodeAllocator({ maxProbes: 0 })).toThrow(RangeError);
  });

  it("defaults to probing the whole code space", () => {
    expect(new CodeAllocator().maxProbes).toBe(100000);
    expect(new CodeAllocator({ idLength: 3 }).maxProbes).toBe(1000);
  });
});
