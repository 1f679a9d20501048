import { bench, describe } from "vitest";
import { UnorderedMap } from "../unordered_map";

const TIERS = [1_000, 10_000, 100_000] as const;

function filled(n: number): UnorderedMap<number, number> {
  const m = new UnorderedMap<number, number>();
  for (let i = 0; i < n; i++) m.insert(i, i);
  return m;
}

// ============================================================
// Insert — includes every rehash on the way up
// ============================================================

describe("insert", () => {
  for (const N of TIERS) {
    bench(`UnorderedMap: insert ${N.toLocaleString()} keys`, () => {
      filled(N);
    });

    bench(`Map: set ${N.toLocaleString()} keys`, () => {
      const m = new Map<number, number>();
      for (let i = 0; i < N; i++) m.set(i, i);
    });
  }
});

// ============================================================
// Lookup
// ============================================================

describe("find", () => {
  for (const N of TIERS) {
    const m = filled(N);
    bench(`UnorderedMap: get ${N.toLocaleString()} keys`, () => {
      for (let i = 0; i < N; i++) m.get(i);
    });
  }
});

// ============================================================
// Erase then refill — exercises the slot and anchor free lists
// ============================================================

describe("erase + reinsert", () => {
  for (const N of TIERS) {
    const m = filled(N);
    bench(`UnorderedMap: churn ${N.toLocaleString()} keys`, () => {
      for (let i = 0; i < N; i += 2) m.erase(i);
      for (let i = 0; i < N; i += 2) m.insert(i, i);
    });
  }
});
