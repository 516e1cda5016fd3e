import { describe, it, expect } from "vitest";

import {
  BuddyAllocator,
  BuddyError,
  blockSizeFor,
  buddyOf,
  isPowerOfTwo,
  nextPowerOfTwo,
  runScenario,
  verifyPartition,
} from "../src/buddy";
import type { BuddyEvent } from "../src/buddy";

describe("size helpers", () => {
  it("rounds up to the next power of two", () => {
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(30)).toBe(32);
    expect(nextPowerOfTwo(64)).toBe(64);
    expect(nextPowerOfTwo(65)).toBe(128);
    expect(nextPowerOfTwo(2 ** 33 + 1)).toBe(2 ** 34);
  });

  it("recognises powers of two", () => {
    expect(isPowerOfTwo(1)).toBe(true);
    expect(isPowerOfTwo(1024)).toBe(true);
    expect(isPowerOfTwo(0)).toBe(false);
    expect(isPowerOfTwo(12)).toBe(false);
    expect(isPowerOfTwo(2.5)).toBe(false);
  });

  it("applies the minimum block size before rounding", () => {
    expect(blockSizeFor(3)).toBe(4);
    expect(blockSizeFor(3, 8)).toBe(8);
    expect(blockSizeFor(9, 8)).toBe(16);
  });

  it("finds the buddy on either side", () => {
    expect(buddyOf(0, 16)).toBe(16);
    expect(buddyOf(16, 16)).toBe(0);
    expect(buddyOf(48, 16)).toBe(32);
    expect(buddyOf(2 ** 32, 2 ** 32)).toBe(0);
  });
});

describe("construction", () => {
  it("starts with one free block covering the capacity", () => {
    const a = new BuddyAllocator({ capacity: 128 });
    expect(a.capacity).toBe(128);
    expect(a.listBlocks()).toEqual([{ start: 0, size: 128, state: "free" }]);
    expect(a.events.map(e => e.type)).toEqual(["init"]);
  });

  it("rounds a capacity that is not a power of two up", () => {
    const a = new BuddyAllocator({ capacity: 100 });
    expect(a.capacity).toBe(128);
  });

  it("rejects malformed options", () => {
    expect(() => new BuddyAllocator({ capacity: 0 })).toThrow(BuddyError);
    expect(() => new BuddyAllocator({ capacity: 64, minBlockSize: 3 })).toThrow(
      "minimum block size must be a power of two, got 3"
    );
    expect(() => new BuddyAllocator({ capacity: 8, minBlockSize: 16 })).toThrow(
      "minimum block size 16 exceeds capacity 8"
    );
  });
});

describe("allocate", () => {
  it("grants a 32 block at 0 for a request of 30 in 128", () => {
    const a = new BuddyAllocator({ capacity: 128, minBlockSize: 1 });
    const r = a.allocate("A", 30);
    if (!r.ok) throw r.error;

    expect(r.handle).toEqual({ start: 0, size: 32 });
    expect(r.fragmentation).toBe(2);
    expect(a.internalFragmentation()).toBe(2);
    expect(a.listBlocks()).toEqual([
      { start: 0, size: 32, state: "allocated", owner: "A", requested: 30 },
      { start: 32, size: 32, state: "free" },
      { start: 64, size: 64, state: "free" },
    ]);
    expect(r.events.map(e => e.type)).toEqual(["split", "split", "allocate"]);
    expect(r.before).toEqual([{ start: 0, size: 128, state: "free" }]);
    expect(r.after).toEqual(a.listBlocks());
  });

  it("prefers the smallest fitting block, then the lowest address", () => {
    const a = new BuddyAllocator({ capacity: 64 });
    const x = a.allocate("X", 8); // [0,8), leaves 8@8, 16@16, 32@32
    const y = a.allocate("Y", 8); // takes 8@8
    const z = a.allocate("Z", 4); // splits 16@16 -> 4@16
    if (!x.ok || !y.ok || !z.ok) throw new Error("unexpected failure");

    expect(y.handle).toEqual({ start: 8, size: 8 });
    expect(z.handle).toEqual({ start: 16, size: 4 });
    expect(a.freeLists()[4]).toEqual([20]);
    expect(a.freeLists()[8]).toEqual([24]);
    expect(a.freeLists()[32]).toEqual([32]);
  });

  it("honours the minimum block size", () => {
    const a = new BuddyAllocator({ capacity: 64, minBlockSize: 8 });
    const r = a.allocate("A", 1);
    if (!r.ok) throw r.error;
    expect(r.handle.size).toBe(8);
    expect(r.fragmentation).toBe(7);
  });

  it("fails with OutOfMemory and leaves the partition untouched", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    const first = a.allocate("A", 10);
    if (!first.ok) throw first.error;
    expect(first.handle).toEqual({ start: 0, size: 16 });

    const before = a.listBlocks();
    const r = a.allocate("B", 1);
    expect(r.ok).toBe(false);
    if (r.ok) return;
    expect(r.error.code).toBe("OutOfMemory");
    expect(a.listBlocks()).toEqual(before);
    expect(a.listBlocks()).toEqual([
      { start: 0, size: 16, state: "allocated", owner: "A", requested: 10 },
    ]);
  });

  it("fails with OutOfMemory for a request larger than the capacity", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    const r = a.allocate("A", 17);
    expect(r.ok ? null : r.error.code).toBe("OutOfMemory");
    expect(a.listBlocks()).toEqual([{ start: 0, size: 16, state: "free" }]);
  });

  it("rejects a size of zero for any capacity", () => {
    for (const capacity of [1, 16, 1024]) {
      const a = new BuddyAllocator({ capacity });
      const r = a.allocate("A", 0);
      expect(r.ok ? null : r.error.code).toBe("InvalidRequest");
      expect(a.listBlocks()).toEqual([{ start: 0, size: capacity, state: "free" }]);
    }
  });

  it("rejects negative, fractional and NaN sizes", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    for (const size of [-4, 1.5, Number.NaN]) {
      const r = a.allocate("A", size);
      expect(r.ok ? null : r.error.code).toBe("InvalidRequest");
    }
  });

  it("rejects an empty or already used owner key", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    const empty = a.allocate("", 2);
    expect(empty.ok ? null : empty.error.message).toBe("owner key must not be empty");

    expect(a.allocate("A", 2).ok).toBe(true);
    const dup = a.allocate("A", 2);
    expect(dup.ok ? null : dup.error.message).toBe("owner 'A' already holds a block");
  });
});

describe("free", () => {
  it("coalesces all the way back to the root", () => {
    const a = new BuddyAllocator({ capacity: 64 });
    expect(a.allocate("A", 16).ok).toBe(true);
    expect(a.allocate("B", 16).ok).toBe(true);

    const fa = a.free("A");
    if (!fa.ok) throw fa.error;
    expect(fa.events.map(e => e.type)).toEqual(["free"]);

    const fb = a.free("B");
    if (!fb.ok) throw fb.error;
    expect(fb.events.map(e => e.type)).toEqual(["free", "merge", "merge"]);
    expect(a.listBlocks()).toEqual([{ start: 0, size: 64, state: "free" }]);
  });

  it("reports the merges it performed", () => {
    const a = new BuddyAllocator({ capacity: 64 });
    a.allocate("A", 16);
    a.allocate("B", 16);
    a.free("A");
    const r = a.free("B");
    if (!r.ok) throw r.error;
    const merges = r.events.filter(
      (e): e is Extract<BuddyEvent, { type: "merge" }> => e.type === "merge"
    );
    expect(merges.map(m => [m.result, m.size, m.parts])).toEqual([
      [0, 32, [16, 0]],
      [0, 64, [0, 32]],
    ]);
  });

  it("stops merging at an allocated buddy", () => {
    const a = new BuddyAllocator({ capacity: 32 });
    a.allocate("A", 8); // [0,8)
    a.allocate("B", 8); // [8,16)
    a.allocate("C", 16); // [16,32)
    const r = a.free("A");
    if (!r.ok) throw r.error;
    expect(a.listBlocks()).toEqual([
      { start: 0, size: 8, state: "free" },
      { start: 8, size: 8, state: "allocated", owner: "B", requested: 8 },
      { start: 16, size: 16, state: "allocated", owner: "C", requested: 16 },
    ]);
  });

  it("frees by handle", () => {
    const a = new BuddyAllocator({ capacity: 32 });
    const r = a.allocate("A", 5);
    if (!r.ok) throw r.error;
    const f = a.free(r.handle);
    if (!f.ok) throw f.error;
    expect(f.released).toEqual({ start: 0, size: 8, state: "allocated", owner: "A", requested: 5 });
    expect(a.findByOwner("A")).toBeUndefined();
  });

  it("rejects unknown owners, stale handles and double frees", () => {
    const a = new BuddyAllocator({ capacity: 32 });
    const r = a.allocate("A", 4);
    if (!r.ok) throw r.error;

    const unknown = a.free("nobody");
    expect(unknown.ok ? null : unknown.error.message).toBe(
      "cannot free: no allocation owned by 'nobody'"
    );

    const wrongSize = a.free({ start: 0, size: 8 });
    expect(wrongSize.ok ? null : wrongSize.error.code).toBe("UnknownAllocation");

    const freeBlock = a.free({ start: 16, size: 16 });
    expect(freeBlock.ok ? null : freeBlock.error.code).toBe("UnknownAllocation");

    expect(a.free(r.handle).ok).toBe(true);
    const again = a.free(r.handle);
    expect(again.ok ? null : again.error.message).toBe(
      "cannot free: no allocation at 0 of size 4"
    );
    expect(a.listBlocks()).toEqual([{ start: 0, size: 32, state: "free" }]);
  });

  it("restores the previous block set after allocate + free", () => {
    const a = new BuddyAllocator({ capacity: 128 });
    a.allocate("A", 20);
    a.allocate("B", 3);
    const before = a.listBlocks();

    const r = a.allocate("C", 7);
    if (!r.ok) throw r.error;
    a.free(r.handle);
    expect(a.listBlocks()).toEqual(before);
  });
});

describe("setCapacity", () => {
  it("denies a shrink while blocks are allocated", () => {
    const a = new BuddyAllocator({ capacity: 8 });
    a.allocate("A", 4);
    const before = a.listBlocks();

    const r = a.setCapacity(4);
    expect(r.ok ? null : r.error.code).toBe("CapacityChangeDenied");
    expect(r.ok ? null : r.error.message).toBe(
      "cannot shrink to 4 while 1 block(s) are allocated ('A' occupies [0, 4))"
    );
    expect(a.capacity).toBe(8);
    expect(a.listBlocks()).toEqual(before);
  });

  it("replaces an empty partition with a single block", () => {
    const a = new BuddyAllocator({ capacity: 64 });
    const r = a.setCapacity(20);
    if (!r.ok) throw r.error;
    expect(r.from).toBe(64);
    expect(r.to).toBe(32);
    expect(a.capacity).toBe(32);
    expect(a.listBlocks()).toEqual([{ start: 0, size: 32, state: "free" }]);
  });

  it("grows around existing allocations", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    a.allocate("A", 4); // [0,4), free 4@4, 8@8
    const r = a.setCapacity(64);
    if (!r.ok) throw r.error;

    expect(a.listBlocks()).toEqual([
      { start: 0, size: 4, state: "allocated", owner: "A", requested: 4 },
      { start: 4, size: 4, state: "free" },
      { start: 8, size: 8, state: "free" },
      { start: 16, size: 16, state: "free" },
      { start: 32, size: 32, state: "free" },
    ]);
    expect(verifyPartition(a.snapshot())).toEqual([]);

    // the grown tree coalesces back to the new root
    a.free("A");
    expect(a.listBlocks()).toEqual([{ start: 0, size: 64, state: "free" }]);
  });

  it("allocates into the grown space", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    a.allocate("A", 16);
    expect(a.allocate("B", 32).ok).toBe(false);
    a.setCapacity(64);
    const r = a.allocate("B", 32);
    if (!r.ok) throw r.error;
    expect(r.handle).toEqual({ start: 32, size: 32 });
  });

  it("rejects malformed capacities and ones below the minimum block", () => {
    const a = new BuddyAllocator({ capacity: 64, minBlockSize: 8 });
    for (const bad of [0, -8, 2.5]) {
      const r = a.setCapacity(bad);
      expect(r.ok ? null : r.error.code).toBe("InvalidRequest");
    }
    const tooSmall = a.setCapacity(4);
    expect(tooSmall.ok ? null : tooSmall.error.message).toBe(
      "capacity 4 is below the minimum block size 8"
    );
    expect(a.capacity).toBe(64);
  });
});

describe("queries", () => {
  it("keeps allocated + fragmentation + free equal to the capacity", () => {
    const a = new BuddyAllocator({ capacity: 128 });
    a.allocate("A", 30); // 32
    a.allocate("B", 5); // 8
    a.allocate("C", 64); // 64

    expect(a.totalAllocated()).toBe(99);
    expect(a.totalReserved()).toBe(104);
    expect(a.internalFragmentation()).toBe(5);
    expect(a.totalFree()).toBe(24);
    expect(a.stats()).toEqual({
      capacity: 128,
      allocated: 99,
      reserved: 104,
      free: 24,
      internalFragmentation: 5,
      blockCount: 5,
      allocatedBlockCount: 3,
      freeBlockCount: 2,
    });
  });

  it("finds blocks by owner", () => {
    const a = new BuddyAllocator({ capacity: 32 });
    a.allocate("A", 3);
    expect(a.findByOwner("A")).toEqual({
      start: 0,
      size: 4,
      state: "allocated",
      owner: "A",
      requested: 3,
    });
    expect(a.findByOwner("B")).toBeUndefined();
  });

  it("returns identical block lists when nothing changed", () => {
    const a = new BuddyAllocator({ capacity: 64 });
    a.allocate("A", 9);
    const first = a.listBlocks();
    const second = a.listBlocks();
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("returns copies that cannot alter the partition", () => {
    const a = new BuddyAllocator({ capacity: 16 });
    const blocks = a.listBlocks();
    blocks[0].size = 2;
    expect(a.listBlocks()).toEqual([{ start: 0, size: 16, state: "free" }]);
  });

  it("lists every size class in the free lists", () => {
    const a = new BuddyAllocator({ capacity: 16, minBlockSize: 2 });
    a.allocate("A", 2);
    expect(a.freeLists()).toEqual({ 2: [2], 4: [4], 8: [8], 16: [] });
  });
});

describe("change feed", () => {
  it("pushes every event to subscribers until they unsubscribe", () => {
    const a = new BuddyAllocator({ capacity: 8 });
    const seen: string[] = [];
    const stop = a.subscribe(ev => seen.push(ev.type));

    a.allocate("A", 2);
    a.allocate("B", 0);
    stop();
    a.free("A");

    expect(seen).toEqual(["split", "split", "allocate", "error"]);
    expect(a.events.map(e => e.type)).toEqual([
      "init",
      "split",
      "split",
      "allocate",
      "error",
      "free",
      "merge",
      "merge",
    ]);
  });

  it("describes each step in the event message", () => {
    const a = new BuddyAllocator({ capacity: 8 });
    const r = a.allocate("A", 3);
    if (!r.ok) throw r.error;
    expect(r.events.map(e => e.msg)).toEqual([
      "split block at 0 of size 8 into two blocks of size 4",
      "allocated 3 (block 4) to 'A' at 0",
    ]);
  });
});

describe("runScenario", () => {
  it("records a snapshot and a result per step", () => {
    const a = new BuddyAllocator({ capacity: 32 });
    const { snapshots, results, events } = runScenario(a, [
      { op: "allocate", owner: "A", size: 8 },
      { op: "allocate", owner: "B", size: 64 },
      { op: "resize", capacity: 64 },
      { op: "allocate", owner: "B", size: 32 },
      { op: "free", target: "A" },
    ]);

    expect(results.map(r => r.ok)).toEqual([true, false, true, true, true]);
    expect(snapshots.map(s => s.capacity)).toEqual([32, 32, 64, 64, 64]);
    expect(snapshots[4].blocks).toEqual([
      { start: 0, size: 32, state: "free" },
      { start: 32, size: 32, state: "allocated", owner: "B", requested: 32 },
    ]);
    expect(events).toBe(a.events);
    for (const s of snapshots) expect(verifyPartition(s)).toEqual([]);
  });
});

describe("verifyPartition", () => {
  it("reports gaps, misaligned blocks and unmerged buddies", () => {
    expect(
      verifyPartition({
        capacity: 16,
        minBlockSize: 1,
        blocks: [
          { start: 0, size: 4, state: "free" },
          { start: 4, size: 4, state: "free" },
          { start: 12, size: 4, state: "allocated", owner: "A", requested: 4 },
        ],
        freeLists: { 4: [0, 4] },
      })
    ).toEqual(["gap at [8, 12)", "free buddies at 0 and 4 were not merged"]);

    expect(
      verifyPartition({
        capacity: 8,
        minBlockSize: 1,
        blocks: [
          { start: 0, size: 2, state: "allocated", owner: "A", requested: 2 },
          { start: 2, size: 4, state: "free" },
          { start: 6, size: 2, state: "free" },
        ],
        freeLists: { 2: [6], 4: [2] },
      })
    ).toEqual(["block at 2 is not aligned to its size 4"]);
  });
});
