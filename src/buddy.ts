/*
 * buddy.ts — power-of-two buddy allocator (simulator)
 * ----------------------------------------------------------------------------
 * Goal: a readable, instrumented model of the buddy system (split on demand,
 * coalesce buddies on free), suitable for a visualizer. It manages offsets in
 * an abstract address space; no bytes are stored.
 *
 * Design choices:
 * - Blocks live in a start→Block map. Parent and buddy are computed from
 *   start and size, never stored as links.
 * - Free blocks are also kept in per-size free lists sorted by start, so a
 *   fit is "smallest size first, lowest address first".
 * - Commands validate before mutating: a failed call leaves the partition
 *   exactly as it was and returns the error instead of throwing.
 * - Every command returns a change record (blocks before/after + events);
 *   events are also kept in `events` and pushed to subscribers.
 */

// ----------------------------------------------------------------------------
// Types & helpers
// ----------------------------------------------------------------------------

export type Addr = number; // offset from 0
export type OwnerId = string; // opaque key supplied by the caller

export const DEFAULT_CAPACITY = 128;
export const DEFAULT_MIN_BLOCK_SIZE = 1;

export function isPositiveInt(n: number): boolean {
  return Number.isSafeInteger(n) && n > 0;
}

/** Smallest power of two ≥ n. Multiplies instead of shifting so sizes past 2^31 work. */
export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

export function isPowerOfTwo(n: number): boolean {
  return isPositiveInt(n) && nextPowerOfTwo(n) === n;
}

/** Size of the block granted for a request. */
export function blockSizeFor(requested: number, minBlockSize = DEFAULT_MIN_BLOCK_SIZE): number {
  return nextPowerOfTwo(Math.max(requested, minBlockSize));
}

/** Start of the buddy of the size-aligned block at `start` (same as start XOR size). */
export function buddyOf(start: Addr, size: number): Addr {
  return (start / size) % 2 === 0 ? start + size : start - size;
}

export interface FreeBlock {
  start: Addr;
  size: number;
  state: 'free';
}

export interface AllocatedBlock {
  start: Addr;
  size: number;
  state: 'allocated';
  owner: OwnerId;
  requested: number; // size asked for; size - requested is internal fragmentation
}

export type Block = FreeBlock | AllocatedBlock;
export type BlockState = Block['state'];

export interface BlockHandle {
  start: Addr;
  size: number;
}

export type BuddyErrorCode =
  | 'InvalidRequest'
  | 'OutOfMemory'
  | 'UnknownAllocation'
  | 'CapacityChangeDenied';

export class BuddyError extends Error {
  code: BuddyErrorCode;

  constructor(code: BuddyErrorCode, message: string) {
    super(message);
    this.name = 'BuddyError';
    this.code = code;
  }
}

export type BuddyEvent =
  | { type: 'init'; capacity: number; minBlockSize: number; msg: string }
  | { type: 'resize'; from: number; to: number; msg: string }
  | { type: 'split'; from: Addr; size: number; into: [Addr, Addr]; msg: string }
  | {
      type: 'allocate';
      owner: OwnerId;
      requested: number;
      start: Addr;
      size: number;
      msg: string;
    }
  | { type: 'free'; owner: OwnerId; start: Addr; size: number; msg: string }
  | { type: 'merge'; result: Addr; size: number; parts: [Addr, Addr]; msg: string }
  | { type: 'error'; code: BuddyErrorCode; msg: string };

export type BuddyListener = (ev: BuddyEvent) => void;

export interface Change {
  before: Block[];
  after: Block[];
  events: BuddyEvent[];
}

export type Outcome<T> = ({ ok: true } & T & Change) | { ok: false; error: BuddyError };

export type AllocateResult = Outcome<{ handle: BlockHandle; fragmentation: number }>;
export type FreeResult = Outcome<{ released: AllocatedBlock }>;
export type ResizeResult = Outcome<{ from: number; to: number }>;

export interface BuddyOptions {
  capacity?: number; // rounded up to a power of two
  minBlockSize?: number; // must be a power of two
}

export interface BuddySnapshot {
  capacity: number;
  minBlockSize: number;
  blocks: Block[]; // ordered by start
  freeLists: Record<number, Addr[]>; // block size → free starts, ascending
}

export interface BuddyStats {
  capacity: number;
  allocated: number; // Σ requested
  reserved: number; // Σ allocated block sizes
  free: number;
  internalFragmentation: number;
  blockCount: number;
  allocatedBlockCount: number;
  freeBlockCount: number;
}

function copyBlock(b: Block): Block {
  return { ...b };
}

// ----------------------------------------------------------------------------
// Allocator
// ----------------------------------------------------------------------------

export class BuddyAllocator {
  // partition: start→Block, gap-free cover of [0, capacity)
  private mem = new Map<Addr, Block>();
  // free lists: size → starts of free blocks (ascending)
  private bins = new Map<number, Addr[]>();
  private owners = new Map<OwnerId, Addr>();

  private listeners = new Set<BuddyListener>();
  private pending: BuddyEvent[] = [];

  private cap: number;
  readonly minBlockSize: number;

  // event log
  public events: BuddyEvent[] = [];

  constructor(options: BuddyOptions = {}) {
    const requested = options.capacity ?? DEFAULT_CAPACITY;
    const minBlockSize = options.minBlockSize ?? DEFAULT_MIN_BLOCK_SIZE;
    if (!isPositiveInt(requested)) {
      throw new BuddyError('InvalidRequest', `capacity must be a positive integer, got ${requested}`);
    }
    if (!isPowerOfTwo(minBlockSize)) {
      throw new BuddyError(
        'InvalidRequest',
        `minimum block size must be a power of two, got ${minBlockSize}`
      );
    }
    const capacity = nextPowerOfTwo(requested);
    if (minBlockSize > capacity) {
      throw new BuddyError(
        'InvalidRequest',
        `minimum block size ${minBlockSize} exceeds capacity ${capacity}`
      );
    }

    this.cap = capacity;
    this.minBlockSize = minBlockSize;
    this.insertFree(0, capacity);
    this.emit({
      type: 'init',
      capacity,
      minBlockSize,
      msg: `initialized buddy system with ${capacity} units (min block ${minBlockSize})`,
    });
    this.flush();
  }

  get capacity(): number {
    return this.cap;
  }

  subscribe(listener: BuddyListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ------------------------------ Event plumbing ------------------------------
  private emit(ev: BuddyEvent) {
    this.pending.push(ev);
  }

  private flush(): BuddyEvent[] {
    const out = this.pending;
    this.pending = [];
    for (const ev of out) {
      this.events.push(ev);
      for (const l of this.listeners) l(ev);
    }
    return out;
  }

  private fail(code: BuddyErrorCode, msg: string): { ok: false; error: BuddyError } {
    this.emit({ type: 'error', code, msg });
    this.flush();
    return { ok: false, error: new BuddyError(code, msg) };
  }

  // ------------------------------ Free lists ------------------------------
  private insertFree(start: Addr, size: number) {
    this.mem.set(start, { start, size, state: 'free' });
    const list = this.bins.get(size) ?? [];
    // keep sorted by start so the head is the lowest address
    let i = 0;
    while (i < list.length && list[i] < start) i++;
    list.splice(i, 0, start);
    this.bins.set(size, list);
  }

  private removeFree(block: FreeBlock) {
    const list = this.bins.get(block.size);
    const i = list ? list.indexOf(block.start) : -1;
    if (!list || i < 0) {
      throw new Error(`free list for size ${block.size} is missing block ${block.start}`);
    }
    list.splice(i, 1);
    if (list.length === 0) this.bins.delete(block.size);
    this.mem.delete(block.start);
  }

  private findFit(needed: number): FreeBlock | undefined {
    for (let size = needed; size <= this.cap; size *= 2) {
      const head = this.bins.get(size)?.[0];
      if (head == null) continue;
      const block = this.mem.get(head);
      if (!block || block.state !== 'free') {
        throw new Error(`free list for size ${size} points at ${head}, which is not a free block`);
      }
      return block;
    }
    return undefined;
  }

  private highestAllocation(): AllocatedBlock | undefined {
    let top: AllocatedBlock | undefined;
    for (const b of this.mem.values()) {
      if (b.state === 'allocated' && (!top || b.start > top.start)) top = b;
    }
    return top;
  }

  private resolve(target: BlockHandle | OwnerId): AllocatedBlock | undefined {
    const start = typeof target === 'string' ? this.owners.get(target) : target.start;
    if (start == null) return undefined;
    const block = this.mem.get(start);
    if (!block || block.state !== 'allocated') return undefined;
    if (typeof target !== 'string' && block.size !== target.size) return undefined;
    return block;
  }

  // ------------------------------ Commands ------------------------------
  allocate(owner: OwnerId, requestedSize: number): AllocateResult {
    if (!isPositiveInt(requestedSize)) {
      return this.fail(
        'InvalidRequest',
        `allocation size must be a positive integer, got ${requestedSize}`
      );
    }
    if (owner.length === 0) {
      return this.fail('InvalidRequest', 'owner key must not be empty');
    }
    if (this.owners.has(owner)) {
      return this.fail('InvalidRequest', `owner '${owner}' already holds a block`);
    }

    const needed = blockSizeFor(requestedSize, this.minBlockSize);
    const source = needed <= this.cap ? this.findFit(needed) : undefined;
    if (!source) {
      return this.fail(
        'OutOfMemory',
        `cannot allocate ${requestedSize} (block ${needed}) for '${owner}': not enough memory`
      );
    }

    const before = this.listBlocks();
    const start = source.start;
    let size = source.size;
    this.removeFree(source);
    // split, keep the lower half, push the upper half onto its free list
    while (size > needed) {
      const half = size / 2;
      this.insertFree(start + half, half);
      this.emit({
        type: 'split',
        from: start,
        size,
        into: [start, start + half],
        msg: `split block at ${start} of size ${size} into two blocks of size ${half}`,
      });
      size = half;
    }

    this.mem.set(start, { start, size, state: 'allocated', owner, requested: requestedSize });
    this.owners.set(owner, start);
    this.emit({
      type: 'allocate',
      owner,
      requested: requestedSize,
      start,
      size,
      msg: `allocated ${requestedSize} (block ${size}) to '${owner}' at ${start}`,
    });
    const events = this.flush();
    return {
      ok: true,
      handle: { start, size },
      fragmentation: size - requestedSize,
      before,
      after: this.listBlocks(),
      events,
    };
  }

  free(target: BlockHandle | OwnerId): FreeResult {
    const block = this.resolve(target);
    if (!block) {
      const what =
        typeof target === 'string'
          ? `no allocation owned by '${target}'`
          : `no allocation at ${target.start} of size ${target.size}`;
      return this.fail('UnknownAllocation', `cannot free: ${what}`);
    }

    const before = this.listBlocks();
    this.owners.delete(block.owner);
    this.mem.delete(block.start);
    this.emit({
      type: 'free',
      owner: block.owner,
      start: block.start,
      size: block.size,
      msg: `freed block of '${block.owner}' at ${block.start} (size ${block.size})`,
    });

    let start = block.start;
    let size = block.size;
    while (size < this.cap) {
      const buddyAddr = buddyOf(start, size);
      const buddy = this.mem.get(buddyAddr);
      if (!buddy || buddy.state !== 'free' || buddy.size !== size) break;
      this.removeFree(buddy);
      const merged = Math.min(start, buddyAddr);
      this.emit({
        type: 'merge',
        result: merged,
        size: size * 2,
        parts: [start, buddyAddr],
        msg: `merged buddies at ${start} and ${buddyAddr} into block at ${merged} of size ${size * 2}`,
      });
      start = merged;
      size *= 2;
    }
    this.insertFree(start, size);

    const events = this.flush();
    return { ok: true, released: { ...block }, before, after: this.listBlocks(), events };
  }

  /**
   * Resize the address space. The new capacity is rounded up to a power of two.
   * With nothing allocated the partition becomes one free block. Otherwise
   * growth keeps every block and covers the new space with free blocks, and
   * any shrink is refused.
   */
  setCapacity(newCapacity: number): ResizeResult {
    if (!isPositiveInt(newCapacity)) {
      return this.fail('InvalidRequest', `capacity must be a positive integer, got ${newCapacity}`);
    }
    const to = nextPowerOfTwo(newCapacity);
    if (to < this.minBlockSize) {
      return this.fail(
        'InvalidRequest',
        `capacity ${to} is below the minimum block size ${this.minBlockSize}`
      );
    }
    const from = this.cap;
    if (to < from && this.owners.size > 0) {
      const highest = this.highestAllocation();
      const where = highest
        ? ` ('${highest.owner}' occupies [${highest.start}, ${highest.start + highest.size}))`
        : '';
      return this.fail(
        'CapacityChangeDenied',
        `cannot shrink to ${to} while ${this.owners.size} block(s) are allocated${where}`
      );
    }

    const before = this.listBlocks();
    if (this.owners.size === 0) {
      this.mem.clear();
      this.bins.clear();
      this.insertFree(0, to);
    } else if (to > from) {
      // old root region stays split; each doubling adds one free block
      for (let s = from; s < to; s *= 2) this.insertFree(s, s);
    }
    this.cap = to;
    this.emit({ type: 'resize', from, to, msg: `total memory updated from ${from} to ${to}` });
    const events = this.flush();
    return { ok: true, from, to, before, after: this.listBlocks(), events };
  }

  // ------------------------------ Queries ------------------------------
  listBlocks(): Block[] {
    return [...this.mem.values()].sort((a, b) => a.start - b.start).map(copyBlock);
  }

  findByOwner(owner: OwnerId): AllocatedBlock | undefined {
    const block = this.resolve(owner);
    return block ? { ...block } : undefined;
  }

  totalAllocated(): number {
    let n = 0;
    for (const b of this.mem.values()) if (b.state === 'allocated') n += b.requested;
    return n;
  }

  totalReserved(): number {
    let n = 0;
    for (const b of this.mem.values()) if (b.state === 'allocated') n += b.size;
    return n;
  }

  totalFree(): number {
    let n = 0;
    for (const b of this.mem.values()) if (b.state === 'free') n += b.size;
    return n;
  }

  internalFragmentation(): number {
    return this.totalReserved() - this.totalAllocated();
  }

  /** Free block starts per size, for every size from minBlockSize up to capacity. */
  freeLists(): Record<number, Addr[]> {
    const out: Record<number, Addr[]> = {};
    for (let size = this.minBlockSize; size <= this.cap; size *= 2) {
      out[size] = [...(this.bins.get(size) ?? [])];
    }
    return out;
  }

  stats(): BuddyStats {
    const blocks = [...this.mem.values()];
    const allocatedBlockCount = blocks.filter(b => b.state === 'allocated').length;
    return {
      capacity: this.cap,
      allocated: this.totalAllocated(),
      reserved: this.totalReserved(),
      free: this.totalFree(),
      internalFragmentation: this.internalFragmentation(),
      blockCount: blocks.length,
      allocatedBlockCount,
      freeBlockCount: blocks.length - allocatedBlockCount,
    };
  }

  snapshot(): BuddySnapshot {
    return {
      capacity: this.cap,
      minBlockSize: this.minBlockSize,
      blocks: this.listBlocks(),
      freeLists: this.freeLists(),
    };
  }
}

// ----------------------------------------------------------------------------
// Invariants
// ----------------------------------------------------------------------------

/**
 * Check a snapshot against the partition invariants: gap-free cover of
 * [0, capacity), aligned power-of-two sizes, no unmerged free buddies, and
 * free lists that match the free blocks. Returns one message per violation.
 */
export function verifyPartition(snap: BuddySnapshot): string[] {
  const problems: string[] = [];
  const blocks = [...snap.blocks].sort((a, b) => a.start - b.start);
  const byStart = new Map<Addr, Block>();

  let cursor = 0;
  for (const b of blocks) {
    byStart.set(b.start, b);
    if (b.start !== cursor) {
      problems.push(
        b.start > cursor ? `gap at [${cursor}, ${b.start})` : `overlap at ${b.start}`
      );
    }
    if (!isPowerOfTwo(b.size) || b.size < snap.minBlockSize) {
      problems.push(`block at ${b.start} has invalid size ${b.size}`);
    } else if (b.start % b.size !== 0) {
      problems.push(`block at ${b.start} is not aligned to its size ${b.size}`);
    }
    if (b.state === 'allocated' && (b.requested <= 0 || b.requested > b.size)) {
      problems.push(`block at ${b.start} holds ${b.requested} in ${b.size}`);
    }
    cursor = Math.max(cursor, b.start + b.size);
  }
  if (cursor !== snap.capacity) {
    problems.push(`blocks cover [0, ${cursor}) instead of [0, ${snap.capacity})`);
  }

  for (const b of blocks) {
    if (b.state !== 'free') continue;
    const listed = snap.freeLists[b.size] ?? [];
    if (!listed.includes(b.start)) {
      problems.push(`free block at ${b.start} missing from free list ${b.size}`);
    }
    if (b.size >= snap.capacity) continue;
    const buddyAddr = buddyOf(b.start, b.size);
    const buddy = byStart.get(buddyAddr);
    if (b.start < buddyAddr && buddy && buddy.state === 'free' && buddy.size === b.size) {
      problems.push(`free buddies at ${b.start} and ${buddyAddr} were not merged`);
    }
  }

  let listedCount = 0;
  for (const list of Object.values(snap.freeLists)) listedCount += list.length;
  const freeCount = blocks.filter(b => b.state === 'free').length;
  if (listedCount !== freeCount) {
    problems.push(`free lists hold ${listedCount} entries for ${freeCount} free blocks`);
  }
  return problems;
}

// ----------------------------------------------------------------------------
// Scenario helpers (useful for UI testing)
// ----------------------------------------------------------------------------

export type Step =
  | { op: 'allocate'; owner: OwnerId; size: number }
  | { op: 'free'; target: BlockHandle | OwnerId }
  | { op: 'resize'; capacity: number };

export type StepResult = AllocateResult | FreeResult | ResizeResult;

export function runScenario(
  allocator: BuddyAllocator,
  steps: Step[]
): { snapshots: BuddySnapshot[]; results: StepResult[]; events: BuddyEvent[] } {
  const snapshots: BuddySnapshot[] = [];
  const results: StepResult[] = [];

  for (const s of steps) {
    if (s.op === 'allocate') {
      results.push(allocator.allocate(s.owner, s.size));
    } else if (s.op === 'free') {
      results.push(allocator.free(s.target));
    } else {
      results.push(allocator.setCapacity(s.capacity));
    }
    snapshots.push(allocator.snapshot());
  }

  return { snapshots, results, events: allocator.events };
}
