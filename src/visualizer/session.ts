import type { Block, BuddyEvent, BuddySnapshot } from '../buddy';
import { formatSize } from './utils';

// UI-side bookkeeping. The allocator only sees opaque owner keys; naming,
// selection and the log live here.

export interface LogEntry {
  id: number;
  timestamp: number;
  message: string;
  type: 'info' | 'success' | 'warning' | 'error';
}

export interface ProcessEntry {
  name: string;
  size: number; // requested
}

export function processName(prefix: string, count: number) {
  return `${prefix}${count}`;
}

export function describeProcess(p: ProcessEntry, unit: string) {
  return `${p.name}: ${formatSize(p.size, unit)}`;
}

/** Index to select after removing `removedIndex`: same slot, else the last entry, else none. */
export function selectionAfterRemoval(remaining: number, removedIndex: number): number | null {
  if (remaining <= 0) return null;
  return removedIndex < remaining ? removedIndex : remaining - 1;
}

export function logTypeFor(ev: BuddyEvent): LogEntry['type'] {
  switch (ev.type) {
    case 'allocate':
    case 'free':
      return 'success';
    case 'resize':
      return 'warning';
    case 'error':
      return 'error';
    default:
      return 'info';
  }
}

export function toLogEntry(ev: BuddyEvent, id: number, timestamp: number): LogEntry {
  return { id, timestamp, message: ev.msg, type: logTypeFor(ev) };
}

/** Append and keep only the newest `limit` entries. */
export function appendLog(logs: LogEntry[], entries: LogEntry[], limit: number): LogEntry[] {
  const next = [...logs, ...entries];
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export function blockOf(snap: BuddySnapshot, owner: string): Block | undefined {
  return snap.blocks.find(b => b.state === 'allocated' && b.owner === owner);
}
