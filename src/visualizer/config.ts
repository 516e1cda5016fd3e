import { DEFAULT_CAPACITY, DEFAULT_MIN_BLOCK_SIZE, isPowerOfTwo } from '../buddy';
import { parseSize } from './utils';

export interface VisualizerConfig {
  capacity: number;
  minBlockSize: number;
  defaultProcessSize: number;
  unit: string; // label only; the allocator is unit-less
  processPrefix: string;
  maxLogEntries: number;
}

export const DEFAULT_CONFIG: VisualizerConfig = {
  capacity: DEFAULT_CAPACITY,
  minBlockSize: DEFAULT_MIN_BLOCK_SIZE,
  defaultProcessSize: 16,
  unit: 'MB',
  processPrefix: 'Process-',
  maxLogEntries: 500,
};

export type ConfigEnv = Record<string, string | boolean | undefined>;

function readInt(env: ConfigEnv, key: string): number | null {
  const raw = env[key];
  return typeof raw === 'string' ? parseSize(raw) : null;
}

function readString(env: ConfigEnv, key: string): string | null {
  const raw = env[key];
  return typeof raw === 'string' ? raw : null;
}

/**
 * Overlay VITE_BUDDY_* variables on the defaults. Malformed values are
 * ignored, and a minimum block size that is not a power of two or exceeds
 * the capacity falls back to the default.
 */
export function resolveConfig(env: ConfigEnv = {}): VisualizerConfig {
  const capacity = readInt(env, 'VITE_BUDDY_CAPACITY') ?? DEFAULT_CONFIG.capacity;
  const minRaw = readInt(env, 'VITE_BUDDY_MIN_BLOCK') ?? DEFAULT_CONFIG.minBlockSize;
  const minBlockSize =
    isPowerOfTwo(minRaw) && minRaw <= capacity ? minRaw : DEFAULT_CONFIG.minBlockSize;

  return {
    capacity,
    minBlockSize,
    defaultProcessSize:
      readInt(env, 'VITE_BUDDY_PROCESS_SIZE') ?? DEFAULT_CONFIG.defaultProcessSize,
    unit: readString(env, 'VITE_BUDDY_UNIT') ?? DEFAULT_CONFIG.unit,
    processPrefix: readString(env, 'VITE_BUDDY_PROCESS_PREFIX') || DEFAULT_CONFIG.processPrefix,
    maxLogEntries: readInt(env, 'VITE_BUDDY_MAX_LOG') ?? DEFAULT_CONFIG.maxLogEntries,
  };
}
