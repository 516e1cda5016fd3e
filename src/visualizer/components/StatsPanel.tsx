import type { BuddyStats } from '../../buddy';
import { formatSize, percent } from '../utils';

function StatRow({ swatch, label, value }: { swatch: string; label: string; value: string }) {
  return (
    <div className="flex items-center gap-2 text-xs">
      <span className={'w-4 h-4 border border-black ' + swatch} />
      <span className="font-medium">{label}:</span>
      <span data-stat={label}>{value}</span>
    </div>
  );
}

/**
 * Allocated + Internal Fragmentation + Free always adds up to the capacity,
 * so the three rows read as a breakdown of the whole address space.
 */
export default function StatsPanel({ stats, unit }: { stats: BuddyStats; unit: string }) {
  const usage = percent(stats.reserved, stats.capacity);
  return (
    <div className="space-y-2">
      <StatRow swatch="bg-rose-300" label="Allocated" value={formatSize(stats.allocated, unit)} />
      <StatRow swatch="bg-emerald-200" label="Free" value={formatSize(stats.free, unit)} />
      <StatRow
        swatch="bg-gray-800"
        label="Internal Fragmentation"
        value={formatSize(stats.internalFragmentation, unit)}
      />
      <div className="text-[11px] text-gray-500 pt-1">
        {`${stats.blockCount} blocks (${stats.allocatedBlockCount} allocated, ${stats.freeBlockCount} free) · ${usage.toFixed(1)}% reserved`}
      </div>
    </div>
  );
}
