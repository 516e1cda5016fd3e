import { useEffect, useRef, useState } from 'react';
import type { BuddySnapshot } from '../../buddy';
import { formatSize, percent } from '../utils';

const ZOOM_STEP = 1.25;
const ZOOM_MIN = 1;
const ZOOM_MAX = 10;

export default function MemoryBar({
  snap,
  unit,
  selectedOwner,
  onSelect,
}: {
  snap: BuddySnapshot;
  unit: string;
  selectedOwner?: string | null;
  onSelect?: (owner: string) => void;
}) {
  const { capacity, blocks } = snap;
  const [zoom, setZoom] = useState<number>(1);
  const containerRef = useRef<HTMLDivElement | null>(null);
  const [visibleStart, setVisibleStart] = useState<number>(0);
  const [visibleEnd, setVisibleEnd] = useState<number>(capacity);

  function updateVisibleRange() {
    const el = containerRef.current;
    if (!el) return;
    // content width is clientWidth * zoom since segment widths scale with zoom
    const clientW = el.clientWidth || 1;
    const contentW = Math.max(1, clientW * zoom);
    const startFraction = Math.min(1, Math.max(0, el.scrollLeft / contentW));
    const endFraction = Math.min(1, (el.scrollLeft + clientW) / contentW);
    setVisibleStart(Math.round(capacity * startFraction));
    setVisibleEnd(Math.round(capacity * endFraction));
  }

  useEffect(() => {
    updateVisibleRange();
    window.addEventListener('resize', updateVisibleRange);
    return () => window.removeEventListener('resize', updateVisibleRange);
  }, [capacity, zoom]);

  // keep the selected block centred when zooming
  useEffect(() => {
    const container = containerRef.current;
    if (!container || selectedOwner == null) return;
    const el = container.querySelector<HTMLElement>(
      `[data-owner="${CSS.escape(selectedOwner)}"]`
    );
    if (!el) return;
    const target = Math.max(0, el.offsetLeft + el.offsetWidth / 2 - container.clientWidth / 2);
    container.scrollTo({ left: target, behavior: 'smooth' });
    const t = setTimeout(updateVisibleRange, 220);
    return () => clearTimeout(t);
  }, [zoom]);

  if (capacity <= 0 || blocks.length === 0) {
    return (
      <div className="w-full mb-2 h-6 bg-gray-200 border border-gray-300 grid place-items-center text-[11px] text-gray-500">
        (no blocks)
      </div>
    );
  }

  return (
    <div className="w-full mb-2">
      <div className="mb-1 flex items-center justify-between text-[11px] text-gray-600">
        <div className="flex items-center gap-3">
          <span>memory map</span>
          <span className="flex gap-3">
            <span className="inline-flex items-center gap-1">
              <span className="w-3 h-3 bg-rose-300 border border-rose-600" /> allocated
            </span>
            <span className="inline-flex items-center gap-1">
              <span className="w-3 h-3 bg-gray-800 border border-gray-900" /> internal fragmentation
            </span>
            <span className="inline-flex items-center gap-1">
              <span className="w-3 h-3 bg-emerald-200 border border-emerald-600" /> free
            </span>
          </span>
        </div>

        <div className="flex items-center gap-2">
          <button
            title="zoom out"
            onClick={() => setZoom(z => Math.max(ZOOM_MIN, +(z / ZOOM_STEP).toFixed(3)))}
            className="w-7 h-7 flex items-center justify-center rounded border border-gray-300 bg-white text-sm"
          >
            –
          </button>
          <div className="text-xs text-gray-600 w-12 text-center">{Math.round(zoom * 100)}%</div>
          <button
            title="zoom in"
            onClick={() => setZoom(z => Math.min(ZOOM_MAX, +(z * ZOOM_STEP).toFixed(3)))}
            className="w-7 h-7 flex items-center justify-center rounded border border-gray-300 bg-white text-sm"
          >
            +
          </button>
        </div>
      </div>

      <div
        ref={containerRef}
        onScroll={updateVisibleRange}
        className="w-full h-8 border border-gray-400 overflow-x-auto flex"
      >
        {blocks.map(b => {
          const widthPct = Math.max(percent(b.size, capacity), 0.2) * zoom;
          const end = b.start + b.size;

          if (b.state === 'free') {
            return (
              <div
                key={b.start}
                data-start={b.start}
                data-state="free"
                className="h-full shrink-0 border-r bg-emerald-200 border-emerald-500"
                style={{ width: `${widthPct}%`, transition: 'width 220ms ease' }}
                title={`free [${b.start}, ${end})\nsize ${formatSize(b.size, unit)}`}
              />
            );
          }

          const isSelected = selectedOwner != null && b.owner === selectedOwner;
          const usedPct = percent(b.requested, b.size);
          const tooltip =
            `${b.owner} [${b.start}, ${end})\n` +
            `block ${formatSize(b.size, unit)}\n` +
            `used  ${formatSize(b.requested, unit)}\n` +
            `waste ${formatSize(b.size - b.requested, unit)}`;
          const owner = b.owner;

          return (
            <div
              key={b.start}
              data-start={b.start}
              data-state="allocated"
              data-owner={owner}
              className={
                'h-full shrink-0 border-r border-rose-700 flex' +
                (isSelected ? ' ring-2 ring-inset ring-blue-700' : '') +
                (onSelect ? ' cursor-pointer' : '')
              }
              style={{ width: `${widthPct}%`, transition: 'width 220ms ease' }}
              title={tooltip}
              onClick={() => onSelect?.(owner)}
            >
              <div
                className={'h-full ' + (isSelected ? 'bg-blue-400' : 'bg-rose-300')}
                style={{ width: `${usedPct}%` }}
              />
              <div className="h-full flex-1 bg-gray-800" />
            </div>
          );
        })}
      </div>

      <div className="mt-1 flex justify-between text-[10px] text-gray-500">
        <span>{visibleStart}</span>
        <span>{visibleEnd}</span>
      </div>
    </div>
  );
}
