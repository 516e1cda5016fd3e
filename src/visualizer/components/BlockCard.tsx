import FlagCell from './FlagCell';
import type { Block } from '../../buddy';
import { buddyOf } from '../../buddy';
import { formatSize, hex } from '../utils';

export default function BlockCard({
  block,
  capacity,
  unit,
  selected = false,
  onSelect,
}: {
  block: Block;
  capacity: number;
  unit: string;
  selected?: boolean;
  onSelect?: (owner: string) => void;
}) {
  const order = Math.log2(capacity / block.size);
  const isRoot = block.size === capacity;
  const lowerHalf = !isRoot && (block.start / block.size) % 2 === 0;
  const allocated = block.state === 'allocated';

  const labelCls =
    'text-xs text-gray-800 px-1 inline-block border' +
    (allocated
      ? selected
        ? ' bg-blue-300 border-blue-700'
        : ' bg-rose-200 border-rose-600'
      : ' bg-emerald-200 border-emerald-600');

  return (
    <div className="flex flex-col" data-start={block.start}>
      <div>
        <div className={labelCls}>{`${hex(block.start)} (order ${order})`}</div>
      </div>
      <div
        onClick={() => {
          if (allocated && onSelect) onSelect(block.owner);
        }}
        className={
          'shadow-sm overflow-hidden flex flex-col font-mono w-56 border bg-gray-100 border-gray-500' +
          (allocated && onSelect ? ' cursor-pointer' : '') +
          (selected ? ' ring-2 ring-inset ring-black/20' : '')
        }
      >
        <div className="flex items-center justify-between px-3 py-2 text-xs">
          <span className="font-medium">start</span>
          <span>{block.start}</span>
        </div>

        <div className="flex items-stretch border-t border-gray-300 px-3 py-2 text-xs">
          <div className="flex flex-col">
            <span className="font-medium">size</span>
            <span>{formatSize(block.size, unit)}</span>
          </div>
          <div className="flex-1 flex items-center justify-end gap-1 ml-4">
            <FlagCell label="A" title="allocated" active={allocated} />
            <FlagCell label="L" title="lower half of its parent" active={lowerHalf} />
          </div>
        </div>

        <div className="flex items-center border-t border-gray-300 px-3 py-2 text-xs">
          {allocated ? (
            <>
              <div className="flex-1">{'owner: ' + block.owner}</div>
              <div className="flex-1">{'used: ' + formatSize(block.requested, unit)}</div>
            </>
          ) : (
            <div className="flex-1 text-gray-500">free</div>
          )}
        </div>

        <div className="bg-gray-200 text-gray-700 px-3 py-2 border-t border-gray-300 text-xs space-y-0.5">
          <div>{'buddy ' + (isRoot ? '-' : hex(buddyOf(block.start, block.size)))}</div>
          {allocated && (
            <div>{'waste ' + formatSize(block.size - block.requested, unit)}</div>
          )}
        </div>
      </div>
    </div>
  );
}
