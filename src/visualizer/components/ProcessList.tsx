import type { BuddySnapshot } from '../../buddy';
import type { ProcessEntry } from '../session';
import { blockOf, describeProcess } from '../session';
import { hex } from '../utils';

export default function ProcessList({
  processes,
  snap,
  unit,
  selected,
  onSelect,
}: {
  processes: ProcessEntry[];
  snap: BuddySnapshot;
  unit: string;
  selected: number | null;
  onSelect: (index: number) => void;
}) {
  if (processes.length === 0) {
    return <div className="text-gray-500 text-xs italic">(no active processes)</div>;
  }
  return (
    <ul className="text-xs max-h-56 overflow-auto border border-gray-300">
      {processes.map((p, i) => {
        const block = blockOf(snap, p.name);
        return (
          <li
            key={p.name}
            data-index={i}
            onClick={() => onSelect(i)}
            className={
              'px-2 py-1 cursor-pointer flex justify-between' +
              (i === selected ? ' bg-blue-200' : ' hover:bg-gray-100')
            }
          >
            <span>{describeProcess(p, unit)}</span>
            <span className="text-gray-500">{block ? `@ ${hex(block.start)}` : '(missing)'}</span>
          </li>
        );
      })}
    </ul>
  );
}
