import type { Block } from '../../buddy';
import BlockCard from './BlockCard';

export default function BlockRow({
  items,
  capacity,
  unit,
  onSelect,
  selectedOwner,
}: {
  items: Block[];
  capacity: number;
  unit: string;
  onSelect?: (owner: string) => void;
  selectedOwner?: string | null;
}) {
  if (items.length === 0) {
    return <div className="text-gray-500 text-xs italic">(empty)</div>;
  }
  return (
    <div className="flex gap-4 flex-nowrap overflow-x-auto py-2">
      {items.map(block => (
        <div key={block.start} className="shrink-0">
          <BlockCard
            block={block}
            capacity={capacity}
            unit={unit}
            selected={
              block.state === 'allocated' && selectedOwner != null && block.owner === selectedOwner
            }
            onSelect={onSelect}
          />
        </div>
      ))}
    </div>
  );
}
