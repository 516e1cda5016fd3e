export default function FlagCell({
  label,
  active = false,
  title,
}: {
  label: string;
  active?: boolean;
  title?: string;
}) {
  return (
    <div
      className={
        'w-6 h-6 border grid place-items-center text-xs font-mono ' +
        (active ? 'bg-white border-gray-800' : 'border-gray-400 text-gray-400')
      }
      title={title ?? label}
      data-active={active ? 'true' : 'false'}
    >
      {label}
    </div>
  );
}
