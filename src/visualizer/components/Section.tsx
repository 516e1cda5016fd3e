import type { ReactNode } from 'react';

export default function Section({
  title,
  children,
  right,
  count,
}: {
  title: string;
  children: ReactNode;
  right?: ReactNode;
  count?: number;
}) {
  return (
    <section className="border border-gray-300 p-3 bg-white font-mono">
      <div className="flex items-center justify-between mb-2">
        <h2 className="text-gray-800 font-semibold text-sm">
          {title}
          {count != null && <span className="ml-2 text-xs text-gray-500">({count})</span>}
        </h2>
        {right}
      </div>
      {children}
    </section>
  );
}
