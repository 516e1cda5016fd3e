import { useEffect, useRef } from 'react';
import type { LogEntry } from '../session';
import { formatTimestamp } from '../utils';

const PREFIX: Record<LogEntry['type'], { prefix: string; color: string }> = {
  info: { prefix: 'INFO', color: 'text-gray-500' },
  success: { prefix: ' OK ', color: 'text-emerald-700' },
  warning: { prefix: 'WARN', color: 'text-amber-700' },
  error: { prefix: 'ERR!', color: 'text-red-600' },
};

/** Timestamped action log; the newest line is highlighted. */
export default function EventLog({
  logs,
  maxHeight = 280,
}: {
  logs: LogEntry[];
  maxHeight?: number;
}) {
  const containerRef = useRef<HTMLDivElement>(null);

  // follow the tail
  useEffect(() => {
    const el = containerRef.current;
    if (el) el.scrollTop = el.scrollHeight;
  }, [logs]);

  if (logs.length === 0) {
    return <div className="text-gray-500 text-xs italic">(no events yet)</div>;
  }

  const latest = logs[logs.length - 1].id;
  return (
    <div ref={containerRef} className="text-xs overflow-auto space-y-0.5" style={{ maxHeight }}>
      {logs.map(log => {
        const { prefix, color } = PREFIX[log.type];
        return (
          <div
            key={log.id}
            data-log-id={log.id}
            className={'flex gap-2 font-mono' + (log.id === latest ? ' bg-yellow-200' : '')}
          >
            <span className="text-gray-400 select-none">{formatTimestamp(log.timestamp)}</span>
            <span className={`${color} font-bold select-none`}>[{prefix}]</span>
            <span>{log.message}</span>
          </div>
        );
      })}
    </div>
  );
}
