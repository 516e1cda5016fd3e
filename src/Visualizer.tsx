import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import type { BuddyEvent, BuddySnapshot } from './buddy';
import { BuddyAllocator } from './buddy';
import BlockRow from './visualizer/components/BlockRow';
import EventLog from './visualizer/components/EventLog';
import MemoryBar from './visualizer/components/MemoryBar';
import ProcessList from './visualizer/components/ProcessList';
import Section from './visualizer/components/Section';
import StatsPanel from './visualizer/components/StatsPanel';
import type { VisualizerConfig } from './visualizer/config';
import { DEFAULT_CONFIG } from './visualizer/config';
import type { LogEntry, ProcessEntry } from './visualizer/session';
import {
  appendLog,
  processName,
  selectionAfterRemoval,
  toLogEntry,
} from './visualizer/session';
import { formatSize, hex, parseSize } from './visualizer/utils';

const inputCls = 'h-8 rounded-md border border-gray-400 bg-white px-2 text-sm font-mono';
const buttonCls = 'h-8 px-3 rounded-md border border-gray-600 bg-gray-200 text-sm shadow font-mono';

// -------------------------- Main UI --------------------------
export default function Visualizer({ config = DEFAULT_CONFIG }: { config?: VisualizerConfig }) {
  const allocatorRef = useRef<BuddyAllocator | null>(null);
  const nextLogId = useRef(0);
  const [snap, setSnap] = useState<BuddySnapshot | null>(null);
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const [error, setError] = useState<string | null>(null);

  const [capacityInput, setCapacityInput] = useState<string>(String(config.capacity));
  const [processCount, setProcessCount] = useState(1);
  const [nameInput, setNameInput] = useState<string>(processName(config.processPrefix, 1));
  const [sizeInput, setSizeInput] = useState<string>(String(config.defaultProcessSize));
  const [processes, setProcesses] = useState<ProcessEntry[]>([]);
  const [selected, setSelected] = useState<number | null>(null);

  const toEntries = useCallback(
    (evs: BuddyEvent[]) => evs.map(ev => toLogEntry(ev, nextLogId.current++, Date.now())),
    []
  );

  // one allocator per config; the log follows it through a subscription
  useEffect(() => {
    const allocator = new BuddyAllocator({
      capacity: config.capacity,
      minBlockSize: config.minBlockSize,
    });
    allocatorRef.current = allocator;
    setSnap(allocator.snapshot());
    setLogs(toEntries(allocator.events));
    setProcesses([]);
    setSelected(null);
    const unsubscribe = allocator.subscribe(ev => {
      const entries = toEntries([ev]);
      setLogs(prev => appendLog(prev, entries, config.maxLogEntries));
    });
    return unsubscribe;
  }, [config, toEntries]);

  function refresh() {
    if (allocatorRef.current) setSnap(allocatorRef.current.snapshot());
  }

  function addProcess() {
    const allocator = allocatorRef.current;
    if (!allocator) return;
    const name = nameInput.trim();
    const size = parseSize(sizeInput);
    if (!name || size == null) {
      setError('Invalid process name or memory size.');
      return;
    }
    const r = allocator.allocate(name, size);
    refresh();
    if (!r.ok) {
      setError(r.error.message);
      return;
    }
    setError(null);
    setProcesses(prev => [...prev, { name, size }]);
    const next = processCount + 1;
    setProcessCount(next);
    setNameInput(processName(config.processPrefix, next));
  }

  function removeProcess() {
    const allocator = allocatorRef.current;
    if (!allocator) return;
    const p = selected == null ? undefined : processes[selected];
    if (selected == null || !p) {
      setError('No process selected.');
      return;
    }
    const r = allocator.free(p.name);
    refresh();
    if (!r.ok) {
      setError(r.error.message);
      return;
    }
    setError(null);
    const remaining = processes.filter((_, i) => i !== selected);
    setProcesses(remaining);
    setSelected(selectionAfterRemoval(remaining.length, selected));
  }

  function updateCapacity() {
    const allocator = allocatorRef.current;
    if (!allocator) return;
    const n = parseSize(capacityInput);
    if (n == null) {
      setError('Total memory must be a positive integer.');
      return;
    }
    const r = allocator.setCapacity(n);
    refresh();
    if (!r.ok) {
      setError(r.error.message);
      return;
    }
    setError(null);
    setCapacityInput(String(r.to));
  }

  function selectOwner(owner: string) {
    const i = processes.findIndex(p => p.name === owner);
    setSelected(i < 0 ? null : i);
  }

  const selectedOwner = selected == null ? null : (processes[selected]?.name ?? null);

  const stats = useMemo(() => (snap ? allocatorRef.current?.stats() ?? null : null), [snap]);

  const freeListSizes = useMemo(() => {
    if (!snap) return [] as number[];
    return Object.keys(snap.freeLists)
      .map(k => Number(k))
      .sort((a, b) => b - a);
  }, [snap]);

  return (
    <div className="w-full min-h-screen bg-neutral-50 text-gray-900 p-6 font-mono">
      <h1 className="text-lg font-semibold mb-4">Buddy System Memory Allocation</h1>

      {/* Toolbar */}
      <div className="flex flex-wrap items-center gap-3 mb-4">
        <label className="text-xs text-gray-600">total memory ({config.unit})</label>
        <input
          value={capacityInput}
          onChange={e => setCapacityInput(e.target.value)}
          className={inputCls + ' w-24'}
        />
        <button onClick={updateCapacity} className={buttonCls}>
          update memory
        </button>

        <span className="w-px h-6 bg-gray-300 mx-2" />

        <input
          placeholder="process name"
          value={nameInput}
          onChange={e => setNameInput(e.target.value)}
          className={inputCls + ' w-36'}
        />
        <input
          placeholder="size"
          value={sizeInput}
          onChange={e => setSizeInput(e.target.value)}
          className={inputCls + ' w-20'}
        />
        <button onClick={addProcess} className={buttonCls}>
          add process
        </button>
        <button onClick={removeProcess} className={buttonCls}>
          remove process
        </button>

        <div className="ml-auto text-xs text-gray-600 flex items-center gap-4">
          <span>capacity: {snap ? formatSize(snap.capacity, config.unit) : '-'}</span>
          <span>min block: {formatSize(config.minBlockSize, config.unit)}</span>
        </div>
      </div>

      {error && (
        <div role="alert" className="mb-4 border border-red-400 bg-red-50 text-red-700 text-xs px-3 py-2">
          {error}
        </div>
      )}

      {snap && (
        <div className="space-y-6">
          <Section title="memory map">
            <MemoryBar
              snap={snap}
              unit={config.unit}
              selectedOwner={selectedOwner}
              onSelect={selectOwner}
            />
          </Section>

          <div className="grid md:grid-cols-2 gap-6">
            <Section title="statistics">
              {stats && <StatsPanel stats={stats} unit={config.unit} />}
            </Section>

            <Section title="active processes" count={processes.length}>
              <ProcessList
                processes={processes}
                snap={snap}
                unit={config.unit}
                selected={selected}
                onSelect={setSelected}
              />
            </Section>
          </div>

          <Section title="free lists (block size → free starts)">
            <div className="text-xs space-y-1">
              {freeListSizes.map(size => (
                <div key={size} className="flex gap-2">
                  <span className="w-24 font-semibold text-gray-700">
                    {formatSize(size, config.unit)}
                  </span>
                  <span className="text-gray-600">
                    {snap.freeLists[size].length
                      ? snap.freeLists[size].map(a => hex(a)).join(', ')
                      : '(empty)'}
                  </span>
                </div>
              ))}
            </div>
          </Section>

          <Section title="blocks" count={snap.blocks.length}>
            <BlockRow
              items={snap.blocks}
              capacity={snap.capacity}
              unit={config.unit}
              selectedOwner={selectedOwner}
              onSelect={selectOwner}
            />
          </Section>

          <Section title="log" count={logs.length}>
            <EventLog logs={logs} />
          </Section>
        </div>
      )}
    </div>
  );
}
