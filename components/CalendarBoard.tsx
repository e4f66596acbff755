"use client";
import React, { useCallback, useEffect, useState } from 'react';
import MetricCard from './MetricCard';
import type { DayCell, MonthView } from '@/lib/calendarGrid';
import { CALENDAR_STATUSES } from '@/lib/db/types';
import type { CalendarStatus } from '@/lib/db/types';

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

const STATUS_LABELS: Record<CalendarStatus, string> = {
  none: '—',
  ok: 'Done',
  miss: 'Missed',
};

type Props = {
  initialYear: number;
  initialMonth: number; // 0-11
};

type Draft = {
  note: string;
  status: CalendarStatus;
  statusTouched: boolean;
};

function draftsFor(view: MonthView): Record<string, Draft> {
  const drafts: Record<string, Draft> = {};
  for (const cell of view.cells) {
    if (cell.inMonth) {
      drafts[cell.date] = { note: cell.note, status: cell.status, statusTouched: false };
    }
  }
  return drafts;
}

/**
 * Build the month form. Status is only sent for days the user changed so
 * the server keeps every other stored status.
 */
export function buildSaveBody(drafts: Record<string, Draft>): URLSearchParams {
  const body = new URLSearchParams();
  for (const [date, draft] of Object.entries(drafts)) {
    body.set(`note_${date}`, draft.note);
    if (draft.statusTouched) body.set(`status_${date}`, draft.status);
  }
  return body;
}

export default function CalendarBoard({ initialYear, initialMonth }: Props) {
  const [year, setYear] = useState(initialYear);
  const [month, setMonth] = useState(initialMonth);
  const [view, setView] = useState<MonthView | null>(null);
  const [drafts, setDrafts] = useState<Record<string, Draft>>({});
  const [busy, setBusy] = useState(false);
  const [msg, setMsg] = useState<string | null>(null);

  const load = useCallback(async () => {
    try {
      const res = await fetch(`/api/calendar?year=${year}&month=${month}`, { cache: 'no-store' });
      const data = await res.json();
      if (!res.ok) throw new Error(data?.error || 'Failed to load calendar');
      const next: MonthView = data;
      setView(next);
      setDrafts(draftsFor(next));
    } catch (e) {
      console.error(e);
      setMsg(e instanceof Error ? e.message : String(e));
    }
  }, [year, month]);

  useEffect(() => {
    void load();
  }, [load]);

  function edit(date: string, patch: Partial<Draft>) {
    setDrafts(prev => ({ ...prev, [date]: { ...prev[date], ...patch } }));
  }

  async function save() {
    setBusy(true);
    setMsg(null);
    try {
      const res = await fetch(`/api/calendar?year=${year}&month=${month}`, {
        method: 'POST',
        body: buildSaveBody(drafts),
      });
      const data = await res.json();
      if (!res.ok || !data?.success) throw new Error(data?.error || 'Failed to save');
      setMsg(data.message);
      await load();
    } catch (e) {
      setMsg(`Error: ${e instanceof Error ? e.message : String(e)}`);
    } finally {
      setBusy(false);
    }
  }

  async function clearDay(date: string) {
    setMsg(null);
    try {
      const res = await fetch(`/api/calendar/${date}`, { method: 'DELETE' });
      const data = await res.json();
      if (!res.ok || !data?.success) throw new Error(data?.error || 'Failed to clear');
      setMsg(data.message);
      await load();
    } catch (e) {
      setMsg(`Error: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  function go(target: { year: number; month: number }) {
    setYear(target.year);
    setMonth(target.month);
  }

  if (!view) {
    return <div className="text-secondary">{msg ?? 'Loading calendar…'}</div>;
  }

  return (
    <div>
      <div style={{ display: 'flex', alignItems: 'center', gap: 12, marginBottom: 12 }}>
        <button className="btn" aria-label="Previous month" onClick={() => go(view.prev)}>‹</button>
        <h2 style={{ margin: 0 }}>{view.monthName} {view.year}</h2>
        <button className="btn" aria-label="Next month" onClick={() => go(view.next)}>›</button>
      </div>

      <section style={{ display: 'grid', gridTemplateColumns: 'repeat(3, minmax(120px, 1fr))', gap: 12, marginBottom: 12 }}>
        <MetricCard title="Done" value={view.stats.ok} status="success" compact />
        <MetricCard title="Missed" value={view.stats.miss} status="danger" compact />
        <MetricCard title="Planned" value={view.stats.planned} status="info" compact />
      </section>

      <div role="grid" style={{ display: 'grid', gridTemplateColumns: 'repeat(7, 1fr)', gap: 4 }}>
        {WEEKDAYS.map(d => (
          <div key={d} role="columnheader" className="text-secondary">{d}</div>
        ))}
        {view.cells.map((cell, i) =>
          cell.inMonth ? (
            <DayBox
              key={cell.date}
              cell={cell}
              draft={drafts[cell.date]}
              onEdit={patch => edit(cell.date, patch)}
              onClear={() => void clearDay(cell.date)}
            />
          ) : (
            <div key={`pad-${i}`} className="card" style={{ opacity: 0.3 }} />
          )
        )}
      </div>

      <div style={{ marginTop: 12, display: 'flex', gap: 8, alignItems: 'center' }}>
        <button className="btn" disabled={busy} onClick={() => void save()}>{busy ? 'Saving…' : 'Save month'}</button>
        {msg && <span className="text-secondary">{msg}</span>}
      </div>
    </div>
  );
}

function DayBox({
  cell,
  draft,
  onEdit,
  onClear,
}: {
  cell: DayCell;
  draft: Draft | undefined;
  onEdit: (patch: Partial<Draft>) => void;
  onClear: () => void;
}) {
  const note = draft?.note ?? cell.note;
  const status = draft?.status ?? cell.status;

  return (
    <div role="gridcell" className={`card status-${status}`}>
      <div style={{ display: 'flex', justifyContent: 'space-between' }}>
        <strong>{cell.day}</strong>
        <button className="btn-link" aria-label={`Clear ${cell.date}`} onClick={onClear}>×</button>
      </div>
      <textarea
        aria-label={`Note ${cell.date}`}
        value={note}
        rows={2}
        onChange={e => onEdit({ note: e.target.value })}
      />
      <select
        aria-label={`Status ${cell.date}`}
        value={status}
        onChange={e => {
          const value = e.target.value;
          if (value === 'none' || value === 'ok' || value === 'miss') {
            onEdit({ status: value, statusTouched: true });
          }
        }}
      >
        {CALENDAR_STATUSES.map(s => (
          <option key={s} value={s}>{STATUS_LABELS[s]}</option>
        ))}
      </select>
    </div>
  );
}
