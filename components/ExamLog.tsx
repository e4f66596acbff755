"use client";
import React, { useCallback, useEffect, useState } from 'react';
import MetricCard from './MetricCard';
import type { ExamAttempt } from '@/lib/db/types';
import { examPercent } from '@/lib/exams';
import type { ExamStats } from '@/lib/exams';

type ExamsResponse = {
  rows: ExamAttempt[];
  stats: ExamStats;
};

const EMPTY_FORM = { sdate: '', q: '', a: '', disc: '' };

export default function ExamLog() {
  const [data, setData] = useState<ExamsResponse | null>(null);
  const [form, setForm] = useState(EMPTY_FORM);
  const [busy, setBusy] = useState(false);
  const [msg, setMsg] = useState<string | null>(null);

  const load = useCallback(async () => {
    try {
      const res = await fetch('/api/exams', { cache: 'no-store' });
      if (!res.ok) throw new Error('exams load failed');
      const next: ExamsResponse = await res.json();
      setData(next);
    } catch (e) {
      console.error(e);
      setData({ rows: [], stats: { count: 0, avg: 0, best: 0, worst: 0 } });
    }
  }, []);

  useEffect(() => {
    void load();
  }, [load]);

  async function send(url: string, init: RequestInit) {
    setBusy(true);
    setMsg(null);
    try {
      const res = await fetch(url, init);
      const j = await res.json();
      if (!res.ok || !j?.success) throw new Error(j?.error || 'Request failed');
      setMsg(j.message);
      await load();
      return true;
    } catch (e) {
      setMsg(`Error: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    } finally {
      setBusy(false);
    }
  }

  async function add(e: React.FormEvent) {
    e.preventDefault();
    const ok = await send('/api/exams', { method: 'POST', body: new URLSearchParams(form) });
    if (ok) setForm(EMPTY_FORM);
  }

  const stats = data?.stats;

  return (
    <div>
      <section style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(140px, 1fr))', gap: 12, marginBottom: 12 }}>
        <MetricCard title="Tests" value={stats ? stats.count : null} compact />
        <MetricCard title="Average" value={stats ? stats.avg.toFixed(1) : null} unit="%" compact />
        <MetricCard title="Best" value={stats ? stats.best.toFixed(1) : null} unit="%" status="success" compact />
        <MetricCard title="Worst" value={stats ? stats.worst.toFixed(1) : null} unit="%" status="warning" compact />
      </section>

      <form onSubmit={e => void add(e)} className="card" style={{ display: 'flex', gap: 8, flexWrap: 'wrap', marginBottom: 12 }}>
        <input aria-label="Exam date" type="date" required value={form.sdate} onChange={e => setForm({ ...form, sdate: e.target.value })} />
        <input aria-label="Questions" type="number" min={1} required value={form.q} onChange={e => setForm({ ...form, q: e.target.value })} placeholder="Questions" />
        <input aria-label="Correct" type="number" min={0} required value={form.a} onChange={e => setForm({ ...form, a: e.target.value })} placeholder="Correct" />
        <input aria-label="Discipline" value={form.disc} onChange={e => setForm({ ...form, disc: e.target.value })} placeholder="Discipline" />
        <button className="btn" type="submit" disabled={busy}>{busy ? 'Saving…' : 'Add test'}</button>
      </form>

      {msg && <div className="text-secondary" role="status">{msg}</div>}

      {data === null ? (
        <div className="text-secondary">Loading tests…</div>
      ) : data.rows.length === 0 ? (
        <div className="text-secondary">No tests logged yet.</div>
      ) : (
        <table className="table">
          <thead>
            <tr><th>Date</th><th>Discipline</th><th>Score</th><th>%</th><th /></tr>
          </thead>
          <tbody>
            {data.rows.map(row => (
              <tr key={row.id}>
                <td>
                  {row.sdate}{' '}
                  <button
                    className="btn-link"
                    aria-label={`Delete all tests on ${row.sdate}`}
                    onClick={() => void send(`/api/exams/by-date/${row.sdate}`, { method: 'DELETE' })}
                  >
                    ⌫
                  </button>
                </td>
                <td>{row.disc || '—'}</td>
                <td>{row.a}/{row.q}</td>
                <td>{row.q > 0 ? examPercent(row).toFixed(1) : '—'}</td>
                <td>
                  <button className="btn-link" aria-label={`Delete test ${row.id}`} onClick={() => void send(`/api/exams/${row.id}`, { method: 'DELETE' })}>
                    ×
                  </button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
}
