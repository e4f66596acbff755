"use client";
import React, { useCallback, useEffect, useState } from 'react';
import MetricCard from './MetricCard';
import FitnessChart from './FitnessChart';
import type { FitnessDay } from '@/lib/db/types';
import type { ProfileView } from '@/lib/profile';
import { FITNESS_METRICS, isFitnessMetric } from '@/lib/fitness';
import type { ChartSeries, FitnessMetric } from '@/lib/fitness';

type FitnessResponse = {
  rows: FitnessDay[];
  profile: ProfileView;
};

const EMPTY_FORM = { date: '', running_km: '', pushups: '', situps: '', pullups: '', weight: '' };

const FIELDS: Array<{ name: keyof typeof EMPTY_FORM; label: string; type: string; step?: string }> = [
  { name: 'date', label: 'Date', type: 'date' },
  { name: 'running_km', label: 'Running (km)', type: 'number', step: '0.01' },
  { name: 'pushups', label: 'Push-ups', type: 'number' },
  { name: 'situps', label: 'Sit-ups', type: 'number' },
  { name: 'pullups', label: 'Pull-ups', type: 'number' },
  { name: 'weight', label: 'Weight (kg)', type: 'number', step: '0.1' },
];

function fmt(value: number | null, decimals = 0): string {
  return value === null ? '—' : value.toFixed(decimals);
}

export default function FitnessLog() {
  const [data, setData] = useState<FitnessResponse | null>(null);
  const [metric, setMetric] = useState<FitnessMetric>('BMI');
  const [series, setSeries] = useState<ChartSeries>({ labels: [], values: [] });
  const [form, setForm] = useState(EMPTY_FORM);
  const [range, setRange] = useState({ start: '', end: '' });
  const [busy, setBusy] = useState(false);
  const [msg, setMsg] = useState<string | null>(null);

  const load = useCallback(async () => {
    try {
      const res = await fetch('/api/fitness', { cache: 'no-store' });
      if (!res.ok) throw new Error('fitness load failed');
      const next: FitnessResponse = await res.json();
      setData(next);
    } catch (e) {
      console.error(e);
    }
  }, []);

  const loadSeries = useCallback(async () => {
    try {
      const res = await fetch(`/api/fitness/data?metric=${encodeURIComponent(metric)}`, { cache: 'no-store' });
      if (!res.ok) throw new Error('chart load failed');
      const next: ChartSeries = await res.json();
      setSeries(next);
    } catch (e) {
      console.error(e);
      setSeries({ labels: [], values: [] });
    }
  }, [metric]);

  useEffect(() => {
    void load();
  }, [load]);

  useEffect(() => {
    void loadSeries();
  }, [loadSeries]);

  async function send(url: string, init: RequestInit): Promise<boolean> {
    setBusy(true);
    setMsg(null);
    try {
      const res = await fetch(url, init);
      const j = await res.json();
      if (!res.ok || !j?.success) throw new Error(j?.error || 'Request failed');
      setMsg(j.message);
      await Promise.all([load(), loadSeries()]);
      return true;
    } catch (e) {
      setMsg(`Error: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    } finally {
      setBusy(false);
    }
  }

  async function save(e: React.FormEvent) {
    e.preventDefault();
    const ok = await send('/api/fitness', { method: 'POST', body: new URLSearchParams(form) });
    if (ok) setForm(EMPTY_FORM);
  }

  async function deleteRange(e: React.FormEvent) {
    e.preventDefault();
    const qs = new URLSearchParams(range).toString();
    const ok = await send(`/api/fitness/range?${qs}`, { method: 'DELETE' });
    if (ok) setRange({ start: '', end: '' });
  }

  const profile = data?.profile;
  const latestBmi = data?.rows.find(r => r.bmi !== null)?.bmi ?? null;

  return (
    <div>
      <section style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(140px, 1fr))', gap: 12, marginBottom: 12 }}>
        <MetricCard title="Height" value={profile?.height_m ?? null} unit=" m" compact />
        <MetricCard title="Age" value={profile?.age ?? null} subtitle={profile?.birthdate ?? undefined} compact />
        <MetricCard title="Latest BMI" value={latestBmi === null ? null : latestBmi.toFixed(1)} compact />
      </section>

      <form onSubmit={e => void save(e)} className="card" style={{ display: 'flex', gap: 8, flexWrap: 'wrap', marginBottom: 12 }}>
        {FIELDS.map(f => (
          <input
            key={f.name}
            aria-label={f.label}
            placeholder={f.label}
            type={f.type}
            step={f.step}
            min={f.type === 'number' ? 0 : undefined}
            value={form[f.name]}
            onChange={e => setForm({ ...form, [f.name]: e.target.value })}
          />
        ))}
        <button className="btn" type="submit" disabled={busy}>{busy ? 'Saving…' : 'Save day'}</button>
      </form>

      {msg && <div className="text-secondary" role="status">{msg}</div>}

      <div className="card" style={{ marginBottom: 12 }}>
        <select
          aria-label="Chart metric"
          value={metric}
          onChange={e => {
            const value = e.target.value;
            if (isFitnessMetric(value)) setMetric(value);
          }}
        >
          {FITNESS_METRICS.map(m => (
            <option key={m} value={m}>{m}</option>
          ))}
        </select>
        <FitnessChart
          title={metric}
          values={series.values}
          labels={series.labels}
          decimals={metric === 'BMI' || metric === 'Running' ? 1 : 0}
          suffix={metric === 'Running' ? ' km' : undefined}
        />
      </div>

      {data === null ? (
        <div className="text-secondary">Loading fitness log…</div>
      ) : data.rows.length === 0 ? (
        <div className="text-secondary">No fitness days logged yet.</div>
      ) : (
        <table className="table">
          <thead>
            <tr>
              <th>Date</th><th>Running (km)</th><th>Push-ups</th><th>Sit-ups</th><th>Pull-ups</th><th>Weight</th><th>BMI</th><th />
            </tr>
          </thead>
          <tbody>
            {data.rows.map(row => (
              <tr key={row.adate}>
                <td>{row.adate}</td>
                <td>{fmt(row.running_km, 2)}</td>
                <td>{fmt(row.pushups)}</td>
                <td>{fmt(row.situps)}</td>
                <td>{fmt(row.pullups)}</td>
                <td>{fmt(row.weight, 1)}</td>
                <td>{fmt(row.bmi, 1)}</td>
                <td>
                  <button className="btn-link" aria-label={`Delete ${row.adate}`} onClick={() => void send(`/api/fitness/${row.adate}`, { method: 'DELETE' })}>
                    ×
                  </button>
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      )}

      <form onSubmit={e => void deleteRange(e)} className="card" style={{ display: 'flex', gap: 8, marginTop: 12 }}>
        <input aria-label="Range start" type="date" required value={range.start} onChange={e => setRange({ ...range, start: e.target.value })} />
        <input aria-label="Range end" type="date" required value={range.end} onChange={e => setRange({ ...range, end: e.target.value })} />
        <button className="btn" type="submit" disabled={busy}>Delete range</button>
      </form>
    </div>
  );
}
