"use client";
import React, { useMemo, useState } from 'react';

type Props = {
  title: string;
  values: number[];
  labels?: string[]; // dates, same length as values
  width?: number;
  height?: number;
  color?: string;
  decimals?: number;
  suffix?: string; // e.g. " km"
};

export default function FitnessChart({
  title,
  values,
  labels,
  width = 600,
  height = 160,
  color,
  decimals = 1,
  suffix,
}: Props) {
  const pad = 8;
  const [hoverIdx, setHoverIdx] = useState<number | null>(null);

  const { path, pts, vmin, vmax } = useMemo(() => {
    const n = values.length;
    const clean = values.map(v => (Number.isFinite(v) ? v : 0));
    const min = n ? Math.min(...clean) : 0;
    const max = n ? Math.max(...clean) : 0;
    const iv = max === min ? [min, min + 1] : [min, max];
    const innerW = width - pad * 2;
    const innerH = height - pad * 2;
    const step = n > 1 ? innerW / (n - 1) : 0;
    const points: Array<[number, number]> = clean.map((v, i) => {
      const x = pad + i * step;
      const norm = (v - iv[0]) / (iv[1] - iv[0]);
      return [x, height - pad - norm * innerH];
    });
    const p = points.length
      ? `M ${points[0][0]} ${points[0][1]} ` + points.slice(1).map(([x, y]) => `L ${x} ${y}`).join(' ')
      : '';
    return { path: p, pts: points, vmin: min, vmax: max };
  }, [values, width, height]);

  const onMove: React.MouseEventHandler<SVGRectElement> = e => {
    const rect = e.currentTarget.getBoundingClientRect();
    const x = e.clientX - rect.left;
    const n = values.length;
    if (n === 0 || rect.width === 0) return;
    const idx = Math.max(0, Math.min(n - 1, Math.round((x / rect.width) * (n - 1))));
    setHoverIdx(idx);
  };

  const fmt = (val: number) => (Number.isFinite(val) ? val.toFixed(decimals) : '—') + (suffix ?? '');

  const hover = hoverIdx != null && pts[hoverIdx] ? pts[hoverIdx] : null;

  return (
    <div className="mt-1">
      <div style={{ display: 'flex', justifyContent: 'space-between' }}>
        <strong>{title}</strong>
        <span className="text-secondary">
          {values.length ? `min ${fmt(vmin)} • max ${fmt(vmax)}` : 'No data yet'}
        </span>
      </div>
      <svg width="100%" height={height} viewBox={`0 0 ${width} ${height}`} preserveAspectRatio="none" role="img" aria-label={`${title} chart`}>
        <path d={path} stroke={color || 'currentColor'} fill="none" strokeWidth={2} />
        {hover && <circle cx={hover[0]} cy={hover[1]} r={3} fill={color || 'currentColor'} />}
        <rect x={0} y={0} width={width} height={height} fill="transparent" onMouseMove={onMove} onMouseLeave={() => setHoverIdx(null)} />
      </svg>
      {hoverIdx != null && values[hoverIdx] !== undefined && (
        <div className="text-secondary">
          {labels?.[hoverIdx] ? `${labels[hoverIdx]}: ` : ''}{fmt(values[hoverIdx])}
        </div>
      )}
    </div>
  );
}
