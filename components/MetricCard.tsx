/**
 * Study Planner - Metric Card Component
 *
 * Small card for one headline number (days done, average score, BMI).
 */

interface MetricCardProps {
  title: string;
  value: number | string | null;
  unit?: string;
  status?: 'success' | 'warning' | 'danger' | 'info';
  subtitle?: string;
  compact?: boolean;
}

export default function MetricCard({
  title,
  value,
  unit,
  status = 'info',
  subtitle,
  compact = false,
}: MetricCardProps) {
  const displayValue = value !== null ? value : '--';

  return (
    <div className={`card metric-card metric-${status}${compact ? ' metric-compact' : ''}`}>
      <div className="text-secondary">{title}</div>
      <div className="metric-value" data-testid={`metric-${title}`}>
        {displayValue}
        {unit && <span className="metric-unit">{unit}</span>}
      </div>
      {subtitle && <div className="text-secondary">{subtitle}</div>}
    </div>
  );
}
