/**
 * Study Planner - Calendar Page
 *
 * Query parameters: year, month (zero-based). Defaults to the current month.
 */

import CalendarBoard from '@/components/CalendarBoard';

export const dynamic = 'force-dynamic';

function intParam(value: string | string[] | undefined, fallback: number): number {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : fallback;
}

export default function CalendarPage({
  searchParams,
}: {
  searchParams: Record<string, string | string[] | undefined>;
}) {
  const now = new Date();
  const year = intParam(searchParams.year, now.getFullYear());
  const month = intParam(searchParams.month, now.getMonth());

  return (
    <div>
      <h1>Study calendar</h1>
      <CalendarBoard initialYear={year} initialMonth={month >= 0 && month <= 11 ? month : now.getMonth()} />
    </div>
  );
}
