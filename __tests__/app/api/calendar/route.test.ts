/**
 * Study Planner - Calendar API Tests
 */

import { GET, POST } from '@/app/api/calendar/route';
import { DELETE } from '@/app/api/calendar/[date]/route';
import { NextRequest } from 'next/server';
import { deleteCalendarDay, getCalendarMonth, saveCalendarMonth } from '@/lib/db/queries';

jest.mock('@/lib/db/queries', () => ({
  getCalendarMonth: jest.fn(),
  saveCalendarMonth: jest.fn(),
  deleteCalendarDay: jest.fn(),
}));

const mockGetCalendarMonth = jest.mocked(getCalendarMonth);
const mockSaveCalendarMonth = jest.mocked(saveCalendarMonth);
const mockDeleteCalendarDay = jest.mocked(deleteCalendarDay);

describe('Calendar API Route', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('GET /api/calendar', () => {
    it('should return the month grid with stats and neighbors', async () => {
      mockGetCalendarMonth.mockReturnValue([
        { cdate: '2024-06-19', note: 'Math', status: 'ok' },
        { cdate: '2024-06-20', note: 'History', status: 'none' },
        { cdate: '2024-06-21', note: null, status: 'miss' },
      ]);

      const request = new NextRequest('http://localhost:3000/api/calendar?year=2024&month=5');
      const response = await GET(request);
      const body = await response.json();

      expect(response.status).toBe(200);
      expect(mockGetCalendarMonth).toHaveBeenCalledWith(2024, 5);
      expect(body.monthName).toBe('June');
      expect(body.cells).toHaveLength(42);
      expect(body.cells[24]).toEqual({ inMonth: true, day: 19, date: '2024-06-19', note: 'Math', status: 'ok' });
      expect(body.stats).toEqual({ ok: 1, miss: 1, planned: 1 });
      expect(body.prev).toEqual({ year: 2024, month: 4 });
      expect(body.next).toEqual({ year: 2024, month: 6 });
    });

    it('should reject a month outside 0-11', async () => {
      const request = new NextRequest('http://localhost:3000/api/calendar?year=2024&month=12');
      const response = await GET(request);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ success: false, error: 'Invalid month: 12 (expected 0-11)' });
      expect(mockGetCalendarMonth).not.toHaveBeenCalled();
    });
  });

  describe('POST /api/calendar', () => {
    it('should save one submission per day of the month', async () => {
      mockSaveCalendarMonth.mockReturnValue({ written: 1 });

      const request = new NextRequest('http://localhost:3000/api/calendar?year=2024&month=1', {
        method: 'POST',
        body: new URLSearchParams({ 'note_2024-02-10': '  Read ch. 3 ', 'status_2024-02-10': 'ok' }),
      });
      const response = await POST(request);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        success: true,
        message: 'Calendar saved.',
        year: 2024,
        month: 1,
        written: 1,
      });

      const submissions = mockSaveCalendarMonth.mock.calls[0][0];
      expect(submissions).toHaveLength(29);
      expect(submissions[0]).toEqual({ cdate: '2024-02-01', note: '', status: null });
      expect(submissions[9]).toEqual({ cdate: '2024-02-10', note: 'Read ch. 3', status: 'ok' });
    });

    it('should reject an unknown status without saving', async () => {
      const request = new NextRequest('http://localhost:3000/api/calendar?year=2024&month=1', {
        method: 'POST',
        body: new URLSearchParams({ 'status_2024-02-10': 'done' }),
      });
      const response = await POST(request);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ success: false, error: 'Invalid status "done" for 2024-02-10' });
      expect(mockSaveCalendarMonth).not.toHaveBeenCalled();
    });

    it('should return 500 when storage fails', async () => {
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      mockSaveCalendarMonth.mockImplementation(() => {
        throw new Error('disk I/O error');
      });

      const request = new NextRequest('http://localhost:3000/api/calendar?year=2024&month=1', {
        method: 'POST',
        body: new URLSearchParams({ 'note_2024-02-10': 'Read' }),
      });
      const response = await POST(request);

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ success: false, error: 'Failed to save calendar' });
      expect(consoleError).toHaveBeenCalledWith('[Calendar API] Error:', expect.any(Error));
    });
  });

  describe('DELETE /api/calendar/[date]', () => {
    it('should clear the day and report its month', async () => {
      mockDeleteCalendarDay.mockReturnValue(1);

      const request = new NextRequest('http://localhost:3000/api/calendar/2024-06-19', { method: 'DELETE' });
      const response = await DELETE(request, { params: { date: '2024-06-19' } });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        success: true,
        message: 'Calendar day cleared: 2024-06-19',
        deleted: 1,
        year: 2024,
        month: 5,
      });
    });

    it('should return 400 for an impossible date and delete nothing', async () => {
      const request = new NextRequest('http://localhost:3000/api/calendar/2024-13-40', { method: 'DELETE' });
      const response = await DELETE(request, { params: { date: '2024-13-40' } });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Invalid date: expected YYYY-MM-DD, got "2024-13-40"',
      });
      expect(mockDeleteCalendarDay).not.toHaveBeenCalled();
    });
  });
});
