/** @jest-environment jsdom */
import '@testing-library/jest-dom';
import { fireEvent, render, screen, waitFor } from '@testing-library/react';
import FitnessLog from '../../components/FitnessLog';

type FakeResponse = { ok: boolean; json: () => Promise<unknown> };

const fetchMock = jest.fn<Promise<FakeResponse>, [string, RequestInit?]>();

function reply(body: unknown, ok = true): Promise<FakeResponse> {
  return Promise.resolve({ ok, json: () => Promise.resolve(body) });
}

const listing = {
  rows: [
    { adate: '2024-05-02', running_km: null, running_minutes: null, pushups: 35, situps: 40, pullups: null, weight: null, bmi: null },
    { adate: '2024-05-01', running_km: 5, running_minutes: null, pushups: 30, situps: null, pullups: 8, weight: 80, bmi: 25 },
  ],
  profile: { height_m: 1.71, birthdate: '1999-06-19', age: 25 },
};

describe('FitnessLog', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    Object.defineProperty(globalThis, 'fetch', { value: fetchMock, writable: true, configurable: true });
    fetchMock.mockImplementation((url, init) => {
      if (init?.method === 'POST') return reply({ success: true, message: 'Day saved.' });
      if (init?.method === 'DELETE') return reply({ success: true, message: 'Fitness days removed: 2024-05-01 → 2024-05-31' });
      if (url.startsWith('/api/fitness/data')) return reply({ labels: ['2024-05-01', '2024-05-02'], values: [25, 0] });
      return reply(listing);
    });
  });

  test('shows the profile, latest BMI and logged days', async () => {
    render(<FitnessLog />);

    expect(await screen.findByText('2024-05-01')).toBeInTheDocument();
    expect(screen.getByTestId('metric-Height')).toHaveTextContent(/^1\.71 m$/);
    expect(screen.getByTestId('metric-Age')).toHaveTextContent(/^25$/);
    expect(screen.getByTestId('metric-Latest BMI')).toHaveTextContent(/^25\.0$/);
    expect(fetchMock).toHaveBeenCalledWith('/api/fitness/data?metric=BMI', { cache: 'no-store' });
  });

  test('loads another chart metric when selected', async () => {
    render(<FitnessLog />);
    await screen.findByText('2024-05-01');

    fireEvent.change(screen.getByLabelText('Chart metric'), { target: { value: 'Push-ups' } });

    await waitFor(() =>
      expect(fetchMock).toHaveBeenCalledWith('/api/fitness/data?metric=Push-ups', { cache: 'no-store' })
    );
  });

  test('posts the day form with blanks left empty', async () => {
    render(<FitnessLog />);
    await screen.findByText('2024-05-01');

    fireEvent.change(screen.getByLabelText('Date'), { target: { value: '2024-05-03' } });
    fireEvent.change(screen.getByLabelText('Push-ups'), { target: { value: '42' } });
    fireEvent.click(screen.getByText('Save day'));

    expect(await screen.findByRole('status')).toHaveTextContent('Day saved.');
    const post = fetchMock.mock.calls.find(([, init]) => init?.method === 'POST');
    expect(String(post?.[1]?.body)).toBe('date=2024-05-03&running_km=&pushups=42&situps=&pullups=&weight=');
  });

  test('deletes an inclusive date range', async () => {
    render(<FitnessLog />);
    await screen.findByText('2024-05-01');

    fireEvent.change(screen.getByLabelText('Range start'), { target: { value: '2024-05-01' } });
    fireEvent.change(screen.getByLabelText('Range end'), { target: { value: '2024-05-31' } });
    fireEvent.click(screen.getByText('Delete range'));

    await waitFor(() =>
      expect(fetchMock).toHaveBeenCalledWith('/api/fitness/range?start=2024-05-01&end=2024-05-31', {
        method: 'DELETE',
      })
    );
  });
});
