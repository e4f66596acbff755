/**
 * Jest setup shared by every test file
 * - Mocks the server-only guard so server modules can import safely in tests
 */

jest.mock('@/lib/server-only-guard', () => ({
  ensureServerOnly: () => undefined,
}));
