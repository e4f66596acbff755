/**
 * Study Planner - Server-Only Module Guard
 *
 * Throws at import time when a storage or configuration module ends up
 * in a client bundle.
 */

/**
 * Verify this code is running on the server
 * @throws {Error} if running in browser environment
 */
export function ensureServerOnly(moduleName: string): void {
  if (typeof window !== 'undefined') {
    throw new Error(
      `The module "${moduleName}" can only be imported in server-side code.\n\n` +
      `It opens the local SQLite database and must never be bundled for the client.\n` +
      `Call the /api routes from client components instead.`
    );
  }
}
