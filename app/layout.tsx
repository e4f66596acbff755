/**
 * Study Planner - Root Layout
 *
 * Provides the base HTML structure and navigation between the three logs.
 */

import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import './globals.css';

export const metadata: Metadata = {
  title: 'Study Planner',
  description: 'Study calendar, practice-exam scores and physical-test log',
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body>
        <header style={{
          position: 'sticky', top: 0, zIndex: 50,
          background: 'var(--color-bg)', borderBottom: '1px solid var(--color-border)',
          padding: '0.75rem 1rem'
        }}>
          <nav style={{ display: 'flex', gap: '1rem', alignItems: 'center' }}>
            <a href="/calendar" style={{ fontWeight: 600 }}>Study Planner</a>
            <a href="/calendar" style={{ color: 'var(--color-text-secondary)' }}>Calendar</a>
            <a href="/exams" style={{ color: 'var(--color-text-secondary)' }}>Practice exams</a>
            <a href="/fitness" style={{ color: 'var(--color-text-secondary)' }}>Fitness</a>
          </nav>
        </header>
        <main style={{ padding: '1rem' }}>{children}</main>
      </body>
    </html>
  );
}
