import './globals.css';
import Link from 'next/link';
import type { Metadata } from 'next';

export const metadata: Metadata = {
  title: 'Video Notes',
  description: 'Transcripts, summaries and study notes for YouTube videos'
};

export default function RootLayout({
  children
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body>
        <header className="container" style={{ paddingBottom: 0 }}>
          <div
            className="card"
            style={{
              display: 'flex',
              justifyContent: 'space-between',
              alignItems: 'center'
            }}
          >
            <strong>Video Notes</strong>
            <nav style={{ display: 'flex', gap: 12 }}>
              <Link href="/dashboard/runs">Runs</Link>
              <Link href="/dashboard/cache">Cache</Link>
            </nav>
          </div>
        </header>
        {children}
      </body>
    </html>
  );
}
