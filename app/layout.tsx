import type { Metadata } from 'next'
import type { ReactNode } from 'react'

export const metadata: Metadata = {
  title: 'Course tiles',
  description: 'Tile display helpers for course pages.',
}

// Only the API routes are served; Next still needs a root layout for its built-in error pages
export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  )
}
