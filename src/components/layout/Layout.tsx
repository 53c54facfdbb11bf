// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { History } from 'lucide-react'
import { Outlet } from 'react-router-dom'
import { Toaster } from 'sonner'
import { APP_NAME } from '@/lib/constants'
import { Footer } from './Footer'

export function Layout() {
  return (
    <div className="flex min-h-screen flex-col bg-gray-100">
      <header className="border-b border-gray-200 bg-white">
        <div className="mx-auto flex max-w-6xl items-center gap-2 px-6 py-4">
          <History className="h-6 w-6 text-blue-600" />
          <span className="text-lg font-semibold text-gray-900">{APP_NAME}</span>
        </div>
      </header>
      <main className="flex-1">
        <div className="mx-auto max-w-6xl p-6">
          <Outlet />
        </div>
      </main>
      <Footer />
      <Toaster position="bottom-right" richColors />
    </div>
  )
}
