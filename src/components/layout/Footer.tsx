// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { APP_NAME, APP_VERSION } from '@/lib/constants'

const version = __GIT_COMMIT__ === 'unknown' ? APP_VERSION : `${APP_VERSION} (${__GIT_COMMIT__})`

export function Footer() {
  return (
    <footer className="border-t border-gray-200 bg-white px-6 py-4 text-center text-xs text-gray-500">
      {APP_NAME} {version} &middot; Events live in this tab until you export them as JSON or CSV
    </footer>
  )
}
