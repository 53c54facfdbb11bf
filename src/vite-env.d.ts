// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

/// <reference types="vite/client" />

// Short commit hash set by vite.config.ts, 'unknown' outside a git checkout
declare const __GIT_COMMIT__: string
