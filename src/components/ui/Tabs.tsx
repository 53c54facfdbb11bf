// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { createContext, type ReactNode, useContext, useId } from 'react'
import { cn } from '@/lib/utils'

interface TabsContextValue {
  active: string
  select: (tab: string) => void
  idFor: (tab: string, part: 'tab' | 'panel') => string
}

const TabsContext = createContext<TabsContextValue | null>(null)

function useTabsContext() {
  const context = useContext(TabsContext)
  if (!context) {
    throw new Error('Tab and TabPanel must be rendered inside <Tabs>')
  }
  return context
}

interface TabsProps {
  value: string
  onChange: (tab: string) => void
  children: ReactNode
  className?: string
}

/** Controlled tab set; the owner keeps the active tab (e.g. in the URL). */
export function Tabs({ value, onChange, children, className }: TabsProps) {
  const baseId = useId()
  const idFor = (tab: string, part: 'tab' | 'panel') => `${baseId}-${part}-${tab}`

  return (
    <TabsContext.Provider value={{ active: value, select: onChange, idFor }}>
      <div className={className}>{children}</div>
    </TabsContext.Provider>
  )
}

export function TabList({ children, className }: { children: ReactNode; className?: string }) {
  return (
    <div role="tablist" className={cn('flex gap-1 border-b border-gray-200', className)}>
      {children}
    </div>
  )
}

interface TabProps {
  value: string
  children: ReactNode
  // Hidden when zero
  badge?: number
  icon?: ReactNode
}

export function Tab({ value, children, badge, icon }: TabProps) {
  const { active, select, idFor } = useTabsContext()
  const selected = active === value

  return (
    <button
      type="button"
      role="tab"
      id={idFor(value, 'tab')}
      aria-controls={idFor(value, 'panel')}
      aria-selected={selected}
      tabIndex={selected ? 0 : -1}
      onClick={() => select(value)}
      className={cn(
        '-mb-px inline-flex items-center gap-2 border-b-2 px-4 py-3 text-sm font-medium',
        selected
          ? 'border-blue-600 text-blue-600'
          : 'border-transparent text-gray-500 hover:border-gray-300 hover:text-gray-800',
      )}
    >
      {icon}
      {children}
      {!!badge && (
        <span className="rounded-full bg-gray-100 px-2 py-0.5 text-xs text-gray-600">{badge}</span>
      )}
    </button>
  )
}

export function TabPanel({ value, children }: { value: string; children: ReactNode }) {
  const { active, idFor } = useTabsContext()
  if (active !== value) return null

  return (
    <div role="tabpanel" id={idFor(value, 'panel')} aria-labelledby={idFor(value, 'tab')}>
      {children}
    </div>
  )
}
