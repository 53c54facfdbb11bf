// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { act, cleanup, fireEvent, render, screen } from '@testing-library/react'
import { MemoryRouter } from 'react-router-dom'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { Timeline } from '@/pages/Timeline'
import { useTimeline } from '@/stores/timeline'

vi.mock('sonner', () => ({
  toast: { success: vi.fn(), error: vi.fn() },
}))

let foundingId = ''

function renderTimeline(url = '/') {
  return render(
    <MemoryRouter initialEntries={[url]}>
      <Timeline />
    </MemoryRouter>,
  )
}

const cardTitles = () => screen.queryAllByRole('article').map((card) => card.getAttribute('aria-label'))

const barX = (title: string) => {
  const bar = screen
    .getAllByTestId('chart-bar')
    .find((el) => el.querySelector('title')?.textContent?.startsWith(title))
  return Number(bar?.getAttribute('data-x'))
}

describe('Timeline page', () => {
  beforeEach(() => {
    const { addEvent } = useTimeline.getState()
    addEvent({
      title: 'War Begins',
      date_text: 'Second Spring',
      start_date: '1997-03',
      story: 'Book Two',
      sort_index: 2,
    })
    foundingId = addEvent({
      title: 'Founding',
      date_text: 'Year of Ash',
      start_date: '1997',
      story: 'Book One',
      sort_index: 1,
    })
  })

  afterEach(() => {
    cleanup()
    act(() => useTimeline.getState().clear())
  })

  it('should list cards by sort index and chart them by date', () => {
    renderTimeline()

    expect(cardTitles()).toEqual(['Founding', 'War Begins'])

    fireEvent.click(screen.getByRole('tab', { name: /Timeline Chart/ }))

    expect(screen.getAllByTestId('chart-bar')).toHaveLength(2)
    expect(barX('Founding')).toBeLessThan(barX('War Begins'))
  })

  it('should reorder the cards after a sort index edit', () => {
    renderTimeline()

    act(() => {
      useTimeline.getState().updateEvent(foundingId, { sort_index: 3 })
    })

    expect(cardTitles()).toEqual(['War Begins', 'Founding'])
  })

  it('should read filters and the view from the URL', () => {
    renderTimeline('/?q=spring')
    expect(cardTitles()).toEqual(['War Begins'])
    cleanup()

    renderTimeline('/?story=Book%20One&view=chart')
    expect(screen.getAllByTestId('chart-bar')).toHaveLength(1)
    expect(screen.getByRole('img', { name: 'Timeline chart with 1 event' })).toBeTruthy()
  })

  it('should explain an empty filter result', () => {
    renderTimeline('/?q=nothing-like-this')

    expect(screen.getByText('No events match your filters.')).toBeTruthy()
  })

  it('should filter from the story picker', () => {
    renderTimeline()

    fireEvent.change(screen.getByRole('combobox', { name: 'Story' }), { target: { value: 'Book Two' } })

    expect(cardTitles()).toEqual(['War Begins'])
  })

  it('should delete an event from its card', () => {
    renderTimeline()
    const founding = screen.getByRole('article', { name: 'Founding' })
    const deleteButton = Array.from(founding.querySelectorAll('button')).find(
      (button) => button.title === 'Delete event',
    )
    if (!deleteButton) throw new Error('delete button not rendered')

    fireEvent.click(deleteButton)

    expect(cardTitles()).toEqual(['War Begins'])
    expect(useTimeline.getState().events.map((e) => e.title)).toEqual(['War Begins'])
  })
})
