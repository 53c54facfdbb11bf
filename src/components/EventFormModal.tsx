// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { zodResolver } from '@hookform/resolvers/zod'
import { useEffect } from 'react'
import { useForm } from 'react-hook-form'
import { Button } from '@/components/ui/Button'
import { Input } from '@/components/ui/Input'
import { Modal } from '@/components/ui/Modal'
import { Textarea } from '@/components/ui/Textarea'
import {
  chartDateHint,
  type EventFormData,
  emptyEventForm,
  eventFormSchema,
  eventToForm,
} from '@/lib/eventForm'
import type { TimelineEvent } from '@/types'

interface EventFormModalProps {
  isOpen: boolean
  onClose: () => void
  // Resolve true to close the modal, false to keep the user's input
  onSubmit: (data: EventFormData) => boolean | Promise<boolean>
  event?: TimelineEvent | null
}

export function EventFormModal({ isOpen, onClose, onSubmit, event }: EventFormModalProps) {
  const isEditing = !!event

  const {
    register,
    handleSubmit,
    reset,
    watch,
    formState: { errors, isSubmitting },
  } = useForm<EventFormData>({
    resolver: zodResolver(eventFormSchema),
    defaultValues: emptyEventForm,
  })

  // Reset form when modal opens/closes or event changes
  useEffect(() => {
    if (isOpen) {
      reset(event ? eventToForm(event) : emptyEventForm)
    }
  }, [isOpen, event, reset])

  const handleFormSubmit = async (data: EventFormData) => {
    if (await onSubmit(data)) {
      reset(emptyEventForm)
      onClose()
    }
  }

  const handleClose = () => {
    reset(emptyEventForm)
    onClose()
  }

  return (
    <Modal isOpen={isOpen} onClose={handleClose} title={isEditing ? 'Edit Event' : 'Add Event'} size="lg">
      <form onSubmit={handleSubmit(handleFormSubmit)} className="space-y-4" noValidate>
        <div className="grid grid-cols-1 gap-4 sm:grid-cols-3">
          <div className="sm:col-span-2">
            <Input
              label="Title*"
              placeholder="What happens?"
              {...register('title')}
              error={errors.title?.message}
            />
          </div>
          <Input
            label="Sort Index"
            type="number"
            step="any"
            {...register('sort_index', { valueAsNumber: true })}
            error={errors.sort_index?.message}
          />
        </div>

        <Input
          label="Date Text*"
          placeholder="e.g. Spring 1842, Year 12 of the Sepia Age"
          {...register('date_text')}
          error={errors.date_text?.message}
        />

        <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
          <Input
            label="Start Date"
            placeholder="YYYY, YYYY-MM or YYYY-MM-DD"
            {...register('start_date')}
            warning={chartDateHint(watch('start_date'))}
          />
          <Input
            label="End Date"
            placeholder="Optional, same format"
            {...register('end_date')}
            warning={chartDateHint(watch('end_date'))}
          />
        </div>

        <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
          <Input label="Story" placeholder="Which book or thread" {...register('story')} />
          <Input label="Era" placeholder="Optional grouping" {...register('era')} />
        </div>

        <div className="grid grid-cols-1 gap-4 sm:grid-cols-2">
          <Input
            label="Characters"
            placeholder="Comma-separated"
            {...register('characters')}
          />
          <Input
            label="Categories"
            placeholder="Comma-separated"
            {...register('categories')}
          />
        </div>

        <Textarea label="Notes" placeholder="Plot summary, notes..." rows={4} {...register('notes')} />

        <div className="flex justify-end gap-3 pt-4">
          <Button type="button" variant="secondary" onClick={handleClose}>
            Cancel
          </Button>
          <Button type="submit" disabled={isSubmitting}>
            {isEditing ? 'Save Changes' : 'Add Event'}
          </Button>
        </div>
      </form>
    </Modal>
  )
}
