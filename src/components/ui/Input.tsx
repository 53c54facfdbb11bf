// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { forwardRef, type InputHTMLAttributes } from 'react'
import { cn } from '@/lib/utils'

interface InputProps extends InputHTMLAttributes<HTMLInputElement> {
  label?: string
  error?: string
  // Non-blocking notice, e.g. a date the chart cannot plot
  warning?: string
  description?: string
}

export const Input = forwardRef<HTMLInputElement, InputProps>(
  ({ className, label, error, warning, description, id, ...props }, ref) => {
    const inputId = id || props.name
    const note = error ?? warning ?? description

    return (
      <div className="w-full">
        {label && (
          <label htmlFor={inputId} className="block text-sm font-medium text-gray-700 mb-1">
            {label}
          </label>
        )}
        <input
          ref={ref}
          id={inputId}
          aria-invalid={error ? true : undefined}
          className={cn(
            'block w-full rounded-md shadow-sm transition-colors text-sm',
            'border-gray-300 focus:border-blue-500 focus:ring-blue-500',
            warning && 'border-amber-400',
            error && 'border-red-500 focus:border-red-500 focus:ring-red-500',
            className,
          )}
          {...props}
        />
        {note && (
          <p
            className={cn(
              'mt-1 text-sm',
              error ? 'text-red-600' : warning ? 'text-amber-600' : 'text-gray-500',
            )}
          >
            {note}
          </p>
        )}
      </div>
    )
  },
)

Input.displayName = 'Input'
