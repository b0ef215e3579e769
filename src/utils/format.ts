/**
 * Utility functions for formatting download state
 */

import type { DownloadRecord, DownloadStatus } from '../../core/types'

export const STATUS_ICONS: Record<DownloadStatus, string> = {
  pending: '⏳',
  active: '⬇️',
  paused: '⏸',
  completed: '✅',
  cancelled: '🚫',
  failed: '⚠️',
}

export const STATUS_LABELS: Record<DownloadStatus, string> = {
  pending: 'Pending',
  active: 'Downloading',
  paused: 'Paused',
  completed: 'Completed',
  cancelled: 'Cancelled',
  failed: 'Failed',
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const

export function formatBytes(bytes: number): string {
  if (bytes < 0) return 'Unknown'
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024
    unit += 1
  }
  return `${Number(value.toFixed(2))} ${BYTE_UNITS[unit]}`
}

/**
 * Percent with one decimal when the total is known, byte count otherwise.
 */
export function formatProgress(record: DownloadRecord): string {
  if (record.totalBytes > 0 || record.status === 'completed') {
    return `${record.progressPercent.toFixed(1)}%`
  }
  return formatBytes(record.transferredBytes)
}

export function truncateTitle(title: string, maxLength: number = 40): string {
  if (title.length <= maxLength) return title
  return title.substring(0, maxLength - 3) + '...'
}

export function formatRecordLine(record: DownloadRecord): string {
  const icon = STATUS_ICONS[record.status]
  const label = STATUS_LABELS[record.status]
  return `${icon} ${truncateTitle(record.title)} - ${label} (${formatProgress(record)})`
}
