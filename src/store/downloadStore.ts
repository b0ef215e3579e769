/**
 * Download Store - Zustand state for the presentation layer
 */

import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { DownloadQueueManager } from '../../core/queue-manager'
import type { DownloadRecord, DownloadStatus } from '../../core/types'

export interface QueueSummary {
  counts: Record<DownloadStatus, number>
  totalBytes: number
  transferredBytes: number
}

export interface DownloadStoreState {
  // State
  downloads: DownloadRecord[]
  errors: Record<string, string>

  // Actions
  setDownloads: (downloads: DownloadRecord[]) => void
  updateProgress: (record: DownloadRecord) => void
  markCompleted: (record: DownloadRecord) => void
  markFailed: (record: DownloadRecord, message: string) => void
  removeDownload: (id: string) => void
  clearFinished: () => void
  activeDownload: () => DownloadRecord | undefined
  summary: () => QueueSummary
}

export type DownloadStore = StoreApi<DownloadStoreState>

const FINISHED: ReadonlySet<DownloadStatus> = new Set<DownloadStatus>(['completed', 'cancelled', 'failed'])

function upsert(downloads: DownloadRecord[], record: DownloadRecord): DownloadRecord[] {
  const index = downloads.findIndex(d => d.id === record.id)
  if (index === -1) return [...downloads, record]
  return downloads.map((d, i) => (i === index ? record : d))
}

function emptyCounts(): Record<DownloadStatus, number> {
  return { pending: 0, active: 0, paused: 0, completed: 0, cancelled: 0, failed: 0 }
}

export function createDownloadStore(initial: DownloadRecord[] = []): DownloadStore {
  return createStore<DownloadStoreState>((set, get) => ({
    downloads: initial,
    errors: {},

    setDownloads: (downloads) => set({ downloads }),

    updateProgress: (record) => set((state) => ({
      downloads: upsert(state.downloads, record),
    })),

    markCompleted: (record) => set((state) => ({
      downloads: upsert(state.downloads, record),
    })),

    markFailed: (record, message) => set((state) => ({
      downloads: upsert(state.downloads, record),
      errors: { ...state.errors, [record.id]: message },
    })),

    removeDownload: (id) => set((state) => {
      const { [id]: _removed, ...errors } = state.errors
      return {
        downloads: state.downloads.filter(d => d.id !== id),
        errors,
      }
    }),

    clearFinished: () => set((state) => {
      const kept = state.downloads.filter(d => !FINISHED.has(d.status))
      const keptIds = new Set(kept.map(d => d.id))
      const errors: Record<string, string> = {}
      for (const [id, message] of Object.entries(state.errors)) {
        if (keptIds.has(id)) errors[id] = message
      }
      return { downloads: kept, errors }
    }),

    activeDownload: () => get().downloads.find(d => d.status === 'active'),

    summary: () => {
      const counts = emptyCounts()
      let totalBytes = 0
      let transferredBytes = 0
      for (const d of get().downloads) {
        counts[d.status] += 1
        if (!FINISHED.has(d.status) || d.status === 'completed') {
          totalBytes += d.totalBytes
          transferredBytes += d.transferredBytes
        }
      }
      return { counts, totalBytes, transferredBytes }
    },
  }))
}

/**
 * Mirror a queue manager into the store. Returns a function that stops
 * listening.
 */
export function connectDownloadStore(store: DownloadStore, manager: DownloadQueueManager): () => void {
  store.getState().setDownloads(manager.getDownloads())
  const unsubscribers = [
    manager.onProgress(record => store.getState().updateProgress(record)),
    manager.onCompleted(record => store.getState().markCompleted(record)),
    manager.onError((record, message) => store.getState().markFailed(record, message)),
  ]
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}
