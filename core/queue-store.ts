/**
 * Persisted download queue
 *
 * The queue is kept as a single JSON document ({ items: [...] }) in the data
 * directory. Loading never throws: a missing or unreadable document yields an
 * empty queue.
 */

import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { isTerminal } from './types'
import type { DownloadRecord, Logger } from './types'

export const QUEUE_FILE_NAME = 'download_queue.json'

const downloadRecordSchema: z.ZodType<DownloadRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  kind: z.enum(['vod', 'episode', 'live-clip']),
  title: z.string(),
  sourceUrl: z.string().min(1),
  destinationPath: z.string().min(1),
  status: z.enum(['pending', 'active', 'paused', 'completed', 'cancelled', 'failed']),
  progressPercent: z.number().min(0).max(100).default(0),
  totalBytes: z.number().int().nonnegative().default(0),
  transferredBytes: z.number().int().nonnegative().default(0),
  subtitleUrl: z.string().min(1).optional(),
  pauseRequested: z.boolean().default(false),
  cancelRequested: z.boolean().default(false),
})

const queueDocumentSchema = z.object({
  items: z.array(z.unknown()),
})

function toStoredRecord(record: DownloadRecord): DownloadRecord {
  return { ...record, pauseRequested: false, cancelRequested: false }
}

export class PersistedQueueStore {
  readonly file: string
  private logger: Logger

  constructor(dataDir: string, logger: Logger) {
    this.file = path.join(dataDir, QUEUE_FILE_NAME)
    this.logger = logger
  }

  /**
   * Read the queue back in document order. Records that were mid-transfer
   * when the previous process stopped come back as paused.
   */
  load(): DownloadRecord[] {
    let raw: unknown
    try {
      if (!fs.existsSync(this.file)) return []
      raw = JSON.parse(fs.readFileSync(this.file, 'utf-8'))
    } catch (err) {
      this.logger.error('Failed to load download queue:', err)
      return []
    }

    const document = queueDocumentSchema.safeParse(raw)
    if (!document.success) {
      this.logger.error(`Failed to load download queue: unexpected document shape in ${this.file}`)
      return []
    }

    const records: DownloadRecord[] = []
    for (const item of document.data.items) {
      const parsed = downloadRecordSchema.safeParse(item)
      if (!parsed.success) {
        this.logger.warn('Skipping invalid download record:', parsed.error.issues[0]?.message)
        continue
      }
      const record = toStoredRecord(parsed.data)
      if (isTerminal(record.status)) continue
      if (record.status === 'active') record.status = 'paused'
      records.push(record)
    }
    return records
  }

  /**
   * Write the queue. Returns false when the document could not be written;
   * the caller's in-memory queue stays authoritative either way.
   */
  save(records: readonly DownloadRecord[]): boolean {
    try {
      fs.mkdirSync(path.dirname(this.file), { recursive: true })
      const data = { items: records.map(toStoredRecord) }
      fs.writeFileSync(this.file, JSON.stringify(data, null, 2))
      return true
    } catch (err) {
      this.logger.error('Failed to save download queue:', err)
      return false
    }
  }
}
