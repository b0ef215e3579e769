import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PersistedQueueStore, QUEUE_FILE_NAME } from '../../core/queue-store'
import type { DownloadRecord } from '../../core/types'

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function record(id: string, overrides: Partial<DownloadRecord> = {}): DownloadRecord {
  return {
    id,
    kind: 'vod',
    title: `Title ${id}`,
    sourceUrl: `http://media.test/movie/${id}.mp4`,
    destinationPath: `/downloads/${id}.mp4`,
    status: 'pending',
    progressPercent: 0,
    totalBytes: 0,
    transferredBytes: 0,
    pauseRequested: false,
    cancelRequested: false,
    ...overrides,
  }
}

describe('PersistedQueueStore', () => {
  let dataDir: string

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'queue-store-'))
  })

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true })
  })

  it('loads back what it saved, in order', () => {
    const store = new PersistedQueueStore(dataDir, silentLogger())
    const records = [
      record('vod_1_1700000000', { status: 'paused', totalBytes: 1000, transferredBytes: 400, progressPercent: 40 }),
      record('episode_7_1700000001', { kind: 'episode', subtitleUrl: 'http://media.test/sub.srt' }),
      record('vod_2_1700000002'),
    ]

    expect(store.save(records)).toBe(true)
    expect(store.load()).toEqual(records)
  })

  it('writes an items document with control flags cleared', () => {
    const store = new PersistedQueueStore(dataDir, silentLogger())
    store.save([record('a', { pauseRequested: true, cancelRequested: true })])

    const document = JSON.parse(fs.readFileSync(path.join(dataDir, QUEUE_FILE_NAME), 'utf-8'))
    expect(document.items).toHaveLength(1)
    expect(document.items[0].pauseRequested).toBe(false)
    expect(document.items[0].cancelRequested).toBe(false)
  })

  it('returns an empty queue when no document exists', () => {
    const logger = silentLogger()
    const store = new PersistedQueueStore(dataDir, logger)
    expect(store.load()).toEqual([])
    expect(logger.error).not.toHaveBeenCalled()
  })

  it('returns an empty queue for a corrupt document', () => {
    const logger = silentLogger()
    fs.writeFileSync(path.join(dataDir, QUEUE_FILE_NAME), '{ "items": [')
    const store = new PersistedQueueStore(dataDir, logger)

    expect(store.load()).toEqual([])
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('returns an empty queue for a document of the wrong shape', () => {
    const logger = silentLogger()
    fs.writeFileSync(path.join(dataDir, QUEUE_FILE_NAME), JSON.stringify([record('a')]))
    const store = new PersistedQueueStore(dataDir, logger)

    expect(store.load()).toEqual([])
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('skips invalid items and keeps the rest', () => {
    const logger = silentLogger()
    const good = record('good')
    fs.writeFileSync(
      path.join(dataDir, QUEUE_FILE_NAME),
      JSON.stringify({ items: [{ id: 'broken' }, good] }),
    )
    const store = new PersistedQueueStore(dataDir, logger)

    expect(store.load()).toEqual([good])
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it('reloads a record that was mid-transfer as paused and drops terminal ones', () => {
    const store = new PersistedQueueStore(dataDir, silentLogger())
    store.save([
      record('active', { status: 'active', transferredBytes: 10, totalBytes: 100, progressPercent: 10 }),
      record('done', { status: 'completed' }),
      record('gone', { status: 'cancelled' }),
      record('broken', { status: 'failed' }),
      record('next'),
    ])

    const loaded = store.load()
    expect(loaded.map(r => [r.id, r.status])).toEqual([
      ['active', 'paused'],
      ['next', 'pending'],
    ])
    expect(loaded[0].transferredBytes).toBe(10)
  })

  it('fills defaults for missing counters', () => {
    const { id, kind, title, sourceUrl, destinationPath, status } = record('bare')
    const bare = { id, kind, title, sourceUrl, destinationPath, status }
    fs.writeFileSync(path.join(dataDir, QUEUE_FILE_NAME), JSON.stringify({ items: [bare] }))
    const store = new PersistedQueueStore(dataDir, silentLogger())

    expect(store.load()).toEqual([record('bare')])
  })

  it('logs and reports false when the document cannot be written', () => {
    const logger = silentLogger()
    const blocker = path.join(dataDir, 'not-a-dir')
    fs.writeFileSync(blocker, 'x')
    const store = new PersistedQueueStore(blocker, logger)

    expect(store.save([record('a')])).toBe(false)
    expect(logger.error).toHaveBeenCalledTimes(1)
  })
})
