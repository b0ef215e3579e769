/**
 * Download queue manager
 *
 * Strict FIFO queue with a single worker: at most one record is active, and
 * the worker runs transfers one after another until the queue drains or a
 * pause stops it. Observers receive progress, completion and error
 * notifications asynchronously, each carrying a copy of the record taken when
 * the event happened.
 */

import * as fs from 'fs'
import { PersistedQueueStore } from './queue-store'
import { TransferEngine } from './transfer-engine'
import type {
  CompletedListener,
  DownloaderConfig,
  DownloadRecord,
  ErrorListener,
  Logger,
  NewDownloadRequest,
  ProgressListener,
  TransferOutcome,
} from './types'

export interface QueueManagerDeps {
  store?: PersistedQueueStore
  engine?: TransferEngine
}

function snapshot(record: DownloadRecord): DownloadRecord {
  return { ...record }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class DownloadQueueManager {
  private queue: DownloadRecord[]
  private current: DownloadRecord | null = null
  // the active record as it was when popped; the only form of it ever persisted
  private currentAtPop: DownloadRecord | null = null
  private finished: DownloadRecord[] = []
  private running = false
  private worker: Promise<void> | null = null
  private store: PersistedQueueStore
  private engine: TransferEngine
  private logger: Logger

  private progressListeners = new Set<ProgressListener>()
  private completedListeners = new Set<CompletedListener>()
  private errorListeners = new Set<ErrorListener>()

  constructor(config: DownloaderConfig, deps: QueueManagerDeps = {}) {
    this.logger = config.logger
    this.store = deps.store ?? new PersistedQueueStore(config.dataDir, config.logger)
    this.engine = deps.engine ?? new TransferEngine(config)
    this.queue = this.store.load()
  }

  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.add(listener)
    return () => { this.progressListeners.delete(listener) }
  }

  onCompleted(listener: CompletedListener): () => void {
    this.completedListeners.add(listener)
    return () => { this.completedListeners.delete(listener) }
  }

  onError(listener: ErrorListener): () => void {
    this.errorListeners.add(listener)
    return () => { this.errorListeners.delete(listener) }
  }

  /**
   * Active record first, then the queue in the order it will run.
   */
  getDownloads(): DownloadRecord[] {
    const records = this.current ? [this.current, ...this.queue] : this.queue
    return records.map(snapshot)
  }

  /**
   * Records that reached completed, cancelled or failed in this process.
   */
  getFinished(): DownloadRecord[] {
    return this.finished.map(snapshot)
  }

  isRunning(): boolean {
    return this.running
  }

  enqueue(request: NewDownloadRequest): DownloadRecord {
    if (!request.id || !request.sourceUrl || !request.destinationPath) {
      throw new Error('A download needs an id, a source URL and a destination path')
    }
    if (this.current?.id === request.id || this.queue.some(r => r.id === request.id)) {
      throw new Error(`Download ${request.id} is already queued`)
    }

    const record: DownloadRecord = {
      id: request.id,
      kind: request.kind,
      title: request.title,
      sourceUrl: request.sourceUrl,
      destinationPath: request.destinationPath,
      ...(request.subtitleUrl ? { subtitleUrl: request.subtitleUrl } : {}),
      status: 'pending',
      progressPercent: 0,
      totalBytes: 0,
      transferredBytes: 0,
      pauseRequested: false,
      cancelRequested: false,
    }

    this.queue.push(record)
    this.persist()
    this.notifyProgress(record)
    this.startWorker()
    return snapshot(record)
  }

  /**
   * Ask the active transfer to stop at its next chunk. The whole queue halts
   * with it until resumeIfIdle(). When the request arrives after the last
   * chunk, the record completes and the queue halts behind it.
   */
  pauseActive() {
    if (this.current) {
      this.current.pauseRequested = true
    }
  }

  resumeIfIdle() {
    if (!this.running && this.queue.length > 0) {
      this.startWorker()
    }
  }

  cancel(id: string) {
    if (this.current?.id === id) {
      this.current.cancelRequested = true
      return
    }

    const index = this.queue.findIndex(r => r.id === id)
    if (index === -1) return

    const [record] = this.queue.splice(index, 1)
    try {
      fs.rmSync(record.destinationPath, { force: true })
    } catch (err) {
      this.logger.warn(`Failed to delete partial file for ${id}:`, errorMessage(err))
    }
    record.status = 'cancelled'
    record.transferredBytes = 0
    record.totalBytes = 0
    record.progressPercent = 0
    this.finished.push(record)
    this.persist()
    this.notifyProgress(record)
  }

  /**
   * Resolves once the worker has stopped and every notification scheduled so
   * far has been delivered.
   */
  async whenIdle(): Promise<void> {
    while (this.running && this.worker) {
      await this.worker
    }
    await new Promise<void>(resolve => setImmediate(resolve))
  }

  private startWorker() {
    if (this.running) return
    this.running = true
    this.worker = this.runWorker().catch((err) => {
      this.logger.error('Download worker stopped unexpectedly:', err)
    })
  }

  private async runWorker(): Promise<void> {
    try {
      while (this.queue.length > 0) {
        const record = this.queue.shift()
        if (!record) break
        const keepGoing = await this.process(record)
        if (!keepGoing) break
      }
    } finally {
      this.current = null
      this.currentAtPop = null
      this.running = false
    }
  }

  /**
   * Run one record to its outcome. Returns false when the worker must stop.
   */
  private async process(record: DownloadRecord): Promise<boolean> {
    this.current = record
    record.status = 'active'
    record.pauseRequested = false
    record.cancelRequested = false
    this.currentAtPop = snapshot(record)
    this.persist()
    this.notifyProgress(record)

    let outcome: TransferOutcome
    try {
      outcome = await this.engine.transfer(record, {
        onProgress: (r) => this.notifyProgress(r),
      })
    } catch (err) {
      const message = errorMessage(err)
      this.logger.error(`Download ${record.id} failed:`, message)
      record.status = 'failed'
      record.pauseRequested = false
      record.cancelRequested = false
      this.settle(record)
      this.notifyError(record, message)
      return true
    }

    switch (outcome) {
      case 'completed': {
        // a pause that came after the last chunk still halts the queue
        const haltQueue = record.pauseRequested
        record.pauseRequested = false
        record.cancelRequested = false
        if (record.totalBytes > 0) {
          record.transferredBytes = record.totalBytes
        } else {
          record.totalBytes = record.transferredBytes
        }
        record.progressPercent = 100
        record.status = 'completed'
        this.settle(record)
        this.notifyCompleted(record)
        return !haltQueue
      }

      case 'paused':
        record.status = 'paused'
        this.current = null
        this.currentAtPop = null
        this.queue.unshift(record)
        this.persist()
        this.notifyProgress(record)
        return false

      case 'cancelled':
        record.status = 'cancelled'
        record.transferredBytes = 0
        record.totalBytes = 0
        record.progressPercent = 0
        this.settle(record)
        this.notifyProgress(record)
        return true
    }
  }

  private settle(record: DownloadRecord) {
    this.current = null
    this.currentAtPop = null
    this.finished.push(record)
    this.persist()
  }

  private persist() {
    this.store.save(this.currentAtPop ? [this.currentAtPop, ...this.queue] : this.queue)
  }

  private notifyProgress(record: DownloadRecord) {
    const copy = snapshot(record)
    this.broadcast(this.progressListeners, listener => listener(copy))
  }

  private notifyCompleted(record: DownloadRecord) {
    const copy = snapshot(record)
    this.broadcast(this.completedListeners, listener => listener(copy))
  }

  private notifyError(record: DownloadRecord, message: string) {
    const copy = snapshot(record)
    this.broadcast(this.errorListeners, listener => listener(copy, message))
  }

  private broadcast<T>(listeners: Set<T>, deliver: (listener: T) => void) {
    if (listeners.size === 0) return
    const targets = [...listeners]
    setImmediate(() => {
      for (const listener of targets) {
        try {
          deliver(listener)
        } catch (err) {
          this.logger.error('Download listener threw:', err)
        }
      }
    })
  }
}
