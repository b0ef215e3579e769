/**
 * Resumable transfer engine
 *
 * Moves one record's bytes from its source URL to its destination file:
 * - Resume via HTTP Range from the size of an existing partial file
 * - Restart from zero when the server ignores the range request
 * - Pause and cancel observed between chunks, never mid-write
 * - Best-effort subtitle fetch once the main file is complete
 */

import * as fs from 'fs'
import * as path from 'path'
import * as http from 'http'
import * as https from 'https'
import { URL } from 'url'
import { pipeline } from 'stream/promises'
import type { FileHandle } from 'fs/promises'
import type { DownloaderConfig, DownloadRecord, Logger, TransferOutcome } from './types'

export const SUBTITLE_EXTENSIONS = ['.srt', '.vtt', '.ass', '.ssa', '.sub']

export class TransferError extends Error {
  readonly statusCode?: number

  constructor(message: string, statusCode?: number) {
    super(message)
    this.name = 'TransferError'
    this.statusCode = statusCode
  }
}

export type TransferSettings = Pick<
  DownloaderConfig,
  'requestTimeoutMs' | 'chunkSize' | 'maxRedirects' | 'userAgent' | 'logger'
>

export interface TransferHooks {
  onProgress: (record: DownloadRecord) => void
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function toTransferError(err: unknown): TransferError {
  return err instanceof TransferError ? err : new TransferError(errorMessage(err))
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

function parseByteCount(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null
  return Number.parseInt(value, 10)
}

/**
 * Total resource size from a Content-Range header ("bytes 0-99/1000",
 * "bytes *\/1000"). Null when absent or when the total is "*".
 */
export function parseContentRangeTotal(header: string | undefined): number | null {
  if (!header || !header.includes('/')) return null
  return parseByteCount(header.slice(header.lastIndexOf('/') + 1))
}

/**
 * Size of the whole resource as far as the response tells. Content-Range wins;
 * otherwise Content-Length counts from the resume offset. 0 means unknown.
 */
export function resolveTotalSize(headers: http.IncomingHttpHeaders, startOffset: number): number {
  const contentRange = firstHeader(headers['content-range'])
  if (contentRange && contentRange.includes('/')) {
    return parseContentRangeTotal(contentRange) ?? 0
  }
  const length = parseByteCount(firstHeader(headers['content-length']))
  if (length === null) return 0
  return startOffset + length
}

function urlExtension(url: string): string {
  try {
    return path.extname(new URL(url).pathname).toLowerCase()
  } catch {
    return ''
  }
}

export function subtitlePathFor(destinationPath: string, subtitleUrl: string): string {
  const candidate = urlExtension(subtitleUrl)
  const ext = SUBTITLE_EXTENSIONS.includes(candidate) ? candidate : '.srt'
  const parsed = path.parse(destinationPath)
  return path.join(parsed.dir, parsed.name + ext)
}

export class TransferEngine {
  private settings: TransferSettings
  private logger: Logger

  constructor(settings: TransferSettings) {
    this.settings = settings
    this.logger = settings.logger
  }

  /**
   * Open a GET request and resolve with the response once headers arrive,
   * following redirects. The request carries a socket idle timeout for its
   * whole lifetime, body included.
   */
  private openStream(
    url: string,
    headers: Record<string, string>,
    redirectsLeft: number = this.settings.maxRedirects,
  ): Promise<http.IncomingMessage> {
    return new Promise((resolve, reject) => {
      let urlObj: URL
      try {
        urlObj = new URL(url)
      } catch {
        reject(new TransferError(`Invalid URL: ${url}`))
        return
      }
      if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
        reject(new TransferError(`Unsupported protocol: ${urlObj.protocol}`))
        return
      }

      const client = urlObj.protocol === 'https:' ? https : http
      const options: http.RequestOptions = {
        method: 'GET',
        headers: {
          'User-Agent': this.settings.userAgent,
          ...headers,
        },
        timeout: this.settings.requestTimeoutMs,
      }

      let response: http.IncomingMessage | null = null
      const req = client.request(urlObj, options, (res) => {
        response = res
        const status = res.statusCode ?? 0
        if (status >= 300 && status < 400 && res.headers.location) {
          res.resume()
          if (redirectsLeft <= 0) {
            reject(new TransferError(`Too many redirects for ${url}`, status))
            return
          }
          const redirectUrl = new URL(res.headers.location, url).toString()
          this.openStream(redirectUrl, headers, redirectsLeft - 1).then(resolve, reject)
          return
        }
        resolve(res)
      })

      req.on('error', (err) => reject(toTransferError(err)))
      req.on('timeout', () => {
        const timeout = new TransferError(`Connection timed out after ${this.settings.requestTimeoutMs} ms`)
        // fail a body that is already being read with the same error
        response?.destroy(timeout)
        req.destroy(timeout)
      })
      req.end()
    })
  }

  private existingSize(filePath: string): number {
    try {
      return fs.statSync(filePath).size
    } catch {
      return 0
    }
  }

  private removeFile(filePath: string, reason: string) {
    try {
      fs.rmSync(filePath, { force: true })
    } catch (err) {
      this.logger.warn(`Failed to delete ${reason} file ${filePath}:`, errorMessage(err))
    }
  }

  private updatePercent(record: DownloadRecord) {
    if (record.totalBytes > 0) {
      record.progressPercent = (record.transferredBytes / record.totalBytes) * 100
    }
  }

  /**
   * Run one transfer for the record, mutating its byte counters in place.
   * Rejects with TransferError when the transfer fails; the partial file is
   * left on disk in that case.
   */
  async transfer(record: DownloadRecord, hooks: TransferHooks): Promise<TransferOutcome> {
    const startOffset = this.existingSize(record.destinationPath)
    const headers: Record<string, string> = {}

    if (startOffset > 0) {
      headers['Range'] = `bytes=${startOffset}-`
      record.transferredBytes = startOffset
    } else {
      record.transferredBytes = 0
      record.progressPercent = 0
    }

    const res = await this.openStream(record.sourceUrl, headers)
    try {
      return await this.consume(record, res, startOffset, hooks)
    } finally {
      res.destroy()
    }
  }

  private async consume(
    record: DownloadRecord,
    res: http.IncomingMessage,
    startOffset: number,
    hooks: TransferHooks,
  ): Promise<TransferOutcome> {
    const status = res.statusCode ?? 0

    if (startOffset > 0 && status === 416) {
      const total = parseContentRangeTotal(firstHeader(res.headers['content-range']))
      if (total !== startOffset) throw new TransferError('HTTP 416', status)
      // the partial file already holds the whole resource
      record.totalBytes = total
      this.updatePercent(record)
      return this.complete(record)
    }

    if (status < 200 || status >= 300) {
      throw new TransferError(`HTTP ${status}`, status)
    }

    const resumed = startOffset > 0 && status === 206
    if (startOffset > 0 && !resumed) {
      this.logger.warn(`Server ignored range request for ${record.id}, restarting from zero`)
      record.transferredBytes = 0
      record.progressPercent = 0
    }

    const totalSize = resolveTotalSize(res.headers, resumed ? startOffset : 0)
    if (totalSize > 0) record.totalBytes = totalSize
    this.updatePercent(record)

    let file: FileHandle
    try {
      await fs.promises.mkdir(path.dirname(record.destinationPath), { recursive: true })
      // 'w' truncates whatever a server that ignored the range left behind
      file = await fs.promises.open(record.destinationPath, resumed ? 'a' : 'w')
    } catch (err) {
      this.logger.error(`Failed to open ${record.destinationPath}:`, errorMessage(err))
      throw new TransferError(`Cannot write ${record.destinationPath}: ${errorMessage(err)}`)
    }

    let outcome: TransferOutcome | null = null
    const { chunkSize } = this.settings
    try {
      read: for await (const chunk of res) {
        if (!Buffer.isBuffer(chunk)) continue

        for (let offset = 0; offset < chunk.length; offset += chunkSize) {
          if (record.cancelRequested) {
            outcome = 'cancelled'
            break read
          }
          if (record.pauseRequested) {
            outcome = 'paused'
            break read
          }

          const piece = chunk.subarray(offset, offset + chunkSize)
          await file.write(piece)
          record.transferredBytes += piece.length
          this.updatePercent(record)
          hooks.onProgress(record)
        }
      }
    } catch (err) {
      throw toTransferError(err)
    } finally {
      await file.close()
    }

    if (outcome === null && record.cancelRequested) outcome = 'cancelled'

    if (outcome === 'cancelled') {
      this.removeFile(record.destinationPath, 'cancelled')
      record.transferredBytes = 0
      record.totalBytes = 0
      record.progressPercent = 0
      record.cancelRequested = false
      return 'cancelled'
    }

    if (outcome === 'paused') {
      record.pauseRequested = false
      return 'paused'
    }

    return this.complete(record)
  }

  private async complete(record: DownloadRecord): Promise<TransferOutcome> {
    if (record.subtitleUrl) {
      await this.fetchSubtitle(record, record.subtitleUrl)
    }
    return 'completed'
  }

  /**
   * Single-shot subtitle download next to the media file. Never fails the
   * record.
   */
  private async fetchSubtitle(record: DownloadRecord, subtitleUrl: string) {
    const target = subtitlePathFor(record.destinationPath, subtitleUrl)
    try {
      const res = await this.openStream(subtitleUrl, {})
      const status = res.statusCode ?? 0
      if (status < 200 || status >= 300) {
        res.resume()
        throw new TransferError(`HTTP ${status}`, status)
      }
      await pipeline(res, fs.createWriteStream(target))
    } catch (err) {
      this.logger.warn(`Failed to fetch subtitles for ${record.id}:`, errorMessage(err))
      this.removeFile(target, 'incomplete subtitle')
    }
  }
}
