/**
 * Shared types for the download core
 */

export type DownloadStatus =
  | 'pending'
  | 'active'
  | 'paused'
  | 'completed'
  | 'cancelled'
  | 'failed'

export type TerminalStatus = Extract<DownloadStatus, 'completed' | 'cancelled' | 'failed'>

export type DownloadKind =
  | 'vod'
  | 'episode'
  | 'live-clip'

export interface DownloadRecord {
  id: string
  kind: DownloadKind
  title: string
  sourceUrl: string
  destinationPath: string
  status: DownloadStatus
  progressPercent: number
  totalBytes: number
  transferredBytes: number
  subtitleUrl?: string
  pauseRequested: boolean
  cancelRequested: boolean
}

export interface NewDownloadRequest {
  id: string
  kind: DownloadKind
  title: string
  sourceUrl: string
  destinationPath: string
  subtitleUrl?: string
}

export type TransferOutcome = 'completed' | 'paused' | 'cancelled'

export interface Logger {
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export interface DownloaderConfig {
  dataDir: string
  downloadDir: string
  requestTimeoutMs: number
  chunkSize: number
  maxRedirects: number
  userAgent: string
  logger: Logger
}

export type ProgressListener = (record: DownloadRecord) => void
export type CompletedListener = (record: DownloadRecord) => void
export type ErrorListener = (record: DownloadRecord, message: string) => void

export function isTerminal(status: DownloadStatus): status is TerminalStatus {
  return status === 'completed' || status === 'cancelled' || status === 'failed'
}
