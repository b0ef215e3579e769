/**
 * Downloader configuration
 *
 * Defaults are overlaid by IPTV_DL_* environment variables, then by explicit
 * overrides. The resulting value is handed to the queue manager; nothing here
 * is read again after construction.
 */

import * as os from 'os'
import * as path from 'path'
import { z } from 'zod'
import type { DownloaderConfig } from './types'

export const MIN_CHUNK_SIZE = 1024
export const MAX_CHUNK_SIZE = 1024 * 1024

const envSchema = z.object({
  IPTV_DL_DATA_DIR: z.string().min(1).optional(),
  IPTV_DL_DOWNLOAD_DIR: z.string().min(1).optional(),
  IPTV_DL_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  IPTV_DL_CHUNK_SIZE: z.coerce.number().int().min(MIN_CHUNK_SIZE).max(MAX_CHUNK_SIZE).optional(),
})

export function defaultConfig(): DownloaderConfig {
  return {
    dataDir: path.join(os.homedir(), '.iptv-downloader'),
    downloadDir: path.join(os.homedir(), 'Downloads', 'IPTV'),
    requestTimeoutMs: 30000,
    chunkSize: 64 * 1024,
    maxRedirects: 5,
    userAgent: 'iptv-downloader/1.0',
    logger: console,
  }
}

export function resolveConfig(
  overrides: Partial<DownloaderConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): DownloaderConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid downloader configuration: ${issues}`)
  }

  const fromEnv = parsed.data
  const config: DownloaderConfig = {
    ...defaultConfig(),
    ...(fromEnv.IPTV_DL_DATA_DIR ? { dataDir: fromEnv.IPTV_DL_DATA_DIR } : {}),
    ...(fromEnv.IPTV_DL_DOWNLOAD_DIR ? { downloadDir: fromEnv.IPTV_DL_DOWNLOAD_DIR } : {}),
    ...(fromEnv.IPTV_DL_TIMEOUT_MS ? { requestTimeoutMs: fromEnv.IPTV_DL_TIMEOUT_MS } : {}),
    ...(fromEnv.IPTV_DL_CHUNK_SIZE ? { chunkSize: fromEnv.IPTV_DL_CHUNK_SIZE } : {}),
    ...overrides,
  }

  if (config.chunkSize < MIN_CHUNK_SIZE || config.chunkSize > MAX_CHUNK_SIZE) {
    throw new Error(`Invalid downloader configuration: chunkSize must be between ${MIN_CHUNK_SIZE} and ${MAX_CHUNK_SIZE} bytes`)
  }
  if (config.requestTimeoutMs <= 0) {
    throw new Error('Invalid downloader configuration: requestTimeoutMs must be positive')
  }

  return config
}
