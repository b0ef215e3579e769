/**
 * Builders that turn catalog items into queue requests
 */

import * as path from 'path'
import type { DownloadKind, NewDownloadRequest } from './types'

export const MEDIA_CONTAINERS = ['mp4', 'mkv', 'ts', 'm3u8'] as const
export type MediaContainer = typeof MEDIA_CONTAINERS[number]

export interface AccountProfile {
  server: string
  username: string
  password: string
  movieContainer?: string
  seriesContainer?: string
}

export interface VodItem {
  id: string
  name: string
  container?: string
  subtitleUrl?: string
}

export interface EpisodeItem {
  id: string
  title: string
  seriesTitle: string
  container?: string
  subtitleUrl?: string
}

function isMediaContainer(value: string | undefined): value is MediaContainer {
  return MEDIA_CONTAINERS.some(c => c === value)
}

function pickContainer(itemContainer: string | undefined, profileDefault: string | undefined): MediaContainer {
  const candidate = itemContainer || profileDefault
  return isMediaContainer(candidate) ? candidate : 'mp4'
}

export function normalizeServer(server: string): string {
  const withScheme = /^https?:\/\//i.test(server) ? server : 'http://' + server
  return withScheme.replace(/\/+$/, '')
}

function streamUrl(profile: AccountProfile, section: 'movie' | 'series', id: string, ext: MediaContainer): string {
  const user = encodeURIComponent(profile.username)
  const pass = encodeURIComponent(profile.password)
  return `${normalizeServer(profile.server)}/${section}/${user}/${pass}/${encodeURIComponent(id)}.${ext}`
}

export function vodUrl(profile: AccountProfile, vodId: string, container?: string): string {
  return streamUrl(profile, 'movie', vodId, pickContainer(container, profile.movieContainer))
}

export function episodeUrl(profile: AccountProfile, episodeId: string, container?: string): string {
  return streamUrl(profile, 'series', episodeId, pickContainer(container, profile.seriesContainer))
}

export function buildDownloadId(kind: DownloadKind, sourceId: string, now: Date = new Date()): string {
  return `${kind}_${sourceId}_${Math.floor(now.getTime() / 1000)}`
}

/**
 * Make a display title usable as a single path segment.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '')
    .replace(/[. ]+$/, '')
  return cleaned || 'download'
}

export function createVodDownload(
  profile: AccountProfile,
  vod: VodItem,
  downloadDir: string,
  now: Date = new Date(),
): NewDownloadRequest {
  const ext = pickContainer(vod.container, profile.movieContainer)
  return {
    id: buildDownloadId('vod', vod.id, now),
    kind: 'vod',
    title: vod.name,
    sourceUrl: vodUrl(profile, vod.id, vod.container),
    destinationPath: path.join(downloadDir, 'VOD', `${sanitizeFileName(vod.name)}.${ext}`),
    ...(vod.subtitleUrl ? { subtitleUrl: vod.subtitleUrl } : {}),
  }
}

export function createEpisodeDownload(
  profile: AccountProfile,
  episode: EpisodeItem,
  downloadDir: string,
  now: Date = new Date(),
): NewDownloadRequest {
  const ext = pickContainer(episode.container, profile.seriesContainer)
  return {
    id: buildDownloadId('episode', episode.id, now),
    kind: 'episode',
    title: episode.title,
    sourceUrl: episodeUrl(profile, episode.id, episode.container),
    destinationPath: path.join(
      downloadDir,
      'Series',
      sanitizeFileName(episode.seriesTitle),
      `${sanitizeFileName(episode.title)}.${ext}`,
    ),
    ...(episode.subtitleUrl ? { subtitleUrl: episode.subtitleUrl } : {}),
  }
}
