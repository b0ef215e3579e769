/**
 * Command-line front end for the download queue
 */

import * as path from 'path'
import { URL } from 'url'
import { parseArgs } from 'util'
import { DownloadQueueManager } from './queue-manager'
import { buildDownloadId, sanitizeFileName } from './download-request'
import { formatRecordLine } from '../src/utils/format'
import { createDownloadStore, connectDownloadStore } from '../src/store/downloadStore'
import type { DownloaderConfig, DownloadKind, DownloadStatus } from './types'

export const USAGE = [
  'Usage: iptv-dl <command>',
  '',
  '  add <url> [--title <title>] [--out <path>] [--kind vod|episode|live-clip] [--subtitle <url>]',
  '  resume',
  '  list',
  '  cancel <id>',
].join('\n')

const KINDS: readonly DownloadKind[] = ['vod', 'episode', 'live-clip']

export interface CliOptions {
  config: DownloaderConfig
  write?: (line: string) => void
  signal?: AbortSignal
  now?: () => Date
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      title: { type: 'string' },
      out: { type: 'string' },
      kind: { type: 'string' },
      subtitle: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })
}

type CommandLine = ReturnType<typeof parseCommandLine>

function isDownloadKind(value: string): value is DownloadKind {
  return KINDS.some(k => k === value)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Print a status line whenever a record changes status or crosses another
 * 10% of progress.
 */
function attachReporter(manager: DownloadQueueManager, write: (line: string) => void) {
  const lastStatus = new Map<string, DownloadStatus>()
  const lastDecile = new Map<string, number>()
  let failures = 0

  const offProgress = manager.onProgress((record) => {
    const decile = Math.floor(record.progressPercent / 10)
    const sameStatus = lastStatus.get(record.id) === record.status
    if (sameStatus && decile <= (lastDecile.get(record.id) ?? 0)) return
    lastStatus.set(record.id, record.status)
    lastDecile.set(record.id, decile)
    write(formatRecordLine(record))
  })
  const offCompleted = manager.onCompleted((record) => {
    write(formatRecordLine(record))
  })
  const offError = manager.onError((record, message) => {
    failures += 1
    write(`${formatRecordLine(record)}: ${message}`)
  })

  return {
    failures: () => failures,
    detach: () => {
      offProgress()
      offCompleted()
      offError()
    },
  }
}

async function drain(
  manager: DownloadQueueManager,
  reporter: ReturnType<typeof attachReporter>,
  write: (line: string) => void,
): Promise<number> {
  await manager.whenIdle()
  reporter.detach()

  // the worker only stops early on a pause, which may have landed after a record completed
  const left = manager.getDownloads()
  if (left.length > 0) {
    write(`Paused with ${left.length} download(s) queued; run "iptv-dl resume" to continue`)
  }
  return reporter.failures() > 0 ? 1 : 0
}

export async function runCli(argv: string[], options: CliOptions): Promise<number> {
  const write = options.write ?? ((line: string) => { process.stdout.write(line + '\n') })
  const now = options.now ?? (() => new Date())
  const { config } = options

  let commandLine: CommandLine
  try {
    commandLine = parseCommandLine(argv)
  } catch (err) {
    write(errorMessage(err))
    write(USAGE)
    return 2
  }

  const { values, positionals } = commandLine
  const [command, ...rest] = positionals
  if (values.help || !command) {
    write(USAGE)
    return command || values.help ? 0 : 2
  }

  const manager = new DownloadQueueManager(config)
  // keeps the presentation-side view of the queue current while the CLI runs
  const store = createDownloadStore()
  const disconnect = connectDownloadStore(store, manager)
  options.signal?.addEventListener('abort', () => manager.pauseActive(), { once: true })

  try {
    switch (command) {
      case 'add': {
        const source = rest[0]
        if (!source) {
          write(USAGE)
          return 2
        }
        let sourceUrl: URL
        try {
          sourceUrl = new URL(source)
        } catch {
          write(`Invalid URL: ${source}`)
          return 2
        }
        const kind = values.kind ?? 'vod'
        if (!isDownloadKind(kind)) {
          write(`Unknown kind: ${kind}`)
          return 2
        }

        const ext = path.extname(sourceUrl.pathname) || '.mp4'
        const sourceId = path.basename(sourceUrl.pathname, ext) || 'download'
        const title = values.title ?? sourceId
        const destinationPath = values.out
          ? path.resolve(values.out)
          : path.join(config.downloadDir, sanitizeFileName(title) + ext)

        const reporter = attachReporter(manager, write)
        try {
          manager.enqueue({
            id: buildDownloadId(kind, sourceId, now()),
            kind,
            title,
            sourceUrl: sourceUrl.toString(),
            destinationPath,
            ...(values.subtitle ? { subtitleUrl: values.subtitle } : {}),
          })
        } catch (err) {
          reporter.detach()
          write(errorMessage(err))
          return 2
        }
        return await drain(manager, reporter, write)
      }

      case 'resume': {
        if (manager.getDownloads().length === 0) {
          write('Queue is empty')
          return 0
        }
        const reporter = attachReporter(manager, write)
        manager.resumeIfIdle()
        return await drain(manager, reporter, write)
      }

      case 'list': {
        const downloads = store.getState().downloads
        if (downloads.length === 0) {
          write('Queue is empty')
          return 0
        }
        for (const record of downloads) {
          write(`${record.id}  ${formatRecordLine(record)}`)
        }
        return 0
      }

      case 'cancel': {
        const id = rest[0]
        if (!id) {
          write(USAGE)
          return 2
        }
        if (!manager.getDownloads().some(r => r.id === id)) {
          write(`No queued download with id ${id}`)
          return 1
        }
        manager.cancel(id)
        write(`Cancelled ${id}`)
        return 0
      }

      default:
        write(`Unknown command: ${command}`)
        write(USAGE)
        return 2
    }
  } finally {
    disconnect()
  }
}
