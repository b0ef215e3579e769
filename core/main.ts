/**
 * iptv-dl entry point
 */

import { resolveConfig } from './config'
import { runCli } from './cli'

async function main(): Promise<number> {
  const config = resolveConfig()
  const controller = new AbortController()
  // Ctrl+C pauses the active transfer; the queue is persisted before exit
  process.once('SIGINT', () => controller.abort())
  return runCli(process.argv.slice(2), { config, signal: controller.signal })
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error('iptv-dl failed:', err)
    process.exitCode = 1
  })
