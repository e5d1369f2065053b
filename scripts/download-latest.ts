#!/usr/bin/env tsx

/**
 * Download the latest CNPJ snapshot
 *
 * Finds the most recent YYYY-MM folder on the open data portal and downloads
 * its archives in parallel. Re-running resumes: archives whose local size
 * already matches the listing are skipped. Ctrl+C stops every transfer.
 *
 * Usage:
 *   npx tsx scripts/download-latest.ts [--output <dir>] [--workers <n>] [--url <snapshot-folder-url>]
 */

// Load environment variables (.env.local takes precedence, then .env)
import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import cliProgress from 'cli-progress'
import chalk from 'chalk'
import { getDownloadConfig, parsePositiveInt } from '../lib/config'
import { ValidationError, formatUserError, toError } from '../lib/errors'
import { findLatestSnapshotUrl } from '../lib/portal'
import { downloadArchives, type DownloadProgress } from '../lib/portal/downloader'

const USAGE =
  'Usage: npx tsx scripts/download-latest.ts [--output <dir>] [--workers <n>] [--url <snapshot-folder-url>]'

function parseArgs(argv: string[]): { outputDir?: string; workers?: number; url?: string } {
  const options: { outputDir?: string; workers?: number; url?: string } = {}

  for (let i = 0; i < argv.length; i += 2) {
    const [flag, value] = [argv[i], argv[i + 1]]
    if (value === undefined) {
      throw new ValidationError(`Missing value for ${flag}\n${USAGE}`)
    }

    switch (flag) {
      case '--output':
        options.outputDir = value
        break
      case '--workers':
        options.workers = parsePositiveInt('--workers', value, 5)
        break
      case '--url':
        options.url = value
        break
      default:
        throw new ValidationError(`Unknown argument: ${flag}\n${USAGE}`)
    }
  }

  return options
}

function formatMB(bytes: number): string {
  return (bytes / 1024 ** 2).toFixed(1)
}

async function downloadLatest() {
  console.log(chalk.bold.blue('🚀 CNPJ Snapshot Download\n'))

  const controller = new AbortController()
  process.on('SIGINT', () => {
    console.log(chalk.yellow('\n⚠️  Interrupt received! Stopping all downloads...'))
    controller.abort()
  })

  const bars = new cliProgress.MultiBar(
    {
      format: `${chalk.cyan('{bar}')} {percentage}% | {filename} | {value}/{total} MB`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
      clearOnComplete: false,
    },
    cliProgress.Presets.shades_classic
  )
  const active = new Map<string, cliProgress.SingleBar>()

  const onProgress = (progress: DownloadProgress): void => {
    const { filename, phase, bytes, totalBytes } = progress
    const payload = { filename }

    switch (phase) {
      case 'skipped':
        bars.log(`   ⏭  ${filename} already complete, skipped\n`)
        break
      case 'started':
        active.set(filename, bars.create(Number(formatMB(totalBytes)), 0, payload))
        break
      case 'progress':
        active.get(filename)?.update(Number(formatMB(bytes)), payload)
        break
      case 'done':
      case 'stopped':
      case 'failed': {
        const bar = active.get(filename)
        if (bar) {
          bar.stop()
          bars.remove(bar)
          active.delete(filename)
        }
        const icon = phase === 'done' ? '✓' : phase === 'stopped' ? '⏹' : '❌'
        bars.log(`   ${icon} ${filename} ${phase}${progress.error ? `: ${progress.error}` : ''}\n`)
        break
      }
    }
  }

  try {
    const cli = parseArgs(process.argv.slice(2))
    const downloadConfig = getDownloadConfig()
    const outputDir = cli.outputDir ?? downloadConfig.outputDir
    const maxWorkers = cli.workers ?? downloadConfig.maxWorkers

    console.log('1️⃣  Locating latest snapshot...')
    const snapshotUrl = cli.url ?? (await findLatestSnapshotUrl(downloadConfig.baseUrl))
    console.log(`   ✅ ${snapshotUrl}\n`)

    console.log(`2️⃣  Downloading archives to ${outputDir} (${maxWorkers} workers)...`)
    const report = await downloadArchives(snapshotUrl, outputDir, {
      maxWorkers,
      signal: controller.signal,
      onProgress,
    })
    bars.stop()

    const count = (outcome: string) => report.results.filter((r) => r.outcome === outcome).length
    console.log('\n📊 Download Statistics:\n')
    console.log(`   Listed:     ${report.listed}`)
    console.log(`   Downloaded: ${count('downloaded')}`)
    console.log(`   Skipped:    ${count('skipped')}`)
    console.log(`   Stopped:    ${count('stopped')}`)
    console.log(`   Failed:     ${count('failed')}`)
    console.log()

    if (count('failed') > 0 || count('stopped') > 0) {
      console.log(chalk.yellow('💡 Run the download again to resume incomplete archives.\n'))
      process.exit(1)
    }
  } catch (error) {
    bars.stop()
    const err = toError(error)
    console.error(chalk.red('\n❌ Download failed!\n'))
    console.error(`${formatUserError(err)}\n`)

    if (process.env.NODE_ENV === 'development') {
      console.error('Stack trace:')
      console.error(err.stack)
    }

    process.exit(1)
  }
}

void downloadLatest()
