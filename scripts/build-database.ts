#!/usr/bin/env tsx

/**
 * Build the CNPJ database from downloaded snapshot archives
 *
 * Expands the archives, loads code tables and entity files, derives the
 * partner table, creates indexes and records the snapshot reference.
 *
 * Usage:
 *   npx tsx scripts/build-database.ts [--input <dir>] [--output <dir>] [--db-name <file>]
 *                                     [--keep-sources] [--allow-count-mismatch] [--yes]
 *
 * Example:
 *   npx tsx scripts/build-database.ts --input ./output --output ./data
 */

// Load environment variables (.env.local takes precedence, then .env)
import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import { createInterface } from 'readline/promises'
import chalk from 'chalk'
import { getBuildConfig, type BuildConfig } from '../lib/config'
import { ValidationError, formatUserError, logError, toError } from '../lib/errors'
import { DatabaseBuilder } from '../lib/import/builder'
import type { BuildProgress } from '../lib/types/build'

const USAGE =
  'Usage: npx tsx scripts/build-database.ts [--input <dir>] [--output <dir>] [--db-name <file>] [--keep-sources] [--allow-count-mismatch] [--yes]'

interface CliOptions {
  overrides: Partial<BuildConfig>
  assumeYes: boolean
}

/**
 * Parse command line flags on top of the environment configuration
 */
function parseArgs(argv: string[]): CliOptions {
  const overrides: Partial<BuildConfig> = {}
  let assumeYes = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const value = (): string => {
      const next = argv[++i]
      if (!next || next.startsWith('--')) {
        throw new ValidationError(`Missing value for ${arg}\n${USAGE}`)
      }
      return next
    }

    switch (arg) {
      case '--input':
        overrides.inputDir = value()
        break
      case '--output':
        overrides.outputDir = value()
        break
      case '--db-name':
        overrides.dbName = value()
        break
      case '--keep-sources':
        overrides.deleteSources = false
        break
      case '--allow-count-mismatch':
        overrides.strictArchiveCount = false
        break
      case '--yes':
        assumeYes = true
        break
      default:
        throw new ValidationError(`Unknown argument: ${arg}\n${USAGE}`)
    }
  }

  return { overrides, assumeYes }
}

/**
 * Ask the operator whether to continue with an unexpected archive count
 */
async function confirmArchiveCount(found: number, expected: number): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.log(chalk.yellow(`   ⚠️  Found ${found} archives, expected ${expected}. Continuing.`))
    return true
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await rl.question(
      chalk.yellow(`   ⚠️  Found ${found} archives, expected ${expected}. Proceed anyway? (y/n) `)
    )
    return answer.trim().toLowerCase() === 'y'
  } finally {
    rl.close()
  }
}

const STAGE_TITLES: Record<BuildProgress['stage'], string> = {
  prepare: '1️⃣  Checking output...',
  expand: '2️⃣  Expanding archives...',
  reference: '3️⃣  Reading snapshot reference...',
  'code-tables': '4️⃣  Loading code tables...',
  'create-tables': '5️⃣  Creating entity tables...',
  'bulk-load': '6️⃣  Loading entity files...',
  adjust: '7️⃣  Adjusting tables and creating indexes...',
  metadata: '8️⃣  Writing reference metadata...',
  complete: '✅ Build complete',
}

/**
 * Show progress indicator
 */
function showProgress(progress: BuildProgress): void {
  const { stage, phase, table, file, rows, label } = progress
  const target = table ? table.padEnd(20) : ''

  switch (phase) {
    case 'started':
      console.log(chalk.bold(STAGE_TITLES[stage]))
      break
    case 'loading':
      console.log(`   📥 ${target} ${chalk.gray(file ?? '')}`)
      break
    case 'loaded':
      console.log(`   ✓ ${target} ${chalk.cyan((rows ?? 0).toLocaleString())} ${stage === 'expand' ? 'files' : 'rows'}`)
      break
    case 'skipped':
      console.log(chalk.yellow(`   ℹ️  ${target} no file matching ${file ?? 'pattern'}, skipped`))
      break
    case 'deleted':
      console.log(chalk.gray(`   🗑  deleted ${file}`))
      break
    case 'step':
      console.log(`   ⚙️  ${label ?? table}`)
      break
    case 'finished':
      if (stage === 'reference') {
        console.log(chalk.bold(STAGE_TITLES.reference))
        console.log(`   📅 Reference date: ${label}`)
      } else if (stage === 'metadata') {
        console.log(chalk.bold(STAGE_TITLES.metadata))
        console.log(`   🔢 ${(rows ?? 0).toLocaleString()} establishments, reference ${label}`)
      } else if (stage === 'complete') {
        console.log(chalk.bold.green(`\n${STAGE_TITLES.complete}`))
      }
      break
  }
}

/**
 * Main build function
 */
async function buildDatabase() {
  console.log(chalk.bold.blue('🚀 CNPJ Database Build\n'))

  try {
    const { overrides, assumeYes } = parseArgs(process.argv.slice(2))
    const buildConfig = { ...getBuildConfig(), ...overrides }

    console.log(`📂 Input:  ${buildConfig.inputDir}`)
    console.log(`📂 Output: ${buildConfig.outputDir}\n`)

    const builder = new DatabaseBuilder({
      ...buildConfig,
      confirmArchiveCount: assumeYes ? undefined : confirmArchiveCount,
      onProgress: showProgress,
    })

    const summary = await builder.build()

    console.log('\n━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━')
    console.log(`✨ Database created at ${summary.databasePath}`)
    console.log('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n')

    console.log('📊 Table Statistics:\n')
    for (const { table, rows } of summary.tables) {
      console.log(`   ${table.padEnd(20)} ${rows.toLocaleString().padStart(14)} rows`)
    }

    console.log(`\n   Indexes:        ${summary.indexes.length}`)
    console.log(`   Reference date: ${summary.reference}`)
    console.log(`   Total duration: ${(summary.durationMs / 1000).toFixed(2)}s`)
    console.log()
  } catch (error) {
    const err = toError(error)
    console.error(chalk.red('\n❌ Build failed!\n'))

    if (err instanceof ValidationError) {
      console.error(`${formatUserError(err)}\n`)
    } else {
      console.error(`Error: ${formatUserError(err)}\n`)
    }

    if (process.env.NODE_ENV === 'development') {
      logError(err, { argv: process.argv.slice(2) })
    }

    process.exit(1)
  }
}

// Run the build
void buildDatabase()
