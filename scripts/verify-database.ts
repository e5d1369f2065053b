#!/usr/bin/env tsx

/**
 * Print the state of a built database: row counts, indexes and reference rows
 *
 * Usage:
 *   npx tsx scripts/verify-database.ts [path-to-database]
 */

import { config } from 'dotenv'
config({ path: ['.env.local', '.env'] })

import type { DuckDBConnection } from '@duckdb/node-api'
import { getBuildConfig, getDatabasePath } from '../lib/config'
import {
  closeDatabase,
  executeQuery,
  getTableCount,
  listIndexes,
  listTables,
  openDatabase,
  tableExists,
} from '../lib/duckdb'
import { formatUserError, toError } from '../lib/errors'
import { REFERENCE_TABLE } from '../lib/import/metadata'
import { pathExists } from '../lib/utils/files'

async function verify() {
  const dbPath = process.argv[2] ?? getDatabasePath(getBuildConfig())

  if (!(await pathExists(dbPath))) {
    console.error(`❌ Error: Database does not exist: ${dbPath}`)
    process.exit(1)
  }

  let db: DuckDBConnection | null = null

  try {
    db = await openDatabase(dbPath, true)

    console.log('📊 Database State Verification\n')
    console.log('='.repeat(60))
    console.log(`Database: ${dbPath}`)
    console.log('='.repeat(60))

    for (const table of await listTables(db)) {
      const count = (await getTableCount(db, table)).toLocaleString()
      console.log(`${table.padEnd(24)} ${count.padStart(14)}`)
    }

    console.log('\n' + '='.repeat(60))
    console.log('Indexes')
    console.log('='.repeat(60))
    for (const index of await listIndexes(db)) {
      console.log(`  • ${index}`)
    }

    console.log('\n' + '='.repeat(60))
    console.log('Reference')
    console.log('='.repeat(60))
    if (!(await tableExists(db, REFERENCE_TABLE))) {
      console.log(`⚠️  No ${REFERENCE_TABLE} table: the build did not finish\n`)
      process.exitCode = 1
      return
    }
    const reference = await executeQuery(db, `SELECT referencia, valor FROM ${REFERENCE_TABLE}`)
    for (const row of reference) {
      console.log(`${String(row.referencia).padEnd(24)} ${String(row.valor)}`)
    }
    console.log()
  } catch (error) {
    console.error(`❌ ${formatUserError(toError(error))}`)
    process.exitCode = 1
  } finally {
    if (db) {
      closeDatabase(db)
    }
  }
}

void verify()
