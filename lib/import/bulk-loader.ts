/**
 * Bulk table loading
 *
 * Streams each large entity file into its table in fixed-size batches, so
 * memory use depends on the batch size and not on the file size. Each file is
 * loaded inside its own transaction; the source file is only deleted after
 * that transaction commits.
 */

import { createReadStream, promises as fs } from 'fs'
import { parse } from 'csv-parse'
import type { DuckDBConnection } from '@duckdb/node-api'
import { executeStatement } from '@/lib/duckdb'
import { CSVParsingError, DatabaseError, toError } from '@/lib/errors'
import {
  ENTITY_LOAD_ORDER,
  createTableSql,
  insertRowsSql,
  type EntitySchema,
  type SchemaRegistry,
} from '@/lib/sql'
import { findFiles } from '@/lib/utils/files'
import { SOURCE_ENCODING, isStringRow, unwrapQuotes } from './code-tables'
import type { LoadStats, ProgressCallback } from '@/lib/types/build'

export interface BulkLoadOptions {
  deleteSources: boolean
  batchSize: number
  onProgress?: ProgressCallback
}

/**
 * Create the four entity tables, every column as text
 */
export async function createEntityTables(
  connection: DuckDBConnection,
  registry: SchemaRegistry,
  onProgress?: ProgressCallback
): Promise<void> {
  for (const entity of ENTITY_LOAD_ORDER) {
    const { table, columns } = registry[entity]
    await executeStatement(connection, createTableSql(table, columns))
    onProgress?.({ stage: 'create-tables', phase: 'step', table })
  }
}

/**
 * Stream one file into its table
 *
 * Fields are split on ';' with blank fields kept as empty strings, and a
 * quoted field holding bare quotes loses its wrapping pair. A record
 * whose field count differs from the schema aborts the load.
 *
 * @returns Number of rows inserted
 */
export async function loadEntityFile(
  connection: DuckDBConnection,
  schema: EntitySchema,
  filePath: string,
  batchSize: number
): Promise<number> {
  const source = createReadStream(filePath, { encoding: SOURCE_ENCODING })
  const parser = parse({
    delimiter: ';',
    relax_quotes: true,
    skip_empty_lines: true,
  })
  source.on('error', (error) => parser.destroy(error))
  source.pipe(parser)

  let batch: string[][] = []
  let rowsInserted = 0

  const flush = async (): Promise<void> => {
    if (batch.length === 0) return
    await executeStatement(connection, insertRowsSql(schema.table, schema.columns, batch))
    rowsInserted += batch.length
    batch = []
  }

  await executeStatement(connection, 'BEGIN TRANSACTION')

  try {
    for await (const record of parser) {
      if (!isStringRow(record) || record.length !== schema.columns.length) {
        const fieldCount = Array.isArray(record) ? record.length : 0
        throw new CSVParsingError(
          `Expected ${schema.columns.length} fields for ${schema.table}, got ${fieldCount}`,
          filePath,
          parser.info.lines
        )
      }

      batch.push(record.map(unwrapQuotes))
      if (batch.length >= batchSize) {
        await flush()
      }
    }
    await flush()

    await executeStatement(connection, 'COMMIT')
    return rowsInserted
  } catch (error) {
    source.destroy()
    await executeStatement(connection, 'ROLLBACK')

    if (error instanceof CSVParsingError || error instanceof DatabaseError) {
      throw error
    }
    const err = toError(error)
    throw new CSVParsingError(err.message, filePath, parser.info.lines)
  }
}

/**
 * Load every file of every entity, in registry load order
 */
export async function loadEntityTables(
  connection: DuckDBConnection,
  dir: string,
  registry: SchemaRegistry,
  options: BulkLoadOptions
): Promise<LoadStats[]> {
  const { deleteSources, batchSize, onProgress } = options
  const stats: LoadStats[] = []

  for (const entity of ENTITY_LOAD_ORDER) {
    const schema = registry[entity]
    const files = await findFiles(dir, (name) => schema.filePattern.test(name))

    if (files.length === 0) {
      onProgress?.({ stage: 'bulk-load', phase: 'skipped', table: schema.table })
      continue
    }

    for (const file of files) {
      const startTime = Date.now()
      onProgress?.({ stage: 'bulk-load', phase: 'loading', table: schema.table, file })

      const rowsInserted = await loadEntityFile(connection, schema, file, batchSize)
      stats.push({ table: schema.table, file, rowsInserted, durationMs: Date.now() - startTime })
      onProgress?.({ stage: 'bulk-load', phase: 'loaded', table: schema.table, file, rows: rowsInserted })

      if (deleteSources) {
        await fs.unlink(file)
        onProgress?.({ stage: 'bulk-load', phase: 'deleted', table: schema.table, file })
      }
    }
  }

  return stats
}
