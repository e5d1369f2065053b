/**
 * Code table loading
 *
 * The lookup files are small, so each one is read whole, parsed in memory
 * and written to its own indexed table.
 */

import { promises as fs } from 'fs'
import { parse } from 'csv-parse/sync'
import type { DuckDBConnection } from '@duckdb/node-api'
import { executeStatement, quoteIdentifier } from '@/lib/duckdb'
import { CSVParsingError } from '@/lib/errors'
import {
  CODE_TABLES,
  CODE_TABLE_COLUMNS,
  createTableSql,
  insertRowsSql,
  type CodeTableSchema,
} from '@/lib/sql'
import { findFiles } from '@/lib/utils/files'
import type { ProgressCallback } from '@/lib/types/build'

/** Source files are published in ISO-8859-1 */
export const SOURCE_ENCODING = 'latin1'

export interface CodeTableOptions {
  deleteSources: boolean
  batchSize: number
  onProgress?: ProgressCallback
}

export interface CodeTableResult {
  table: string
  /** Source file, or null when none was found */
  file: string | null
  rows: number
}

export function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string')
}

/**
 * Drop the wrapping quote pair a field keeps when it holds bare quotes,
 * e.g. `"ACME "X" LTDA"` -> `ACME "X" LTDA`
 */
export function unwrapQuotes(field: string): string {
  return field.length >= 2 && field.startsWith('"') && field.endsWith('"') ? field.slice(1, -1) : field
}

interface ParsedRecord {
  record: unknown
  info: { lines: number }
}

function isParsedRecord(value: unknown): value is ParsedRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'record' in value &&
    'info' in value &&
    typeof value.info === 'object' &&
    value.info !== null &&
    'lines' in value.info &&
    typeof value.info.lines === 'number'
  )
}

/**
 * Parse a headerless two-column code file
 */
export function parseCodeFile(content: string, filename: string): string[][] {
  const records: unknown = parse(content, {
    delimiter: ';',
    info: true,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true,
  })

  if (!Array.isArray(records)) {
    throw new CSVParsingError('Parser returned no records', filename)
  }

  return records.map((parsed: unknown) => {
    if (!isParsedRecord(parsed)) {
      throw new CSVParsingError('Parser returned a record without line info', filename)
    }

    const { record, info } = parsed
    if (!isStringRow(record) || record.length !== CODE_TABLE_COLUMNS.length) {
      throw new CSVParsingError(`Expected ${CODE_TABLE_COLUMNS.length} fields`, filename, info.lines)
    }
    return record.map(unwrapQuotes)
  })
}

/**
 * Replace a code table with the rows of one file and index its code column
 */
export async function loadCodeTable(
  connection: DuckDBConnection,
  schema: CodeTableSchema,
  filePath: string,
  batchSize: number
): Promise<number> {
  const content = await fs.readFile(filePath, SOURCE_ENCODING)
  const rows = parseCodeFile(content, filePath)

  await executeStatement(connection, `DROP TABLE IF EXISTS ${quoteIdentifier(schema.table)}`)
  await executeStatement(connection, createTableSql(schema.table, CODE_TABLE_COLUMNS))

  for (let start = 0; start < rows.length; start += batchSize) {
    const batch = rows.slice(start, start + batchSize)
    await executeStatement(connection, insertRowsSql(schema.table, CODE_TABLE_COLUMNS, batch))
  }

  await executeStatement(
    connection,
    `CREATE INDEX ${quoteIdentifier(`idx_${schema.table}`)} ON ${quoteIdentifier(schema.table)}(codigo)`
  )

  return rows.length
}

/**
 * Load every code table found in dir. A missing file is reported and skipped.
 */
export async function loadCodeTables(
  connection: DuckDBConnection,
  dir: string,
  options: CodeTableOptions,
  tables: readonly CodeTableSchema[] = CODE_TABLES
): Promise<CodeTableResult[]> {
  const { deleteSources, batchSize, onProgress } = options
  const results: CodeTableResult[] = []

  for (const schema of tables) {
    const [filePath] = await findFiles(dir, (name) => name.endsWith(schema.suffix))

    if (!filePath) {
      onProgress?.({ stage: 'code-tables', phase: 'skipped', table: schema.table, file: `*${schema.suffix}` })
      results.push({ table: schema.table, file: null, rows: 0 })
      continue
    }

    onProgress?.({ stage: 'code-tables', phase: 'loading', table: schema.table, file: filePath })
    const rows = await loadCodeTable(connection, schema, filePath, batchSize)
    onProgress?.({ stage: 'code-tables', phase: 'loaded', table: schema.table, file: filePath, rows })

    if (deleteSources) {
      await fs.unlink(filePath)
      onProgress?.({ stage: 'code-tables', phase: 'deleted', table: schema.table, file: filePath })
    }

    results.push({ table: schema.table, file: filePath, rows })
  }

  return results
}
