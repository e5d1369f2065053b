/**
 * DuckDB connection utilities
 * Uses @duckdb/node-api against a single local database file
 */

import { DuckDBInstance } from '@duckdb/node-api'
import type { DuckDBConnection, DuckDBValue } from '@duckdb/node-api'
import { DatabaseError, toError } from '@/lib/errors'

export type Row = Record<string, DuckDBValue>

/**
 * Open (or create) a database file and connect to it
 *
 * @param path Database file path, or ':memory:'
 * @param readOnly Open without write access (the file must exist)
 */
export async function openDatabase(path: string, readOnly = false): Promise<DuckDBConnection> {
  try {
    const instance = readOnly
      ? await DuckDBInstance.create(path, { access_mode: 'READ_ONLY' })
      : await DuckDBInstance.create(path)
    return await instance.connect()
  } catch (error) {
    const err = toError(error)
    throw new DatabaseError(`Failed to open database ${path}: ${err.message}`, undefined, err)
  }
}

/**
 * Execute a SQL query
 */
export async function executeQuery(connection: DuckDBConnection, sql: string): Promise<Row[]> {
  try {
    const result = await connection.run(sql)
    const chunks = await result.fetchAllChunks()
    const columnNames = result.columnNames()

    const rows: Row[] = []
    for (const chunk of chunks) {
      for (const rowArray of chunk.getRows()) {
        const rowObject: Row = {}
        columnNames.forEach((colName, idx) => {
          rowObject[colName] = rowArray[idx]
        })
        rows.push(rowObject)
      }
    }

    return rows
  } catch (error) {
    const err = toError(error)
    throw new DatabaseError(`Query execution failed: ${err.message}`, sql, err)
  }
}

/**
 * Execute a SQL statement (no results expected)
 */
export async function executeStatement(connection: DuckDBConnection, sql: string): Promise<void> {
  try {
    await connection.run(sql)
  } catch (error) {
    const err = toError(error)
    throw new DatabaseError(`Statement execution failed: ${err.message}`, sql, err)
  }
}

/**
 * Flush the write-ahead log into the database file
 */
export async function checkpoint(connection: DuckDBConnection): Promise<void> {
  await executeStatement(connection, 'CHECKPOINT')
}

/**
 * Close database connection
 */
export function closeDatabase(connection: DuckDBConnection): void {
  try {
    connection.closeSync()
  } catch (error) {
    const err = toError(error)
    throw new DatabaseError(`Failed to close connection: ${err.message}`, undefined, err)
  }
}

/**
 * Quote a string as a SQL literal
 */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}

/**
 * Quote a table or column name
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/**
 * Check if table exists
 */
export async function tableExists(connection: DuckDBConnection, tableName: string): Promise<boolean> {
  const result = await executeQuery(
    connection,
    `SELECT table_name FROM information_schema.tables
     WHERE table_schema = 'main' AND table_name = ${quoteLiteral(tableName)}`
  )
  return result.length > 0
}

/**
 * List the tables of the main schema
 */
export async function listTables(connection: DuckDBConnection): Promise<string[]> {
  const result = await executeQuery(
    connection,
    "SELECT table_name FROM information_schema.tables WHERE table_schema = 'main' ORDER BY table_name"
  )
  return result.map((row) => String(row.table_name))
}

/**
 * List index names, optionally restricted to one table
 */
export async function listIndexes(connection: DuckDBConnection, tableName?: string): Promise<string[]> {
  const filter = tableName ? `WHERE table_name = ${quoteLiteral(tableName)}` : ''
  const result = await executeQuery(
    connection,
    `SELECT index_name FROM duckdb_indexes() ${filter} ORDER BY index_name`
  )
  return result.map((row) => String(row.index_name))
}

/**
 * List the column names of a table in declaration order
 */
export async function listColumns(connection: DuckDBConnection, tableName: string): Promise<string[]> {
  const result = await executeQuery(
    connection,
    `SELECT column_name FROM information_schema.columns
     WHERE table_schema = 'main' AND table_name = ${quoteLiteral(tableName)}
     ORDER BY ordinal_position`
  )
  return result.map((row) => String(row.column_name))
}

/**
 * Get table row count
 */
export async function getTableCount(connection: DuckDBConnection, tableName: string): Promise<number> {
  const result = await executeQuery(
    connection,
    `SELECT COUNT(*) AS count FROM ${quoteIdentifier(tableName)}`
  )
  // COUNT(*) comes back as a BIGINT
  return Number(result[0]?.count ?? 0)
}
