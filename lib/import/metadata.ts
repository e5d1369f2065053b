/**
 * Snapshot reference metadata
 *
 * Resolves the snapshot reference date from the expanded file names and
 * records it, with the establishment count, in the _referencia table.
 */

import { basename } from 'path'
import type { DuckDBConnection } from '@duckdb/node-api'
import { executeStatement, getTableCount, quoteLiteral } from '@/lib/duckdb'
import { ENTITY_SCHEMAS, REFERENCE_FILE_PATTERN } from '@/lib/sql'
import { findFiles } from '@/lib/utils/files'
import {
  UNKNOWN_REFERENCE,
  decodeReferenceToken,
  referenceTokenFromFilename,
} from '@/lib/utils/extract'

export const REFERENCE_TABLE = '_referencia'

/** Keys written to _referencia */
export const REFERENCE_KEYS = {
  date: 'CNPJ',
  count: 'cnpj_qtde',
} as const

/**
 * Read the reference date from the first file in dir matching pattern
 * (the company files by default)
 *
 * @returns DD/MM/YYYY, or 'Unknown' when no file or token matches
 */
export async function resolveSnapshotReference(
  dir: string,
  pattern: RegExp = REFERENCE_FILE_PATTERN
): Promise<string> {
  const [first] = await findFiles(dir, (name) => pattern.test(name))
  if (!first) {
    return UNKNOWN_REFERENCE
  }

  const token = referenceTokenFromFilename(basename(first))
  return token ? decodeReferenceToken(token) : UNKNOWN_REFERENCE
}

/**
 * Insert the reference date and the row count of the establishment table
 * into _referencia
 */
export async function writeReferenceMetadata(
  connection: DuckDBConnection,
  reference: string,
  establishmentTable: string = ENTITY_SCHEMAS.estabelecimento.table
): Promise<number> {
  const count = await getTableCount(connection, establishmentTable)

  await executeStatement(
    connection,
    `INSERT INTO ${REFERENCE_TABLE} (referencia, valor) VALUES
      (${quoteLiteral(REFERENCE_KEYS.date)}, ${quoteLiteral(reference)}),
      (${quoteLiteral(REFERENCE_KEYS.count)}, ${quoteLiteral(String(count))})`
  )

  return count
}
