import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'
import type { DuckDBConnection } from '@duckdb/node-api'
import { DatabaseError } from '@/lib/errors'
import { makeTempDir } from '@/lib/testing/fixtures'
import {
  closeDatabase,
  executeStatement,
  openDatabase,
  quoteIdentifier,
  quoteLiteral,
  tableExists,
} from './index'

describe('duckdb helpers', () => {
  it('quotes literals and identifiers', () => {
    expect(quoteLiteral("D'AVILA")).toBe("'D''AVILA'")
    expect(quoteIdentifier('my "table"')).toBe('"my ""table"""')
  })

  describe('tableExists', () => {
    let db: DuckDBConnection

    beforeEach(async () => {
      db = await openDatabase(':memory:')
    })

    afterEach(() => {
      closeDatabase(db)
    })

    it('reports whether a table is present', async () => {
      await executeStatement(db, 'CREATE TABLE empresas (cnpj_basico VARCHAR)')

      await expect(tableExists(db, 'empresas')).resolves.toBe(true)
      await expect(tableExists(db, '_referencia')).resolves.toBe(false)
    })
  })

  describe('openDatabase', () => {
    let workDir: string

    beforeEach(async () => {
      workDir = await makeTempDir('cnpj-duckdb')
    })

    afterEach(async () => {
      await fs.rm(workDir, { recursive: true, force: true })
    })

    it('raises DatabaseError for a file that is not a database', async () => {
      const path = join(workDir, 'cnpj.db')
      await fs.writeFile(path, 'not a database file, just some text that is long enough to hold a header')

      const error = await openDatabase(path, true).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(DatabaseError)
      expect(error instanceof Error && error.message).toContain(`Failed to open database ${path}`)
    })
  })
})
