import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'
import type { DuckDBConnection } from '@duckdb/node-api'
import { closeDatabase, executeQuery, listIndexes, listTables, openDatabase } from '@/lib/duckdb'
import { CSVParsingError } from '@/lib/errors'
import type { BuildProgress } from '@/lib/types/build'
import { csvContent, makeTempDir, writeLatin1 } from '@/lib/testing/fixtures'
import { loadCodeTables, parseCodeFile, unwrapQuotes } from './code-tables'

describe('code tables', () => {
  describe('parseCodeFile', () => {
    it('splits quoted fields on semicolons', () => {
      expect(parseCodeFile('"01";"EXTINCAO"\n"02";"INCORPORACAO"\n', 'MOTICSV')).toEqual([
        ['01', 'EXTINCAO'],
        ['02', 'INCORPORACAO'],
      ])
    })

    it('rejects a record without exactly two fields', () => {
      expect(() => parseCodeFile('"01";"A"\n"02"\n', 'MOTICSV')).toThrow(CSVParsingError)
      expect(() => parseCodeFile('"01";"A"\n"02"\n', 'MOTICSV')).toThrow('Expected 2 fields')
    })

    it('reports the line of the bad record', () => {
      const error = (() => {
        try {
          return parseCodeFile('"01";"A"\n"02";"B";"C"\n', 'MOTICSV')
        } catch (e) {
          return e
        }
      })()

      expect(error instanceof CSVParsingError && error.lineNumber).toBe(2)
    })

    it('counts skipped blank lines in the reported line', () => {
      const error = (() => {
        try {
          return parseCodeFile('"01";"A"\n\n"02";"B";"C"\n', 'MOTICSV')
        } catch (e) {
          return e
        }
      })()

      expect(error instanceof CSVParsingError && error.lineNumber).toBe(3)
    })
  })

  describe('unwrapQuotes', () => {
    it('drops a wrapping quote pair', () => {
      expect(unwrapQuotes('"ACME "X" LTDA"')).toBe('ACME "X" LTDA')
    })

    it('leaves other fields alone', () => {
      expect(unwrapQuotes('ACME "X" LTDA')).toBe('ACME "X" LTDA')
      expect(unwrapQuotes('"')).toBe('"')
      expect(unwrapQuotes('')).toBe('')
    })
  })

  describe('loadCodeTables', () => {
    let workDir: string
    let db: DuckDBConnection

    beforeEach(async () => {
      workDir = await makeTempDir('cnpj-codes')
      db = await openDatabase(':memory:')
    })

    afterEach(async () => {
      closeDatabase(db)
      await fs.rm(workDir, { recursive: true, force: true })
    })

    it('loads the files present, indexes them and skips the rest', async () => {
      const cnae = join(workDir, 'F.K03200$Z.D30610.CNAECSV')
      await writeLatin1(cnae, csvContent([['0111301', 'Cultivo de arroz'], ['0134200', 'Cultivo de café']]))
      const events: BuildProgress[] = []

      const results = await loadCodeTables(db, workDir, {
        deleteSources: false,
        batchSize: 1,
        onProgress: (p) => events.push(p),
      })

      expect(results).toEqual([
        { table: 'cnae', file: cnae, rows: 2 },
        { table: 'motivo', file: null, rows: 0 },
        { table: 'municipio', file: null, rows: 0 },
        { table: 'natureza_juridica', file: null, rows: 0 },
        { table: 'pais', file: null, rows: 0 },
        { table: 'qualificacao_socio', file: null, rows: 0 },
      ])
      await expect(listTables(db)).resolves.toEqual(['cnae'])
      await expect(listIndexes(db, 'cnae')).resolves.toEqual(['idx_cnae'])
      await expect(executeQuery(db, 'SELECT codigo, descricao FROM cnae ORDER BY codigo')).resolves.toEqual([
        { codigo: '0111301', descricao: 'Cultivo de arroz' },
        { codigo: '0134200', descricao: 'Cultivo de café' },
      ])
      expect(events.filter((e) => e.phase === 'skipped')).toHaveLength(5)
      await expect(fs.readdir(workDir)).resolves.toEqual(['F.K03200$Z.D30610.CNAECSV'])
    })

    it('deletes each source after loading it', async () => {
      await writeLatin1(join(workDir, 'F.K03200$Z.D30610.PAISCSV'), csvContent([['105', 'BRASIL']]))

      await loadCodeTables(db, workDir, { deleteSources: true, batchSize: 100 })

      await expect(fs.readdir(workDir)).resolves.toEqual([])
      await expect(executeQuery(db, 'SELECT * FROM pais')).resolves.toEqual([{ codigo: '105', descricao: 'BRASIL' }])
    })
  })
})
