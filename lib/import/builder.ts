/**
 * Database build orchestration
 *
 * Runs the build stages in their fixed order against one connection:
 * expand archives -> resolve reference -> code tables -> entity tables ->
 * bulk load -> schema adjustments -> reference metadata.
 *
 * The only resumability guard is coarse: an existing database file stops the
 * build before anything is touched. A build that fails midway leaves a
 * partial file behind, which the next run refuses to reuse.
 */

import { promises as fs } from 'fs'
import type { DuckDBConnection } from '@duckdb/node-api'
import { getDatabasePath, type BuildConfig } from '@/lib/config'
import {
  checkpoint,
  closeDatabase,
  getTableCount,
  listIndexes,
  listTables,
  openDatabase,
} from '@/lib/duckdb'
import { PreconditionError, ValidationError } from '@/lib/errors'
import { ENTITY_SCHEMAS, type SchemaRegistry } from '@/lib/sql'
import { pathExists } from '@/lib/utils/files'
import type { BuildSummary, PreconditionResult, ProgressCallback } from '@/lib/types/build'
import { checkArchiveCount, expandArchives, listArchives } from './archive'
import { loadCodeTables } from './code-tables'
import { createEntityTables, loadEntityTables } from './bulk-loader'
import { applyMigrations, buildSchemaAdjustments } from './migrations'
import { resolveSnapshotReference, writeReferenceMetadata } from './metadata'

export interface BuilderOptions extends BuildConfig {
  registry?: SchemaRegistry
  /**
   * Asked when the archive count is off and strictArchiveCount is false.
   * Resolving false aborts the build. Without it the build proceeds.
   */
  confirmArchiveCount?: (found: number, expected: number) => Promise<boolean>
  onProgress?: ProgressCallback
}

export class DatabaseBuilder {
  readonly databasePath: string
  private readonly registry: SchemaRegistry

  constructor(private readonly options: BuilderOptions) {
    this.databasePath = getDatabasePath(options)
    this.registry = options.registry ?? ENTITY_SCHEMAS
  }

  /**
   * Refuse to build over an existing database file
   */
  async checkOutput(): Promise<PreconditionResult> {
    if (await pathExists(this.databasePath)) {
      return {
        ok: false,
        kind: 'database-exists',
        message: `The database file ${this.databasePath} already exists. Delete it before running the build again.`,
      }
    }
    return { ok: true }
  }

  /**
   * Check the archive count, asking for confirmation when not strict
   */
  async checkArchives(archives: readonly string[]): Promise<PreconditionResult> {
    const { expectedArchives, strictArchiveCount, confirmArchiveCount, inputDir } = this.options
    const result = checkArchiveCount(archives.length, expectedArchives)

    if (result.ok || strictArchiveCount) {
      return result.ok
        ? result
        : { ...result, message: `${result.message} in ${inputDir}` }
    }

    const proceed = confirmArchiveCount
      ? await confirmArchiveCount(archives.length, expectedArchives)
      : true

    return proceed
      ? { ok: true }
      : { ...result, message: `${result.message} in ${inputDir}; build cancelled` }
  }

  /**
   * Run the full build
   */
  async build(): Promise<BuildSummary> {
    const { inputDir, outputDir, deleteSources, batchSize, onProgress } = this.options
    const startTime = Date.now()

    onProgress?.({ stage: 'prepare', phase: 'started', file: this.databasePath })

    const outputCheck = await this.checkOutput()
    if (!outputCheck.ok) {
      throw new PreconditionError(outputCheck.message, outputCheck.kind)
    }

    if (!(await pathExists(inputDir))) {
      throw new ValidationError(`Input directory does not exist: ${inputDir}`, { inputDir })
    }

    const archives = await listArchives(inputDir)
    const archiveCheck = await this.checkArchives(archives)
    if (!archiveCheck.ok) {
      throw new PreconditionError(archiveCheck.message, archiveCheck.kind)
    }

    await fs.mkdir(outputDir, { recursive: true })
    onProgress?.({ stage: 'prepare', phase: 'finished', file: this.databasePath })

    onProgress?.({ stage: 'expand', phase: 'started', rows: archives.length })
    await expandArchives(archives, outputDir, onProgress)
    onProgress?.({ stage: 'expand', phase: 'finished' })

    const connection = await openDatabase(this.databasePath)

    try {
      const reference = await resolveSnapshotReference(outputDir, this.registry.empresas.filePattern)
      onProgress?.({ stage: 'reference', phase: 'finished', label: reference })

      onProgress?.({ stage: 'code-tables', phase: 'started' })
      await loadCodeTables(connection, outputDir, { deleteSources, batchSize, onProgress })
      onProgress?.({ stage: 'code-tables', phase: 'finished' })

      onProgress?.({ stage: 'create-tables', phase: 'started' })
      await createEntityTables(connection, this.registry, onProgress)
      onProgress?.({ stage: 'create-tables', phase: 'finished' })

      onProgress?.({ stage: 'bulk-load', phase: 'started' })
      const loads = await loadEntityTables(connection, outputDir, this.registry, {
        deleteSources,
        batchSize,
        onProgress,
      })
      onProgress?.({ stage: 'bulk-load', phase: 'finished' })

      onProgress?.({ stage: 'adjust', phase: 'started' })
      await applyMigrations(connection, buildSchemaAdjustments(this.registry), onProgress)
      onProgress?.({ stage: 'adjust', phase: 'finished' })

      const count = await writeReferenceMetadata(
        connection,
        reference,
        this.registry.estabelecimento.table
      )
      onProgress?.({ stage: 'metadata', phase: 'finished', label: reference, rows: count })

      await checkpoint(connection)

      const summary: BuildSummary = {
        databasePath: this.databasePath,
        reference,
        archives: archives.length,
        tables: await this.collectTableCounts(connection),
        indexes: await listIndexes(connection),
        loads,
        durationMs: Date.now() - startTime,
      }

      onProgress?.({ stage: 'complete', phase: 'finished', file: this.databasePath })
      return summary
    } finally {
      closeDatabase(connection)
    }
  }

  private async collectTableCounts(
    connection: DuckDBConnection
  ): Promise<{ table: string; rows: number }[]> {
    const tables = await listTables(connection)
    const counts: { table: string; rows: number }[] = []
    for (const table of tables) {
      counts.push({ table, rows: await getTableCount(connection, table) })
    }
    return counts
  }
}
