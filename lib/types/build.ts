/**
 * Build pipeline types
 */

/**
 * Stages of a database build, in execution order
 */
export type BuildStage =
  | 'prepare'
  | 'expand'
  | 'reference'
  | 'code-tables'
  | 'create-tables'
  | 'bulk-load'
  | 'adjust'
  | 'metadata'
  | 'complete'

/**
 * Progress event emitted by the build stages
 */
export interface BuildProgress {
  stage: BuildStage
  phase: 'started' | 'loading' | 'loaded' | 'skipped' | 'deleted' | 'step' | 'finished'
  table?: string
  file?: string
  rows?: number
  /** Human-readable step label (migration steps) */
  label?: string
}

export type ProgressCallback = (progress: BuildProgress) => void

/**
 * Result of a precondition check
 */
export type PreconditionResult =
  | { ok: true }
  | { ok: false; kind: 'database-exists' | 'archive-count-mismatch'; message: string }

/**
 * Rows loaded from one source file
 */
export interface LoadStats {
  table: string
  file: string
  rowsInserted: number
  durationMs: number
}

/**
 * What a completed build produced
 */
export interface BuildSummary {
  databasePath: string
  reference: string
  archives: number
  tables: { table: string; rows: number }[]
  indexes: string[]
  loads: LoadStats[]
  durationMs: number
}
