/**
 * Post-load schema adjustments
 *
 * The structural changes applied after the bulk load, expressed as an ordered
 * list of typed steps. Order matters: a column is derived before it is
 * indexed, every index follows the load of its table, and the partner table
 * is derived only after estabelecimento has its cnpj column.
 */

import type { DuckDBConnection } from '@duckdb/node-api'
import { executeStatement, quoteIdentifier } from '@/lib/duckdb'
import { createTableSql, type SchemaRegistry } from '@/lib/sql'
import { REFERENCE_TABLE } from './metadata'
import type { ProgressCallback } from '@/lib/types/build'

export type ColumnType = 'VARCHAR' | 'DOUBLE'

export type MigrationStep =
  | { kind: 'add-column'; label: string; table: string; column: string; type: ColumnType }
  | { kind: 'populate-column'; label: string; table: string; column: string; expression: string }
  | { kind: 'drop-column'; label: string; table: string; column: string }
  | { kind: 'create-index'; label: string; table: string; column: string; name: string }
  | { kind: 'create-derived-table'; label: string; table: string; select: string }
  | { kind: 'drop-table'; label: string; table: string }
  | { kind: 'create-table'; label: string; table: string; columns: readonly string[] }

/** Final partner table, derived from the raw partner rows */
export const PARTNERS_TABLE = 'socios'

/**
 * Decimal-comma text to DOUBLE. Thousands separators are dropped first;
 * text that does not parse becomes NULL.
 */
export function capitalSocialExpression(column: string): string {
  return `TRY_CAST(REPLACE(REPLACE(${quoteIdentifier(column)}, '.', ''), ',', '.') AS DOUBLE)`
}

function index(table: string, column: string, name: string): MigrationStep {
  return { kind: 'create-index', label: `Index ${table}(${column})`, table, column, name }
}

/**
 * The ordered adjustment steps for a loaded registry
 */
export function buildSchemaAdjustments(registry: SchemaRegistry): MigrationStep[] {
  const empresas = registry.empresas.table
  const estabelecimento = registry.estabelecimento.table
  const partnersRaw = registry.socios.table
  const simples = registry.simples.table

  return [
    {
      kind: 'add-column',
      label: 'Add numeric capital_social to empresas',
      table: empresas,
      column: 'capital_social',
      type: 'DOUBLE',
    },
    {
      kind: 'populate-column',
      label: 'Convert capital_social_str to a number',
      table: empresas,
      column: 'capital_social',
      expression: capitalSocialExpression('capital_social_str'),
    },
    {
      kind: 'drop-column',
      label: 'Drop capital_social_str',
      table: empresas,
      column: 'capital_social_str',
    },
    {
      kind: 'add-column',
      label: 'Add cnpj to estabelecimento',
      table: estabelecimento,
      column: 'cnpj',
      type: 'VARCHAR',
    },
    {
      kind: 'populate-column',
      label: 'Build cnpj from basico, ordem and dv',
      table: estabelecimento,
      column: 'cnpj',
      expression: 'cnpj_basico || cnpj_ordem || cnpj_dv',
    },
    index(empresas, 'cnpj_basico', 'idx_empresas_cnpj_basico'),
    index(empresas, 'razao_social', 'idx_empresas_razao_social'),
    index(estabelecimento, 'cnpj_basico', 'idx_estabelecimento_cnpj_basico'),
    index(estabelecimento, 'cnpj', 'idx_estabelecimento_cnpj'),
    index(estabelecimento, 'nome_fantasia', 'idx_estabelecimento_nomefantasia'),
    index(partnersRaw, 'cnpj_basico', `idx_${partnersRaw}_cnpj_basico`),
    {
      kind: 'create-derived-table',
      label: `Derive ${PARTNERS_TABLE} from headquarters establishments`,
      table: PARTNERS_TABLE,
      select: `SELECT te.cnpj AS cnpj, ts.*
FROM ${quoteIdentifier(partnersRaw)} ts
LEFT JOIN ${quoteIdentifier(estabelecimento)} te ON te.cnpj_basico = ts.cnpj_basico
WHERE te.matriz_filial = '1'`,
    },
    { kind: 'drop-table', label: `Drop ${partnersRaw}`, table: partnersRaw },
    index(PARTNERS_TABLE, 'cnpj', 'idx_socios_cnpj'),
    index(PARTNERS_TABLE, 'cnpj_cpf_socio', 'idx_socios_cnpj_cpf_socio'),
    index(PARTNERS_TABLE, 'nome_socio', 'idx_socios_nome_socio'),
    index(PARTNERS_TABLE, 'representante_legal', 'idx_socios_representante'),
    index(PARTNERS_TABLE, 'nome_representante', 'idx_socios_representante_nome'),
    index(simples, 'cnpj_basico', 'idx_simples_cnpj_basico'),
    {
      kind: 'create-table',
      label: `Create ${REFERENCE_TABLE}`,
      table: REFERENCE_TABLE,
      columns: ['referencia', 'valor'],
    },
  ]
}

/**
 * SQL for one step
 */
export function renderStep(step: MigrationStep): string {
  const table = quoteIdentifier(step.table)

  switch (step.kind) {
    case 'add-column':
      return `ALTER TABLE ${table} ADD COLUMN ${quoteIdentifier(step.column)} ${step.type}`
    case 'populate-column':
      return `UPDATE ${table} SET ${quoteIdentifier(step.column)} = ${step.expression}`
    case 'drop-column':
      return `ALTER TABLE ${table} DROP COLUMN ${quoteIdentifier(step.column)}`
    case 'create-index':
      return `CREATE INDEX ${quoteIdentifier(step.name)} ON ${table}(${quoteIdentifier(step.column)})`
    case 'create-derived-table':
      return `CREATE TABLE ${table} AS\n${step.select}`
    case 'drop-table':
      return `DROP TABLE IF EXISTS ${table}`
    case 'create-table':
      return createTableSql(step.table, step.columns)
  }
}

/**
 * Run steps in order. A failing step aborts the rest; steps already run stay
 * applied.
 */
export async function applyMigrations(
  connection: DuckDBConnection,
  steps: readonly MigrationStep[],
  onProgress?: ProgressCallback
): Promise<void> {
  for (const step of steps) {
    onProgress?.({ stage: 'adjust', phase: 'step', table: step.table, label: step.label })
    await executeStatement(connection, renderStep(step))
  }
}
