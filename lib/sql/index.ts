/**
 * Schema registry
 *
 * Static description of every table the build creates: the four entity tables
 * loaded from the large files, and the code tables loaded from the small ones.
 * Stages receive this registry instead of deriving column lists themselves.
 */

import { quoteIdentifier, quoteLiteral } from '@/lib/duckdb'

export type EntityName = 'empresas' | 'estabelecimento' | 'socios' | 'simples'

/**
 * Large entity table loaded by the bulk loader
 */
export interface EntitySchema {
  /** Table the raw rows are loaded into */
  readonly table: string
  /** Matches the expanded file names that hold this entity */
  readonly filePattern: RegExp
  /** Source columns, in file order */
  readonly columns: readonly string[]
}

/**
 * Two-column lookup table
 */
export interface CodeTableSchema {
  readonly table: string
  /** File name suffix of the source file */
  readonly suffix: string
}

export type SchemaRegistry = Readonly<Record<EntityName, EntitySchema>>

export const CODE_TABLE_COLUMNS = ['codigo', 'descricao'] as const

export const ENTITY_SCHEMAS: SchemaRegistry = Object.freeze({
  empresas: {
    table: 'empresas',
    filePattern: /\.EMPRECSV$/,
    columns: [
      'cnpj_basico',
      'razao_social',
      'natureza_juridica',
      'qualificacao_responsavel',
      'capital_social_str',
      'porte_empresa',
      'ente_federativo_responsavel',
    ],
  },
  estabelecimento: {
    table: 'estabelecimento',
    filePattern: /\.ESTABELE$/,
    columns: [
      'cnpj_basico',
      'cnpj_ordem',
      'cnpj_dv',
      'matriz_filial',
      'nome_fantasia',
      'situacao_cadastral',
      'data_situacao_cadastral',
      'motivo_situacao_cadastral',
      'nome_cidade_exterior',
      'pais',
      'data_inicio_atividades',
      'cnae_fiscal',
      'cnae_fiscal_secundaria',
      'tipo_logradouro',
      'logradouro',
      'numero',
      'complemento',
      'bairro',
      'cep',
      'uf',
      'municipio',
      'ddd1',
      'telefone1',
      'ddd2',
      'telefone2',
      'ddd_fax',
      'fax',
      'correio_eletronico',
      'situacao_especial',
      'data_situacao_especial',
    ],
  },
  // Loaded into a transient table; the final socios table is derived from it
  socios: {
    table: 'socios_original',
    filePattern: /\.SOCIOCSV$/,
    columns: [
      'cnpj_basico',
      'identificador_de_socio',
      'nome_socio',
      'cnpj_cpf_socio',
      'qualificacao_socio',
      'data_entrada_sociedade',
      'pais',
      'representante_legal',
      'nome_representante',
      'qualificacao_representante_legal',
      'faixa_etaria',
    ],
  },
  simples: {
    table: 'simples',
    filePattern: /\.SIMPLES\.CSV\..+$/,
    columns: [
      'cnpj_basico',
      'opcao_simples',
      'data_opcao_simples',
      'data_exclusao_simples',
      'opcao_mei',
      'data_opcao_mei',
      'data_exclusao_mei',
    ],
  },
})

/** Load order of the entity tables */
export const ENTITY_LOAD_ORDER: readonly EntityName[] = ['empresas', 'estabelecimento', 'socios', 'simples']

export const CODE_TABLES: readonly CodeTableSchema[] = [
  { suffix: '.CNAECSV', table: 'cnae' },
  { suffix: '.MOTICSV', table: 'motivo' },
  { suffix: '.MUNICCSV', table: 'municipio' },
  { suffix: '.NATJUCSV', table: 'natureza_juridica' },
  { suffix: '.PAISCSV', table: 'pais' },
  { suffix: '.QUALSCSV', table: 'qualificacao_socio' },
]

/** File name suffix carrying the snapshot reference date token */
export const REFERENCE_FILE_PATTERN = ENTITY_SCHEMAS.empresas.filePattern

/**
 * CREATE TABLE statement with every column stored as text
 */
export function createTableSql(table: string, columns: readonly string[]): string {
  const columnsSql = columns.map((col) => `  ${quoteIdentifier(col)} VARCHAR`).join(',\n')
  return `CREATE TABLE ${quoteIdentifier(table)} (\n${columnsSql}\n)`
}

/**
 * Build the INSERT statement for a batch of rows
 */
export function insertRowsSql(
  table: string,
  columns: readonly string[],
  rows: readonly (readonly string[])[]
): string {
  const values = rows.map((row) => `(${row.map(quoteLiteral).join(', ')})`).join(',\n')
  return `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')})\nVALUES\n${values}`
}
