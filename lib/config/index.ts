/**
 * Build and download configuration
 *
 * Values come from the environment (scripts load .env.local then .env through
 * dotenv before calling these) and fall back to the defaults the snapshot
 * layout expects.
 */

import { join } from 'path'
import { ValidationError } from '@/lib/errors'

export const DEFAULT_BASE_URL = 'https://arquivos.receitafederal.gov.br/cnpj/dados_abertos_cnpj/'

/** Archive count published for every snapshot */
export const EXPECTED_ARCHIVE_COUNT = 37

type Env = Record<string, string | undefined>

/**
 * Database build configuration
 */
export interface BuildConfig {
  inputDir: string
  outputDir: string
  dbName: string
  deleteSources: boolean
  expectedArchives: number
  strictArchiveCount: boolean
  batchSize: number
}

/**
 * Downloader configuration
 */
export interface DownloadConfig {
  baseUrl: string
  outputDir: string
  maxWorkers: number
}

export function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback
  }

  switch (value.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true
    case 'false':
    case '0':
    case 'no':
      return false
    default:
      throw new ValidationError(`${name} must be a boolean (true/false), got '${value}'`, { name, value })
  }
}

export function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback
  }

  if (!/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${name} must be a positive integer, got '${value}'`, { name, value })
  }

  const parsed = parseInt(value.trim(), 10)
  if (parsed <= 0) {
    throw new ValidationError(`${name} must be greater than zero, got '${value}'`, { name, value })
  }
  return parsed
}

function readString(value: string | undefined, fallback: string): string {
  return value && value.trim() !== '' ? value.trim() : fallback
}

/**
 * Get build configuration from environment
 */
export function getBuildConfig(env: Env = process.env): BuildConfig {
  return {
    inputDir: readString(env.CNPJ_INPUT_DIR, 'output'),
    outputDir: readString(env.CNPJ_OUTPUT_DIR, 'data'),
    dbName: readString(env.CNPJ_DB_NAME, 'cnpj.db'),
    deleteSources: parseBoolean('CNPJ_DELETE_SOURCES', env.CNPJ_DELETE_SOURCES, true),
    expectedArchives: parsePositiveInt('CNPJ_EXPECTED_ARCHIVES', env.CNPJ_EXPECTED_ARCHIVES, EXPECTED_ARCHIVE_COUNT),
    strictArchiveCount: parseBoolean('CNPJ_STRICT_ARCHIVE_COUNT', env.CNPJ_STRICT_ARCHIVE_COUNT, true),
    batchSize: parsePositiveInt('CNPJ_BATCH_SIZE', env.CNPJ_BATCH_SIZE, 2000),
  }
}

/**
 * Get downloader configuration from environment
 */
export function getDownloadConfig(env: Env = process.env): DownloadConfig {
  const baseUrl = readString(env.CNPJ_BASE_URL, DEFAULT_BASE_URL)

  try {
    new URL(baseUrl)
  } catch {
    throw new ValidationError(`CNPJ_BASE_URL is not a valid URL: '${baseUrl}'`, { value: baseUrl })
  }

  return {
    baseUrl,
    outputDir: readString(env.CNPJ_INPUT_DIR, 'output'),
    maxWorkers: parsePositiveInt('CNPJ_DOWNLOAD_WORKERS', env.CNPJ_DOWNLOAD_WORKERS, 5),
  }
}

/**
 * Full path of the database file for a build configuration
 */
export function getDatabasePath(config: Pick<BuildConfig, 'outputDir' | 'dbName'>): string {
  return join(config.outputDir, config.dbName)
}
