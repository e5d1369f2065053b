/**
 * Working directory helpers
 */

import { promises as fs } from 'fs'
import { join } from 'path'

/**
 * Find the files of a directory whose name matches, sorted by name
 */
export async function findFiles(dir: string, matches: (name: string) => boolean): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && matches(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name))
}

/**
 * Check whether a path exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path)
    return true
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false
    }
    throw error
  }
}
