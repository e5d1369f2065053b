/**
 * Archive expansion
 *
 * Unpacks the snapshot archives into one flat working directory.
 */

import StreamZip from 'node-stream-zip'
import { promises as fs } from 'fs'
import { basename, join } from 'path'
import { ArchiveError, toError } from '@/lib/errors'
import type { PreconditionResult, ProgressCallback } from '@/lib/types/build'

/**
 * List the archives of a directory, sorted by name
 */
export async function listArchives(inputDir: string): Promise<string[]> {
  const names = await fs.readdir(inputDir)
  return names
    .filter((name) => name.toLowerCase().endsWith('.zip'))
    .sort()
    .map((name) => join(inputDir, name))
}

/**
 * Compare the archive count against the count the snapshot layout publishes
 */
export function checkArchiveCount(found: number, expected: number): PreconditionResult {
  if (found === expected) {
    return { ok: true }
  }
  return {
    ok: false,
    kind: 'archive-count-mismatch',
    message: `Expected ${expected} archives but found ${found}`,
  }
}

/**
 * Extract every file entry of one archive into outputDir, dropping any
 * directory prefix the entry carries. Existing files are overwritten.
 *
 * @returns Paths of the extracted files
 */
export async function expandArchive(archivePath: string, outputDir: string): Promise<string[]> {
  let zip: StreamZip.StreamZipAsync | null = null
  const extracted: string[] = []

  try {
    const opened = new StreamZip.async({ file: archivePath })
    const entries = await opened.entries()
    // Only an archive that opened can be closed
    zip = opened

    for (const entry of Object.values(entries)) {
      if (entry.isDirectory) continue

      const target = join(outputDir, basename(entry.name))
      await opened.extract(entry.name, target)
      extracted.push(target)
    }

    return extracted
  } catch (error) {
    const err = toError(error)
    throw new ArchiveError(`Failed to expand archive: ${err.message}`, archivePath, err)
  } finally {
    if (zip) {
      await zip.close()
    }
  }
}

/**
 * Expand all archives in order
 */
export async function expandArchives(
  archives: readonly string[],
  outputDir: string,
  onProgress?: ProgressCallback
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true })

  const extracted: string[] = []
  for (const archive of archives) {
    onProgress?.({ stage: 'expand', phase: 'loading', file: archive })
    const files = await expandArchive(archive, outputDir)
    extracted.push(...files)
    onProgress?.({ stage: 'expand', phase: 'loaded', file: archive, rows: files.length })
  }

  return extracted
}
