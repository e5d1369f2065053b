/**
 * Snapshot archive downloader
 *
 * Downloads every archive listed in a snapshot folder with a bounded number
 * of parallel transfers. Files whose local size already matches the listed
 * size are skipped, which is how an interrupted session resumes.
 */

import { promises as fs } from 'fs'
import { join } from 'path'
import { DownloadError, toError } from '@/lib/errors'
import { fetchListing, parseArchiveListing, type ArchiveLink, type FetchLike } from './index'

export type DownloadOutcome = 'downloaded' | 'skipped' | 'stopped' | 'failed'

export interface DownloadProgress {
  filename: string
  phase: 'skipped' | 'started' | 'progress' | 'done' | 'stopped' | 'failed'
  bytes: number
  totalBytes: number
  error?: string
}

export interface DownloadOptions {
  maxWorkers: number
  /** Checked between chunks; aborting stops every transfer in flight */
  signal?: AbortSignal
  fetchImpl?: FetchLike
  onProgress?: (progress: DownloadProgress) => void
}

export interface DownloadResult {
  filename: string
  path: string
  outcome: DownloadOutcome
  bytes: number
  error?: string
}

export interface DownloadReport {
  listed: number
  results: DownloadResult[]
}

async function localSize(path: string): Promise<number | null> {
  try {
    const stats = await fs.stat(path)
    return stats.size
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null
    }
    throw error
  }
}

/**
 * Run fn over items with at most `limit` calls in flight, keeping input order
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const current = next++
      results[current] = await fn(items[current])
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))
  return results
}

/**
 * Stream one archive to disk
 *
 * A transfer stopped by the signal leaves a partial file; the size check of
 * the next session downloads it again.
 */
export async function downloadArchive(
  archive: ArchiveLink,
  path: string,
  options: Omit<DownloadOptions, 'maxWorkers'>
): Promise<DownloadResult> {
  const { signal, fetchImpl = fetch, onProgress } = options
  const { filename } = archive
  let bytes = 0

  if (signal?.aborted) {
    onProgress?.({ filename, phase: 'stopped', bytes, totalBytes: archive.sizeBytes })
    return { filename, path, outcome: 'stopped', bytes }
  }

  try {
    const response = await fetchImpl(archive.url)
    if (!response.ok) {
      throw new DownloadError(
        `Failed to download ${archive.url}: ${response.status} ${response.statusText}`,
        response.status
      )
    }
    if (!response.body) {
      throw new DownloadError(`Empty response body for ${archive.url}`, response.status)
    }

    const contentLength = Number(response.headers.get('content-length') ?? 0)
    const totalBytes = contentLength > 0 ? contentLength : archive.sizeBytes
    onProgress?.({ filename, phase: 'started', bytes, totalBytes })

    const reader = response.body.getReader()
    const file = await fs.open(path, 'w')

    try {
      while (true) {
        if (signal?.aborted) {
          await reader.cancel()
          onProgress?.({ filename, phase: 'stopped', bytes, totalBytes })
          return { filename, path, outcome: 'stopped', bytes }
        }

        const { done, value } = await reader.read()
        if (done) break

        await file.write(value)
        bytes += value.byteLength
        onProgress?.({ filename, phase: 'progress', bytes, totalBytes })
      }
    } finally {
      await file.close()
    }

    onProgress?.({ filename, phase: 'done', bytes, totalBytes })
    return { filename, path, outcome: 'downloaded', bytes }
  } catch (error) {
    const message = toError(error).message
    onProgress?.({ filename, phase: 'failed', bytes, totalBytes: archive.sizeBytes, error: message })
    return { filename, path, outcome: 'failed', bytes, error: message }
  }
}

/**
 * Download every archive of a snapshot folder into outputDir
 *
 * Listing failures are thrown; failures of single files are reported in the
 * result list.
 */
export async function downloadArchives(
  pageUrl: string,
  outputDir: string,
  options: DownloadOptions
): Promise<DownloadReport> {
  const { maxWorkers, ...transferOptions } = options

  await fs.mkdir(outputDir, { recursive: true })

  const html = await fetchListing(pageUrl, transferOptions.fetchImpl)
  const archives = parseArchiveListing(html, pageUrl)

  const skipped: DownloadResult[] = []
  const pending: ArchiveLink[] = []

  for (const archive of archives) {
    const path = join(outputDir, archive.filename)
    const size = await localSize(path)

    if (size !== null && size === archive.sizeBytes) {
      transferOptions.onProgress?.({
        filename: archive.filename,
        phase: 'skipped',
        bytes: size,
        totalBytes: archive.sizeBytes,
      })
      skipped.push({ filename: archive.filename, path, outcome: 'skipped', bytes: size })
    } else {
      pending.push(archive)
    }
  }

  const downloaded = await runWithConcurrency(pending, maxWorkers, (archive) =>
    downloadArchive(archive, join(outputDir, archive.filename), transferOptions)
  )

  return { listed: archives.length, results: [...skipped, ...downloaded] }
}
