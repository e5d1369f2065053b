/**
 * Open data portal client
 *
 * Reads the plain directory listings the portal publishes: the root lists
 * one "YYYY-MM/" folder per snapshot, and each folder lists its archives in a
 * table with a human-readable size column.
 */

import { PortalError, toError } from '@/lib/errors'

export type FetchLike = (url: string) => Promise<Response>

/**
 * Snapshot folder found on the listing root
 */
export interface SnapshotLink {
  href: string
  year: number
  month: number
}

/**
 * Archive listed in a snapshot folder
 */
export interface ArchiveLink {
  /** Name as linked, e.g. "Empresas0.zip" */
  filename: string
  /** Absolute download URL */
  url: string
  /** Advertised size in bytes (0 when unknown) */
  sizeBytes: number
}

const SIZE_UNITS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
}

/**
 * Convert a listing size ("22K", "360M", "1.4G", "-") to bytes
 */
export function parseSize(sizeText: string): number {
  const text = sizeText.trim().toUpperCase()
  if (text === '' || text === '-') {
    return 0
  }

  const unit = SIZE_UNITS[text.slice(-1)]
  if (unit) {
    const value = Number(text.slice(0, -1))
    return Number.isFinite(value) ? Math.floor(value * unit) : 0
  }

  // Unknown formats count as 0 so the file is simply downloaded again
  return /^\d+$/.test(text) ? parseInt(text, 10) : 0
}

/**
 * Find the snapshot folder links ("YYYY-MM/") of the listing root
 */
export function parseSnapshotLinks(html: string): SnapshotLink[] {
  const links: SnapshotLink[] = []
  const linkRegex = /href="((\d{4})-(\d{2})\/)"/gi
  let match

  while ((match = linkRegex.exec(html)) !== null) {
    links.push({
      href: match[1],
      year: parseInt(match[2], 10),
      month: parseInt(match[3], 10),
    })
  }

  return links
}

/**
 * Pick the most recent snapshot by (year, month)
 */
export function selectLatestSnapshot(links: readonly SnapshotLink[]): SnapshotLink | null {
  let latest: SnapshotLink | null = null
  for (const link of links) {
    if (
      !latest ||
      link.year > latest.year ||
      (link.year === latest.year && link.month > latest.month)
    ) {
      latest = link
    }
  }
  return latest
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '').trim()
}

/**
 * Find the archive links of a snapshot folder listing
 *
 * Sizes come from the fourth cell of the link's table row; links outside a
 * table row get size 0.
 */
export function parseArchiveListing(html: string, pageUrl: string): ArchiveLink[] {
  const archives: ArchiveLink[] = []
  const seen = new Set<string>()
  const hrefRegex = /href="([^"]+\.zip)"/i

  const rows = html.match(/<tr[\s\S]*?<\/tr>/gi) ?? []
  for (const row of rows) {
    const hrefMatch = row.match(hrefRegex)
    if (!hrefMatch) continue

    const cells = [...row.matchAll(/<td[^>]*>([\s\S]*?)<\/td>/gi)].map((cell) => stripTags(cell[1]))
    const sizeText = cells.length >= 4 ? cells[3] : '-'
    const href = hrefMatch[1]

    seen.add(href)
    archives.push({
      filename: decodeURIComponent(href.split('/').pop() || href),
      url: new URL(href, pageUrl).toString(),
      sizeBytes: parseSize(sizeText),
    })
  }

  // Bare links outside any table row
  for (const match of html.matchAll(/href="([^"]+\.zip)"/gi)) {
    const href = match[1]
    if (seen.has(href)) continue
    seen.add(href)
    archives.push({
      filename: decodeURIComponent(href.split('/').pop() || href),
      url: new URL(href, pageUrl).toString(),
      sizeBytes: 0,
    })
  }

  return archives
}

/**
 * Fetch a listing page as text
 */
export async function fetchListing(url: string, fetchImpl: FetchLike = fetch): Promise<string> {
  let response: Response
  try {
    response = await fetchImpl(url)
  } catch (error) {
    throw new PortalError(`Network error while fetching ${url}: ${toError(error).message}`)
  }

  if (!response.ok) {
    throw new PortalError(
      `Failed to fetch listing ${url}: ${response.status} ${response.statusText}`,
      response.status
    )
  }

  return await response.text()
}

/**
 * Resolve the URL of the latest snapshot folder
 */
export async function findLatestSnapshotUrl(
  baseUrl: string,
  fetchImpl: FetchLike = fetch
): Promise<string> {
  const html = await fetchListing(baseUrl, fetchImpl)
  const latest = selectLatestSnapshot(parseSnapshotLinks(html))

  if (!latest) {
    throw new PortalError(`No valid month links found on ${baseUrl}`)
  }

  return new URL(latest.href, baseUrl).toString()
}
