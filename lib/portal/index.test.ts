import { describe, it, expect } from 'vitest'
import {
  findLatestSnapshotUrl,
  parseArchiveListing,
  parseSize,
  parseSnapshotLinks,
  selectLatestSnapshot,
  type FetchLike,
} from './index'
import { PortalError } from '@/lib/errors'

const BASE_URL = 'https://portal.example.com/cnpj/dados_abertos_cnpj/'

const ROOT_LISTING = `
<html><body><table>
<tr><th>Name</th><th>Last modified</th><th>Size</th></tr>
<tr><td><a href="/cnpj/">Parent Directory</a></td><td></td><td>-</td></tr>
<tr><td><a href="2023-12/">2023-12/</a></td><td>2024-01-10 10:00</td><td>-</td></tr>
<tr><td><a href="2024-02/">2024-02/</a></td><td>2024-02-12 10:00</td><td>-</td></tr>
<tr><td><a href="2024-01/">2024-01/</a></td><td>2024-01-15 10:00</td><td>-</td></tr>
<tr><td><a href="temp/">temp/</a></td><td>2024-01-15 10:00</td><td>-</td></tr>
</table></body></html>
`

const SNAPSHOT_LISTING = `
<table>
<tr><th valign="top"><img src="/icons/blank.gif"></th><th>Name</th><th>Last modified</th><th>Size</th></tr>
<tr><td valign="top"><img src="/icons/compressed.gif"></td><td><a href="Cnaes.zip">Cnaes.zip</a></td><td align="right">2024-02-10 03:12  </td><td align="right"> 22K</td></tr>
<tr><td valign="top"><img src="/icons/compressed.gif"></td><td><a href="Empresas0.zip">Empresas0.zip</a></td><td align="right">2024-02-10 03:14  </td><td align="right">360M</td></tr>
<tr><td valign="top"><img src="/icons/compressed.gif"></td><td><a href="Estabelecimentos0.ZIP">Estabelecimentos0.ZIP</a></td><td align="right">2024-02-10 03:20  </td><td align="right">1.4G</td></tr>
<tr><td valign="top"><img src="/icons/text.gif"></td><td><a href="LEIAME.txt">LEIAME.txt</a></td><td align="right">2024-02-10 03:20  </td><td align="right">2K</td></tr>
</table>
`

function fakeFetch(pages: Record<string, Response>): FetchLike {
  return async (url) => pages[url] ?? new Response('not found', { status: 404, statusText: 'Not Found' })
}

describe('open data portal', () => {
  describe('parseSize', () => {
    it('converts binary unit suffixes', () => {
      expect(parseSize('22K')).toBe(22 * 1024)
      expect(parseSize('360M')).toBe(360 * 1024 ** 2)
      expect(parseSize('1.4G')).toBe(Math.floor(1.4 * 1024 ** 3))
    })

    it('ignores surrounding whitespace and case', () => {
      expect(parseSize(' 5m ')).toBe(5 * 1024 ** 2)
    })

    it('treats a dash or empty cell as zero', () => {
      expect(parseSize('-')).toBe(0)
      expect(parseSize('')).toBe(0)
    })

    it('reads plain numbers as bytes', () => {
      expect(parseSize('512')).toBe(512)
    })

    it('treats unknown formats as zero', () => {
      expect(parseSize('12T')).toBe(0)
      expect(parseSize('abcM')).toBe(0)
    })
  })

  describe('snapshot selection', () => {
    it('finds only YYYY-MM folders', () => {
      expect(parseSnapshotLinks(ROOT_LISTING).map((link) => link.href)).toEqual([
        '2023-12/',
        '2024-02/',
        '2024-01/',
      ])
    })

    it('picks the latest year and month', () => {
      const latest = selectLatestSnapshot(parseSnapshotLinks(ROOT_LISTING))
      expect(latest).toEqual({ href: '2024-02/', year: 2024, month: 2 })
    })

    it('returns null for no links', () => {
      expect(selectLatestSnapshot([])).toBeNull()
    })
  })

  describe('findLatestSnapshotUrl', () => {
    it('resolves the latest folder against the base URL', async () => {
      const fetchImpl = fakeFetch({ [BASE_URL]: new Response(ROOT_LISTING) })
      await expect(findLatestSnapshotUrl(BASE_URL, fetchImpl)).resolves.toBe(`${BASE_URL}2024-02/`)
    })

    it('fails when the listing has no month folders', async () => {
      const fetchImpl = fakeFetch({ [BASE_URL]: new Response('<a href="temp/">temp</a>') })
      await expect(findLatestSnapshotUrl(BASE_URL, fetchImpl)).rejects.toThrow('No valid month links found')
    })

    it('reports HTTP failures with their status', async () => {
      const fetchImpl = fakeFetch({
        [BASE_URL]: new Response('error', { status: 503, statusText: 'Service Unavailable' }),
      })
      const error = await findLatestSnapshotUrl(BASE_URL, fetchImpl).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(PortalError)
      expect(error).toHaveProperty('statusCode', 503)
    })
  })

  describe('parseArchiveListing', () => {
    it('lists zip links with absolute URLs and advertised sizes', () => {
      const pageUrl = `${BASE_URL}2024-02/`
      expect(parseArchiveListing(SNAPSHOT_LISTING, pageUrl)).toEqual([
        { filename: 'Cnaes.zip', url: `${pageUrl}Cnaes.zip`, sizeBytes: 22 * 1024 },
        { filename: 'Empresas0.zip', url: `${pageUrl}Empresas0.zip`, sizeBytes: 360 * 1024 ** 2 },
        {
          filename: 'Estabelecimentos0.ZIP',
          url: `${pageUrl}Estabelecimentos0.ZIP`,
          sizeBytes: Math.floor(1.4 * 1024 ** 3),
        },
      ])
    })

    it('gives links outside a table row a size of zero', () => {
      const archives = parseArchiveListing('<p><a href="Socios1.zip">Socios1.zip</a></p>', BASE_URL)
      expect(archives).toEqual([{ filename: 'Socios1.zip', url: `${BASE_URL}Socios1.zip`, sizeBytes: 0 }])
    })
  })
})
