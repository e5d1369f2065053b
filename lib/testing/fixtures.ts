/**
 * Test fixtures: small snapshot files and archives built on the fly
 */

import archiver from 'archiver'
import { createWriteStream, promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

export interface ArchiveEntry {
  name: string
  content: string
}

/**
 * Quote and join fields the way the published files are written
 */
export function csvLine(fields: readonly string[]): string {
  return fields.map((field) => `"${field}"`).join(';')
}

export function csvContent(rows: readonly (readonly string[])[]): string {
  return rows.map(csvLine).join('\n') + '\n'
}

export async function makeTempDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(join(tmpdir(), `${prefix}-`))
}

/**
 * Write a text file in the source encoding
 */
export async function writeLatin1(path: string, content: string): Promise<void> {
  await fs.writeFile(path, Buffer.from(content, 'latin1'))
}

/**
 * Write a ZIP archive whose entries are latin-1 encoded text
 */
export async function writeZip(path: string, entries: readonly ArchiveEntry[]): Promise<void> {
  const output = createWriteStream(path)
  const archive = archiver('zip')

  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve())
    output.on('error', reject)
    archive.on('error', reject)
  })

  archive.pipe(output)
  for (const entry of entries) {
    archive.append(Buffer.from(entry.content, 'latin1'), { name: entry.name })
  }
  await archive.finalize()
  await closed
}

export function companyRow(cnpjBasico: string, razaoSocial: string, capital: string): string[] {
  return [cnpjBasico, razaoSocial, '2062', '49', capital, '01', '']
}

/**
 * Establishment row with the 30 published fields
 */
export function establishmentRow(
  cnpjBasico: string,
  ordem: string,
  dv: string,
  matrizFilial: string,
  nomeFantasia: string
): string[] {
  return [
    cnpjBasico, ordem, dv, matrizFilial, nomeFantasia,
    '02', '20200101', '00', '', '',
    '20100315', '4711302', '', 'RUA', 'DAS FLORES',
    '100', '', 'CENTRO', '01001000', 'SP',
    '7107', '11', '30000000', '', '',
    '', '', 'contato@example.com', '', '',
  ]
}

export function partnerRow(cnpjBasico: string, nome: string, documento: string): string[] {
  return [cnpjBasico, '2', nome, documento, '49', '20150101', '', '***000000**', '', '00', '4']
}

export function simplesRow(cnpjBasico: string, opcao: string): string[] {
  return [cnpjBasico, opcao, '20180101', '00000000', 'N', '00000000', '00000000']
}

/**
 * Archives of a small but complete snapshot. Two code tables are included;
 * the other four are absent.
 */
export const SNAPSHOT_ARCHIVES: Record<string, ArchiveEntry[]> = {
  'Empresas0.zip': [
    {
      name: 'K3241.K03200Y0.D30610.EMPRECSV',
      content: csvContent([
        companyRow('11222333', 'ACME COMERCIO LTDA', '1.234,56'),
        companyRow('44555666', 'PADARIA SÃO JOSÉ', '5000,00'),
      ]),
    },
  ],
  'Estabelecimentos0.zip': [
    {
      name: 'K3241.K03200Y0.D30610.ESTABELE',
      content: csvContent([
        establishmentRow('11222333', '0001', '91', '1', 'ACME'),
        establishmentRow('11222333', '0002', '72', '2', 'ACME FILIAL'),
        establishmentRow('44555666', '0001', '05', '1', 'PADARIA'),
      ]),
    },
  ],
  'Socios0.zip': [
    {
      name: 'K3241.K03200Y0.D30610.SOCIOCSV',
      content: csvContent([
        partnerRow('11222333', 'MARIA SILVA', '***123456**'),
        partnerRow('11222333', 'JOAO SOUZA', '***654321**'),
        partnerRow('44555666', 'ANA LIMA', '***111222**'),
      ]),
    },
  ],
  'Simples.zip': [
    {
      name: 'F.K03200$W.SIMPLES.CSV.D30610',
      content: csvContent([simplesRow('11222333', 'S'), simplesRow('44555666', 'N')]),
    },
  ],
  'Cnaes.zip': [
    {
      name: 'F.K03200$Z.D30610.CNAECSV',
      content: csvContent([
        ['0111301', 'Cultivo de arroz'],
        ['0134200', 'Cultivo de café'],
        ['4711302', 'Comércio varejista de mercadorias em geral'],
      ]),
    },
  ],
  'Municipios.zip': [
    {
      name: 'F.K03200$Z.D30610.MUNICCSV',
      content: csvContent([
        ['7107', 'SAO PAULO'],
        ['6001', 'RIO DE JANEIRO'],
      ]),
    },
  ],
}

/**
 * Write every snapshot archive into dir
 */
export async function writeSnapshotArchives(dir: string): Promise<string[]> {
  const paths: string[] = []
  for (const [name, entries] of Object.entries(SNAPSHOT_ARCHIVES)) {
    const path = join(dir, name)
    await writeZip(path, entries)
    paths.push(path)
  }
  return paths
}
