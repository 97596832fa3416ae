import * as fs from 'fs/promises';
import { PVD_SECTOR, SECTOR_SIZE } from './iso9660';
import { IsoEntry } from './types';

interface RawRecord {
  extent: number;
  dataLength: number;
  isDirectory: boolean;
  identifier: Buffer;
  systemUse: Buffer;
}

interface SuspEntry {
  signature: string;
  data: Buffer;
}

/**
 * Reads back images produced by IsoBuilder (and other single-extent ISO9660
 * images). Rock Ridge names and modes are used when the root carries an SP entry.
 */
export class IsoImageReader {
  readonly volumeIdentifier: string;
  readonly volumeSpaceSize: number;
  readonly rockRidge: boolean;
  private root: RawRecord;

  private constructor(private image: Buffer) {
    const pvd = PVD_SECTOR * SECTOR_SIZE;
    if (image.length < pvd + SECTOR_SIZE) {
      throw new Error('image is too small to hold a primary volume descriptor');
    }
    if (image[pvd] !== 1 || image.toString('ascii', pvd + 1, pvd + 6) !== 'CD001') {
      throw new Error('no ISO9660 primary volume descriptor at sector 16');
    }

    this.volumeIdentifier = image.toString('ascii', pvd + 40, pvd + 72).trimEnd();
    this.volumeSpaceSize = image.readUInt32LE(pvd + 80);
    this.root = this.parseRecord(pvd + 156);

    const [self] = this.readDirectory(this.root);
    this.rockRidge = self !== undefined && parseSystemUse(self.systemUse)[0]?.signature === 'SP';
  }

  static async open(imagePath: string): Promise<IsoImageReader> {
    return new IsoImageReader(await fs.readFile(imagePath));
  }

  /** Every file and directory below the root, depth first in directory order. */
  list(): IsoEntry[] {
    const entries: IsoEntry[] = [];
    this.walk(this.root, '', entries);
    return entries;
  }

  readFile(filePath: string): Buffer {
    const entry = this.list().find((candidate) => candidate.path === filePath);
    if (!entry || entry.kind !== 'file') {
      throw new Error(`${filePath}: no such file in image`);
    }
    const start = entry.extent * SECTOR_SIZE;
    return Buffer.from(this.image.subarray(start, start + entry.size));
  }

  private walk(dir: RawRecord, prefix: string, entries: IsoEntry[]): void {
    for (const record of this.readDirectory(dir).slice(2)) {
      const entryPath = `${prefix}/${this.nameOf(record)}`;
      entries.push({
        path: entryPath,
        name: this.nameOf(record),
        kind: record.isDirectory ? 'directory' : 'file',
        size: record.dataLength,
        extent: record.extent,
        mode: this.modeOf(record),
      });
      if (record.isDirectory) {
        this.walk(record, entryPath, entries);
      }
    }
  }

  private readDirectory(dir: RawRecord): RawRecord[] {
    const records: RawRecord[] = [];
    const start = dir.extent * SECTOR_SIZE;
    const end = start + dir.dataLength;
    let offset = start;
    while (offset < end) {
      const length = this.image[offset];
      if (length === 0) {
        // Padding up to the next sector.
        offset = start + (Math.floor((offset - start) / SECTOR_SIZE) + 1) * SECTOR_SIZE;
        continue;
      }
      records.push(this.parseRecord(offset));
      offset += length;
    }
    return records;
  }

  private parseRecord(offset: number): RawRecord {
    const length = this.image[offset];
    const identifierLength = this.image[offset + 32];
    const identifierStart = offset + 33;
    const systemUseStart = identifierStart + identifierLength + (identifierLength % 2 === 0 ? 1 : 0);

    return {
      extent: this.image.readUInt32LE(offset + 2),
      dataLength: this.image.readUInt32LE(offset + 10),
      isDirectory: (this.image[offset + 25] & 0x02) !== 0,
      identifier: this.image.subarray(identifierStart, identifierStart + identifierLength),
      systemUse: this.image.subarray(systemUseStart, offset + length),
    };
  }

  private nameOf(record: RawRecord): string {
    if (this.rockRidge) {
      const parts = parseSystemUse(record.systemUse)
        .filter((entry) => entry.signature === 'NM')
        .map((entry) => entry.data.subarray(1).toString('utf8'));
      if (parts.length > 0) return parts.join('');
    }
    return record.identifier.toString('ascii').replace(/;\d+$/, '').replace(/\.$/, '');
  }

  private modeOf(record: RawRecord): number | undefined {
    if (!this.rockRidge) return undefined;
    const px = parseSystemUse(record.systemUse).find((entry) => entry.signature === 'PX');
    return px ? px.data.readUInt32LE(0) : undefined;
  }
}

function parseSystemUse(systemUse: Buffer): SuspEntry[] {
  const entries: SuspEntry[] = [];
  let offset = 0;
  while (offset + 4 <= systemUse.length) {
    const length = systemUse[offset + 2];
    if (length < 4 || offset + length > systemUse.length) break;
    const signature = systemUse.toString('ascii', offset, offset + 2);
    if (signature === 'ST') break;
    entries.push({ signature, data: systemUse.subarray(offset + 4, offset + length) });
    offset += length;
  }
  return entries;
}
