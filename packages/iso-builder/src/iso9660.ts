/**
 * ISO9660 structures with Rock Ridge (RRIP 1991A over SUSP) extensions.
 *
 * Layout, in 2048-byte logical blocks:
 *   0-15   system area
 *   16     primary volume descriptor
 *   17     volume descriptor set terminator
 *   18..   type L path table, then type M path table
 *   ..     directory extents, breadth-first from the root
 *   ..     file extents, in directory order
 */

import type { IsoTreeNode } from './types';

export const SECTOR_SIZE = 2048;
export const PVD_SECTOR = 16;
export const FIRST_PATH_TABLE_SECTOR = 18;
export const MAX_EXTENT_LENGTH = 0xffffffff;
const MAX_RECORD_LENGTH = 255;

const STANDARD_IDENTIFIER = 'CD001';

const RRIP_ID = 'RRIP_1991A';
const RRIP_DESCRIPTOR =
  'THE ROCK RIDGE INTERCHANGE PROTOCOL PROVIDES SUPPORT FOR POSIX FILE SYSTEM SEMANTICS';
const RRIP_SOURCE = 'SEE PUBLISHER IDENTIFIER';

const S_IFDIR = 0o040000;
const S_IFREG = 0o100000;

export interface IsoLayout {
  directories: IsoTreeNode[];
  files: IsoTreeNode[];
  pathTableSize: number;
  lPathTableSector: number;
  mPathTableSector: number;
  totalSectors: number;
}

export interface VolumeIdentifiers {
  volumeIdentifier: string;
  systemIdentifier: string;
  applicationIdentifier: string;
  createdAt: Date;
}

// d-characters: A-Z, 0-9 and "_"
function toDCharacters(value: string): string {
  return value.toUpperCase().replace(/[^A-Z0-9_]/g, '_');
}

export function isoFileName(name: string, taken: Set<string>): string {
  const dot = name.lastIndexOf('.');
  const base = toDCharacters(dot > 0 ? name.slice(0, dot) : name).slice(0, 8) || '_';
  const ext = dot > 0 ? toDCharacters(name.slice(dot + 1)).slice(0, 3) : '';

  return claim(taken, (suffix) => `${base.slice(0, 8 - suffix.length)}${suffix}.${ext};1`);
}

export function isoDirectoryName(name: string, taken: Set<string>): string {
  const base = toDCharacters(name).slice(0, 8) || '_';

  return claim(taken, (suffix) => `${base.slice(0, 8 - suffix.length)}${suffix}`);
}

function claim(taken: Set<string>, candidate: (suffix: string) => string): string {
  let name = candidate('');
  for (let n = 1; taken.has(name); n++) {
    name = candidate(String(n));
  }
  taken.add(name);
  return name;
}

export function compareIsoNames(a: IsoTreeNode, b: IsoTreeNode): number {
  return a.isoName < b.isoName ? -1 : a.isoName > b.isoName ? 1 : 0;
}

function writeBothEndian32(buf: Buffer, offset: number, value: number): void {
  buf.writeUInt32LE(value, offset);
  buf.writeUInt32BE(value, offset + 4);
}

function writeBothEndian16(buf: Buffer, offset: number, value: number): void {
  buf.writeUInt16LE(value, offset);
  buf.writeUInt16BE(value, offset + 2);
}

function writePadded(buf: Buffer, offset: number, length: number, value: string): void {
  buf.fill(0x20, offset, offset + length);
  buf.write(value.slice(0, length), offset, 'ascii');
}

function recordingDate(date: Date): Buffer {
  return Buffer.from([
    date.getUTCFullYear() - 1900,
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    0,
  ]);
}

function volumeDate(date: Date | undefined): Buffer {
  const buf = Buffer.alloc(17);
  if (!date) {
    buf.fill(0x30, 0, 16);
    return buf;
  }
  const pad = (value: number, width: number) => String(value).padStart(width, '0');
  const text =
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1, 2) +
    pad(date.getUTCDate(), 2) +
    pad(date.getUTCHours(), 2) +
    pad(date.getUTCMinutes(), 2) +
    pad(date.getUTCSeconds(), 2) +
    pad(Math.floor(date.getUTCMilliseconds() / 10), 2);
  buf.write(text, 0, 'ascii');
  return buf;
}

function suspEntry(signature: string, data: Buffer): Buffer {
  const entry = Buffer.alloc(4 + data.length);
  entry.write(signature, 0, 'ascii');
  entry[2] = entry.length;
  entry[3] = 1;
  data.copy(entry, 4);
  return entry;
}

function spEntry(): Buffer {
  return suspEntry('SP', Buffer.from([0xbe, 0xef, 0]));
}

function erEntry(): Buffer {
  const header = Buffer.from([RRIP_ID.length, RRIP_DESCRIPTOR.length, RRIP_SOURCE.length, 1]);
  return suspEntry(
    'ER',
    Buffer.concat([header, Buffer.from(RRIP_ID + RRIP_DESCRIPTOR + RRIP_SOURCE, 'ascii')])
  );
}

function pxEntry(node: IsoTreeNode): Buffer {
  const data = Buffer.alloc(32);
  const type = node.kind === 'directory' ? S_IFDIR : S_IFREG;
  const links =
    node.kind === 'directory'
      ? 2 + node.children.filter((child) => child.kind === 'directory').length
      : 1;
  writeBothEndian32(data, 0, type | (node.mode & 0o7777));
  writeBothEndian32(data, 8, links);
  writeBothEndian32(data, 16, 0);
  writeBothEndian32(data, 24, 0);
  return suspEntry('PX', data);
}

function nmEntry(name: string): Buffer {
  return suspEntry('NM', Buffer.concat([Buffer.from([0]), Buffer.from(name, 'utf8')]));
}

function tfEntry(mtime: Date): Buffer {
  // flags 0x02: modification time only
  return suspEntry('TF', Buffer.concat([Buffer.from([0x02]), recordingDate(mtime)]));
}

export function directoryRecord(
  identifier: Buffer,
  node: Pick<IsoTreeNode, 'extent' | 'dataLength' | 'kind' | 'mtime'>,
  systemUse: Buffer
): Buffer {
  const padding = identifier.length % 2 === 0 ? 1 : 0;
  let length = 33 + identifier.length + padding + systemUse.length;
  if (length % 2 === 1) length += 1;
  if (length > MAX_RECORD_LENGTH) {
    throw new RangeError(`directory record for "${identifier.toString('utf8')}" needs ${length} bytes`);
  }

  const record = Buffer.alloc(length);
  record[0] = length;
  writeBothEndian32(record, 2, node.extent);
  writeBothEndian32(record, 10, node.dataLength);
  recordingDate(node.mtime).copy(record, 18);
  record[25] = node.kind === 'directory' ? 0x02 : 0x00;
  writeBothEndian16(record, 28, 1);
  record[32] = identifier.length;
  identifier.copy(record, 33);
  systemUse.copy(record, 33 + identifier.length + padding);
  return record;
}

export function directoryRecords(dir: IsoTreeNode): Buffer[] {
  const isRoot = dir.parent === undefined;
  const parent = dir.parent ?? dir;

  const self = directoryRecord(
    Buffer.from([0x00]),
    dir,
    Buffer.concat(isRoot ? [spEntry(), pxEntry(dir), erEntry()] : [pxEntry(dir)])
  );
  const up = directoryRecord(Buffer.from([0x01]), parent, pxEntry(parent));

  const children = dir.children.map((child) =>
    directoryRecord(
      Buffer.from(child.isoName, 'ascii'),
      child,
      Buffer.concat([pxEntry(child), nmEntry(child.name), tfEntry(child.mtime)])
    )
  );

  return [self, up, ...children];
}

/** Records may not straddle a sector boundary; the remainder of a sector is zero-filled. */
export function packRecords(records: Buffer[]): Buffer {
  let offset = 0;
  const placements: Array<[Buffer, number]> = [];
  for (const record of records) {
    const room = SECTOR_SIZE - (offset % SECTOR_SIZE);
    if (record.length > room) offset += room;
    placements.push([record, offset]);
    offset += record.length;
  }

  const extent = Buffer.alloc(Math.max(1, Math.ceil(offset / SECTOR_SIZE)) * SECTOR_SIZE);
  for (const [record, position] of placements) {
    record.copy(extent, position);
  }
  return extent;
}

function pathTableIdentifier(dir: IsoTreeNode): Buffer {
  return dir.parent === undefined ? Buffer.from([0x00]) : Buffer.from(dir.isoName, 'ascii');
}

export function pathTable(directories: IsoTreeNode[], littleEndian: boolean): Buffer {
  const entries = directories.map((dir) => {
    const identifier = pathTableIdentifier(dir);
    const entry = Buffer.alloc(8 + identifier.length + (identifier.length % 2));
    entry[0] = identifier.length;
    const parentIndex = dir.parent?.pathTableIndex ?? 1;
    if (littleEndian) {
      entry.writeUInt32LE(dir.extent, 2);
      entry.writeUInt16LE(parentIndex, 6);
    } else {
      entry.writeUInt32BE(dir.extent, 2);
      entry.writeUInt16BE(parentIndex, 6);
    }
    identifier.copy(entry, 8);
    return entry;
  });
  return Buffer.concat(entries);
}

function sectorsFor(bytes: number): number {
  return Math.ceil(bytes / SECTOR_SIZE);
}

/** Breadth-first directory order; this is also the path table order. */
function collectDirectories(root: IsoTreeNode): IsoTreeNode[] {
  const directories: IsoTreeNode[] = [];
  const queue = [root];
  while (queue.length > 0) {
    const dir = queue.shift();
    if (!dir) break;
    dir.pathTableIndex = directories.length + 1;
    directories.push(dir);
    queue.push(...dir.children.filter((child) => child.kind === 'directory'));
  }
  return directories;
}

export function computeLayout(root: IsoTreeNode): IsoLayout {
  const directories = collectDirectories(root);
  const files = directories.flatMap((dir) => dir.children.filter((child) => child.kind === 'file'));

  const pathTableSize = pathTable(directories, true).length;
  const pathTableSectors = sectorsFor(pathTableSize);
  const lPathTableSector = FIRST_PATH_TABLE_SECTOR;
  const mPathTableSector = lPathTableSector + pathTableSectors;

  let sector = mPathTableSector + pathTableSectors;
  for (const dir of directories) {
    dir.extent = sector;
    dir.dataLength = packRecords(directoryRecords(dir)).length;
    sector += sectorsFor(dir.dataLength);
  }

  for (const file of files) {
    // Empty files occupy no sectors and point at extent 0.
    file.extent = file.size === 0 ? 0 : sector;
    file.dataLength = file.size;
    sector += sectorsFor(file.size);
  }

  return {
    directories,
    files,
    pathTableSize,
    lPathTableSector,
    mPathTableSector,
    totalSectors: sector,
  };
}

export function primaryVolumeDescriptor(
  layout: IsoLayout,
  root: IsoTreeNode,
  ids: VolumeIdentifiers
): Buffer {
  const pvd = Buffer.alloc(SECTOR_SIZE);
  pvd[0] = 1;
  pvd.write(STANDARD_IDENTIFIER, 1, 'ascii');
  pvd[6] = 1;
  writePadded(pvd, 8, 32, ids.systemIdentifier);
  writePadded(pvd, 40, 32, ids.volumeIdentifier);
  writeBothEndian32(pvd, 80, layout.totalSectors);
  writeBothEndian16(pvd, 120, 1);
  writeBothEndian16(pvd, 124, 1);
  writeBothEndian16(pvd, 128, SECTOR_SIZE);
  writeBothEndian32(pvd, 132, layout.pathTableSize);
  pvd.writeUInt32LE(layout.lPathTableSector, 140);
  pvd.writeUInt32BE(layout.mPathTableSector, 148);
  directoryRecord(Buffer.from([0x00]), root, Buffer.alloc(0)).copy(pvd, 156);
  writePadded(pvd, 190, 128, '');
  writePadded(pvd, 318, 128, '');
  writePadded(pvd, 446, 128, '');
  writePadded(pvd, 574, 128, ids.applicationIdentifier);
  writePadded(pvd, 702, 37, '');
  writePadded(pvd, 739, 37, '');
  writePadded(pvd, 776, 37, '');
  volumeDate(ids.createdAt).copy(pvd, 813);
  volumeDate(ids.createdAt).copy(pvd, 830);
  volumeDate(undefined).copy(pvd, 847);
  volumeDate(undefined).copy(pvd, 864);
  pvd[881] = 1;
  return pvd;
}

export function volumeDescriptorSetTerminator(): Buffer {
  const terminator = Buffer.alloc(SECTOR_SIZE);
  terminator[0] = 255;
  terminator.write(STANDARD_IDENTIFIER, 1, 'ascii');
  terminator[6] = 1;
  return terminator;
}
