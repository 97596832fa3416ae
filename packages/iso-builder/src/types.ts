import type { Logger } from 'pino';

export type IsoNodeKind = 'file' | 'directory';

export interface IsoTreeNode {
  /** Name as staged; recorded in the Rock Ridge NM entry. */
  name: string;
  /** ISO9660 identifier (8.3 d-characters, ";1" version on files). */
  isoName: string;
  kind: IsoNodeKind;
  sourcePath: string;
  size: number;
  mode: number;
  mtime: Date;
  children: IsoTreeNode[];
  parent?: IsoTreeNode;
  extent: number;
  dataLength: number;
  pathTableIndex: number;
}

export interface IsoBuilderOptions {
  logger?: Logger;
  /** Clock used for the volume creation date. */
  now?: () => Date;
  systemIdentifier?: string;
  applicationIdentifier?: string;
}

export interface IsoEntry {
  path: string;
  name: string;
  kind: IsoNodeKind;
  size: number;
  extent: number;
  /** POSIX mode from Rock Ridge PX, when present. */
  mode?: number;
}
