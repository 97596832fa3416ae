export * from './types';
export * from './builder';
export * from './reader';
export * from './staging';
export { SECTOR_SIZE, isoFileName, isoDirectoryName } from './iso9660';
