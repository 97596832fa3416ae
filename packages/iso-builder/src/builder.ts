import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import pino, { type Logger } from 'pino';
import { BuildError, IImageBuilder, ImageSpec } from '@vmboot/core';
import {
  computeLayout,
  compareIsoNames,
  directoryRecords,
  isoDirectoryName,
  isoFileName,
  IsoLayout,
  MAX_EXTENT_LENGTH,
  packRecords,
  pathTable,
  primaryVolumeDescriptor,
  PVD_SECTOR,
  SECTOR_SIZE,
  volumeDescriptorSetTerminator,
} from './iso9660';
import { IsoBuilderOptions, IsoTreeNode } from './types';

// Smallest container the ISO9660 structures fit in. The file is only
// truncated to this size up front; it grows to whatever the content needs.
export const MIN_IMAGE_SIZE = 38 * 1024;

const COPY_CHUNK_SIZE = 1024 * 1024;

export class IsoBuilder implements IImageBuilder {
  private logger: Logger;
  private now: () => Date;

  constructor(private options: IsoBuilderOptions = {}) {
    this.logger = options.logger ?? pino({ name: 'iso-builder' });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Builds a closed ISO9660 image with Rock Ridge extensions at `outputPath`
   * from the contents of `workDir`. An existing image at `outputPath` is
   * overwritten.
   */
  async create(outputPath: string, workDir: string, volumeLabel: string): Promise<void> {
    const handle = await this.allocate(outputPath);

    try {
      const root = await this.format(outputPath, workDir, volumeLabel);
      const layout = await this.finalize(handle, outputPath, root, volumeLabel);
      this.logger.info(
        { outputPath, volumeLabel, files: layout.files.length, sizeBytes: layout.totalSectors * SECTOR_SIZE },
        'ISO image finalized'
      );
    } catch (error) {
      await this.discard(handle, outputPath);
      throw error;
    }

    await handle.close();
  }

  /** Closes and removes a partial image. Cleanup failures are logged; the build error wins. */
  private async discard(handle: FileHandle, outputPath: string): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      this.logger.warn({ err: error, outputPath }, 'Failed to close partial image');
    }
    try {
      await fs.rm(outputPath, { force: true });
    } catch (error) {
      this.logger.warn({ err: error, outputPath }, 'Failed to remove partial image');
    }
  }

  private async allocate(outputPath: string): Promise<FileHandle> {
    let handle: FileHandle;
    try {
      handle = await fs.open(outputPath, 'w');
    } catch (error) {
      throw new BuildError('AllocationFailed', outputPath, 'cannot create image file', { cause: error });
    }

    try {
      await handle.truncate(MIN_IMAGE_SIZE);
    } catch (error) {
      await handle.close();
      throw new BuildError('AllocationFailed', outputPath, 'cannot size image file', { cause: error });
    }

    return handle;
  }

  private async format(outputPath: string, workDir: string, volumeLabel: string): Promise<IsoTreeNode> {
    const spec = ImageSpec.safeParse({ workDir, volumeLabel, outputPath });
    if (!spec.success) {
      const issues = spec.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new BuildError('FormatFailed', outputPath, `invalid image spec (${issues.join(', ')})`);
    }

    let root: IsoTreeNode;
    try {
      const stat = await fs.stat(workDir);
      if (!stat.isDirectory()) {
        throw new Error(`${workDir} is not a directory`);
      }
      root = this.node('', '', 'directory', workDir, stat.size, stat.mode, stat.mtime);
      await this.scan(root);
    } catch (error) {
      throw new BuildError('FormatFailed', outputPath, `cannot read work directory ${workDir}`, { cause: error });
    }

    try {
      // Sizes every directory extent; fails for names Rock Ridge records cannot hold.
      computeLayout(root);
    } catch (error) {
      throw new BuildError('FormatFailed', outputPath, 'cannot lay out filesystem', { cause: error });
    }

    return root;
  }

  private async finalize(
    handle: FileHandle,
    outputPath: string,
    root: IsoTreeNode,
    volumeLabel: string
  ): Promise<IsoLayout> {
    try {
      const layout = computeLayout(root);
      const oversized = layout.files.find((file) => file.size > MAX_EXTENT_LENGTH);
      if (oversized) {
        throw new Error(`${oversized.sourcePath} exceeds the maximum extent length`);
      }

      const pvd = primaryVolumeDescriptor(layout, root, {
        volumeIdentifier: volumeLabel,
        systemIdentifier: this.options.systemIdentifier ?? 'LINUX',
        applicationIdentifier: this.options.applicationIdentifier ?? 'VMEDIA-BOOT',
        createdAt: this.now(),
      });
      await this.writeAt(handle, pvd, PVD_SECTOR);
      await this.writeAt(handle, volumeDescriptorSetTerminator(), PVD_SECTOR + 1);
      await this.writeAt(handle, pathTable(layout.directories, true), layout.lPathTableSector);
      await this.writeAt(handle, pathTable(layout.directories, false), layout.mPathTableSector);

      for (const dir of layout.directories) {
        await this.writeAt(handle, packRecords(directoryRecords(dir)), dir.extent);
      }

      for (const file of layout.files) {
        await this.copyFile(handle, file);
      }

      await handle.truncate(layout.totalSectors * SECTOR_SIZE);
      await handle.sync();
      return layout;
    } catch (error) {
      throw new BuildError('FinalizeFailed', outputPath, 'cannot write filesystem', { cause: error });
    }
  }

  private async scan(dir: IsoTreeNode): Promise<void> {
    const entries = await fs.readdir(dir.sourcePath, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const taken = new Set<string>();
    for (const entry of entries) {
      const sourcePath = path.join(dir.sourcePath, entry.name);

      if (entry.isDirectory()) {
        const stat = await fs.stat(sourcePath);
        const isoName = isoDirectoryName(entry.name, taken);
        const child = this.node(entry.name, isoName, 'directory', sourcePath, 0, stat.mode, stat.mtime);
        child.parent = dir;
        dir.children.push(child);
        await this.scan(child);
      } else if (entry.isFile()) {
        const stat = await fs.stat(sourcePath);
        const isoName = isoFileName(entry.name, taken);
        const child = this.node(entry.name, isoName, 'file', sourcePath, stat.size, stat.mode, stat.mtime);
        child.parent = dir;
        dir.children.push(child);
      } else {
        this.logger.debug({ path: sourcePath }, 'Skipping entry that is neither a file nor a directory');
      }
    }

    dir.children.sort(compareIsoNames);
  }

  private node(
    name: string,
    isoName: string,
    kind: IsoTreeNode['kind'],
    sourcePath: string,
    size: number,
    mode: number,
    mtime: Date
  ): IsoTreeNode {
    return {
      name,
      isoName,
      kind,
      sourcePath,
      size: kind === 'file' ? size : 0,
      mode,
      mtime,
      children: [],
      extent: 0,
      dataLength: 0,
      pathTableIndex: 0,
    };
  }

  private async writeAt(handle: FileHandle, data: Buffer, sector: number): Promise<void> {
    await handle.write(data, 0, data.length, sector * SECTOR_SIZE);
  }

  private async copyFile(handle: FileHandle, file: IsoTreeNode): Promise<void> {
    const source = await fs.open(file.sourcePath, 'r');
    try {
      const chunk = Buffer.alloc(Math.min(COPY_CHUNK_SIZE, Math.max(file.size, 1)));
      let copied = 0;
      while (copied < file.size) {
        const { bytesRead } = await source.read(chunk, 0, Math.min(chunk.length, file.size - copied), copied);
        if (bytesRead === 0) {
          throw new Error(`${file.sourcePath} shrank while it was being packaged`);
        }
        await handle.write(chunk, 0, bytesRead, file.extent * SECTOR_SIZE + copied);
        copied += bytesRead;
      }
    } finally {
      await source.close();
    }
  }
}
