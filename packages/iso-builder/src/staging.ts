import * as fs from 'fs/promises';
import * as path from 'path';

export async function createWorkDir(parentDir: string, prefix: string): Promise<string> {
  await fs.mkdir(parentDir, { recursive: true });
  return fs.mkdtemp(path.join(parentDir, `${prefix}-`));
}

/**
 * Writes each `relative path -> content` pair below `workDir`. Paths that
 * would land outside `workDir` are rejected.
 */
export async function stageFiles(workDir: string, files: Record<string, string | Buffer>): Promise<string[]> {
  const written: string[] = [];

  for (const [name, content] of Object.entries(files)) {
    const target = path.resolve(workDir, name);
    const relative = path.relative(workDir, target);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Refusing to stage ${name}: outside of ${workDir}`);
    }

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, { mode: 0o644 });
    written.push(target);
  }

  return written;
}

export async function stageDirectory(workDir: string, sourceDir: string): Promise<void> {
  await fs.cp(sourceDir, workDir, { recursive: true });
}

export async function removeWorkDir(workDir: string): Promise<void> {
  await fs.rm(workDir, { recursive: true, force: true });
}
