import { mkdir, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { ToolhubError } from '../core/errors.js';
import type { DirectoryEntry, StatLike, WorkspacePort } from './workspace.js';

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class NodeFsWorkspace implements WorkspacePort {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  /** Absolute path inside the root; throws for anything that would escape it. */
  resolve(path: string): string {
    const abs = resolve(this.rootDir, path);
    const rel = relative(this.rootDir, abs);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new ToolhubError(`Path escapes the workspace root: ${path}`);
    }
    return abs;
  }

  async readFile(path: string): Promise<Uint8Array> {
    return readFile(this.resolve(path));
  }

  async writeFile(path: string, contents: Uint8Array): Promise<void> {
    const abs = this.resolve(path);
    await mkdir(dirname(abs), { recursive: true });
    await writeFile(abs, contents);
  }

  async deletePath(path: string): Promise<void> {
    const abs = this.resolve(path);
    if (abs === this.rootDir) throw new ToolhubError('Refusing to delete the workspace root');
    await rm(abs, { recursive: true });
  }

  async stat(path: string): Promise<StatLike | null> {
    try {
      const s = await stat(this.resolve(path));
      return { isFile: s.isFile(), isDirectory: s.isDirectory(), mtimeMs: s.mtimeMs, size: s.size };
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async listDirectory(path: string): Promise<DirectoryEntry[]> {
    const dir = this.resolve(path);
    const entries = await readdir(dir, { withFileTypes: true });
    const listed = await Promise.all(
      entries.map(async (d): Promise<DirectoryEntry> => {
        // a dangling symlink is listed without size or time
        const info = await stat(join(dir, d.name)).catch((e: unknown) => {
          if (isNotFound(e)) return null;
          throw e;
        });
        const kind = d.isFile() ? 'file' : d.isDirectory() ? 'directory' : 'other';
        return { name: d.name, kind, size: info?.size, mtimeMs: info?.mtimeMs };
      })
    );
    return listed.sort((a, b) => a.name.localeCompare(b.name));
  }
}
