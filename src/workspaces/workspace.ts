export interface StatLike {
  isFile: boolean;
  isDirectory: boolean;
  mtimeMs?: number;
  size?: number;
}

export interface DirectoryEntry {
  name: string;
  kind: 'file' | 'directory' | 'other';
  size?: number;
  mtimeMs?: number;
}

/** Paths are relative to the workspace root and may not leave it. */
export interface WorkspacePort {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, contents: Uint8Array): Promise<void>;
  deletePath(path: string): Promise<void>;
  stat(path: string): Promise<StatLike | null>;
  listDirectory(path: string): Promise<DirectoryEntry[]>;
}
