import { ToolExecutionError } from '../core/errors.js';
import type { WorkspacePort } from '../workspaces/workspace.js';
import { NodeFsWorkspace } from '../workspaces/node-fs-workspace.js';
import { ToolArgs } from './args.js';
import type { ToolBackend, ToolDefinition } from './tool-types.js';

function utf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes);
}
function toBytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

export function createFsTools(workspace: WorkspacePort): ToolDefinition[] {
  return [
    {
      name: 'file_read',
      description: 'Read a UTF-8 text file',
      inputSchema: {
        type: 'object',
        properties: { path: { type: 'string', description: 'Path relative to the workspace root' } },
        required: ['path'],
        additionalProperties: false,
      },
      execute: async (raw) => {
        const path = new ToolArgs('file_read', raw).string('path');
        const st = await workspace.stat(path);
        if (!st) throw new ToolExecutionError('file_read', `no such file: ${path}`);
        if (!st.isFile) throw new ToolExecutionError('file_read', `not a file: ${path}`);
        return utf8(await workspace.readFile(path));
      },
    },
    {
      name: 'file_write',
      description: 'Write a UTF-8 text file, creating directories if needed',
      inputSchema: {
        type: 'object',
        properties: {
          path: { type: 'string', description: 'Path relative to the workspace root' },
          content: { type: 'string', description: 'File contents' },
        },
        required: ['path', 'content'],
        additionalProperties: false,
      },
      execute: async (raw) => {
        const args = new ToolArgs('file_write', raw);
        const bytes = toBytes(args.string('content'));
        await workspace.writeFile(args.string('path'), bytes);
        return { success: true, bytes: bytes.byteLength };
      },
    },
    {
      name: 'file_delete',
      description: 'Delete a file or directory',
      inputSchema: {
        type: 'object',
        properties: { path: { type: 'string', description: 'Path relative to the workspace root' } },
        required: ['path'],
        additionalProperties: false,
      },
      execute: async (raw) => {
        const path = new ToolArgs('file_delete', raw).string('path');
        if (!(await workspace.stat(path))) throw new ToolExecutionError('file_delete', `no such file: ${path}`);
        await workspace.deletePath(path);
        return { success: true };
      },
    },
    {
      name: 'list_directory',
      description: 'List the entries of a directory',
      inputSchema: {
        type: 'object',
        properties: { path: { type: 'string', description: 'Directory relative to the workspace root; defaults to the root' } },
        additionalProperties: false,
      },
      execute: async (raw) => {
        const path = new ToolArgs('list_directory', raw).optionalString('path') ?? '.';
        const entries = await workspace.listDirectory(path);
        return entries.map((e) => ({
          name: e.name,
          kind: e.kind,
          size: e.size ?? null,
          modified: e.mtimeMs === undefined ? null : new Date(e.mtimeMs).toISOString(),
        }));
      },
    },
  ];
}

export function createFileBackend(rootDir: string): ToolBackend {
  return { name: 'file', version: '0.1.0', tools: createFsTools(new NodeFsWorkspace(rootDir)) };
}
