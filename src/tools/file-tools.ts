/**
 * File tools confined to a root directory
 *
 * Every path is resolved against the root, and again after following
 * symlinks; anything that lands outside it is refused.
 */

import fs from 'node:fs/promises';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { AuthorizationError, ValidationError } from '../errors.js';
import type { Logger } from '../logger.js';
import { textResult } from '../tool-registry.js';
import type { ToolResult } from '../types/tools.js';
import { BaseToolProvider, defineTool, optionalBoolean, optionalInteger, optionalString, requireString } from './provider.js';

export type FileEntryType = 'directory' | 'file' | 'symlink' | 'other';

export interface FileEntry {
  name: string;
  type: FileEntryType;
  /** Files only */
  size?: number;
  permissions: string;
  modified: Date;
  hidden: boolean;
}

export interface FileToolsOptions {
  root: string;
  maxFileSize: number;
  logger?: Logger;
}

const ENCODINGS = ['utf-8', 'utf8', 'ascii', 'latin1', 'base64', 'hex', 'utf16le'] as const;
type FileEncoding = (typeof ENCODINGS)[number];

function isEncoding(value: string): value is FileEncoding {
  return ENCODINGS.some((encoding) => encoding === value);
}

export function formatPermissions(mode: number): string {
  const flags = 'rwxrwxrwx';
  let out = '';
  for (let bit = 0; bit < 9; bit++) {
    out += mode & (0o400 >> bit) ? flags[bit] : '-';
  }
  return out;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 ** 2) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 ** 3) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  return `${(bytes / 1024 ** 3).toFixed(1)} GB`;
}

function entryType(stats: Stats): FileEntryType {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FileTools extends BaseToolProvider {
  readonly name = 'files';
  private readonly root: string;
  private readonly maxFileSize: number;

  constructor(options: FileToolsOptions) {
    super(options.logger);
    this.root = path.resolve(options.root);
    this.maxFileSize = options.maxFileSize;

    this.addTool(
      defineTool('list_files', 'List a directory with type, size, permissions and modification time', {
        path: { type: 'string', description: 'Directory relative to the file root', default: '.' },
        include_hidden: { type: 'boolean', description: 'Include dot-files', default: false },
      }),
      async (args) =>
        this.listFiles(optionalString(args, 'path') ?? '.', optionalBoolean(args, 'include_hidden', false))
    );
    this.addTool(
      defineTool(
        'read_file',
        'Read a text file under the file root',
        {
          path: { type: 'string', description: 'File relative to the file root' },
          encoding: { type: 'string', description: 'Text encoding', default: 'utf-8', enum: [...ENCODINGS] },
          max_size: { type: 'integer', description: 'Refuse files larger than this many bytes' },
        },
        ['path']
      ),
      async (args) =>
        this.readFile(
          requireString(args, 'path'),
          optionalString(args, 'encoding') ?? 'utf-8',
          optionalInteger(args, 'max_size', this.maxFileSize, 1)
        )
    );
  }

  private async listFiles(requested: string, includeHidden: boolean): Promise<ToolResult> {
    const dir = await this.resolve(requested);
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      return textResult(`Error: ${requested} is not a directory`, true);
    }

    const entries: FileEntry[] = [];
    for (const name of await fs.readdir(dir)) {
      const hidden = name.startsWith('.');
      if (hidden && !includeHidden) {
        continue;
      }
      const info = await fs.lstat(path.join(dir, name));
      const type = entryType(info);
      entries.push({
        name,
        type,
        size: type === 'file' ? info.size : undefined,
        permissions: formatPermissions(info.mode),
        modified: info.mtime,
        hidden,
      });
    }

    entries.sort((a, b) => {
      if ((a.type === 'directory') !== (b.type === 'directory')) {
        return a.type === 'directory' ? -1 : 1;
      }
      return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
    });

    const lines = [`Directory: ${requested}`, `Total items: ${entries.length}`];
    if (entries.length === 0) {
      lines.push('', 'Directory is empty');
    } else {
      lines.push('');
      for (const entry of entries) {
        const details: string[] = [entry.type];
        if (entry.size !== undefined) details.push(formatSize(entry.size));
        details.push(entry.permissions, `modified ${entry.modified.toISOString()}`);
        const suffix = entry.type === 'directory' ? '/' : '';
        lines.push(`- ${entry.name}${suffix}${entry.hidden ? ' (hidden)' : ''}  (${details.join(', ')})`);
      }
    }
    return textResult(lines.join('\n'));
  }

  private async readFile(requested: string, encoding: string, maxSize: number): Promise<ToolResult> {
    if (!isEncoding(encoding)) {
      throw new ValidationError(`'encoding' must be one of ${ENCODINGS.join(', ')}`, { field: 'encoding' });
    }

    const file = await this.resolve(requested);
    const stats = await fs.stat(file);
    if (!stats.isFile()) {
      return textResult(`Error: ${requested} is not a file`, true);
    }

    const limit = Math.min(maxSize, this.maxFileSize);
    if (stats.size > limit) {
      return textResult(
        `Error: File size (${stats.size} bytes) exceeds maximum allowed size (${limit} bytes)`,
        true
      );
    }

    const buffer = await fs.readFile(file);
    let content: string;
    if (encoding === 'utf-8' || encoding === 'utf8') {
      try {
        content = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
      } catch {
        return textResult(`Error: Cannot decode ${requested} as ${encoding}`, true);
      }
    } else {
      content = buffer.toString(encoding);
    }

    return textResult(
      [
        `File: ${requested}`,
        `Size: ${stats.size} bytes`,
        `Encoding: ${encoding}`,
        `Permissions: ${formatPermissions(stats.mode)}`,
        `Modified: ${stats.mtime.toISOString()}`,
        '',
        content,
      ].join('\n')
    );
  }

  /**
   * Map a client path onto the root, following symlinks
   *
   * @throws {AuthorizationError} when the path escapes the root
   */
  private async resolve(requested: string): Promise<string> {
    const root = await fs.realpath(this.root);
    const target = path.resolve(root, requested);
    if (!this.isInside(root, target)) {
      throw new AuthorizationError(`Path ${requested} is outside the allowed directory`);
    }

    let real: string;
    try {
      real = await fs.realpath(target);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') {
        throw new ValidationError(`Path ${requested} does not exist`, { field: 'path' });
      }
      throw error;
    }
    if (!this.isInside(root, real)) {
      throw new AuthorizationError(`Path ${requested} is outside the allowed directory`);
    }
    return real;
  }

  private isInside(root: string, target: string): boolean {
    const relative = path.relative(root, target);
    return relative === '' || (relative !== '..' && !relative.startsWith('..' + path.sep) && !path.isAbsolute(relative));
  }
}
