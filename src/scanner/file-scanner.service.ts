import { Injectable, ConsoleLogger, Inject } from '@nestjs/common';
import { simpleGit } from 'simple-git';
import { readFile, readdir, stat, realpath } from 'node:fs/promises';
import { join, extname, resolve, relative, isAbsolute, basename } from 'node:path';
import type { ReviewUnit } from '../review/review.types.js';

export interface ScanOptions {
  maxFileSize: number;
  extensions?: string[];
  includeTests?: boolean;
  sensitivePatterns?: string[];
}

export const DEFAULT_EXTENSIONS = [
  '.ts',
  '.js',
  '.tsx',
  '.jsx',
  '.mjs',
  '.cjs',
  '.py',
  '.go',
  '.java',
  '.kt',
  '.rs',
  '.rb',
  '.php',
  '.cs',
  '.swift',
  '.c',
  '.cpp',
  '.h',
  '.vue',
  '.svelte',
];

/** Directory names whose contents are never reviewed, with or without git. */
export const SKIP_DIRS = new Set([
  'vendor',
  '.git',
  '.vscode',
  '.idea',
  'node_modules',
  'build',
  'dist',
  'bin',
  'tmp',
  '.tmp',
]);

const TEST_FILE_PATTERNS = [
  /_test\.go$/,
  /\.(test|spec)\.[cm]?[jt]sx?$/,
  /^test_.*\.py$/,
  /_test\.py$/,
];

const SENSITIVE_PATTERNS = [
  /^\.env($|\.)/i,
  /\.pem$/i,
  /\.key$/i,
  /\.p12$/i,
  /\.pfx$/i,
  /(^|[^A-Z])[Ss][Ee][Cc][Rr][Ee][Tt]s?($|[^a-z])/,
  /(^|[^A-Z])[Cc][Rr][Ee][Dd][Ee][Nn][Tt][Ii][Aa][Ll]s?($|[^a-z])/,
  /\.keystore$/i,
];

const CONCURRENCY = 16;

/** Cross-platform check: is `target` inside `root`? */
function isWithinRoot(target: string, root: string): boolean {
  const rel = relative(root, target);
  return !rel.startsWith('..') && !isAbsolute(rel);
}

/** True when any directory segment of a relative path is in SKIP_DIRS. */
export function isInSkippedDir(filePath: string): boolean {
  const segments = filePath.replace(/\\/g, '/').split('/').slice(0, -1);
  return segments.some((segment) => SKIP_DIRS.has(segment));
}

export function isTestFile(filePath: string): boolean {
  const name = basename(filePath.replace(/\\/g, '/'));
  return TEST_FILE_PATTERNS.some((p) => p.test(name));
}

@Injectable()
export class FileScannerService {
  constructor(@Inject(ConsoleLogger) private readonly logger: ConsoleLogger) {
    this.logger.setContext(FileScannerService.name);
  }

  /** Collect review units under `directory`, sorted by relative path. */
  async scan(directory: string, options: ScanOptions): Promise<ReviewUnit[]> {
    const rootReal = await realpath(resolve(directory));
    const rootStat = await stat(rootReal);
    if (!rootStat.isDirectory()) {
      throw new Error(`Not a directory: ${directory}`);
    }

    const extensions = (options.extensions ?? DEFAULT_EXTENSIONS).map((e) =>
      e.startsWith('.') ? e : `.${e}`,
    );
    const sensitive = options.sensitivePatterns
      ? [...SENSITIVE_PATTERNS, ...options.sensitivePatterns.map((p) => new RegExp(p))]
      : SENSITIVE_PATTERNS;

    const listed = await this.listFiles(rootReal);
    const candidates = listed
      .filter((f) => extensions.includes(extname(f)))
      .filter((f) => options.includeTests || !isTestFile(f))
      .filter((f) => !this.isSensitiveFile(f, sensitive));

    const readOne = async (relativePath: string): Promise<ReviewUnit | null> => {
      const fullPath = join(rootReal, relativePath);
      try {
        const real = await realpath(fullPath);
        if (!isWithinRoot(real, rootReal)) {
          this.logger.warn(`Skipping symlink pointing outside root: ${relativePath}`);
          return null;
        }
        if (this.isSensitiveFile(relative(rootReal, real), sensitive)) {
          this.logger.warn(`Skipping sensitive file (symlink target): ${relativePath}`);
          return null;
        }
        const fileStat = await stat(real);
        if (!fileStat.isFile()) return null;
        if (fileStat.size > options.maxFileSize) {
          this.logger.warn(
            `Skipping file ${relativePath} (size ${fileStat.size} exceeds limit ${options.maxFileSize})`,
          );
          return null;
        }
        const content = await readFile(real, 'utf-8');
        return { path: relativePath, size: fileStat.size, content };
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Skipping unreadable file: ${relativePath} (${msg})`);
        return null;
      }
    };

    const units: ReviewUnit[] = [];
    for (let i = 0; i < candidates.length; i += CONCURRENCY) {
      const chunk = candidates.slice(i, i + CONCURRENCY);
      const results = await Promise.all(chunk.map(readOne));
      for (const unit of results) {
        if (unit) units.push(unit);
      }
    }
    return units.sort((a, b) => a.path.localeCompare(b.path));
  }

  // Note: Path handling assumes POSIX separators. Windows backslashes are normalized to forward slashes.
  isSensitiveFile(
    filePath: string,
    patterns: RegExp[] = SENSITIVE_PATTERNS,
  ): boolean {
    const segments = filePath.replace(/\\/g, '/').split('/');
    return segments.some((segment) =>
      patterns.some((pattern) => pattern.test(segment)),
    );
  }

  /** Relative file paths under `root`: git's view inside a work tree, a directory walk otherwise. */
  private async listFiles(root: string): Promise<string[]> {
    const git = simpleGit(root);
    let inRepo = false;
    try {
      inRepo = await git.checkIsRepo();
    } catch (error) {
      this.logger.debug(
        `git unavailable, walking directory instead: ${error instanceof Error ? error.message : error}`,
      );
    }
    if (inRepo) {
      const result = await git.raw([
        'ls-files',
        '-z',
        '--cached',
        '--others',
        '--exclude-standard',
      ]);
      return [
        ...new Set(
          result
            .split('\0')
            .filter((f) => f.length > 0 && !isInSkippedDir(f)),
        ),
      ];
    }
    return this.walk(root, '');
  }

  private async walk(root: string, prefix: string): Promise<string[]> {
    const entries = await readdir(join(root, prefix), { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const rel = prefix ? join(prefix, entry.name) : entry.name;
      if (entry.isDirectory()) {
        if (SKIP_DIRS.has(entry.name)) continue;
        files.push(...(await this.walk(root, rel)));
      } else if (entry.isFile() || entry.isSymbolicLink()) {
        files.push(rel);
      }
    }
    return files;
  }
}
