/**
 * File access used by the loader
 */

import * as fs from "node:fs";
import * as path from "node:path";

export type FileSystem = {
  readonly exists: (filePath: string) => boolean;
  readonly isDirectory: (filePath: string) => boolean;
  /** Entry names (not paths) of a directory, sorted */
  readonly readDir: (dirPath: string) => readonly string[];
  readonly readFile: (filePath: string) => string;
};

export const nodeFileSystem: FileSystem = {
  exists: (filePath) => fs.existsSync(filePath),
  isDirectory: (filePath) =>
    fs.existsSync(filePath) && fs.statSync(filePath).isDirectory(),
  readDir: (dirPath) => fs.readdirSync(dirPath).sort(),
  readFile: (filePath) => fs.readFileSync(filePath, "utf-8"),
};

/**
 * In-memory file system keyed by absolute POSIX paths.
 * Directories exist implicitly for every file below them.
 */
export const createMemoryFileSystem = (
  files: Readonly<Record<string, string>>
): FileSystem => {
  const paths = Object.keys(files).map((p) => path.posix.normalize(p));
  const contents = new Map(
    Object.entries(files).map(([p, text]) => [path.posix.normalize(p), text])
  );

  const isDirectory = (dirPath: string): boolean => {
    const prefix = path.posix.normalize(dirPath).replace(/\/?$/, "/");
    return paths.some((p) => p.startsWith(prefix));
  };

  return {
    exists: (filePath) =>
      contents.has(path.posix.normalize(filePath)) || isDirectory(filePath),
    isDirectory,
    readDir: (dirPath) => {
      const prefix = path.posix.normalize(dirPath).replace(/\/?$/, "/");
      const names = new Set<string>();
      for (const p of paths) {
        if (!p.startsWith(prefix)) continue;
        const rest = p.slice(prefix.length);
        const first = rest.split("/")[0];
        if (first) names.add(first);
      }
      return [...names].sort();
    },
    readFile: (filePath) => {
      const text = contents.get(path.posix.normalize(filePath));
      if (text === undefined) {
        throw new Error(`ENOENT: no such file: ${filePath}`);
      }
      return text;
    },
  };
};
