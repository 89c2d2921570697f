/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Simulates real filesystem behavior for unit tests:
 * - In-memory file/directory storage (POSIX-style absolute paths)
 * - ENOENT/EISDIR/ENOTDIR/ENOTEMPTY errors like the real layer
 * - An operation log for ordering assertions (e.g. write before rename)
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/cache/linux-amd64/v4.52.2/yq": file("binary", { executable: true }),
 *   },
 * });
 *
 * await mock.rename("/cache/tmp", "/cache/yq");
 * expect(mock.$.readText("/cache/yq")).toBe("binary");
 */

import { posix } from "node:path";
import type {
  DirEntry,
  FileStat,
  FileSystemErrorCode,
  FileSystemLayer,
  MkdirOptions,
  RmOptions,
} from "./filesystem";
import { FileSystemError } from "../errors";

// =============================================================================
// Entry Types
// =============================================================================

export interface FileEntry {
  readonly type: "file";
  readonly content: Buffer;
  readonly executable: boolean;
}

export interface DirectoryEntry {
  readonly type: "directory";
}

export type MockEntry = FileEntry | DirectoryEntry;

/**
 * Create a file entry.
 */
export function file(content: string | Buffer, options?: { executable?: boolean }): FileEntry {
  return {
    type: "file",
    content: typeof content === "string" ? Buffer.from(content, "utf-8") : content,
    executable: options?.executable ?? false,
  };
}

/**
 * Create a directory entry.
 */
export function directory(): DirectoryEntry {
  return { type: "directory" };
}

// =============================================================================
// Mock State
// =============================================================================

export type FileSystemOperation =
  | { readonly op: "writeFile" | "writeFileBuffer" | "makeExecutable"; readonly path: string }
  | { readonly op: "mkdir" | "rm"; readonly path: string }
  | { readonly op: "rename"; readonly from: string; readonly to: string };

export interface FileSystemMockState {
  readonly entries: Map<string, MockEntry>;
  readonly operations: FileSystemOperation[];
  /** Content of a file as UTF-8, or undefined when absent */
  readText(path: string): string | undefined;
  /** True if path is an executable file */
  isExecutable(path: string): boolean;
  /** Paths of all files under a directory (recursive), sorted */
  filesUnder(dir: string): string[];
}

export interface FileSystemMock extends FileSystemLayer {
  readonly $: FileSystemMockState;
}

export interface FileSystemMockOptions {
  readonly entries?: Readonly<Record<string, MockEntry>>;
  /** Fail specific operations on specific paths */
  readonly failures?: ReadonlyArray<{
    readonly op: keyof FileSystemLayer;
    readonly path: string;
    readonly code: FileSystemErrorCode;
  }>;
}

function normalize(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

/**
 * Create an in-memory FileSystemLayer.
 * Parent directories of initial entries are created implicitly.
 */
export function createFileSystemMock(options: FileSystemMockOptions = {}): FileSystemMock {
  const entries = new Map<string, MockEntry>();
  const operations: FileSystemOperation[] = [];

  const ensureParents = (path: string): void => {
    let dir = posix.dirname(path);
    while (!entries.has(dir)) {
      entries.set(dir, directory());
      if (dir === "/") break;
      dir = posix.dirname(dir);
    }
  };

  entries.set("/", directory());
  for (const [path, entry] of Object.entries(options.entries ?? {})) {
    const key = normalize(path);
    ensureParents(key);
    entries.set(key, entry);
  }

  const error = (code: FileSystemErrorCode, path: string, message?: string): FileSystemError =>
    new FileSystemError(code, path, message ?? `${code}: ${path}`);

  const checkFailure = (op: keyof FileSystemLayer, path: string): void => {
    const failure = options.failures?.find((f) => f.op === op && normalize(f.path) === path);
    if (failure) {
      throw error(failure.code, path);
    }
  };

  const children = (dir: string): string[] => {
    const prefix = dir === "/" ? "/" : `${dir}/`;
    return [...entries.keys()].filter(
      (key) => key !== dir && key.startsWith(prefix) && !key.slice(prefix.length).includes("/")
    );
  };

  const descendants = (dir: string): string[] => {
    const prefix = dir === "/" ? "/" : `${dir}/`;
    return [...entries.keys()].filter((key) => key.startsWith(prefix));
  };

  const requireParentDir = (path: string): void => {
    const parent = entries.get(posix.dirname(path));
    if (!parent) throw error("ENOENT", path);
    if (parent.type !== "directory") throw error("ENOTDIR", path);
  };

  const readEntry = (path: string): FileEntry => {
    const entry = entries.get(path);
    if (!entry) throw error("ENOENT", path);
    if (entry.type === "directory") throw error("EISDIR", path);
    return entry;
  };

  const write = (path: string, content: Buffer): void => {
    requireParentDir(path);
    const existing = entries.get(path);
    if (existing?.type === "directory") throw error("EISDIR", path);
    entries.set(path, { type: "file", content, executable: existing?.executable ?? false });
  };

  const state: FileSystemMockState = {
    entries,
    operations,
    readText(path) {
      const entry = entries.get(normalize(path));
      return entry?.type === "file" ? entry.content.toString("utf-8") : undefined;
    },
    isExecutable(path) {
      const entry = entries.get(normalize(path));
      return entry?.type === "file" && entry.executable;
    },
    filesUnder(dir) {
      return descendants(normalize(dir))
        .filter((key) => entries.get(key)?.type === "file")
        .sort();
    },
  };

  return {
    $: state,

    async readFile(rawPath) {
      const path = normalize(rawPath);
      checkFailure("readFile", path);
      return readEntry(path).content.toString("utf-8");
    },

    async readFileBuffer(rawPath) {
      const path = normalize(rawPath);
      checkFailure("readFileBuffer", path);
      return Buffer.from(readEntry(path).content);
    },

    async writeFile(rawPath, content) {
      const path = normalize(rawPath);
      checkFailure("writeFile", path);
      write(path, Buffer.from(content, "utf-8"));
      operations.push({ op: "writeFile", path });
    },

    async writeFileBuffer(rawPath, content) {
      const path = normalize(rawPath);
      checkFailure("writeFileBuffer", path);
      write(path, Buffer.from(content));
      operations.push({ op: "writeFileBuffer", path });
    },

    async mkdir(rawPath, mkdirOptions?: MkdirOptions) {
      const path = normalize(rawPath);
      checkFailure("mkdir", path);
      const existing = entries.get(path);
      if (existing?.type === "file") throw error("EEXIST", path);
      if (existing) return;
      if (mkdirOptions?.recursive === false) {
        requireParentDir(path);
      } else {
        ensureParents(path);
      }
      entries.set(path, directory());
      operations.push({ op: "mkdir", path });
    },

    async readdir(rawPath): Promise<readonly DirEntry[]> {
      const path = normalize(rawPath);
      checkFailure("readdir", path);
      const entry = entries.get(path);
      if (!entry) throw error("ENOENT", path);
      if (entry.type !== "directory") throw error("ENOTDIR", path);
      return children(path).map((child) => {
        const childEntry = entries.get(child);
        return {
          name: posix.basename(child),
          isDirectory: childEntry?.type === "directory",
          isFile: childEntry?.type === "file",
          isSymbolicLink: false,
        };
      });
    },

    async stat(rawPath): Promise<FileStat> {
      const path = normalize(rawPath);
      checkFailure("stat", path);
      const entry = entries.get(path);
      if (!entry) throw error("ENOENT", path);
      return {
        isFile: entry.type === "file",
        isDirectory: entry.type === "directory",
        size: entry.type === "file" ? entry.content.length : 0,
      };
    },

    async rm(rawPath, rmOptions?: RmOptions) {
      const path = normalize(rawPath);
      checkFailure("rm", path);
      const entry = entries.get(path);
      if (!entry) {
        if (rmOptions?.force) return;
        throw error("ENOENT", path);
      }
      if (entry.type === "directory") {
        const nested = descendants(path);
        if (nested.length > 0 && !rmOptions?.recursive) throw error("ENOTEMPTY", path);
        for (const key of nested) entries.delete(key);
      }
      entries.delete(path);
      operations.push({ op: "rm", path });
    },

    async makeExecutable(rawPath) {
      const path = normalize(rawPath);
      checkFailure("makeExecutable", path);
      const entry = readEntry(path);
      entries.set(path, { ...entry, executable: true });
      operations.push({ op: "makeExecutable", path });
    },

    async rename(rawFrom, rawTo) {
      const from = normalize(rawFrom);
      const to = normalize(rawTo);
      checkFailure("rename", from);
      const entry = entries.get(from);
      if (!entry) throw error("ENOENT", from);
      requireParentDir(to);
      if (entry.type === "directory") {
        for (const key of descendants(from)) {
          const moved = entries.get(key);
          entries.delete(key);
          if (moved) entries.set(to + key.slice(from.length), moved);
        }
      }
      entries.delete(from);
      entries.set(to, entry);
      operations.push({ op: "rename", from, to });
    },
  };
}
