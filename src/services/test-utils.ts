/**
 * Shared helpers for boundary tests: temp directories and stand-in executables.
 */
import { readFileSync } from "node:fs";
import { mkdtemp, realpath, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a temporary directory for testing.
 * Returns the path and a cleanup function.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "configq-test-"));
  // Canonical path: macOS /var → /private/var, Windows 8.3 short names
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        // File handles may take time to release after process termination
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * Write a file with mode 0755, creating parent directories.
 */
export async function writeExecutable(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, { mode: 0o755 });
  return path;
}

export interface FakeYqOptions {
  /** Version reported by --version. Default: v4.52.2 */
  readonly version?: string;
  /** Project URL in the --version banner. Default: the mikefarah/yq URL */
  readonly homepage?: string;
  /** Shell script body run for every other invocation. Default: echo the arguments */
  readonly body?: string;
}

/**
 * POSIX shell stand-in for yq.
 * Answers `--version` with a banner like the real binary and runs `body` otherwise.
 */
export function fakeYqScript(options: FakeYqOptions = {}): string {
  const version = options.version ?? "v4.52.2";
  const homepage = options.homepage ?? "https://github.com/mikefarah/yq/";
  const body = options.body ?? 'echo "$@"';
  return [
    "#!/bin/sh",
    'if [ "$1" = "--version" ]; then',
    `  echo "yq (${homepage}) version ${version}"`,
    "  exit 0",
    "fi",
    body,
    "",
  ].join("\n");
}

/**
 * True while the pid exists and is not a zombie waiting to be reaped.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, "utf-8");
    const state = stat.slice(stat.lastIndexOf(")") + 2, stat.lastIndexOf(")") + 3);
    return state !== "Z";
  } catch {
    // No procfs (macOS): signal 0 succeeding is all we know
    return true;
  }
}
