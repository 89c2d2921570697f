/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import { SILENT_LOGGER, type Logger } from "../logging/types";
import { PidtreeProvider, type ProcessTreeProvider } from "./process-tree";

/**
 * Platform detection for kill logic.
 * Windows uses taskkill, Unix uses process.kill.
 */
const isWindows = process.platform === "win32";

/**
 * Default timeout for graceful termination (SIGTERM on Unix).
 * On Windows, this is combined with FORCE_TIMEOUT since only forceful kill is used.
 */
export const PROCESS_KILL_GRACEFUL_TIMEOUT_MS = 1000;

/**
 * Default timeout for forced termination (SIGKILL on Unix).
 */
export const PROCESS_KILL_FORCE_TIMEOUT_MS = 1000;

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
  /** Written to stdin, which is then closed. Without it stdin is ignored. */
  readonly input?: string | Buffer;
  /**
   * Start the process as the leader of a new process group (Unix).
   * kill() then also signals the group, reaching descendants that outlived their parent.
   */
  readonly detached?: boolean;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  /** stdout decoded as UTF-8 */
  readonly stdout: string;
  /** stdout exactly as the process wrote it */
  readonly stdoutBuffer: Buffer;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal, spawn error, or still running after timeout.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
  /**
   * True if process is still running after wait(timeout) returned.
   * Caller should decide whether to kill() or continue waiting.
   */
  readonly running?: boolean;
}

/**
 * Result of killing a process.
 */
export interface KillResult {
  /** True if the process exited */
  readonly success: boolean;
  /** The signal that terminated the process */
  readonly reason?: "SIGTERM" | "SIGKILL";
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Graceful shutdown: SIGTERM → wait → SIGKILL → wait.
   * Signals every descendant, not just the direct child.
   *
   * @param termTimeout - Wait time after SIGTERM (ms). undefined = skip wait, proceed to SIGKILL.
   * @param killTimeout - Wait time after SIGKILL (ms). undefined = skip wait, return immediately.
   */
  kill(termTimeout?: number, killTimeout?: number): Promise<KillResult>;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status - check result fields instead.
   *
   * @param timeout - Max time to wait in ms. If exceeded, returns with running=true.
   *
   * @example
   * const result = await proc.wait(30_000);
   * if (result.running) {
   *   await proc.kill(0, 1000);
   * }
   */
  wait(timeout?: number): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to control it.
   * Returns synchronously - the process is spawned immediately.
   * Arguments are passed as discrete argv elements; no shell is involved.
   *
   * @example
   * const proc = runner.run("yq", ["--version"]);
   * const result = await proc.wait(5000);
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * Fields of an execa result this module reads.
 */
interface ExecaOutcome {
  readonly stdout?: unknown;
  readonly stderr?: unknown;
  readonly exitCode?: number;
  readonly signal?: string;
  readonly failed?: boolean;
  readonly originalMessage?: string;
}

/**
 * Symbol used to indicate timeout in Promise.race.
 */
const TIMEOUT_SYMBOL = Symbol("timeout");

const EMPTY_BUFFER = Buffer.alloc(0);

function toBuffer(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
  }
  if (typeof value === "string") return Buffer.from(value, "utf-8");
  return EMPTY_BUFFER;
}

function convertOutcome(outcome: ExecaOutcome): ProcessResult {
  const stdoutBuffer = toBuffer(outcome.stdout);

  // Spawn errors (ENOENT, EACCES) set failed=true with the reason in originalMessage
  let stderr = toBuffer(outcome.stderr).toString("utf-8");
  if (outcome.failed && outcome.originalMessage && !stderr) {
    stderr = outcome.originalMessage;
  }

  const result: ProcessResult = {
    stdout: stdoutBuffer.toString("utf-8"),
    stdoutBuffer,
    stderr,
    exitCode: outcome.exitCode ?? null,
  };
  if (outcome.signal) {
    return { ...result, signal: outcome.signal };
  }
  return result;
}

function isNoSuchProcess(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ESRCH";
}

/**
 * SpawnedProcess implementation over a settled-result promise.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: ProcessResult | null = null;

  constructor(
    readonly pid: number | undefined,
    private readonly completion: Promise<ProcessResult>,
    private readonly logger: Logger,
    private readonly processTree: ProcessTreeProvider,
    private readonly command: string,
    private readonly detached: boolean
  ) {}

  async kill(termTimeout?: number, killTimeout?: number): Promise<KillResult> {
    const pid = this.pid;
    if (pid === undefined) {
      // Process never started, consider it "killed"
      return { success: true, reason: "SIGTERM" };
    }

    if (isWindows) {
      // taskkill without /f only sends WM_CLOSE, which console apps ignore
      await this.killTree(pid, true);
      this.logger.warn("Killed", { command: this.command, pid, signal: "TASKKILL" });

      const timeout = (termTimeout ?? 0) + (killTimeout ?? 0);
      if (timeout > 0) {
        const result = await this.wait(timeout);
        if (!result.running) {
          return { success: true, reason: "SIGKILL" };
        }
      }
      return { success: false };
    }

    await this.killTree(pid, false);
    this.logger.warn("Killed", { command: this.command, pid, signal: "SIGTERM" });

    if (termTimeout !== undefined) {
      const result = await this.wait(termTimeout);
      if (!result.running) {
        return { success: true, reason: "SIGTERM" };
      }
    }

    await this.killTree(pid, true);
    this.logger.warn("Killed", { command: this.command, pid, signal: "SIGKILL" });

    if (killTimeout !== undefined) {
      const result = await this.wait(killTimeout);
      if (!result.running) {
        return { success: true, reason: "SIGKILL" };
      }
    }

    return { success: false };
  }

  /**
   * Signal a process and all of its descendants.
   * - Windows: taskkill /pid <pid> /t /f
   * - Unix: descendants are collected before anything is signalled, since
   *   orphans are reparented and drop out of the tree. Detached processes
   *   also get a process-group signal.
   */
  private async killTree(pid: number, force: boolean): Promise<void> {
    if (isWindows) {
      const result = await execa("taskkill", ["/pid", String(pid), "/t", "/f"], { reject: false });
      if (result.exitCode !== 0) {
        // 128: process not found (already exited)
        this.logger.debug("taskkill failed", { pid, exitCode: result.exitCode ?? -1 });
      }
      return;
    }

    const signal = force ? "SIGKILL" : "SIGTERM";
    const descendants = await this.processTree.getDescendantPids(pid);

    if (this.detached) {
      this.signal(-pid, signal);
    }
    for (const child of descendants) {
      this.signal(child, signal);
    }
    this.signal(pid, signal);
  }

  private signal(target: number, signal: NodeJS.Signals): void {
    try {
      process.kill(target, signal);
    } catch (error) {
      if (isNoSuchProcess(error)) {
        this.logger.silly("Already exited", { pid: target, signal });
        return;
      }
      this.logger.warn("Signal failed", {
        pid: target,
        signal,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    if (this.cachedResult !== null) {
      return this.cachedResult;
    }

    if (timeout === undefined) {
      const result = await this.completion;
      this.cachedResult = result;
      this.logResult(result);
      return result;
    }

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<typeof TIMEOUT_SYMBOL>((resolve) => {
      timeoutId = setTimeout(() => resolve(TIMEOUT_SYMBOL), timeout);
    });

    const raceResult = await Promise.race([this.completion, timeoutPromise]);
    clearTimeout(timeoutId);

    if (raceResult === TIMEOUT_SYMBOL) {
      this.logger.warn("Wait timeout", {
        command: this.command,
        pid: this.pid ?? 0,
        timeout,
      });
      return {
        stdout: "",
        stdoutBuffer: EMPTY_BUFFER,
        stderr: "",
        exitCode: null,
        running: true,
      };
    }

    this.cachedResult = raceResult;
    this.logResult(raceResult);
    return raceResult;
  }

  private logResult(result: ProcessResult): void {
    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of result.stderr.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.debug(`${prefix} stderr: ${line}`);
    }

    // Signal exits were already logged in kill()
    if (!result.signal) {
      this.logger.debug("Exited", {
        command: this.command,
        pid: this.pid ?? 0,
        exitCode: result.exitCode ?? -1,
        stdoutBytes: result.stdoutBuffer.length,
      });
    }
  }
}

/**
 * Process runner implementation using execa.
 * stdout is captured as bytes; stderr is decoded as UTF-8.
 */
export class ExecaProcessRunner implements ProcessRunner {
  private readonly processTree: ProcessTreeProvider;

  constructor(
    private readonly logger: Logger = SILENT_LOGGER,
    processTree?: ProcessTreeProvider
  ) {
    this.processTree = processTree ?? new PidtreeProvider(logger);
  }

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const detached = options?.detached ?? false;
    const subprocess = execa(command, [...args], {
      cleanup: true,
      encoding: "buffer",
      stripFinalNewline: false,
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      detached,
      ...(options?.cwd !== undefined ? { cwd: options.cwd } : {}),
      // Without extendEnv=false, keys deleted from the custom env would be inherited
      ...(options?.env !== undefined ? { env: options.env, extendEnv: false } : {}),
      ...(options?.input !== undefined ? { input: options.input } : { stdin: "ignore" as const }),
    });

    const logger = this.logger;
    const settle = async (): Promise<ProcessResult> => {
      try {
        const outcome: ExecaOutcome = await subprocess;
        return convertOutcome(outcome);
      } catch (error) {
        // reject=false leaves only unexpected failures here
        const message = error instanceof Error ? error.message : String(error);
        logger.error("Spawn failed", { command, error: message });
        return { stdout: "", stdoutBuffer: EMPTY_BUFFER, stderr: message, exitCode: null };
      }
    };

    const spawned = new ExecaSpawnedProcess(
      subprocess.pid,
      settle(),
      this.logger,
      this.processTree,
      command,
      detached
    );

    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid, detached });
    }

    return spawned;
  }
}
