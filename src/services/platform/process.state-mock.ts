/**
 * Behavioral mock for ProcessRunner.
 *
 * Each run() records the command, argv and options and answers with a scripted
 * result. Processes configured with `hang: true` never exit on their own:
 * wait(timeout) reports `running: true` until kill() is called, after which
 * wait() resolves with a signal exit. This mirrors how a real runaway child
 * behaves under ExecaSpawnedProcess.
 *
 * @example
 * const runner = createMockProcessRunner({
 *   onSpawn: (command, args) =>
 *     args[0] === "--version" ? { stdout: "yq (https://github.com/mikefarah/yq/) version v4.52.2" } : undefined,
 * });
 */
import type {
  KillResult,
  ProcessOptions,
  ProcessResult,
  ProcessRunner,
  SpawnedProcess,
} from "./process";

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration returned by onSpawn for a single run().
 */
export interface SpawnConfig {
  /** Process ID. Explicitly undefined simulates a spawn failure. Default: 12345 */
  readonly pid?: number | undefined;
  /** Exit code for wait(). Default: 0 */
  readonly exitCode?: number | null;
  /** stdout for wait(). Default: "" */
  readonly stdout?: string | Buffer;
  /** stderr for wait(). Default: "" */
  readonly stderr?: string;
  /** Signal name reported by wait() */
  readonly signal?: string;
  /** Never exit until killed */
  readonly hang?: boolean;
}

type OnSpawnCallback = (
  command: string,
  args: readonly string[],
  options: ProcessOptions | undefined
) => SpawnConfig | undefined;

export interface KillCallRecord {
  readonly termTimeout: number | undefined;
  readonly killTimeout: number | undefined;
}

export interface SpawnedProcessMockState {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: ProcessOptions | undefined;
  readonly killCalls: readonly KillCallRecord[];
  /** wait() calls, with their timeouts */
  readonly waitCalls: readonly (number | undefined)[];
}

export interface MockSpawnedProcess extends SpawnedProcess {
  readonly $: SpawnedProcessMockState;
}

export interface ProcessRunnerMockState {
  readonly spawns: readonly MockSpawnedProcess[];
  /**
   * Get spawned process by index.
   * @throws Error if index out of bounds
   */
  spawned(index: number): MockSpawnedProcess;
  /**
   * First process spawned with a command.
   * @throws Error if no match found
   */
  spawned(filter: { command: string }): MockSpawnedProcess;
}

export interface MockProcessRunner extends ProcessRunner {
  readonly $: ProcessRunnerMockState;
}

export interface MockProcessRunnerOptions {
  /** Result for spawns that onSpawn does not configure */
  readonly defaultResult?: SpawnConfig;
  /** Called on every run(); returning undefined uses defaultResult */
  readonly onSpawn?: OnSpawnCallback;
}

// =============================================================================
// Implementation
// =============================================================================

class MockSpawnedProcessImpl implements MockSpawnedProcess {
  readonly pid: number | undefined;
  private readonly killCalls: KillCallRecord[] = [];
  private readonly waitCalls: (number | undefined)[] = [];
  private killedBy: "SIGTERM" | "SIGKILL" | null = null;

  constructor(
    private readonly command: string,
    private readonly args: readonly string[],
    private readonly options: ProcessOptions | undefined,
    private readonly config: SpawnConfig
  ) {
    this.pid = "pid" in config ? config.pid : 12345;
  }

  get $(): SpawnedProcessMockState {
    return {
      command: this.command,
      args: this.args,
      options: this.options,
      killCalls: this.killCalls,
      waitCalls: this.waitCalls,
    };
  }

  async wait(timeout?: number): Promise<ProcessResult> {
    this.waitCalls.push(timeout);

    if (this.killedBy !== null) {
      return {
        stdout: "",
        stdoutBuffer: Buffer.alloc(0),
        stderr: "",
        exitCode: null,
        signal: this.killedBy,
      };
    }

    if (this.config.hang) {
      if (timeout === undefined) {
        throw new Error(`wait() without timeout on hanging process '${this.command}'`);
      }
      return {
        stdout: "",
        stdoutBuffer: Buffer.alloc(0),
        stderr: "",
        exitCode: null,
        running: true,
      };
    }

    const stdoutBuffer =
      typeof this.config.stdout === "string"
        ? Buffer.from(this.config.stdout, "utf-8")
        : (this.config.stdout ?? Buffer.alloc(0));
    const result: ProcessResult = {
      stdout: stdoutBuffer.toString("utf-8"),
      stdoutBuffer,
      stderr: this.config.stderr ?? "",
      exitCode: this.config.exitCode === undefined ? 0 : this.config.exitCode,
    };
    return this.config.signal !== undefined ? { ...result, signal: this.config.signal } : result;
  }

  async kill(termTimeout?: number, killTimeout?: number): Promise<KillResult> {
    this.killCalls.push({ termTimeout, killTimeout });
    this.killedBy = termTimeout === 0 || termTimeout === undefined ? "SIGKILL" : "SIGTERM";
    return { success: true, reason: this.killedBy };
  }
}

class MockProcessRunnerImpl implements MockProcessRunner {
  private readonly processes: MockSpawnedProcess[] = [];

  constructor(private readonly mockOptions: MockProcessRunnerOptions = {}) {}

  get $(): ProcessRunnerMockState {
    const processes = this.processes;
    function spawned(indexOrFilter: number | { command: string }): MockSpawnedProcess {
      if (typeof indexOrFilter === "number") {
        const found = processes[indexOrFilter];
        if (found === undefined) {
          throw new Error(
            `No spawned process at index ${indexOrFilter}. Only ${processes.length} processes were spawned.`
          );
        }
        return found;
      }
      const found = processes.find((p) => p.$.command === indexOrFilter.command);
      if (found === undefined) {
        const commands = processes.map((p) => p.$.command).join(", ");
        throw new Error(
          `No spawned process with command '${indexOrFilter.command}'. Spawned commands: ${commands || "(none)"}`
        );
      }
      return found;
    }
    return { spawns: processes, spawned };
  }

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const config =
      this.mockOptions.onSpawn?.(command, args, options) ?? this.mockOptions.defaultResult ?? {};
    const spawned = new MockSpawnedProcessImpl(command, args, options, config);
    this.processes.push(spawned);
    return spawned;
  }
}

/**
 * Create a behavioral ProcessRunner mock.
 */
export function createMockProcessRunner(options?: MockProcessRunnerOptions): MockProcessRunner {
  return new MockProcessRunnerImpl(options);
}
