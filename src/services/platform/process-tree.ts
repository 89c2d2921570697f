/**
 * Process tree provider using pidtree.
 * Gets descendant PIDs for a given parent process.
 */

import pidtree from "pidtree";
import type { Logger } from "../logging/types";

/**
 * Interface for process tree operations.
 * Abstracts the underlying implementation for testability.
 */
export interface ProcessTreeProvider {
  /**
   * Get all descendant PIDs of a process (children, grandchildren, ...).
   * @returns Set of descendant PIDs, empty if the process has exited
   */
  getDescendantPids(pid: number): Promise<ReadonlySet<number>>;
}

/**
 * Process tree provider implementation using pidtree.
 */
export class PidtreeProvider implements ProcessTreeProvider {
  constructor(private readonly logger: Logger) {}

  async getDescendantPids(pid: number): Promise<ReadonlySet<number>> {
    try {
      const descendants = await pidtree(pid);
      this.logger.silly("Descendants", { pid, count: descendants.length });
      return new Set(descendants);
    } catch (error) {
      // pidtree rejects when the root pid is gone; nothing is left to signal
      this.logger.debug("Descendant lookup failed", {
        pid,
        error: error instanceof Error ? error.message : String(error),
      });
      return new Set();
    }
  }
}
