// src/storage/retention.ts

import type { ThreadOwnershipRepository } from "./types";
import { logger } from "../utils/logger";

/** Periodically purges thread ownership records past their max age. */
export class ThreadOwnershipJanitor {
  private sweepInterval: NodeJS.Timeout | null = null;
  private sweeping: Promise<number> | null = null;

  constructor(
    private readonly ownerships: ThreadOwnershipRepository,
    private readonly maxAgeMs: number,
    private readonly intervalMs = 3_600_000, // hourly
  ) {}

  start(): void {
    if (this.sweepInterval) {
      logger.warn("⚠️ Thread ownership janitor already running, skipping start");
      return;
    }

    this.sweepInterval = setInterval(() => {
      void this.sweep();
    }, this.intervalMs);
    this.sweepInterval.unref();

    // Also sweep immediately on start
    void this.sweep();
  }

  stop(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  isRunning(): boolean {
    return this.sweepInterval !== null;
  }

  /** Runs one purge; overlapping calls share the in-flight one. Never rejects. */
  sweep(): Promise<number> {
    if (!this.sweeping) {
      this.sweeping = this.ownerships
        .cleanupOlderThan(this.maxAgeMs)
        .catch((error) => {
          logger.error("Thread ownership cleanup failed", error);
          return 0;
        })
        .finally(() => {
          this.sweeping = null;
        });
    }
    return this.sweeping;
  }
}
