// src/shutdown.ts

import { logger } from "./utils/logger";

/** Background work that has to stop before storage closes. */
export interface RunningTask {
  controller: AbortController;
  done: Promise<void>; // settles once the task has stopped; never rejects
}

export interface ShutdownTargets {
  recovery: RunningTask | null;
  janitor: { stop(): void };
  configService: { close(): void };
  discord: { destroy(): Promise<void> } | null;
  storage: { close(): void };
}

/** Stops everything in dependency order; storage goes last. */
export async function shutdown(targets: ShutdownTargets): Promise<void> {
  logger.warn("Shutting down...");

  if (targets.recovery) {
    targets.recovery.controller.abort(new Error("shutting down"));
    await targets.recovery.done;
  }

  targets.janitor.stop();
  targets.configService.close();
  if (targets.discord) await targets.discord.destroy();
  targets.storage.close();
}
