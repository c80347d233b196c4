// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * A running component that can be halted on shutdown.
 */
export type Stoppable = {
  readonly name: string;
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly services: ReadonlyArray<Stoppable>;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers that stop the scheduler and the
 * reaction listener, close the database, then exit.
 *
 * - Re-entrant signals are ignored once shutdown has begun
 * - Services stop before the database closes (an in-flight cycle may still write)
 * - Every step runs even if an earlier one throws
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const service of deps.services) {
      try {
        service.stop();
        deps.logger.info({ service: service.name }, "service stopped");
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error(
          { service: service.name, error: message },
          "error stopping service",
        );
      }
    }

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
