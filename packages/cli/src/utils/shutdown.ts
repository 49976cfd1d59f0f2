// pattern: Imperative Shell

import type { Logger } from "pino";

type ShutdownHook = () => void | Promise<void>;

// Conventional 128 + signal number
const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export interface ShutdownRegistry {
  /**
   * Run a hook when the process is interrupted. Returns the unregister function.
   */
  register(hook: ShutdownHook, logger?: Logger): () => void;
}

/**
 * Hooks run once on the first SIGINT or SIGTERM, then the process exits
 * with 130 or 143. Signal listeners are bound on the first registration.
 */
export function createShutdownRegistry(
  exit: (code: number) => void = code => process.exit(code)
): ShutdownRegistry {
  const hooks = new Set<ShutdownHook>();
  let signalsBound = false;
  let exiting = false;
  let hookLogger: Logger | undefined;

  const handler = async (signal: NodeJS.Signals): Promise<void> => {
    if (exiting) {
      return;
    }
    exiting = true;
    for (const hook of Array.from(hooks)) {
      try {
        await hook();
      } catch (error) {
        hookLogger?.warn(
          `shutdown hook failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    exit(SIGNAL_EXIT_CODES[signal] ?? 1);
  };

  const bindSignals = (): void => {
    if (signalsBound) {
      return;
    }
    signalsBound = true;
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, signal => {
        void handler(signal);
      });
    }
  };

  return {
    register(hook, logger) {
      if (logger) {
        hookLogger = logger;
      }
      hooks.add(hook);
      bindSignals();
      return () => {
        hooks.delete(hook);
      };
    },
  };
}

const processRegistry = createShutdownRegistry();

export function registerShutdownHook(
  hook: ShutdownHook,
  logger?: Logger
): () => void {
  return processRegistry.register(hook, logger);
}

export type RegisterShutdownHook = typeof registerShutdownHook;
