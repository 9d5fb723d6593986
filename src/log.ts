export type Write = (text: string) => void;

export interface Logger {
  info(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.ARC_INIT_DEBUG === "1";
}

/**
 * `info` goes to `write` (stdout), `error` and `debug` to `writeErr`.
 * Debug lines are dropped unless ARC_INIT_DEBUG=1.
 */
export function createLogger(
  write: Write,
  writeErr: Write,
  debug: boolean = isDebug(),
): Logger {
  return {
    info: (message) => write(message),
    error: (message) => writeErr(message),
    debug: (message) => {
      if (debug) {
        writeErr(`[debug] ${message}`);
      }
    },
  };
}
