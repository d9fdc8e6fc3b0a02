/**
 * Development-mode diagnostics.
 *
 * Warnings are only emitted outside `NODE_ENV=production`; the engine never
 * writes output in production builds.
 */

type ConsoleLike = {
  warn?: (msg: string) => void;
  error?: (msg: string, err?: unknown) => void;
  debug?: (msg: string) => void;
};

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

const DEV_MODE = NODE_ENV !== "production";

function devConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export function warnDev(message: string): void {
  if (!DEV_MODE) return;
  devConsole()?.warn?.(`[navtree] ${message}`);
}

export function reportErrorDev(message: string, err: unknown): void {
  if (!DEV_MODE) return;
  devConsole()?.error?.(`[navtree] ${message}`, err);
}

export function traceDebug(message: string): void {
  devConsole()?.debug?.(`[navtree] ${message}`);
}
