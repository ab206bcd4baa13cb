// Console logging for the CLI and pipeline.
// Everything goes to stderr so stdout only ever carries the rendered chart.

const PREFIX = "[spare]";

function write(args: unknown[]): void {
  process.stderr.write(args.map(a => (typeof a === "string" ? a : JSON.stringify(a))).join(" ") + "\n");
}

export function isDebugEnabled(): boolean {
  return process.env.SPARE_DEBUG === "1";
}

export const log = {
  info: (...args: unknown[]) => write([PREFIX, ...args]),
  warn: (...args: unknown[]) => write([PREFIX, "(warn)", ...args]),
  error: (...args: unknown[]) => write([PREFIX, "(error)", ...args]),
  debug: (...args: unknown[]) => {
    if (isDebugEnabled()) write([PREFIX, "(debug)", ...args]);
  },
};

/** Run fn and, under SPARE_DEBUG=1, log how long it took. */
export function timed<T>(label: string, fn: () => T): T {
  const t0 = performance.now();
  const result = fn();
  log.debug(`[perf] ${label}`, (performance.now() - t0).toFixed(2), "ms");
  return result;
}
