/**
 * Tagged console logger. Every line is prefixed `[furigana][Tag]` so one component's output can be grepped out of a
 * long backlog run:
 *
 * ```ts
 * const log = createLogger('Segmenter');
 * log.warn('dropping ruby without <rt>');  // [furigana][Segmenter] dropping ruby without <rt>
 * ```
 *
 * `debug` and `info` are silent until `setVerbose(true)`; `warn` and `error` always print. Everything goes to stderr so
 * the CLI's stdout stays valid JSON.
 */

let VERBOSE = false;

export function setVerbose(verbose: boolean): void { VERBOSE = verbose; }

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[furigana][${tag}]`;
  return {
    debug(...args: unknown[]) {
      if (!VERBOSE) return;
      console.error(prefix, ...args);
    },
    info(...args: unknown[]) {
      if (!VERBOSE) return;
      console.error(prefix, ...args);
    },
    warn(...args: unknown[]) { console.warn(prefix, ...args); },
    error(...args: unknown[]) { console.error(prefix, ...args); },
  };
}

/**
 * Logger that remembers instead of printing. Handy for tests that assert a warning was raised.
 */
export function createMemoryLogger(): Logger&{lines: {level: keyof Logger, message: string}[]} {
  const lines: {level: keyof Logger, message: string}[] = [];
  const push = (level: keyof Logger) => (...args: unknown[]) => {
    lines.push({level, message: args.map(a => a instanceof Error ? a.message : String(a)).join(' ')});
  };
  return {lines, debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error')};
}
