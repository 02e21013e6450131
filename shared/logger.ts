export type Logger = Pick<typeof console, 'info' | 'warn' | 'error'>;

/** Prefixes every line with `[tag]`, the way the workers label their output. */
export function taggedLogger(tag: string, base: Logger = console): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message?: unknown, ...rest: unknown[]) => base.info(prefix, message, ...rest),
    warn: (message?: unknown, ...rest: unknown[]) => base.warn(prefix, message, ...rest),
    error: (message?: unknown, ...rest: unknown[]) => base.error(prefix, message, ...rest),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown error';
}
