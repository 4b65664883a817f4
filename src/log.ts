export interface Logger {
  debug(line: string): void;
  error(line: string): void;
}

type Sink = (line: string) => void;

export function createLogger(opts: {
  verbose: boolean;
  err?: Sink;
  now?: () => Date;
}): Logger {
  const err = opts.err ?? ((line: string) => console.error(line));
  const now = opts.now ?? (() => new Date());

  return {
    debug(line) {
      const ts = now().toISOString().slice(11, 23); // HH:mm:ss.mmm
      if (opts.verbose) err(`[${ts}] ${line}`);
    },
    error(line) {
      err(line);
    },
  };
}
