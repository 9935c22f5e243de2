export type MenuLogOptions = {
  debug?: boolean;
  log?: (line: string) => void;
  warn?: (line: string) => void;
};

export type MenuLogger = {
  debug: (line: string) => void;
  warn: (line: string) => void;
};

export function createMenuLogger(scope: string, opts: MenuLogOptions = {}): MenuLogger {
  const debugEnabled = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));
  const warn = opts.warn ?? ((line) => console.warn(line));
  const prefix = `[menu:${scope}]`;

  return {
    debug: (line) => {
      if (debugEnabled) log(`${prefix} ${line}`);
    },
    warn: (line) => warn(`${prefix} ${line}`),
  };
}
