// Console logging. The report itself goes to stdout; problems go to stderr with a marker.
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createLogger(verbose = false): Logger {
  return {
    info: message => console.log(message),
    warn: message => console.warn(`⚠️  ${message}`),
    error: message => console.error(`❌ ${message}`),
    debug: message => { if (verbose) console.error(`   ${message}`); }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
