import * as core from '@actions/core';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Scoped logger on top of the Actions toolkit.
 * Outside a workflow run the toolkit still writes plain lines to stdout.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: message => core.debug(`${prefix} ${message}`),
    info: message => core.info(`${prefix} ${message}`),
    warn: message => core.warning(`${prefix} ${message}`),
    error: message => core.error(`${prefix} ${message}`)
  };
}
