import { env } from 'node:process';

let debugEnabled = Boolean(env.DEBUG);

export const setDebugEnabled = (enabled: boolean): void => {
  debugEnabled = enabled;
};

// stdout carries the TSV report, so debug output goes to stderr.
export const debug = (...args: unknown[]): void => {
  if (debugEnabled) {
    console.error('[debug]', ...args);
  }
};
