/**
 * Debug logger. Only outputs when IS_IT_SPAM_DEBUG is set.
 * Use for per-request operational logs that would flood production stdout.
 */
const enabled = () => !!process.env.IS_IT_SPAM_DEBUG;

export function debug(tag: string, message: string): void {
  if (enabled()) console.log(`[${tag}] ${message}`);
}

/** Sink for the warnings and errors the spam gate reports. */
export interface Logger {
  warn(message: string): void;
  error(message: string): void;
  debug?(message: string): void;
}

export const consoleLogger: Logger = {
  warn: (message) => console.warn(`[is-it-spam] ${message}`),
  error: (message) => console.error(`[is-it-spam] ${message}`),
  debug: (message) => debug('is-it-spam', message),
};
