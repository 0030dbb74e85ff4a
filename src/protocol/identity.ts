/**
 * Defaults for identify messages.
 *
 * @module protocol/identity
 */

import * as os from 'node:os';

/**
 * Name of the user running this process.
 *
 * Falls back to the environment when the account database has no entry for
 * the current uid (common in containers).
 */
export function currentUsername(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env['USER'] ?? process.env['USERNAME'] ?? 'unknown';
  }
}

/**
 * Host name of this machine.
 */
export function currentHostname(): string {
  return os.hostname();
}
