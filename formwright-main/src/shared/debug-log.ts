/**
 * Color-coded debug logger for development.
 *
 * All calls use a [DEBUG] prefix printed in bright magenta
 * so they stand out in the terminal and are easy to grep:
 *
 *   grep -rn "devLog" src/
 *
 * Output is suppressed unless FORMWRIGHT_DEBUG=1, since the terminal
 * client renders into the same stdout.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

export function isDebugEnabled(): boolean {
  return process.env["FORMWRIGHT_DEBUG"] === "1";
}

export function devLog(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
