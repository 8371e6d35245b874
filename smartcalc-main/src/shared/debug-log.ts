/**
 * Color-coded debug logger for the server process.
 *
 * All calls use a [DEBUG] prefix printed in bright magenta
 * so they stand out in the terminal and are easy to grep:
 *
 *   grep -rn "devLog" src/
 *
 * Output is on by default; `setDebugEnabled(false)` mutes it.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

let enabled = true;

export function setDebugEnabled(value: boolean): void {
  enabled = value;
}

export function devLog(...args: unknown[]): void {
  if (!enabled) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!enabled) return;
  console.log(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!enabled) return;
  console.log(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
