const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";

let verboseEnabled = false;
let silent = false;
let colorEnabled = !process.env.NO_COLOR && process.stdout.isTTY === true;

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

/** Suppress everything but errors, e.g. while the JSON report is streamed to stdout. */
export function setSilent(enabled: boolean): void {
  silent = enabled;
}

export function setColor(enabled: boolean): void {
  colorEnabled = enabled;
}

function paint(style: string, text: string): string {
  return colorEnabled ? `${style}${text}${RESET}` : text;
}

function timestamp(): string {
  return paint(DIM, new Date().toISOString().slice(11, 19));
}

export function info(message: string): void {
  if (silent) return;
  console.log(`${timestamp()} ${paint(CYAN, "ℹ")}  ${message}`);
}

export function success(message: string): void {
  if (silent) return;
  console.log(`${timestamp()} ${paint(GREEN, "✔")}  ${message}`);
}

// Warnings and debug output go to stderr so stdout stays clean for `--json -`.
export function warn(message: string): void {
  if (silent) return;
  console.error(`${timestamp()} ${paint(YELLOW, "⚠")}  ${message}`);
}

export function error(message: string): void {
  console.error(`${timestamp()} ${paint(RED, "✖")}  ${message}`);
}

export function debug(message: string): void {
  if (verboseEnabled && !silent) {
    console.error(`${timestamp()} ${paint(DIM, `·  ${message}`)}`);
  }
}

export function heading(message: string): void {
  if (silent) return;
  console.log(`\n${paint(BOLD + CYAN, `▸ ${message}`)}`);
}

export function summary(label: string, value: string | number): void {
  if (silent) return;
  console.log(`  ${paint(DIM, `${label}:`)} ${paint(BOLD, String(value))}`);
}
