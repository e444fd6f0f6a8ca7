import { notifyRunnerUpdate } from "./events.js";

const TITLE_WIDTH = 80;
const maxLogLines = 100;

const log: string[] = [];

export function appendLog(line: string): void {
  log.push(line);
  if (log.length > maxLogLines) log.shift();
  notifyRunnerUpdate("log");
}

export function getLog(): string[] {
  return [...log];
}

export function clearLog(): void {
  log.length = 0;
  notifyRunnerUpdate("log");
}

/**
 * Center `message` in an 80-column rule of "=". Odd padding puts the extra "=" on the right.
 */
export function formatTitle(message: string): string {
  const padding = Math.max(0, TITLE_WIDTH - message.length - 4);
  const left = "=".repeat(Math.floor(padding / 2));
  const right = "=".repeat(Math.ceil(padding / 2));
  return `${left} ${message} ${right}`;
}

/** Print a section title to the console and the run log. */
export function logTitle(message: string): void {
  console.log(formatTitle(message));
  appendLog(`== ${message}`);
}

/** Print a line to the console and the run log. */
export function logLine(line: string): void {
  console.log(line);
  appendLog(line);
}
