import chalk from "chalk";
import { formatMode } from "../core/modes.js";

export function success(text: string): string {
  return chalk.green(`✓ ${text}`);
}

export function error(text: string): string {
  return chalk.red(`✗ ${text}`);
}

export function warn(text: string): string {
  return chalk.yellow(`⚠ ${text}`);
}

export function dim(text: string): string {
  return chalk.dim(text);
}

export function mode(value: number): string {
  return chalk.cyan(formatMode(value));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
