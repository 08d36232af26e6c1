import type { Command } from '@oclif/core';
import chalk from 'chalk';
import type { AllocationIssue, Collision, SkippedFile } from '../../eventids/index.js';
import { describeAllocationIssue } from '../../eventids/index.js';

/**
 * Output data as JSON or plain text based on the json flag.
 * @param command The command instance (for this.log)
 * @param json Whether to output as JSON
 * @param data The data to output (for JSON mode)
 * @param plainFn Function to call for plain text output
 */
export function outputJsonOrPlain<T>(command: Command, json: boolean, data: T, plainFn: () => void): void {
  if (json) {
    command.log(JSON.stringify(data, null, 2));
  } else {
    plainFn();
  }
}

/**
 * Create a horizontal separator line.
 */
export function tableSeparator(width: number, char = '─'): string {
  return char.repeat(width);
}

export function formatSkipped(file: SkippedFile): string {
  return chalk.yellow(`Skipped ${file.path}: ${file.reason}`);
}

export function formatCollision(collision: Collision): string {
  return chalk.red(`Collision: event ID ${collision.eventId} used in ${collision.files.join(', ')}`);
}

export function formatAllocationIssue(issue: AllocationIssue): string {
  return chalk.red(`  ${describeAllocationIssue(issue)}`);
}
