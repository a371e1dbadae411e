/**
 * Standard command interface for the listbridge CLI.
 *
 * Commands register themselves on a Commander program and share the output
 * flags below.
 */

import { Command } from 'commander';

/**
 * Options every command accepts
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** Path to the YAML settings file */
  config?: string;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Shape of a successful or failed command result printed with `--json`
 */
export type JsonResult =
  | { success: true; data: unknown }
  | { success: false; error: string; code?: string; exitCode: number };
