/**
 * Base command for the listbridge CLI.
 *
 * Owns output formatting, error reporting and the hand-off of global flags
 * to the dependency service.
 */

import { Command } from 'commander';
import { Errors } from '@listbridge/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand, JsonResult } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Dependency service configured from the command's flags
   */
  protected services(options: TOptions): DependencyInjectionService {
    const service = DependencyInjectionService.getInstance();
    service.configure({
      ...(options.config !== undefined ? { configPath: options.config } : {}),
      verbose: options.verbose ?? false,
      quiet: options.quiet ?? false,
    });
    return service;
  }

  /**
   * Reports a failed action and exits. Integration errors keep their code in
   * JSON output.
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      const result: JsonResult = {
        success: false,
        error: message,
        ...(Errors.isIntegrationError(error) ? { code: error.code } : {}),
        exitCode,
      };
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.error(`❌ ${message}`);
      if (isVerbose && error instanceof Error && error.stack) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently. Text mode prints `textLines`
   * when given, otherwise a rendering of `data`.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string, textLines?: string[]): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      const result: JsonResult = { success: true, data };
      console.log(JSON.stringify(result, null, 2));
      return;
    }
    if (isQuiet) {
      return;
    }
    if (message) {
      console.log(`✅ ${message}`);
    }
    for (const line of textLines ?? this.formatText(data)) {
      console.log(line);
    }
  }

  private formatText(data: unknown): string[] {
    if (data === undefined || data === null) {
      return [];
    }
    if (typeof data === 'string') {
      return [data];
    }
    return [JSON.stringify(data, null, 2)];
  }

  protected errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
