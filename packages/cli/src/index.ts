#!/usr/bin/env node

import { Command } from 'commander';
import { registerMembersCommands } from './commands/members/members';
import { registerSurveyCommands } from './commands/survey/survey';
import { registerProfileCommands } from './commands/profile/profile';

const program = new Command();

program
  .name('listbridge')
  .description('Keep mailing lists, workgroups and survey data in step with your rosters')
  .version('0.1.0');

// Commands read the settings file lazily, so registration needs no I/O
function setupCommands(): void {
  registerMembersCommands(program);
  registerSurveyCommands(program);
  registerProfileCommands(program);
}

setupCommands();
program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
