import { Command } from 'commander';
import { ProfileCommand } from './profile-command';
import type { ProfileGetOptions, ProfileOrgOptions } from './profile-command';

export function registerProfileCommands(program: Command): void {
  const profileCommand = new ProfileCommand();

  const profile = program
    .command('profile')
    .description('Look up people and organizations in the profile service')
    .alias('p');

  // listbridge profile get uid1 --community public
  profile
    .command('get <uid>')
    .description('Show the profile of a UID')
    .option('--community <community>', 'public, stanford, hidden, stanford_full or stanford_full_hidden')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (uid: string, options: ProfileGetOptions) => {
      await profileCommand.executeGet(uid, options);
    });

  // listbridge profile org AABB
  profile
    .command('org <orgCode>')
    .description('Resolve an organization code to its alias')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (orgCode: string, options: ProfileOrgOptions) => {
      await profileCommand.executeOrg(orgCode, options);
    });
}
