import { Command } from 'commander';
import { MembersCommand } from './members-command';
import type { MembersListsOptions, MembersOptions, MembersTransferOptions } from './members-command';

const DESTINATION_HELP = 'qualtrics:<list name>, workgroup:<name> or workgroup:<stem>:<name>';

export function registerMembersCommands(program: Command): void {
  const membersCommand = new MembersCommand();

  const members = program
    .command('members')
    .description('Reconcile the membership of mailing lists and workgroups')
    .alias('m');

  // listbridge members copy "qualtrics:Spring Newsletter" uid1 uid2
  members
    .command('copy <destination> [identifiers...]')
    .description(`Add identifiers that are not yet members (${DESTINATION_HELP})`)
    .option('-f, --file <path>', 'Read identifiers from a file, one per line')
    .option('--from <destination>', 'Use the members of another destination as the source')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (destination: string, identifiers: string[], options: MembersOptions) => {
      await membersCommand.executeCopy(destination, identifiers, options);
    });

  // listbridge members remove workgroup:dept:staff uid1
  members
    .command('remove <destination> [identifiers...]')
    .description('Remove identifiers that are members')
    .option('-f, --file <path>', 'Read identifiers from a file, one per line')
    .option('--from <destination>', 'Remove the members of another destination')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (destination: string, identifiers: string[], options: MembersOptions) => {
      await membersCommand.executeRemove(destination, identifiers, options);
    });

  // listbridge members sync "qualtrics:Spring Newsletter" --file roster.txt
  members
    .command('sync <destination> [identifiers...]')
    .description('Make the membership equal to the given identifiers')
    .option('-f, --file <path>', 'Read identifiers from a file, one per line')
    .option('--from <destination>', 'Mirror the members of another destination')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (destination: string, identifiers: string[], options: MembersOptions) => {
      await membersCommand.executeSync(destination, identifiers, options);
    });

  // listbridge members transfer uid1 --from workgroup:dept:old --to workgroup:dept:new
  members
    .command('transfer [identifiers...]')
    .description('Copy identifiers to every --to destination, then remove them from every --from destination')
    .requiredOption('--from <destinations...>', 'Destinations to remove the identifiers from')
    .requiredOption('--to <destinations...>', 'Destinations to add the identifiers to')
    .option('-f, --file <path>', 'Read identifiers from a file, one per line')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (identifiers: string[], options: MembersTransferOptions) => {
      await membersCommand.executeTransfer(identifiers, options);
    });

  // listbridge members dedupe "qualtrics:Spring Newsletter"
  members
    .command('dedupe <destination>')
    .description('Delete duplicate records from a destination')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (destination: string, options: MembersOptions) => {
      await membersCommand.executeDedupe(destination, options);
    });

  // listbridge members lists workgroup --stem dept
  members
    .command('lists <service>')
    .description('List the mailing lists (qualtrics) or workgroups under a stem (workgroup)')
    .option('--stem <stem>', 'Workgroup stem (defaults to workgroup.stem in the settings file)')
    .option('-c, --config <path>', 'Settings file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (service: string, options: MembersListsOptions) => {
      await membersCommand.executeLists(service, options);
    });
}
