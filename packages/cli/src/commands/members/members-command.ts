import { promises as fs } from 'fs';
import { Command } from 'commander';
import { Destinations, Errors } from '@listbridge/core';
import type { Sync } from '@listbridge/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface MembersOptions extends BaseCommandOptions {
  /** File with one identifier per line */
  file?: string;
  /** Destination whose members are the source */
  from?: string;
}

export interface MembersTransferOptions extends BaseCommandOptions {
  file?: string;
  from: string[];
  to: string[];
}

export interface MembersListsOptions extends BaseCommandOptions {
  stem?: string;
}

/**
 * Parses `qualtrics:<list name>`, `workgroup:<name>` or
 * `workgroup:<stem>:<name>`.
 */
export function parseDestinationRef(text: string): Destinations.DestinationAddress {
  const separator = text.indexOf(':');
  const service = separator > 0 ? text.slice(0, separator) : '';
  const rest = separator > 0 ? text.slice(separator + 1) : '';
  if (!rest) {
    throw new Errors.InvalidDestinationError(`"${text}" is not of the form <service>:<list name>`);
  }

  switch (service) {
    case 'qualtrics':
      return { service, listName: rest };
    case 'workgroup': {
      const stemSeparator = rest.indexOf(':');
      if (stemSeparator > 0 && stemSeparator < rest.length - 1) {
        return { service, stem: rest.slice(0, stemSeparator), listName: rest.slice(stemSeparator + 1) };
      }
      return { service, listName: rest };
    }
    default:
      throw new Errors.InvalidDestinationError(
        `unknown service "${service}" (expected one of: qualtrics, workgroup)`,
        service,
        rest,
      );
  }
}

/**
 * Identifiers from the command line, kept exactly as given, followed by
 * those in `file`. File lines are trimmed; blank lines and lines starting
 * with `#` are ignored.
 */
export async function readIdentifiers(args: string[], file?: string): Promise<string[]> {
  const identifiers = [...args];
  if (file === undefined) {
    return identifiers;
  }
  const content = await fs.readFile(file, 'utf-8');
  for (const line of content.split(/\r?\n/)) {
    const identifier = line.trim();
    if (identifier && !identifier.startsWith('#')) {
      identifiers.push(identifier);
    }
  }
  return identifiers;
}

/**
 * One summary line per report; with `verbose`, one line per identifier.
 */
export function describeReport(report: Sync.OperationReport, verbose: boolean = false): string[] {
  const lines = [
    `${report.destination}: ${report.added.length} added, ${report.removed.length} removed, ` +
    `${report.skipped.length} skipped, ${report.duplicatesRemoved} duplicates removed`,
  ];
  if (!verbose) {
    return lines;
  }
  for (const identifier of report.added) {
    lines.push(`  + ${identifier}`);
  }
  for (const identifier of report.removed) {
    lines.push(`  - ${identifier}`);
  }
  for (const { identifier, reason } of report.skipped) {
    lines.push(`  = ${identifier} (${reason})`);
  }
  return lines;
}

export class MembersCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerMembersCommands() in members.ts
  }

  async executeCopy(destination: string, identifiers: string[], options: MembersOptions): Promise<void> {
    try {
      const target = parseDestinationRef(destination);
      const syncModule = await this.services(options).getSyncModule();
      const report = await syncModule.copy(await this.sourceFrom(identifiers, options), target);

      this.handleSuccess(report, options, `Copied members to ${report.destination}`, describeReport(report, options.verbose));
    } catch (error) {
      this.handleError(`Failed to copy members: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeRemove(destination: string, identifiers: string[], options: MembersOptions): Promise<void> {
    try {
      const target = parseDestinationRef(destination);
      const syncModule = await this.services(options).getSyncModule();
      const report = await syncModule.remove(await this.sourceFrom(identifiers, options), target);

      this.handleSuccess(report, options, `Removed members from ${report.destination}`, describeReport(report, options.verbose));
    } catch (error) {
      this.handleError(`Failed to remove members: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeSync(destination: string, identifiers: string[], options: MembersOptions): Promise<void> {
    try {
      const target = parseDestinationRef(destination);
      const syncModule = await this.services(options).getSyncModule();
      const report = await syncModule.sync(await this.sourceFrom(identifiers, options), target);

      this.handleSuccess(report, options, `Synchronized ${report.destination}`, describeReport(report, options.verbose));
    } catch (error) {
      this.handleError(`Failed to synchronize members: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeTransfer(identifiers: string[], options: MembersTransferOptions): Promise<void> {
    try {
      const sources = options.from.map(parseDestinationRef);
      const destinations = options.to.map(parseDestinationRef);
      const requested = await readIdentifiers(identifiers, options.file);
      if (requested.length === 0) {
        throw new Errors.InvalidSourceError('no identifiers given; pass them as arguments or with --file');
      }

      const syncModule = await this.services(options).getSyncModule();
      const report = await syncModule.transfer(requested, sources, destinations);
      const lines = [...report.copies, ...report.removals]
        .flatMap((entry) => describeReport(entry, options.verbose));

      this.handleSuccess(report, options, `Transferred ${requested.length} identifiers`, lines);
    } catch (error) {
      this.handleError(`Failed to transfer members: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeDedupe(destination: string, options: MembersOptions): Promise<void> {
    try {
      const target = parseDestinationRef(destination);
      const syncModule = await this.services(options).getSyncModule();
      const report = await syncModule.dedupe(target);

      this.handleSuccess(report, options, `Checked ${report.destination} for duplicates`, describeReport(report, options.verbose));
    } catch (error) {
      this.handleError(`Failed to remove duplicates: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeLists(service: string, options: MembersListsOptions): Promise<void> {
    try {
      const services = this.services(options);
      let names: string[];
      switch (service) {
        case 'qualtrics': {
          const directory = await services.getQualtricsDirectory();
          names = await directory.listNames();
          break;
        }
        case 'workgroup': {
          const stem = options.stem ?? (await services.getConfigManager().getWorkgroupConfig())?.stem;
          if (stem === undefined) {
            throw new Errors.InvalidDestinationError('no stem given; pass --stem or set workgroup.stem', 'workgroup');
          }
          const workgroups = await services.getWorkgroupService();
          names = await workgroups.listWorkgroupNames(stem);
          break;
        }
        default:
          throw new Errors.InvalidDestinationError(
            `unknown service "${service}" (expected one of: qualtrics, workgroup)`,
            service,
          );
      }

      this.handleSuccess(names, options, `${names.length} ${service} lists`, names);
    } catch (error) {
      this.handleError(`Failed to list destinations: ${this.errorMessage(error)}`, options, error);
    }
  }

  private async sourceFrom(identifiers: string[], options: MembersOptions): Promise<Sync.SourceInput> {
    if (options.from !== undefined) {
      if (identifiers.length > 0 || options.file !== undefined) {
        throw new Errors.InvalidSourceError('--from cannot be combined with identifiers or --file');
      }
      return parseDestinationRef(options.from);
    }
    if (identifiers.length === 0 && options.file === undefined) {
      throw new Errors.InvalidSourceError('no identifiers given; pass them as arguments, with --file, or name a --from destination');
    }
    return readIdentifiers(identifiers, options.file);
  }
}
