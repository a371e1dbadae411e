import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ProfileGetOptions extends BaseCommandOptions {
  community?: string;
}

export interface ProfileOrgOptions extends BaseCommandOptions {}

export class ProfileCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerProfileCommands() in profile.ts
  }

  async executeGet(uid: string, options: ProfileGetOptions): Promise<void> {
    try {
      const client = await this.services(options).getProfileClient();
      const profile = await client.getProfileByUid(uid, options.community);
      if (profile === null) {
        this.handleError(`No profile found for ${uid}`, options);
        return;
      }

      this.handleSuccess(profile, options, `Profile of ${uid}`);
    } catch (error) {
      this.handleError(`Failed to read profile: ${this.errorMessage(error)}`, options, error);
    }
  }

  async executeOrg(orgCode: string, options: ProfileOrgOptions): Promise<void> {
    try {
      const client = await this.services(options).getProfileClient();
      const alias = await client.getOrgAlias(orgCode);
      if (alias === null) {
        this.handleError(`No organization found for ${orgCode}`, options);
        return;
      }

      this.handleSuccess({ orgCode, alias }, options, undefined, [alias]);
    } catch (error) {
      this.handleError(`Failed to resolve organization: ${this.errorMessage(error)}`, options, error);
    }
  }
}
