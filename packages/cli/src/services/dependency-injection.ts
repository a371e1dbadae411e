import {
  Config,
  ConfigStore,
  Destinations,
  DuplicateResolver,
  Errors,
  ExportPoller,
  Http,
  Logger,
  ProfileLookup,
  RequestExecutor,
  Surveys,
  Sync,
} from '@listbridge/core';

export type ServiceOptions = {
  configPath?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Dependency Injection Service for the listbridge CLI
 *
 * Reads the settings file once and builds the authenticated request
 * functions, clients and the sync module the commands need.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configPath: string | undefined;
  private verbose: boolean = false;
  private quiet: boolean = false;
  private configStore: ConfigStore.ConfigStore | null = null;
  private fetchFn: Http.FetchFn | undefined;
  private configManager: Config.ConfigManager | null = null;
  private directory: Promise<Destinations.QualtricsDirectory> | null = null;
  private syncModule: Sync.MembershipSyncModule | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Applies global flags. Pointing at another settings file drops every
   * client built from the previous one.
   */
  configure(options: ServiceOptions): void {
    if (options.configPath !== undefined && options.configPath !== this.configPath) {
      this.configPath = options.configPath;
      this.configStore = null;
      this.clearClients();
    }
    this.verbose = options.verbose ?? false;
    this.quiet = options.quiet ?? false;
  }

  /**
   * Replaces the settings file with another store (tests, embedding).
   */
  useConfigStore(store: ConfigStore.ConfigStore): void {
    this.configStore = store;
    this.clearClients();
  }

  /**
   * Replaces global fetch for every request function built afterwards.
   */
  useFetch(fetchFn: Http.FetchFn): void {
    this.fetchFn = fetchFn;
    this.clearClients();
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = new Config.ConfigManager(this.getConfigStore());
    }
    return this.configManager;
  }

  /**
   * `--verbose` and `--quiet` win over the configured level; with neither
   * and no configured level the logger follows the environment.
   */
  async getLogger(prefix: string): Promise<Logger.Logger> {
    if (this.verbose) {
      return Logger.createLogger(prefix, 'debug');
    }
    if (this.quiet) {
      return Logger.createLogger(prefix, 'error');
    }
    const config = await this.getConfigManager().loadConfig();
    return Logger.createLogger(prefix, config.logLevel);
  }

  /**
   * Retrying executor over one authenticated request function.
   */
  async createRequestExecutor(request: Http.MakeRequestFn): Promise<RequestExecutor.RequestExecutor> {
    const policy = await this.getConfigManager().getRetryPolicy();
    return new RequestExecutor.RequestExecutor({
      request,
      maxAttempts: policy.maxAttempts,
      logger: await this.getLogger('[RequestExecutor] '),
    });
  }

  async getQualtricsDirectory(): Promise<Destinations.QualtricsDirectory> {
    if (!this.directory) {
      this.directory = this.openDirectory().catch((error: unknown) => {
        this.directory = null;
        throw error;
      });
    }
    return this.directory;
  }

  async getWorkgroupService(): Promise<Destinations.WorkgroupService> {
    const config = await this.requireSection('workgroup', await this.getConfigManager().getWorkgroupConfig());
    const request = this.bearerRequest(config.token);
    return new Destinations.WorkgroupService({
      request,
      executor: await this.createRequestExecutor(request),
      baseUrl: config.baseUrl,
      logger: await this.getLogger('[WorkgroupService] '),
    });
  }

  /**
   * Resolver over every service present in the settings file. Services that
   * are not configured are rejected when a command names them.
   */
  async getDestinationResolver(): Promise<Destinations.DestinationResolver> {
    const manager = this.getConfigManager();
    const qualtrics = await manager.getQualtricsConfig();
    const workgroup = await manager.getWorkgroupConfig();

    return new Destinations.DestinationResolver({
      ...(qualtrics ? { openDirectory: () => this.getQualtricsDirectory() } : {}),
      ...(workgroup ? { workgroups: await this.getWorkgroupService() } : {}),
      ...(workgroup?.stem !== undefined ? { defaultStem: workgroup.stem } : {}),
      logger: await this.getLogger('[DestinationResolver] '),
    });
  }

  async getSyncModule(): Promise<Sync.MembershipSyncModule> {
    if (!this.syncModule) {
      this.syncModule = new Sync.MembershipSyncModule({
        resolver: await this.getDestinationResolver(),
        duplicates: new DuplicateResolver.DuplicateResolver({
          logger: await this.getLogger('[DuplicateResolver] '),
        }),
        logger: await this.getLogger('[MembershipSync] '),
      });
    }
    return this.syncModule;
  }

  async getProfileClient(): Promise<ProfileLookup.ProfileClient> {
    const config = await this.requireSection('profiles', await this.getConfigManager().getProfileConfig());
    return new ProfileLookup.ProfileClient({
      request: this.bearerRequest(config.token),
      baseUrl: config.baseUrl,
      logger: await this.getLogger('[ProfileClient] '),
    });
  }

  async getSurveyClient(surveyId: string): Promise<Surveys.SurveyClient> {
    const manager = this.getConfigManager();
    const config = await this.requireSection('qualtrics', await manager.getQualtricsConfig());
    const request = this.qualtricsRequest(config.apiToken);
    const policy = await manager.getExportPolicy();

    return new Surveys.SurveyClient({
      request,
      executor: await this.createRequestExecutor(request),
      poller: new ExportPoller.ExportPoller({
        request,
        ...policy,
        logger: await this.getLogger('[ExportPoller] '),
      }),
      baseUrl: Destinations.qualtricsBaseUrl(config.dataCenter),
      surveyId,
      logger: await this.getLogger('[SurveyClient] '),
    });
  }

  private getConfigStore(): ConfigStore.ConfigStore {
    if (!this.configStore) {
      const explicit = this.configPath;
      this.configStore = new ConfigStore.FsConfigStore(
        ConfigStore.FsConfigStore.resolvePath(explicit !== undefined ? { explicit } : {}),
      );
    }
    return this.configStore;
  }

  private async openDirectory(): Promise<Destinations.QualtricsDirectory> {
    const config = await this.requireSection('qualtrics', await this.getConfigManager().getQualtricsConfig());
    const request = this.qualtricsRequest(config.apiToken);
    return Destinations.QualtricsDirectory.open({
      request,
      executor: await this.createRequestExecutor(request),
      baseUrl: Destinations.qualtricsBaseUrl(config.dataCenter),
      directoryId: config.directoryId,
      logger: await this.getLogger('[QualtricsDirectory] '),
    });
  }

  private requireSection<T>(section: string, value: T | null): T {
    if (value === null) {
      throw new Errors.InvalidConfigError(this.getConfigStore().describe(), [
        `/${section}: section is required for this command`,
      ]);
    }
    return value;
  }

  private qualtricsRequest(apiToken: string): Http.MakeRequestFn {
    return this.createRequest({ 'X-API-TOKEN': apiToken, Accept: 'application/json' });
  }

  private bearerRequest(token: string): Http.MakeRequestFn {
    return this.createRequest({ Authorization: `Bearer ${token}`, Accept: 'application/json' });
  }

  private createRequest(headers: Record<string, string>): Http.MakeRequestFn {
    return Http.createRequestFn({
      headers,
      ...(this.fetchFn ? { fetchFn: this.fetchFn } : {}),
    });
  }

  private clearClients(): void {
    this.configManager = null;
    this.directory = null;
    this.syncModule = null;
  }
}
