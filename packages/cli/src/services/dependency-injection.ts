import { Config, Dates, DistroInfo, Logger, Releases, Sources } from '@distro-info/core';
import { FsDatasetSource } from '@distro-info/core/fs';

/**
 * Dependency Injection Service for the distro-info CLIs
 *
 * Resolves configuration once per run and hands out the dataset source and
 * loaded DistroInfo instances built from it.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: Config.ConfigManager | null = null;
  private overrides: Config.ConfigOverrides = {};
  private config: Config.DistroInfoConfig | null = null;
  private datasetSource: Sources.DatasetSource | null = null;
  private readonly distroInfos = new Map<Releases.DistroName, DistroInfo>();

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
   * Drops the singleton so tests start from a clean state
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Sets values that take precedence over the environment and config file.
   * Clears everything resolved from the previous settings.
   */
  configure(overrides: Config.ConfigOverrides): void {
    this.overrides = { ...overrides };
    this.config = null;
    this.datasetSource = null;
    this.distroInfos.clear();
  }

  getConfigManager(): Config.ConfigManager {
    if (!this.configManager) {
      this.configManager = Config.createConfigManager();
    }
    return this.configManager;
  }

  /**
   * Resolves configuration and applies its log level to every logger
   */
  async getConfig(): Promise<Config.DistroInfoConfig> {
    if (!this.config) {
      this.config = await this.getConfigManager().resolve(this.overrides);
      Logger.setLogLevel(this.config.logLevel);
    }
    return this.config;
  }

  async getDatasetSource(): Promise<Sources.DatasetSource> {
    if (!this.datasetSource) {
      const config = await this.getConfig();
      this.datasetSource = new FsDatasetSource({ dataDir: config.dataDir });
    }
    return this.datasetSource;
  }

  /**
   * Creates and returns the DistroInfo for a distribution, loading its
   * dataset on first use
   */
  async getDistroInfo(variant: Releases.DistroVariant): Promise<DistroInfo> {
    const cached = this.distroInfos.get(variant.name);
    if (cached) {
      return cached;
    }
    const source = await this.getDatasetSource();
    const distroInfo = await DistroInfo.fromSource(source, variant);
    this.distroInfos.set(variant.name, distroInfo);
    return distroInfo;
  }

  /**
   * Default as-of date: the current local calendar day
   */
  getToday(): Dates.CalendarDate {
    return Dates.CalendarDate.fromDate(new Date());
  }
}
