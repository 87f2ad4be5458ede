import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { ConfigurationError } from '../common/errors';
import { RegistryConfig } from '../registry/types';

/**
 * YAML services configuration schema
 */
export interface YamlServicesConfig {
  services: {
    /** Well-known address of the signalling server */
    server_address?: string;

    /** Rooms in which worker pools announce themselves */
    breweries?: {
      recording?: string;
      sip_recording?: string;
      sip_gateway?: string;
    };
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Partial<YamlServicesConfig>;
  };
}

/**
 * YAML configuration loader for the services registry
 */
export class ServicesConfiguration extends EventEmitter {
  private config: YamlServicesConfig | null = null;
  private baseConfig: YamlServicesConfig | null = null;
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.setConfig(this.parseFromYaml(yamlContent));
      this.configPath = filePath;
      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        'INVALID_CONFIGURATION',
        `Failed to load YAML configuration from ${filePath}: ${errorMessage}`,
        { filePath }
      );
    }
  }

  /**
   * Load configuration from a YAML string
   */
  loadFromString(yamlContent: string): void {
    this.setConfig(this.parseFromYaml(yamlContent));
    this.emit('config-loaded', { config: this.config });
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlServicesConfig {
    try {
      const parsed: unknown = yaml.load(yamlContent);
      return this.validateConfiguration(parsed);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(
        'INVALID_CONFIGURATION',
        `Failed to parse YAML configuration: ${errorMessage}`
      );
    }
  }

  /**
   * Convert the loaded configuration into registry settings.
   * Blank brewery names count as not configured.
   */
  toRegistryConfig(): RegistryConfig {
    if (!this.config) {
      throw new ConfigurationError('INVALID_CONFIGURATION', 'No configuration loaded');
    }

    const { server_address, breweries = {} } = this.config.services;
    return {
      serverAddress: nonBlank(server_address),
      breweries: {
        recording: nonBlank(breweries.recording),
        sipRecording: nonBlank(breweries.sip_recording),
        sipGateway: nonBlank(breweries.sip_gateway)
      }
    };
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(
    base: YamlServicesConfig,
    override: Partial<YamlServicesConfig>
  ): YamlServicesConfig {
    return {
      services: {
        ...base.services,
        ...override.services,
        breweries: { ...base.services.breweries, ...override.services?.breweries }
      },
      environments: { ...base.environments, ...override.environments }
    };
  }

  /**
   * Get current configuration
   */
  getConfig(): YamlServicesConfig | null {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Set environment for configuration overrides
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    if (this.baseConfig) {
      this.applyEnvironmentOverrides();
    }
  }

  private setConfig(config: YamlServicesConfig): void {
    this.baseConfig = config;
    this.applyEnvironmentOverrides();
  }

  /**
   * Validate configuration structure
   */
  private validateConfiguration(parsed: unknown): YamlServicesConfig {
    if (!isRecord(parsed)) {
      throw new Error('configuration must be a mapping');
    }

    const services = parsed.services;
    if (!isRecord(services)) {
      throw new Error('services section is required');
    }

    const result: YamlServicesConfig = { services: validateServices(services, 'services') };

    const environments: Record<string, Partial<YamlServicesConfig>> = {};
    const overrides = parsed.environments;
    if (overrides !== undefined && overrides !== null) {
      if (!isRecord(overrides)) {
        throw new Error('environments must be a mapping');
      }
      for (const [env, override] of Object.entries(overrides)) {
        environments[env] = validateOverride(override, `environments.${env}`);
      }
    }

    if (Object.keys(environments).length > 0) {
      result.environments = environments;
    }
    return result;
  }

  /**
   * Apply environment-specific configuration overrides
   */
  private applyEnvironmentOverrides(): void {
    if (!this.baseConfig) {
      return;
    }

    const envOverrides = this.baseConfig.environments?.[this.currentEnvironment];
    this.config = envOverrides
      ? ServicesConfiguration.mergeConfigurations(this.baseConfig, envOverrides)
      : this.baseConfig;
  }
}

/**
 * An override may leave out the services section but cannot nest further environments
 */
function validateOverride(override: unknown, prefix: string): Partial<YamlServicesConfig> {
  if (override === undefined || override === null) {
    return {};
  }
  if (!isRecord(override)) {
    throw new Error(`${prefix} must be a mapping`);
  }
  if (override.environments !== undefined) {
    throw new Error(`${prefix} cannot define nested environments`);
  }

  const services = override.services;
  if (services === undefined || services === null) {
    return {};
  }
  if (!isRecord(services)) {
    throw new Error(`${prefix}.services must be a mapping`);
  }
  return { services: validateServices(services, `${prefix}.services`) };
}

function validateServices(services: Record<string, unknown>, prefix: string): YamlServicesConfig['services'] {
  const result: YamlServicesConfig['services'] = {};

  const serverAddress = services.server_address;
  if (typeof serverAddress === 'string') {
    result.server_address = serverAddress;
  } else if (serverAddress !== undefined && serverAddress !== null) {
    throw new Error(`${prefix}.server_address must be a string`);
  }

  const breweries = services.breweries;
  if (isRecord(breweries)) {
    const names: Record<string, string> = {};
    for (const [key, value] of Object.entries(breweries)) {
      if (typeof value === 'string') {
        names[key] = value;
      } else if (value !== undefined && value !== null) {
        throw new Error(`${prefix}.breweries.${key} must be a string`);
      }
    }
    result.breweries = names;
  } else if (breweries !== undefined && breweries !== null) {
    throw new Error(`${prefix}.breweries must be a mapping`);
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonBlank(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}
