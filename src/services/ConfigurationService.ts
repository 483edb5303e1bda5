/**
 * Configuration Service for managing application configuration
 */

import {
  ApplicationConfig,
  AuditSettings,
  BacktestSettings,
  ConfigSection,
  ConfigurationManager,
  EngineSettings,
  EnvironmentVariables,
  RunnerSettings
} from '../config/ConfigurationManager';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { AuditService } from './AuditService';
import { RiskLimits } from './RiskManager';

export interface ConfigurationChangeEvent {
  section: ConfigSection;
  oldValue: unknown;
  newValue: unknown;
  timestamp: Date;
  userId?: string;
}

export type ConfigurationChangeListener = (event: ConfigurationChangeEvent) => void;

export interface ConfigurationServiceOptions {
  configFilePath?: string;
  env?: EnvironmentVariables;
  logger?: LoggerService;
}

export class ConfigurationService {
  private configManager: ConfigurationManager;
  private auditService: AuditService;
  private logger: LoggerService;
  private changeListeners: ConfigurationChangeListener[] = [];

  constructor(auditService: AuditService, options: ConfigurationServiceOptions = {}) {
    this.configManager = new ConfigurationManager(options.configFilePath, options.env);
    this.auditService = auditService;
    this.logger = options.logger ?? new ConsoleLogger('ConfigurationService');
  }

  /**
   * Initializes the configuration service
   */
  async initialize(): Promise<void> {
    try {
      await this.configManager.loadConfiguration();

      this.auditService.logEvent('CONFIG_LOAD', {
        action: 'initialize',
        source: this.configManager.getConfigFilePath(),
        success: true
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';

      this.auditService.logEvent('CONFIG_LOAD', {
        action: 'initialize',
        success: false,
        error: errorMessage
      });

      throw new Error(`Failed to initialize configuration service: ${errorMessage}`);
    }
  }

  getConfiguration(): ApplicationConfig {
    return this.configManager.getConfiguration();
  }

  getConfigSection<T extends ConfigSection>(section: T): ApplicationConfig[T] {
    return this.configManager.getConfigSection(section);
  }

  /**
   * Updates a configuration section with audit logging
   */
  updateConfigSection<T extends ConfigSection>(section: T, updates: Partial<ApplicationConfig[T]>, userId?: string): void {
    const oldValue = this.configManager.getConfigSection(section);

    try {
      this.configManager.updateConfigSection(section, updates);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';

      this.auditService.logEvent('CONFIG_CHANGE', {
        action: 'updateConfigSection',
        section,
        userId,
        success: false,
        error: errorMessage
      });

      throw new Error(`Failed to update configuration section ${section}: ${errorMessage}`);
    }

    const newValue = this.configManager.getConfigSection(section);

    this.auditService.logEvent('CONFIG_CHANGE', {
      action: 'updateConfigSection',
      section,
      userId,
      success: true
    });

    this.notifyChangeListeners({ section, oldValue, newValue, timestamp: new Date(), userId });
  }

  /**
   * Validates the current configuration
   */
  validateConfiguration(): { isValid: boolean; errors: string[] } {
    const validation = this.configManager.validateConfiguration(this.getConfiguration());
    return {
      isValid: validation.isValid,
      errors: validation.errors.map(e => `${e.path}: ${e.message}`)
    };
  }

  /**
   * Reloads configuration from sources
   */
  async reloadConfiguration(userId?: string): Promise<void> {
    try {
      await this.configManager.reloadConfiguration();

      this.auditService.logEvent('CONFIG_RELOAD', {
        action: 'reloadConfiguration',
        userId,
        success: true
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';

      this.auditService.logEvent('CONFIG_RELOAD', {
        action: 'reloadConfiguration',
        userId,
        success: false,
        error: errorMessage
      });

      throw new Error(`Failed to reload configuration: ${errorMessage}`);
    }
  }

  addChangeListener(listener: ConfigurationChangeListener): void {
    this.changeListeners.push(listener);
  }

  removeChangeListener(listener: ConfigurationChangeListener): void {
    const index = this.changeListeners.indexOf(listener);
    if (index > -1) {
      this.changeListeners.splice(index, 1);
    }
  }

  getEngineConfig(): EngineSettings {
    return this.getConfigSection('engine');
  }

  getRiskLimits(): RiskLimits {
    return this.getConfigSection('risk');
  }

  getBacktestConfig(): BacktestSettings {
    return this.getConfigSection('backtest');
  }

  getRunnerConfig(): RunnerSettings {
    return this.getConfigSection('runner');
  }

  getAuditConfig(): AuditSettings {
    return this.getConfigSection('audit');
  }

  isDevelopment(): boolean {
    return this.getConfiguration().environment === 'development';
  }

  isProduction(): boolean {
    return this.getConfiguration().environment === 'production';
  }

  getVersion(): string {
    return this.getConfiguration().version;
  }

  private notifyChangeListeners(event: ConfigurationChangeEvent): void {
    this.changeListeners.forEach(listener => {
      try {
        listener(event);
      } catch (error) {
        // A failing listener does not undo the update
        this.logger.error('Configuration change listener error', {
          section: event.section,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });
  }
}
