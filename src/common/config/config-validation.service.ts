import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RuleSetRegistry } from '../../standings/rule-set.registry';

/**
 * Configuration Validation Service
 *
 * Validates environment-driven configuration on startup.
 * Fails fast for invalid critical settings, warns for optional ones.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);
  private errors: string[] = [];
  private warnings: string[] = [];

  constructor(
    private configService: ConfigService,
    private ruleSetRegistry: RuleSetRegistry,
  ) {}

  /**
   * Validates all configuration values
   * Throws error if critical configs are missing/invalid
   */
  validate(): void {
    this.errors = [];
    this.warnings = [];
    this.logger.log('Validating configuration...');

    this.validateDatabase();
    this.validateStandings();

    if (this.errors.length > 0) {
      this.logger.error('Configuration validation failed:');
      this.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error(`Configuration validation failed. Fix the above errors and restart.`);
    }

    if (this.warnings.length > 0) {
      this.logger.warn('Configuration warnings:');
      this.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('Configuration validation passed');
  }

  private validateDatabase(): void {
    const host = this.configService.get<string>('database.host');
    const port = this.configService.get<number>('database.port');
    const username = this.configService.get<string>('database.username');
    const password = this.configService.get<string>('database.password');
    const database = this.configService.get<string>('database.database');
    const poolSize = this.configService.get<number>('database.poolSize');

    if (!host) {
      this.errors.push('DATABASE_HOST is required but missing');
    }

    if (!port || port < 1 || port > 65535) {
      this.errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    }

    if (!username) {
      this.errors.push('DATABASE_USERNAME is required but missing');
    }

    if (!password) {
      this.warnings.push('DATABASE_PASSWORD is not set');
    }

    if (!database) {
      this.errors.push('DATABASE_NAME is required but missing');
    }

    if (poolSize !== undefined && (poolSize < 1 || poolSize > 100)) {
      this.errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateStandings(): void {
    const preset = this.configService.get<string>('standings.defaultPreset');

    if (!preset) {
      this.errors.push('STANDINGS_DEFAULT_PRESET is required but missing');
    } else if (!this.ruleSetRegistry.has(preset)) {
      this.errors.push(
        `STANDINGS_DEFAULT_PRESET must be one of: ${this.ruleSetRegistry.names().join(', ')}`,
      );
    }

    const logSteps = this.configService.get<boolean>('standings.logSteps');
    this.logger.log(`Refinement step logging: ${logSteps ? 'ENABLED' : 'DISABLED'}`);

    if (logSteps && this.configService.get<string>('nodeEnv') === 'production') {
      this.warnings.push('STANDINGS_LOG_STEPS is enabled in production');
    }
  }
}
