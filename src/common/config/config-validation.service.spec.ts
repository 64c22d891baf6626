import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { ConfigValidationService } from './config-validation.service';
import { RuleSetRegistry } from '../../standings/rule-set.registry';

describe('ConfigValidationService', () => {
  let service: ConfigValidationService;
  let values: Record<string, unknown>;

  beforeEach(async () => {
    values = {
      nodeEnv: 'development',
      'database.host': 'localhost',
      'database.port': 5432,
      'database.username': 'postgres',
      'database.password': 'test-secret',
      'database.database': 'group_standings',
      'database.poolSize': 10,
      'standings.defaultPreset': 'fifa-2018',
      'standings.logSteps': false,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConfigValidationService,
        RuleSetRegistry,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => values[key]) },
        },
      ],
    }).compile();

    service = module.get<ConfigValidationService>(ConfigValidationService);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass a complete configuration', () => {
    expect(() => service.validate()).not.toThrow();
  });

  it('should reject an unknown default preset', () => {
    values['standings.defaultPreset'] = 'world-cup-1930';
    const error = jest.spyOn(Logger.prototype, 'error');

    expect(() => service.validate()).toThrow('Configuration validation failed');
    expect(error).toHaveBeenCalledWith(
      '  - STANDINGS_DEFAULT_PRESET must be one of: fifa-2018, euro-2020',
    );
  });

  it('should reject an out of range port', () => {
    values['database.port'] = 70000;

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should only warn about step logging in production', () => {
    values.nodeEnv = 'production';
    values['standings.logSteps'] = true;
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

    expect(() => service.validate()).not.toThrow();
    expect(warn).toHaveBeenCalledWith('  - STANDINGS_LOG_STEPS is enabled in production');
  });
});
