/**
 * ConfigurableLoggerFactory 单元测试
 */

import { WinstonLogger } from 'global-logger-factory';
import { describe, expect, it } from 'vitest';
import { ConfigurableLoggerFactory } from '../../src/logging/ConfigurableLoggerFactory';

describe('ConfigurableLoggerFactory', () => {
  it('should create winston backed loggers', () => {
    const factory = new ConfigurableLoggerFactory('error');

    expect(factory.createLogger('ManualParser')).toBeInstanceOf(WinstonLogger);
  });

  it('should create a logger per label', () => {
    const factory = new ConfigurableLoggerFactory('error', { showLocation: true });

    expect(factory.createLogger('a')).not.toBe(factory.createLogger('b'));
  });
});
