import { describe, it, expect } from 'vitest';
import { channelConfigSchema, modulationConfigSchema, parseConfig } from '@/core/config';
import { ConfigurationError, ErrorCodes } from '@/core/errors';

describe('parseConfig', () => {
  it('should return a valid config unchanged', () => {
    const config = { length: 50, attenuation: 0.2, noiseLevel: 0, signalVelocity: 3e8 };

    expect(parseConfig(channelConfigSchema, config, 'channel')).toEqual(config);
  });

  it('should accept a negative length', () => {
    const config = { length: -10, attenuation: 0.1, noiseLevel: 0.05, signalVelocity: 2e8 };

    expect(parseConfig(channelConfigSchema, config, 'channel').length).toBe(-10);
  });

  it('should collect every issue with its path', () => {
    const config = { length: 100, attenuation: 0.1, noiseLevel: -1, signalVelocity: 0 };

    expect(() => parseConfig(channelConfigSchema, config, 'channel')).toThrow(ConfigurationError);
    try {
      parseConfig(channelConfigSchema, config, 'channel');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
        expect(error.issues.map((issue) => issue.path)).toEqual(['noiseLevel', 'signalVelocity']);
        expect(error.message.startsWith('Invalid channel config: noiseLevel: ')).toBe(true);
      }
    }
  });

  it('should reject missing and non-numeric fields', () => {
    expect(() =>
      parseConfig(modulationConfigSchema, { samplesPerBit: '20' }, 'modulation')
    ).toThrow(/Invalid modulation config: samplesPerBit/);
  });

  it('should reject non-finite values', () => {
    const config = { length: Infinity, attenuation: 0.1, noiseLevel: 0, signalVelocity: 1 };

    expect(() => parseConfig(channelConfigSchema, config, 'channel')).toThrow(/length/);
  });
});
