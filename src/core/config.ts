/**
 * Runtime validation of channel and modulation parameters
 */

import { z } from 'zod';
import { ConfigurationError, type ConfigIssue } from './errors.js';
import type { ChannelConfig } from './channel.js';
import type { ModulationConfig } from './modulation.js';

// Length and attenuation are taken as given; degenerate values only yield
// degenerate attenuation factors.
export const channelConfigSchema: z.ZodType<ChannelConfig> = z.object({
  length: z.number().finite(),
  attenuation: z.number().finite(),
  noiseLevel: z.number().finite().min(0),
  signalVelocity: z.number().finite().positive(),
});

export const modulationConfigSchema: z.ZodType<ModulationConfig> = z.object({
  samplesPerBit: z.number().int().positive(),
  highAmplitude: z.number().finite(),
  lowAmplitude: z.number().finite(),
  threshold: z.number().finite().nonnegative(),
});

/**
 * Validate a merged config object, raising ConfigurationError with every issue
 */
export function parseConfig<T>(schema: z.ZodType<T>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
  throw new ConfigurationError(`Invalid ${label} config: ${summary}`, issues);
}
