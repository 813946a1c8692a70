import { InvalidConfigurationError } from '@boardscout/core';
import {
  parseScrapingConfiguration,
  scrapingConfigurationSchema,
  formatIssues,
  type ScrapingConfiguration,
} from '@boardscout/schemas';

/**
 * Build a configuration from its flat form (oracle answer, operator input).
 * Throws InvalidConfigurationError; nothing has been navigated at that point.
 */
export function createScrapingConfiguration(input: unknown): ScrapingConfiguration {
  const result = parseScrapingConfiguration(input);
  if (!result.success) throw new InvalidConfigurationError(result.error);
  return result.data;
}

/** Re-check a structured configuration (e.g. loaded from storage) before running it. */
export function assertExecutable(configuration: unknown): ScrapingConfiguration {
  const result = scrapingConfigurationSchema.safeParse(configuration);
  if (!result.success) throw new InvalidConfigurationError(formatIssues(result.error));
  return result.data;
}

export function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}
