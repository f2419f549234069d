import { configureLogging, createServices, type ServiceOverrides, type Services } from './app.js';
import { loadConfig } from './config.js';
import { setLogLevel } from './logger.js';

export interface ServiceOptions extends ServiceOverrides {
  /** Raise logging to debug regardless of LOG_LEVEL */
  verbose?: boolean;
}

/**
 * Build the services from the environment for one CLI invocation.
 * Throws ConfigError when required settings are missing.
 */
export function getServices(options: ServiceOptions = {}): Services {
  const { verbose, ...overrides } = options;
  const config = loadConfig(overrides.env ?? process.env);
  configureLogging(config);
  if (verbose) {
    setLogLevel('debug');
  }
  return createServices(config, overrides);
}
