/**
 * Artifact Registry — versioned, access-controlled, content-addressed
 * storage for research artifacts.
 *
 * Entry point for the registry server, and the public exports for embedding
 * the registry in another process.
 */

import { ConfigError } from './config';
import { logger } from './logger';
import { startServer } from './server';

if (require.main === module) {
  try {
    startServer();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', { issues: err.issues });
    } else {
      logger.error('Failed to start', { message: err instanceof Error ? err.message : String(err) });
    }
    process.exitCode = 1;
  }
}

// Public exports for programmatic use
export { createApp, createAppContext, startServer } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, ConfigError } from './config';
export type { RegistryConfig } from './config';
export * from './domain';
export * from './access';
export * from './auth';
export * from './content';
export * from './registry';
export * from './storage';
export * from './audit';
export * from './logger';
