/**
 * Shared CLI context: configuration, logger and the retrieval services built
 * from them
 *
 * @module cli/lib/context
 */

import { HTTPClient } from '../../core/http-client.js';
import { DatasetReader } from '../../retrieval/dataset-reader.js';
import { MepsRemoteSource } from '../../providers/meps-remote-source.js';
import { PufNameRegistry } from '../../providers/puf-name-registry.js';
import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

export interface CLIServices {
  readonly reader: DatasetReader;
  readonly registry: PufNameRegistry;
  readonly remoteSource: MepsRemoteSource;
}

export interface CLIContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly services: CLIServices;
  readonly startTime: number;
}

export function createServices(config: CLIConfig, logger: CLILogger): CLIServices {
  const httpClient = new HTTPClient({
    timeoutMs: config.services.meps.timeout,
    maxRetries: config.services.meps.retries,
  });

  const registry = new PufNameRegistry({
    tablePath: config.services.names.table,
    remoteUrl: config.services.names.url,
    httpClient,
  });

  const remoteSource = new MepsRemoteSource({
    baseUrl: config.services.meps.baseUrl,
    downloadDir: config.paths.downloads,
    httpClient,
  });

  const reader = new DatasetReader({
    nameMapper: registry,
    remoteSource,
    logger,
  });

  return { reader, registry, remoteSource };
}

export function createContext(config: CLIConfig, logger: CLILogger): CLIContext {
  return {
    config,
    logger,
    services: createServices(config, logger),
    startTime: Date.now(),
  };
}
