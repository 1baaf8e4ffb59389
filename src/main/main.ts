/**
 * Bootstrap: builds and initializes the service container from a config file.
 *
 * Usage:
 *   const container = await bootstrap('./qa.config.json');
 *   const qa = container.get('qa');
 */

import { ServiceContainer, type ServiceContainerOptions } from './services/service-container';
import { createLogger } from './services/logger';

const log = createLogger('Main');

export async function bootstrap(
  configPath?: string,
  options: Omit<ServiceContainerOptions, 'configOptions'> = {},
): Promise<ServiceContainer> {
  const container = new ServiceContainer({ ...options, configOptions: { configPath } });
  await container.init();

  const stats = container.get('qa').getStatistics();
  log.info(
    `QA core ready: ${stats.graph.totalNodes} nodes, ${stats.indexedBehaviors} behaviors indexed ` +
      `with ${stats.embeddingModel ?? 'no model'}`,
  );
  return container;
}
