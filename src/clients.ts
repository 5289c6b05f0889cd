import { logger } from './logger.js';

/**
 * Create a getter that returns an SDK client for a given AWS region.
 *
 * Clients are created on first use and reused for as long as the getter
 * lives, which is a single invocation.
 *
 * @param serviceName - Service name, used for logging only
 * @param factory - Function that builds a client for a region
 */
const createRegionalClientGetter = <T>(
  serviceName: string,
  factory: (region: string) => T
) => {
  const clientMap = new Map<string, T>();

  return (region: string): T => {
    let client = clientMap.get(region);
    if (!client) {
      logger.debug(`Creating new ${serviceName} client for region`, {
        region,
      });
      client = factory(region);
      clientMap.set(region, client);
    }

    return client;
  };
};

export { createRegionalClientGetter };
