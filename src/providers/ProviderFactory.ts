/**
 * DNS Provider Factory
 * Turns a named cloud profile into a connected provider
 */
import { logger } from '../core/Logger.js';
import { DnsSyncError } from '../core/errors.js';
import { resolveCloud, type ResolvedCloud } from '../config/CloudConfig.js';
import { DNSProvider } from './base/DNSProvider.js';
import { DesignateProvider, type DesignateProviderOptions } from './designate/DesignateProvider.js';

export interface ConnectOptions extends DesignateProviderOptions {
  /** Explicit clouds.yaml path */
  cloudsFile?: string;
}

/**
 * Create a provider for a resolved cloud, without connecting it
 */
export function createProvider(cloud: ResolvedCloud, options: DesignateProviderOptions = {}): DNSProvider {
  logger.debug({ cloud: cloud.name, flavour: cloud.flavour }, 'Creating DNS provider');
  return new DesignateProvider(cloud.name, cloud.profile, cloud.flavour, options);
}

/**
 * Resolve, create and authenticate a provider for a named cloud
 */
export async function connect(cloudName: string, options: ConnectOptions = {}): Promise<DNSProvider> {
  const cloud = resolveCloud(cloudName, { cloudsFile: options.cloudsFile });
  const provider = createProvider(cloud, { pageLimit: options.pageLimit });

  try {
    await provider.init();
  } catch (error) {
    if (error instanceof DnsSyncError) {
      throw error;
    }
    throw DnsSyncError.connection(cloudName, error);
  }

  return provider;
}

export type ConnectFn = typeof connect;
