/**
 * Abstract DNS Provider Interface
 * Base class for DNS zone service clients
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type {
  ProviderFlavour,
  RecordSet,
  RecordSetInput,
  RecordSetUpdateInput,
  Zone,
  ZoneCreateInput,
  ZoneUpdateInput,
} from '../../types/index.js';

export interface ProviderInfo {
  name: string;
  type: string;
  flavour: ProviderFlavour;
  endpoint?: string;
  region?: string;
}

/**
 * Abstract DNS Provider base class
 */
export abstract class DNSProvider {
  protected logger: Logger;
  protected initialized: boolean = false;

  constructor(
    protected readonly cloudName: string,
    protected readonly flavour: ProviderFlavour
  ) {
    this.logger = createChildLogger({ provider: this.constructor.name, cloud: cloudName });
  }

  /**
   * Get provider information
   */
  abstract getInfo(): ProviderInfo;

  /**
   * Authenticate and locate the DNS endpoint
   */
  abstract init(): Promise<void>;

  abstract listZones(): Promise<Zone[]>;

  /**
   * Look up a zone by exact name; null when it does not exist
   */
  abstract getZone(name: string): Promise<Zone | null>;

  abstract createZone(input: ZoneCreateInput): Promise<Zone>;

  abstract updateZone(zoneId: string, input: ZoneUpdateInput): Promise<Zone>;

  abstract listRecordSets(zoneId: string): Promise<RecordSet[]>;

  abstract createRecordSet(zoneId: string, input: RecordSetInput): Promise<RecordSet>;

  abstract updateRecordSet(zoneId: string, recordSetId: string, input: RecordSetUpdateInput): Promise<RecordSet>;

  abstract deleteRecordSet(zoneId: string, recordSetId: string): Promise<void>;

  getCloudName(): string {
    return this.cloudName;
  }

  getFlavour(): ProviderFlavour {
    return this.flavour;
  }

  isInitialized(): boolean {
    return this.initialized;
  }
}
