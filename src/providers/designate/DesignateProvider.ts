/**
 * OpenStack Designate DNS Provider Implementation
 * Talks to the Designate v2 REST API with a Keystone token
 */
import { DNSProvider, type ProviderInfo } from '../base/DNSProvider.js';
import { KeystoneAuth, type KeystoneSession } from './KeystoneAuth.js';
import { ConnectionError, DnsSyncError, ProviderApiError, getErrorMessage } from '../../core/errors.js';
import type { CloudProfile } from '../../config/schema.js';
import type {
  ProviderFlavour,
  RecordSet,
  RecordSetInput,
  RecordSetUpdateInput,
  Zone,
  ZoneCreateInput,
  ZoneUpdateInput,
} from '../../types/index.js';

interface DesignateZone {
  id: string;
  name: string;
  email: string;
  ttl: number;
  serial?: number;
  status?: string;
  type?: string;
  description?: string | null;
}

interface DesignateRecordSet {
  id: string;
  zone_id: string;
  name: string;
  type: string;
  ttl: number | null;
  records: string[];
  status?: string;
}

interface DesignateLinks {
  self?: string;
  next?: string;
}

interface DesignateZoneList {
  zones?: DesignateZone[];
  links?: DesignateLinks;
}

interface DesignateRecordSetList {
  recordsets?: DesignateRecordSet[];
  links?: DesignateLinks;
}

interface DesignateErrorBody {
  code?: number;
  type?: string;
  message?: string;
}

export interface DesignateProviderOptions {
  /** Page size for list calls */
  pageLimit?: number;
}

/**
 * OpenStack Designate DNS Provider
 */
export class DesignateProvider extends DNSProvider {
  private readonly auth: KeystoneAuth;
  private session: KeystoneSession | null = null;
  private readonly pageLimit: number;

  constructor(
    cloudName: string,
    private readonly profile: CloudProfile,
    flavour: ProviderFlavour,
    options: DesignateProviderOptions = {}
  ) {
    super(cloudName, flavour);
    this.auth = new KeystoneAuth(cloudName, profile);
    this.pageLimit = options.pageLimit ?? 100;
  }

  getInfo(): ProviderInfo {
    return {
      name: this.cloudName,
      type: 'designate',
      flavour: this.flavour,
      endpoint: this.session?.dnsEndpoint,
      region: this.profile.region_name,
    };
  }

  async init(): Promise<void> {
    this.logger.debug('Initializing Designate provider');

    this.session = await this.auth.authenticate();
    this.initialized = true;

    this.logger.debug({ endpoint: this.session.dnsEndpoint, flavour: this.flavour }, 'Connected to DNS service');
  }

  async listZones(): Promise<Zone[]> {
    const zones = await this.collectPages<DesignateZone, DesignateZoneList>(
      `/zones?limit=${this.pageLimit}`,
      (page) => page.zones
    );
    this.logger.debug({ count: zones.length }, 'Zones listed');
    return zones.map((zone) => this.convertZone(zone));
  }

  async getZone(name: string): Promise<Zone | null> {
    const page = await this.makeRequest<DesignateZoneList>('GET', `/zones?name=${encodeURIComponent(name)}`);
    const zone = page.zones?.find((z) => z.name === name);
    return zone ? this.convertZone(zone) : null;
  }

  async createZone(input: ZoneCreateInput): Promise<Zone> {
    this.logger.debug({ zone: input.name, ttl: input.ttl, email: input.email }, 'Creating zone');

    const created = await this.makeRequest<DesignateZone>('POST', '/zones', {
      name: input.name,
      email: input.email,
      ttl: input.ttl,
      type: 'PRIMARY',
      ...(input.description ? { description: input.description } : {}),
    });

    this.logger.debug({ zone: created.name }, 'Zone created');
    return this.convertZone(created);
  }

  async updateZone(zoneId: string, input: ZoneUpdateInput): Promise<Zone> {
    this.logger.debug({ zoneId, ...input }, 'Updating zone');
    const updated = await this.makeRequest<DesignateZone>('PATCH', `/zones/${zoneId}`, { ...input });
    this.logger.debug({ zone: updated.name }, 'Zone updated');
    return this.convertZone(updated);
  }

  async listRecordSets(zoneId: string): Promise<RecordSet[]> {
    const recordSets = await this.collectPages<DesignateRecordSet, DesignateRecordSetList>(
      `/zones/${zoneId}/recordsets?limit=${this.pageLimit}`,
      (page) => page.recordsets
    );
    this.logger.debug({ zoneId, count: recordSets.length }, 'Record sets listed');
    return recordSets.map((rs) => this.convertRecordSet(rs));
  }

  async createRecordSet(zoneId: string, input: RecordSetInput): Promise<RecordSet> {
    const created = await this.makeRequest<DesignateRecordSet>('POST', `/zones/${zoneId}/recordsets`, {
      name: input.name,
      type: input.type,
      ttl: input.ttl,
      records: input.records,
    });
    return this.convertRecordSet(created);
  }

  async updateRecordSet(zoneId: string, recordSetId: string, input: RecordSetUpdateInput): Promise<RecordSet> {
    const updated = await this.makeRequest<DesignateRecordSet>('PUT', `/zones/${zoneId}/recordsets/${recordSetId}`, {
      ttl: input.ttl,
      records: input.records,
    });
    return this.convertRecordSet(updated);
  }

  async deleteRecordSet(zoneId: string, recordSetId: string): Promise<void> {
    const response = await this.send('DELETE', `/zones/${zoneId}/recordsets/${recordSetId}`);
    await response.text();
  }

  /**
   * Follow links.next until the listing is exhausted
   */
  private async collectPages<T, P extends { links?: DesignateLinks }>(
    firstPath: string,
    items: (page: P) => T[] | undefined
  ): Promise<T[]> {
    const collected: T[] = [];
    let next: string | undefined = firstPath;

    while (next) {
      const page: P = await this.makeRequest<P>('GET', next);
      const batch = items(page) ?? [];
      collected.push(...batch);
      next = batch.length > 0 ? page.links?.next : undefined;
    }

    return collected;
  }

  /**
   * Make an API request and decode the JSON body
   */
  private async makeRequest<T>(method: string, pathOrUrl: string, body?: Record<string, unknown>): Promise<T> {
    const response = await this.send(method, pathOrUrl, body);
    return (await response.json()) as T;
  }

  /**
   * Send a request; `pathOrUrl` is either relative to the v2 root or a full
   * URL taken from a `links.next` field
   */
  private async send(method: string, pathOrUrl: string, body?: Record<string, unknown>): Promise<Response> {
    if (!this.session) {
      throw DnsSyncError.internal(`Provider for cloud ${this.cloudName} used before init()`);
    }

    const url = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.session.dnsEndpoint}${pathOrUrl}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'X-Auth-Token': this.session.token,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (error) {
      throw new ConnectionError(this.cloudName, `DNS service unreachable: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      const errorBody = (await response.json().catch(() => ({ message: response.statusText }))) as DesignateErrorBody;

      let errorMessage = errorBody.message ?? `API error: ${response.status}`;
      if (errorBody.type) {
        errorMessage = `[${errorBody.type}] ${errorMessage}`;
      }

      this.logger.debug({ status: response.status, method, url, errorBody }, 'DNS API error');

      const path = url.startsWith(this.session.dnsEndpoint) ? url.slice(this.session.dnsEndpoint.length) : url;
      throw new ProviderApiError(response.status, method, path, errorMessage);
    }

    return response;
  }

  private convertZone(zone: DesignateZone): Zone {
    return {
      id: zone.id,
      name: zone.name,
      email: zone.email,
      ttl: zone.ttl,
      serial: zone.serial,
      status: zone.status,
      type: zone.type === 'SECONDARY' ? 'SECONDARY' : 'PRIMARY',
      description: zone.description ?? undefined,
    };
  }

  private convertRecordSet(recordSet: DesignateRecordSet): RecordSet {
    return {
      id: recordSet.id,
      zoneId: recordSet.zone_id,
      name: recordSet.name,
      type: recordSet.type,
      ttl: recordSet.ttl ?? null,
      records: [...recordSet.records],
      status: recordSet.status,
    };
  }
}
