/**
 * In-memory DNS provider standing in for a Designate endpoint
 */
import { DNSProvider, type ProviderInfo } from '../../src/providers/base/DNSProvider.js';
import { ProviderApiError } from '../../src/core/errors.js';
import { getSoaFormat } from '../../src/sync/soaFormat.js';
import type {
  ProviderFlavour,
  RecordSet,
  RecordSetInput,
  RecordSetUpdateInput,
  Zone,
  ZoneCreateInput,
  ZoneType,
  ZoneUpdateInput,
} from '../../src/types/index.js';

export interface FakeZoneOptions {
  email?: string;
  ttl?: number;
  type?: ZoneType;
  /** TTL of the apex SOA record set; null leaves it to the zone */
  soaTtl?: number | null;
}

export class FakeDNSProvider extends DNSProvider {
  readonly zones = new Map<string, Zone>();
  readonly recordSets = new Map<string, RecordSet[]>();
  /** Mutating calls, as "method name type" */
  readonly mutations: string[] = [];
  private readonly failures = new Map<string, Error>();
  private nextId = 1;

  constructor(
    cloudName: string,
    private readonly nameservers: string[],
    flavour: ProviderFlavour = 'designate'
  ) {
    super(cloudName, flavour);
  }

  getInfo(): ProviderInfo {
    return { name: this.cloudName, type: 'fake', flavour: this.flavour };
  }

  async init(): Promise<void> {
    this.initialized = true;
  }

  /**
   * Make `method` throw `error` for the zone or record set called `name`
   */
  failOn(method: string, name: string, error: Error): void {
    this.failures.set(`${method}:${name}`, error);
  }

  addZone(name: string, options: FakeZoneOptions = {}): Zone {
    const zone: Zone = {
      id: this.id('zone'),
      name,
      email: options.email ?? 'hostmaster@example.com',
      ttl: options.ttl ?? 3600,
      serial: 1,
      status: 'ACTIVE',
      type: options.type ?? 'PRIMARY',
    };
    this.zones.set(zone.id, zone);
    this.recordSets.set(zone.id, [
      this.soaRecordSet(zone, options.soaTtl ?? null),
      {
        id: this.id('rs'),
        zoneId: zone.id,
        name,
        type: 'NS',
        ttl: null,
        records: [...this.nameservers],
      },
    ]);
    return zone;
  }

  addRecordSet(zoneName: string, name: string, type: string, ttl: number | null, records: string[]): RecordSet {
    const zone = this.zoneByName(zoneName);
    const recordSet: RecordSet = { id: this.id('rs'), zoneId: zone.id, name, type, ttl, records };
    this.setsOf(zone.id).push(recordSet);
    return recordSet;
  }

  find(zoneName: string, name: string, type: string): RecordSet | undefined {
    const zone = this.zoneByName(zoneName);
    return this.setsOf(zone.id).find((rs) => rs.name === name && rs.type === type);
  }

  zoneByName(name: string): Zone {
    const zone = [...this.zones.values()].find((z) => z.name === name);
    if (!zone) {
      throw new Error(`test setup: no zone ${name} in ${this.cloudName}`);
    }
    return zone;
  }

  async listZones(): Promise<Zone[]> {
    return [...this.zones.values()].map((zone) => ({ ...zone }));
  }

  async getZone(name: string): Promise<Zone | null> {
    this.maybeFail('getZone', name);
    const zone = [...this.zones.values()].find((z) => z.name === name);
    return zone ? { ...zone } : null;
  }

  async createZone(input: ZoneCreateInput): Promise<Zone> {
    this.maybeFail('createZone', input.name);
    this.mutations.push(`createZone ${input.name}`);
    return { ...this.addZone(input.name, { email: input.email, ttl: input.ttl }) };
  }

  async updateZone(zoneId: string, input: ZoneUpdateInput): Promise<Zone> {
    const zone = this.zoneById(zoneId);
    this.maybeFail('updateZone', zone.name);
    this.mutations.push(`updateZone ${zone.name}`);

    if (input.email !== undefined) zone.email = input.email;
    if (input.ttl !== undefined) zone.ttl = input.ttl;

    const sets = this.setsOf(zoneId);
    const index = sets.findIndex((rs) => rs.type === 'SOA');
    const current = sets[index];
    if (current) {
      sets[index] = this.soaRecordSet(zone, current.ttl, current.id);
    }
    return { ...zone };
  }

  async listRecordSets(zoneId: string): Promise<RecordSet[]> {
    this.maybeFail('listRecordSets', this.zoneById(zoneId).name);
    return this.setsOf(zoneId).map((rs) => ({ ...rs, records: [...rs.records] }));
  }

  async createRecordSet(zoneId: string, input: RecordSetInput): Promise<RecordSet> {
    this.maybeFail('createRecordSet', input.name);
    const sets = this.setsOf(zoneId);
    if (sets.some((rs) => rs.name === input.name && rs.type === input.type)) {
      throw new ProviderApiError(409, 'POST', `/zones/${zoneId}/recordsets`, '[duplicate_recordset] Duplicate RecordSet');
    }
    this.mutations.push(`createRecordSet ${input.name} ${input.type}`);
    const created: RecordSet = { id: this.id('rs'), zoneId, ...input, records: [...input.records] };
    sets.push(created);
    return { ...created };
  }

  async updateRecordSet(zoneId: string, recordSetId: string, input: RecordSetUpdateInput): Promise<RecordSet> {
    const recordSet = this.recordSetById(zoneId, recordSetId);
    this.maybeFail('updateRecordSet', recordSet.name);
    this.mutations.push(`updateRecordSet ${recordSet.name} ${recordSet.type}`);
    recordSet.ttl = input.ttl;
    recordSet.records = [...input.records];
    return { ...recordSet };
  }

  async deleteRecordSet(zoneId: string, recordSetId: string): Promise<void> {
    const recordSet = this.recordSetById(zoneId, recordSetId);
    this.maybeFail('deleteRecordSet', recordSet.name);
    this.mutations.push(`deleteRecordSet ${recordSet.name} ${recordSet.type}`);
    this.recordSets.set(
      zoneId,
      this.setsOf(zoneId).filter((rs) => rs.id !== recordSetId)
    );
  }

  private soaRecordSet(zone: Zone, ttl: number | null, id: string = this.id('rs')): RecordSet {
    const text = getSoaFormat(this.flavour).format({
      primaryNs: this.nameservers[0] ?? 'ns.invalid.',
      email: zone.email,
      serial: zone.serial ?? 1,
      refresh: 3600,
      retry: 600,
      expire: 86400,
      minimum: 3600,
    });
    return { id, zoneId: zone.id, name: zone.name, type: 'SOA', ttl, records: [text] };
  }

  private maybeFail(method: string, name: string): void {
    const error = this.failures.get(`${method}:${name}`);
    if (error) {
      throw error;
    }
  }

  private zoneById(zoneId: string): Zone {
    const zone = this.zones.get(zoneId);
    if (!zone) {
      throw new ProviderApiError(404, 'GET', `/zones/${zoneId}`, '[zone_not_found] Could not find Zone');
    }
    return zone;
  }

  private recordSetById(zoneId: string, recordSetId: string): RecordSet {
    const recordSet = this.setsOf(zoneId).find((rs) => rs.id === recordSetId);
    if (!recordSet) {
      throw new ProviderApiError(404, 'GET', `/zones/${zoneId}/recordsets/${recordSetId}`, '[recordset_not_found] Could not find RecordSet');
    }
    return recordSet;
  }

  private setsOf(zoneId: string): RecordSet[] {
    let sets = this.recordSets.get(zoneId);
    if (!sets) {
      sets = [];
      this.recordSets.set(zoneId, sets);
    }
    return sets;
  }

  private id(prefix: string): string {
    return `${this.cloudName}-${prefix}-${this.nextId++}`;
  }
}
