/**
 * Zone Reconciler
 * One-way sync of a zone's record sets from a source cloud to a target cloud
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';
import { ConnectionError, ProviderApiError, ZoneNotFoundError, getErrorMessage } from '../core/errors.js';
import type { DNSProvider } from '../providers/base/DNSProvider.js';
import { detectSoaFlavour, getSoaFormat, type SoaFormatAdapter } from './soaFormat.js';
import type {
  RecordAction,
  RecordSet,
  SoaRecord,
  SyncOptions,
  Zone,
  ZoneSyncResult,
} from '../types/index.js';

const DEFAULT_ZONE_TTL = 3600;

/**
 * TTL and email the target zone must carry
 */
export interface ZoneSettings {
  ttl: number;
  email: string;
}

/**
 * Append the trailing dot Designate zone names carry
 */
export function normalizeZoneName(zone: string): string {
  return zone.endsWith('.') ? zone : `${zone}.`;
}

function normalizeHost(host: string): string {
  const lower = host.trim().toLowerCase();
  return lower.endsWith('.') ? lower : `${lower}.`;
}

export function recordSetKey(recordSet: Pick<RecordSet, 'name' | 'type'>): string {
  return `${recordSet.name.toLowerCase()}|${recordSet.type.toUpperCase()}`;
}

export function isApex(recordSet: Pick<RecordSet, 'name'>, zoneName: string): boolean {
  return recordSet.name.toLowerCase() === zoneName.toLowerCase();
}

/**
 * Apex NS and SOA belong to whichever cloud hosts the zone
 */
export function isApexNsOrSoa(recordSet: Pick<RecordSet, 'name' | 'type'>, zoneName: string): boolean {
  const type = recordSet.type.toUpperCase();
  return isApex(recordSet, zoneName) && (type === 'NS' || type === 'SOA');
}

/**
 * Apex NS hostnames of a record set list
 */
export function apexNameservers(recordSets: RecordSet[], zoneName: string): string[] {
  return recordSets
    .filter((rs) => isApex(rs, zoneName) && rs.type.toUpperCase() === 'NS')
    .flatMap((rs) => rs.records.map(normalizeHost));
}

/**
 * NS record set whose every value is one of the zone's own nameservers
 */
export function isInternalDelegation(recordSet: RecordSet, nameservers: ReadonlySet<string>): boolean {
  if (recordSet.type.toUpperCase() !== 'NS' || recordSet.records.length === 0) {
    return false;
  }
  return recordSet.records.every((value) => nameservers.has(normalizeHost(value)));
}

function sameValues(a: string[], b: string[]): boolean {
  const left = [...new Set(a.map((v) => v.trim()))].sort();
  const right = [...new Set(b.map((v) => v.trim()))].sort();
  return left.length === right.length && left.every((value, i) => value === right[i]);
}

/**
 * Same TTL (unset meaning the owning zone's TTL) and same value set
 */
export function recordSetsMatch(source: RecordSet, sourceZoneTtl: number, target: RecordSet, targetZoneTtl: number): boolean {
  const sourceTtl = source.ttl ?? sourceZoneTtl;
  const targetTtl = target.ttl ?? targetZoneTtl;
  return sourceTtl === targetTtl && sameValues(source.records, target.records);
}

/**
 * Pick the adapter for a provider's SOA text; quirky text wins over the
 * declared flavour
 */
export function soaAdapterFor(provider: DNSProvider, text: string | undefined): SoaFormatAdapter {
  if (text !== undefined && detectSoaFlavour(text) === 'otc') {
    return getSoaFormat('otc');
  }
  return getSoaFormat(provider.getFlavour());
}

function findApexSoa(recordSets: RecordSet[], zoneName: string): RecordSet | undefined {
  return recordSets.find((rs) => isApex(rs, zoneName) && rs.type.toUpperCase() === 'SOA');
}

export class ZoneReconciler {
  private readonly logger: Logger;

  constructor(
    private readonly source: DNSProvider,
    private readonly target: DNSProvider,
    private readonly options: SyncOptions
  ) {
    this.logger = createChildLogger({ service: 'ZoneReconciler' });
  }

  async reconcile(zoneName: string): Promise<ZoneSyncResult> {
    const name = normalizeZoneName(zoneName);
    const result: ZoneSyncResult = {
      zone: name,
      zoneCreated: false,
      zoneUpdated: false,
      created: 0,
      updated: 0,
      deleted: 0,
      unchanged: 0,
      skipped: 0,
      failed: 0,
      errors: [],
    };

    this.logger.debug({ zone: name, from: this.source.getCloudName(), to: this.target.getCloudName() }, 'Syncing zone');

    // Source side
    const sourceZone = await this.source.getZone(name);
    if (!sourceZone) {
      throw new ZoneNotFoundError(name, this.source.getCloudName());
    }
    const sourceSets = await this.source.listRecordSets(sourceZone.id);
    const required = this.requiredSettings(sourceZone, sourceSets);

    // Target side
    let targetZone = await this.target.getZone(name);
    if (!targetZone) {
      targetZone = await this.target.createZone({
        name,
        ttl: required.ttl,
        email: required.email,
        description: sourceZone.description,
      });
      result.zoneCreated = true;
      this.logger.debug({ zone: name, ttl: required.ttl, email: required.email }, 'Created target zone');
    }

    const targetSets = await this.target.listRecordSets(targetZone.id);

    if (!result.zoneCreated && this.zoneNeedsUpdate(targetZone, targetSets, required)) {
      targetZone = await this.target.updateZone(targetZone.id, { ttl: required.ttl, email: required.email });
      result.zoneUpdated = true;
      this.logger.debug({ zone: name, ttl: required.ttl, email: required.email }, 'Updated target zone SOA settings');
    }

    const zoneId = targetZone.id;
    const targetTtl = targetZone.ttl;

    const nameservers = new Set([...apexNameservers(sourceSets, name), ...apexNameservers(targetSets, name)]);
    this.logger.debug({ zone: name, nameservers: [...nameservers] }, 'Authoritative nameservers');

    const targetIndex = new Map(targetSets.map((rs) => [recordSetKey(rs), rs]));
    const sourceKeys = new Set<string>();

    for (const recordSet of sourceSets) {
      if (isApexNsOrSoa(recordSet, name)) {
        continue;
      }
      sourceKeys.add(recordSetKey(recordSet));

      if (isInternalDelegation(recordSet, nameservers)) {
        result.skipped++;
        this.logger.debug({ zone: name, name: recordSet.name, records: recordSet.records }, 'Skipping delegation to own nameservers');
        continue;
      }

      const existing = targetIndex.get(recordSetKey(recordSet));

      if (existing && recordSetsMatch(recordSet, sourceZone.ttl, existing, targetTtl)) {
        result.unchanged++;
        continue;
      }

      // An unset TTL only carries over when both zones resolve it alike
      const ttl = recordSet.ttl ?? (sourceZone.ttl === targetTtl ? null : sourceZone.ttl);
      const input = { ttl, records: [...recordSet.records] };

      if (existing) {
        await this.apply(result, recordSet, 'update', async () => {
          await this.target.updateRecordSet(zoneId, existing.id, input);
          result.updated++;
        });
      } else {
        await this.apply(result, recordSet, 'create', async () => {
          await this.target.createRecordSet(zoneId, { name: recordSet.name, type: recordSet.type, ...input });
          result.created++;
        });
      }
    }

    if (this.options.remove) {
      for (const recordSet of targetSets) {
        if (isApexNsOrSoa(recordSet, name) || sourceKeys.has(recordSetKey(recordSet))) {
          continue;
        }
        if (isInternalDelegation(recordSet, nameservers)) {
          continue;
        }
        await this.apply(result, recordSet, 'delete', async () => {
          await this.target.deleteRecordSet(zoneId, recordSet.id);
          result.deleted++;
        });
      }
    }

    this.logger.debug(
      {
        zone: name,
        created: result.created,
        updated: result.updated,
        deleted: result.deleted,
        unchanged: result.unchanged,
      },
      'Zone synced'
    );

    return result;
  }

  /**
   * TTL and email for the target zone: SOA record set first, zone fields
   * as fallback, then the mail override
   */
  requiredSettings(sourceZone: Zone, sourceSets: RecordSet[]): ZoneSettings {
    const soaSet = findApexSoa(sourceSets, sourceZone.name);
    const soa = this.parseSoa(this.source, soaSet);

    const ttl = soaSet?.ttl ?? (sourceZone.ttl > 0 ? sourceZone.ttl : (this.options.defaultTtl ?? DEFAULT_ZONE_TTL));
    const email = this.options.mail ?? soa?.email ?? sourceZone.email;

    return { ttl, email };
  }

  /**
   * Compare the target's SOA in the target's own text format
   */
  private zoneNeedsUpdate(targetZone: Zone, targetSets: RecordSet[], required: ZoneSettings): boolean {
    const soaSet = findApexSoa(targetSets, targetZone.name);
    const text = soaSet?.records[0];
    const soa = this.parseSoa(this.target, soaSet);

    const currentTtl = soaSet?.ttl ?? targetZone.ttl;
    if (currentTtl !== required.ttl) {
      return true;
    }

    if (!soa || text === undefined) {
      return targetZone.email.toLowerCase() !== required.email.toLowerCase();
    }

    const adapter = soaAdapterFor(this.target, text);
    const wanted = adapter.format({ ...soa, email: required.email });
    return wanted.toLowerCase() !== adapter.format(soa).toLowerCase();
  }

  private parseSoa(provider: DNSProvider, soaSet: RecordSet | undefined): SoaRecord | null {
    const text = soaSet?.records[0];
    if (text === undefined) {
      return null;
    }
    try {
      return soaAdapterFor(provider, text).parse(text);
    } catch (error) {
      this.logger.warn({ cloud: provider.getCloudName(), soa: text }, `Ignoring unparseable SOA: ${getErrorMessage(error)}`);
      return null;
    }
  }

  /**
   * Run one record set mutation; API errors are recorded and the run goes on,
   * connectivity and auth failures end the zone
   */
  private async apply(
    result: ZoneSyncResult,
    recordSet: RecordSet,
    action: RecordAction,
    operation: () => Promise<void>
  ): Promise<void> {
    try {
      await operation();
      this.logger.debug(
        { zone: result.zone, name: recordSet.name, type: recordSet.type, ttl: recordSet.ttl, records: recordSet.records },
        `Record set ${action}d`
      );
    } catch (error) {
      if (error instanceof ConnectionError || (error instanceof ProviderApiError && error.isAuthFailure)) {
        throw error;
      }
      const message = getErrorMessage(error);
      result.failed++;
      result.errors.push({ zone: result.zone, name: recordSet.name, type: recordSet.type, action, error: message });
      this.logger.error({ zone: result.zone, name: recordSet.name, type: recordSet.type }, `Failed to ${action} record set: ${message}`);
    }
  }
}

/**
 * Reconcile one zone from `source` into `target`
 */
export async function reconcileZone(
  zoneName: string,
  source: DNSProvider,
  target: DNSProvider,
  options: SyncOptions
): Promise<ZoneSyncResult> {
  return new ZoneReconciler(source, target, options).reconcile(zoneName);
}
