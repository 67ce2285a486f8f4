/**
 * Sync Runner
 * Connects both clouds and reconciles each requested zone in turn
 */
import { createChildLogger } from '../core/Logger.js';
import { ZoneNotFoundError, getErrorCode, getErrorMessage } from '../core/errors.js';
import { connect as defaultConnect, type ConnectFn, type DNSProvider } from '../providers/index.js';
import { ZoneReconciler, normalizeZoneName } from './ZoneReconciler.js';
import type { SyncCounts, SyncOptions, SyncReport, ZoneFailure, ZoneSyncResult } from '../types/index.js';

const logger = createChildLogger({ service: 'SyncRunner' });

export interface SyncPlan extends SyncOptions {
  fromCloud: string;
  toCloud: string;
  all: boolean;
  zones: string[];
  /** Non-zero exit when any zone fails, not only on missing named zones */
  strict: boolean;
  cloudsFile?: string;
}

export interface SyncDependencies {
  connect?: ConnectFn;
}

export function emptyCounts(): SyncCounts {
  return { created: 0, updated: 0, deleted: 0, unchanged: 0, skipped: 0, failed: 0 };
}

export function sumCounts(results: ZoneSyncResult[]): SyncCounts {
  return results.reduce<SyncCounts>(
    (totals, r) => ({
      created: totals.created + r.created,
      updated: totals.updated + r.updated,
      deleted: totals.deleted + r.deleted,
      unchanged: totals.unchanged + r.unchanged,
      skipped: totals.skipped + r.skipped,
      failed: totals.failed + r.failed,
    }),
    emptyCounts()
  );
}

/**
 * Exit status for a finished run: a named zone missing from the source is
 * always an error; other zone failures only count under `strict`
 */
export function computeExitCode(failedZones: ZoneFailure[], strict: boolean): number {
  if (failedZones.some((f) => f.code === 'ZONE_NOT_FOUND')) {
    return 1;
  }
  return strict && failedZones.length > 0 ? 1 : 0;
}

/**
 * Zones to process: the named ones, or every primary zone of the source
 */
export async function listZonesToSync(source: DNSProvider, plan: Pick<SyncPlan, 'all' | 'zones'>): Promise<string[]> {
  if (!plan.all) {
    return plan.zones.map(normalizeZoneName);
  }

  const zones = await source.listZones();
  const names: string[] = [];
  for (const zone of zones) {
    if (zone.type === 'SECONDARY') {
      logger.warn({ zone: zone.name }, 'Skipping secondary zone');
      continue;
    }
    names.push(zone.name);
  }
  logger.debug({ count: names.length, cloud: source.getCloudName() }, 'Zones enumerated');
  return names;
}

/**
 * Reconcile zones between two already-connected providers
 */
export async function syncZones(
  source: DNSProvider,
  target: DNSProvider,
  zones: string[],
  plan: SyncOptions & { strict: boolean }
): Promise<SyncReport> {
  const reconciler = new ZoneReconciler(source, target, {
    remove: plan.remove,
    mail: plan.mail,
    defaultTtl: plan.defaultTtl,
  });

  const results: ZoneSyncResult[] = [];
  const failedZones: ZoneFailure[] = [];

  for (const zone of zones) {
    try {
      results.push(await reconciler.reconcile(zone));
    } catch (error) {
      const failure: ZoneFailure = {
        zone: normalizeZoneName(zone),
        code: getErrorCode(error),
        error: getErrorMessage(error),
      };
      failedZones.push(failure);

      if (error instanceof ZoneNotFoundError) {
        logger.error({ zone: failure.zone }, failure.error);
      } else {
        logger.error({ zone: failure.zone, err: error }, `Zone sync failed: ${failure.error}`);
      }
    }
  }

  return {
    zones: results,
    failedZones,
    totals: sumCounts(results),
    exitCode: computeExitCode(failedZones, plan.strict),
  };
}

/**
 * Full run: connect, enumerate, reconcile. Connection and configuration
 * errors propagate to the caller.
 */
export async function runSync(plan: SyncPlan, deps: SyncDependencies = {}): Promise<SyncReport> {
  const connect = deps.connect ?? defaultConnect;

  const source = await connect(plan.fromCloud, { cloudsFile: plan.cloudsFile });
  const target = await connect(plan.toCloud, { cloudsFile: plan.cloudsFile });

  const zones = await listZonesToSync(source, plan);
  return syncZones(source, target, zones, plan);
}
