/**
 * Core type definitions for dnssync
 */

// Record types Designate accepts for record sets
export type RecordSetType =
  | 'A'
  | 'AAAA'
  | 'CAA'
  | 'CNAME'
  | 'MX'
  | 'NAPTR'
  | 'NS'
  | 'PTR'
  | 'SOA'
  | 'SPF'
  | 'SRV'
  | 'SSHFP'
  | 'TXT';

export type ZoneType = 'PRIMARY' | 'SECONDARY';

export type ZoneStatus = 'ACTIVE' | 'PENDING' | 'ERROR' | 'DELETED' | 'SUCCESS' | 'ZONE';

// Zone Types
export interface Zone {
  id: string;
  /** Fully-qualified name with trailing dot, exactly as the service returns it */
  name: string;
  email: string;
  ttl: number;
  serial?: number;
  status?: ZoneStatus | string;
  type: ZoneType;
  description?: string;
}

export interface ZoneCreateInput {
  name: string;
  email: string;
  ttl: number;
  description?: string;
}

export interface ZoneUpdateInput {
  email?: string;
  ttl?: number;
}

// Record Set Types
export interface RecordSet {
  id: string;
  zoneId: string;
  name: string;
  type: RecordSetType | string;
  /** Unset means the zone TTL applies */
  ttl: number | null;
  records: string[];
  status?: string;
}

export interface RecordSetInput {
  name: string;
  type: RecordSetType | string;
  ttl: number | null;
  records: string[];
}

export interface RecordSetUpdateInput {
  ttl: number | null;
  records: string[];
}

// SOA
export interface SoaRecord {
  primaryNs: string;
  /** Responsible party as a mailbox (user@domain) */
  email: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
}

/** Deployment variant deciding how SOA text is laid out */
export type ProviderFlavour = 'designate' | 'otc';

// Sync Types
export interface SyncOptions {
  /** Delete target record sets that have no counterpart in the source */
  remove: boolean;
  /** Override for the SOA responsible-party email */
  mail?: string;
  /** Zone TTL used when the source carries neither an SOA TTL nor a zone TTL */
  defaultTtl?: number;
}

export type RecordAction = 'create' | 'update' | 'delete';

export interface RecordFailure {
  zone: string;
  name: string;
  type: string;
  action: RecordAction;
  error: string;
}

export interface SyncCounts {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  skipped: number;
  failed: number;
}

export interface ZoneSyncResult extends SyncCounts {
  zone: string;
  zoneCreated: boolean;
  zoneUpdated: boolean;
  errors: RecordFailure[];
}

export interface ZoneFailure {
  zone: string;
  code: string;
  error: string;
}

export interface SyncReport {
  zones: ZoneSyncResult[];
  failedZones: ZoneFailure[];
  totals: SyncCounts;
  exitCode: number;
}
