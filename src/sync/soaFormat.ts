/**
 * SOA text adapters
 *
 * Designate renders the SOA value as the usual seven space-separated fields.
 * Open Telekom Cloud wraps the serial and timer block in parentheses and may
 * carry the mailbox in user@domain form. Each flavour gets an adapter so the
 * reconciler never looks at SOA text directly.
 */
import type { ProviderFlavour, SoaRecord } from '../types/index.js';

export interface SoaFormatAdapter {
  readonly flavour: ProviderFlavour;
  parse(text: string): SoaRecord;
  format(soa: SoaRecord): string;
}

/**
 * `hostmaster.example.org.` -> `hostmaster@example.org`
 * An escaped dot in the local part (`first\.last`) stays a dot.
 */
export function mailboxFromRname(rname: string): string {
  const trimmed = rname.replace(/\.$/, '');
  if (trimmed.includes('@')) {
    return trimmed;
  }

  let local = '';
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed.charAt(i);
    if (ch === '\\' && i + 1 < trimmed.length) {
      local += trimmed.charAt(i + 1);
      i++;
      continue;
    }
    if (ch === '.') {
      const domain = trimmed.slice(i + 1);
      return domain ? `${local}@${domain}` : local;
    }
    local += ch;
  }
  return local;
}

/**
 * `first.last@example.org` -> `first\.last.example.org.`
 */
export function rnameFromMailbox(email: string): string {
  const at = email.lastIndexOf('@');
  if (at < 0) {
    return email.endsWith('.') ? email : `${email}.`;
  }
  const local = email.slice(0, at).replace(/\./g, '\\.');
  const domain = email.slice(at + 1).replace(/\.$/, '');
  return `${local}.${domain}.`;
}

function toNumber(field: string, value: string | undefined, text: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new Error(`Malformed SOA record (${field}): ${text}`);
  }
  return parseInt(value, 10);
}

function fromFields(fields: string[], text: string): SoaRecord {
  if (fields.length !== 7) {
    throw new Error(`Malformed SOA record (expected 7 fields, got ${fields.length}): ${text}`);
  }
  const [primaryNs, rname, serial, refresh, retry, expire, minimum] = fields;
  if (!primaryNs || !rname) {
    throw new Error(`Malformed SOA record: ${text}`);
  }
  return {
    primaryNs,
    email: mailboxFromRname(rname),
    serial: toNumber('serial', serial, text),
    refresh: toNumber('refresh', refresh, text),
    retry: toNumber('retry', retry, text),
    expire: toNumber('expire', expire, text),
    minimum: toNumber('minimum', minimum, text),
  };
}

export const canonicalSoaFormat: SoaFormatAdapter = {
  flavour: 'designate',

  parse(text: string): SoaRecord {
    return fromFields(text.trim().split(/\s+/), text);
  },

  format(soa: SoaRecord): string {
    return [
      soa.primaryNs,
      rnameFromMailbox(soa.email),
      soa.serial,
      soa.refresh,
      soa.retry,
      soa.expire,
      soa.minimum,
    ].join(' ');
  },
};

export const otcSoaFormat: SoaFormatAdapter = {
  flavour: 'otc',

  parse(text: string): SoaRecord {
    const flattened = text.replace(/[()]/g, ' ').trim();
    return fromFields(flattened.split(/\s+/), text);
  },

  format(soa: SoaRecord): string {
    const timers = [soa.serial, soa.refresh, soa.retry, soa.expire, soa.minimum].join(' ');
    return `${soa.primaryNs} ${rnameFromMailbox(soa.email)} (${timers})`;
  },
};

const adapters: Record<ProviderFlavour, SoaFormatAdapter> = {
  designate: canonicalSoaFormat,
  otc: otcSoaFormat,
};

export function getSoaFormat(flavour: ProviderFlavour): SoaFormatAdapter {
  return adapters[flavour];
}

/**
 * Guess the flavour from SOA text, for providers that did not declare one
 */
export function detectSoaFlavour(text: string): ProviderFlavour {
  return /[()]/.test(text) ? 'otc' : 'designate';
}
