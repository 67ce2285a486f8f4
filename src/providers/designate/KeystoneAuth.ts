/**
 * Keystone v3 authentication
 * Issues a token for a cloud profile and finds the DNS endpoint in the catalog
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import { ConnectionError, getErrorMessage } from '../../core/errors.js';
import type { CloudAuth, CloudProfile } from '../../config/schema.js';

interface CatalogEndpoint {
  interface?: string;
  region?: string | null;
  region_id?: string | null;
  url?: string;
}

interface CatalogEntry {
  type?: string;
  name?: string;
  endpoints?: CatalogEndpoint[];
}

interface TokenResponse {
  token?: {
    expires_at?: string;
    catalog?: CatalogEntry[];
    project?: { id?: string; name?: string };
  };
  error?: { message?: string; code?: number };
}

export interface KeystoneSession {
  token: string;
  expiresAt?: string;
  projectId?: string;
  dnsEndpoint: string;
}

type DomainRef = { name: string } | { id: string };

function domainRef(name?: string, id?: string, fallback?: string): DomainRef | undefined {
  if (id) return { id };
  if (name) return { name };
  if (fallback) return { name: fallback };
  return undefined;
}

/**
 * Normalise an auth URL to its /v3 root
 */
export function identityRoot(authUrl: string): string {
  const trimmed = authUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v3') ? trimmed : `${trimmed}/v3`;
}

/**
 * Normalise a catalog DNS URL to its /v2 root
 */
export function dnsRoot(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith('/v2') ? trimmed : `${trimmed}/v2`;
}

/**
 * Build the POST /v3/auth/tokens body for a profile
 */
export function buildAuthRequest(profile: CloudProfile): Record<string, unknown> {
  const auth: CloudAuth = profile.auth;

  if (profile.auth_type === 'v3applicationcredential') {
    const credential: Record<string, unknown> = { secret: auth.application_credential_secret };
    if (auth.application_credential_id) {
      credential['id'] = auth.application_credential_id;
    } else {
      credential['name'] = auth.application_credential_name;
      credential['user'] = auth.user_id
        ? { id: auth.user_id }
        : { name: auth.username, domain: domainRef(auth.user_domain_name, auth.user_domain_id, auth.domain_name) };
    }
    return {
      auth: {
        identity: { methods: ['application_credential'], application_credential: credential },
      },
    };
  }

  const user: Record<string, unknown> = auth.user_id
    ? { id: auth.user_id, password: auth.password }
    : {
        name: auth.username,
        password: auth.password,
        domain: domainRef(auth.user_domain_name, auth.user_domain_id, auth.domain_name ?? 'Default'),
      };

  let scope: Record<string, unknown> | undefined;
  if (auth.project_id) {
    scope = { project: { id: auth.project_id } };
  } else if (auth.project_name) {
    scope = {
      project: {
        name: auth.project_name,
        domain: domainRef(auth.project_domain_name, auth.project_domain_id, auth.domain_name ?? 'Default'),
      },
    };
  } else if (auth.domain_name) {
    scope = { domain: { name: auth.domain_name } };
  }

  return {
    auth: {
      identity: { methods: ['password'], password: { user } },
      ...(scope ? { scope } : {}),
    },
  };
}

/**
 * Find the DNS service URL for an interface and region
 */
export function findDnsEndpoint(catalog: CatalogEntry[], iface: string, region?: string): string | null {
  const service = catalog.find((entry) => entry.type === 'dns');
  if (!service?.endpoints) {
    return null;
  }

  const endpoint = service.endpoints.find(
    (e) =>
      e.interface === iface &&
      (region === undefined || e.region === region || e.region_id === region)
  );
  return endpoint?.url ?? null;
}

export class KeystoneAuth {
  private readonly logger: Logger;

  constructor(
    private readonly cloudName: string,
    private readonly profile: CloudProfile
  ) {
    this.logger = createChildLogger({ service: 'Keystone', cloud: cloudName });
  }

  async authenticate(): Promise<KeystoneSession> {
    const url = `${identityRoot(this.profile.auth.auth_url)}/auth/tokens`;
    this.logger.debug({ url, authType: this.profile.auth_type }, 'Requesting token');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify(buildAuthRequest(this.profile)),
      });
    } catch (error) {
      throw new ConnectionError(this.cloudName, `identity service unreachable: ${getErrorMessage(error)}`);
    }

    const body = (await response.json().catch(() => ({}))) as TokenResponse;

    if (!response.ok) {
      const message = body.error?.message ?? response.statusText;
      throw new ConnectionError(this.cloudName, `authentication failed (${response.status}): ${message}`);
    }

    const token = response.headers.get('X-Subject-Token');
    if (!token) {
      throw new ConnectionError(this.cloudName, 'identity service returned no token');
    }

    const dnsEndpoint =
      this.profile.dns_endpoint_override ??
      findDnsEndpoint(body.token?.catalog ?? [], this.profile.interface, this.profile.region_name);

    if (!dnsEndpoint) {
      throw new ConnectionError(
        this.cloudName,
        `no ${this.profile.interface} dns endpoint in service catalog` +
          (this.profile.region_name ? ` for region ${this.profile.region_name}` : '')
      );
    }

    this.logger.debug({ dnsEndpoint, expiresAt: body.token?.expires_at }, 'Token issued');

    return {
      token,
      expiresAt: body.token?.expires_at,
      projectId: body.token?.project?.id,
      dnsEndpoint: dnsRoot(dnsEndpoint),
    };
  }
}
