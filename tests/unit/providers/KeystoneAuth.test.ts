/**
 * KeystoneAuth unit tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  KeystoneAuth,
  buildAuthRequest,
  dnsRoot,
  findDnsEndpoint,
  identityRoot,
} from '../../../src/providers/designate/KeystoneAuth.js';
import { parseCloudProfile } from '../../../src/config/CloudConfig.js';
import { ConnectionError } from '../../../src/core/errors.js';
import { DNS_CATALOG, jsonResponse, tokenResponse } from '../../helpers/fetch.js';

const passwordProfile = parseCloudProfile('test', {
  auth: {
    auth_url: 'https://keystone.test:5000',
    username: 'demo',
    password: 'test-secret',
    project_name: 'demo',
    user_domain_name: 'Default',
    project_domain_name: 'Default',
  },
  region_name: 'RegionOne',
});

describe('KeystoneAuth', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('URL roots', () => {
    it('should append /v3 to identity URLs once', () => {
      expect(identityRoot('https://keystone.test:5000')).toBe('https://keystone.test:5000/v3');
      expect(identityRoot('https://keystone.test:5000/v3/')).toBe('https://keystone.test:5000/v3');
    });

    it('should append /v2 to DNS URLs once', () => {
      expect(dnsRoot('https://dns.test:9001/')).toBe('https://dns.test:9001/v2');
      expect(dnsRoot('https://dns.test:9001/v2')).toBe('https://dns.test:9001/v2');
    });
  });

  describe('buildAuthRequest', () => {
    it('should build a project-scoped password request', () => {
      expect(buildAuthRequest(passwordProfile)).toEqual({
        auth: {
          identity: {
            methods: ['password'],
            password: { user: { name: 'demo', password: 'test-secret', domain: { name: 'Default' } } },
          },
          scope: { project: { name: 'demo', domain: { name: 'Default' } } },
        },
      });
    });

    it('should build an application credential request', () => {
      const profile = parseCloudProfile('appcred', {
        auth_type: 'v3applicationcredential',
        auth: {
          auth_url: 'https://keystone.test/v3',
          application_credential_id: 'cred-id',
          application_credential_secret: 'test-secret',
        },
      });

      expect(buildAuthRequest(profile)).toEqual({
        auth: {
          identity: {
            methods: ['application_credential'],
            application_credential: { id: 'cred-id', secret: 'test-secret' },
          },
        },
      });
    });
  });

  describe('findDnsEndpoint', () => {
    it('should match interface and region', () => {
      expect(findDnsEndpoint(DNS_CATALOG, 'public', 'RegionOne')).toBe('https://dns.test:9001/');
      expect(findDnsEndpoint(DNS_CATALOG, 'internal', 'RegionOne')).toBe('http://10.0.0.10:9001');
      expect(findDnsEndpoint(DNS_CATALOG, 'admin', 'RegionOne')).toBeNull();
    });
  });

  describe('authenticate', () => {
    it('should return the token and DNS endpoint', async () => {
      fetchMock.mockResolvedValueOnce(tokenResponse(DNS_CATALOG));

      const session = await new KeystoneAuth('test', passwordProfile).authenticate();

      expect(session).toEqual({
        token: 'test-token',
        expiresAt: '2030-01-01T00:00:00.000000Z',
        projectId: 'project-1',
        dnsEndpoint: 'https://dns.test:9001/v2',
      });
      expect(fetchMock).toHaveBeenCalledWith(
        'https://keystone.test:5000/v3/auth/tokens',
        expect.objectContaining({ method: 'POST' })
      );
    });

    it('should use a configured endpoint override', async () => {
      const profile = parseCloudProfile('test', {
        auth: { auth_url: 'https://keystone.test:5000', username: 'demo', password: 'test-secret' },
        dns_endpoint_override: 'https://dns.override.test/',
      });
      fetchMock.mockResolvedValueOnce(tokenResponse([]));

      const session = await new KeystoneAuth('test', profile).authenticate();

      expect(session.dnsEndpoint).toBe('https://dns.override.test/v2');
    });

    it('should report rejected credentials', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: { code: 401, message: 'The request you have made requires authentication.' } }, 401)
      );

      await expect(new KeystoneAuth('test', passwordProfile).authenticate()).rejects.toThrow(
        'Cannot connect to cloud test: authentication failed (401): The request you have made requires authentication.'
      );
    });

    it('should report an unreachable identity service', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(new KeystoneAuth('test', passwordProfile).authenticate()).rejects.toThrow(
        'Cannot connect to cloud test: identity service unreachable: fetch failed'
      );
    });

    it('should report a response without a token', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ token: { catalog: DNS_CATALOG } }, 201));

      await expect(new KeystoneAuth('test', passwordProfile).authenticate()).rejects.toBeInstanceOf(ConnectionError);
    });

    it('should report a catalog without DNS in the region', async () => {
      const profile = parseCloudProfile('test', {
        auth: { auth_url: 'https://keystone.test:5000', username: 'demo', password: 'test-secret' },
        region_name: 'RegionThree',
      });
      fetchMock.mockResolvedValueOnce(tokenResponse(DNS_CATALOG));

      await expect(new KeystoneAuth('test', profile).authenticate()).rejects.toThrow(
        'Cannot connect to cloud test: no public dns endpoint in service catalog for region RegionThree'
      );
    });
  });
});
