/**
 * Cloud profile resolution
 * Reads OpenStack clouds.yaml (and secure.yaml beside it) the way the
 * OpenStack client tools do, and returns one validated profile.
 */
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { createChildLogger } from '../core/Logger.js';
import { ConfigError, configErrorFromZod, getErrorMessage } from '../core/errors.js';
import { cloudProfileSchema, cloudsFileSchema, type CloudProfile } from './schema.js';
import type { ProviderFlavour } from '../types/index.js';

const logger = createChildLogger({ service: 'CloudConfig' });

export interface ResolvedCloud {
  name: string;
  profile: CloudProfile;
  flavour: ProviderFlavour;
  /** File the profile came from */
  source: string;
}

/**
 * Candidate clouds.yaml locations, first match wins
 */
export function getCloudsFileCandidates(explicitPath?: string, cwd: string = process.cwd()): string[] {
  if (explicitPath) {
    return [resolve(cwd, explicitPath)];
  }
  return [
    join(cwd, 'clouds.yaml'),
    join(homedir(), '.config', 'openstack', 'clouds.yaml'),
    '/etc/openstack/clouds.yaml',
  ];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge `override` into `base`; nested objects merge, everything else replaces
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function readClouds(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${path}: ${getErrorMessage(error)}`);
  }

  const result = cloudsFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw configErrorFromZod(path, result.error);
  }
  return result.data.clouds;
}

/**
 * Pick the flavour: explicit setting first, then the auth URL host
 */
export function detectFlavour(profile: CloudProfile): ProviderFlavour {
  if (profile.dns_flavor) {
    return profile.dns_flavor;
  }
  const host = new URL(profile.auth.auth_url).hostname.toLowerCase();
  return host === 'otc.t-systems.com' || host.endsWith('.otc.t-systems.com') ? 'otc' : 'designate';
}

/**
 * Parse an already-loaded profile object
 */
export function parseCloudProfile(name: string, raw: unknown): CloudProfile {
  try {
    return cloudProfileSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw configErrorFromZod(`cloud profile ${name}`, error);
    }
    throw error;
  }
}

/**
 * Resolve a named cloud profile from clouds.yaml
 */
export function resolveCloud(name: string, options: { cloudsFile?: string; cwd?: string } = {}): ResolvedCloud {
  const candidates = getCloudsFileCandidates(options.cloudsFile, options.cwd);
  const path = candidates.find((candidate) => existsSync(candidate));

  if (!path) {
    throw new ConfigError(`No clouds.yaml found (looked in ${candidates.join(', ')})`);
  }

  const clouds = readClouds(path);
  const entry = clouds[name];
  if (!isPlainObject(entry)) {
    const known = Object.keys(clouds);
    throw new ConfigError(
      `Cloud ${name} not found in ${path}` + (known.length > 0 ? ` (known: ${known.join(', ')})` : '')
    );
  }

  let raw = entry;
  const securePath = join(dirname(path), 'secure.yaml');
  if (existsSync(securePath)) {
    const secure = readClouds(securePath)[name];
    if (isPlainObject(secure)) {
      raw = deepMerge(entry, secure);
      logger.debug({ cloud: name, securePath }, 'Merged secure.yaml');
    }
  }

  const profile = parseCloudProfile(name, raw);
  const flavour = detectFlavour(profile);

  logger.debug({ cloud: name, source: path, flavour, region: profile.region_name }, 'Cloud profile resolved');

  return { name, profile, flavour, source: path };
}
