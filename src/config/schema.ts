/**
 * Zod schemas for configuration validation
 */
import { z } from 'zod';

// Log level schema
export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

// Provider flavour schema
export const providerFlavourSchema = z.enum(['designate', 'otc']);

const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : value.toLowerCase() === 'true' || value === '1'));

// Application config schema (environment)
export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  logPretty: envBoolean.default(true),
  cloudsFile: z.string().min(1).optional(),
  strict: envBoolean.default(false),
  defaultTtl: z.coerce.number().int().min(1).max(2147483647).default(3600),
});

// Keystone auth section of a clouds.yaml profile
export const cloudAuthSchema = z
  .object({
    auth_url: z.string().url(),
    username: z.string().optional(),
    user_id: z.string().optional(),
    password: z.string().optional(),
    project_name: z.string().optional(),
    project_id: z.string().optional(),
    user_domain_name: z.string().optional(),
    user_domain_id: z.string().optional(),
    project_domain_name: z.string().optional(),
    project_domain_id: z.string().optional(),
    domain_name: z.string().optional(),
    application_credential_id: z.string().optional(),
    application_credential_name: z.string().optional(),
    application_credential_secret: z.string().optional(),
  })
  .passthrough();

export const authTypeSchema = z.enum(['password', 'v3password', 'v3applicationcredential']);

export const interfaceSchema = z.enum(['public', 'internal', 'admin']);

// One entry under `clouds:` in clouds.yaml
export const cloudProfileSchema = z
  .object({
    auth: cloudAuthSchema,
    auth_type: authTypeSchema.default('password'),
    region_name: z.string().optional(),
    interface: interfaceSchema.default('public'),
    identity_api_version: z.coerce.string().optional(),
    dns_endpoint_override: z.string().url().optional(),
    dns_flavor: providerFlavourSchema.optional(),
  })
  .passthrough()
  .superRefine((profile, ctx) => {
    const { auth } = profile;
    if (profile.auth_type === 'v3applicationcredential') {
      if (!auth.application_credential_secret) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['auth', 'application_credential_secret'],
          message: 'application credential secret is required',
        });
      }
      if (!auth.application_credential_id && !(auth.application_credential_name && (auth.username || auth.user_id))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['auth', 'application_credential_id'],
          message: 'application credential id, or name plus user, is required',
        });
      }
      return;
    }
    if (!auth.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['auth', 'password'], message: 'password is required' });
    }
    if (!auth.username && !auth.user_id) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['auth', 'username'], message: 'username or user_id is required' });
    }
  });

export const cloudsFileSchema = z.object({
  clouds: z.record(z.unknown()).default({}),
});

// CLI options, after commander has parsed argv
export const syncRequestSchema = z
  .object({
    fromCloud: z.string().min(1, 'source cloud is required'),
    toCloud: z.string().min(1, 'target cloud is required'),
    all: z.boolean().default(false),
    zones: z.array(z.string().min(1)).default([]),
    remove: z.boolean().default(false),
    mail: z.string().email().optional(),
    quiet: z.boolean().default(false),
    verbose: z.boolean().default(false),
    strict: z.boolean().default(false),
  })
  .superRefine((request, ctx) => {
    if (request.all && request.zones.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['zones'], message: 'Specify either zones or --all' });
    }
    if (!request.all && request.zones.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['zones'], message: 'Must specify zones or --all' });
    }
    if (request.quiet && request.verbose) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['quiet'], message: '--quiet and --verbose exclude each other' });
    }
  });

// Export types inferred from schemas
export type AppConfig = z.infer<typeof appConfigSchema>;
export type CloudAuth = z.infer<typeof cloudAuthSchema>;
export type CloudProfile = z.infer<typeof cloudProfileSchema>;
export type SyncRequest = z.infer<typeof syncRequestSchema>;
