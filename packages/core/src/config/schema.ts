/**
 * Configuration schema (Zod)
 *
 * Validates connection targets, connection policies and the ephemera.yaml file
 * that bundles them for the CLI.
 */

import { z } from 'zod';

// ===== Connection target =====

export const ConnectionTargetSchema = z.object({
  instance_id: z.string().min(1).optional(),
  zone: z.string().min(1).optional(),
  /** Resolved from the Google credentials when omitted */
  project_id: z.string().min(1).optional(),
  /** Explicit host/IP; skips the instance address lookup entirely */
  hostname_override: z.string().min(1).optional(),
});

// ===== Connection policy =====

export const DEFAULT_MAX_CONNECTION_RETRIES = 10;

/**
 * Boolean that also takes the "true"/"false" strings ${ENV:...} and ${file:...}
 * references resolve to
 */
const flag = (fallback: boolean) =>
  z
    .preprocess(value => (value === 'true' ? true : value === 'false' ? false : value), z.boolean())
    .default(fallback);

export const ConnectionPolicySchema = z.object({
  /** Login user requested on the instance (OS Login may assign another) */
  user: z.string().min(1).default('root'),
  use_internal_address: flag(false),
  use_tunnel: flag(false),
  use_login_registry: flag(true),
  key_expiry_seconds: z.coerce.number().int().min(1).default(300),
  max_connection_retries: z.coerce.number().int().min(0).default(DEFAULT_MAX_CONNECTION_RETRIES),
  /** Seconds allowed per remote command; null disables the limit */
  command_timeout: z.coerce.number().int().min(1).nullable().default(10),
  /** Seconds allowed for one SSH handshake */
  connect_timeout: z.coerce.number().int().min(1).default(10),
  impersonation_identity: z.string().email().optional(),
});

// ===== Google client options =====

const GoogleConfigSchema = z.object({
  /** Service account key file; application default credentials otherwise */
  key_file: z.string().optional(),
  scopes: z.array(z.string()).default(['https://www.googleapis.com/auth/cloud-platform']),
});

// ===== Root configuration schema =====

export const EphemeraConfigSchema = z.object({
  target: ConnectionTargetSchema.default({}),
  policy: ConnectionPolicySchema.default({}),
  google: GoogleConfigSchema.default({}),
});

// ===== Infer TypeScript types from schemas =====

export type ConnectionTarget = z.infer<typeof ConnectionTargetSchema>;
export type ConnectionPolicy = z.infer<typeof ConnectionPolicySchema>;
export type ConnectionPolicyInput = z.input<typeof ConnectionPolicySchema>;
export type GoogleConfig = z.infer<typeof GoogleConfigSchema>;
export type EphemeraConfig = z.infer<typeof EphemeraConfigSchema>;

/**
 * A target whose required fields are all known
 */
export interface ResolvedTarget {
  instance_id: string;
  zone: string;
  project_id: string;
  hostname_override?: string;
}
