/**
 * Configuration schema (Zod)
 *
 * Every size and bound the credential core depends on is a named value here,
 * so a deployment can tighten or relax them from clientkey.yaml.
 */

import { z } from 'zod';

// ===== Algorithm bounds =====

const RangeSchema = (min: number, max: number) =>
  z
    .object({
      min: z.number().int().min(1).default(min),
      max: z.number().int().min(1).default(max),
    })
    .refine(range => range.min <= range.max, {
      message: 'min must not exceed max',
    });

const AlgorithmBoundsConfigSchema = z.object({
  /** argon2id passes */
  time_cost: RangeSchema(1, 5).default({}),
  /** argon2id memory in megabytes */
  memory_cost_mb: RangeSchema(16, 64).default({}),
  /** derived key length in bytes */
  output_length: RangeSchema(16, 64).default({}),
});

// ===== Artifact layout =====

export const CodecLayoutSchema = z.enum(['display_name_tagged', 'basic_auth']);

// ===== Root =====

export const ApiKeyConfigSchema = z.object({
  /** Descriptor used when issue() is called without an explicit algorithm */
  default_algorithm: z.string().min(1).default('argon2id:3 64MB 32'),
  layout: CodecLayoutSchema.default('display_name_tagged'),
  salt_length: z.number().int().min(16).max(1024).default(32),
  secret_length: z.number().int().min(16).max(1024).default(32),
  display_name_max_length: z.number().int().min(0).max(256).default(16),
  /** 21 URL-safe characters carry about as much entropy as a UUID */
  client_id_length: z.number().int().min(8).max(128).default(21),
  bounds: AlgorithmBoundsConfigSchema.default({}),
});

export type ApiKeyConfig = z.infer<typeof ApiKeyConfigSchema>;
export type ApiKeyConfigInput = z.input<typeof ApiKeyConfigSchema>;
export type CodecLayoutName = z.infer<typeof CodecLayoutSchema>;
