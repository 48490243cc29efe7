import { z } from 'zod';

// ─── Delivery Agent Config ───

export const StabilityConfigSchema = z.object({
  interval_seconds: z.number().positive().default(2),
  required_matches: z.number().int().positive().default(3),
  timeout_seconds: z.number().positive().default(60),
});

export const AgentConfigSchema = z.object({
  stream: z.string().min(1),
  watch_directory: z.string().min(1),
  receiver_url: z.string().url(),
  backup_extensions: z.array(z.string().min(1)).default(['.tar.gz', '.zip', '.tar']),
  ledger_path: z.string().optional(),
  upload_timeout_seconds: z.number().positive().default(600),
  stability: StabilityConfigSchema.default({}),
});

// ─── Archive Store Config ───

export const RetentionPolicySchema = z.enum(['oldest-first', 'keep-newest']).default('oldest-first');

export const StreamConfigSchema = z.object({
  archive_path: z.string().min(1),
  max_size_gb: z.number(),
  retention: RetentionPolicySchema,
});

export const StoreConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(8080),
  staging_directory: z.string().optional(),
  streams: z.record(z.string(), StreamConfigSchema).refine(
    streams => Object.keys(streams).length > 0,
    { message: 'at least one stream must be configured' },
  ),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type RetentionPolicy = z.infer<typeof RetentionPolicySchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
