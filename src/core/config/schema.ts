import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** File scanning patterns configuration. */
export const FileScanPatternsSchema = z.object({
  /** Glob patterns for files to include */
  include: z.array(z.string()).default(['**/*.ts', '**/*.tsx']),
  /** Glob patterns for files to exclude */
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/*.d.ts',
    '**/*.test.ts',
    '**/*.spec.ts',
    '**/*.test.tsx',
    '**/*.spec.tsx',
  ]),
});

/** File policies configuration. */
export const FilePoliciesSchema = z.object({
  scan: withDefaults(FileScanPatternsSchema),
});

/** Single-responsibility thresholds. */
export const SrpSettingsSchema = z.object({
  max_methods: z.number().int().min(0).default(10),
  max_properties: z.number().int().min(0).default(10),
  /** Call receivers whose member calls mark a method as logging */
  logging_receivers: z.array(z.string()).default(['console', 'logger']),
});

/** Interface-segregation thresholds. */
export const IspSettingsSchema = z.object({
  max_members: z.number().int().min(0).default(7),
  max_categories: z.number().int().min(1).default(2),
});

export const HeuristicSettingsSchema = z.object({
  srp: withDefaults(SrpSettingsSchema),
  isp: withDefaults(IspSettingsSchema),
});

/** LLM provider type. */
export const LLMProviderTypeSchema = z.enum(['openai', 'anthropic', 'prompt']);

/** Individual LLM provider configuration (supports OpenAI-compatible APIs). */
export const LLMProviderConfigSchema = z.object({
  base_url: z.string().optional(),
  model: z.string().optional(),
  api_key: z.string().optional(),
  max_tokens: z.number().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

/** LLM settings for violation explanations. */
export const LLMSettingsSchema = z.object({
  default_provider: LLMProviderTypeSchema.default('prompt'),
  providers: z.object({
    openai: LLMProviderConfigSchema.optional(),
    anthropic: LLMProviderConfigSchema.optional(),
  }).default({}),
  /** Per-request timeout; expiry is recorded like any other failure */
  timeout_ms: z.number().int().min(1).default(30000),
  retries: z.number().int().min(0).max(5).default(0),
  retry_backoff_ms: z.number().int().min(0).default(500),
});

/** Output format for reports. */
export const ReportFormatSchema = z.enum(['human', 'json', 'html']);

export const ReportSettingsSchema = z.object({
  format: ReportFormatSchema.default('human'),
  output: z.string().optional(),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  files: withDefaults(FilePoliciesSchema),
  heuristics: withDefaults(HeuristicSettingsSchema),
  llm: withDefaults(LLMSettingsSchema),
  report: withDefaults(ReportSettingsSchema),
});

// Type exports (inferred from schemas)
export type FileScanPatterns = z.infer<typeof FileScanPatternsSchema>;
export type FilePolicies = z.infer<typeof FilePoliciesSchema>;
export type SrpSettings = z.infer<typeof SrpSettingsSchema>;
export type IspSettings = z.infer<typeof IspSettingsSchema>;
export type HeuristicSettings = z.infer<typeof HeuristicSettingsSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;
export type LLMProviderConfig = z.infer<typeof LLMProviderConfigSchema>;
export type LLMSettings = z.infer<typeof LLMSettingsSchema>;
export type ReportFormat = z.infer<typeof ReportFormatSchema>;
export type ReportSettings = z.infer<typeof ReportSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
