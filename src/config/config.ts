import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ErrorCode, GenerationRule } from '../types/enums.js';
import { MissingGenerationPolicy } from '../topology/correlate.js';
import { DEFAULT_HARDWARE_LABELS } from '../fetch/documents.js';
import { DEFAULT_MAX_RESPONSE_BYTES } from '../fetch/FetchPipeline.js';

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const integerText = z.union([z.number().int().min(0), z.string().regex(/^\d+$/)]).transform((value) => BigInt(value));

const serviceConfigSchema = z.object({
  serviceId: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9_-]+$/, 'serviceId may only contain letters, digits, "-" and "_"'),
  endpoints: z.object({
    topologyUrl: z.string().url(),
    hardwareUrl: z.string().url()
  }),
  fetch: z
    .object({
      maxResponseBytes: z.number().int().min(1).default(DEFAULT_MAX_RESPONSE_BYTES),
      budgetFloor: integerText.default(0),
      hardwareLabels: z
        .array(z.object({ field: z.string().min(1), rule: z.nativeEnum(GenerationRule) }))
        .min(1)
        .default(DEFAULT_HARDWARE_LABELS.map((label) => ({ ...label })))
    })
    .default({}),
  refresh: z
    .object({
      cooldownSeconds: z.number().min(0).default(300)
    })
    .default({}),
  freshness: z
    .object({
      staleAfterMinutes: z.number().min(0).default(60)
    })
    .default({}),
  correlation: z
    .object({
      missingGeneration: z.nativeEnum(MissingGenerationPolicy).default(MissingGenerationPolicy.GEN1)
    })
    .default({}),
  stats: z
    .object({
      sentinelSubnetIds: z.array(z.string().min(1)).default(['unassigned']),
      minRealSubnetNodes: z.number().int().min(0).default(0)
    })
    .default({}),
  persistence: z
    .object({
      sqlitePath: z.string().min(1).optional()
    })
    .default({}),
  certification: z.object({
    secret: z.string().min(1)
  })
});

export type ServiceConfig = z.infer<typeof serviceConfigSchema>;

export function parseServiceConfig(raw: unknown): ServiceConfig {
  const parsed = serviceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export async function loadServiceConfig(configPath: string): Promise<ServiceConfig> {
  const resolved = path.resolve(configPath);
  const raw = await fs.readFile(resolved, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse configuration JSON (${resolved}): ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseServiceConfig(parsed);
}
