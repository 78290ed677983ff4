/**
 * Zod schemas for persisted records and the settings file.
 * Records are validated when read and again before they are written.
 */

import { z } from 'zod';
import { ALL_ROLES, EXPLICIT_NONE } from '../core/types.js';

// ── Vocabulary ───────────────────────────────────────────────────────

export const SemanticRoleSchema = z.enum(ALL_ROLES);

export const SemanticEntitySchema = z.object({
  id: z.string().min(1),
  role: SemanticRoleSchema,
  description: z.string().default(''),
});

export const DefaultMappingSchema = z.object({
  tool: z.string().min(1),
  rawConceptId: z.string().min(1),
  entityId: z.string().min(1),
});

export const OverrideTargetSchema = z.union([
  z.literal(EXPLICIT_NONE),
  z.object({ entityId: z.string().min(1) }),
]);

export const OverrideEntrySchema = z.object({
  tool: z.string().min(1),
  rawConceptId: z.string().min(1),
  target: OverrideTargetSchema,
});

// ── Decisions ────────────────────────────────────────────────────────

export const DecisionOutcomeSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('accept'),
    entityId: z.string().min(1),
    expectedRole: SemanticRoleSchema.optional(),
  }),
  z.object({
    type: z.literal('create'),
    entity: SemanticEntitySchema,
    promoteDefault: z.boolean().optional(),
  }),
  z.object({ type: z.literal('ignore') }),
  z.object({ type: z.literal('defer') }),
]);

export const DecisionSchema = z.object({
  proposalId: z.string().min(1),
  projectId: z.string().min(1),
  tool: z.string().min(1),
  rawConceptId: z.string().min(1),
  outcome: DecisionOutcomeSchema,
  decidedAt: z.string(),
});

export const DecisionInputSchema = z.object({
  proposalId: z.string().min(1),
  outcome: DecisionOutcomeSchema,
  projectId: z.string().min(1).optional(),
});

// ── Configuration records ────────────────────────────────────────────

export const GlobalConfigurationSchema = z.object({
  entities: z.array(SemanticEntitySchema),
  defaultMappings: z.array(DefaultMappingSchema),
});

export const ProjectIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'project ids use letters, digits, ".", "_" and "-"');

export const ProjectConfigurationSchema = z.object({
  projectId: ProjectIdSchema,
  overrides: z.array(OverrideEntrySchema),
  decisions: z.array(DecisionSchema),
});

export function versionedRecordSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    name: z.string().min(1),
    version: z.number().int().min(0),
    updatedAt: z.string(),
    data,
  });
}

export const GlobalRecordSchema = versionedRecordSchema(GlobalConfigurationSchema);
export const ProjectRecordSchema = versionedRecordSchema(ProjectConfigurationSchema);

// ── Settings ─────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const NonInteractiveOutcomeSchema = z.enum(['defer', 'ignore']);

export const SourceBindingSchema = z.object({
  tool: z.string().min(1),
  target: z.string().min(1),
});

export const ProjectBindingSchema = z.object({
  id: ProjectIdSchema,
  sources: z.array(SourceBindingSchema).default([]),
});

export const SettingsSchema = z.object({
  projects: z.array(ProjectBindingSchema).default([]),
  decisions: z
    .object({
      nonInteractiveOutcome: NonInteractiveOutcomeSchema.default('defer'),
      timeoutMs: z.number().int().positive().default(300_000),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      filePath: z.string().default('logs/semsync.log'),
    })
    .default({}),
  store: z
    .object({
      lockStaleMs: z.number().int().positive().default(10_000),
      lockRetries: z.number().int().min(0).default(3),
    })
    .default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type ProjectBinding = z.infer<typeof ProjectBindingSchema>;
export type SourceBinding = z.infer<typeof SourceBindingSchema>;
export type NonInteractiveOutcome = z.infer<typeof NonInteractiveOutcomeSchema>;
