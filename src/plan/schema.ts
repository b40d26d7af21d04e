import { z } from 'zod';

// Field names follow the `terraform show -json` output, hence snake_case.
const FieldSnapshotSchema = z.record(z.unknown());

const RawChangeSchema = z.object({
  actions: z.array(z.string()).optional(),
  before: FieldSnapshotSchema.nullable().optional(),
  after: FieldSnapshotSchema.nullable().optional(),
  replace: z.array(z.string()).optional(),
  replace_paths: z.array(z.array(z.union([z.string(), z.number()]))).optional(),
});

export const RawResourceChangeSchema = z.object({
  address: z.string().optional(),
  change: RawChangeSchema.optional(),
});

export const RawPlanSchema = z.object({
  format_version: z.string().optional(),
  terraform_version: z.string().optional(),
  resource_changes: z.array(RawResourceChangeSchema).optional(),
});

export type RawChange = z.infer<typeof RawChangeSchema>;
export type RawResourceChange = z.infer<typeof RawResourceChangeSchema>;
export type RawPlan = z.infer<typeof RawPlanSchema>;
