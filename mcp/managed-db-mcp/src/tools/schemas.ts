/**
 * Zod schemas for Managed DB tool inputs
 */

import { z } from 'zod';

// Common schemas
export const ProjectRefSchema = z.object({
  project_id: z.string().min(1),
});

// Project schemas
export const CreateProjectSchema = z.object({
  name: z.string().min(1),
  mode: z.enum(['db', 'schema']).default('db'),
  description: z.string().optional(),
});

export const ListProjectsSchema = z.object({});

export const GetProjectSchema = ProjectRefSchema;

export const DeleteProjectSchema = ProjectRefSchema.extend({
  hard: z.boolean().default(false),
});

export const RotateProjectKeysSchema = ProjectRefSchema;

export const GetProjectHealthSchema = ProjectRefSchema;

// Table schemas (unknown keys are forwarded to the API untouched)
export const ColumnSchema = z.object({
  name: z.string().min(1),
  data_type: z.string().min(1),
  nullable: z.boolean().optional(),
  default: z.string().optional(),
}).passthrough();

export const IndexSchema = z.object({
  name: z.string().min(1),
  columns: z.array(z.string().min(1)).min(1),
  unique: z.boolean().optional(),
}).passthrough();

export const RlsPolicySchema = z.object({
  name: z.string().min(1),
  command: z.enum(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'ALL']),
  expression: z.string().min(1),
  with_check: z.string().optional(),
}).passthrough();

export const CreateTableSchema = ProjectRefSchema.extend({
  name: z.string().min(1),
  columns: z.array(ColumnSchema).min(1),
  indexes: z.array(IndexSchema).optional(),
  rls_policies: z.array(RlsPolicySchema).optional(),
});

export const RunMigrationSchema = ProjectRefSchema.extend({
  sql: z.string().min(1),
  statement_timeout_ms: z.number().int().positive().default(30000),
});

// Backup schemas
export const BackupProjectSchema = ProjectRefSchema;

export const RestoreProjectSchema = ProjectRefSchema.extend({
  artifact_path: z.string().min(1),
});

export type CreateProjectArgs = z.infer<typeof CreateProjectSchema>;
export type ProjectRefArgs = z.infer<typeof ProjectRefSchema>;
export type DeleteProjectArgs = z.infer<typeof DeleteProjectSchema>;
export type CreateTableArgs = z.infer<typeof CreateTableSchema>;
export type RunMigrationArgs = z.infer<typeof RunMigrationSchema>;
export type RestoreProjectArgs = z.infer<typeof RestoreProjectSchema>;
