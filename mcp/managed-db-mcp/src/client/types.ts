/**
 * Managed DB API request types and response schemas.
 *
 * Response schemas only require the fields the bridge displays; every other
 * field is kept as-is (passthrough).
 */

import { z } from 'zod';

const optionalText = z.string().nullish();

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  slug: z.string(),
  mode: z.string(),
  db_name: optionalText,
  schema_name: optionalText,
  connection_uri: optionalText,
  rest_base_url: optionalText,
  docs_url: optionalText,
  anon_key: optionalText,
  service_key: optionalText,
  created_at: z.string(),
  updated_at: optionalText,
  deleted_at: optionalText,
}).passthrough();

export const ProjectListSchema = z.object({
  projects: z.array(ProjectSchema).optional(),
}).passthrough();

export const RotatedKeysSchema = z.object({
  id: z.string(),
  anon_key: z.string(),
  service_key: z.string(),
  jwt_secret: z.string(),
  rotated_at: z.string(),
}).passthrough();

export const BackupSchema = z.object({
  artifact_path: z.string(),
  started_at: z.string(),
  completed_at: optionalText,
}).passthrough();

// Sub-statuses (postgres, postgrest, ...) vary by deployment
export const ProjectHealthSchema = z.object({
  status: z.string(),
}).passthrough();

export const AnyJsonSchema = z.unknown();

export type Project = z.infer<typeof ProjectSchema>;
export type ProjectList = z.infer<typeof ProjectListSchema>;
export type RotatedKeys = z.infer<typeof RotatedKeysSchema>;
export type Backup = z.infer<typeof BackupSchema>;
export type ProjectHealth = z.infer<typeof ProjectHealthSchema>;

export type ProjectMode = 'db' | 'schema';

export interface CreateProjectRequest {
  name: string;
  mode: ProjectMode;
  description: string | null;
}

export interface ColumnDefinition {
  name: string;
  data_type: string;
  nullable?: boolean;
  default?: string;
}

export interface IndexDefinition {
  name: string;
  columns: string[];
  unique?: boolean;
}

export type PolicyCommand = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'ALL';

export interface RlsPolicyDefinition {
  name: string;
  command: PolicyCommand;
  expression: string;
  with_check?: string;
}

export interface CreateTableRequest {
  name: string;
  columns: ColumnDefinition[];
  indexes?: IndexDefinition[];
  rls_policies?: RlsPolicyDefinition[];
}

export interface MigrationRequest {
  sql: string;
  statement_timeout_ms: number;
}
