/**
 * Tool Registry - Maps tool names to schemas and implementations.
 */

import type { z } from 'zod';
import type { ManagedDbClient } from '../client/api-client.js';
import { UpstreamError, ValidationError, formatIssues } from '../errors.js';
import { backupProject, restoreProject } from './backups.js';
import { formatError } from './format.js';
import {
  createProject,
  deleteProject,
  getProject,
  getProjectHealth,
  listProjects,
  rotateProjectKeys,
} from './projects.js';
import {
  BackupProjectSchema,
  CreateProjectSchema,
  CreateTableSchema,
  DeleteProjectSchema,
  GetProjectHealthSchema,
  GetProjectSchema,
  ListProjectsSchema,
  RestoreProjectSchema,
  RotateProjectKeysSchema,
  RunMigrationSchema,
} from './schemas.js';
import { createTable, runMigration } from './tables.js';
import type { ToolDefinition, ToolDescriptor, ToolInputSchema, ToolOutput, ToolResult } from './types.js';

interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  schema: S;
  handler: (client: ManagedDbClient, args: z.infer<S>) => Promise<ToolOutput>;
}

// Arguments are validated here, before the handler can issue any request
function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: spec.inputSchema,
    run: async (client, args) => {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        throw new ValidationError(spec.name, formatIssues(parsed.error.issues));
      }
      return spec.handler(client, parsed.data);
    },
  };
}

const projectIdProperty = (description: string) => ({
  project_id: { type: 'string', description },
});

export const tools: ToolDefinition[] = [
  defineTool({
    name: 'create_project',
    description: 'Create a new managed database project with isolated database, roles, and auto-generated REST API',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: "Human-readable project name (e.g., 'My Analytics DB')" },
        mode: {
          type: 'string',
          enum: ['db', 'schema'],
          description: "Isolation mode: 'db' creates separate database, 'schema' creates schema in shared database",
          default: 'db',
        },
        description: { type: 'string', description: 'Optional project description' },
      },
      required: ['name'],
    },
    schema: CreateProjectSchema,
    handler: createProject,
  }),
  defineTool({
    name: 'list_projects',
    description: 'List all managed database projects',
    inputSchema: { type: 'object', properties: {} },
    schema: ListProjectsSchema,
    handler: client => listProjects(client),
  }),
  defineTool({
    name: 'get_project',
    description: 'Get detailed information about a specific project including connection details and API keys',
    inputSchema: {
      type: 'object',
      properties: projectIdProperty('UUID of the project'),
      required: ['project_id'],
    },
    schema: GetProjectSchema,
    handler: getProject,
  }),
  defineTool({
    name: 'delete_project',
    description: 'Delete a project (soft delete by default, use hard=true to permanently remove database)',
    inputSchema: {
      type: 'object',
      properties: {
        ...projectIdProperty('UUID of the project to delete'),
        hard: {
          type: 'boolean',
          description: 'If true, permanently deletes database and PostgREST container. If false, marks as deleted but keeps data.',
          default: false,
        },
      },
      required: ['project_id'],
    },
    schema: DeleteProjectSchema,
    handler: deleteProject,
  }),
  defineTool({
    name: 'rotate_project_keys',
    description: 'Rotate JWT secret and API keys (anon_key, service_key) for a project',
    inputSchema: {
      type: 'object',
      properties: projectIdProperty('UUID of the project'),
      required: ['project_id'],
    },
    schema: RotateProjectKeysSchema,
    handler: rotateProjectKeys,
  }),
  defineTool({
    name: 'create_table',
    description: 'Create a table in a project database with columns, indexes, and optional RLS policies',
    inputSchema: {
      type: 'object',
      properties: {
        ...projectIdProperty('UUID of the project'),
        name: { type: 'string', description: 'Table name' },
        columns: {
          type: 'array',
          description: 'Table columns',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              data_type: { type: 'string', description: "PostgreSQL data type (e.g., 'text', 'integer', 'timestamptz')" },
              nullable: { type: 'boolean', default: true },
              default: { type: 'string', description: 'Default value expression' },
            },
            required: ['name', 'data_type'],
          },
        },
        indexes: {
          type: 'array',
          description: 'Optional indexes',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              columns: { type: 'array', items: { type: 'string' } },
              unique: { type: 'boolean', default: false },
            },
            required: ['name', 'columns'],
          },
        },
        rls_policies: {
          type: 'array',
          description: 'Optional Row Level Security policies',
          items: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              command: { type: 'string', enum: ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'ALL'] },
              expression: { type: 'string', description: 'SQL expression that returns boolean' },
              with_check: { type: 'string', description: 'Optional WITH CHECK expression for INSERT/UPDATE' },
            },
            required: ['name', 'command', 'expression'],
          },
        },
      },
      required: ['project_id', 'name', 'columns'],
    },
    schema: CreateTableSchema,
    handler: createTable,
  }),
  defineTool({
    name: 'run_migration',
    description: 'Execute arbitrary SQL migration on a project database',
    inputSchema: {
      type: 'object',
      properties: {
        ...projectIdProperty('UUID of the project'),
        sql: { type: 'string', description: 'SQL statements to execute' },
        statement_timeout_ms: {
          type: 'integer',
          description: 'Statement timeout in milliseconds',
          default: 30000,
        },
      },
      required: ['project_id', 'sql'],
    },
    schema: RunMigrationSchema,
    handler: runMigration,
  }),
  defineTool({
    name: 'backup_project',
    description: 'Create a pg_dump backup of a project database',
    inputSchema: {
      type: 'object',
      properties: projectIdProperty('UUID of the project to backup'),
      required: ['project_id'],
    },
    schema: BackupProjectSchema,
    handler: backupProject,
  }),
  defineTool({
    name: 'restore_project',
    description: 'Restore a project database from a backup artifact',
    inputSchema: {
      type: 'object',
      properties: {
        ...projectIdProperty('UUID of the project to restore'),
        artifact_path: { type: 'string', description: 'Path to backup artifact file' },
      },
      required: ['project_id', 'artifact_path'],
    },
    schema: RestoreProjectSchema,
    handler: restoreProject,
  }),
  defineTool({
    name: 'get_project_health',
    description: "Check health status of a specific project's database and PostgREST API",
    inputSchema: {
      type: 'object',
      properties: projectIdProperty('UUID of the project'),
      required: ['project_id'],
    },
    schema: GetProjectHealthSchema,
    handler: getProjectHealth,
  }),
];

export function getTool(name: string): ToolDefinition | undefined {
  return tools.find(t => t.name === name);
}

export function listToolDescriptors(): ToolDescriptor[] {
  return tools.map(t => ({
    name: t.name,
    description: t.description,
    inputSchema: t.inputSchema,
  }));
}

/**
 * Run one tool call. Never throws: every failure comes back as an error
 * result so the next call is unaffected.
 */
export async function executeTool(client: ManagedDbClient, name: string, args: unknown): Promise<ToolResult> {
  const tool = getTool(name);
  if (!tool) {
    console.error(`[tool] unknown tool: ${name}`);
    return { success: false, text: `Unknown tool: ${name}`, error: `Unknown tool: ${name}` };
  }

  const started = Date.now();
  try {
    const output = await tool.run(client, args ?? {});
    console.error(`[tool] ${name} ok (${Date.now() - started}ms)`);
    return { success: true, text: output.text, data: output.data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[tool] ${name} failed (${Date.now() - started}ms): ${message}`);
    return {
      success: false,
      text: formatError(err),
      error: message,
      ...(err instanceof UpstreamError ? { status_code: err.status } : {}),
    };
  }
}

export type { ToolDefinition, ToolDescriptor, ToolResult };
