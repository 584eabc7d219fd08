/**
 * Schema Tools Implementation
 * Table creation and raw SQL migrations.
 */

import type { ManagedDbClient } from '../client/api-client.js';
import type { CreateTableRequest } from '../client/types.js';
import { formatCreatedTable, formatMigration } from './format.js';
import type { CreateTableArgs, RunMigrationArgs } from './schemas.js';
import type { ToolOutput } from './types.js';

export async function createTable(client: ManagedDbClient, args: CreateTableArgs): Promise<ToolOutput> {
  // indexes and rls_policies are only sent when the caller supplied them
  const table: CreateTableRequest = {
    name: args.name,
    columns: args.columns,
    ...(args.indexes ? { indexes: args.indexes } : {}),
    ...(args.rls_policies ? { rls_policies: args.rls_policies } : {}),
  };

  const { body } = await client.createTable(args.project_id, table);
  return { text: formatCreatedTable(args.name, body), data: body };
}

export async function runMigration(client: ManagedDbClient, args: RunMigrationArgs): Promise<ToolOutput> {
  const { body } = await client.runMigration(args.project_id, {
    sql: args.sql,
    statement_timeout_ms: args.statement_timeout_ms,
  });
  return { text: formatMigration(body), data: body };
}
