/**
 * Backup Tools Implementation
 */

import type { ManagedDbClient } from '../client/api-client.js';
import { formatBackup, formatRestore } from './format.js';
import type { ProjectRefArgs, RestoreProjectArgs } from './schemas.js';
import type { ToolOutput } from './types.js';

/**
 * Start a pg_dump of the project database. `completed_at` stays empty while
 * the dump is still running upstream.
 */
export async function backupProject(client: ManagedDbClient, args: ProjectRefArgs): Promise<ToolOutput> {
  const { value: backup, body } = await client.backupProject(args.project_id);
  return { text: formatBackup(backup), data: body };
}

export async function restoreProject(client: ManagedDbClient, args: RestoreProjectArgs): Promise<ToolOutput> {
  const { body } = await client.restoreProject(args.project_id, args.artifact_path);
  return { text: formatRestore(body), data: body };
}
