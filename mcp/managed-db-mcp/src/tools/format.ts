/**
 * Display formatting for tool results
 */

import {
  ConfigError,
  MalformedResponseError,
  UpstreamError,
  ValidationError,
} from '../errors.js';
import type { Backup, Project, ProjectList, RotatedKeys } from '../client/types.js';

function orNA(value: string | null | undefined): string {
  return value ?? 'N/A';
}

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function formatCreatedProject(project: Project): string {
  return [
    '✅ Project created successfully!',
    '',
    `ID: ${project.id}`,
    `Name: ${project.name}`,
    `Slug: ${project.slug}`,
    `Mode: ${project.mode}`,
    `Database: ${orNA(project.db_name)}`,
    `Connection URI: ${orNA(project.connection_uri)}`,
    `REST API URL: ${orNA(project.rest_base_url)}`,
    `Docs URL: ${orNA(project.docs_url)}`,
    `Anonymous API Key: ${orNA(project.anon_key)}`,
    `Service API Key: ${orNA(project.service_key)}`,
    `Created: ${project.created_at}`,
  ].join('\n');
}

export function formatProjectList(list: ProjectList): string {
  const projects = list.projects ?? [];
  if (projects.length === 0) {
    return 'No projects found.';
  }

  const blocks = projects.map(p => [
    `• ${p.name} (${p.slug})`,
    `  ID: ${p.id}`,
    `  Mode: ${p.mode}`,
    `  Database: ${orNA(p.db_name)}`,
    `  REST API: ${orNA(p.rest_base_url)}`,
    `  Created: ${p.created_at}`,
  ].join('\n'));

  return `Found ${projects.length} project(s):\n\n${blocks.join('\n\n')}`;
}

export function formatProjectDetails(project: Project): string {
  return [
    'Project Details:',
    '',
    `ID: ${project.id}`,
    `Name: ${project.name}`,
    `Slug: ${project.slug}`,
    `Mode: ${project.mode}`,
    `Database: ${orNA(project.db_name)}`,
    `Schema: ${orNA(project.schema_name)}`,
    `Connection URI: ${orNA(project.connection_uri)}`,
    `REST API URL: ${orNA(project.rest_base_url)}`,
    `Docs URL: ${orNA(project.docs_url)}`,
    `Anonymous Key: ${orNA(project.anon_key)}`,
    `Service Key: ${orNA(project.service_key)}`,
    `Created: ${project.created_at}`,
    `Updated: ${orNA(project.updated_at)}`,
    `Deleted: ${orNA(project.deleted_at)}`,
  ].join('\n');
}

export function formatDeletedProject(projectId: string, hard: boolean): string {
  const deleteType = hard ? 'permanently deleted' : 'soft deleted (marked for deletion)';
  return `✅ Project ${projectId} has been ${deleteType}.`;
}

export function formatRotatedKeys(keys: RotatedKeys): string {
  return [
    '✅ Keys rotated successfully!',
    '',
    `Project ID: ${keys.id}`,
    `New Anonymous Key: ${keys.anon_key}`,
    `New Service Key: ${keys.service_key}`,
    `New JWT Secret: ${keys.jwt_secret}`,
    `Rotated At: ${keys.rotated_at}`,
  ].join('\n');
}

export function formatCreatedTable(tableName: string, data: unknown): string {
  return `✅ Table '${tableName}' created successfully!\n\n${json(data)}`;
}

export function formatMigration(data: unknown): string {
  return `✅ Migration executed successfully!\n\n${json(data)}`;
}

export function formatBackup(backup: Backup): string {
  return [
    '✅ Backup created successfully!',
    '',
    `Artifact Path: ${backup.artifact_path}`,
    `Started At: ${backup.started_at}`,
    `Completed At: ${backup.completed_at ?? 'In progress...'}`,
  ].join('\n');
}

export function formatRestore(data: unknown): string {
  return `✅ Restore initiated successfully!\n\n${json(data)}`;
}

// Printed from the raw body so sub-statuses keep the upstream order
export function formatHealth(body: unknown): string {
  return `Project Health Status:\n\n${json(body)}`;
}

export function formatError(err: unknown): string {
  if (err instanceof UpstreamError) {
    return `❌ API Error (${err.status}): ${err.detail}`;
  }
  if (err instanceof ValidationError) {
    return `❌ ${err.message}`;
  }
  if (err instanceof ConfigError) {
    return `❌ Configuration error: ${err.message}`;
  }
  if (err instanceof MalformedResponseError) {
    return `❌ Malformed response: ${err.message}`;
  }
  return `❌ Error: ${err instanceof Error ? err.message : String(err)}`;
}
