/**
 * Project Tools Implementation
 */

import type { ManagedDbClient } from '../client/api-client.js';
import {
  formatCreatedProject,
  formatDeletedProject,
  formatHealth,
  formatProjectDetails,
  formatProjectList,
  formatRotatedKeys,
} from './format.js';
import type { CreateProjectArgs, DeleteProjectArgs, ProjectRefArgs } from './schemas.js';
import type { ToolOutput } from './types.js';

/**
 * Create a project with its own database (or schema), roles and REST API.
 */
export async function createProject(client: ManagedDbClient, args: CreateProjectArgs): Promise<ToolOutput> {
  const { value: project, body } = await client.createProject({
    name: args.name,
    mode: args.mode,
    description: args.description ?? null,
  });
  return { text: formatCreatedProject(project), data: body };
}

export async function listProjects(client: ManagedDbClient): Promise<ToolOutput> {
  const { value: list, body } = await client.listProjects();
  return { text: formatProjectList(list), data: body };
}

export async function getProject(client: ManagedDbClient, args: ProjectRefArgs): Promise<ToolOutput> {
  const { value: project, body } = await client.getProject(args.project_id);
  return { text: formatProjectDetails(project), data: body };
}

export async function deleteProject(client: ManagedDbClient, args: DeleteProjectArgs): Promise<ToolOutput> {
  await client.deleteProject(args.project_id, args.hard);
  return {
    text: formatDeletedProject(args.project_id, args.hard),
    data: { project_id: args.project_id, hard: args.hard, deleted: true },
  };
}

export async function rotateProjectKeys(client: ManagedDbClient, args: ProjectRefArgs): Promise<ToolOutput> {
  const { value: keys, body } = await client.rotateProjectKeys(args.project_id);
  return { text: formatRotatedKeys(keys), data: body };
}

export async function getProjectHealth(client: ManagedDbClient, args: ProjectRefArgs): Promise<ToolOutput> {
  const { body } = await client.getProjectHealth(args.project_id);
  return { text: formatHealth(body), data: body };
}
