import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ManagedDbClient, extractDetail } from '../src/client/api-client.js';
import { ConfigError, MalformedResponseError, TransportError, UpstreamError } from '../src/errors.js';
import { PROJECT_ID } from './helpers/fixtures.js';
import { startStubApi, type StubApi } from './helpers/stub-api.js';

describe('ManagedDbClient', () => {
  describe('buildUrl', () => {
    it('keeps the base path', () => {
      const client = new ManagedDbClient({ baseUrl: 'http://localhost:8080/api', timeoutMs: 1000 });

      expect(client.buildUrl('/projects').href).toBe('http://localhost:8080/api/projects');
    });

    it('ignores trailing slashes on the base URL', () => {
      const client = new ManagedDbClient({ baseUrl: 'https://db.example.test/api//', timeoutMs: 1000 });

      expect(client.buildUrl('/projects/p1/health').href).toBe('https://db.example.test/api/projects/p1/health');
    });

    it('appends query parameters', () => {
      const client = new ManagedDbClient({ baseUrl: 'http://localhost:8080/api', timeoutMs: 1000 });

      expect(client.buildUrl('/projects/p1', { hard: 'true' }).href).toBe(
        'http://localhost:8080/api/projects/p1?hard=true'
      );
    });

    it('rejects an empty base URL', () => {
      const client = new ManagedDbClient({ baseUrl: '  ', timeoutMs: 1000 });

      expect(() => client.buildUrl('/projects')).toThrow(ConfigError);
      expect(() => client.buildUrl('/projects')).toThrow('MANAGED_DB_API_URL is not set');
    });

    it('rejects a non-http scheme', () => {
      const client = new ManagedDbClient({ baseUrl: 'ftp://files.example.test/api', timeoutMs: 1000 });

      expect(() => client.buildUrl('/projects')).toThrow(
        'MANAGED_DB_API_URL must use http or https: ftp://files.example.test/api'
      );
    });
  });

  describe('extractDetail', () => {
    it('prefers the detail field', () => {
      expect(extractDetail('{"detail":"Project not found","code":"missing"}')).toBe('Project not found');
    });

    it('encodes a non-string detail as JSON', () => {
      expect(extractDetail('{"detail":{"reason":"locked"}}')).toBe('{"reason":"locked"}');
    });

    it('falls back to the whole JSON body', () => {
      expect(extractDetail('["a","b"]')).toBe('["a","b"]');
    });

    it('falls back to trimmed raw text', () => {
      expect(extractDetail('  upstream exploded\n')).toBe('upstream exploded');
    });

    it('returns an empty string for an empty body', () => {
      expect(extractDetail('')).toBe('');
    });
  });

  describe('requests', () => {
    let stub: StubApi;
    let client: ManagedDbClient;

    beforeEach(async () => {
      stub = await startStubApi();
      client = new ManagedDbClient({ baseUrl: stub.baseUrl, timeoutMs: 2000 });
    });

    afterEach(async () => {
      await stub.close();
    });

    it('sends a fresh request id on every call', async () => {
      stub.reply('GET', `/projects/${PROJECT_ID}/health`, { body: { status: 'ok' } });

      await client.getProjectHealth(PROJECT_ID);
      await client.getProjectHealth(PROJECT_ID);

      const ids = stub.requests.map(r => r.headers['x-request-id']);
      expect(ids).toHaveLength(2);
      expect(ids[0]).not.toBe(ids[1]);
    });

    it('asks for JSON', async () => {
      stub.reply('GET', '/projects', { body: { projects: [] } });

      await client.listProjects();

      expect(stub.requests[0].headers.accept).toBe('application/json');
    });

    it('raises UpstreamError with the status text when the body is empty', async () => {
      stub.reply('POST', `/projects/${PROJECT_ID}/restore`, { status: 409 });

      const error = await client.restoreProject(PROJECT_ID, '/backups/a.dump').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ kind: 'upstream', status: 409, detail: 'Conflict' });
    });

    it('raises MalformedResponseError for an empty success body', async () => {
      stub.reply('POST', `/projects/${PROJECT_ID}/migrations`, { status: 200 });

      const error = await client
        .runMigration(PROJECT_ID, { sql: 'SELECT 1', statement_timeout_ms: 1000 })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({
        message: `Expected JSON from POST /projects/${PROJECT_ID}/migrations, got: (empty body)`,
      });
    });

    it('passes any JSON value through for free-form endpoints', async () => {
      stub.reply('POST', `/projects/${PROJECT_ID}/migrations`, { body: ['CREATE TABLE', 'CREATE INDEX'] });

      const { value, body } = await client.runMigration(PROJECT_ID, { sql: 'SELECT 1', statement_timeout_ms: 1000 });

      expect(value).toEqual(['CREATE TABLE', 'CREATE INDEX']);
      expect(body).toEqual(['CREATE TABLE', 'CREATE INDEX']);
    });

    it('returns the body as received alongside the checked value', async () => {
      stub.reply('GET', `/projects/${PROJECT_ID}/health`, { body: { postgres: 'ok', status: 'ok' } });

      const { value, body } = await client.getProjectHealth(PROJECT_ID);

      expect(value.status).toBe('ok');
      expect(JSON.stringify(body)).toBe('{"postgres":"ok","status":"ok"}');
    });

    it('raises TransportError when nothing is listening', async () => {
      const baseUrl = stub.baseUrl;
      await stub.close();
      stub = await startStubApi();
      const offline = new ManagedDbClient({ baseUrl, timeoutMs: 2000 });

      const error = await offline.listProjects().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ kind: 'transport' });
    });
  });
});
