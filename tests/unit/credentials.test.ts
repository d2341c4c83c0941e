import { describe, it, expect } from 'vitest';
import {
  createCredential,
  getCredential,
  listCredentials,
  updateCredential,
} from '../../src/tools/credentials.js';
import { credentialsCreateTool, credentialsUpdateTool } from '../../src/tools/credentials/index.js';
import { createMockExecutor, okResult, readObject } from '../utils/mock-executor.js';

describe('Credentials endpoints', () => {
  it('should list and get credentials', async () => {
    const executor = createMockExecutor(() => okResult({ id: 6 }));

    await listCredentials(executor);
    await getCredential(executor, { credential_id: 6 });

    expect(executor.calls).toEqual([
      { method: 'GET', path: '/api/v2/credentials/', query: {} },
      { method: 'GET', path: '/api/v2/credentials/6/' },
    ]);
  });

  it('should send inputs as an object and map the owner', async () => {
    const executor = createMockExecutor(() => okResult({ id: 7 }, 201));

    await createCredential(executor, {
      name: 'Deploy key',
      credential_type: 1,
      inputs: '{"username": "deploy", "password": "test-secret"}',
      organization_id: 1,
    });

    expect(executor.calls).toEqual([{
      method: 'POST',
      path: '/api/v2/credentials/',
      body: {
        name: 'Deploy key',
        credential_type: 1,
        inputs: { username: 'deploy', password: 'test-secret' },
        description: '',
        organization: 1,
      },
    }]);
  });

  it('should default inputs to an empty object', async () => {
    const executor = createMockExecutor(() => okResult({ id: 7 }, 201));

    await createCredential(executor, { name: 'Vault', credential_type: 3, user_id: 9 });

    expect(executor.calls[0]?.body).toEqual({
      name: 'Vault',
      credential_type: 3,
      inputs: {},
      description: '',
      user: 9,
    });
  });

  it('should allow at most one owner', async () => {
    const executor = createMockExecutor();

    const result = await credentialsCreateTool.handler(
      { name: 'Deploy key', credential_type: 1, organization_id: 1, team_id: 2 },
      { executor, instance: 'default' }
    );

    expect(readObject(result).error).toBe(
      'Invalid parameters: (input): Only one of organization_id, user_id or team_id can be provided'
    );
    expect(executor.callCount).toBe(0);
  });

  it('should PATCH only the given fields', async () => {
    const executor = createMockExecutor(() => okResult({ id: 7 }));

    await updateCredential(executor, { credential_id: 7, inputs: '{"password": "test-secret-2"}' });

    expect(executor.calls).toEqual([{
      method: 'PATCH',
      path: '/api/v2/credentials/7/',
      body: { inputs: { password: 'test-secret-2' } },
    }]);
  });

  it('should refuse an update without fields', async () => {
    const executor = createMockExecutor();

    const result = await credentialsUpdateTool.handler({ credential_id: 7 }, { executor, instance: 'default' });

    expect(readObject(result).error).toBe('Invalid parameters: (input): Provide at least one field to update');
    expect(executor.callCount).toBe(0);
  });

  it('should refuse inputs that are not JSON', async () => {
    const executor = createMockExecutor();

    const result = await credentialsUpdateTool.handler(
      { credential_id: 7, inputs: '{username: deploy}' },
      { executor, instance: 'default' }
    );

    expect(readObject(result).error).toBe('Invalid parameters: inputs: Must be a valid JSON string');
    expect(executor.callCount).toBe(0);
  });

  it('should move a credential to another organization', async () => {
    const executor = createMockExecutor(() => okResult({ id: 7 }));

    await updateCredential(executor, { credential_id: 7, organization_id: 4 });

    expect(executor.calls).toEqual([{
      method: 'PATCH',
      path: '/api/v2/credentials/7/',
      body: { organization: 4 },
    }]);
  });

  it('should refuse user and team owners on update', async () => {
    const executor = createMockExecutor();

    const result = await credentialsUpdateTool.handler(
      { credential_id: 7, name: 'Deploy key', user_id: 9, team_id: 2 },
      { executor, instance: 'default' }
    );

    expect(result.isError).toBe(true);
    expect(readObject(result).error).toBe(
      "Invalid parameters: (input): Unrecognized key(s) in object: 'user_id', 'team_id'"
    );
    expect(executor.callCount).toBe(0);
  });

  it('should not advertise owner fields on update', () => {
    const { properties } = credentialsUpdateTool.definition.inputSchema;

    expect(Object.keys(properties)).not.toContain('user_id');
    expect(Object.keys(properties)).not.toContain('team_id');
    expect(Object.keys(properties)).toContain('organization_id');
  });
});
