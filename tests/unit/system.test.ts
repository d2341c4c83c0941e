import { describe, it, expect } from 'vitest';
import { getDashboard, normalizeApiPath, ping, systemRequest } from '../../src/tools/system.js';
import { systemPingTool, systemRequestTool } from '../../src/tools/system/index.js';
import {
  createMockExecutor,
  createUnreachableExecutor,
  okResult,
  readObject,
} from '../utils/mock-executor.js';

describe('System endpoints', () => {
  it('should ping and read the dashboard', async () => {
    const executor = createMockExecutor(() => okResult({ version: '24.6.1' }));

    await expect(ping(executor)).resolves.toEqual({ version: '24.6.1' });
    await getDashboard(executor);

    expect(executor.calls).toEqual([
      { method: 'GET', path: '/api/v2/ping/' },
      { method: 'GET', path: '/api/v2/dashboard/' },
    ]);
  });

  it('should report an unreachable instance from the ping tool', async () => {
    const executor = createUnreachableExecutor();

    const result = await systemPingTool.handler({}, { executor, instance: 'default' });

    expect(result.isError).toBe(true);
    expect(readObject(result)).toEqual({
      success: false,
      error: 'GET /api/v2/ping/ could not be completed: connect ECONNREFUSED',
      kind: 'NetworkFailure',
    });
  });

  it('should pass a raw request through unchanged', async () => {
    const executor = createMockExecutor(() => okResult({ id: 3, name: 'Ops' }, 201));

    await systemRequest(executor, {
      method: 'POST',
      path: '/api/v2/teams/',
      query: { format: 'json' },
      body: { name: 'Ops', organization: 1 },
    });

    expect(executor.calls).toEqual([{
      method: 'POST',
      path: '/api/v2/teams/',
      query: { format: 'json' },
      body: { name: 'Ops', organization: 1 },
    }]);
  });

  it.each([
    ['outside the API', '/admin/'],
    ['an older API version', '/api/v1/teams/'],
    ['a parent segment', '/api/v2/../admin/'],
    ['percent-encoded parent segments', '/api/v2/%2e%2e/%2e%2e/admin/'],
    ['backslash parent segments', '/api/v2/..\\..\\admin/'],
    ['mixed-case encoded parent segments', '/api/v2/%2E%2e/admin/'],
  ])('should reject a path %s', async (_label, path) => {
    const executor = createMockExecutor();

    const result = await systemRequestTool.handler({ method: 'GET', path }, { executor, instance: 'default' });

    expect(readObject(result)).toMatchObject({ success: false, kind: 'ValidationFailure' });
    expect(executor.callCount).toBe(0);
  });

  it('should resolve the path the way the HTTP client sends it', () => {
    expect(normalizeApiPath('/api/v2/%2e%2e/%2e%2e/admin/')).toBe('/admin/');
    expect(normalizeApiPath('/api/v2/..\\..\\admin/')).toBe('/admin/');
    expect(normalizeApiPath('/api/v2/teams/?page=2')).toBe('/api/v2/teams/');
  });

  it('should report where an escaping path is rejected', async () => {
    const executor = createMockExecutor();

    const result = await systemRequestTool.handler(
      { method: 'GET', path: '/api/v2/%2e%2e/%2e%2e/admin/' },
      { executor, instance: 'default' }
    );

    expect(readObject(result).error).toBe('Invalid parameters: path: Path must stay under /api/v2/');
  });

  it('should reject an unknown method', async () => {
    const executor = createMockExecutor();

    const result = await systemRequestTool.handler({ method: 'TRACE', path: '/api/v2/' }, { executor, instance: 'default' });

    expect(readObject(result)).toMatchObject({ kind: 'ValidationFailure' });
    expect(executor.callCount).toBe(0);
  });
});
