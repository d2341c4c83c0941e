import { describe, it, expect } from 'vitest';
import { createHost, deleteHost, getHost, listHosts, updateHost } from '../../src/tools/hosts.js';
import { hostsCreateTool } from '../../src/tools/hosts/index.js';
import { createMockExecutor, okResult, readObject } from '../utils/mock-executor.js';

describe('Hosts endpoints', () => {
  it('should list all hosts', async () => {
    const executor = createMockExecutor(() => okResult({ count: 0, results: [] }));

    await listHosts(executor);

    expect(executor.calls).toEqual([{ method: 'GET', path: '/api/v2/hosts/', query: {} }]);
  });

  it('should list the hosts of one inventory', async () => {
    const executor = createMockExecutor(() => okResult({ count: 0, results: [] }));

    await listHosts(executor, { inventory_id: 2, order_by: 'name' });

    expect(executor.calls).toEqual([{
      method: 'GET',
      path: '/api/v2/inventories/2/hosts/',
      query: { order_by: 'name' },
    }]);
  });

  it('should get, update and delete a host', async () => {
    const executor = createMockExecutor(() => okResult({ id: 11 }));

    await getHost(executor, { host_id: 11 });
    await updateHost(executor, { host_id: 11, enabled: false });
    await deleteHost(executor, { host_id: 11 });

    expect(executor.calls).toEqual([
      { method: 'GET', path: '/api/v2/hosts/11/' },
      { method: 'PATCH', path: '/api/v2/hosts/11/', body: { enabled: false } },
      { method: 'DELETE', path: '/api/v2/hosts/11/' },
    ]);
  });

  it('should create a host in an inventory', async () => {
    const executor = createMockExecutor(() => okResult({ id: 12 }, 201));

    await createHost(executor, {
      name: 'web01.example.test',
      inventory_id: 2,
      variables: '{"ansible_host": "10.0.0.5"}',
    });

    expect(executor.calls).toEqual([{
      method: 'POST',
      path: '/api/v2/hosts/',
      body: {
        name: 'web01.example.test',
        inventory: 2,
        description: '',
        variables: '{"ansible_host": "10.0.0.5"}',
      },
    }]);
  });

  it('should require an inventory for new hosts', async () => {
    const executor = createMockExecutor();

    const result = await hostsCreateTool.handler({ name: 'web01.example.test' }, { executor, instance: 'default' });

    expect(readObject(result).error).toBe('Invalid parameters: inventory_id: Required');
    expect(executor.callCount).toBe(0);
  });
});
