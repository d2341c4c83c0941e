import { describe, it, expect } from 'vitest';
import {
  createInventory,
  deleteInventory,
  getInventory,
  listInventories,
  updateInventory,
} from '../../src/tools/inventories.js';
import { inventoriesUpdateTool, inventoriesCreateTool } from '../../src/tools/inventories/index.js';
import { createMockExecutor, okResult, readObject } from '../utils/mock-executor.js';

const ctxFor = (executor: ReturnType<typeof createMockExecutor>) => ({ executor, instance: 'default' });

describe('Inventories endpoints', () => {
  it('should list inventories filtered by organization', async () => {
    const executor = createMockExecutor(() => okResult({ count: 0, results: [] }));

    await listInventories(executor, { organization_id: 3, search: 'prod' });

    expect(executor.calls).toEqual([{
      method: 'GET',
      path: '/api/v2/inventories/',
      query: { search: 'prod', organization: '3' },
    }]);
  });

  it('should get one inventory', async () => {
    const executor = createMockExecutor(() => okResult({ id: 2, name: 'Production' }));

    await expect(getInventory(executor, { inventory_id: 2 })).resolves.toEqual({ id: 2, name: 'Production' });
    expect(executor.calls).toEqual([{ method: 'GET', path: '/api/v2/inventories/2/' }]);
  });

  it('should create an inventory under an organization', async () => {
    const executor = createMockExecutor(() => okResult({ id: 5 }, 201));

    await createInventory(executor, {
      name: 'Staging',
      organization_id: 1,
      variables: '{"env": "staging"}',
    });

    expect(executor.calls).toEqual([{
      method: 'POST',
      path: '/api/v2/inventories/',
      body: { name: 'Staging', organization: 1, description: '', variables: '{"env": "staging"}' },
    }]);
  });

  it('should PATCH only the given fields', async () => {
    const executor = createMockExecutor(() => okResult({ id: 5 }));

    await updateInventory(executor, { inventory_id: 5, description: 'Blue/green staging' });

    expect(executor.calls).toEqual([{
      method: 'PATCH',
      path: '/api/v2/inventories/5/',
      body: { description: 'Blue/green staging' },
    }]);
  });

  it('should DELETE an inventory', async () => {
    const executor = createMockExecutor(() => okResult(null, 202));

    await expect(deleteInventory(executor, { inventory_id: 5 })).resolves.toBeNull();
    expect(executor.calls).toEqual([{ method: 'DELETE', path: '/api/v2/inventories/5/' }]);
  });

  it('should refuse an update without fields', async () => {
    const executor = createMockExecutor();

    const result = await inventoriesUpdateTool.handler({ inventory_id: 5 }, ctxFor(executor));

    expect(readObject(result)).toMatchObject({
      success: false,
      kind: 'ValidationFailure',
      error: 'Invalid parameters: (input): Provide at least one of name, description, variables',
    });
    expect(executor.callCount).toBe(0);
  });

  it('should refuse variables that are not JSON', async () => {
    const executor = createMockExecutor();

    const result = await inventoriesCreateTool.handler(
      { name: 'Staging', organization_id: 1, variables: 'env: staging' },
      ctxFor(executor)
    );

    expect(readObject(result).error).toBe('Invalid parameters: variables: Must be a valid JSON string');
    expect(executor.callCount).toBe(0);
  });
});
