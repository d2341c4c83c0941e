import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createExecutors, type InstanceRegistry } from '../../src/instances.js';
import { createKernel } from '../../src/kernel.js';
import type { AwxInstanceConfig, ToolExposure } from '../../src/config.js';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { startStdioServer } from '../../src/transports/index.js';
import { createTestMcpClient, type TestMcpClient } from '../utils/mcp-test-client.js';
import { createFakeFetch, jsonResponse, type FakeFetch } from '../utils/fake-fetch.js';

function instance(name: string, baseUrl: string): AwxInstanceConfig {
  return { name, baseUrl, token: 'test-token', timeoutMs: 1000, verifySsl: true };
}

const registry: InstanceRegistry = {
  defaultInstance: 'default',
  instances: new Map([
    ['default', instance('default', 'https://awx.test')],
    ['lab', instance('lab', 'https://lab.awx.test')],
  ]),
};

function awxHandler(): FakeFetch {
  return createFakeFetch(request => {
    const { pathname } = new URL(request.url);
    if (pathname === '/api/v2/ping/') {
      return jsonResponse({ version: '23.0.0', active_node: 'awx-1' });
    }
    if (pathname === '/api/v2/roles/4/users/' && request.method === 'POST') {
      return new Response(null, { status: 204 });
    }
    return jsonResponse({ detail: 'Not found.' }, 404);
  });
}

async function connect(fake: FakeFetch, exposure: ToolExposure = 'tools'): Promise<TestMcpClient> {
  const kernel = createKernel({
    instances: createExecutors(registry, { fetch: fake.fetch }),
    defaultInstance: registry.defaultInstance,
    exposure,
  });
  return createTestMcpClient(kernel);
}

describe('MCP Server Integration', () => {
  let fake: FakeFetch;
  let client: TestMcpClient;

  beforeEach(async () => {
    fake = awxHandler();
    client = await connect(fake);
  });

  afterEach(async () => {
    await client.close();
  });

  describe('ListTools', () => {
    it('should list every endpoint tool', async () => {
      const tools = await client.listTools();

      expect(tools).toHaveLength(44);
      expect(tools.map(t => t.name)).toEqual(
        expect.arrayContaining(['roles_grant_user', 'jobs_stdout', 'templates_launch', 'system_request'])
      );
    });

    it('should carry annotations and the instance selector', async () => {
      const tools = await client.listTools();
      const launch = tools.find(t => t.name === 'templates_launch');

      expect(launch?.annotations).toMatchObject({ readOnlyHint: false });
      expect(launch?.inputSchema).toMatchObject({
        type: 'object',
        properties: { instance: { type: 'string', enum: ['default', 'lab'] } },
      });
    });
  });

  describe('CallTool', () => {
    it('should call AWX and return the response body', async () => {
      const result = await client.callTool('system_ping', {});

      expect(result.isError).toBe(false);
      expect(JSON.parse(result.text)).toEqual({ version: '23.0.0', active_node: 'awx-1' });
      expect(fake.requests).toHaveLength(1);
      expect(fake.requests[0]?.url).toBe('https://awx.test/api/v2/ping/');
      expect(fake.requests[0]?.headers.get('authorization')).toBe('Bearer test-token');
    });

    it('should route to the instance named in _meta', async () => {
      await client.callTool('system_ping', {}, { instance: 'lab' });

      expect(fake.requests[0]?.url).toBe('https://lab.awx.test/api/v2/ping/');
    });

    it('should report AWX errors with their status', async () => {
      const result = await client.callTool('jobs_get', { job_id: 99 });

      expect(result.isError).toBe(true);
      expect(JSON.parse(result.text)).toEqual({
        success: false,
        error: 'GET /api/v2/jobs/99/ failed with status 404: Not found.',
        kind: 'ClientError',
        status_code: 404,
        details: { detail: 'Not found.' },
      });
    });

    it('should reject invalid input before calling AWX', async () => {
      const result = await client.callTool('jobs_get', {});

      expect(result.isError).toBe(true);
      expect(JSON.parse(result.text)).toMatchObject({
        success: false,
        error: 'Invalid parameters: job_id: Required',
        kind: 'ValidationFailure',
      });
      expect(fake.requests).toHaveLength(0);
    });

    it('should report unknown tools', async () => {
      const result = await client.callTool('teams_list', {});

      expect(result.isError).toBe(true);
      expect(JSON.parse(result.text)).toEqual({ success: false, error: 'Unknown tool: teams_list' });
    });
  });

  describe('facades exposure', () => {
    beforeEach(async () => {
      await client.close();
      client = await connect(fake, 'facades');
    });

    it('should list one tool per group', async () => {
      const tools = await client.listTools();

      expect(tools).toHaveLength(10);
      expect(tools[0]?.name).toBe('roles');
    });

    it('should dispatch facade actions', async () => {
      const result = await client.callTool('roles', { action: 'grant_user', role_id: 4, user_id: 9 });

      expect(result.isError).toBe(false);
      expect(JSON.parse(result.text)).toEqual({ success: true });
      expect(fake.requests[0]?.method).toBe('POST');
      expect(fake.requests[0]?.body).toBe('{"id":9}');
    });
  });
});

describe('startStdioServer', () => {
  it('should serve the kernel over the given transport until closed', async () => {
    const fake = awxHandler();
    const kernel = createKernel({
      instances: createExecutors(registry, { fetch: fake.fetch }),
      defaultInstance: registry.defaultInstance,
      allowedGroups: ['system'],
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });

    const server = await startStdioServer(kernel, serverTransport);
    await client.connect(clientTransport);

    const { tools } = await client.listTools();
    expect(tools.map(t => t.name)).toEqual(['system_ping', 'system_dashboard', 'system_request']);

    await client.close();
    await server.close();
  });
});
