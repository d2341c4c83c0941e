import { describe, it, expect } from 'vitest';
import { createProject, getProject, listProjects } from '../../src/tools/projects.js';
import { projectsCreateTool } from '../../src/tools/projects/index.js';
import { createMockExecutor, okResult, readObject } from '../utils/mock-executor.js';

describe('Projects endpoints', () => {
  it('should list and get projects', async () => {
    const executor = createMockExecutor(() => okResult({ id: 3 }));

    await listProjects(executor);
    await getProject(executor, { project_id: 3 });

    expect(executor.calls).toEqual([
      { method: 'GET', path: '/api/v2/projects/', query: {} },
      { method: 'GET', path: '/api/v2/projects/3/' },
    ]);
  });

  it('should create a git project', async () => {
    const executor = createMockExecutor(() => okResult({ id: 4 }, 201));

    await createProject(executor, {
      name: 'Playbooks',
      organization_id: 1,
      scm_type: 'git',
      scm_url: 'https://git.example.test/ops/playbooks.git',
      scm_branch: 'main',
    });

    expect(executor.calls).toEqual([{
      method: 'POST',
      path: '/api/v2/projects/',
      body: {
        name: 'Playbooks',
        organization: 1,
        scm_type: 'git',
        scm_url: 'https://git.example.test/ops/playbooks.git',
        scm_branch: 'main',
        description: '',
      },
    }]);
  });

  it('should allow a manual project without scm_url', async () => {
    const executor = createMockExecutor(() => okResult({ id: 5 }, 201));

    await createProject(executor, { name: 'Local', organization_id: 1, scm_type: 'manual', local_path: 'local_playbooks' });

    expect(executor.calls[0]?.body).toEqual({
      name: 'Local',
      organization: 1,
      scm_type: 'manual',
      local_path: 'local_playbooks',
      description: '',
    });
  });

  it('should require scm_url for source-controlled projects', async () => {
    const executor = createMockExecutor();

    const result = await projectsCreateTool.handler(
      { name: 'Playbooks', organization_id: 1, scm_type: 'git' },
      { executor, instance: 'default' }
    );

    expect(readObject(result).error).toBe(
      'Invalid parameters: scm_url: scm_url is required unless scm_type is "manual" or ""'
    );
    expect(executor.callCount).toBe(0);
  });

  it('should reject an unsupported scm_type', async () => {
    const executor = createMockExecutor();

    const result = await projectsCreateTool.handler(
      { name: 'Playbooks', organization_id: 1, scm_type: 'hg', scm_url: 'https://hg.example.test/ops' },
      { executor, instance: 'default' }
    );

    expect(readObject(result)).toMatchObject({ kind: 'ValidationFailure' });
    expect(executor.callCount).toBe(0);
  });
});
