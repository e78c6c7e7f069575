import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'node:path';
import { createMemoryLogger, createWorkspaceFixture, projectFileXml } from '@envstage/testing';
import type { WorkspaceFixture } from '@envstage/testing';
import { assertWorkspaceRoot, resolveProject } from '../project-resolver.js';
import { NotFoundError, ProjectAmbiguousError } from '../../errors.js';
import { nodeFs } from '../../io/fs.js';
import { parseDeploySettings } from '../../settings.js';

describe('resolveProject', () => {
  let workspace: WorkspaceFixture | undefined;

  async function setup(files: string[]): Promise<WorkspaceFixture> {
    const tree: Record<string, string> = {};
    for (const file of files) {
      tree[file] = projectFileXml();
    }
    workspace = await createWorkspaceFixture(tree);
    return workspace;
  }

  beforeEach(() => {
    workspace = undefined;
  });

  afterEach(async () => {
    await workspace?.cleanup();
  });

  it('returns the only candidate', async () => {
    const ws = await setup(['src/Portfolio.Api/Portfolio.Api.csproj']);
    const project = await resolveProject(ws.root, 'Portfolio', parseDeploySettings(), createMemoryLogger());

    expect(project.filePath).toBe(ws.path('src/Portfolio.Api/Portfolio.Api.csproj'));
    expect(project.directory).toBe(ws.path('src/Portfolio.Api'));
    expect(project.name).toBe('Portfolio.Api');
    expect(project.matchedBy).toBe('single');
  });

  it('prefers an exact name over a shallower loose match', async () => {
    const ws = await setup(['Service.Host.csproj', 'src/Service/Service.csproj']);
    const logger = createMemoryLogger();
    const project = await resolveProject(ws.root, 'service', parseDeploySettings(), logger);

    expect(project.filePath).toBe(ws.path('src/Service/Service.csproj'));
    expect(project.matchedBy).toBe('exact');
    expect(project.candidates).toEqual([ws.path('Service.Host.csproj'), ws.path('src/Service/Service.csproj')]);
    expect(logger.messages('warn')).toEqual([]);
  });

  it('tries the namespace prefix after an exact name', async () => {
    const ws = await setup(['a/Kernel.Portfolio.Tests.csproj', 'b/c/Kernel.Portfolio.csproj']);
    const settings = parseDeploySettings({ namespacePrefix: 'Kernel.' });
    const project = await resolveProject(ws.root, 'Portfolio', settings, createMemoryLogger());

    expect(project.filePath).toBe(ws.path('b/c/Kernel.Portfolio.csproj'));
    expect(project.matchedBy).toBe('prefixed');
  });

  it('falls back to the shallowest path and warns about it', async () => {
    const ws = await setup(['x/y/Portfolio.Core.csproj', 'x/Portfolio.Api.csproj']);
    const logger = createMemoryLogger();
    const project = await resolveProject(ws.root, 'Portfolio', parseDeploySettings(), logger);

    expect(project.filePath).toBe(ws.path('x/Portfolio.Api.csproj'));
    expect(project.matchedBy).toBe('shallowest');
    expect(logger.messages('warn')).toEqual(['Several projects matched; picked one heuristically']);
  });

  it('breaks depth ties by ordinal path order', async () => {
    const ws = await setup(['b/Portfolio.A.csproj', 'a/Portfolio.B.csproj']);
    const project = await resolveProject(ws.root, 'Portfolio', parseDeploySettings(), createMemoryLogger());

    expect(project.filePath).toBe(ws.path('a/Portfolio.B.csproj'));
  });

  it('falls through when the exact name is not unique', async () => {
    const ws = await setup(['b/Service.csproj', 'a/Service.csproj', 'Service.Tests.csproj']);
    const project = await resolveProject(ws.root, 'Service', parseDeploySettings(), createMemoryLogger());

    expect(project.filePath).toBe(ws.path('Service.Tests.csproj'));
    expect(project.matchedBy).toBe('shallowest');
  });

  it('supports glob predicates', async () => {
    const ws = await setup(['Kernel.Portfolio.Core.csproj', 'Kernel.Portfolio.Host.csproj']);
    const settings = parseDeploySettings({ projectMatchOrder: [{ kind: 'glob', pattern: '*.{pattern}.host' }] });
    const project = await resolveProject(ws.root, 'Portfolio', settings, createMemoryLogger());

    expect(project.filePath).toBe(ws.path('Kernel.Portfolio.Host.csproj'));
    expect(project.matchedBy).toBe('glob:*.Portfolio.host');
  });

  it('reports ambiguity when no predicate narrows to one', async () => {
    const ws = await setup(['Portfolio.Api.csproj', 'Portfolio.Core.csproj']);
    const settings = parseDeploySettings({ projectMatchOrder: [{ kind: 'exact' }] });

    const error = await resolveProject(ws.root, 'Portfolio', settings, createMemoryLogger()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProjectAmbiguousError);
    expect(error).toMatchObject({
      code: 'PROJECT_AMBIGUOUS',
      candidates: [ws.path('Portfolio.Api.csproj'), ws.path('Portfolio.Core.csproj')],
    });
  });

  it('ignores build output and package folders', async () => {
    const ws = await setup([
      'bin/Debug/Service.csproj',
      'src/obj/Service.csproj',
      'node_modules/pkg/Service.csproj',
      'src/Service.Api.csproj',
    ]);
    const project = await resolveProject(ws.root, 'Service', parseDeploySettings(), createMemoryLogger());

    expect(project.filePath).toBe(ws.path('src/Service.Api.csproj'));
    expect(project.candidates).toHaveLength(1);
  });

  it('ignores files with another extension', async () => {
    const ws = await setup(['Service.vbproj', 'Service.csproj.user']);

    await expect(resolveProject(ws.root, 'Service', parseDeploySettings(), createMemoryLogger())).rejects.toThrow(
      NotFoundError
    );
  });

  it('names the pattern and search root when nothing matches', async () => {
    const ws = await setup(['Other.csproj']);

    const error = await resolveProject(ws.root, 'Portfolio', parseDeploySettings(), createMemoryLogger()).catch(
      (e: unknown) => e
    );
    expect(error).toMatchObject({
      code: 'PROJECT_NOT_FOUND',
      artifact: 'project',
      query: 'Portfolio',
      searchPath: ws.root,
    });
  });
});

describe('assertWorkspaceRoot', () => {
  it('accepts an existing directory', async () => {
    const ws = await createWorkspaceFixture();
    try {
      await expect(assertWorkspaceRoot(nodeFs, ws.root)).resolves.toBeUndefined();
    } finally {
      await ws.cleanup();
    }
  });

  it('rejects a missing directory', async () => {
    const ws = await createWorkspaceFixture({ 'file.txt': 'x' });
    try {
      const missing = ws.path('missing');
      await expect(assertWorkspaceRoot(nodeFs, missing)).rejects.toMatchObject({
        code: 'WORKSPACE_NOT_FOUND',
        searchPath: path.dirname(missing),
      });
      await expect(assertWorkspaceRoot(nodeFs, ws.path('file.txt'))).rejects.toThrow(NotFoundError);
    } finally {
      await ws.cleanup();
    }
  });
});
