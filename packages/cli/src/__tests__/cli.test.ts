import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { createOutputCapture, createWorkspaceFixture, projectFileXml } from '@envstage/testing';
import type { OutputCapture, WorkspaceFixture } from '@envstage/testing';
import { runCli } from '../cli.js';
import type { CliIO } from '../io.js';

const PROJECT_DIR = 'workspaces/main/Kernel/Portfolio.Service';
const PROJECT_FILE = `${PROJECT_DIR}/Portfolio.Service.csproj`;
const TARGET = `${PROJECT_DIR}/App.config`;

describe('runCli', () => {
  let ws: WorkspaceFixture;
  let stdout: OutputCapture;
  let stderr: OutputCapture;
  let io: CliIO;

  beforeEach(async () => {
    ws = await createWorkspaceFixture({
      'home/': '',
      [PROJECT_FILE]: projectFileXml([{ include: 'App.config' }]),
      [TARGET]: 'Server=old',
      [`${PROJECT_DIR}/.Deploy/Portfolio/DEV1.config`]: 'Server=localhost;Drive=C:\\data',
      [`${PROJECT_DIR}/.Deploy/Portfolio/QA.config`]: 'Server=localhost',
    });
    stdout = createOutputCapture();
    stderr = createOutputCapture();
    io = {
      stdout: stdout.stream,
      stderr: stderr.stream,
      stdin: new PassThrough(),
      cwd: ws.root,
      homeDir: ws.path('home'),
      interactive: false,
      color: { stdout: false, stderr: false },
      now: () => new Date(2024, 0, 2, 3, 4, 5),
    };
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  function deployArgs(...extra: string[]): string[] {
    return [
      'deploy',
      '--project',
      'Portfolio',
      '--environment',
      'DEV1',
      '--service-instance',
      'Portfolio',
      '--workspace',
      'main',
      '--workspace-base',
      ws.path('workspaces'),
      ...extra,
    ];
  }

  it('deploys and exits 0', async () => {
    const code = await runCli(deployArgs(), io);

    expect(code).toBe(0);
    expect(await ws.read(TARGET)).toBe('Server=DEV1.corp.local;Drive=D:\\data');
    expect(stdout.lines()).toContain(
      `Target config   written ${ws.path(TARGET)} (backup ${ws.path(TARGET)}.20240102030405.bak)`
    );
    expect(stdout.lines()).toContain('Startup project skipped (no interactive prompt available)');
  });

  it('applies flag overrides', async () => {
    const code = await runCli(deployArgs('--domain', 'test.internal', '--drive', 'e'), io);

    expect(code).toBe(0);
    expect(await ws.read(TARGET)).toBe('Server=DEV1.test.internal;Drive=E:\\data');
  });

  it('prints one JSON document for a dry run', async () => {
    const code = await runCli(deployArgs('--dry-run', '--json'), io);

    expect(code).toBe(0);
    const output: unknown = JSON.parse(stdout.text());
    expect(output).toMatchObject({
      ok: true,
      dryRun: true,
      hostname: 'DEV1.corp.local',
      targetConfig: { path: ws.path(TARGET), status: 'would-write' },
      preview: 'Server=DEV1.corp.local;Drive=D:\\data',
    });
    expect(await ws.read(TARGET)).toBe('Server=old');
  });

  it('exits 2 when the service instance does not exist', async () => {
    const code = await runCli(deployArgs('--service-instance', 'Billing'), io);

    expect(code).toBe(2);
    expect(stderr.lines()).toContain(
      `error Service instance not found: 'Billing' (searched ${ws.path(`${PROJECT_DIR}/.Deploy`)})`
    );
    expect(await ws.read(TARGET)).toBe('Server=old');
  });

  it('exits 2 when the workspace does not exist', async () => {
    const code = await runCli(deployArgs('--workspace', 'other', '--json'), io);

    expect(code).toBe(2);
    expect(JSON.parse(stdout.text())).toMatchObject({ ok: false, error: { code: 'WORKSPACE_NOT_FOUND' } });
  });

  it('exits 3 on corrupt metadata', async () => {
    await ws.write(`${PROJECT_FILE}.user`, '<Project>');

    expect(await runCli(deployArgs(), io)).toBe(3);
    expect(await ws.read(TARGET)).toBe('Server=old');
  });

  it('exits 5 on a config that is not UTF-8', async () => {
    await ws.write(`${PROJECT_DIR}/.Deploy/Portfolio/DEV1.config`, Uint8Array.from([0x53, 0xff]));

    expect(await runCli(deployArgs(), io)).toBe(5);
  });

  it('exits 64 on invalid settings', async () => {
    expect(await runCli(deployArgs('--drive', '12'), io)).toBe(64);
    expect(stderr.text()).toContain('targetDrive: must be a single drive letter');
  });

  it('exits 64 when a required option is missing', async () => {
    const args = ['deploy', '--project', 'Portfolio', '--service-instance', 'Portfolio', '--workspace', 'main'];

    expect(await runCli(args, io)).toBe(64);
    expect(stderr.text()).toContain("required option '-e, --environment <name>' not specified");
  });

  it('rejects an unknown startup mode', async () => {
    expect(await runCli(deployArgs('--startup-project', 'maybe'), io)).toBe(64);
  });

  it('exits 0 for help', async () => {
    expect(await runCli(['--help'], io)).toBe(0);
    expect(stdout.text()).toContain('Usage: envstage');
  });

  it('lists environments', async () => {
    const code = await runCli(
      [
        'environments',
        '--project',
        'Portfolio',
        '--service-instance',
        'portfolio',
        '--workspace',
        ws.path('workspaces/main'),
      ],
      io
    );

    expect(code).toBe(0);
    expect(stdout.lines()).toEqual(['DEV1', 'QA']);
  });
});
