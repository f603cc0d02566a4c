jest.mock('../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import { join } from 'path';
import { main, USAGE } from '../cli';
import type { RunnerDeps } from '../runner';
import { FakeMonitoringServer } from '../test/fakeMonitoringServer';

describe('cli main', () => {
  let workDir: string;
  let server: FakeMonitoringServer;
  let deps: RunnerDeps;
  let stdout: jest.SpyInstance;
  let stderr: jest.SpyInstance;

  const writeParams = (content: string): string => {
    const path = join(workDir, 'params.json');
    writeFileSync(path, content, 'utf-8');
    return path;
  };

  beforeEach(() => {
    workDir = mkdtempSync(join(os.tmpdir(), 'reconcile-cli-'));
    server = new FakeMonitoringServer();
    deps = {
      config: {
        monitoring: { url: 'http://monitor.test', user: 'Admin', password: '' },
        rpc: { timeoutMs: 5000, legacyAuth: false },
        logging: { level: 'error', file: '' },
      },
      createSession: () => server,
    };
    stdout = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  it('prints usage for an unknown module', async () => {
    await expect(main(['service', 'params.json'], deps)).resolves.toBe(1);
    expect(stderr).toHaveBeenCalledWith(`${USAGE}\n`);
    expect(stdout).not.toHaveBeenCalled();
  });

  it('prints the changed flag and exits 0 on success', async () => {
    const path = writeParams(JSON.stringify({ name: 'g1' }));

    await expect(main(['hostgroup', path], deps)).resolves.toBe(0);
    expect(stdout).toHaveBeenCalledWith('{"changed":true}\n');
  });

  it('includes the message for a template dump', async () => {
    server.addTemplate('Template App', { zabbix_export: { templates: [{ template: 'Template App' }] } });
    const path = writeParams(JSON.stringify({ name: 'Template App', state: 'dump' }));

    await expect(main(['template', path], deps)).resolves.toBe(0);
    expect(stdout).toHaveBeenCalledWith(
      `${JSON.stringify({
        changed: false,
        msg: '{"zabbix_export":{"templates":[{"template":"Template App"}]}}',
      })}\n`
    );
  });

  it('prints a failure line and exits 1 when the module fails', async () => {
    const path = writeParams(JSON.stringify({ name: 'ghost', state: 'dump' }));

    await expect(main(['template', path], deps)).resolves.toBe(1);
    expect(stdout).toHaveBeenCalledWith('{"failed":true,"msg":"template \'ghost\' not found"}\n');
  });

  it('fails when the parameter file is not JSON', async () => {
    const path = writeParams('{name:');

    await expect(main(['hostgroup', path], deps)).resolves.toBe(1);
    expect(stdout).toHaveBeenCalledWith(expect.stringMatching(/^\{"failed":true,"msg":"Cannot read /));
    expect(server.calls).toEqual([]);
  });
});
