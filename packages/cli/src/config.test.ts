import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { ConfigError } from '@logsweep/core';

import { loadConfigFile, resolveScanConfig } from './config';

describe('resolveScanConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'logsweep-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeConfig = async (contents: string): Promise<string> => {
    const configPath = path.join(tempDir, 'logsweep.yaml');
    await fs.writeFile(configPath, contents, 'utf8');
    return configPath;
  };

  it('fills in defaults and reads the token from the environment', async () => {
    const resolved = await resolveScanConfig({}, { CIRCLECI_TOKEN: 'test-token' });

    expect(resolved).toEqual({
      settings: {
        name: 'circleci',
        jobId: 0,
        sourceId: 0,
        verify: false,
        connection: { token: 'test-token' },
        concurrency: 8,
      },
      buffer: 64,
    });
  });

  it('layers the config file under the environment and the flags', async () => {
    const configPath = await writeConfig(
      [
        'name: from-file',
        'jobId: 11',
        'verify: true',
        'connection:',
        '  token: file-token',
        'concurrency: 2',
        'buffer: 16',
        'output: out/chunks.ndjson',
        'maxLogBytes: 2048',
      ].join('\n'),
    );

    const resolved = await resolveScanConfig({ config: configPath, concurrency: 4 }, { CIRCLECI_TOKEN: 'env-token' });

    expect(resolved.settings).toEqual({
      name: 'from-file',
      jobId: 11,
      sourceId: 0,
      verify: true,
      connection: { token: 'env-token' },
      concurrency: 4,
      maxLogBytes: 2048,
    });
    expect(resolved.buffer).toBe(16);
    expect(resolved.output).toBe(path.join(tempDir, 'out', 'chunks.ndjson'));
  });

  it('lets the token flag win over the environment', async () => {
    const resolved = await resolveScanConfig({ token: 'flag-token' }, { CIRCLECI_TOKEN: 'env-token' });
    expect(resolved.settings.connection.token).toBe('flag-token');
  });

  it('uses the file token when nothing else provides one', async () => {
    const configPath = await writeConfig('connection:\n  token: file-token\n');
    const resolved = await resolveScanConfig({ config: configPath }, {});
    expect(resolved.settings.connection.token).toBe('file-token');
  });

  it('requires a token', async () => {
    const error = await resolveScanConfig({}, {}).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: ['connection.token: A CircleCI token is required.'] });
  });

  it('rejects a concurrency or buffer below one', async () => {
    const error = await resolveScanConfig({ concurrency: 0, buffer: 0 }, { CIRCLECI_TOKEN: 'test-token' }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toMatchObject({
      code: 'INVALID_CONFIG',
      issues: ['concurrency: concurrency must be at least 1.', 'buffer: buffer must be a positive integer.'],
    });
  });

  it('rejects unknown keys in the config file', async () => {
    const configPath = await writeConfig('tokn: oops\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow(/Unrecognized key/);
  });

  it('rejects malformed YAML', async () => {
    const configPath = await writeConfig('name: [unterminated\n');
    await expect(loadConfigFile(configPath)).rejects.toThrow('is not valid YAML');
  });

  it('reports missing config files', async () => {
    await expect(loadConfigFile(path.join(tempDir, 'missing.yaml'))).rejects.toThrow('Unable to read config file');
  });

  it('treats an empty config file as no settings', async () => {
    const configPath = await writeConfig('');
    await expect(loadConfigFile(configPath)).resolves.toEqual({});
  });
});
