import { promises as fs } from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import type { AddressInfo } from 'net';
import yargsFactory from 'yargs/yargs';

import { AuthError, TransportError, type Chunk, type Project } from '@logsweep/core';
import type { CircleCiApi } from '@logsweep/adapters';

const mockLogLines: string[] = [];

jest.mock('./logging', () => {
  const actual = jest.requireActual<typeof import('./logging')>('./logging');
  const { pino } = jest.requireActual<typeof import('pino')>('pino');

  return {
    ...actual,
    createLogger: jest.fn(() =>
      pino(
        { level: 'debug', base: undefined },
        {
          write: (line: string) => {
            mockLogLines.push(line);
          },
        },
      ),
    ),
  };
});

import { __internal, circleciCommand, exitCodes, runScan, toChunkRecord, writeChunks } from './index';
import { createLogger } from './logging';

interface LoggedLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

const loggedLines = (): LoggedLine[] => mockLogLines.map((line) => JSON.parse(line) as LoggedLine);

const collect = (stream: PassThrough): (() => string) => {
  const parts: Buffer[] = [];
  stream.on('data', (part: Buffer) => parts.push(part));
  return () => Buffer.concat(parts).toString('utf8');
};

const project = (reponame: string): Project => ({ vcsType: 'github', username: 'acme', reponame });

/** Every project has build 1 with one `build` step whose single action logs `log of <repo>`. */
const fakeApi = (names: string[], overrides: Partial<CircleCiApi> = {}): CircleCiApi => ({
  listProjects: async () => names.map(project),
  listBuilds: async () => [{ buildNum: 1 }],
  listSteps: async (target) => [
    { name: 'build', actions: [{ index: 0, outputUrl: `https://logs.example/${target.reponame}` }] },
  ],
  fetchLogBody: async (action) => Buffer.from(`log of ${action.outputUrl?.split('/').pop() ?? ''}`),
  ...overrides,
});

const baseConfig = {
  settings: {
    name: 'ci-test',
    jobId: 5,
    sourceId: 9,
    verify: false,
    connection: { token: 'test-token' },
    concurrency: 2,
  },
  buffer: 1,
};

const sampleChunk: Chunk = {
  sourceType: 'SOURCE_TYPE_CIRCLECI',
  sourceName: 'ci-test',
  sourceId: 9,
  jobId: 5,
  data: Buffer.from('line1\nline3'),
  verify: true,
  sourceMetadata: {
    circleci: {
      vcsType: 'github',
      username: 'acme',
      repository: 'api',
      buildNumber: 42,
      buildStep: 'test',
      link: 'https://app.circleci.com/pipelines/github/acme/api/42',
    },
  },
};

beforeEach(() => {
  mockLogLines.length = 0;
});

afterEach(() => {
  process.exitCode = undefined;
});

describe('toChunkRecord', () => {
  it('flattens a chunk into its NDJSON record', () => {
    expect(toChunkRecord(sampleChunk)).toEqual({
      sourceType: 'SOURCE_TYPE_CIRCLECI',
      sourceName: 'ci-test',
      sourceId: 9,
      jobId: 5,
      verify: true,
      metadata: sampleChunk.sourceMetadata,
      data: 'line1\nline3',
    });
  });
});

describe('writeChunks', () => {
  it('writes one JSON document per line', async () => {
    async function* chunks(): AsyncGenerator<Chunk> {
      yield sampleChunk;
      yield { ...sampleChunk, data: Buffer.from('second') };
    }
    const stream = new PassThrough();
    const output = collect(stream);

    await expect(writeChunks(chunks(), stream)).resolves.toBe(2);
    stream.end();

    const lines = output().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect((JSON.parse(lines[1] ?? '') as { data: string }).data).toBe('second');
  });
});

describe('runScan', () => {
  const logger = createLogger();

  it('streams every chunk to stdout and reports the scan', async () => {
    const stdout = new PassThrough();
    const output = collect(stdout);

    const result = await runScan(baseConfig, logger, {
      stdout,
      createClient: () => fakeApi(['a', 'b', 'c']),
    });

    expect(result.exitCode).toBe(exitCodes.success);
    expect(result.written).toBe(3);
    expect(result.report).toMatchObject({ projectsTotal: 3, chunksEmitted: 3, errorCount: 0 });
    const records = output()
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line) as { data: string; sourceName: string; jobId: number });
    expect(records.map((record) => record.data).sort()).toEqual(['log of a', 'log of b', 'log of c']);
    expect(records.every((record) => record.sourceName === 'ci-test' && record.jobId === 5)).toBe(true);
  });

  it('exits with code 2 on branch failures only when asked to', async () => {
    const createClient = () =>
      fakeApi(['a', 'b'], {
        listBuilds: async (target) => {
          if (target.reponame === 'b') {
            throw new TransportError('connection reset');
          }
          return [{ buildNum: 1 }];
        },
      });

    const lenient = await runScan(baseConfig, logger, { stdout: new PassThrough(), createClient });
    expect(lenient.exitCode).toBe(exitCodes.success);
    expect(lenient.report.errorCount).toBe(1);

    const strict = await runScan(baseConfig, logger, { stdout: new PassThrough(), createClient, failOnErrors: true });
    expect(strict.exitCode).toBe(exitCodes.scanErrors);
    expect(loggedLines().filter((line) => line.msg === '1 project(s) could not be scanned.')).toHaveLength(2);
  });

  it('propagates a failed project listing without output', async () => {
    const stdout = new PassThrough();
    const output = collect(stdout);

    await expect(
      runScan(baseConfig, logger, {
        stdout,
        createClient: () => fakeApi([], { listProjects: async () => Promise.reject(new AuthError(403)) }),
      }),
    ).rejects.toBeInstanceOf(AuthError);
    expect(output()).toBe('');
  });
});

describe('logCliError', () => {
  it('logs non-error values with a generic message', () => {
    __internal.logCliError(createLogger(), 42, { command: 'circleci' });

    expect(loggedLines()).toEqual([
      expect.objectContaining({ level: 50, msg: 'An unexpected error occurred.', command: 'circleci', error: { message: '42' } }),
    ]);
  });
});

describe('circleci command', () => {
  let server: http.Server;
  let origin: string;
  let tempDir: string;
  let buildsStatus = 200;
  const savedToken = process.env.CIRCLECI_TOKEN;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      const send = (status: number, body: unknown): void => {
        res.statusCode = status;
        res.setHeader('Content-Type', 'application/json');
        res.end(JSON.stringify(body));
      };
      if (req.headers['circle-token'] !== 'test-token') {
        send(401, { message: 'unauthorized' });
        return;
      }
      switch (req.url) {
        case '/api/v1.1/projects':
          send(200, [{ vcs_type: 'github', username: 'acme', reponame: 'api' }]);
          return;
        case '/api/v1.1/project/github/acme/api':
          send(buildsStatus, buildsStatus === 200 ? [{ build_num: 42 }] : { message: 'boom' });
          return;
        case '/api/v1.1/project/github/acme/api/42':
          send(200, { steps: [{ name: 'test', actions: [{ index: 0, output_url: `${origin}/logs/42/0` }] }] });
          return;
        case '/logs/42/0':
          res.end('line1\nCIRCLE_SHA1=abcd\nline3');
          return;
        default:
          send(404, {});
      }
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    origin = `http://127.0.0.1:${(server.address() as AddressInfo).port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(async () => {
    delete process.env.CIRCLECI_TOKEN;
    buildsStatus = 200;
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'logsweep-cli-'));
  });

  afterEach(async () => {
    if (savedToken === undefined) {
      delete process.env.CIRCLECI_TOKEN;
    } else {
      process.env.CIRCLECI_TOKEN = savedToken;
    }
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const runCommand = async (args: string[]): Promise<void> => {
    await yargsFactory(['circleci', ...args])
      .command(circleciCommand)
      .exitProcess(false)
      .showHelpOnFail(false)
      .parseAsync();
  };

  it('writes sanitized chunks to the output file', async () => {
    const outputPath = path.join(tempDir, 'nested', 'chunks.ndjson');

    await runCommand([
      '--token',
      'test-token',
      '--base-url',
      `${origin}/api/v1.1/`,
      '--output',
      outputPath,
      '--name',
      'ci-test',
      '--job-id',
      '5',
      '--source-id',
      '9',
    ]);

    expect(process.exitCode).toBe(exitCodes.success);
    const lines = (await fs.readFile(outputPath, 'utf8')).split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      sourceType: 'SOURCE_TYPE_CIRCLECI',
      sourceName: 'ci-test',
      sourceId: 9,
      jobId: 5,
      verify: false,
      metadata: {
        circleci: {
          vcsType: 'github',
          username: 'acme',
          repository: 'api',
          buildNumber: 42,
          buildStep: 'test',
          link: 'https://app.circleci.com/pipelines/github/acme/api/42',
        },
      },
      data: 'line1\nline3',
    });
  });

  it('reads the token from the environment', async () => {
    process.env.CIRCLECI_TOKEN = 'test-token';
    const outputPath = path.join(tempDir, 'chunks.ndjson');

    await runCommand(['--base-url', `${origin}/api/v1.1/`, '--output', outputPath]);

    expect(process.exitCode).toBe(exitCodes.success);
    expect((await fs.readFile(outputPath, 'utf8')).trim().split('\n')).toHaveLength(1);
  });

  it('exits with code 3 when no token is configured', async () => {
    await runCommand(['--base-url', `${origin}/api/v1.1/`, '--output', path.join(tempDir, 'chunks.ndjson')]);

    expect(process.exitCode).toBe(exitCodes.error);
    const errors = loggedLines().filter((line) => line.level === 50);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.msg).toBe('Invalid scan configuration: connection.token: A CircleCI token is required.');
  });

  it('exits with code 3 when the credentials are rejected', async () => {
    await runCommand([
      '--token',
      'wrong-token',
      '--base-url',
      `${origin}/api/v1.1/`,
      '--output',
      path.join(tempDir, 'chunks.ndjson'),
    ]);

    expect(process.exitCode).toBe(exitCodes.error);
    expect(loggedLines().find((line) => line.level === 50)?.msg).toBe('invalid credentials, status 401');
  });

  it('exits with code 2 for project failures under --fail-on-errors', async () => {
    buildsStatus = 500;
    const outputPath = path.join(tempDir, 'chunks.ndjson');

    await runCommand(['--token', 'test-token', '--base-url', `${origin}/api/v1.1/`, '--output', outputPath, '--fail-on-errors']);

    expect(process.exitCode).toBe(exitCodes.scanErrors);
    expect(await fs.readFile(outputPath, 'utf8')).toBe('');
  });
});
