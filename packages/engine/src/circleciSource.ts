import pino from 'pino';
import { z } from 'zod';

import {
  BranchFailure,
  CancelledError,
  ConfigError,
  SOURCE_TYPE_CIRCLECI,
  WriteError,
  sanitize,
  toScanError,
  type BranchContext,
  type Build,
  type BuildStep,
  type Chunk,
  type Project,
  type ScanError,
  type SourceType,
} from '@logsweep/core';
import { CircleCiClient, type CircleCiApi, type CircleCiClientOptions } from '@logsweep/adapters';

import { ChannelClosedError, type ChunkSink } from './channel';
import { buildChunk, emitChunk, type SourceContext } from './emitter';
import { ScanProgress, type ProgressSnapshot } from './progress';
import { ScanErrors } from './scanErrors';
import { WorkerPool } from './workerPool';

type Logger = pino.Logger;

export const sourceSettingsSchema = z.object({
  name: z.string().min(1, 'name must not be empty.'),
  jobId: z.number().int().nonnegative(),
  sourceId: z.number().int().nonnegative(),
  verify: z.boolean().default(false),
  connection: z.object({
    token: z.string().min(1, 'A CircleCI token is required.'),
  }),
  concurrency: z.number().int().min(1, 'concurrency must be at least 1.'),
  baseUrl: z.string().url().optional(),
  dashboardUrl: z.string().url().optional(),
  maxLogBytes: z.number().int().min(1, 'maxLogBytes must be at least 1.').optional(),
});

export type SourceSettingsInput = z.input<typeof sourceSettingsSchema>;

export type SourceSettings = z.output<typeof sourceSettingsSchema>;

export type ClientFactory = (options: CircleCiClientOptions) => CircleCiApi;

export interface CircleCiSourceOptions {
  logger?: Logger;
  createClient?: ClientFactory;
}

export type ScanState = 'idle' | 'listing-projects' | 'fanning-out' | 'draining' | 'done';

export type ProjectWalkResult =
  | { status: 'ok'; project: Project; chunks: number }
  | { status: 'failed'; project: Project; chunks: number; failure: BranchFailure }
  | { status: 'cancelled'; project: Project; chunks: number };

export interface ScanReport {
  projectsTotal: number;
  projectsScanned: number;
  projectsFailed: number;
  chunksEmitted: number;
  errorCount: number;
  errors: readonly BranchFailure[];
}

export interface RunOptions {
  signal?: AbortSignal;
}

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

const defaultClientFactory: ClientFactory = (options) => new CircleCiClient(options);

interface WalkContext {
  client: CircleCiApi;
  source: SourceContext;
  sink: ChunkSink<Chunk>;
  signal?: AbortSignal;
}

/**
 * Walks every project of a CircleCI account and streams the sanitized action
 * logs to a sink. A failure below the project listing only abandons the
 * project it happened in.
 */
export class CircleCiSource {
  private readonly logger: Logger;

  private readonly createClient: ClientFactory;

  private settings?: SourceSettings;

  private client?: CircleCiApi;

  private progress = new ScanProgress();

  private currentState: ScanState = 'idle';

  constructor(options: CircleCiSourceOptions = {}) {
    this.logger = options.logger ?? pino({ enabled: false });
    this.createClient = options.createClient ?? defaultClientFactory;
  }

  init(input: unknown): void {
    const parsed = sourceSettingsSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid CircleCI source settings: ${issues.join('; ')}`, issues);
    }
    this.settings = parsed.data;
    this.client = this.createClient({
      token: parsed.data.connection.token,
      baseUrl: parsed.data.baseUrl,
      maxLogBytes: parsed.data.maxLogBytes,
      logger: this.logger,
    });
    this.currentState = 'idle';
  }

  type(): SourceType {
    return SOURCE_TYPE_CIRCLECI;
  }

  get sourceId(): number {
    return this.requireSettings().sourceId;
  }

  get jobId(): number {
    return this.requireSettings().jobId;
  }

  get state(): ScanState {
    return this.currentState;
  }

  getProgress(): ProgressSnapshot {
    return this.progress.snapshot();
  }

  async run(sink: ChunkSink<Chunk>, options: RunOptions = {}): Promise<ScanReport> {
    const settings = this.requireSettings();
    const client = this.requireClient();
    const { signal } = options;
    if (this.currentState !== 'idle' && this.currentState !== 'done') {
      throw new ConfigError('A scan is already running for this source.');
    }

    this.progress = new ScanProgress();
    this.currentState = 'listing-projects';
    let projects: Project[];
    try {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      projects = await client.listProjects(signal);
    } catch (error) {
      this.currentState = 'done';
      throw toScanError(error);
    }

    const errors = new ScanErrors();
    const pool = new WorkerPool(settings.concurrency);
    const context: WalkContext = {
      client,
      source: {
        name: settings.name,
        sourceId: settings.sourceId,
        jobId: settings.jobId,
        verify: settings.verify,
        dashboardUrl: settings.dashboardUrl,
      },
      sink,
      signal,
    };

    this.progress.start(projects.length);
    this.currentState = 'fanning-out';
    this.logger.debug({ projects: projects.length, concurrency: settings.concurrency }, 'Scanning CircleCI projects.');
    const tasks = projects.map((project) =>
      pool.submit(() => this.walkProject(project, context)).then((result) => {
        this.collect(result, errors);
        return result;
      }),
    );

    this.currentState = 'draining';
    await pool.drain();
    const results = await Promise.all(tasks);
    this.currentState = 'done';

    if (errors.count > 0) {
      this.logger.debug({ errors: errors.toJSON() }, `${errors.count} CircleCI project(s) failed.`);
    }
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const progress = this.progress.snapshot();
    return {
      projectsTotal: progress.projectsTotal,
      projectsScanned: progress.projectsScanned,
      projectsFailed: results.filter((result) => result.status === 'failed').length,
      chunksEmitted: progress.chunksEmitted,
      errorCount: errors.count,
      errors: errors.list(),
    };
  }

  private collect(result: ProjectWalkResult, errors: ScanErrors): void {
    if (result.status === 'cancelled') {
      this.progress.recordChunks(result.chunks);
      return;
    }
    if (result.status === 'failed') {
      errors.add(result.failure);
    }
    this.progress.completeProject(result.chunks, result.status === 'failed');
    const snapshot = this.progress.snapshot();
    this.logger.debug(
      { projectsScanned: snapshot.projectsScanned, projectsTotal: snapshot.projectsTotal },
      snapshot.message,
    );
  }

  /** Builds, steps and actions are visited strictly in listing order. */
  private async walkProject(project: Project, context: WalkContext): Promise<ProjectWalkResult> {
    const { client, signal } = context;
    let chunks = 0;
    if (signal?.aborted) {
      return { status: 'cancelled', project, chunks };
    }

    let builds: Build[];
    try {
      builds = await client.listBuilds(project, signal);
    } catch (error) {
      return this.toFailure('getting builds for project', { project }, error, chunks);
    }

    for (const build of builds) {
      let steps: BuildStep[];
      try {
        steps = await client.listSteps(project, build, signal);
      } catch (error) {
        return this.toFailure('getting steps for build', { project, build }, error, chunks);
      }

      for (const step of steps) {
        for (const action of step.actions) {
          // CircleCI reports a null output URL for actions that produced no output.
          if (!action.outputUrl) {
            continue;
          }
          try {
            const body = await client.fetchLogBody(action, signal);
            const chunk = buildChunk(context.source, project, build, step.name, sanitize(body));
            await emitChunk(context.sink, chunk, signal);
            chunks += 1;
          } catch (error) {
            return this.toFailure('chunking action', { project, build, step: step.name, action }, error, chunks);
          }
        }
      }
    }

    return { status: 'ok', project, chunks };
  }

  private toFailure(stage: string, branch: BranchContext, error: unknown, chunks: number): ProjectWalkResult {
    const reason: ScanError =
      error instanceof ChannelClosedError
        ? new WriteError('Output channel was closed before the chunk was accepted.', { cause: error })
        : toScanError(error);
    if (reason instanceof CancelledError) {
      return { status: 'cancelled', project: branch.project, chunks };
    }
    return { status: 'failed', project: branch.project, chunks, failure: new BranchFailure(stage, branch, reason) };
  }

  private requireSettings(): SourceSettings {
    if (!this.settings) {
      throw new ConfigError('CircleCI source has not been initialized.');
    }
    return this.settings;
  }

  private requireClient(): CircleCiApi {
    if (!this.client) {
      throw new ConfigError('CircleCI source has not been initialized.');
    }
    return this.client;
  }
}
