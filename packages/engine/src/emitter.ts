import {
  SOURCE_TYPE_CIRCLECI,
  buildPipelineLink,
  type Build,
  type Chunk,
  type Project,
} from '@logsweep/core';

import type { ChunkSink } from './channel';

export interface SourceContext {
  name: string;
  sourceId: number;
  jobId: number;
  verify: boolean;
  dashboardUrl?: string;
}

export const buildChunk = (
  source: SourceContext,
  project: Project,
  build: Build,
  stepName: string,
  body: Buffer,
): Chunk => ({
  sourceType: SOURCE_TYPE_CIRCLECI,
  sourceName: source.name,
  sourceId: source.sourceId,
  jobId: source.jobId,
  data: body,
  verify: source.verify,
  sourceMetadata: {
    circleci: {
      vcsType: project.vcsType,
      username: project.username,
      repository: project.reponame,
      buildNumber: build.buildNum,
      buildStep: stepName,
      link: buildPipelineLink(project, build, source.dashboardUrl),
    },
  },
});

/** Suspends until the sink accepts the chunk. */
export const emitChunk = async (sink: ChunkSink<Chunk>, chunk: Chunk, signal?: AbortSignal): Promise<void> => {
  await sink.send(chunk, signal);
};
