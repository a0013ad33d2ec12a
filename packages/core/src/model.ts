import { z } from 'zod';

export const SOURCE_TYPE_CIRCLECI = 'SOURCE_TYPE_CIRCLECI' as const;

export type SourceType = typeof SOURCE_TYPE_CIRCLECI;

export interface Project {
  vcsType: string;
  username: string;
  reponame: string;
}

export interface Build {
  buildNum: number;
}

export interface Action {
  index: number;
  /** Absent when the action produced no output. */
  outputUrl?: string;
}

export interface BuildStep {
  name: string;
  actions: Action[];
}

export interface CircleCiMetadata {
  vcsType: string;
  username: string;
  repository: string;
  buildNumber: number;
  buildStep: string;
  link: string;
}

export interface ChunkMetadata {
  circleci: CircleCiMetadata;
}

export interface Chunk {
  sourceType: SourceType;
  sourceName: string;
  sourceId: number;
  jobId: number;
  data: Buffer;
  verify: boolean;
  sourceMetadata: ChunkMetadata;
}

const requiredName = (label: string) => z.string().min(1, `${label} must not be empty.`);

export const projectPayloadSchema = z
  .object({
    vcs_type: requiredName('vcs_type'),
    username: requiredName('username'),
    reponame: requiredName('reponame'),
  })
  .transform(
    (payload): Project => ({
      vcsType: payload.vcs_type,
      username: payload.username,
      reponame: payload.reponame,
    }),
  );

export const projectListSchema = z.array(projectPayloadSchema);

export const buildPayloadSchema = z
  .object({
    build_num: z.number().int(),
  })
  .transform((payload): Build => ({ buildNum: payload.build_num }));

export const buildListSchema = z.array(buildPayloadSchema);

export const actionPayloadSchema = z
  .object({
    index: z.number().int(),
    output_url: z.string().min(1).nullish(),
  })
  .transform(
    (payload): Action =>
      payload.output_url ? { index: payload.index, outputUrl: payload.output_url } : { index: payload.index },
  );

export const buildStepPayloadSchema = z
  .object({
    name: z.string(),
    actions: z.array(actionPayloadSchema).nullish(),
  })
  .transform((payload): BuildStep => ({ name: payload.name, actions: payload.actions ?? [] }));

export const buildDetailSchema = z.object({
  steps: z.array(buildStepPayloadSchema).nullish(),
});

export const projectKey = (project: Project): string =>
  `${project.vcsType}/${project.username}/${project.reponame}`;

export const DEFAULT_DASHBOARD_URL = 'https://app.circleci.com';

export const buildPipelineLink = (
  project: Project,
  build: Build,
  dashboardUrl: string = DEFAULT_DASHBOARD_URL,
): string => {
  const base = dashboardUrl.endsWith('/') ? dashboardUrl.slice(0, -1) : dashboardUrl;
  return `${base}/pipelines/${project.vcsType}/${project.username}/${project.reponame}/${build.buildNum}`;
};
