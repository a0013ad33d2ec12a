import { BranchFailure, TransportError } from '@logsweep/core';

import { ScanProgress } from './progress';
import { ScanErrors } from './scanErrors';

const project = { vcsType: 'github', username: 'acme', reponame: 'api' };

describe('ScanErrors', () => {
  it('keeps failures in the order they were added', () => {
    const errors = new ScanErrors();
    const first = new BranchFailure('getting builds for project', { project }, new TransportError('reset'));
    const second = new BranchFailure(
      'getting steps for build',
      { project, build: { buildNum: 5 } },
      new TransportError('timeout'),
    );

    errors.add(first);
    errors.add(second);

    expect(errors.count).toBe(2);
    expect(errors.list()).toEqual([first, second]);
    expect(errors.toJSON()).toEqual([
      {
        code: 'TRANSPORT_FAILED',
        message: 'error getting builds for project (project github/acme/api): reset',
        project: 'github/acme/api',
      },
      {
        code: 'TRANSPORT_FAILED',
        message: 'error getting steps for build (project github/acme/api, build 5): timeout',
        project: 'github/acme/api',
        build: 5,
      },
    ]);
  });

  it('returns a copy of the list', () => {
    const errors = new ScanErrors();
    errors.add(new BranchFailure('getting builds for project', { project }, new TransportError('reset')));

    const listed = errors.list();
    expect(listed).toHaveLength(1);
    errors.add(new BranchFailure('getting builds for project', { project }, new TransportError('again')));
    expect(listed).toHaveLength(1);
    expect(errors.count).toBe(2);
  });
});

describe('ScanProgress', () => {
  it('reports completion per finished project', () => {
    const progress = new ScanProgress();
    progress.start(4);
    progress.completeProject(3, false);
    progress.completeProject(0, true);

    expect(progress.snapshot()).toEqual({
      projectsTotal: 4,
      projectsScanned: 2,
      chunksEmitted: 3,
      errorCount: 1,
      percentComplete: 50,
      message: 'scanned 2/4 projects',
    });
  });

  it('keeps chunks of cancelled projects without counting them as scanned', () => {
    const progress = new ScanProgress();
    progress.start(3);
    progress.completeProject(1, false);
    progress.recordChunks(2);

    expect(progress.snapshot()).toMatchObject({
      projectsScanned: 1,
      chunksEmitted: 3,
      percentComplete: 33,
      message: 'scanned 1/3 projects',
    });
  });

  it('treats an empty account as complete', () => {
    const progress = new ScanProgress();
    progress.start(0);
    expect(progress.snapshot()).toMatchObject({ percentComplete: 100, message: 'scanned 0/0 projects' });
  });
});
