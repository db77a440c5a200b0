// Tests for job snapshots handed to event consumers.
import { describe, expect, it } from 'vitest';
import { JOB_STATES, isTerminalState, snapshotJob, type Job } from './job.js';

function makeJob(): Job {
  return {
    id: 'job-1',
    batchId: 'batch-1',
    inputPath: '/in/clip.avi',
    desiredOutputPath: '/out/clip.mp4',
    outputPath: '/out/clip.mp4',
    profile: { engine: 'ffmpeg', formatKey: 'h264' },
    state: 'RUNNING',
    progressPercent: 40,
    logLines: ['frame=1'],
    errorDetail: null,
    note: null,
    skipped: false,
    engineUsed: 'ffmpeg',
    createdAt: new Date(0),
    startedAt: new Date(1000),
    finishedAt: null,
  };
}

describe('snapshotJob', () => {
  it('is frozen and detached from the live job', () => {
    const job = makeJob();
    const snapshot = snapshotJob(job);

    job.logLines.push('frame=2');
    job.progressPercent = 80;

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.logLines)).toBe(true);
    expect(Object.isFrozen(snapshot.profile)).toBe(true);
    expect(snapshot.logLines).toEqual(['frame=1']);
    expect(snapshot.progressPercent).toBe(40);
    expect(snapshot.startedAt).not.toBe(job.startedAt);
  });
});

describe('isTerminalState', () => {
  it('treats completed, failed and cancelled as terminal', () => {
    expect(JOB_STATES.map(isTerminalState)).toEqual([false, false, true, true, true]);
  });
});
