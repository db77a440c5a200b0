import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PreflightError, type ConversionProfile, type JobStateChangedEvent } from '@vconvert/core';
import { EngineRegistry } from './engines/registry.js';
import { ConversionScheduler, WATCHDOG_REASON, summarize } from './scheduler.js';
import { FakeEngine, RecordingSink, type FakeProcess, type FakeRun } from './testing/fakes.js';

const H264: ConversionProfile = { engine: 'ffmpeg', formatKey: 'h264' };

describe('ConversionScheduler', () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;
  let sink: RecordingSink;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'vconvert-scheduler-'));
    inputDir = join(root, 'in');
    outputDir = join(root, 'out');
    await Promise.all([mkdir(inputDir), mkdir(outputDir)]);
    sink = new RecordingSink();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function inputs(...names: string[]): Promise<string[]> {
    const paths = names.map(name => join(inputDir, name));
    await Promise.all(paths.map(path => writeFile(path, 'source')));
    return paths;
  }

  function scriptFor(runs: Record<string, FakeRun>): (outputPath: string) => FakeRun {
    return (outputPath) => {
      const name = outputPath.slice(outputDir.length + 1);
      return runs[name] ?? { stdout: ['50%', '100%'] };
    };
  }

  function schedulerWith(engines: FakeEngine[], options: { maxJobDurationMs?: number } = {}) {
    return new ConversionScheduler({
      engines: new EngineRegistry(engines),
      sink,
      maxJobDurationMs: options.maxJobDurationMs,
    });
  }

  function firstStart(engine: FakeEngine): Promise<FakeProcess> {
    return new Promise((resolve) => {
      engine.onStart = (process) => {
        engine.onStart = null;
        resolve(process);
      };
    });
  }

  it('converts a job and reports state, progress and log events', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ stdout: ['10%', '50%', '100%'] }));
    const scheduler = schedulerWith([engine]);
    const [input = ''] = await inputs('clip.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    const summary = await handle.done;
    const jobId = handle.jobs[0]?.id ?? '';
    const job = scheduler.getJob(jobId);
    const output = join(outputDir, 'clip.mp4');

    expect(summary).toEqual({ total: 1, completed: 1, skipped: 0, failed: 0, cancelled: 0, pending: 0 });
    expect(sink.statesOf(jobId)).toEqual(['RUNNING', 'COMPLETED']);
    expect(sink.progressOf(jobId)).toEqual([10, 50, 100]);
    expect(job?.state).toBe('COMPLETED');
    expect(job?.outputPath).toBe(output);
    expect(job?.engineUsed).toBe('ffmpeg');
    expect(job?.progressPercent).toBe(100);
    expect(job?.note).toBe('Conversion completed');
    expect(job?.errorDetail).toBeNull();
    expect(job?.logLines).toEqual([`$ /fake/bin/ffmpeg ${input} ${output}`, '10%', '50%', '100%']);
    expect(sink.events.at(-1)).toEqual({ type: 'BatchFinished', batchId: handle.batchId, summary });
    expect(scheduler.isIdle()).toBe(true);
  });

  it('never lets progress go backwards and finishes at 100', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ stdout: ['10%', '7%', '30%'] }));
    const scheduler = schedulerWith([engine]);
    const [input = ''] = await inputs('clip.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await handle.done;

    expect(sink.progressOf(handle.jobs[0]?.id ?? '')).toEqual([10, 30, 100]);
  });

  it('skips jobs whose output already exists under the skip policy', async () => {
    const engine = new FakeEngine('ffmpeg');
    const scheduler = schedulerWith([engine]);
    const paths = await inputs('a.avi', 'b.avi', 'c.avi');
    await writeFile(join(outputDir, 'b.mp4'), 'existing');

    const handle = await scheduler.submit(paths.map(inputPath => ({ inputPath, profile: H264 })), {
      outputDir,
      conflictPolicy: 'skip',
    });
    const summary = await handle.done;
    const skippedId = handle.jobs[1]?.id ?? '';
    const skipped = scheduler.getJob(skippedId);

    expect(summary).toEqual({ total: 3, completed: 3, skipped: 1, failed: 0, cancelled: 0, pending: 0 });
    expect(sink.statesOf(skippedId)).toEqual(['COMPLETED']);
    expect(skipped?.skipped).toBe(true);
    expect(skipped?.note).toBe('Skipped: output already exists');
    expect(engine.processes.map(process => process.outputPath)).toEqual([
      join(outputDir, 'a.mp4'),
      join(outputDir, 'c.mp4'),
    ]);
    expect(await readFile(join(outputDir, 'b.mp4'), 'utf8')).toBe('existing');
  });

  it('writes to a numbered name under the suffix policy', async () => {
    const scheduler = schedulerWith([new FakeEngine('ffmpeg')]);
    const [input = ''] = await inputs('clip.avi');
    await writeFile(join(outputDir, 'clip.mp4'), 'existing');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'suffix',
    });
    await handle.done;
    const jobId = handle.jobs[0]?.id ?? '';

    expect(scheduler.getJob(jobId)?.outputPath).toBe(join(outputDir, 'clip_1.mp4'));
    const running = sink.events.find(
      (event): event is JobStateChangedEvent =>
        event.type === 'JobStateChanged' && event.state === 'RUNNING'
    );
    expect(running?.reason).toBe('Output exists; using numbered name');
    expect(await readFile(join(outputDir, 'clip.mp4'), 'utf8')).toBe('existing');
  });

  it('keeps going after a job whose engine is not installed', async () => {
    const handbrake = new FakeEngine('handbrake');
    handbrake.available = false;
    const scheduler = schedulerWith([new FakeEngine('ffmpeg'), handbrake]);
    const [first = '', second = ''] = await inputs('a.avi', 'b.avi');

    const handle = await scheduler.submit([
      { inputPath: first, profile: { engine: 'handbrake', formatKey: 'h264' } },
      { inputPath: second, profile: H264 },
    ], { outputDir, conflictPolicy: 'overwrite' });
    const summary = await handle.done;
    const failedId = handle.jobs[0]?.id ?? '';

    expect(summary).toEqual({ total: 2, completed: 1, skipped: 0, failed: 1, cancelled: 0, pending: 0 });
    expect(sink.statesOf(failedId)).toEqual(['RUNNING', 'FAILED']);
    expect(scheduler.getJob(failedId)?.errorDetail)
      .toBe('Engine handbrake is not available (searched: /fake/bin/handbrake)');
    expect(scheduler.getJob(handle.jobs[1]?.id ?? '')?.state).toBe('COMPLETED');
  });

  it('falls back to another engine when asked to', async () => {
    const handbrake = new FakeEngine('handbrake');
    handbrake.available = false;
    const scheduler = schedulerWith([new FakeEngine('ffmpeg'), handbrake]);
    const [input = ''] = await inputs('a.avi');

    const handle = await scheduler.submit(
      [{ inputPath: input, profile: { engine: 'handbrake', formatKey: 'h264' } }],
      { outputDir, conflictPolicy: 'overwrite', engineFallback: true }
    );
    await handle.done;
    const job = scheduler.getJob(handle.jobs[0]?.id ?? '');

    expect(job?.state).toBe('COMPLETED');
    expect(job?.engineUsed).toBe('ffmpeg');
  });

  it('fails a job whose engine exits with an error', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({
      stderr: ['Error opening input: Invalid data found when processing input'],
      exitCode: 1,
    }));
    const scheduler = schedulerWith([engine]);
    const [input = ''] = await inputs('broken.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await handle.done;
    const job = scheduler.getJob(handle.jobs[0]?.id ?? '');

    expect(job?.state).toBe('FAILED');
    expect(job?.errorDetail)
      .toBe('Fake ffmpeg exited with code 1: opening input: Invalid data found when processing input');
  });

  it('fails a clean exit that produced no output', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ stdout: ['100%'], writeOutput: false }));
    const scheduler = schedulerWith([engine]);
    const [input = ''] = await inputs('clip.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await handle.done;

    expect(scheduler.getJob(handle.jobs[0]?.id ?? '')?.errorDetail)
      .toBe('Fake ffmpeg exited cleanly but produced no output');
  });

  it('fails a job whose input disappeared', async () => {
    const engine = new FakeEngine('ffmpeg');
    const scheduler = schedulerWith([engine]);
    const missing = join(inputDir, 'gone.avi');

    const handle = await scheduler.submit([{ inputPath: missing, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await handle.done;

    expect(scheduler.getJob(handle.jobs[0]?.id ?? '')?.errorDetail)
      .toBe(`Input file is not readable: ${missing}`);
    expect(engine.processes).toHaveLength(0);
  });

  it('cancels the current job, removes its partial output and moves on', async () => {
    const engine = new FakeEngine('ffmpeg', scriptFor({ 'a.mp4': { stdout: ['10%'], hang: true } }));
    const started = firstStart(engine);
    const scheduler = schedulerWith([engine]);
    const paths = await inputs('a.avi', 'b.avi');

    const handle = await scheduler.submit(paths.map(inputPath => ({ inputPath, profile: H264 })), {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    const process = await started;
    await process.outputWritten;
    expect(existsSync(join(outputDir, 'a.mp4'))).toBe(true);

    await scheduler.cancelCurrent();
    const cancelledId = handle.jobs[0]?.id ?? '';

    expect(scheduler.getJob(cancelledId)?.state).toBe('CANCELLED');
    expect(scheduler.getJob(cancelledId)?.note).toBe('Cancelled by user');
    expect(existsSync(join(outputDir, 'a.mp4'))).toBe(false);
    expect(process.terminations).toEqual([10]);

    const summary = await handle.done;
    expect(summary).toEqual({ total: 2, completed: 1, skipped: 0, failed: 0, cancelled: 1, pending: 0 });
  });

  it('leaves a file that existed before the job untouched on cancel', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ hang: true, writeOutput: false }));
    const started = firstStart(engine);
    const scheduler = schedulerWith([engine]);
    const [input = ''] = await inputs('a.avi');
    const output = join(outputDir, 'a.mp4');
    await writeFile(output, 'original');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await (await started).outputWritten;
    await scheduler.cancelCurrent();
    await handle.done;

    expect(scheduler.getJob(handle.jobs[0]?.id ?? '')?.state).toBe('CANCELLED');
    expect(await readFile(output, 'utf8')).toBe('original');
  });

  it('cancels a whole batch, leaving unstarted jobs pending', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ hang: true }));
    const started = firstStart(engine);
    const scheduler = schedulerWith([engine]);
    const paths = await inputs('a.avi', 'b.avi', 'c.avi');

    const handle = await scheduler.submit(paths.map(inputPath => ({ inputPath, profile: H264 })), {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await (await started).outputWritten;
    expect(scheduler.getCurrentJob()?.id).toBe(handle.jobs[0]?.id);
    await scheduler.cancelAll();
    expect(scheduler.getCurrentJob()).toBeNull();

    expect(scheduler.isIdle()).toBe(true);
    expect(scheduler.getJobs().map(job => job.state)).toEqual(['CANCELLED', 'PENDING', 'PENDING']);
    expect(engine.processes).toHaveLength(1);
    expect(await handle.done).toEqual({
      total: 3, completed: 0, skipped: 0, failed: 0, cancelled: 1, pending: 2,
    });
  });

  it('treats repeated cancel requests as one', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ hang: true }));
    const started = firstStart(engine);
    const scheduler = schedulerWith([engine]);
    const paths = await inputs('a.avi', 'b.avi');

    const handle = await scheduler.submit(paths.map(inputPath => ({ inputPath, profile: H264 })), {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    const process = await started;
    await process.outputWritten;

    await Promise.all([scheduler.cancelAll(), scheduler.cancelAll(), scheduler.cancelCurrent()]);

    expect(process.terminations).toEqual([10]);
    expect(scheduler.getJobs().map(job => job.state)).toEqual(['CANCELLED', 'PENDING']);
    expect(await handle.done).toEqual({
      total: 2, completed: 0, skipped: 0, failed: 0, cancelled: 1, pending: 1,
    });
    expect(sink.events.filter(event => event.type === 'BatchFinished')).toHaveLength(1);
  });

  it('cancels a job that runs past the maximum duration', async () => {
    const engine = new FakeEngine('ffmpeg', () => ({ hang: true }));
    const scheduler = schedulerWith([engine], { maxJobDurationMs: 30 });
    const [input = ''] = await inputs('a.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });
    await handle.done;
    const jobId = handle.jobs[0]?.id ?? '';

    expect(sink.statesOf(jobId)).toEqual(['RUNNING', 'CANCELLED']);
    expect(scheduler.getJob(jobId)?.note).toBe(WATCHDOG_REASON);
  });

  it('runs batches in submission order, one job at a time', async () => {
    const engine = new FakeEngine('ffmpeg');
    const scheduler = schedulerWith([engine]);
    const [a = '', b = '', c = ''] = await inputs('a.avi', 'b.avi', 'c.avi');
    const options = { outputDir, conflictPolicy: 'overwrite' as const };

    const first = await scheduler.submit([{ inputPath: a, profile: H264 }, { inputPath: b, profile: H264 }], options);
    const second = await scheduler.submit([{ inputPath: c, profile: H264 }], options);
    await Promise.all([first.done, second.done]);

    expect(engine.processes.map(process => process.outputPath)).toEqual([
      join(outputDir, 'a.mp4'),
      join(outputDir, 'b.mp4'),
      join(outputDir, 'c.mp4'),
    ]);

    let running = 0;
    let peak = 0;
    for (const event of sink.events) {
      if (event.type !== 'JobStateChanged') continue;
      running += event.state === 'RUNNING' ? 1 : -1;
      peak = Math.max(peak, running);
    }
    expect(peak).toBe(1);
    expect(running).toBe(0);
  });

  it('keeps converting when the event sink throws', async () => {
    const scheduler = new ConversionScheduler({
      engines: new EngineRegistry([new FakeEngine('ffmpeg')]),
      sink: {
        publish() {
          throw new Error('sink unavailable');
        },
      },
    });
    const [input = ''] = await inputs('a.avi');

    const handle = await scheduler.submit([{ inputPath: input, profile: H264 }], {
      outputDir,
      conflictPolicy: 'overwrite',
    });

    expect((await handle.done).completed).toBe(1);
  });

  describe('submit', () => {
    it('rejects an empty batch', async () => {
      const scheduler = schedulerWith([new FakeEngine('ffmpeg')]);
      await expect(scheduler.submit([], { outputDir, conflictPolicy: 'skip' }))
        .rejects.toThrow('No input files to convert');
    });

    it('rejects a missing output directory', async () => {
      const scheduler = schedulerWith([new FakeEngine('ffmpeg')]);
      const [input = ''] = await inputs('a.avi');
      const missing = join(root, 'missing');

      await expect(scheduler.submit([{ inputPath: input, profile: H264 }], {
        outputDir: missing,
        conflictPolicy: 'skip',
      })).rejects.toThrow(`Output directory does not exist or is not writable: ${missing}`);
    });

    it('rejects a format the engine cannot produce', async () => {
      const scheduler = schedulerWith([new FakeEngine('handbrake', undefined, ['h264'])]);
      const [input = ''] = await inputs('a.avi');

      await expect(scheduler.submit(
        [{ inputPath: input, profile: { engine: 'handbrake', formatKey: 'xvid' } }],
        { outputDir, conflictPolicy: 'skip' }
      )).rejects.toThrow('Fake handbrake does not support the xvid format');
    });

    it('rejects custom parameters carrying shell syntax and queues nothing', async () => {
      const scheduler = schedulerWith([new FakeEngine('ffmpeg')]);
      const [input = ''] = await inputs('a.avi');

      await expect(scheduler.submit(
        [{ inputPath: input, profile: { engine: 'ffmpeg', formatKey: 'custom', customArgs: '-c:v copy; rm -rf /' } }],
        { outputDir, conflictPolicy: 'skip' }
      )).rejects.toBeInstanceOf(PreflightError);
      expect(scheduler.getJobs()).toEqual([]);
      expect(scheduler.isIdle()).toBe(true);
    });
  });
});

describe('summarize', () => {
  it('counts skipped jobs among the completed ones', () => {
    const base = {
      batchId: 'b', inputPath: '/in/a.avi', desiredOutputPath: '/out/a.mp4', outputPath: null,
      profile: H264, progressPercent: 0, logLines: [], errorDetail: null, note: null,
      engineUsed: null, createdAt: new Date(0), startedAt: null, finishedAt: null,
    };

    expect(summarize([
      { ...base, id: '1', state: 'COMPLETED', skipped: true },
      { ...base, id: '2', state: 'COMPLETED', skipped: false },
      { ...base, id: '3', state: 'FAILED', skipped: false },
      { ...base, id: '4', state: 'PENDING', skipped: false },
    ])).toEqual({ total: 4, completed: 2, skipped: 1, failed: 1, cancelled: 0, pending: 1 });
  });
});
