import { BackgroundJobsService } from './background-jobs.service';
import { testConfig } from '../../../test/fakes';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BackgroundJobsService', () => {
  it('runs at most `frames.concurrency` jobs at once, in submission order', async () => {
    const jobs = new BackgroundJobsService(testConfig({ frames: { concurrency: 2 } }));
    const gates = [deferred(), deferred(), deferred()];
    const started: string[] = [];

    const outcomes = gates.map((gate, i) =>
      jobs.submit(`job-${i}`, async () => {
        started.push(`job-${i}`);
        await gate.promise;
      }),
    );

    expect(started).toEqual(['job-0', 'job-1']);
    expect(jobs.active).toBe(2);
    expect(jobs.pending).toBe(1);

    gates[0].resolve();
    await outcomes[0];
    expect(started).toEqual(['job-0', 'job-1', 'job-2']);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(outcomes)).resolves.toEqual([
      { id: 'job-0', status: 'completed' },
      { id: 'job-1', status: 'completed' },
      { id: 'job-2', status: 'completed' },
    ]);
  });

  it('reports failures without rejecting', async () => {
    const jobs = new BackgroundJobsService(testConfig());

    const outcome = await jobs.submit('frames:7', async () => {
      throw new Error('insert into frame rejected');
    });

    expect(outcome).toEqual({ id: 'frames:7', status: 'failed', error: 'insert into frame rejected' });
  });

  it('resolves onIdle once every job has finished', async () => {
    const jobs = new BackgroundJobsService(testConfig({ frames: { concurrency: 1 } }));
    const done: number[] = [];

    for (let i = 0; i < 3; i++) {
      void jobs.submit(`job-${i}`, async () => {
        await new Promise((r) => setTimeout(r, 5));
        done.push(i);
      });
    }

    await jobs.onIdle();

    expect(done).toEqual([0, 1, 2]);
    expect(jobs.active).toBe(0);
    expect(jobs.pending).toBe(0);
  });

  it('drains outstanding jobs on shutdown', async () => {
    const jobs = new BackgroundJobsService(testConfig());
    let finished = false;
    void jobs.submit('slow', async () => {
      await new Promise((r) => setTimeout(r, 5));
      finished = true;
    });

    await jobs.onApplicationShutdown('SIGTERM');

    expect(finished).toBe(true);
  });

  it('resolves onIdle immediately when nothing was submitted', async () => {
    await expect(new BackgroundJobsService(testConfig()).onIdle()).resolves.toBeUndefined();
  });
});
