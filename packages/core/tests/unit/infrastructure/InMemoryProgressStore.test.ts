import { describe, it, expect } from 'vitest';
import { InMemoryProgressStore } from '../../../src/infrastructure/state/InMemoryProgressStore.js';
import { collect } from '../../../src/utils/restartable.js';
import { describeProgressStoreContract } from '../../contract/progressStoreContract.js';

describeProgressStoreContract('InMemoryProgressStore', (options) =>
  Promise.resolve({ store: new InMemoryProgressStore(options) }),
);

describe('InMemoryProgressStore', () => {
  it('should default deleteWhenDone to false', () => {
    expect(new InMemoryProgressStore().deleteWhenDone).toBe(false);
  });

  it('should copy descriptors so later caller mutations do not leak in', async () => {
    const store = new InMemoryProgressStore();
    const descriptor = { source: 'a.tif' };
    await store.registerJob('123', [descriptor]);

    descriptor.source = 'changed.tif';

    expect(await collect(await store.listPendingParts('123'))).toEqual([{ source: 'a.tif' }]);
  });

  it('should move a re-registered job to the end of the listing', async () => {
    const store = new InMemoryProgressStore();
    await store.registerJob('job1', [{ source: 'a.tif' }]);
    await store.registerJob('job2', [{ source: 'a.tif' }]);
    await store.registerJob('job1', [{ source: 'a.tif' }]);

    expect(await collect(store.listJobIds())).toEqual(['job2', 'job1']);
  });

  it('should not list a job deleted while the listing is in progress', async () => {
    const store = new InMemoryProgressStore();
    await store.registerJob('job1', []);
    await store.registerJob('job2', []);

    const seen: string[] = [];
    for await (const jobId of store.listJobIds()) {
      seen.push(jobId);
      if (jobId === 'job1') await store.deleteJob('job2');
    }

    expect(seen).toEqual(['job1']);
  });
});
