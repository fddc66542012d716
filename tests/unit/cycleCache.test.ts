import { describe, expect, it } from 'vitest';
import { ScalingCycleCache } from '../../src/inspection/cycleCache.js';
import { binding, fakeApp, fakeInspector, sizeChannel, task } from '../helpers/fakes.js';

describe('ScalingCycleCache', () => {
  it('creates nothing until an inspector is requested', () => {
    const cache = new ScalingCycleCache();

    expect(cache.inspectorCount).toBe(0);
  });

  it('reuses one inspection cache per application', () => {
    const app = fakeApp(sizeChannel({}));
    const cache = new ScalingCycleCache();

    const first = cache.inspectorFor(app);
    const second = cache.inspectorFor(app);

    expect(second).toBe(first);
    expect(app.inspect).toHaveBeenCalledTimes(1);
    expect(cache.inspectorCount).toBe(1);
  });

  it('keeps applications apart even when they look alike', async () => {
    const left = fakeApp(
      sizeChannel({}),
      fakeInspector({ activeQueues: { w: [binding('q', 'e', 'r')] }, active: { w: [task('e', 'r')] } })
    );
    const right = fakeApp(
      sizeChannel({}),
      fakeInspector({ activeQueues: { w: [binding('q', 'e', 'r')] }, active: {} })
    );
    const cache = new ScalingCycleCache();

    const leftCounts = await cache.inspectorFor(left).getStatusTaskCounts('active');
    const rightCounts = await cache.inspectorFor(right).getStatusTaskCounts('active');

    expect(leftCounts.get('q')).toBe(1);
    expect(rightCounts.get('q')).toBeUndefined();
    expect(cache.inspectorCount).toBe(2);
  });

  it('does not share memoized state between cycles', async () => {
    const inspector = fakeInspector({ activeQueues: { w: [binding('q', 'e', 'r')] } });
    const app = fakeApp(sizeChannel({}), inspector);

    await new ScalingCycleCache().inspectorFor(app).getRouteQueues();
    await new ScalingCycleCache().inspectorFor(app).getRouteQueues();

    expect(inspector.activeQueues).toHaveBeenCalledTimes(2);
  });
});
