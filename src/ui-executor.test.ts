import { describe, it, expect, vi } from 'vitest';
import { UiExecutor } from './ui-executor';
import { RecentsEventBus } from './event-bus';

describe('UiExecutor', () => {
  it('schedules a single drain for a burst of posts', () => {
    const schedule = vi.fn();
    const executor = new UiExecutor(null, schedule);

    executor.post(() => {});
    executor.post(() => {});

    expect(schedule).toHaveBeenCalledTimes(1);
    expect(executor.pending).toBe(2);
  });

  it('runs tasks in post order, including ones posted while draining', () => {
    const executor = new UiExecutor(null, () => {});
    const order: string[] = [];

    executor.post(() => {
      order.push('a');
      executor.post(() => order.push('c'));
    });
    executor.post(() => order.push('b'));

    expect(executor.flush()).toBe(3);
    expect(order).toEqual(['a', 'b', 'c']);
    expect(executor.pending).toBe(0);
  });

  it('schedules again after a drain', () => {
    const schedule = vi.fn();
    const executor = new UiExecutor(null, schedule);

    executor.post(() => {});
    executor.flush();
    executor.post(() => {});

    expect(schedule).toHaveBeenCalledTimes(2);
  });

  it('drains on the default scheduler without help', async () => {
    const executor = new UiExecutor();
    const done = new Promise<string>((resolve) => {
      executor.post(() => resolve('ran'));
    });
    await expect(done).resolves.toBe('ran');
  });

  it('reports a failing task on the bus and keeps draining', () => {
    const bus = new RecentsEventBus();
    const executor = new UiExecutor(bus, () => {});
    const after = vi.fn();

    executor.post(() => {
      throw new Error('boom');
    });
    executor.post(after);
    executor.flush();

    expect(after).toHaveBeenCalledTimes(1);
    const errors = bus.getRecent().filter((e) => e.type === 'executor:error');
    expect(errors.map((e) => [e.severity, e.args])).toEqual([['warning', ['boom']]]);
  });

  it('rethrows a failing task when there is no bus to report to', () => {
    const executor = new UiExecutor(null, () => {});
    executor.post(() => {
      throw new Error('boom');
    });
    expect(() => executor.flush()).toThrow('boom');
  });

  it('schedules another drain for tasks queued behind one that throws', () => {
    const drains: Array<() => void> = [];
    const executor = new UiExecutor(null, (drain) => drains.push(drain));
    const after = vi.fn();

    executor.post(() => {
      throw new Error('boom');
    });
    executor.post(after);
    expect(drains).toHaveLength(1);

    expect(() => drains[0]()).toThrow('boom');
    expect(after).not.toHaveBeenCalled();
    expect(executor.pending).toBe(1);
    expect(drains).toHaveLength(2);

    drains[1]();
    expect(after).toHaveBeenCalledTimes(1);
    expect(executor.pending).toBe(0);
  });
});
