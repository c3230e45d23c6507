import { describe, it, expect } from 'vitest';
import { WorkerTable } from '../worker-table.js';

const ADDR = { host: '127.0.0.1', port: 50001 };

describe('WorkerTable', () => {
  it('registers a worker as connected with no progress', () => {
    const table = new WorkerTable(1000);

    table.register(1, ADDR);

    expect(table.get(1)).toEqual({
      workerId: 1,
      localProgress: 0,
      address: ADDR,
      connected: true,
    });
    expect(table.sample(false)).toEqual({
      totalProgress: 0,
      reportedIterations: 0,
      connectedWorkers: 1,
    });
  });

  it('applies a duplicate update once', () => {
    const table = new WorkerTable(1000);
    table.register(1, ADDR);

    table.update(1, 40, ADDR);
    table.update(1, 40, ADDR);

    expect(table.get(1)?.localProgress).toBe(40);
    expect(table.sample(false).reportedIterations).toBe(40);
  });

  it('keeps the maximum under reordering with the max policy', () => {
    const inOrder = new WorkerTable(1000, 'max');
    inOrder.update(1, 10, ADDR);
    inOrder.update(1, 20, ADDR);

    const reversed = new WorkerTable(1000, 'max');
    reversed.update(1, 20, ADDR);
    reversed.update(1, 10, ADDR);

    expect(inOrder.get(1)?.localProgress).toBe(20);
    expect(reversed.get(1)?.localProgress).toBe(20);
  });

  it('takes the last arrival with the overwrite policy', () => {
    const table = new WorkerTable(1000, 'overwrite');
    table.update(1, 20, ADDR);
    table.update(1, 10, ADDR);

    expect(table.get(1)?.localProgress).toBe(10);
    expect(table.updatePolicy).toBe('overwrite');
  });

  it('creates an unconnected record for an update without registration', () => {
    const table = new WorkerTable(1000);

    table.update(4, 30, ADDR);

    expect(table.get(4)).toEqual({
      workerId: 4,
      localProgress: 30,
      address: ADDR,
      connected: false,
    });
    expect(table.sample(false).connectedWorkers).toBe(0);
  });

  it('adds every accumulated report, duplicates included', () => {
    const table = new WorkerTable(1000, 'max');

    table.accumulate(1, 10, ADDR);
    table.register(1, ADDR);
    table.accumulate(1, 10, ADDR);
    table.accumulate(1, 5, ADDR);

    expect(table.get(1)).toEqual({
      workerId: 1,
      localProgress: 25,
      address: ADDR,
      connected: true,
    });
  });

  it('keeps progress when a late registration arrives', () => {
    const table = new WorkerTable(1000);
    table.update(4, 30, ADDR);

    table.register(4, { host: '127.0.0.1', port: 50009 });

    expect(table.get(4)).toEqual({
      workerId: 4,
      localProgress: 30,
      address: { host: '127.0.0.1', port: 50009 },
      connected: true,
    });
  });

  it('sums progress over the loop size', () => {
    const table = new WorkerTable(1000);
    table.register(1, ADDR);
    table.register(2, ADDR);
    table.update(1, 250, ADDR);
    table.update(2, 250, ADDR);

    expect(table.sample(false)).toEqual({
      totalProgress: 0.5,
      reportedIterations: 500,
      connectedWorkers: 2,
    });
  });

  it('clamps the total at 1', () => {
    const table = new WorkerTable(1000);
    table.update(1, 800, ADDR);
    table.update(2, 400, ADDR);

    expect(table.sample(false).totalProgress).toBe(1);
    expect(table.sample(false).reportedIterations).toBe(1200);
  });

  it('estimates per-worker progress against an even share of connected workers', () => {
    const table = new WorkerTable(1000);
    for (const id of [3, 1, 2, 4]) table.register(id, ADDR);
    table.update(1, 125, ADDR);
    table.update(3, 250, ADDR);
    table.update(4, 400, ADDR);

    expect(table.sample(true).workers).toEqual([
      { workerId: 1, fraction: 0.5, connected: true },
      { workerId: 2, fraction: 0, connected: true },
      { workerId: 3, fraction: 1, connected: true },
      { workerId: 4, fraction: 1, connected: true },
    ]);
  });

  it('reports zero per-worker progress while nobody is connected', () => {
    const table = new WorkerTable(1000);
    table.update(2, 100, ADDR);

    expect(table.sample(true).workers).toEqual([
      { workerId: 2, fraction: 0, connected: false },
    ]);
  });

  it('omits worker entries unless asked', () => {
    const table = new WorkerTable(10);
    table.register(1, ADDR);
    expect(table.sample(false).workers).toBeUndefined();
  });

  it('lists entries by worker id and empties on clear', () => {
    const table = new WorkerTable(10);
    table.register(9, ADDR);
    table.register(2, ADDR);

    expect(table.entries().map((r) => r.workerId)).toEqual([2, 9]);
    table.clear();
    expect(table.size).toBe(0);
    expect(table.get(9)).toBeUndefined();
  });
});
