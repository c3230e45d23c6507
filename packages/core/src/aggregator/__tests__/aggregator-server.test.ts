import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AggregatorServer } from '../aggregator-server.js';
import type { AggregatorOptions } from '../aggregator-server.js';
import { WorkerReporter } from '../../reporter/worker-reporter.js';
import { MemoryHub } from '../../transport/__tests__/fixtures/memory-hub.js';
import type { ProgressFrame } from '../../sink/progress-sink.js';
import { ParloopError, PoolError, TransportError, ErrorCode } from '../../errors.js';

function recordingSink() {
  const frames: ProgressFrame[] = [];
  const finish = vi.fn();
  return {
    frames,
    finish,
    render(frame: ProgressFrame) {
      frames.push(frame);
    },
  };
}

async function openServer(overrides: Partial<AggregatorOptions> = {}, hub = new MemoryHub()) {
  const sink = recordingSink();
  const server = await AggregatorServer.open({
    totalIterations: 800,
    pool: { size: 4 },
    progressUpdatePeriod: 0.5,
    host: '127.0.0.1',
    sink,
    createEndpoint: hub.createEndpoint,
    ...overrides,
  });
  const connect = (workerId: number) =>
    WorkerReporter.connect(server.descriptor, workerId, {
      createSender: hub.createSender,
      flushOnClose: false,
    });
  return { hub, sink, server, connect };
}

describe('AggregatorServer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('open', () => {
    it('fails before opening an endpoint when there is no pool', async () => {
      const createEndpoint = vi.fn(new MemoryHub().createEndpoint);

      await expect(
        AggregatorServer.open({ totalIterations: 10, createEndpoint })
      ).rejects.toBeInstanceOf(PoolError);
      expect(createEndpoint).not.toHaveBeenCalled();
    });

    it.each([null, { size: 0 }, { size: 2.5 }])('rejects pool %j', async (pool) => {
      await expect(
        AggregatorServer.open({
          totalIterations: 10,
          pool,
          createEndpoint: new MemoryHub().createEndpoint,
        })
      ).rejects.toMatchObject({ code: ErrorCode.POOL_MISSING });
    });

    it('rejects a non-positive iteration count', async () => {
      await expect(openServer({ totalIterations: 0 })).rejects.toMatchObject({
        code: ErrorCode.INPUT_INVALID,
      });
    });

    it('rejects an update period of zero', async () => {
      await expect(openServer({ progressUpdatePeriod: 0 })).rejects.toBeInstanceOf(ParloopError);
    });

    it('rejects an update period longer than an hour', async () => {
      const createEndpoint = vi.fn(new MemoryHub().createEndpoint);

      await expect(
        openServer({ progressUpdatePeriod: 2_000_000, createEndpoint })
      ).rejects.toMatchObject({ code: ErrorCode.INPUT_INVALID });
      expect(createEndpoint).not.toHaveBeenCalled();
    });

    it('keeps the longest allowed period on schedule', async () => {
      const { server, sink } = await openServer({ progressUpdatePeriod: 3600 });

      vi.advanceTimersByTime(100);
      expect(sink.frames).toHaveLength(0);

      vi.advanceTimersByTime(7_200_000 - 100);
      expect(sink.frames).toHaveLength(1);
      await server.close();
    });

    it('surfaces a failed bind as a transport error', async () => {
      const hub = new MemoryHub();
      hub.failBind = true;

      try {
        await openServer({}, hub);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(TransportError);
        const transportErr = error as TransportError;
        expect(transportErr.code).toBe(ErrorCode.TRANSPORT_BIND_FAILED);
        expect(transportErr.message).toBe('bind EADDRINUSE');
      }
    });

    it('publishes the descriptor workers need', async () => {
      const { server } = await openServer();

      expect(server.descriptor).toEqual({
        host: '127.0.0.1',
        port: 40000,
        totalIterations: 800,
        workerCount: 4,
        stepSize: 1,
        samplingMode: 'per-worker',
      });
      expect(server.address).toEqual({ host: '127.0.0.1', port: 40000 });
      await server.close();
    });

    it('derives the step size from the per-worker share', async () => {
      const { server } = await openServer({ totalIterations: 1_000_000, pool: { size: 10 } });

      expect(server.stepSize).toBe(1000);
      expect(server.descriptor.stepSize).toBe(1000);
      await server.close();
    });

    it('derives the step size from the whole loop in global mode', async () => {
      const { server } = await openServer({
        totalIterations: 1_000_000,
        pool: { size: 10 },
        samplingMode: 'global',
      });

      expect(server.stepSize).toBe(10_000);
      expect(server.descriptor).toMatchObject({ stepSize: 10_000, samplingMode: 'global' });
      await server.close();
    });
  });

  describe('message handling', () => {
    it('adds global-mode reports to the sending worker', async () => {
      const { server, hub } = await openServer({ totalIterations: 1000, samplingMode: 'global' });
      const remote = { host: '127.0.0.1', port: 50001 };

      hub.inject(server.address, new Uint8Array([0, 0, 0, 1, 0, 0, 0, 10]), remote);
      hub.inject(server.address, new Uint8Array([0, 0, 0, 1, 0, 0, 0, 10]), remote);

      expect(server.stepSize).toBe(10);
      expect(server.worker(1)?.localProgress).toBe(20);
      expect(server.sampleAggregate().totalProgress).toBe(0.02);
      await server.close();
    });

    it('marks a registering worker connected without moving the total', async () => {
      const { server, connect } = await openServer();

      connect(1);

      expect(server.worker(1)).toEqual({
        workerId: 1,
        localProgress: 0,
        address: { host: '127.0.0.1', port: 50000 },
        connected: true,
      });
      expect(server.sampleAggregate().totalProgress).toBe(0);
      expect(server.stats()).toEqual({ datagrams: 1, registrations: 1, updates: 0, malformed: 0 });
      await server.close();
    });

    it('discards malformed datagrams and keeps running', async () => {
      const { hub, server } = await openServer();

      hub.inject(server.address, new Uint8Array(5), { host: '10.0.0.9', port: 9 });

      expect(server.stats()).toEqual({ datagrams: 1, registrations: 0, updates: 0, malformed: 1 });
      expect(server.workers()).toEqual([]);
      await server.close();
    });

    it('keeps the highest value under duplicates and reordering', async () => {
      const hub = new MemoryHub({ autoDeliver: false });
      const { server, connect } = await openServer({}, hub);
      const reporter = connect(1);
      reporter.increment();
      reporter.increment();
      reporter.increment();

      // registration, then updates 3, 1, 2, 1
      hub.flush([0, 3, 1, 2, 1]);

      expect(server.worker(1)?.localProgress).toBe(3);
      expect(server.stats().updates).toBe(4);
      await server.close();
    });

    it('takes the last arrival with the overwrite policy', async () => {
      const hub = new MemoryHub({ autoDeliver: false });
      const { server, connect } = await openServer({ updatePolicy: 'overwrite' }, hub);
      const reporter = connect(1);
      reporter.increment();
      reporter.increment();
      reporter.increment();

      hub.flush([0, 3, 1, 2]);

      expect(server.updatePolicy).toBe('overwrite');
      expect(server.worker(1)?.localProgress).toBe(2);
      await server.close();
    });
  });

  describe('render timer', () => {
    it('renders first after two periods, then once per period', async () => {
      const { sink, server } = await openServer();

      vi.advanceTimersByTime(999);
      expect(sink.frames).toHaveLength(0);

      vi.advanceTimersByTime(1);
      expect(sink.frames).toEqual([{ title: '', total: 0 }]);

      vi.advanceTimersByTime(500);
      expect(sink.frames).toHaveLength(2);
      await server.close();
    });

    it('renders at the period regardless of datagram volume', async () => {
      const { sink, server, connect } = await openServer({ title: 'Crunching' });
      const reporter = connect(1);

      for (let i = 0; i < 200; i++) reporter.increment();
      vi.advanceTimersByTime(1000);

      expect(sink.frames).toEqual([{ title: 'Crunching', total: 0.25 }]);
      await server.close();
    });

    it('stops itself in simple mode once everything is reported', async () => {
      const { sink, server, connect } = await openServer();
      for (const id of [1, 2, 3, 4]) {
        const reporter = connect(id);
        for (let i = 0; i < 200; i++) reporter.increment();
      }

      vi.advanceTimersByTime(1000);
      expect(sink.frames).toEqual([{ title: '', total: 1 }]);
      expect(server.timerActive).toBe(false);

      vi.advanceTimersByTime(5000);
      expect(sink.frames).toHaveLength(1);
      await server.close();
    });

    it('draws one bar per worker in per-worker mode and keeps ticking', async () => {
      const { sink, server, connect } = await openServer({
        totalIterations: 100,
        pool: { size: 2 },
        showWorkerProgress: true,
      });
      const first = connect(1);
      connect(2);
      for (let i = 0; i < 25; i++) first.increment();

      vi.advanceTimersByTime(1000);

      expect(sink.frames).toEqual([
        {
          title: 'Total progress',
          total: 0.25,
          workers: [
            { label: 'Worker 1', fraction: 0.5 },
            { label: 'Worker 2', fraction: 0 },
          ],
        },
      ]);
      for (let i = 0; i < 75; i++) first.increment();
      vi.advanceTimersByTime(500);
      expect(sink.frames[1]?.total).toBe(1);
      expect(server.timerActive).toBe(true);
      await server.close();
    });

    it('keeps the timer alive when the sink throws', async () => {
      const hub = new MemoryHub();
      const render = vi.fn(() => {
        throw new Error('terminal detached');
      });
      const server = await AggregatorServer.open({
        totalIterations: 10,
        pool: { size: 1 },
        progressUpdatePeriod: 0.5,
        sink: { render },
        createEndpoint: hub.createEndpoint,
      });

      vi.advanceTimersByTime(1500);

      expect(render).toHaveBeenCalledTimes(2);
      expect(server.timerActive).toBe(true);
      await server.close();
    });
  });

  describe('close', () => {
    it('stops the timer and draws a completed frame', async () => {
      const { sink, server, connect } = await openServer();
      const reporter = connect(1);
      for (let i = 0; i < 10; i++) reporter.increment();

      await server.close();

      expect(server.timerActive).toBe(false);
      expect(sink.frames).toEqual([{ title: '', total: 1 }]);
      expect(sink.finish).toHaveBeenCalledTimes(1);
      vi.advanceTimersByTime(10_000);
      expect(sink.frames).toHaveLength(1);
    });

    it('completes every worker bar in per-worker mode', async () => {
      const { sink, server } = await openServer({
        pool: { size: 2 },
        showWorkerProgress: true,
        title: 'Batch',
      });

      await server.close();

      expect(sink.frames).toEqual([
        {
          title: 'Batch',
          total: 1,
          workers: [
            { label: 'Worker 1', fraction: 1 },
            { label: 'Worker 2', fraction: 1 },
          ],
        },
      ]);
    });

    it('is safe to call twice in succession', async () => {
      const { sink, server } = await openServer();

      await expect(Promise.all([server.close(), server.close()])).resolves.toEqual([
        undefined,
        undefined,
      ]);
      await expect(server.close()).resolves.toBeUndefined();

      expect(sink.frames).toHaveLength(1);
      expect(sink.finish).toHaveBeenCalledTimes(1);
      expect(server.closed).toBe(true);
    });

    it('ignores datagrams that arrive after close', async () => {
      const { hub, server } = await openServer();
      await server.close();

      server.handleDatagram(new Uint8Array([0, 0, 0, 1, 0, 0, 0, 0]), {
        host: '127.0.0.1',
        port: 50000,
      });
      hub.inject(server.address, new Uint8Array(8), { host: '127.0.0.1', port: 50001 });

      expect(server.stats().datagrams).toBe(0);
      expect(server.workers()).toEqual([]);
    });
  });
});
