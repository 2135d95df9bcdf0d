/**
 * @fileoverview Worker/primary round trips over an in-process channel
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { RemoteBackend, serveBridge, type BridgePort } from '../ipc-bridge.js';
import { localBackend } from '../router.js';

/**
 * Two connected ports. Delivery is deferred a microtask, as IPC never
 * delivers synchronously.
 */
function channel(): [BridgePort, BridgePort] {
  const left = new EventEmitter();
  const right = new EventEmitter();
  const port = (self: EventEmitter, peer: EventEmitter): BridgePort => ({
    send: (message) => {
      queueMicrotask(() => peer.emit('message', message));
      return true;
    },
    on: (event, listener) => self.on(event, listener),
  });
  return [port(left, right), port(right, left)];
}

afterEach(() => {
  vi.useRealTimers();
});

describe('RemoteBackend with serveBridge', () => {
  it('relays health, metrics and webhooks to the primary', async () => {
    const [workerSide, primarySide] = channel();
    const webhook = vi.fn(async (_body: unknown) => undefined);
    serveBridge(primarySide, localBackend({ health: () => ({ status: 'healthy' }), metrics: () => ({ uptime: 5 }), webhook }));
    const remote = new RemoteBackend(workerSide);

    await expect(remote.health()).resolves.toEqual({ status: 'healthy' });
    await expect(remote.metrics()).resolves.toEqual({ uptime: 5 });
    await expect(remote.webhook({ type: 'config_update' })).resolves.toBeUndefined();

    expect(webhook).toHaveBeenCalledWith({ type: 'config_update' });
    expect(remote.inFlight).toBe(0);
  });

  it('turns a missing component into null', async () => {
    const [workerSide, primarySide] = channel();
    serveBridge(primarySide, localBackend({}));
    const remote = new RemoteBackend(workerSide);

    await expect(remote.health()).resolves.toBeNull();
  });

  it('rejects when the primary fails', async () => {
    const [workerSide, primarySide] = channel();
    serveBridge(
      primarySide,
      localBackend({
        webhook: async () => {
          throw new Error('engine offline');
        },
      })
    );
    const remote = new RemoteBackend(workerSide);

    await expect(remote.webhook({})).rejects.toThrow('engine offline');
  });

  it('times out when nobody answers', async () => {
    vi.useFakeTimers();
    const [workerSide] = channel();
    const remote = new RemoteBackend(workerSide, 500);

    const pending = remote.metrics();
    const assertion = expect(pending).rejects.toMatchObject({ code: 'TIMEOUT', retryable: true });
    expect(remote.inFlight).toBe(1);

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
    expect(remote.inFlight).toBe(0);
  });

  it('ignores messages that are not bridge replies', async () => {
    const [workerSide, primarySide] = channel();
    const remote = new RemoteBackend(workerSide);
    serveBridge(primarySide, localBackend({ metrics: () => 1 }));

    primarySide.send({ bridge: 'candle-sentinel', id: 999, ok: true, result: 'late' });
    await expect(remote.metrics()).resolves.toBe(1);
  });
});
