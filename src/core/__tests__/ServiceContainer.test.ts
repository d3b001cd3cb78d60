import { describe, expect, it, vi } from 'vitest';
import type { IService } from '../../interfaces/IService';
import { EventEmitter } from '../EventEmitter';
import { ServiceContainer } from '../ServiceContainer';

function fakeService(calls: string[], name: string, healthy = true): IService {
  return {
    initialize: vi.fn(async () => {
      calls.push(`init:${name}`);
    }),
    shutdown: vi.fn(async () => {
      calls.push(`shutdown:${name}`);
    }),
    isHealthy: vi.fn(async () => healthy)
  };
}

interface Services {
  first: IService;
  second: IService;
  settings: { units: string };
}

describe('ServiceContainer', () => {
  it('initializes in registration order and shuts down in reverse', async () => {
    const calls: string[] = [];
    const container = new ServiceContainer<Services>();
    container.registerSingleton('first', fakeService(calls, 'first'));
    container.registerSingleton('settings', { units: 'nm' });
    container.registerSingleton('second', fakeService(calls, 'second'));

    await container.initializeAll();
    await container.shutdownAll();

    expect(calls).toEqual(['init:first', 'init:second', 'shutdown:second', 'shutdown:first']);
    expect(container.listSingletons()).toEqual(['first', 'settings', 'second']);
  });

  it('reports health per service', async () => {
    const container = new ServiceContainer<Services>();
    container.registerSingleton('first', fakeService([], 'first'));
    container.registerSingleton('second', fakeService([], 'second', false));

    expect(await container.checkHealth()).toEqual({ first: true, second: false });
  });

  it('rethrows an initialization failure', async () => {
    const container = new ServiceContainer<Services>();
    const failing = fakeService([], 'first');
    failing.initialize = vi.fn(async () => {
      throw new Error('boom');
    });
    container.registerSingleton('first', failing);

    await expect(container.initializeAll()).rejects.toThrow('boom');
  });

  it('throws for an unregistered service', () => {
    const container = new ServiceContainer<Services>();
    expect(container.has('settings')).toBe(false);
    expect(() => container.get('settings')).toThrow("Service 'settings' not found. Make sure it's registered.");
  });
});

describe('EventEmitter', () => {
  interface Events {
    ping: { count: number };
  }

  it('delivers to registered handlers until removed', () => {
    const emitter = new EventEmitter<Events>();
    const handler = vi.fn();

    emitter.on('ping', handler);
    emitter.emit('ping', { count: 1 });
    emitter.off('ping', handler);
    emitter.emit('ping', { count: 2 });

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith({ count: 1 });
    expect(emitter.listenerCount('ping')).toBe(0);
  });

  it('logs a throwing handler instead of propagating', () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const emitter = new EventEmitter<Events>(logger);
    const failure = new Error('handler failed');
    emitter.once('ping', () => {
      throw failure;
    });

    expect(() => emitter.emit('ping', { count: 1 })).not.toThrow();
    expect(logger.error).toHaveBeenCalledWith('Error emitting event: ping', failure);
  });
});
