import type { IService, ILogger } from '../interfaces/IService';

function isService(instance: unknown): instance is IService {
  return (
    typeof instance === 'object' &&
    instance !== null &&
    'initialize' in instance &&
    typeof instance.initialize === 'function' &&
    'shutdown' in instance &&
    typeof instance.shutdown === 'function' &&
    'isHealthy' in instance &&
    typeof instance.isHealthy === 'function'
  );
}

/**
 * Registry of singleton services keyed by name. Instances implementing
 * {@link IService} take part in initialize / shutdown / health sweeps, in
 * registration order.
 */
export class ServiceContainer<TServices extends object> {
  private singletons: Partial<TServices> = {};
  private order: Array<keyof TServices & string> = [];
  private logger?: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger;
  }

  registerSingleton<K extends keyof TServices & string>(name: K, instance: TServices[K]): void {
    if (!(name in this.singletons)) {
      this.order.push(name);
    }
    this.singletons[name] = instance;
    this.logger?.debug(`Registered singleton: ${name}`);
  }

  get<K extends keyof TServices & string>(name: K): TServices[K] {
    const instance: TServices[K] | undefined = this.singletons[name];
    if (instance === undefined) {
      throw new Error(`Service '${name}' not found. Make sure it's registered.`);
    }
    return instance;
  }

  has(name: keyof TServices & string): boolean {
    return name in this.singletons;
  }

  async initializeAll(): Promise<void> {
    this.logger?.info('Initializing all services...');

    let initialized = 0;
    // Sequential: later services read state prepared by earlier ones
    for (const [name, instance] of this.entries()) {
      if (!isService(instance)) continue;
      try {
        await instance.initialize();
        initialized++;
      } catch (error) {
        this.logger?.error(`Failed to initialize singleton ${name}`, error);
        throw error;
      }
    }

    this.logger?.info(`Initialized ${initialized} services`);
  }

  async shutdownAll(): Promise<void> {
    this.logger?.info('Shutting down all services...');

    const shutdownPromises: Promise<void>[] = [];
    for (const [name, instance] of this.entries().reverse()) {
      if (!isService(instance)) continue;
      shutdownPromises.push(
        instance.shutdown().catch((error: unknown) => {
          this.logger?.error(`Failed to shutdown singleton ${name}`, error);
        })
      );
    }

    await Promise.all(shutdownPromises);
    this.logger?.info('All services shut down');
  }

  async checkHealth(): Promise<Record<string, boolean>> {
    const healthStatus: Record<string, boolean> = {};

    for (const [name, instance] of this.entries()) {
      if (!isService(instance)) continue;
      try {
        healthStatus[name] = await instance.isHealthy();
      } catch (error) {
        this.logger?.error(`Health check failed for ${name}`, error);
        healthStatus[name] = false;
      }
    }

    return healthStatus;
  }

  listSingletons(): string[] {
    return [...this.order];
  }

  private entries(): Array<[string, unknown]> {
    return this.order.map(name => [name, this.singletons[name]]);
  }
}
