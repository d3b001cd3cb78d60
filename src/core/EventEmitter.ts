import { EventEmitter as NodeEventEmitter } from 'events';
import type { IEventEmitter, ILogger } from '../interfaces/IService';

type Handler<T> = (data: T) => void;

export class EventEmitter<TEvents extends object> implements IEventEmitter<TEvents> {
  private emitter: NodeEventEmitter;
  private logger?: ILogger;

  constructor(logger?: ILogger) {
    this.emitter = new NodeEventEmitter();
    this.logger = logger;

    // Several planning sessions may subscribe at once
    this.emitter.setMaxListeners(100);
  }

  // A throwing handler is logged and does not abort the emitting computation
  emit<E extends keyof TEvents & string>(event: E, data: TEvents[E]): void {
    try {
      this.logger?.debug(`Emitting event: ${event}`);
      this.emitter.emit(event, data);
    } catch (error) {
      this.logger?.error(`Error emitting event: ${event}`, error);
    }
  }

  on<E extends keyof TEvents & string>(event: E, handler: Handler<TEvents[E]>): void {
    this.logger?.debug(`Registering handler for event: ${event}`);
    this.emitter.on(event, handler);
  }

  off<E extends keyof TEvents & string>(event: E, handler: Handler<TEvents[E]>): void {
    this.logger?.debug(`Removing handler for event: ${event}`);
    this.emitter.off(event, handler);
  }

  once<E extends keyof TEvents & string>(event: E, handler: Handler<TEvents[E]>): void {
    this.emitter.once(event, handler);
  }

  removeAllListeners(event?: keyof TEvents & string): void {
    this.emitter.removeAllListeners(event);
  }

  listenerCount(event: keyof TEvents & string): number {
    return this.emitter.listenerCount(event);
  }
}
