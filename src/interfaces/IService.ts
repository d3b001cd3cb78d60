// Base service interface for dependency injection

export type LogMeta = Record<string, unknown>;

export interface IService {
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  isHealthy(): Promise<boolean>;
}

export interface ILogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export interface IConfigService<TConfig extends object> extends IService {
  get<K extends keyof TConfig>(key: K): TConfig[K];
  set<K extends keyof TConfig>(key: K, value: TConfig[K]): void;
  getConfig(): TConfig;
}

export interface IEventEmitter<TEvents extends object> {
  emit<E extends keyof TEvents & string>(event: E, data: TEvents[E]): void;
  on<E extends keyof TEvents & string>(event: E, handler: (data: TEvents[E]) => void): void;
  off<E extends keyof TEvents & string>(event: E, handler: (data: TEvents[E]) => void): void;
}
