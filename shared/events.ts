export type EventMap = Record<string, unknown[]>;

export interface IEventEmitter<T extends EventMap> {
  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): () => void;
  once<K extends keyof T>(event: K, listener: (...args: T[K]) => void): () => void;
  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void): void;
  emit<K extends keyof T>(event: K, ...args: T[K]): void;
}

type ListenerTable<T extends EventMap> = {
  [K in keyof T]?: Set<(...args: T[K]) => void>;
};

export class TypedEventEmitter<T extends EventMap> implements IEventEmitter<T> {
  private readonly listeners: ListenerTable<T> = {};

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void): () => void {
    const set = this.listeners[event] ?? new Set<(...args: T[K]) => void>();
    set.add(listener);
    this.listeners[event] = set;
    return () => this.off(event, listener);
  }

  once<K extends keyof T>(event: K, listener: (...args: T[K]) => void): () => void {
    const wrapper = (...args: T[K]): void => {
      this.off(event, wrapper);
      listener(...args);
    };
    return this.on(event, wrapper);
  }

  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void): void {
    const set = this.listeners[event];
    if (set) {
      set.delete(listener);
      if (set.size === 0) delete this.listeners[event];
    }
  }

  emit<K extends keyof T>(event: K, ...args: T[K]): void {
    const set = this.listeners[event];
    if (set) {
      [...set].forEach(listener => listener(...args));
    }
  }
}
