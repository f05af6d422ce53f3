import { Observable } from 'rxjs';

/**
 * Pulls an observable as an async iterable. Values that arrive between pulls
 * are buffered; an error surfaces from the pending `next()`.
 */
export function toAsyncIterable<T>(source: Observable<T>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator](): AsyncIterator<T> {
      const buffer: T[] = [];
      const waiting: Array<{
        resolve: (result: IteratorResult<T>) => void;
        reject: (error: unknown) => void;
      }> = [];
      let finished = false;
      let failure: { error: unknown } | null = null;

      const subscription = source.subscribe({
        next: (value) => {
          const waiter = waiting.shift();
          if (waiter) {
            waiter.resolve({ value, done: false });
          } else {
            buffer.push(value);
          }
        },
        error: (error: unknown) => {
          failure = { error };
          for (const waiter of waiting.splice(0)) {
            waiter.reject(error);
          }
        },
        complete: () => {
          finished = true;
          for (const waiter of waiting.splice(0)) {
            waiter.resolve({ value: undefined, done: true });
          }
        },
      });

      return {
        next: () => {
          if (buffer.length > 0) {
            const [value] = buffer.splice(0, 1);
            return Promise.resolve({ value, done: false });
          }
          if (failure) {
            return Promise.reject(failure.error);
          }
          if (finished) {
            return Promise.resolve({ value: undefined, done: true });
          }
          return new Promise((resolve, reject) => {
            waiting.push({ resolve, reject });
          });
        },
        return: () => {
          subscription.unsubscribe();
          finished = true;
          return Promise.resolve({ value: undefined, done: true });
        },
      };
    },
  };
}
