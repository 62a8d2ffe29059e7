export type SerialQueue = {
  run<T>(task: () => Promise<T> | T): Promise<T>;
  idle(): Promise<void>;
};

/**
 * Runs tasks one at a time in submission order. A failed task is logged and
 * rejects its own caller; later tasks still run.
 */
export function createSerialQueue(label: string): SerialQueue {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(task: () => Promise<T> | T): Promise<T> {
      const result = tail.then(() => task());
      tail = result.then(
        () => undefined,
        (error: unknown) => {
          console.error(`${label} task failed`, error);
        }
      );
      return result;
    },
    idle() {
      return tail;
    }
  };
}
