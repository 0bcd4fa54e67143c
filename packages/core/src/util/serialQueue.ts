export interface SerialQueue {
  run<T>(task: () => Promise<T>): Promise<T>;
  /** Resolves once every task queued so far has settled. */
  idle(): Promise<void>;
}

export const createSerialQueue = (): SerialQueue => {
  let tail: Promise<unknown> = Promise.resolve();

  const run = <T>(task: () => Promise<T>) => {
    const next = tail.then(task, task);
    tail = next.catch(() => undefined);
    return next;
  };

  const idle = async () => {
    let observed: Promise<unknown>;
    do {
      observed = tail;
      await observed;
    } while (observed !== tail);
  };

  return { run, idle };
};

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
