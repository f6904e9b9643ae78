import once from 'call-once-fn';

export type DecodeCallback<T = Buffer> = (error: Error | null, result?: T) => void;

const schedule = typeof setImmediate === 'function' ? setImmediate : (fn: () => void) => process.nextTick(fn);

/**
 * Wrap a callback so only its first invocation is delivered.
 */
export function onceCallback<T>(callback: DecodeCallback<T>): DecodeCallback<T> {
  let error: Error | null = null;
  let result: T | undefined;
  const fire = once(() => callback(error, result));
  return (err, value) => {
    error = err;
    result = value;
    fire();
  };
}

/**
 * Normalize the async contract: callbacks fire once, Promises optional for callers.
 */
export function runDecode<T>(executor: (callback: DecodeCallback<T>) => void, callback?: DecodeCallback<T>): Promise<T> | void {
  if (typeof callback === 'function') return executor(onceCallback(callback));
  return new Promise<T>((resolve, reject) =>
    executor((err, value) => {
      if (err) return reject(err);
      if (value === undefined) return reject(new Error('Decoder returned no data'));
      resolve(value);
    })
  );
}

/**
 * Execute a synchronous decoder without blocking the current stack frame.
 */
export function runSync<T>(fn: () => T, callback: DecodeCallback<T>): void {
  schedule(() => {
    let value: T;
    try {
      value = fn();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    callback(null, value);
  });
}
