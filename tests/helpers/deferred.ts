type Settlement<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let settle: ((settlement: Settlement<T>) => void) | undefined;
  const promise = new Promise<T>((resolve, reject) => {
    settle = (settlement) => (settlement.ok ? resolve(settlement.value) : reject(settlement.error));
  });
  return {
    promise,
    resolve: (value) => settle?.({ ok: true, value }),
    reject: (error) => settle?.({ ok: false, error }),
  };
}
