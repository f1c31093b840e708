import { FunctionTaskGateway, type OperationHandler } from "../src/gateway/function-gateway.js";

export type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** In-process gateway; operations without a handler succeed with `{}`. */
export function gatewayWith(handlers: Record<string, OperationHandler> = {}): FunctionTaskGateway {
  return new FunctionTaskGateway({ handlers, fallback: async () => ({}) });
}

/** Run `fn` and return what it threw. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
