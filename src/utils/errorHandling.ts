import * as cons from "./console";

// results of operations that can fail without it being exceptional (malformed input files).
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err = {
  ok: false;
  error: string;
};
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

// internal invariants; a failure is a bug, logged before it is thrown.
export function assert(condition: boolean, message: string): asserts condition {
  if (!condition) {
    cons.error(`Assertion failed: ${message}`);
    throw new Error(message);
  }
}
