import { ConformanceSetupError } from "./conformance_error.ts";

/** Buffers the harness can hand out fresh views of. */
export interface ViewableBuffer<TSelf> {
  duplicate(): TSelf;
  asReadOnlyBuffer(): TSelf;
  isReadOnly(): boolean;
  hasArray(): boolean;
}

/**
 * A fresh view of `input` with its own cursor: a duplicate, or a read-only
 * view when `readOnly` is set. The case's own buffer is never moved.
 */
export function prepareInput<B extends ViewableBuffer<B>>(
  input: B,
  readOnly: boolean,
): B {
  const view = readOnly ? input.asReadOnlyBuffer() : input.duplicate();
  if (view.isReadOnly() !== readOnly || view.hasArray() === readOnly) {
    throw new ConformanceSetupError(readOnly);
  }
  return view;
}
