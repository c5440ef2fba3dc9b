/**
 * Outcome of a lookup. `value` is null exactly when the key is absent.
 */
export type GetResult =
  | { readonly found: true; readonly value: Buffer }
  | { readonly found: false; readonly value: null };
