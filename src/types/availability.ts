/** A late-bound dependency: either usable, or absent with the reason why. */
export type Availability<T> =
  | { readonly status: "ready"; readonly value: T }
  | { readonly status: "not_ready"; readonly reason: string };

export function ready<T>(value: T): Availability<T> {
  const state: Availability<T> = { status: "ready", value };
  return Object.freeze(state);
}

export function notReady<T>(reason: string): Availability<T> {
  const state: Availability<T> = { status: "not_ready", reason };
  return Object.freeze(state);
}
