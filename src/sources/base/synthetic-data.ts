/**
 * Marks a payload as synthetic. A source hook returns this instead of the bare
 * payload when it had to invent data, and the manager tags the result `mock`.
 */
export class SyntheticData<T> {
  constructor(readonly payload: T) {}
}

export function isSyntheticData<T>(value: T | SyntheticData<T>): value is SyntheticData<T> {
  return value instanceof SyntheticData;
}
