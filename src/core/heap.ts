/** Array.sort semantics: <0 means a before b. */
export type Comparator<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /** Returns the first K items under `comparator`, already sorted. */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
