export interface QueryTiming {
  /** epoch ms when the query started */
  at: number;
  tookMs: number;
}

/** Bounded log of the most recent query timings, oldest first. */
export class QueryLog {
  private readonly entries: QueryTiming[] = [];

  constructor(private readonly capacity: number) {}

  record(timing: QueryTiming): void {
    if (this.capacity <= 0) return;
    this.entries.push(timing);
    if (this.entries.length > this.capacity) this.entries.shift();
  }

  recent(): QueryTiming[] {
    return this.entries.slice();
  }

  clear(): void {
    this.entries.length = 0;
  }
}
