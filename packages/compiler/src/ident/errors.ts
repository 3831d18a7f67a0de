export class IdentCapacityError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`identifier store is full: at most ${limit} occurrences per store`);
    this.name = "IdentCapacityError";
    this.limit = limit;
  }
}
