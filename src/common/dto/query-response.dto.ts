export class QueryResponse<T> {
  offset: number;
  total: number;
  results: T[];

  constructor(offset: number, total: number, results: T[]) {
    this.offset = offset;
    this.total = total;
    this.results = results;
  }
}
