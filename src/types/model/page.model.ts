export interface PageRequest {
  page?: number;
  pageSize?: number;
}

export interface Page<T> {
  count: number;
  page: number;
  pageSize: number;
  results: T[];
}
