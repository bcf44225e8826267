export interface Pagination {
  total: number;
  page: number;
  pageSize: number;
  hasMore: boolean;
}

export function toPagination(total: number, page: number, pageSize: number): Pagination {
  return {
    total,
    page,
    pageSize,
    hasMore: page * pageSize < total,
  };
}
