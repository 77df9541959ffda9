import { Counted, Slice } from "../repositories/types";
import { Page, PageRequest } from "../types/model/page.model";
import { PAGINATION } from "./constants";

export const toSlice = (
  request: PageRequest,
  defaultSize: number = PAGINATION.DEFAULT_PAGE_SIZE
): { page: number; pageSize: number; slice: Slice } => {
  const page = Math.max(1, Math.floor(request.page ?? 1));
  const pageSize = Math.min(
    PAGINATION.MAX_PAGE_SIZE,
    Math.max(1, Math.floor(request.pageSize ?? defaultSize))
  );
  return { page, pageSize, slice: { skip: (page - 1) * pageSize, limit: pageSize } };
};

export const toPage = <T, R = T>(
  counted: Counted<T>,
  page: number,
  pageSize: number,
  map: (item: T) => R
): Page<R> => ({
  count: counted.count,
  page,
  pageSize,
  results: counted.results.map(map),
});
