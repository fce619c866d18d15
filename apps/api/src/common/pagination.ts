import type { Page, Pagination } from "@runfund/types";

export interface Range {
  offset: number;
  limit: number;
}

export const toRange = ({ page, limit }: Pagination): Range => ({
  offset: (page - 1) * limit,
  limit
});

export const toPage = <TItem>(items: TItem[], { page, limit }: Pagination): Page<TItem> => ({
  items,
  page,
  limit
});
