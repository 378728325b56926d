import { InvalidConfigurationError } from "../errors.js";
import type { Label, MenuPage } from "../types.js";

export function assertPageSize(pageSize: number): void {
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new InvalidConfigurationError(`Label page size must be a positive integer (got ${String(pageSize)})`);
  }
}

/** Splits labels into consecutive pages of `pageSize`; only the last page may be short. */
export function paginate(labels: readonly Label[], pageSize: number): MenuPage[] {
  assertPageSize(pageSize);
  const pages: MenuPage[] = [];
  for (let i = 0; i < labels.length; i += pageSize) {
    pages.push({ index: pages.length, pageSize, labels: labels.slice(i, i + pageSize) });
  }
  return pages;
}
