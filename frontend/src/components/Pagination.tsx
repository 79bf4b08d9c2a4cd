import type { ListParams } from "../../../shared/types";
import { listHref } from "../links";

interface Props {
  params: ListParams;
  page: number;
  totalPages: number;
}

export function Pagination({ params, page, totalPages }: Props) {
  if (totalPages <= 1 && page <= 1) return null;

  return (
    <nav className="flex items-center justify-between mt-6 text-sm" aria-label="Pagination">
      {page > 1 ? (
        <a href={listHref(params, Math.min(page - 1, Math.max(totalPages, 1)))} className="text-blue-600">
          Previous
        </a>
      ) : (
        <span />
      )}
      <span className="text-gray-500">
        Page {page} of {Math.max(totalPages, 1)}
      </span>
      {page < totalPages ? (
        <a href={listHref(params, page + 1)} className="text-blue-600">
          Next
        </a>
      ) : (
        <span />
      )}
    </nav>
  );
}
