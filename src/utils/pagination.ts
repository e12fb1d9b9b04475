export const DEFAULT_PAGE_SIZE = 20
export const MAX_PAGE_SIZE = 100

export interface PageRequest {
  page?: number
  pageSize?: number
}

export interface Page<T> {
  items: T[]
  total: number
  page: number
  pageSize: number
}

export const normalizePage = (request: PageRequest): { page: number; pageSize: number; skip: number } => {
  const page = Math.max(Math.trunc(request.page ?? 1) || 1, 1)
  const pageSize = Math.min(Math.max(Math.trunc(request.pageSize ?? DEFAULT_PAGE_SIZE) || DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE)
  return { page, pageSize, skip: (page - 1) * pageSize }
}
