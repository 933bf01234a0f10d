/**
 * API response shapes
 */

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

export interface ListResponse<T> {
  count: number;
  data: T[];
}

export function listResponse<T>(data: T[]): ListResponse<T> {
  return { count: data.length, data };
}
