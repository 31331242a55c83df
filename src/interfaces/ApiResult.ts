export interface ApiResult<T = undefined> {
  success: boolean;
  error?: string;
  data?: T;
  retryAfter?: number; // Seconds from the Retry-After header, when the service sent one
}
