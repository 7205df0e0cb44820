/** Successful HTTP API response. */
export interface ApiResponse<T> {
  data: T;
}

/** Error response of the HTTP API. */
export interface ApiError {
  error: {
    code: string;
    message: string;
    details?: Array<{ field: string; message: string }>;
  };
}

export type ApiResult<T> = ApiResponse<T> | ApiError;
