/**
 * Instrument names, units and histogram boundaries for the HTTP and store metrics
 */

export const METRIC_NAMES = {
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',
  TASKS_TOTAL: 'tasks_total',
} as const;

export const METRIC_UNITS = {
  REQUEST: '{request}',
  SECONDS: 's',
  TASK: '{task}',
} as const;

/** Explicit histogram bucket boundaries, in seconds */
export const HTTP_DURATION_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10] as const;
