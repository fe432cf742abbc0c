import promClient from "prom-client";

// Initialize Prometheus default metrics (CPU, memory, etc.)
// Guard against multiple registrations (e.g., in test environments)
if (!promClient.register.getSingleMetric("purger_process_cpu_user_seconds_total")) {
  promClient.collectDefaultMetrics({
    prefix: "purger_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

export const register = promClient.register;

// ============================================
// Invalidation Request Metrics
// ============================================

/**
 * Counter: Requests accepted
 * Labels: provider, scope (paths/all)
 */
export const requestsSubmittedTotal = new promClient.Counter({
  name: "invalidation_requests_submitted_total",
  help: "Total invalidation requests accepted",
  labelNames: ["provider", "scope"],
});

/**
 * Counter: Requests reaching a terminal status
 * Labels: provider, status (succeeded/partial_failure/failed)
 */
export const requestsCompletedTotal = new promClient.Counter({
  name: "invalidation_requests_completed_total",
  help: "Total invalidation requests completed, by final status",
  labelNames: ["provider", "status"],
});

/**
 * Histogram: Time from dispatch start to terminal status
 */
export const requestDispatchDuration = new promClient.Histogram({
  name: "invalidation_request_dispatch_duration_seconds",
  help: "Duration of request dispatch (all batches)",
  labelNames: ["provider"],
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 300],
});

/**
 * Counter: Requests rejected by path validation
 */
export const validationRejectionsTotal = new promClient.Counter({
  name: "invalidation_validation_rejections_total",
  help: "Total invalidation requests rejected by path validation",
});

/**
 * Gauge: Requests currently dispatching
 */
export const requestsInProgress = new promClient.Gauge({
  name: "invalidation_requests_in_progress",
  help: "Number of invalidation requests currently dispatching",
});

// ============================================
// Batch / Provider Metrics
// ============================================

/**
 * Counter: Batch final outcomes
 * Labels: provider, status (succeeded/failed/submitted), error_kind ("" on success)
 */
export const batchesTotal = new promClient.Counter({
  name: "invalidation_batches_total",
  help: "Total batches by final outcome",
  labelNames: ["provider", "status", "error_kind"],
});

/**
 * Counter: Retries scheduled
 * Labels: provider, error_kind (rate_limit/transient_network)
 */
export const batchRetriesTotal = new promClient.Counter({
  name: "invalidation_batch_retries_total",
  help: "Total batch retries scheduled",
  labelNames: ["provider", "error_kind"],
});

/**
 * Counter: Batches skipped because the idempotency store already had them
 */
export const batchDuplicatesTotal = new promClient.Counter({
  name: "invalidation_batch_duplicates_total",
  help: "Total batches skipped as already submitted",
  labelNames: ["provider"],
});

/**
 * Histogram: One batch, all attempts included
 */
export const batchSubmitDuration = new promClient.Histogram({
  name: "invalidation_batch_submit_duration_seconds",
  help: "Duration of batch submission including retries",
  labelNames: ["provider", "status"],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
});

// ============================================
// HTTP API Metrics
// ============================================

export const httpRequestDuration = new promClient.Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration",
  labelNames: ["method", "route", "status_code"],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
});

export const httpRequestsTotal = new promClient.Counter({
  name: "http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status_code"],
});
