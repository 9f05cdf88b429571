const metrics = {
  allowed: 0,
  denied: 0,
  storeErrors: 0,
  fallbackDecisions: 0,
};

export type Metrics = typeof metrics;

export function recordAllowed() {
  metrics.allowed++;
}

export function recordDenied() {
  metrics.denied++;
}

export function recordStoreError() {
  metrics.storeErrors++;
}

export function recordFallbackDecision() {
  metrics.fallbackDecisions++;
}

export function getMetrics(): Metrics {
  return { ...metrics };
}

export function resetMetrics() {
  metrics.allowed = 0;
  metrics.denied = 0;
  metrics.storeErrors = 0;
  metrics.fallbackDecisions = 0;
}
