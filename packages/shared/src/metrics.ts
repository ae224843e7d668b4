/**
 * Prometheus Metrics
 *
 * Per-run counters for provider requests and processed documents. The CLI can
 * dump them in text exposition format for a node_exporter textfile collector.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'invoice_digest_llm_requests_total',
  help: 'Total number of extraction requests sent to the LLM provider',
  labelNames: ['provider', 'model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'invoice_digest_llm_request_duration_seconds',
  help: 'Duration of LLM extraction requests',
  labelNames: ['provider', 'model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'invoice_digest_documents_processed_total',
  help: 'Total number of documents processed by the digester',
  labelNames: ['mode', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'invoice_digest_extraction_duration_seconds',
  help: 'Duration of a document from load to written output',
  labelNames: ['mode'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

/**
 * Get metrics in Prometheus text format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Clear every recorded value (keeps the metric definitions)
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
