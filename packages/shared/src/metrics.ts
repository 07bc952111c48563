/**
 * Prometheus Metrics
 *
 * Metrics for document parsing and record extraction.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Add the default process metrics (CPU, memory, etc.) to the registry.
 * Wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const documentsParsedCounter = new promClient.Counter({
  name: 'payroll_documents_parsed_total',
  help: 'Total number of payroll documents parsed',
  labelNames: ['status'],
  registers: [register],
});

export const employeesExtractedCounter = new promClient.Counter({
  name: 'payroll_employees_extracted_total',
  help: 'Total number of employee records extracted',
  registers: [register],
});

export const pagesSkippedCounter = new promClient.Counter({
  name: 'payroll_pages_skipped_total',
  help: 'Pages that produced no employee record',
  labelNames: ['reason'],
  registers: [register],
});

export const parseDurationHistogram = new promClient.Histogram({
  name: 'payroll_parse_duration_seconds',
  help: 'Duration of record extraction for one document',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const pdfTextDurationHistogram = new promClient.Histogram({
  name: 'payroll_pdf_text_duration_seconds',
  help: 'Duration of PDF text extraction',
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [register],
});

/**
 * Get Prometheus metrics text
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}
