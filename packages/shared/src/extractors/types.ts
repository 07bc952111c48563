/**
 * Document Extractor Types
 */

import type { DocumentInfo, PageText, PayrollParseResult } from '../types';
import type { PageReport } from './certified-payroll/parser';

/**
 * Result returned by an extractor
 */
export interface ExtractorResult {
  /** Job info and employee records */
  result: PayrollParseResult;
  /** Warnings generated during extraction */
  warnings: string[];
  /** What happened to each page */
  pages: PageReport[];
  /** Metadata about the extraction */
  metadata: ExtractorMetadata;
}

/**
 * Metadata about an extraction operation
 */
export interface ExtractorMetadata {
  /** Algorithm version */
  algorithmVersion: string;
  /** Duration of extraction in milliseconds */
  durationMs: number;
}

/**
 * Interface for document extractors.
 */
export interface DocumentExtractor {
  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract records from document pages.
   *
   * @param pages - Extracted text by page
   * @param docInfo - Document metadata, used for logging
   */
  extract(pages: PageText[], docInfo: DocumentInfo): ExtractorResult;
}

export type { DocumentInfo, PageText };
