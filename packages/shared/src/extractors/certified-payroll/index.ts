/**
 * Certified Payroll Extractor
 *
 * Algorithmic extraction for certified payroll registers. Wraps the pure
 * parser with logging and metrics; the logger and job-info patterns are fixed
 * at construction and nothing about a document outlives its `extract` call,
 * so one instance can serve any number of documents.
 */

import type { DocumentExtractor, ExtractorResult } from '../types';
import type { DocumentInfo, PageText } from '../../types';
import { logger as defaultLogger, type Logger } from '../../logger';
import { config } from '../../config';
import {
  documentsParsedCounter,
  employeesExtractedCounter,
  pagesSkippedCounter,
  parseDurationHistogram,
} from '../../metrics';
import { analyzePayrollDocument, ALGORITHM_VERSION } from './parser';
import { buildJobInfoPatterns, type JobInfoPatterns } from './patterns';

export interface CertifiedPayrollExtractorOptions {
  logger?: Logger;
  /** Defaults to the built-in patterns plus any configured address literals */
  jobInfoPatterns?: JobInfoPatterns;
}

export class CertifiedPayrollExtractor implements DocumentExtractor {
  readonly description = 'Certified payroll register - algorithmic extraction';

  private readonly logger: Logger;
  private readonly jobInfoPatterns: JobInfoPatterns;

  constructor(options: CertifiedPayrollExtractorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.jobInfoPatterns = options.jobInfoPatterns ?? buildJobInfoPatterns(config);
  }

  extract(pages: PageText[], docInfo: DocumentInfo): ExtractorResult {
    const startTime = Date.now();

    this.logger.info('Starting payroll extraction', {
      document_id: docInfo.document_id,
      page_count: pages.length,
      algorithm_version: ALGORITHM_VERSION,
    });

    try {
      const analysis = analyzePayrollDocument(pages, { jobInfoPatterns: this.jobInfoPatterns });
      const durationMs = Date.now() - startTime;

      for (const page of analysis.pages) {
        if (page.outcome === 'extracted') continue;
        pagesSkippedCounter.inc({ reason: page.outcome });
        this.logger.debug('Page produced no employee record', {
          document_id: docInfo.document_id,
          page_number: page.pageNumber,
          reason: page.outcome,
        });
      }

      const employeeCount = analysis.result.employees.length;
      employeesExtractedCounter.inc(employeeCount);
      documentsParsedCounter.inc({ status: employeeCount > 0 ? 'extracted' : 'empty' });
      parseDurationHistogram.observe(durationMs / 1000);

      this.logger.info('Payroll extraction complete', {
        document_id: docInfo.document_id,
        employee_count: employeeCount,
        job_number: analysis.result.job_info.job_number,
        warnings: analysis.warnings.length,
        duration_ms: durationMs,
      });

      return {
        result: analysis.result,
        warnings: analysis.warnings,
        pages: analysis.pages,
        metadata: {
          algorithmVersion: ALGORITHM_VERSION,
          durationMs,
        },
      };
    } catch (error) {
      documentsParsedCounter.inc({ status: 'failed' });
      this.logger.error('Payroll extraction failed', error, {
        document_id: docInfo.document_id,
      });
      throw error;
    }
  }
}

// Re-export patterns and parser for testing
export * from './patterns';
export * from './parser';
