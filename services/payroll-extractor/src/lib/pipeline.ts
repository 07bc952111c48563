/**
 * Payroll Document Pipeline
 *
 * One document, start to finish: resolve the output template, read the PDF
 * text, extract job info and employee records, map them onto the template.
 */

import path from 'path';
import { ulid } from 'ulid';
import {
  logger as defaultLogger,
  runWithContextAsync,
  mapFields,
  CertifiedPayrollExtractor,
  MappingStore,
  type DocumentInfo,
  type JobInfo,
  type Logger,
  type MappedRow,
} from '@payroll-extract/shared';
import { extractTextFromPdf, type TextExtractor } from './pdf';

export interface PipelineRequest {
  filePath: string;
  templateName: string;
  documentId?: string;
  correlationId?: string;
}

export interface PipelineDependencies {
  logger?: Logger;
  extractText?: TextExtractor;
  extractor?: CertifiedPayrollExtractor;
  store?: MappingStore;
}

export interface PipelineOutput {
  document_id: string;
  correlation_id: string;
  template: string;
  job_info: JobInfo;
  columns: string[];
  rows: MappedRow[];
  employee_count: number;
  warnings: string[];
}

/**
 * Process one payroll PDF.
 *
 * The template and its mapping are resolved before the PDF is opened, so an
 * unknown template fails with MappingNotFoundError without touching the file.
 * A document without employee data is not an error: it yields no rows and a
 * warning.
 */
export async function processPayrollDocument(
  request: PipelineRequest,
  deps: PipelineDependencies = {}
): Promise<PipelineOutput> {
  const logger = deps.logger ?? defaultLogger;
  const extractText = deps.extractText ?? extractTextFromPdf;
  const extractor = deps.extractor ?? new CertifiedPayrollExtractor({ logger });
  const store = deps.store ?? new MappingStore({ logger });

  const correlationId = request.correlationId ?? ulid();
  const documentInfo: DocumentInfo = {
    document_id: request.documentId ?? ulid(),
    source_filename: path.basename(request.filePath),
  };

  return runWithContextAsync(
    {
      correlationId,
      documentId: documentInfo.document_id,
      sourceFilename: documentInfo.source_filename,
    },
    async () => {
      const template = store.getTemplate(request.templateName);
      const mapping = store.getMapping(request.templateName);

      const unmapped = template.columns.filter(column => !Object.hasOwn(mapping, column));
      if (unmapped.length > 0) {
        logger.warn('Template columns without a mapping', {
          template: request.templateName,
          columns: unmapped,
        });
      }

      const pdfResult = await extractText(request.filePath, logger);
      const extraction = extractor.extract(pdfResult.pages, documentInfo);
      const { job_info, employees } = extraction.result;

      if (employees.length === 0) {
        logger.warn('No employee data could be extracted from the PDF', {
          total_pages: pdfResult.totalPages,
          pages_with_text: pdfResult.pages.length,
        });
      }

      const rows = mapFields(employees, mapping);

      logger.info('Payroll document processed', {
        template: request.templateName,
        employee_count: employees.length,
        row_count: rows.length,
      });

      return {
        document_id: documentInfo.document_id,
        correlation_id: correlationId,
        template: request.templateName,
        job_info,
        columns: template.columns,
        rows,
        employee_count: employees.length,
        warnings: extraction.warnings,
      };
    }
  );
}
