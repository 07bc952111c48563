/**
 * Certified Payroll Extractor Tests
 *
 * The extractor class around the parser: logging, metadata and metrics.
 */

import {
  ALGORITHM_VERSION,
  buildJobInfoPatterns,
  CertifiedPayrollExtractor,
  employeesExtractedCounter,
  type DocumentInfo,
} from '@payroll-extract/shared';
import { buildRegisterPages, createRecordingLogger, HEADER_PAGE } from './payroll-fixtures';

const DOC_INFO: DocumentInfo = {
  document_id: 'doc-test-1',
  source_filename: 'register.pdf',
};

async function employeesExtractedTotal(): Promise<number> {
  const metric = await employeesExtractedCounter.get();
  return metric.values[0]?.value ?? 0;
}

describe('CertifiedPayrollExtractor', () => {
  it('should return records, page reports and metadata', () => {
    const { logger } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({ logger });

    const output = extractor.extract(buildRegisterPages(), DOC_INFO);

    expect(output.result.employees).toHaveLength(2);
    expect(output.pages).toHaveLength(5);
    expect(output.warnings).toEqual(['Page 3: employee page without a name and masked SSN']);
    expect(output.metadata.algorithmVersion).toBe(ALGORITHM_VERSION);
    expect(output.metadata.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('should log start and completion with the document id', () => {
    const { logger, entries } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({ logger });

    extractor.extract(buildRegisterPages(), DOC_INFO);

    const infoMessages = entries.filter(entry => entry.level === 'info').map(entry => entry.message);
    expect(infoMessages).toEqual(['Starting payroll extraction', 'Payroll extraction complete']);

    const complete = entries.find(entry => entry.message === 'Payroll extraction complete');
    expect(complete?.context?.document_id).toBe('doc-test-1');
    expect(complete?.context?.employee_count).toBe(2);
    expect(complete?.context?.job_number).toBe('2024-117');
  });

  it('should log a debug entry for every page without a record', () => {
    const { logger, entries } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({ logger });

    extractor.extract(buildRegisterPages(), DOC_INFO);

    const skipped = entries
      .filter(entry => entry.level === 'debug')
      .map(entry => [entry.context?.page_number, entry.context?.reason]);
    expect(skipped).toEqual([
      [1, 'not_employee_page'],
      [3, 'missing_identity'],
      [4, 'not_employee_page'],
    ]);
  });

  it('should use the job info patterns it was built with', () => {
    const { logger } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({
      logger,
      jobInfoPatterns: buildJobInfoPatterns({ customerAddressLiteral: 'CHICAGO, IL 60601' }),
    });

    const output = extractor.extract([{ pageNumber: 1, text: HEADER_PAGE }], DOC_INFO);

    expect(output.result.job_info.customer_address).toBe('');
    expect(output.result.job_info.contractor_address).toBe('BUTLER, WI 53007');
    expect(output.warnings).toEqual(['No employee detail pages found']);
  });

  it('should count extracted employees', async () => {
    const { logger } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({ logger });
    const before = await employeesExtractedTotal();

    extractor.extract(buildRegisterPages(), DOC_INFO);

    expect(await employeesExtractedTotal()).toBe(before + 2);
  });

  it('should be reusable across documents', () => {
    const { logger } = createRecordingLogger();
    const extractor = new CertifiedPayrollExtractor({ logger });

    const first = extractor.extract(buildRegisterPages(), DOC_INFO);
    const second = extractor.extract([], { ...DOC_INFO, document_id: 'doc-test-2' });
    const third = extractor.extract(buildRegisterPages(), DOC_INFO);

    expect(second.result.employees).toEqual([]);
    expect(third.result).toEqual(first.result);
  });
});
