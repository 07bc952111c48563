/**
 * PDF Loading Task Cleanup Tests
 *
 * pdfjs is replaced with a stand-in whose loading task fails to open the
 * document and then fails to clean up.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentUnreadableError } from '@payroll-extract/shared';
import { extractTextFromPdf } from '../../services/payroll-extractor/src/lib/pdf';
import { createRecordingLogger } from './payroll-fixtures';

jest.mock('pdfjs-dist', () => ({
  GlobalWorkerOptions: { workerSrc: '' },
  VerbosityLevel: { ERRORS: 0 },
  getDocument: () => ({
    promise: Promise.reject(new Error('Invalid PDF structure.')),
    destroy: () => Promise.reject(new Error('Worker was destroyed')),
  }),
}));

describe('extractTextFromPdf cleanup', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'payroll-pdf-cleanup-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should keep the read error when cleanup also fails', async () => {
    const filePath = path.join(workDir, 'register.pdf');
    fs.writeFileSync(filePath, '%PDF-1.4\n');
    const { logger, entries } = createRecordingLogger();

    const failure = extractTextFromPdf(filePath, logger);

    await expect(failure).rejects.toBeInstanceOf(DocumentUnreadableError);
    await expect(failure).rejects.toThrow(
      `Document could not be read as a PDF: ${filePath} (Invalid PDF structure.)`
    );

    const cleanup = entries.find(entry => entry.message === 'PDF loading task cleanup failed');
    expect(cleanup?.level).toBe('debug');
    expect(cleanup?.context).toEqual({ filePath, error: 'Worker was destroyed' });
  });
});
