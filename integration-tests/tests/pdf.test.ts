/**
 * PDF Text Extraction Tests
 *
 * PDFs are assembled in memory; no fixture files are needed.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentUnreadableError, silentLogger } from '@payroll-extract/shared';
import { extractTextFromPdf } from '../../services/payroll-extractor/src/lib/pdf';

/**
 * Build a minimal PDF: one page per entry, each a list of text runs drawn in
 * Helvetica at absolute positions. An empty list gives a page without text.
 */
function buildPdf(pages: Array<Array<{ x: number; y: number; text: string }>>): Buffer {
  const objects: string[] = [];
  const pageRefs: string[] = [];
  const firstPageId = 4;

  objects[1] = '<< /Type /Catalog /Pages 2 0 R >>';
  objects[3] = '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>';

  pages.forEach((runs, index) => {
    const pageId = firstPageId + index * 2;
    const contentId = pageId + 1;
    pageRefs.push(`${pageId} 0 R`);

    const content = runs
      .map(run => `BT /F1 12 Tf 1 0 0 1 ${run.x} ${run.y} Tm (${run.text}) Tj ET`)
      .join('\n');

    objects[pageId] =
      '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] ' +
      `/Resources << /Font << /F1 3 0 R >> >> /Contents ${contentId} 0 R >>`;
    objects[contentId] = `<< /Length ${content.length} >>\nstream\n${content}\nendstream`;
  });

  objects[2] = `<< /Type /Pages /Kids [${pageRefs.join(' ')}] /Count ${pages.length} >>`;

  let body = '%PDF-1.4\n';
  const offsets: number[] = [];
  for (let id = 1; id < objects.length; id++) {
    offsets[id] = body.length;
    body += `${id} 0 obj\n${objects[id]}\nendobj\n`;
  }

  const xrefOffset = body.length;
  body += `xref\n0 ${objects.length}\n0000000000 65535 f \n`;
  for (let id = 1; id < objects.length; id++) {
    body += `${String(offsets[id]).padStart(10, '0')} 00000 n \n`;
  }
  body += `trailer\n<< /Size ${objects.length} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(body, 'latin1');
}

describe('extractTextFromPdf', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'payroll-pdf-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should reject a missing file with DocumentUnreadableError', async () => {
    const filePath = path.join(workDir, 'missing.pdf');

    await expect(extractTextFromPdf(filePath, silentLogger)).rejects.toBeInstanceOf(
      DocumentUnreadableError
    );
  });

  it('should name the file it could not read', async () => {
    const filePath = path.join(workDir, 'missing.pdf');

    await expect(extractTextFromPdf(filePath, silentLogger)).rejects.toMatchObject({
      code: 'DOCUMENT_UNREADABLE',
      filePath,
    });
  });

  it('should reject a directory with DocumentUnreadableError', async () => {
    await expect(extractTextFromPdf(workDir, silentLogger)).rejects.toBeInstanceOf(
      DocumentUnreadableError
    );
  });

  it('should reject bytes that are not a PDF with DocumentUnreadableError', async () => {
    const filePath = path.join(workDir, 'notes.pdf');
    fs.writeFileSync(filePath, 'this is not a pdf at all');

    await expect(extractTextFromPdf(filePath, silentLogger)).rejects.toMatchObject({
      code: 'DOCUMENT_UNREADABLE',
      filePath,
    });
  });

  it('should leave out pages without text and keep page numbers', async () => {
    const filePath = path.join(workDir, 'register.pdf');
    fs.writeFileSync(
      filePath,
      buildPdf([
        [],
        [
          { x: 72, y: 720, text: 'Employee Name / Address' },
          { x: 72, y: 706, text: 'JOHN A SMITH ***-**-1234' },
          { x: 72, y: 692, text: '123 MAIN ST MADISON WI 53701' },
          { x: 72, y: 678, text: 'Hours Worked This Job' },
        ],
      ])
    );

    const result = await extractTextFromPdf(filePath, silentLogger);

    expect(result.totalPages).toBe(2);
    expect(result.pages.map(page => page.pageNumber)).toEqual([2]);
    expect(result.pages[0].text).toBe(
      [
        'Employee Name / Address',
        'JOHN A SMITH ***-**-1234',
        '123 MAIN ST MADISON WI 53701',
        'Hours Worked This Job',
      ].join('\n')
    );
  });

  it('should join runs on one line from left to right', async () => {
    const filePath = path.join(workDir, 'columns.pdf');
    fs.writeFileSync(
      filePath,
      buildPdf([
        [
          { x: 300, y: 700, text: 'O: 5.00' },
          { x: 72, y: 700, text: 'R: 40.00' },
          { x: 72, y: 650, text: 'Total 265.00' },
        ],
      ])
    );

    const result = await extractTextFromPdf(filePath, silentLogger);

    expect(result.pages).toEqual([{ pageNumber: 1, text: 'R: 40.00 O: 5.00\nTotal 265.00' }]);
  });
});
