/**
 * Certified Payroll Parser
 *
 * Turns the pages of one certified payroll register into job info plus one
 * employee record per employee detail page. Pure: the result depends only on
 * the page text and the job-info patterns passed in.
 */

import type { EmployeeRecord, JobInfo, PageText, PayrollParseResult } from '../../types';
import {
  DEFAULT_JOB_INFO_PATTERNS,
  extractEmployeeFields,
  extractJobInfo,
  isEmployeeDetailPage,
  type JobInfoPatterns,
} from './patterns';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

export type PageOutcome = 'extracted' | 'not_employee_page' | 'missing_identity';

export interface PageReport {
  pageNumber: number;
  outcome: PageOutcome;
}

export interface PayrollDocumentAnalysis {
  result: PayrollParseResult;
  pages: PageReport[];
  warnings: string[];
}

export interface ParseOptions {
  jobInfoPatterns?: JobInfoPatterns;
}

/**
 * Find all employee detail pages in the document
 */
export function findEmployeePages(pages: PageText[]): PageText[] {
  return pages.filter(page => isEmployeeDetailPage(page.text));
}

/**
 * Parse one page into an employee record carrying the document's job info.
 */
export function parseEmployeePage(text: string, jobInfo: JobInfo): EmployeeRecord | null {
  const fields = extractEmployeeFields(text);
  if (!fields) return null;
  return { ...fields, ...jobInfo };
}

/**
 * Parse a document and report what happened to every page.
 */
export function analyzePayrollDocument(
  pages: PageText[],
  options: ParseOptions = {}
): PayrollDocumentAnalysis {
  const patterns = options.jobInfoPatterns ?? DEFAULT_JOB_INFO_PATTERNS;
  const jobInfo = extractJobInfo(pages[0]?.text ?? '', patterns);

  const employees: EmployeeRecord[] = [];
  const reports: PageReport[] = [];
  const warnings: string[] = [];

  for (const page of pages) {
    if (!isEmployeeDetailPage(page.text)) {
      reports.push({ pageNumber: page.pageNumber, outcome: 'not_employee_page' });
      continue;
    }

    // Each record gets its own copy of the job info
    const employee = parseEmployeePage(page.text, { ...jobInfo });
    if (!employee) {
      reports.push({ pageNumber: page.pageNumber, outcome: 'missing_identity' });
      warnings.push(`Page ${page.pageNumber}: employee page without a name and masked SSN`);
      continue;
    }

    employees.push(employee);
    reports.push({ pageNumber: page.pageNumber, outcome: 'extracted' });
  }

  if (pages.length === 0) {
    warnings.push('Document has no pages with text');
  } else if (!reports.some(report => report.outcome !== 'not_employee_page')) {
    warnings.push('No employee detail pages found');
  }

  return {
    result: { job_info: jobInfo, employees },
    pages: reports,
    warnings,
  };
}

/**
 * Parse the pages of a certified payroll register.
 * No employee pages, or none with a name and SSN, gives an empty list.
 */
export function parsePayrollDocument(
  pages: PageText[],
  options: ParseOptions = {}
): PayrollParseResult {
  return analyzePayrollDocument(pages, options).result;
}
