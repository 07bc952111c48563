/**
 * Shared TypeScript Types
 *
 * Types for the certified payroll extraction pipeline, matching the JSON
 * schemas in docs/contracts/
 */

// ============================================================================
// Documents & Pages
// ============================================================================

export interface DocumentInfo {
  document_id: string;
  source_filename: string;
}

/**
 * Text of one PDF page in reading order. `pageNumber` is the 1-based page
 * index in the source document; pages with no text are never produced, so
 * numbers can have gaps.
 */
export interface PageText {
  pageNumber: number;
  text: string;
}

// ============================================================================
// Job Info
// ============================================================================

export const JOB_INFO_KEYS = [
  'job_name',
  'job_number',
  'week_ending',
  'payroll_number',
  'contractor_name',
  'contractor_address',
  'customer_name',
  'customer_address',
] as const;

export type JobInfoKey = (typeof JOB_INFO_KEYS)[number];

/** Every key is always present; a label that was not found maps to ''. */
export type JobInfo = Record<JobInfoKey, string>;

// ============================================================================
// Employee Records
// ============================================================================

export type EmployeeFieldValue = string | number;

/**
 * Fields read from one employee-detail page. Only `name` and `ssn` are
 * guaranteed; everything else is present only when its pattern matched.
 * Fringe benefits add `<stem>_rate` / `<stem>_amount` keys.
 */
export interface EmployeeFields {
  name: string;
  ssn: string;
  address?: string;
  city?: string;
  state?: string;
  zip?: string;
  job_class?: string;
  marital_status?: string;
  regular_hours?: number;
  overtime_hours?: number;
  pay_rate?: number;
  gross_pay?: number;
  federal_tax?: number;
  net_pay?: number;
  dues_amount?: number;
  total_deductions?: number;
  [field: string]: EmployeeFieldValue | undefined;
}

export type EmployeeRecord = EmployeeFields & JobInfo;

export interface PayrollParseResult {
  job_info: JobInfo;
  employees: EmployeeRecord[];
}

// ============================================================================
// Templates & Mappings
// ============================================================================

/** Ordered template field name -> source record key. */
export type FieldMapping = Record<string, string>;

export interface OutputTemplate {
  columns: string[];
}

export type MappedRow = Record<string, EmployeeFieldValue>;

// ============================================================================
// API Contracts
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
