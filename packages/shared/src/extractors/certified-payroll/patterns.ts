/**
 * Certified Payroll Extraction Patterns
 *
 * Regular expressions for reading job metadata and employee detail pages out
 * of the linearized text of a certified payroll register.
 *
 * Every field pattern runs against the whole page text on its own. A pattern
 * that does not match leaves its field unset; only the name/SSN pattern
 * decides whether a page produces a record at all.
 *
 * Example employee page text:
 * "Employee Name / Address"
 * "JOHN A SMITH ***-**-1234"
 * "123 MAIN ST MADISON WI 53701"
 * "Class Journeyman Wireman ELECTRICIAN Male"
 * "Single 0"
 * "Hours Worked This Job"
 * "R: 40.00 O: 5.00"
 * "25.00 1100.00 150.00 900.00"
 * "PENSION 2.50 100.00"
 * "DUES 15.00"
 * "Total 265.00"
 */

import type { EmployeeFields, JobInfo, JobInfoKey } from '../../types';

// ============================================================================
// Numbers
// ============================================================================

/** A decimal amount, optionally with thousands separators: 25.00, 1,100.00 */
const DECIMAL = String.raw`\d[\d,]*\.\d+`;

/**
 * Parse an amount matched by DECIMAL. Thousands separators are dropped.
 */
export function parseAmount(value: string): number {
  return parseFloat(value.replace(/,/g, ''));
}

// ============================================================================
// Job Info (first page)
// ============================================================================

/**
 * How one job-info key is located on the first page.
 * - 'label': regex anchored on a printed label; the first capture group is the value
 * - 'literal': a fixed expected substring; the value is the substring itself
 */
export type JobInfoPattern =
  | { kind: 'label'; pattern: RegExp }
  | { kind: 'literal'; text: string };

export type JobInfoPatterns = Record<JobInfoKey, JobInfoPattern>;

/**
 * A "CITY, ST 12345" line within the four lines that follow a heading line.
 */
function addressBlockAfter(heading: string): RegExp {
  return new RegExp(
    String.raw`^[ \t]*${heading}[ \t]*\n(?:[^\n]*\n){0,3}?[ \t]*([A-Z][A-Za-z .'-]*,[ \t]*[A-Z]{2}[ \t]+\d{5}(?:-\d{4})?)`,
    'm'
  );
}

export const DEFAULT_JOB_INFO_PATTERNS: JobInfoPatterns = {
  job_name: { kind: 'label', pattern: /^[ \t]*Job\s*\n([^\n]+)/m },
  job_number: { kind: 'label', pattern: /^[ \t]*Job Number:[ \t]*([^\n]+)/m },
  week_ending: { kind: 'label', pattern: /^[ \t]*Week Ending:[ \t]*([^\n]+)/m },
  payroll_number: { kind: 'label', pattern: /^[ \t]*Payroll #[ \t]*([^\n]+)/m },
  contractor_name: { kind: 'label', pattern: /^[ \t]*Contractor\s*\n([^\n]+)/m },
  contractor_address: { kind: 'label', pattern: addressBlockAfter('Contractor') },
  customer_name: { kind: 'label', pattern: /^[ \t]*Customer\s*\n([^\n]+)/m },
  customer_address: { kind: 'label', pattern: addressBlockAfter('Customer') },
};

/**
 * Default patterns with the address keys switched to literal matching where
 * a literal is configured.
 */
export function buildJobInfoPatterns(literals: {
  contractorAddressLiteral?: string;
  customerAddressLiteral?: string;
}): JobInfoPatterns {
  const patterns: JobInfoPatterns = { ...DEFAULT_JOB_INFO_PATTERNS };

  if (literals.contractorAddressLiteral) {
    patterns.contractor_address = { kind: 'literal', text: literals.contractorAddressLiteral };
  }
  if (literals.customerAddressLiteral) {
    patterns.customer_address = { kind: 'literal', text: literals.customerAddressLiteral };
  }

  return patterns;
}

/**
 * Apply one job-info pattern. A miss is the empty string.
 */
export function matchJobInfoPattern(text: string, jobInfoPattern: JobInfoPattern): string {
  if (jobInfoPattern.kind === 'literal') {
    return text.includes(jobInfoPattern.text) ? jobInfoPattern.text : '';
  }

  const match = text.match(jobInfoPattern.pattern);
  return match?.[1]?.trim() ?? '';
}

/**
 * Extract job info from the first page's text. Every key is present.
 */
export function extractJobInfo(
  text: string,
  patterns: JobInfoPatterns = DEFAULT_JOB_INFO_PATTERNS
): JobInfo {
  const read = (key: JobInfoKey): string => matchJobInfoPattern(text, patterns[key]);

  return {
    job_name: read('job_name'),
    job_number: read('job_number'),
    week_ending: read('week_ending'),
    payroll_number: read('payroll_number'),
    contractor_name: read('contractor_name'),
    contractor_address: read('contractor_address'),
    customer_name: read('customer_name'),
    customer_address: read('customer_address'),
  };
}

// ============================================================================
// Page eligibility
// ============================================================================

export const EMPLOYEE_SECTION_MARKER = 'Name / Address';
export const HOURS_SECTION_MARKER = 'Hours Worked This Job';

/**
 * Employee detail pages carry both the name/address and the hours section.
 */
export function isEmployeeDetailPage(text: string): boolean {
  return text.includes(EMPLOYEE_SECTION_MARKER) && text.includes(HOURS_SECTION_MARKER);
}

// ============================================================================
// Employee fields
// ============================================================================

/** Uppercase name directly followed by a masked SSN: "JOHN A SMITH ***-**-1234" */
const IDENTITY_PATTERN = /([A-Z][A-Z ]*[A-Z])[ \t]+(\*\*\*-\*\*-\d{4})/;

/** Whole line: street fragment, city, state, ZIP. "123 MAIN ST MADISON WI 53701" */
const ADDRESS_PATTERN =
  /^[ \t]*([A-Z0-9][A-Z0-9 ]*)[ \t]+([A-Z]+)[ \t]+(\w+)[ \t]+(\d{5}(?:-\d{4})?)[ \t]*$/m;

/** Last uppercase token before "Male" after the Class label */
const JOB_CLASS_PATTERN = /Class\s+(?:.*\s)?([A-Z]+)\s+Male\b/;

const MARITAL_STATUS_PATTERN = /\b(Single|Married)\s+\d+/;

const HOURS_PATTERN = new RegExp(String.raw`\bR:\s+(${DECIMAL}).*\bO:\s+(${DECIMAL})`);

/** Four decimals on one line: rate, gross, federal tax, net */
const PAY_PATTERN = new RegExp(
  String.raw`(${DECIMAL})[ \t]+(${DECIMAL})[ \t]+(${DECIMAL})[ \t]+(${DECIMAL})`
);

export const FRINGE_BENEFIT_LABELS = [
  'AMF 494',
  'ANNUITY',
  'H&W',
  'JATC 494',
  'LMCC 494',
  'NEBF 494',
  'NECA-494',
  'NEIF-494',
  'PENSION',
  'VAC/HOL',
] as const;

export type FringeBenefitLabel = (typeof FRINGE_BENEFIT_LABELS)[number];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

const FRINGE_PATTERN = new RegExp(
  String.raw`(${FRINGE_BENEFIT_LABELS.map(escapeRegExp).join('|')})\s+(${DECIMAL})\s+(${DECIMAL})`,
  'g'
);

const DUES_PATTERN = new RegExp(String.raw`DUES\s+(${DECIMAL})`);

const TOTAL_PATTERN = new RegExp(String.raw`Total\s+(${DECIMAL})`);

/**
 * Key stem for a fringe benefit label: lower-cased, spaces to "_",
 * "&" to "and", "-" to "_". "AMF 494" -> "amf_494", "H&W" -> "handw".
 */
export function toBenefitStem(label: string): string {
  return label.replace(/ /g, '_').replace(/&/g, 'and').replace(/-/g, '_').toLowerCase();
}

export function extractIdentity(text: string): { name: string; ssn: string } | null {
  const match = text.match(IDENTITY_PATTERN);
  if (!match) return null;
  return { name: match[1].trim(), ssn: match[2] };
}

export function extractAddress(
  text: string
): { address: string; city: string; state: string; zip: string } | null {
  const match = text.match(ADDRESS_PATTERN);
  if (!match) return null;
  return {
    address: match[1].trim(),
    city: match[2],
    state: match[3],
    zip: match[4],
  };
}

export function extractJobClass(text: string): string | null {
  const match = text.match(JOB_CLASS_PATTERN);
  return match ? match[1] : null;
}

export function extractMaritalStatus(text: string): string | null {
  const match = text.match(MARITAL_STATUS_PATTERN);
  return match ? match[1] : null;
}

export function extractHours(
  text: string
): { regular_hours: number; overtime_hours: number } | null {
  const match = text.match(HOURS_PATTERN);
  if (!match) return null;
  return {
    regular_hours: parseAmount(match[1]),
    overtime_hours: parseAmount(match[2]),
  };
}

/**
 * Takes the first run of four decimals on a line and assigns it by position.
 * Any earlier four-decimal run on the page is misread as pay figures.
 */
export function extractPayFigures(text: string): {
  pay_rate: number;
  gross_pay: number;
  federal_tax: number;
  net_pay: number;
} | null {
  const match = text.match(PAY_PATTERN);
  if (!match) return null;
  return {
    pay_rate: parseAmount(match[1]),
    gross_pay: parseAmount(match[2]),
    federal_tax: parseAmount(match[3]),
    net_pay: parseAmount(match[4]),
  };
}

/**
 * Every fringe benefit line on the page, keyed `<stem>_rate` / `<stem>_amount`.
 * A label that appears more than once keeps its last occurrence.
 */
export function extractFringeBenefits(text: string): Record<string, number> {
  const benefits: Record<string, number> = {};

  for (const match of text.matchAll(FRINGE_PATTERN)) {
    const stem = toBenefitStem(match[1]);
    benefits[`${stem}_rate`] = parseAmount(match[2]);
    benefits[`${stem}_amount`] = parseAmount(match[3]);
  }

  return benefits;
}

export function extractDuesAmount(text: string): number | null {
  const match = text.match(DUES_PATTERN);
  return match ? parseAmount(match[1]) : null;
}

export function extractTotalDeductions(text: string): number | null {
  const match = text.match(TOTAL_PATTERN);
  return match ? parseAmount(match[1]) : null;
}

/**
 * Read every employee field from one page. Null when the page has no
 * name/SSN pair; any other miss just leaves that field out.
 */
export function extractEmployeeFields(text: string): EmployeeFields | null {
  const identity = extractIdentity(text);
  if (!identity) return null;

  const fields: EmployeeFields = { ...identity };

  const address = extractAddress(text);
  if (address) Object.assign(fields, address);

  const jobClass = extractJobClass(text);
  if (jobClass !== null) fields.job_class = jobClass;

  const maritalStatus = extractMaritalStatus(text);
  if (maritalStatus !== null) fields.marital_status = maritalStatus;

  const hours = extractHours(text);
  if (hours) Object.assign(fields, hours);

  const pay = extractPayFigures(text);
  if (pay) Object.assign(fields, pay);

  Object.assign(fields, extractFringeBenefits(text));

  const dues = extractDuesAmount(text);
  if (dues !== null) fields.dues_amount = dues;

  const total = extractTotalDeductions(text);
  if (total !== null) fields.total_deductions = total;

  return fields;
}
