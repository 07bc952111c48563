/**
 * Schema Validation Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createValidator,
  loadSchema,
  parsePayrollDocument,
  type FieldMapping,
  validateFieldMapping,
  validateOutputTemplate,
  validateParseResult,
} from '@payroll-extract/shared';
import { buildRegisterPages, EMPTY_JOB_INFO } from './payroll-fixtures';

describe('Schema validation', () => {
  describe('validateParseResult', () => {
    it('should accept a parsed register', () => {
      const result = parsePayrollDocument(buildRegisterPages());

      expect(validateParseResult(result)).toEqual({ valid: true, value: result });
    });

    it('should accept an empty result', () => {
      expect(validateParseResult(parsePayrollDocument([])).valid).toBe(true);
    });

    it('should reject job info with missing keys', () => {
      const validation = validateParseResult({ job_info: { job_name: 'X' }, employees: [] });

      expect(validation.valid).toBe(false);
    });

    it('should reject an employee with an unmasked SSN', () => {
      const validation = validateParseResult({
        job_info: EMPTY_JOB_INFO,
        employees: [{ name: 'JOHN A SMITH', ssn: '000-00-0000', ...EMPTY_JOB_INFO }],
      });

      expect(validation.valid).toBe(false);
      if (!validation.valid) {
        expect(validation.errors).toHaveLength(1);
        expect(validation.errors[0]).toMatch(/^\/employees\/0\/ssn: must match pattern/);
      }
    });
  });

  describe('validateFieldMapping', () => {
    it('should accept a mapping of strings', () => {
      expect(validateFieldMapping({ Name: 'name' }).valid).toBe(true);
    });

    it('should reject an empty mapping', () => {
      expect(validateFieldMapping({}).valid).toBe(false);
    });

    it('should reject an empty source field', () => {
      expect(validateFieldMapping({ Name: '' }).valid).toBe(false);
    });
  });

  describe('validateOutputTemplate', () => {
    it('should accept a list of columns', () => {
      expect(validateOutputTemplate({ columns: ['Name', 'SSN'] })).toEqual({
        valid: true,
        value: { columns: ['Name', 'SSN'] },
      });
    });

    it('should reject duplicate columns', () => {
      expect(validateOutputTemplate({ columns: ['Name', 'Name'] }).valid).toBe(false);
    });

    it('should reject unknown properties', () => {
      expect(validateOutputTemplate({ columns: ['Name'], title: 'Payroll' }).valid).toBe(false);
    });
  });

  describe('missing schema files', () => {
    let emptyDir: string;

    beforeEach(() => {
      emptyDir = fs.mkdtempSync(path.join(os.tmpdir(), 'payroll-schemas-'));
    });

    afterEach(() => {
      fs.rmSync(emptyDir, { recursive: true, force: true });
    });

    it('should return null when no directory has the schema', () => {
      expect(loadSchema('field_mapping.schema.json', [emptyDir])).toBeNull();
    });

    it('should reject every value instead of accepting it', () => {
      const validate = createValidator<FieldMapping>('field_mapping.schema.json', [emptyDir]);

      expect(validate({ A: 5 })).toEqual({
        valid: false,
        errors: ['/: schema field_mapping.schema.json not found'],
      });
      expect(validate({ Name: 'name' }).valid).toBe(false);
    });
  });
});
