/**
 * Document Extractors
 */

export type {
  DocumentExtractor,
  ExtractorResult,
  ExtractorMetadata,
} from './types';

export * from './certified-payroll';
