/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export {
  logger,
  createLogger,
  silentLogger,
  type Logger,
  type LogContext,
  type LogWriter,
} from './logger';

// Config
export { config, type Config } from './config';

// Errors
export {
  PayrollExtractorError,
  DocumentUnreadableError,
  MappingNotFoundError,
  InvalidMappingError,
  UsageError,
  isPayrollExtractorError,
  toErrorEnvelope,
  type ErrorCode,
  type StoredResourceKind,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  enableDefaultMetrics,
  documentsParsedCounter,
  employeesExtractedCounter,
  pagesSkippedCounter,
  parseDurationHistogram,
  pdfTextDurationHistogram,
  getMetrics,
} from './metrics';

// Schemas
export {
  validateParseResult,
  validateFieldMapping,
  validateOutputTemplate,
  createValidator,
  loadSchema,
  type ValidationResult,
  type Validator,
} from './schemas';

// Extractors
export {
  type DocumentExtractor,
  type ExtractorResult,
  type ExtractorMetadata,
  CertifiedPayrollExtractor,
  type CertifiedPayrollExtractorOptions,
  // Algorithmic exports for testing
  ALGORITHM_VERSION,
  DEFAULT_JOB_INFO_PATTERNS,
  EMPLOYEE_SECTION_MARKER,
  HOURS_SECTION_MARKER,
  FRINGE_BENEFIT_LABELS,
  analyzePayrollDocument,
  buildJobInfoPatterns,
  extractAddress,
  extractDuesAmount,
  extractEmployeeFields,
  extractFringeBenefits,
  extractHours,
  extractIdentity,
  extractJobClass,
  extractJobInfo,
  extractMaritalStatus,
  extractPayFigures,
  extractTotalDeductions,
  findEmployeePages,
  isEmployeeDetailPage,
  matchJobInfoPattern,
  parseAmount,
  parseEmployeePage,
  parsePayrollDocument,
  toBenefitStem,
  type FringeBenefitLabel,
  type JobInfoPattern,
  type JobInfoPatterns,
  type PageOutcome,
  type PageReport,
  type ParseOptions,
  type PayrollDocumentAnalysis,
} from './extractors';

// Mapping
export {
  mapFields,
  mapRecord,
  MappingStore,
  BUILT_IN_TEMPLATES,
  type MappingStoreOptions,
  type TemplateFieldBinding,
  type TemplateDefinition,
} from './mapping';
