/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import path from 'path';

export interface Config {
  // Template & mapping storage
  templatesDir: string;
  mappingsDir: string;
  defaultTemplate: string;

  // Job-info address matching. Empty means the label-anchored pattern is used;
  // a value switches that key to a fixed expected-substring match.
  contractorAddressLiteral: string;
  customerAddressLiteral: string;

  // Metrics
  metricsEnabled: boolean;
}

export const config: Config = {
  // Template & mapping storage
  templatesDir: process.env.TEMPLATES_DIR || path.join(process.cwd(), 'templates'),
  mappingsDir: process.env.MAPPINGS_DIR || path.join(process.cwd(), 'mappings'),
  defaultTemplate: process.env.DEFAULT_TEMPLATE || 'wisdot',

  // Job-info address matching
  contractorAddressLiteral: process.env.CONTRACTOR_ADDRESS_LITERAL || '',
  customerAddressLiteral: process.env.CUSTOMER_ADDRESS_LITERAL || '',

  // Metrics
  metricsEnabled: process.env.METRICS_ENABLED === 'true',
};
