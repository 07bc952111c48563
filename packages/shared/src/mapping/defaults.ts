/**
 * Built-in output templates and their field mappings.
 */

import type { FieldMapping, OutputTemplate } from '../types';
import defaultTemplate from './defaults/default.template.json';
import defaultMapping from './defaults/default.mapping.json';
import wisdotTemplate from './defaults/wisdot.template.json';
import wisdotMapping from './defaults/wisdot.mapping.json';

export interface TemplateDefinition {
  template: OutputTemplate;
  mapping: FieldMapping;
}

export const BUILT_IN_TEMPLATES: Record<string, TemplateDefinition> = {
  default: { template: defaultTemplate, mapping: defaultMapping },
  wisdot: { template: wisdotTemplate, mapping: wisdotMapping },
};
