export { mapFields, mapRecord } from './field-mapper';
export { MappingStore, type MappingStoreOptions, type TemplateFieldBinding } from './store';
export { BUILT_IN_TEMPLATES, type TemplateDefinition } from './defaults';
