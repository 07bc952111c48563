/**
 * Template & Mapping Store
 *
 * Output templates live in `<templatesDir>/<name>.json` and their field
 * mappings in `<mappingsDir>/<name>.json`. Both are validated against their
 * JSON schemas on every read.
 */

import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger as defaultLogger, type Logger } from '../logger';
import { InvalidMappingError, MappingNotFoundError, type StoredResourceKind } from '../errors';
import { validateFieldMapping, validateOutputTemplate, type ValidationResult } from '../schemas';
import type { FieldMapping, OutputTemplate } from '../types';
import { BUILT_IN_TEMPLATES } from './defaults';

export interface MappingStoreOptions {
  templatesDir?: string;
  mappingsDir?: string;
  logger?: Logger;
}

export interface TemplateFieldBinding {
  column: string;
  /** Employee record key feeding the column, null when the mapping has none */
  sourceField: string | null;
}

const JSON_EXTENSION = '.json';

/**
 * Names are plain file stems; anything with a path separator is never found.
 */
function isPlainName(name: string): boolean {
  return name.length > 0 && path.basename(name) === name && name !== '.' && name !== '..';
}

export class MappingStore {
  readonly templatesDir: string;
  readonly mappingsDir: string;

  private readonly logger: Logger;

  constructor(options: MappingStoreOptions = {}) {
    this.templatesDir = options.templatesDir ?? config.templatesDir;
    this.mappingsDir = options.mappingsDir ?? config.mappingsDir;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Names of all stored templates, sorted
   */
  listTemplates(): string[] {
    if (!fs.existsSync(this.templatesDir)) return [];

    return fs
      .readdirSync(this.templatesDir)
      .filter(file => file.endsWith(JSON_EXTENSION))
      .map(file => path.basename(file, JSON_EXTENSION))
      .sort();
  }

  getTemplate(name: string): OutputTemplate {
    return this.readStored('template', name, this.templatesDir, validateOutputTemplate);
  }

  getMapping(name: string): FieldMapping {
    return this.readStored('mapping', name, this.mappingsDir, validateFieldMapping);
  }

  /**
   * Each template column with the record key its mapping copies into it.
   */
  describeTemplate(name: string): TemplateFieldBinding[] {
    const template = this.getTemplate(name);
    const mapping = this.getMapping(name);

    return template.columns.map(column => ({
      column,
      sourceField: Object.hasOwn(mapping, column) ? mapping[column] : null,
    }));
  }

  /**
   * Write the built-in templates and mappings that are not stored yet.
   * Existing files are left alone. Returns the names written.
   */
  ensureDefaults(): string[] {
    fs.mkdirSync(this.templatesDir, { recursive: true });
    fs.mkdirSync(this.mappingsDir, { recursive: true });

    const written: string[] = [];

    for (const [name, definition] of Object.entries(BUILT_IN_TEMPLATES)) {
      const templatePath = path.join(this.templatesDir, `${name}${JSON_EXTENSION}`);
      if (fs.existsSync(templatePath)) continue;

      fs.writeFileSync(templatePath, `${JSON.stringify(definition.template, null, 2)}\n`);
      fs.writeFileSync(
        path.join(this.mappingsDir, `${name}${JSON_EXTENSION}`),
        `${JSON.stringify(definition.mapping, null, 2)}\n`
      );
      written.push(name);
    }

    if (written.length > 0) {
      this.logger.info('Created default templates', {
        templates: written,
        templates_dir: this.templatesDir,
        mappings_dir: this.mappingsDir,
      });
    }

    return written;
  }

  private readStored<T>(
    kind: StoredResourceKind,
    name: string,
    directory: string,
    validate: (data: unknown) => ValidationResult<T>
  ): T {
    const filePath = path.join(directory, `${name}${JSON_EXTENSION}`);
    if (!isPlainName(name) || !fs.existsSync(filePath)) {
      throw new MappingNotFoundError(kind, name, directory);
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new InvalidMappingError(kind, name, [
        error instanceof Error ? error.message : String(error),
      ]);
    }

    const result = validate(data);
    if (!result.valid) {
      throw new InvalidMappingError(kind, name, result.errors);
    }

    this.logger.debug(`Loaded ${kind}`, { name, path: filePath });
    return result.value;
  }
}
