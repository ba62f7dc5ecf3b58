import { errors } from './strings/index.js';

export type TemplateErrorCode = 'LOAD_FAILED' | 'SECTION_TYPE' | 'DUPLICATE_KEY';

/**
 * Base class for every failure of the load/merge pipeline.
 * `source` is the path (or label) of the template that caused it.
 */
export class TemplateError extends Error {
  constructor(
    message: string,
    public code: TemplateErrorCode,
    public source: string
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * A template could not be decoded into a mapping.
 */
export class LoadError extends TemplateError {
  constructor(source: string, message = errors.load.notMapping(source)) {
    super(message, 'LOAD_FAILED', source);
    this.name = 'LoadError';
  }
}

/**
 * A mergeable section holds something other than a mapping.
 */
export class SectionTypeError extends TemplateError {
  constructor(
    source: string,
    public section: string
  ) {
    super(errors.merge.sectionNotMapping(source, section), 'SECTION_TYPE', source);
    this.name = 'SectionTypeError';
  }
}

/**
 * Two templates define the same item name in the same section.
 * `source` is the later of the two.
 */
export class DuplicateKeyError extends TemplateError {
  constructor(
    public section: string,
    public key: string,
    source: string
  ) {
    super(errors.merge.duplicateKey(section, key, source), 'DUPLICATE_KEY', source);
    this.name = 'DuplicateKeyError';
  }
}

/**
 * The merge was requested with missing or invalid options.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public source?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * An input file named by the user does not exist.
 */
export class FileNotFoundError extends Error {
  constructor(public path: string) {
    super(errors.file.notFound(path));
    this.name = 'FileNotFoundError';
  }
}
