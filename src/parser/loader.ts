import { isAlias, isMap, isScalar, isSeq, parseDocument, type Document, type Scalar } from 'yaml';
import { LoadError } from '../errors.js';
import { errors } from '../strings/index.js';
import {
  NumberLiteral,
  TaggedNode,
  isCustomTag,
  type TemplateMapping,
  type TemplateScalar,
  type TemplateValue,
} from './tagged.js';

export interface TemplateLoaderOptions {
  /**
   * Receives parser warnings. Custom tags always produce an
   * "Unresolved tag" warning from the yaml library; they are not errors.
   */
  onWarning?: (message: string) => void;
  /**
   * Most alias expansions allowed per document, nested ones included.
   * A negative value removes the limit. Default 100.
   */
  maxAliasCount?: number;
}

/**
 * Decodes template text into a TemplateMapping.
 *
 * The yaml library resolves only the tags its schema knows, so instead of
 * letting it convert to plain JS we walk the parsed node tree and wrap every
 * node carrying a custom tag in a TaggedNode.
 */
export class TemplateLoader {
  private readonly onWarning?: (message: string) => void;
  private readonly maxAliasCount: number;

  constructor(options: TemplateLoaderOptions = {}) {
    this.onWarning = options.onWarning;
    this.maxAliasCount = options.maxAliasCount ?? 100;
  }

  load(text: string, source: string): TemplateMapping {
    const doc = parseDocument(text, { uniqueKeys: true, prettyErrors: true });

    if (doc.errors.length > 0) {
      throw new LoadError(source, errors.load.parseFailed(source, doc.errors[0].message));
    }
    for (const warning of doc.warnings) {
      this.onWarning?.(`${source}: ${warning.message}`);
    }

    // Nothing but comments, or an explicit null
    if (doc.contents === null || (isScalar(doc.contents) && doc.contents.value === null)) {
      return new Map();
    }

    const root = new NodeWalker(doc, source, this.maxAliasCount).toValue(doc.contents);
    if (!(root instanceof Map)) {
      throw new LoadError(source);
    }
    return root;
  }
}

/**
 * Per-document conversion state. Aliases are expanded into copies of their
 * anchored value; `active` holds the anchors currently being expanded and
 * `aliasCount` the expansions so far.
 */
class NodeWalker {
  private readonly active = new Set<unknown>();
  private aliasCount = 0;

  constructor(
    private readonly doc: Document,
    private readonly source: string,
    private readonly maxAliasCount: number
  ) {}

  toValue(node: unknown): TemplateValue {
    if (node === null || node === undefined) return null;

    if (isAlias(node)) {
      const target = node.resolve(this.doc);
      if (!target) {
        throw new LoadError(this.source, errors.load.unresolvedAlias(this.source, node.source));
      }
      if (this.active.has(target)) {
        throw new LoadError(this.source, errors.load.circularAlias(this.source, node.source));
      }
      this.aliasCount += 1;
      if (this.maxAliasCount >= 0 && this.aliasCount > this.maxAliasCount) {
        throw new LoadError(
          this.source,
          errors.load.tooManyAliases(this.source, this.maxAliasCount)
        );
      }
      return this.toValue(target);
    }

    if (isScalar(node)) {
      if (isCustomTag(node.tag)) {
        return new TaggedNode(node.tag, scalarText(node.value));
      }
      return toScalar(node);
    }

    if (isSeq(node)) {
      this.active.add(node);
      const items = node.items.map((item) => this.toValue(item));
      this.active.delete(node);
      return isCustomTag(node.tag) ? new TaggedNode(node.tag, items) : items;
    }

    if (isMap(node)) {
      this.active.add(node);
      const mapping: TemplateMapping = new Map();
      for (const pair of node.items) {
        const key = this.toKey(pair.key);
        // `1` and '1' are distinct to the parser but the same key here
        if (mapping.has(key)) {
          throw new LoadError(this.source, errors.load.duplicateKey(this.source, key));
        }
        mapping.set(key, this.toValue(pair.value));
      }
      this.active.delete(node);
      return isCustomTag(node.tag) ? new TaggedNode(node.tag, mapping) : mapping;
    }

    throw new LoadError(this.source, errors.load.parseFailed(this.source, 'unsupported node'));
  }

  private toKey(key: unknown): string {
    if (isScalar(key) && !isCustomTag(key.tag)) {
      return typeof key.value === 'number' ? sourceText(key) : String(key.value);
    }
    throw new LoadError(this.source, errors.load.complexKey(this.source));
  }
}

function sourceText(node: Scalar): string {
  return node.source ?? String(node.value);
}

/**
 * Numbers keep their source text; everything else is taken as resolved.
 */
function toScalar(node: Scalar): TemplateScalar {
  const { value } = node;
  if (typeof value === 'number') {
    return new NumberLiteral(sourceText(node), value);
  }
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return sourceText(node);
}

/**
 * Payload of a tagged scalar. The yaml library falls back to its string
 * tag for unknown tags, so this is normally already the source text.
 */
function scalarText(value: unknown): string {
  if (typeof value === 'string') return value;
  return value === null || value === undefined ? '' : String(value);
}
