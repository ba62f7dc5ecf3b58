/**
 * Value model for CloudFormation-style templates.
 *
 * Templates are ordinary YAML trees except that any node may carry a custom
 * tag (`!Ref`, `!GetAtt`, `!Sub`, ...). Those nodes are kept as TaggedNode so
 * they can be written back out exactly as they were read. The tag set is open:
 * nothing here knows what a tag means.
 */

/**
 * A number read from a template. The source text is what gets written back,
 * so `3.10`, `0x1F` and integers beyond 2^53 come out exactly as they went in.
 */
export class NumberLiteral {
  constructor(
    public readonly text: string,
    public readonly value: number
  ) {}

  valueOf(): number {
    return this.value;
  }

  toString(): string {
    return this.text;
  }
}

export type TemplateScalar = string | number | NumberLiteral | boolean | null;

export type TemplateSequence = TemplateValue[];

/**
 * Ordered mapping. A Map rather than a plain object so that integer-like keys
 * keep their declared position.
 */
export type TemplateMapping = Map<string, TemplateValue>;

export type TemplateValue =
  | TemplateScalar
  | TemplateSequence
  | TemplateMapping
  | TaggedNode;

export type PayloadShape = 'scalar' | 'sequence' | 'mapping';

/**
 * A value annotated with a custom tag. The payload is stored as decoded,
 * without the tag, and may itself contain tagged nodes.
 */
export class TaggedNode {
  constructor(
    public readonly tag: string,
    public readonly payload: TemplateValue
  ) {}
}

export function createTaggedNode(tag: string, payload: TemplateValue): TaggedNode {
  return new TaggedNode(tag, payload);
}

export function isTaggedNode(value: unknown): value is TaggedNode {
  return value instanceof TaggedNode;
}

export function isTemplateMapping(value: unknown): value is TemplateMapping {
  return value instanceof Map;
}

export function isTemplateSequence(value: unknown): value is TemplateSequence {
  return Array.isArray(value);
}

/**
 * Custom tags use the primary `!` handle. The bare `!` is YAML's
 * non-specific tag and only forces a plain string.
 */
export function isCustomTag(tag: string | undefined): tag is string {
  return tag !== undefined && tag.length > 1 && tag.startsWith('!');
}

export function isNumberLiteral(value: unknown): value is NumberLiteral {
  return value instanceof NumberLiteral;
}

/**
 * Shape of a tagged node's payload. The serializer writes scalar-shaped
 * payloads as tagged text and the other two as tagged collections.
 */
export function payloadShape(node: TaggedNode): PayloadShape {
  if (isTemplateMapping(node.payload)) return 'mapping';
  if (isTemplateSequence(node.payload)) return 'sequence';
  return 'scalar';
}
