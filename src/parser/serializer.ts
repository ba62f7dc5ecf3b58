import { Document, Pair, Scalar, YAMLMap, YAMLSeq, type ScalarTag } from 'yaml';
import {
  isNumberLiteral,
  isTaggedNode,
  isTemplateMapping,
  isTemplateSequence,
  payloadShape,
  type TaggedNode,
  type TemplateMapping,
  type TemplateValue,
} from './tagged.js';

export interface TemplateSerializerOptions {
  /** Spaces per indentation level */
  indent?: number;
  /** Maximum line width before folding; 0 disables folding */
  lineWidth?: number;
}

type TemplateNode = Scalar | YAMLMap | YAMLSeq;

/**
 * Writes a NumberLiteral as its source text. Only used when stringifying,
 * so `resolve` is never called.
 */
const numberLiteralTag: ScalarTag = {
  identify: isNumberLiteral,
  default: true,
  tag: 'tag:cfn-merge,2024:number',
  resolve: (str) => str,
  stringify: ({ value }) => (isNumberLiteral(value) ? value.text : String(value)),
};

/**
 * Encodes a TemplateMapping back to YAML text.
 *
 * The node tree is built by hand rather than through createNode() so each
 * TaggedNode becomes a node of its payload's shape with the original tag
 * attached; the yaml library then prints the tag in front of it.
 *
 * Output follows YAML 1.1 quoting, which is what CloudFormation reads:
 * strings such as `yes`, `on` or `2010-09-09` are quoted so they stay strings.
 */
export class TemplateSerializer {
  private readonly indent: number;
  private readonly lineWidth: number;

  constructor(options: TemplateSerializerOptions = {}) {
    this.indent = options.indent ?? 2;
    this.lineWidth = options.lineWidth ?? 0;
  }

  serialize(root: TemplateMapping): string {
    const doc = new Document(undefined, {
      version: '1.1',
      sortMapEntries: false,
      customTags: [numberLiteralTag],
    });
    doc.contents = this.toNode(root);
    return doc.toString({
      indent: this.indent,
      lineWidth: this.lineWidth,
    });
  }

  private toNode(value: TemplateValue): TemplateNode {
    if (isTaggedNode(value)) {
      return this.toTaggedNode(value);
    }

    if (isTemplateMapping(value)) {
      const map = new YAMLMap();
      for (const [key, item] of value) {
        map.items.push(new Pair(new Scalar(key), this.toNode(item)));
      }
      return map;
    }

    if (isTemplateSequence(value)) {
      const seq = new YAMLSeq();
      for (const item of value) {
        seq.items.push(this.toNode(item));
      }
      return seq;
    }

    return new Scalar(value);
  }

  private toTaggedNode(value: TaggedNode): TemplateNode {
    const node =
      payloadShape(value) === 'scalar'
        ? new Scalar(tagText(value.payload))
        : this.toNode(value.payload);
    node.tag = value.tag;
    return node;
  }
}

/** A tagged scalar is written as text, the way the loader reads it. */
function tagText(payload: TemplateValue): string {
  if (payload === null) return '';
  if (isNumberLiteral(payload)) return payload.text;
  return String(payload);
}
