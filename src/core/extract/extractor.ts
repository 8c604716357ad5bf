/**
 * Field Extractor
 *
 * Evaluates each mapping's path against an incoming frame, keeps the first
 * match and runs it through the value transformer.
 */

import type { ExtractedValueSet, FieldMapping, JsonValue } from '../types.js';
import { transformValue } from '../transform/transformer.js';
import { JsonPath } from './jsonpath.js';

interface CompiledMapping {
  mapping: FieldMapping;
  path: JsonPath;
}

export class FieldExtractor {
  readonly mappings: readonly FieldMapping[];
  private readonly compiled: CompiledMapping[];

  /**
   * Compiles every path up front; a malformed expression throws JsonPathSyntaxError.
   */
  constructor(mappings: readonly FieldMapping[]) {
    this.mappings = [...mappings];
    this.compiled = mappings.map((mapping) => ({
      mapping,
      path: new JsonPath(mapping.path),
    }));
  }

  /**
   * Extract one value per mapping. Fields without a match are present with a
   * null value so their topics still get cleared.
   */
  extract(frame: JsonValue): ExtractedValueSet {
    const values: ExtractedValueSet = new Map();

    for (const { mapping, path } of this.compiled) {
      const match = path.first(frame);
      values.set(mapping.uniqueId, transformValue(match, mapping.transform));
    }

    return values;
  }
}
