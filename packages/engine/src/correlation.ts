/**
 * Paired-metric extraction for joint analysis (scatter plots)
 */

import type { Collection, CorrelationPoint, NumericField, TextField } from "./types.js";

/**
 * Project two numeric fields of each record into (x, y, label) points
 *
 * A record contributes a point only if both fields are present; partial
 * points are never filled with a default. Points keep collection order and
 * are neither sorted nor deduplicated. When the label field is absent the
 * record id is used as the label.
 *
 * @param records - Collection to project
 * @param fieldA - Field for the x coordinate
 * @param fieldB - Field for the y coordinate
 * @param labelField - Text field used as the point label
 */
export function extractPairs(
  records: Collection,
  fieldA: NumericField,
  fieldB: NumericField,
  labelField: TextField
): CorrelationPoint[] {
  const points: CorrelationPoint[] = [];
  for (const record of records) {
    const x = record[fieldA];
    const y = record[fieldB];
    if (x === undefined || y === undefined) continue;
    points.push({ x, y, label: record[labelField] ?? String(record.id) });
  }
  return points;
}
