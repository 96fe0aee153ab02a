/**
 * JSON Schema validation for raw network record entries
 */

import { Ajv2020 } from "ajv/dist/2020.js";
import type { ErrorObject } from "ajv";
import type { NetworkRecord, OptionalField } from "../types.js";

const nullableInteger = { type: ["integer", "null"] } as const;
const nullableString = { type: ["string", "null"] } as const;

/**
 * Shape of one entry of the registry dump's `data` array.
 * Unknown properties are allowed; dumps carry many fields the engine ignores.
 */
export const networkRecordSchema = {
  $schema: "https://json-schema.org/draft/2020-12/schema",
  $id: "schema/network@1",
  title: "Network",
  type: "object",
  required: ["id"],
  properties: {
    id: { type: "integer" },
    name: nullableString,
    asn: nullableInteger,
    aka: nullableString,
    status: nullableString,
    info_type: nullableString,
    policy_general: nullableString,
    info_scope: nullableString,
    info_prefixes4: nullableInteger,
    info_prefixes6: nullableInteger,
    ix_count: nullableInteger,
    fac_count: nullableInteger,
    website: nullableString,
  },
} as const;

/**
 * Raw entry as it appears in the source, before null normalization
 */
export type RawNetworkRecord = { id: number } & {
  [K in OptionalField]?: NetworkRecord[K] | null;
};

const ajv = new Ajv2020({
  strict: true,
  allErrors: true,
  allowUnionTypes: true,
});

const validateRaw = ajv.compile<RawNetworkRecord>(networkRecordSchema);

/**
 * Outcome of validating one raw entry
 */
export type RecordValidation =
  | { ok: true; record: NetworkRecord }
  | { ok: false; message: string };

/**
 * Validate a raw entry and normalize it into an immutable record.
 * Null-valued and unknown fields are left out of the result.
 */
export function validateNetworkRecord(raw: unknown): RecordValidation {
  if (!validateRaw(raw)) {
    const errors = validateRaw.errors ?? [];
    return { ok: false, message: errors.map(formatErrorMessage).join("; ") || "invalid record" };
  }

  const {
    id,
    name,
    asn,
    aka,
    status,
    info_type,
    policy_general,
    info_scope,
    info_prefixes4,
    info_prefixes6,
    ix_count,
    fac_count,
    website,
  } = raw;

  const record: NetworkRecord = {
    id,
    ...(name != null && { name }),
    ...(asn != null && { asn }),
    ...(aka != null && { aka }),
    ...(status != null && { status }),
    ...(info_type != null && { info_type }),
    ...(policy_general != null && { policy_general }),
    ...(info_scope != null && { info_scope }),
    ...(info_prefixes4 != null && { info_prefixes4 }),
    ...(info_prefixes6 != null && { info_prefixes6 }),
    ...(ix_count != null && { ix_count }),
    ...(fac_count != null && { fac_count }),
    ...(website != null && { website }),
  };

  return { ok: true, record: Object.freeze(record) };
}

/**
 * Format an Ajv error with the failing property path
 */
function formatErrorMessage(err: ErrorObject): string {
  const path = err.instancePath || "record";

  switch (err.keyword) {
    case "required":
      return `${path} is missing required property: ${String(err.params.missingProperty)}`;
    case "type":
      return `${path} must be ${String(err.params.type)}`;
    default:
      return err.message ? `${path} ${err.message}` : `Validation failed at ${path}`;
  }
}
