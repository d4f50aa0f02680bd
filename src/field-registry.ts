// Doctor Voice Onboarding - Field Schema Registry
// Ordered, read-only set of profile fields the conversation collects.
// Loaded once at startup from a JSON file and shared by every request.

import { readFile } from "node:fs/promises";
import { FieldNotFoundError, FieldSchemaError } from "./errors.js";
import type {
  FieldDefinition,
  FieldNormalizer,
  FieldValidation,
  FieldValueType,
} from "./types.js";

/** Default schema file, resolved relative to the compiled module (src/ or dist/). */
export const DEFAULT_FIELD_SCHEMA_URL = new URL("../config/fields.json", import.meta.url);

const VALUE_TYPES: readonly FieldValueType[] = ["text", "number", "enum_single", "enum_multi", "year"];

const NORMALIZERS: readonly FieldNormalizer[] = ["email", "phone", "none"];

// ─── Registry ───────────────────────────────────────────────────────────────────

export class FieldSchemaRegistry {
  private readonly ordered: readonly FieldDefinition[];
  private readonly byName: ReadonlyMap<string, FieldDefinition>;

  constructor(definitions: readonly FieldDefinition[]) {
    if (definitions.length === 0) {
      throw new FieldSchemaError("Field schema must define at least one field");
    }

    const byName = new Map<string, FieldDefinition>();
    for (const def of definitions) {
      if (byName.has(def.name)) {
        throw new FieldSchemaError(`Duplicate field name in schema: ${def.name}`);
      }
      byName.set(def.name, Object.freeze({ ...def }));
    }

    this.byName = byName;
    this.ordered = Object.freeze(
      [...byName.values()].sort(
        (a, b) => a.collectionOrder - b.collectionOrder || a.name.localeCompare(b.name),
      ),
    );
  }

  /** All fields in collection order. */
  listFields(): readonly FieldDefinition[] {
    return this.ordered;
  }

  /**
   * Looks up a field by name.
   * @throws FieldNotFoundError when the schema does not define the field.
   */
  getField(name: string): FieldDefinition {
    const def = this.byName.get(name);
    if (!def) {
      throw new FieldNotFoundError(name);
    }
    return def;
  }

  hasField(name: string): boolean {
    return this.byName.has(name);
  }

  requiredFields(): FieldDefinition[] {
    return this.ordered.filter((f) => f.isRequired);
  }
}

// ─── Parsing ────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new FieldSchemaError(`${where}: '${key}' must be a number`);
  }
  return value;
}

function parseValidation(raw: unknown, valueType: FieldValueType, where: string): FieldValidation | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    throw new FieldSchemaError(`${where}: 'validation' must be an object`);
  }

  const validation: FieldValidation = {};

  if (raw.pattern !== undefined) {
    if (typeof raw.pattern !== "string") {
      throw new FieldSchemaError(`${where}: 'pattern' must be a string`);
    }
    try {
      new RegExp(raw.pattern);
    } catch (err) {
      throw new FieldSchemaError(`${where}: invalid pattern ${JSON.stringify(raw.pattern)}`, { cause: err });
    }
    validation.pattern = raw.pattern;
  }

  const min = optionalNumber(raw, "min", where);
  const max = optionalNumber(raw, "max", where);
  const minLength = optionalNumber(raw, "minLength", where);
  const minDigits = optionalNumber(raw, "minDigits", where);
  const maxSelections = optionalNumber(raw, "maxSelections", where);
  if (min !== undefined) validation.min = min;
  if (max !== undefined) validation.max = max;
  if (minLength !== undefined) validation.minLength = minLength;
  if (minDigits !== undefined) validation.minDigits = minDigits;
  if (maxSelections !== undefined) validation.maxSelections = maxSelections;

  if (validation.min !== undefined && validation.max !== undefined && validation.min > validation.max) {
    throw new FieldSchemaError(`${where}: 'min' is greater than 'max'`);
  }
  if (validation.maxSelections !== undefined && valueType !== "enum_multi") {
    throw new FieldSchemaError(`${where}: 'maxSelections' only applies to enum_multi fields`);
  }

  if (raw.options !== undefined) {
    if (!Array.isArray(raw.options) || !raw.options.every((o): o is string => typeof o === "string")) {
      throw new FieldSchemaError(`${where}: 'options' must be an array of strings`);
    }
    if (raw.options.length === 0) {
      throw new FieldSchemaError(`${where}: 'options' must not be empty`);
    }
    if (valueType !== "enum_single" && valueType !== "enum_multi") {
      throw new FieldSchemaError(`${where}: 'options' only applies to enumerated fields`);
    }
    validation.options = [...raw.options];
  }

  return validation;
}

function parseFieldDefinition(raw: unknown, index: number): FieldDefinition {
  const where = `fields[${index}]`;
  if (!isRecord(raw)) {
    throw new FieldSchemaError(`${where}: must be an object`);
  }

  const { name, displayName, valueType, isRequired, collectionOrder, normalizer, description } = raw;

  if (typeof name !== "string" || !/^[a-z][a-z0-9_]*$/.test(name)) {
    throw new FieldSchemaError(`${where}: 'name' must be a snake_case identifier`);
  }
  if (typeof displayName !== "string" || displayName.trim().length === 0) {
    throw new FieldSchemaError(`${where} (${name}): 'displayName' is required`);
  }
  const type = VALUE_TYPES.find((t) => t === valueType);
  if (type === undefined) {
    throw new FieldSchemaError(`${where} (${name}): unknown valueType ${JSON.stringify(valueType)}`);
  }
  if (typeof isRequired !== "boolean") {
    throw new FieldSchemaError(`${where} (${name}): 'isRequired' must be a boolean`);
  }
  if (typeof collectionOrder !== "number" || !Number.isInteger(collectionOrder)) {
    throw new FieldSchemaError(`${where} (${name}): 'collectionOrder' must be an integer`);
  }
  const normalize = NORMALIZERS.find((n) => n === normalizer);
  if (normalizer !== undefined && normalize === undefined) {
    throw new FieldSchemaError(`${where} (${name}): unknown normalizer ${JSON.stringify(normalizer)}`);
  }
  let hint: string | undefined;
  if (description !== undefined) {
    if (typeof description !== "string") {
      throw new FieldSchemaError(`${where} (${name}): 'description' must be a string`);
    }
    hint = description;
  }

  const def: FieldDefinition = {
    name,
    displayName,
    valueType: type,
    isRequired,
    collectionOrder,
    ...(normalize !== undefined ? { normalizer: normalize } : {}),
    ...(hint !== undefined ? { description: hint } : {}),
  };
  const validation = parseValidation(raw.validation, type, `${where} (${name})`);
  return validation ? { ...def, validation } : def;
}

/**
 * Validates an already-parsed JSON document of the form `{ "fields": [...] }`
 * (or a bare array) and builds a registry from it.
 */
export function parseFieldSchema(document: unknown): FieldSchemaRegistry {
  const fields = Array.isArray(document)
    ? document
    : isRecord(document) && Array.isArray(document.fields)
      ? document.fields
      : null;

  if (fields === null) {
    throw new FieldSchemaError("Field schema must be an array or an object with a 'fields' array");
  }

  return new FieldSchemaRegistry(fields.map((f: unknown, i: number) => parseFieldDefinition(f, i)));
}

/** Reads and validates a field schema JSON file. */
export async function loadFieldRegistry(source: string | URL = DEFAULT_FIELD_SCHEMA_URL): Promise<FieldSchemaRegistry> {
  let text: string;
  try {
    text = await readFile(source, "utf-8");
  } catch (err) {
    throw new FieldSchemaError(`Unable to read field schema from ${String(source)}`, { cause: err });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new FieldSchemaError(`Field schema at ${String(source)} is not valid JSON`, { cause: err });
  }

  return parseFieldSchema(document);
}
