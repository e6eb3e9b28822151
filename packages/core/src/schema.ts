/**
 * JSON Schema validation shared by job parsing, plugin config and cleaning steps.
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

const ajv = new Ajv({ allErrors: true });

/** Compile a schema into a type guard. Ajv caches compiled schemas. */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
	return ajv.compile<T>(schema);
}

/** One-line rendering of ajv errors: "/table: must be string; /: must have required property 'x'" */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
	if (!errors || errors.length === 0) return 'invalid value';
	return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}

/**
 * Validate a config object against an optional schema.
 * Returns an error message, or null when the value conforms.
 */
export function checkConfig(schema: SchemaObject | undefined, value: unknown): string | null {
	if (!schema) return null;
	const validate = compileSchema<unknown>(schema);
	return validate(value) ? null : formatSchemaErrors(validate.errors);
}

/** Schema for parameters that take one column name or a list of them */
export const COLUMN_LIST_SCHEMA: SchemaObject = {
	anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
};

/** Normalise a string-or-list parameter to a list */
export function toList(value: string | string[] | undefined): string[] {
	if (value === undefined) return [];
	return typeof value === 'string' ? [value] : value;
}
