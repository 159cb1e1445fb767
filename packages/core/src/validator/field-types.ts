import type { FieldValue, Message, Result } from "../types";
import { MESSAGE_KINDS, ValidatorUsageError, err, i64Value, ok, someMessage, strValue } from "../types";

// ============================================================================
// FieldType Contract
// ============================================================================

/**
 * Parses one raw submitted string into a typed value.
 * Implement this to add a field type of your own.
 */
export interface FieldType {
	fromStr(fieldName: string, fieldTitle: string, raw: string): Result<FieldValue, Message>;
}

function formatError(fieldName: string, fieldTitle: string, raw: string): Result<FieldValue, Message> {
	return err(someMessage(MESSAGE_KINDS.FORMAT, fieldName, fieldTitle, raw));
}

// ============================================================================
// Built-in Types
// ============================================================================

/**
 * Any string. Never fails.
 */
export const Str: FieldType = {
	fromStr(_fieldName, _fieldTitle, raw) {
		return ok(strValue(raw));
	},
};

const I64_PATTERN = /^-?\d+$/;
const I64_MIN = -(2n ** 63n);
const I64_MAX = 2n ** 63n - 1n;

/**
 * Signed 64-bit decimal integer, parsed to a bigint.
 * Whitespace, a leading `+` and the empty string are rejected.
 */
export const I64: FieldType = {
	fromStr(fieldName, fieldTitle, raw) {
		if (!I64_PATTERN.test(raw)) {
			return formatError(fieldName, fieldTitle, raw);
		}
		const n = BigInt(raw);
		if (n < I64_MIN || n > I64_MAX) {
			return formatError(fieldName, fieldTitle, raw);
		}
		return ok(i64Value(n));
	},
};

/**
 * A string field that must fully match `pattern`.
 * The value is kept as a string.
 */
export function regexType(pattern: RegExp | string): FieldType {
	const re = compilePattern(pattern);
	return {
		fromStr(fieldName, fieldTitle, raw) {
			if (!re.test(raw)) {
				return formatError(fieldName, fieldTitle, raw);
			}
			return ok(strValue(raw));
		},
	};
}

/**
 * Mainland China mobile number: 11 digits starting with 1.
 */
export const ChinaMobile: FieldType = regexType(/^1\d{10}$/);

export const Email: FieldType = regexType(/^[\w.%+-]+@(?:[A-Z0-9-]+\.)+[A-Z]{2,4}$/i);

// ============================================================================
// Pattern Compilation
// ============================================================================

/**
 * Compile a pattern once for repeated, stateless matching.
 * The `g` and `y` flags are dropped so `test` never depends on `lastIndex`.
 */
export function compilePattern(pattern: RegExp | string): RegExp {
	if (pattern instanceof RegExp) {
		return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
	}
	try {
		return new RegExp(pattern);
	} catch (e) {
		throw new ValidatorUsageError(
			`Invalid pattern ${JSON.stringify(pattern)}: ${e instanceof Error ? e.message : String(e)}`
		);
	}
}
