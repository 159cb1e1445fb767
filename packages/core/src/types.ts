// ============================================================================
// Input
// ============================================================================

/**
 * Decoded form or query-string data: field name to its raw values, in the
 * order they were submitted.
 */
export type FormInput = Readonly<Record<string, readonly string[]>>;

// ============================================================================
// Result
// ============================================================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
	return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
	return { ok: false, error };
}

// ============================================================================
// Field Values
// ============================================================================

/**
 * A parsed value for one occurrence of a field.
 * The variant is decided by the FieldType that produced it.
 */
export type FieldValue =
	| { readonly kind: "str"; readonly value: string }
	| { readonly kind: "i64"; readonly value: bigint };

export function strValue(value: string): FieldValue {
	return Object.freeze({ kind: "str", value });
}

export function i64Value(value: bigint): FieldValue {
	return Object.freeze({ kind: "i64", value });
}

/** The string payload, or undefined for non-string values. */
export function asStr(v: FieldValue): string | undefined {
	return v.kind === "str" ? v.value : undefined;
}

/** The integer payload, or undefined for non-integer values. */
export function asI64(v: FieldValue): bigint | undefined {
	return v.kind === "i64" ? v.value : undefined;
}

/**
 * Display form of a value. Format rules match against this.
 */
export function displayValue(v: FieldValue): string {
	return v.kind === "str" ? v.value : v.value.toString();
}

// ============================================================================
// Messages
// ============================================================================

export const MESSAGE_KINDS = {
	MAX: "Max",
	MIN: "Min",
	MAX_LEN: "MaxLen",
	MIN_LEN: "MinLen",
	BLANK: "Blank",
	FORMAT: "Format",
} as const;

export type MessageKind = (typeof MESSAGE_KINDS)[keyof typeof MESSAGE_KINDS];

/**
 * A validation failure that still has to be rendered.
 */
export interface SomeMessage {
	kind: MessageKind;
	/** Lookup key of the field */
	name: string;
	/** Display name of the field */
	title: string;
	/** Raw submitted value, when one was present */
	value?: string;
	/** Rule parameters to interpolate, e.g. the bound of a max rule */
	ruleValues: string[];
}

export type Message =
	| { readonly kind: "any"; readonly text: string }
	| { readonly kind: "some"; readonly detail: Readonly<SomeMessage> };

export function someMessage(
	kind: MessageKind,
	name: string,
	title: string,
	value?: string,
	ruleValues: string[] = []
): Message {
	const detail: SomeMessage = { kind, name, title, ruleValues };
	if (value !== undefined) {
		detail.value = value;
	}
	return Object.freeze({ kind: "some", detail: Object.freeze(detail) });
}

/** A pre-rendered message; renderers return it verbatim. */
export function anyMessage(text: string): Message {
	return Object.freeze({ kind: "any", text });
}

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown when the library is used incorrectly: reading a field that was never
 * registered or is not in the requested state, registering a duplicate field,
 * or building a rule from an invalid parameter.
 */
export class ValidatorUsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ValidatorUsageError";
	}
}
