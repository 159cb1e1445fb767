import type { FieldValue, Message, MessageKind, Result } from "../types";
import { MESSAGE_KINDS, ValidatorUsageError, anyMessage, displayValue, err, ok, someMessage } from "../types";
import { compilePattern } from "./field-types";

// ============================================================================
// Rule Types
// ============================================================================

export type Predicate = (value: FieldValue) => boolean;

/**
 * Builds the literal error text for a failed lambda rule.
 */
export type MessageBuilder = (fieldName: string, fieldTitle: string, raw: string) => string;

export type Rule =
	| { readonly rule: "max"; readonly value: bigint }
	| { readonly rule: "min"; readonly value: bigint }
	| { readonly rule: "format"; readonly pattern: RegExp }
	| { readonly rule: "lambda"; readonly fn: Predicate; readonly message?: MessageBuilder };

function toBound(name: string, n: number | bigint): bigint {
	if (typeof n === "bigint") {
		return n;
	}
	if (!Number.isSafeInteger(n)) {
		throw new ValidatorUsageError(`Rule.${name} needs an integer bound, got ${n}`);
	}
	return BigInt(n);
}

/**
 * Rule constructors.
 *
 * `max` and `min` bound the length of string values (in code points) and
 * the value itself for integers. `format` searches the display form of the
 * value; anchor the pattern for a full match.
 */
export const Rule = {
	max(n: number | bigint): Rule {
		return Object.freeze({ rule: "max", value: toBound("max", n) });
	},
	min(n: number | bigint): Rule {
		return Object.freeze({ rule: "min", value: toBound("min", n) });
	},
	format(pattern: RegExp | string): Rule {
		return Object.freeze({ rule: "format", pattern: compilePattern(pattern) });
	},
	lambda(fn: Predicate, message?: MessageBuilder): Rule {
		return message
			? Object.freeze({ rule: "lambda", fn, message })
			: Object.freeze({ rule: "lambda", fn });
	},
};

// ============================================================================
// Rule Evaluation
// ============================================================================

/**
 * Length of a string in Unicode code points.
 */
export function charLength(s: string): number {
	return [...s].length;
}

function bound(
	value: FieldValue,
	limit: bigint,
	fieldName: string,
	fieldTitle: string,
	raw: string,
	upper: boolean
): Result<void, Message> {
	const actual = value.kind === "str" ? BigInt(charLength(value.value)) : value.value;
	const failed = upper ? actual > limit : actual < limit;
	if (!failed) {
		return ok(undefined);
	}

	let kind: MessageKind;
	if (value.kind === "str") {
		kind = upper ? MESSAGE_KINDS.MAX_LEN : MESSAGE_KINDS.MIN_LEN;
	} else {
		kind = upper ? MESSAGE_KINDS.MAX : MESSAGE_KINDS.MIN;
	}
	return err(someMessage(kind, fieldName, fieldTitle, raw, [limit.toString()]));
}

/**
 * Apply one rule to a parsed value.
 * `raw` is the submitted string the value was parsed from.
 */
export function matchRule(
	value: FieldValue,
	fieldName: string,
	fieldTitle: string,
	raw: string,
	rule: Rule
): Result<void, Message> {
	switch (rule.rule) {
		case "max":
			return bound(value, rule.value, fieldName, fieldTitle, raw, true);
		case "min":
			return bound(value, rule.value, fieldName, fieldTitle, raw, false);
		case "format":
			if (!rule.pattern.test(displayValue(value))) {
				return err(someMessage(MESSAGE_KINDS.FORMAT, fieldName, fieldTitle, raw));
			}
			return ok(undefined);
		case "lambda":
			if (rule.fn(value)) {
				return ok(undefined);
			}
			if (rule.message) {
				return err(anyMessage(rule.message(fieldName, fieldTitle, raw)));
			}
			return err(someMessage(MESSAGE_KINDS.FORMAT, fieldName, fieldTitle, raw));
	}
}

/**
 * Apply rules in order, stopping at the first failure.
 */
export function matchRules(
	value: FieldValue,
	fieldName: string,
	fieldTitle: string,
	raw: string,
	rules: readonly Rule[]
): Result<void, Message> {
	for (const rule of rules) {
		const result = matchRule(value, fieldName, fieldTitle, raw, rule);
		if (!result.ok) {
			return result;
		}
	}
	return ok(undefined);
}
