// @formcheck/core - declarative validation of form and query-string values

// Validator exports
export {
	Validator,
	Checker,
	CheckerOption,
	Rule,
	matchRule,
	matchRules,
	charLength,
	Str,
	I64,
	ChinaMobile,
	Email,
	regexType,
	compilePattern,
} from "./validator";
export type {
	ValidatorOptions,
	Checkable,
	CheckerOptions,
	Predicate,
	MessageBuilder,
	FieldType,
} from "./validator";

// Locale exports
export { defaultRenderer, englishRenderer, createRenderer, renderMessage } from "./locale";
export type { MessageRenderer, MessageTemplate, MessageTemplates } from "./locale";

// Type exports
export * from "./types";
