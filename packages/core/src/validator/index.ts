// Main exports
export { Validator } from "./validator";
export type { ValidatorOptions } from "./validator";
export { Checker, CheckerOption } from "./checker";
export type { Checkable, CheckerOptions } from "./checker";
export { Rule, matchRule, matchRules, charLength } from "./rules";
export type { Predicate, MessageBuilder } from "./rules";
export { Str, I64, ChinaMobile, Email, regexType, compilePattern } from "./field-types";
export type { FieldType } from "./field-types";
