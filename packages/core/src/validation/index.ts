/**
 * Validation engine, options, results and summaries.
 */

export { validate, Validator } from "./engine.js";
export {
	mergeValidateOptions,
	resolveValidateOptions,
	type HttpValidationOptions,
	type ResolvedValidateOptions,
	type ValidateOptions,
} from "./options.js";
export {
	COMPLIANCE_CATEGORY,
	CUSTOM_CATEGORY,
	SUMMARY_REASON_LIMIT,
	addAttributeResult,
	ensureAnalysis,
	markFailure,
	mergeAnalysis,
	type AttributeResult,
	type CategorySummary,
	type NodeAnalysisResult,
	type NodeResult,
	type ResultStatus,
	type ValidationResult,
} from "./results.js";
export { summarizeCategories } from "./summary.js";
