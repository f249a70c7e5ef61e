// Deadlock Detective Error Types
// Error domain for state validation, caller misuse and bounded searches

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Validation errors (construction time)
	MalformedInput: "MalformedInput",
	DimensionMismatch: "DimensionMismatch",
	NegativeValue: "NegativeValue",
	NonInteger: "NonInteger",
	InvalidInstances: "InvalidInstances",
	InvalidId: "InvalidId",
	ConservationViolation: "ConservationViolation",
	RequestExceedsTotal: "RequestExceedsTotal",

	// Precondition errors (call time)
	NotDeadlocked: "NotDeadlocked",
	ModeMismatch: "ModeMismatch",
	InvalidArgument: "InvalidArgument",

	// Search bound errors
	SearchBoundExceeded: "SearchBoundExceeded",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Validation codes are the invariant that failed */
export type ValidationRule =
	| typeof ErrorCodes.MalformedInput
	| typeof ErrorCodes.DimensionMismatch
	| typeof ErrorCodes.NegativeValue
	| typeof ErrorCodes.NonInteger
	| typeof ErrorCodes.InvalidInstances
	| typeof ErrorCodes.InvalidId
	| typeof ErrorCodes.ConservationViolation
	| typeof ErrorCodes.RequestExceedsTotal;

//==============================================================================
// Base Error Class
//==============================================================================

export class DetectiveError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "DetectiveError";
		this.code = code;
	}
}

//==============================================================================
// Validation Error Type
//==============================================================================

/** A single invariant violation, located by a path such as `allocation[1][0]` */
export interface ValidationIssue {
	rule: ValidationRule;
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationIssue[];
	value?: T;
}

/**
 * Raised when raw input cannot become a SystemState.
 * Carries every issue found; `rule` and `path` describe the first one.
 */
export class ValidationError extends DetectiveError {
	readonly rule: ValidationRule;
	readonly path: string;
	readonly issues: readonly ValidationIssue[];

	constructor(issues: ValidationIssue[]) {
		const first = issues[0] ?? {
			rule: ErrorCodes.MalformedInput,
			path: "$",
			message: "invalid system state",
		};
		super(first.rule, formatIssues(issues.length > 0 ? issues : [first]));
		this.name = "ValidationError";
		this.rule = first.rule;
		this.path = first.path;
		this.issues = issues.length > 0 ? issues : [first];
	}

	static fromIssue(
		rule: ValidationRule,
		path: string,
		message: string,
		value?: unknown,
	): ValidationError {
		const issue: ValidationIssue = { rule, path, message };
		if (value !== undefined) issue.value = value;
		return new ValidationError([issue]);
	}
}

function formatIssues(issues: ValidationIssue[]): string {
	const [first] = issues;
	if (issues.length === 1 && first) return first.message;
	return (
		String(issues.length) +
		" validation errors: " +
		issues.map((i) => i.message).join("; ")
	);
}

//==============================================================================
// Precondition Error
//==============================================================================

export type PreconditionCode =
	| typeof ErrorCodes.NotDeadlocked
	| typeof ErrorCodes.ModeMismatch
	| typeof ErrorCodes.InvalidArgument;

/** Caller-side misuse of the engine */
export class PreconditionError extends DetectiveError {
	constructor(code: PreconditionCode, message: string) {
		super(code, message);
		this.name = "PreconditionError";
	}

	/**
	 * Recovery requested for a result that is not deadlocked
	 */
	static notDeadlocked(): PreconditionError {
		return new PreconditionError(
			ErrorCodes.NotDeadlocked,
			"Recovery requires a deadlocked detection result",
		);
	}

	/**
	 * The caller's single-instance bookkeeping disagrees with the state
	 */
	static modeMismatch(expected: boolean, actual: boolean): PreconditionError {
		return new PreconditionError(
			ErrorCodes.ModeMismatch,
			"Mode mismatch: caller expected a " +
				(expected ? "single-instance" : "multi-instance") +
				" state, but the state is " +
				(actual ? "single-instance" : "multi-instance"),
		);
	}

	static invalidArgument(message: string): PreconditionError {
		return new PreconditionError(ErrorCodes.InvalidArgument, message);
	}
}

//==============================================================================
// Search Bound Error
//==============================================================================

/** A combinatorial search would exceed its configured bound */
export class SearchBoundError extends DetectiveError {
	readonly limit: number;
	readonly required: number;

	constructor(message: string, limit: number, required: number) {
		super(ErrorCodes.SearchBoundExceeded, message);
		this.name = "SearchBoundError";
		this.limit = limit;
		this.required = required;
	}

	static terminationSearch(
		deadlockedCount: number,
		limit: number,
		required: number,
	): SearchBoundError {
		return new SearchBoundError(
			"Deadlocked set too large for exhaustive minimal-set search: " +
				String(deadlockedCount) +
				" processes need " +
				String(required) +
				" candidate subsets, limit is " +
				String(limit),
			limit,
			required,
		);
	}

	static cycleEnumeration(limit: number): SearchBoundError {
		return new SearchBoundError(
			"Wait-for graph has more than " + String(limit) + " elementary cycles",
			limit,
			limit + 1,
		);
	}
}

//==============================================================================
// Validation Result Helpers
//==============================================================================

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationIssue[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 *
 * @example
 * switch (step.kind) {
 *   case "edge": return ...;
 *   default:
 *     exhaustive(step); // Type error if a kind is missing
 * }
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
