/**
 * Compiler diagnostic definitions.
 *
 * Error code format: EO<STAGE><NUMBER>
 * - EOLEX: Scanner errors (001-099)
 * - EOPARSE: Parser errors (001-099)
 * - EOCLASS: Classifier errors (001-099)
 * - EOEXPR: Expression compiler errors (001-099)
 * - EOEMIT: Emitter and sink errors (001-099)
 */

import { type CompilerDiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// SCANNER ERRORS (EOLEX001-099)
// =============================================================================

export const EOLEX001: CompilerDiagnosticDef = {
	code: 'EOLEX001',
	description:
		'This line starts with both tabs and spaces. EO needs one or the other to tell which block a line belongs to.',
	message: 'mixed tabs and spaces',
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Indent this line with {expected} only.',
}

export const EOLEX002: CompilerDiagnosticDef = {
	code: 'EOLEX002',
	description: 'A string literal has to close on the line it starts on.',
	message: 'unterminated string literal',
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Add the closing `"` before the end of the line.',
}

export const EOLEX003: CompilerDiagnosticDef = {
	code: 'EOLEX003',
	description: "When you unindent, you need to go back to a column you've used before.",
	message: "unindent to {width} doesn't match any enclosing block",
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Unindent to one of: {validLevels}.',
}

export const EOLEX004: CompilerDiagnosticDef = {
	code: 'EOLEX004',
	description: "This character isn't part of EO's syntax.",
	message: "unrecognized character '{char}'",
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Remove it, or put it inside a string literal.',
}

export const EOLEX005: CompilerDiagnosticDef = {
	code: 'EOLEX005',
	description:
		'The first indented line of this file used {expected}, so every indented line has to use {expected}.',
	message: 'expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Use {expected} here to match the rest of your file.',
}

export const EOLEX006: CompilerDiagnosticDef = {
	code: 'EOLEX006',
	description: 'Only \\" \\\\ \\n \\r and \\t are recognized inside a string literal.',
	message: "unknown escape sequence '{sequence}'",
	severity: DiagnosticSeverity.Error,
	stage: 'lex',
	suggestion: 'Write \\\\ for a literal backslash.',
}

// =============================================================================
// PARSER ERRORS (EOPARSE001-099)
// =============================================================================

export const EOPARSE001: CompilerDiagnosticDef = {
	code: 'EOPARSE001',
	description: "The compiler couldn't match this part of the file to any EO declaration.",
	message: 'syntax error: {detail}',
	severity: DiagnosticSeverity.Error,
	stage: 'parse',
	suggestion: 'A declaration looks like `object name as Contract:` followed by indented members.',
}

export const EOPARSE002: CompilerDiagnosticDef = {
	code: 'EOPARSE002',
	description: 'Each level of call nesting takes parser stack space, so nesting depth is capped.',
	message: 'calls nested deeper than {limit} levels',
	severity: DiagnosticSeverity.Error,
	stage: 'parse',
	suggestion: 'Move an inner call into its own method and call that method by name.',
}

// =============================================================================
// CLASSIFIER ERRORS (EOCLASS001-099)
// =============================================================================

export const EOCLASS001: CompilerDiagnosticDef = {
	code: 'EOCLASS001',
	description: 'Each declaration becomes its own Java type, so names must be unique in a file.',
	message: "duplicate declaration '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Rename one of them; '{name}' was first declared on line {line}.",
}

export const EOCLASS002: CompilerDiagnosticDef = {
	code: 'EOCLASS002',
	description: 'Names in the "as" clause become the implements list of the Java type.',
	message: "'{interface}' is not a valid interface name in '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: 'Use a plain identifier: letters, digits and underscores.',
}

export const EOCLASS003: CompilerDiagnosticDef = {
	code: 'EOCLASS003',
	description: 'A type can implement an interface only once.',
	message: "interface '{interface}' is listed twice in '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Remove the second '{interface}'.",
}

export const EOCLASS004: CompilerDiagnosticDef = {
	code: 'EOCLASS004',
	description: 'Attributes and methods of one declaration share a single namespace.',
	message: "duplicate member '{member}' in '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Rename one of the members called '{member}'.",
}

export const EOCLASS005: CompilerDiagnosticDef = {
	code: 'EOCLASS005',
	description: 'Parameter names of a method must be distinct.',
	message: "duplicate parameter '{param}' in '{name}.{method}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Rename one of the parameters called '{param}'.",
}

export const EOCLASS006: CompilerDiagnosticDef = {
	code: 'EOCLASS006',
	description:
		'Defaults are filled in from the right, so only the trailing slots of a parameter list may carry one.',
	message: "'{slot}' has no default but follows defaulted '{defaulted}' in {where}",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Give '{slot}' a default, or move it before '{defaulted}'.",
}

export const EOCLASS007: CompilerDiagnosticDef = {
	code: 'EOCLASS007',
	description: 'An interface only declares method signatures; it cannot hold attributes.',
	message: "attribute '{member}' is not allowed in interface '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: 'Declare it as a method `{type} {member}()`, or mark it as stored with `@{member}`.',
}

export const EOCLASS008: CompilerDiagnosticDef = {
	code: 'EOCLASS008',
	description: 'Every member of a class needs a value: a stored attribute or a method body.',
	message: "abstract attribute '{member}' in class '{name}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: 'Mark it as stored with `{type} @{member}`.',
}

export const EOCLASS009: CompilerDiagnosticDef = {
	code: 'EOCLASS009',
	description:
		'Methods of one declaration either all have bodies (a class) or none do (an interface).',
	message: "'{name}' mixes abstract method '{abstract}' with concrete method '{concrete}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Give '{abstract}' a body, or move it to an interface.",
}

export const EOCLASS010: CompilerDiagnosticDef = {
	code: 'EOCLASS010',
	description:
		'A stored attribute makes this declaration a class, but a class cannot declare a method without a body.',
	message: "'{name}' declares abstract method '{abstract}' next to stored attribute '{attribute}'",
	severity: DiagnosticSeverity.Error,
	stage: 'classify',
	suggestion: "Give '{abstract}' a body, or move it to an interface.",
}

// =============================================================================
// EXPRESSION COMPILER ERRORS (EOEXPR001-099)
// =============================================================================

export const EOEXPR001: CompilerDiagnosticDef = {
	code: 'EOEXPR001',
	description: 'Every call compiles to an object construction, which needs a type name.',
	message: 'call without a name',
	severity: DiagnosticSeverity.Error,
	stage: 'expression',
	suggestion: 'This is a compiler bug: the parser should never produce an unnamed call.',
}

export const EOEXPR002: CompilerDiagnosticDef = {
	code: 'EOEXPR002',
	description:
		'Numbers are written as digits with an optional sign and fraction, and whole numbers must fit in a Java long.',
	message: "malformed number literal '{text}'",
	severity: DiagnosticSeverity.Error,
	stage: 'expression',
	suggestion: 'Write the number as `42`, `-7` or `3.14`, within -9223372036854775808 and 9223372036854775807.',
}

export const EOEXPR003: CompilerDiagnosticDef = {
	code: 'EOEXPR003',
	description:
		'A default is computed where its slot is omitted, so it can only use the slots that are still passed in.',
	message: "default value of '{slot}' refers to '{name}', which is not passed in there",
	severity: DiagnosticSeverity.Error,
	stage: 'expression',
	suggestion: "Refer only to slots declared before '{slot}' that have no default.",
}

// =============================================================================
// EMITTER ERRORS (EOEMIT001-099)
// =============================================================================

export const EOEMIT001: CompilerDiagnosticDef = {
	code: 'EOEMIT001',
	description: "The compiled text couldn't be written to its output.",
	message: "cannot write '{name}': {reason}",
	severity: DiagnosticSeverity.Error,
	stage: 'emit',
	suggestion: 'Check that the output location exists and is writable.',
}

export const EOEMIT002: CompilerDiagnosticDef = {
	code: 'EOEMIT002',
	description: 'A single output sink holds exactly one Java type.',
	message: 'a single sink cannot receive {count} declarations',
	severity: DiagnosticSeverity.Error,
	stage: 'emit',
	suggestion: 'Compile into a directory, or pass a resolver that maps each name to its own sink.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all compiler diagnostics.
 */
export const COMPILER_DIAGNOSTICS = {
	// Classifier errors
	EOCLASS001,
	EOCLASS002,
	EOCLASS003,
	EOCLASS004,
	EOCLASS005,
	EOCLASS006,
	EOCLASS007,
	EOCLASS008,
	EOCLASS009,
	EOCLASS010,
	// Emitter errors
	EOEMIT001,
	EOEMIT002,
	// Expression compiler errors
	EOEXPR001,
	EOEXPR002,
	EOEXPR003,
	// Scanner errors
	EOLEX001,
	EOLEX002,
	EOLEX003,
	EOLEX004,
	EOLEX005,
	EOLEX006,
	// Parser errors
	EOPARSE001,
	EOPARSE002,
} as const

/**
 * All valid compiler diagnostic codes.
 */
export type CompilerDiagnosticCode = keyof typeof COMPILER_DIAGNOSTICS
