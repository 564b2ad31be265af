/**
 * Classification phase between Parse and Codegen.
 */

export { type ClassifyResult, classify, deriveKind } from './classifier.ts'
