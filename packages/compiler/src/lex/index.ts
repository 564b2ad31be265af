/**
 * Lexical analysis module.
 * Scans source code into a flat array of tokens.
 */

export { scan, type TokenizeResult, tokenize } from './tokenizer.ts'
