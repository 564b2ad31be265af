import * as ohm from 'ohm-js'

/**
 * EO Grammar Source
 *
 * The grammar matches the scanner's token stream rendered as text, one
 * token per word:
 *   ⇥   INDENT (a block opens)
 *   ⇤   DEDENT (a block closes)
 *   ⏎   NEWLINE (a logical line ends)
 *
 * Identifiers and numbers appear verbatim, strings as double-quoted JSON
 * text, punctuation and keywords as themselves. Comments and blank lines
 * never reach the grammar.
 */
export const grammarSource = String.raw`
EO {
  Program = ObjectDecl* end

  ObjectDecl = objectKw ident AsClause? ":" nl indent Member+ dedent
  AsClause = asKw NonemptyListOf<ident, ",">

  Member = Method | Attribute

  Method = ident ident "(" ListOf<Param, ","> ")" MethodTail
  MethodTail = ":" nl indent Expr nl dedent  -- body
             | nl                            -- abstract
  Param = ident ident ParamDefault?
  ParamDefault = "=" Expr

  Attribute = ident "@" ident AttributeDefault? nl  -- stored
            | ident ident nl                        -- abstract
  AttributeDefault = ":=" Expr

  Expr = Call | literal | ident
  Call = ident "(" ListOf<Expr, ","> ")"

  // Keywords
  keyword = objectKw | asKw | trueKw | falseKw
  objectKw = "object" ~identPart
  asKw = "as" ~identPart
  trueKw = "true" ~identPart
  falseKw = "false" ~identPart

  // Names and literals
  ident (an identifier) = ~keyword identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"

  literal = stringLit | numberLit | booleanLit
  stringLit (a string) = "\"" stringChar* "\""
  stringChar = "\\" any                 -- escaped
             | ~("\"" | "\\" | "\n") any  -- plain
  numberLit (a number) = "-"? digit+ ("." digit+)?
  booleanLit (a boolean) = trueKw | falseKw

  // Layout tokens
  nl (end of line) = "⏎"
  indent (an indented block) = "⇥"
  dedent (end of block) = "⇤"
}
`

/**
 * The compiled EO grammar.
 */
export const EoGrammar = ohm.grammar(grammarSource)

/** Rendered text of the layout tokens. */
export const LAYOUT_TEXT = {
	dedent: '⇤',
	indent: '⇥',
	newline: '⏎',
} as const
