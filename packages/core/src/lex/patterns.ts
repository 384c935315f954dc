/**
 * Regex fragments shared by most grammars.
 * Never sticky or global: the engine derives its own anchored copy of every rule.
 */

export const SINGLE_LINE_COMMENT = /\/\/[^\r\n]*/
export const HASH_COMMENT = /#[^\r\n]*/
export const MULTI_LINE_COMMENT = /\/\*[\s\S]*?\*\//

export const DOUBLE_QUOTED_STRING = /"(?:[^"\\]|\\.)*"/
export const SINGLE_QUOTED_STRING = /'(?:[^'\\]|\\.)*'/

export const INTEGER = /\b\d+[lLuU]?\b/
export const HEX_NUMBER = /\b0[xX][0-9a-fA-F]+[lLuU]?\b/
export const BINARY_NUMBER = /\b0[bB][01]+[lLuU]?\b/
export const FLOATING_POINT = /\b\d+\.\d+(?:[eE][+-]?\d+)?[fFdDmM]?\b/
export const SCIENTIFIC_NOTATION = /\b\d+[eE][+-]?\d+[fFdDmM]?\b/

export const IDENTIFIER = /\b[a-zA-Z_][a-zA-Z0-9_]*\b/
export const PUNCTUATION = /[(){}[\];,.]/
export const WHITESPACE = /\s+/
