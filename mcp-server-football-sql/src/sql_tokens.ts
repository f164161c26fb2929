/**
 * SQL Tokenizer and Lexer
 *
 * Two passes:
 * 1. tokenizeSQL: state machine that separates code from single-quoted
 *    strings, quoted identifiers, dollar-quoted bodies and comments
 * 2. lexSQL: splits code into words, numbers and symbols, keeps strings and
 *    quoted identifiers as single lexemes and drops comments
 *
 * Keyword checks run on lexemes only, so "JOIN" inside a string or comment
 * never counts.
 */

export enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

/** Scan a quoted run starting at `start`, where a doubled quote escapes itself */
function scanQuoted(sql: string, start: number, quote: string): number {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return i
}

/**
 * Tokenize SQL. Unterminated strings and comments run to the end of input.
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	const len = sql.length
	let i = 0

	const push = (type: TokenType, start: number, end: number) => {
		tokens.push({ type, value: sql.substring(start, end), start, end })
	}

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""
		const start = i

		if (char === "-" && next === "-") {
			while (i < len && sql[i] !== "\n") i++
			push(TokenType.LINE_COMMENT, start, i)
			continue
		}

		if (char === "/" && next === "*") {
			const close = sql.indexOf("*/", i + 2)
			i = close === -1 ? len : close + 2
			push(TokenType.BLOCK_COMMENT, start, i)
			continue
		}

		if (char === "'") {
			i = scanQuoted(sql, i, "'")
			push(TokenType.SINGLE_QUOTE, start, i)
			continue
		}

		if (char === '"') {
			i = scanQuoted(sql, i, '"')
			push(TokenType.DOUBLE_QUOTE, start, i)
			continue
		}

		// $tag$ ... $tag$ (tag may be empty)
		if (char === "$") {
			const tagMatch = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.substring(i))
			if (tagMatch) {
				const delim = tagMatch[0]
				const close = sql.indexOf(delim, i + delim.length)
				i = close === -1 ? len : close + delim.length
				push(TokenType.DOLLAR_QUOTE, start, i)
				continue
			}
		}

		// Code runs until the next character that may open a string or comment
		i++
		while (i < len) {
			const c = sql[i]
			if (c === "'" || c === '"' || c === "$") break
			if ((c === "-" && sql[i + 1] === "-") || (c === "/" && sql[i + 1] === "*")) break
			i++
		}
		push(TokenType.NORMAL, start, i)
	}

	return tokens
}

// ============================================================================
// Lexemes
// ============================================================================

export type LexemeKind = "word" | "quoted" | "number" | "string" | "symbol"

export interface Lexeme {
	kind: LexemeKind
	/** Words are lower-cased (Postgres folds unquoted names); quoted identifiers are unescaped */
	value: string
	start: number
}

const CODE_PATTERN = /\s+|([A-Za-z_][A-Za-z0-9_$]*)|(\d+(?:\.\d+)?)|(::|<=|>=|<>|!=|\|\|)|([^\s])/g

export function lexSQL(sql: string): Lexeme[] {
	const lexemes: Lexeme[] = []

	for (const token of tokenizeSQL(sql)) {
		switch (token.type) {
			case TokenType.LINE_COMMENT:
			case TokenType.BLOCK_COMMENT:
				break
			case TokenType.SINGLE_QUOTE:
			case TokenType.DOLLAR_QUOTE:
				lexemes.push({ kind: "string", value: token.value, start: token.start })
				break
			case TokenType.DOUBLE_QUOTE:
				lexemes.push({
					kind: "quoted",
					value: token.value.replace(/^"|"$/g, "").replace(/""/g, '"'),
					start: token.start,
				})
				break
			case TokenType.NORMAL: {
				CODE_PATTERN.lastIndex = 0
				let match: RegExpExecArray | null
				while ((match = CODE_PATTERN.exec(token.value)) !== null) {
					const start = token.start + match.index
					if (match[1] !== undefined) {
						lexemes.push({ kind: "word", value: match[1].toLowerCase(), start })
					} else if (match[2] !== undefined) {
						lexemes.push({ kind: "number", value: match[2], start })
					} else if (match[3] !== undefined) {
						lexemes.push({ kind: "symbol", value: match[3], start })
					} else if (match[4] !== undefined) {
						lexemes.push({ kind: "symbol", value: match[4], start })
					}
				}
				break
			}
		}
	}

	return lexemes
}

export function isWord(lexeme: Lexeme | undefined, ...words: string[]): boolean {
	return lexeme !== undefined && lexeme.kind === "word" && words.includes(lexeme.value)
}

export function isSymbol(lexeme: Lexeme | undefined, symbol: string): boolean {
	return lexeme !== undefined && lexeme.kind === "symbol" && lexeme.value === symbol
}

/**
 * Paren structure of a lexeme list.
 * depth[i]: number of parens enclosing lexeme i (a paren counts at its outer depth)
 * partner[i]: index of the matching paren, or -1
 * queryScope[i]: whether the innermost enclosing paren opens a subquery
 *   (top level counts as a query scope)
 */
export interface ParenStructure {
	depth: number[]
	partner: number[]
	queryScope: boolean[]
	balanced: boolean
}

export function parenStructure(lexemes: readonly Lexeme[]): ParenStructure {
	const depth: number[] = []
	const partner: number[] = new Array<number>(lexemes.length).fill(-1)
	const queryScope: boolean[] = []
	const stack: { index: number; query: boolean }[] = []
	let balanced = true

	lexemes.forEach((lex, i) => {
		if (isSymbol(lex, ")")) {
			const open = stack.pop()
			if (open) {
				partner[i] = open.index
				partner[open.index] = i
			} else {
				balanced = false
			}
		}
		const top = stack[stack.length - 1]
		depth.push(stack.length)
		queryScope.push(top ? top.query : true)
		if (isSymbol(lex, "(")) {
			stack.push({ index: i, query: isWord(lexemes[i + 1], "select", "with", "values") })
		}
	})

	if (stack.length > 0) balanced = false
	return { depth, partner, queryScope, balanced }
}
