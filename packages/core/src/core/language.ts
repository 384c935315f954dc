/**
 * Language identifiers.
 * A closed set: grammar lookup and formatter dispatch both switch over it exhaustively.
 */

import { basename, extname } from 'node:path'

export const Language = {
	Bash: 'bash',
	C: 'c',
	Cpp: 'cpp',
	CSharp: 'csharp',
	Css: 'css',
	Dart: 'dart',
	Dockerfile: 'dockerfile',
	Elixir: 'elixir',
	FSharp: 'fsharp',
	Go: 'go',
	GraphQL: 'graphql',
	Groovy: 'groovy',
	Haskell: 'haskell',
	Html: 'html',
	Java: 'java',
	JavaScript: 'javascript',
	Json: 'json',
	Kotlin: 'kotlin',
	Lua: 'lua',
	Markdown: 'markdown',
	MsSql: 'mssql',
	// Sentinel: tokenization disabled, formatting passes through.
	None: 'none',
	ObjectiveC: 'objective-c',
	OracleSql: 'oracle-sql',
	Php: 'php',
	PowerShell: 'powershell',
	Python: 'python',
	R: 'r',
	Ruby: 'ruby',
	Rust: 'rust',
	Scala: 'scala',
	Scss: 'scss',
	Swift: 'swift',
	Toml: 'toml',
	TypeScript: 'typescript',
	VisualBasic: 'visual-basic',
	Xml: 'xml',
	Yaml: 'yaml',
} as const

export type Language = (typeof Language)[keyof typeof Language]

/** Languages that have a grammar; everything except None. */
export type SupportedLanguage = Exclude<Language, typeof Language.None>

const ALL_LANGUAGES: readonly Language[] = Object.values(Language)

export const SUPPORTED_LANGUAGES: readonly SupportedLanguage[] = ALL_LANGUAGES.filter(
	(language): language is SupportedLanguage => language !== Language.None
)

export function isLanguage(value: string): value is Language {
	return ALL_LANGUAGES.some((language) => language === value)
}

export function isSupportedLanguage(language: Language): language is SupportedLanguage {
	return language !== Language.None
}

const ALIASES: Readonly<Record<string, Language>> = {
	'c#': Language.CSharp,
	'c++': Language.Cpp,
	'f#': Language.FSharp,
	cs: Language.CSharp,
	docker: Language.Dockerfile,
	golang: Language.Go,
	gql: Language.GraphQL,
	htm: Language.Html,
	js: Language.JavaScript,
	md: Language.Markdown,
	objc: Language.ObjectiveC,
	oracle: Language.OracleSql,
	plsql: Language.OracleSql,
	ps1: Language.PowerShell,
	py: Language.Python,
	rb: Language.Ruby,
	rs: Language.Rust,
	sh: Language.Bash,
	shell: Language.Bash,
	sql: Language.MsSql,
	tsql: Language.MsSql,
	ts: Language.TypeScript,
	vb: Language.VisualBasic,
	vbnet: Language.VisualBasic,
	yml: Language.Yaml,
	zsh: Language.Bash,
}

/**
 * Resolves a user-supplied name: an identifier, a Language key or a common alias.
 * Matching ignores case.
 */
export function parseLanguage(name: string): Language | undefined {
	const needle = name.trim().toLowerCase()
	if (isLanguage(needle)) return needle

	const alias = ALIASES[needle]
	if (alias !== undefined) return alias

	for (const [key, value] of Object.entries(Language)) {
		if (key.toLowerCase() === needle) return value
	}
	return undefined
}

const EXTENSIONS: Readonly<Record<string, SupportedLanguage>> = {
	'.bash': Language.Bash,
	'.c': Language.C,
	'.cc': Language.Cpp,
	'.cpp': Language.Cpp,
	'.cs': Language.CSharp,
	'.css': Language.Css,
	'.cxx': Language.Cpp,
	'.dart': Language.Dart,
	'.ex': Language.Elixir,
	'.exs': Language.Elixir,
	'.fs': Language.FSharp,
	'.fsi': Language.FSharp,
	'.fsx': Language.FSharp,
	'.go': Language.Go,
	'.gradle': Language.Groovy,
	'.graphql': Language.GraphQL,
	'.gql': Language.GraphQL,
	'.groovy': Language.Groovy,
	'.h': Language.C,
	'.hpp': Language.Cpp,
	'.hs': Language.Haskell,
	'.htm': Language.Html,
	'.html': Language.Html,
	'.java': Language.Java,
	'.js': Language.JavaScript,
	'.json': Language.Json,
	'.jsx': Language.JavaScript,
	'.kt': Language.Kotlin,
	'.kts': Language.Kotlin,
	'.lua': Language.Lua,
	'.m': Language.ObjectiveC,
	'.markdown': Language.Markdown,
	'.md': Language.Markdown,
	'.mjs': Language.JavaScript,
	'.mm': Language.ObjectiveC,
	'.php': Language.Php,
	'.pkb': Language.OracleSql,
	'.pks': Language.OracleSql,
	'.ps1': Language.PowerShell,
	'.psm1': Language.PowerShell,
	'.py': Language.Python,
	'.r': Language.R,
	'.rb': Language.Ruby,
	'.rs': Language.Rust,
	'.scala': Language.Scala,
	'.scss': Language.Scss,
	'.sh': Language.Bash,
	'.sql': Language.MsSql,
	'.svg': Language.Xml,
	'.swift': Language.Swift,
	'.toml': Language.Toml,
	'.ts': Language.TypeScript,
	'.tsx': Language.TypeScript,
	'.vb': Language.VisualBasic,
	'.xaml': Language.Xml,
	'.xml': Language.Xml,
	'.yaml': Language.Yaml,
	'.yml': Language.Yaml,
	'.zsh': Language.Bash,
}

const FILE_NAMES: Readonly<Record<string, SupportedLanguage>> = {
	Containerfile: Language.Dockerfile,
	Dockerfile: Language.Dockerfile,
	Gemfile: Language.Ruby,
	Jenkinsfile: Language.Groovy,
	Rakefile: Language.Ruby,
}

/**
 * Picks a language from a file path.
 * Known file names win over extensions; `Dockerfile.dev` style names count too.
 */
export function detectLanguage(path: string): Language {
	const name = basename(path)
	const byName = FILE_NAMES[name] ?? FILE_NAMES[name.split('.')[0] ?? '']
	if (byName !== undefined) return byName

	return EXTENSIONS[extname(name).toLowerCase()] ?? Language.None
}
