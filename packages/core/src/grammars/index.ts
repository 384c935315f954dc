/**
 * Built-in grammars, one per supported language.
 * Each is built on first request and shared afterwards.
 */

import { Language, type SupportedLanguage } from '../core/language.ts'
import type { Grammar } from '../lex/grammar.ts'
import { bashGrammar } from './bash.ts'
import { cGrammar } from './c.ts'
import { cppGrammar } from './cpp.ts'
import { csharpGrammar } from './csharp.ts'
import { cssGrammar } from './css.ts'
import { dartGrammar } from './dart.ts'
import { dockerfileGrammar } from './dockerfile.ts'
import { elixirGrammar } from './elixir.ts'
import { fsharpGrammar } from './fsharp.ts'
import { goGrammar } from './go.ts'
import { graphqlGrammar } from './graphql.ts'
import { groovyGrammar } from './groovy.ts'
import { haskellGrammar } from './haskell.ts'
import { htmlGrammar } from './html.ts'
import { javaGrammar } from './java.ts'
import { javascriptGrammar } from './javascript.ts'
import { jsonGrammar } from './json.ts'
import { kotlinGrammar } from './kotlin.ts'
import { luaGrammar } from './lua.ts'
import { markdownGrammar } from './markdown.ts'
import { objectiveCGrammar } from './objective-c.ts'
import { phpGrammar } from './php.ts'
import { powershellGrammar } from './powershell.ts'
import { pythonGrammar } from './python.ts'
import { rGrammar } from './r.ts'
import { rubyGrammar } from './ruby.ts'
import { rustGrammar } from './rust.ts'
import { scalaGrammar } from './scala.ts'
import { scssGrammar } from './scss.ts'
import { msSqlGrammar, oracleSqlGrammar } from './sql.ts'
import { swiftGrammar } from './swift.ts'
import { tomlGrammar } from './toml.ts'
import { typescriptGrammar } from './typescript.ts'
import { visualBasicGrammar } from './visual-basic.ts'
import { xmlGrammar } from './xml.ts'
import { yamlGrammar } from './yaml.ts'

const GRAMMARS = {
	[Language.Bash]: bashGrammar,
	[Language.C]: cGrammar,
	[Language.Cpp]: cppGrammar,
	[Language.CSharp]: csharpGrammar,
	[Language.Css]: cssGrammar,
	[Language.Dart]: dartGrammar,
	[Language.Dockerfile]: dockerfileGrammar,
	[Language.Elixir]: elixirGrammar,
	[Language.FSharp]: fsharpGrammar,
	[Language.Go]: goGrammar,
	[Language.GraphQL]: graphqlGrammar,
	[Language.Groovy]: groovyGrammar,
	[Language.Haskell]: haskellGrammar,
	[Language.Html]: htmlGrammar,
	[Language.Java]: javaGrammar,
	[Language.JavaScript]: javascriptGrammar,
	[Language.Json]: jsonGrammar,
	[Language.Kotlin]: kotlinGrammar,
	[Language.Lua]: luaGrammar,
	[Language.Markdown]: markdownGrammar,
	[Language.MsSql]: msSqlGrammar,
	[Language.ObjectiveC]: objectiveCGrammar,
	[Language.OracleSql]: oracleSqlGrammar,
	[Language.Php]: phpGrammar,
	[Language.PowerShell]: powershellGrammar,
	[Language.Python]: pythonGrammar,
	[Language.R]: rGrammar,
	[Language.Ruby]: rubyGrammar,
	[Language.Rust]: rustGrammar,
	[Language.Scala]: scalaGrammar,
	[Language.Scss]: scssGrammar,
	[Language.Swift]: swiftGrammar,
	[Language.Toml]: tomlGrammar,
	[Language.TypeScript]: typescriptGrammar,
	[Language.VisualBasic]: visualBasicGrammar,
	[Language.Xml]: xmlGrammar,
	[Language.Yaml]: yamlGrammar,
} satisfies Record<SupportedLanguage, () => Grammar>

export function grammarFor(language: SupportedLanguage): Grammar {
	return GRAMMARS[language]()
}

