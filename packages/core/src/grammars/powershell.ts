import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const powershellGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.PowerShell,
		[
			rule(/#.*$/m, TokenType.Comment, 100),
			rule(/<#[\s\S]*?#>/, TokenType.MultiLineComment, 100),
			// Here-strings
			rule(/@"[\s\S]*?"@/, TokenType.String, 95),
			rule(/@'[\s\S]*?'@/, TokenType.String, 95),
			rule(/"(?:[^"`$]|`.|\$(?:\{[^}]+\}|[\w:]+)|\$)*"/, TokenType.String, 90),
			rule(/'[^']*'/, TokenType.String, 90),
			// Approved verb, dash, noun
			rule(
				/\b(?:Add|Approve|Assert|Backup|Block|Checkpoint|Clear|Close|Compare|Complete|Compress|Confirm|Connect|ConvertFrom|ConvertTo|Copy|Debug|Deny|Disable|Disconnect|Dismount|Enable|Enter|Exit|Expand|Export|Find|Format|Get|Grant|Group|Hide|Import|Initialize|Install|Invoke|Join|Limit|Lock|Measure|Mount|Move|New|Open|Out|Pop|Protect|Publish|Push|Read|Receive|Redo|Register|Remove|Rename|Repair|Request|Reset|Resolve|Restart|Restore|Resume|Revoke|Save|Search|Select|Send|Set|Show|Sort|Split|Start|Stop|Submit|Suspend|Sync|Test|Trace|Unblock|Undo|Uninstall|Unlock|Unprotect|Unpublish|Unregister|Update|Use|Wait|Watch|Where|Write)-\w+\b/,
				TokenType.PowerShellCmdlet,
				85
			),
			rule(/\$\{[^}]+\}/, TokenType.ShellVariable, 80),
			rule(/\$[\w:]+/, TokenType.ShellVariable, 80),
			rule(/\$\?|\$\$|\$\^/, TokenType.ShellVariable, 80),
			rule(/-\w+:?/, TokenType.PowerShellParameter, 75),
			// Type literal: [string], [int[]]
			rule(/\[[\w.]+(?:\[\])?\]/, TokenType.TypeName, 70),
			rule(/0x[0-9a-fA-F]+[lL]?/, TokenType.Number, 65),
			rule(/\d+(?:\.\d+)?(?:e[+-]?\d+)?(?:d|D|l|L|kb|mb|gb|tb|pb)?/, TokenType.Number, 65),
			// Comparison operators outrank the parameter rule
			rule(
				/-(?:eq|ne|gt|ge|lt|le|like|notlike|match|notmatch|replace|contains|notcontains|in|notin|split|join|is|isnot|as|f|and|or|not|band|bor|bnot|bxor|shl|shr)\b/i,
				TokenType.Operator,
				76
			),
			rule(/[+\-*/%]=?|[<>=!]=?|&&|\|\||[&|^~]|\.\./, TokenType.Operator, 55),
			rule(/@\(|@\{|\$\(|::/, TokenType.Operator, 50),
			// Splatting
			rule(/@\w+/, TokenType.ShellVariable, 50),
			rule(/\b[a-zA-Z_]\w*\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.|]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.PowerShell)
	)
)
