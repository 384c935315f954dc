import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Language } from '../../src/core/language.ts'
import { countBraces, FormatterFamily, format, formatterFamily } from '../../src/format/index.ts'

describe('format', () => {
	describe('common behaviour', () => {
		it('should return empty input unchanged', () => {
			assert.strictEqual(format('', Language.CSharp), '')
		})

		it('should preserve a trailing newline', () => {
			assert.strictEqual(format('a {\nb\n}\n', Language.Java), 'a {\n    b\n}\n')
		})

		it('should not add a trailing newline', () => {
			assert.strictEqual(format('a {\nb\n}', Language.Java), 'a {\n    b\n}')
		})

		it('should normalize CRLF and CR line breaks to LF', () => {
			assert.strictEqual(format('a {\r\nb\r}', Language.C), 'a {\n    b\n}')
		})

		it('should indent with one tab per level when useSpaces is false', () => {
			assert.strictEqual(format('a {\nb {\nc\n}\n}', Language.Rust, 4, false), 'a {\n\tb {\n\t\tc\n\t}\n}')
		})

		it('should treat an indent size below 1 as 1', () => {
			assert.strictEqual(format('a {\nb\n}', Language.CSharp, 0), 'a {\n b\n}')
		})

		it('should empty whitespace-only lines', () => {
			assert.strictEqual(format('a {\n   \nb\n}', Language.Kotlin, 2), 'a {\n\n  b\n}')
		})

		it('should pass through languages without a formatter', () => {
			assert.strictEqual(format('  # Title\n', Language.Markdown), '  # Title\n')
			assert.strictEqual(format('  local x = 1', Language.Lua), '  local x = 1')
			assert.strictEqual(format(' anything ', Language.None), ' anything ')
		})
	})

	describe('scenarios', () => {
		it('should indent a C-style block body', () => {
			assert.strictEqual(format('if (x) {\nfoo();\n}', Language.CSharp), 'if (x) {\n    foo();\n}')
		})

		it('should leave canonical Python unchanged', () => {
			assert.strictEqual(format('def f():\n    return 1', Language.Python), 'def f():\n    return 1')
		})

		it('should indent a Visual Basic If body', () => {
			assert.strictEqual(
				format('If x Then\nDoSomething()\nEnd If', Language.VisualBasic),
				'If x Then\n    DoSomething()\nEnd If'
			)
		})

		it('should pretty-print compact JSON', () => {
			assert.strictEqual(
				format('{"a":1,"b":[1,2]}', Language.Json, 2),
				'{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}'
			)
		})
	})

	describe('formatterFamily', () => {
		it('should map languages to their family', () => {
			assert.strictEqual(formatterFamily(Language.TypeScript), FormatterFamily.Brace)
			assert.strictEqual(formatterFamily(Language.Go), FormatterFamily.BraceGo)
			assert.strictEqual(formatterFamily(Language.Yaml), FormatterFamily.Indentation)
			assert.strictEqual(formatterFamily(Language.OracleSql), FormatterFamily.KeywordBlock)
			assert.strictEqual(formatterFamily(Language.Xml), FormatterFamily.Markup)
			assert.strictEqual(formatterFamily(Language.Scss), FormatterFamily.BraceMarkup)
			assert.strictEqual(formatterFamily(Language.Json), FormatterFamily.Structural)
			assert.strictEqual(formatterFamily(Language.Dockerfile), FormatterFamily.Continuation)
			assert.strictEqual(formatterFamily(Language.GraphQL), FormatterFamily.PassThrough)
		})
	})

	describe('brace-counting', () => {
		it('should indent nested blocks', () => {
			const input = 'class A {\nvoid f() {\nreturn;\n}\n}'
			const expected = 'class A {\n    void f() {\n        return;\n    }\n}'
			assert.strictEqual(format(input, Language.CSharp), expected)
		})

		it('should ignore braces inside string literals', () => {
			assert.strictEqual(format('x = "{";\ny();', Language.JavaScript), 'x = "{";\ny();')
			assert.strictEqual(format("c = '{';\ny();", Language.Java), "c = '{';\ny();")
		})

		it('should ignore braces after a line comment', () => {
			assert.strictEqual(format('f(); // {\ng();', Language.TypeScript), 'f(); // {\ng();')
		})

		it('should not count braces inside a block comment', () => {
			assert.strictEqual(format('/*\n{\n*/\nx', Language.C), '/*\n{\n*/\nx')
		})

		it('should not count braces inside an open verbatim string', () => {
			const input = 'f() {\nvar s = @"\n{\n";\ng();\n}'
			const expected = 'f() {\n    var s = @"\n    {\n    ";\n    g();\n}'
			assert.strictEqual(format(input, Language.CSharp), expected)
		})

		it('should count braces after a verbatim string closes on a later line', () => {
			const input = 'class A {\nstring J = @"{\n""a"": 1\n}";\nvoid M() {\n}\n}'
			const expected = 'class A {\n    string J = @"{\n    ""a"": 1\n    }";\n    void M() {\n    }\n}'
			assert.strictEqual(format(input, Language.CSharp), expected)
		})

		it('should treat @" as a plain string outside C#', () => {
			assert.strictEqual(format('a {\nx = @"{";\n}', Language.ObjectiveC, 2), 'a {\n  x = @"{";\n}')
		})

		it('should not open a character literal at a Rust lifetime', () => {
			assert.strictEqual(format("struct S<'a> {\nx: &'a str,\n}", Language.Rust), "struct S<'a> {\n    x: &'a str,\n}")
			assert.strictEqual(format("let c = '{';\nx", Language.Rust), "let c = '{';\nx")
		})

		it('should clamp the level at zero for unbalanced closers', () => {
			assert.strictEqual(format('}\n}\nx {\ny\n}', Language.Cpp, 2), '}\n}\nx {\n  y\n}')
		})

		it('should print a leading closing bracket one level shallower', () => {
			assert.strictEqual(format('a {\nb\n] c\n}', Language.Swift, 2), 'a {\n  b\n] c\n}')
		})
	})

	describe('countBraces', () => {
		it('should count braces outside quotes', () => {
			assert.deepStrictEqual(countBraces('if (a) { b("}") }'), { close: 1, open: 1 })
		})

		it('should honour escaped quotes inside strings', () => {
			assert.deepStrictEqual(countBraces('s = "\\"{"; {'), { close: 0, open: 1 })
		})

		it('should skip lifetimes only when asked', () => {
			assert.deepStrictEqual(countBraces("struct S<'a> {", { lifetimes: true }), { close: 0, open: 1 })
			assert.deepStrictEqual(countBraces("struct S<'a> {"), { close: 0, open: 0 })
		})

		it('should skip a whole verbatim string with doubled quotes', () => {
			assert.deepStrictEqual(countBraces('s = @"a""{""b"; }', { verbatim: true }), { close: 1, open: 0 })
		})
	})

	describe('Go', () => {
		it('should not count braces inside a raw string', () => {
			const input = 'func main() {\ns := `\n{\n`\n}'
			const expected = 'func main() {\n    s := `\n    {\n    `\n}'
			assert.strictEqual(format(input, Language.Go), expected)
		})

		it('should count braces after a raw string closes on a later line', () => {
			const input = 'func f() {\ns := `{\n}`\nx()\n}'
			const expected = 'func f() {\n    s := `{\n    }`\n    x()\n}'
			assert.strictEqual(format(input, Language.Go), expected)
		})
	})

	describe('indentation-significant', () => {
		it('should convert Python indentation to tabs', () => {
			assert.strictEqual(format('def f():\n    return 1', Language.Python, 4, false), 'def f():\n\treturn 1')
		})

		it('should count a tab as indentSize columns', () => {
			assert.strictEqual(format('if x:\n\ty', Language.Python, 4), 'if x:\n    y')
		})

		it('should read YAML depth in two-column steps', () => {
			assert.strictEqual(format('a:\n  b: 1\n    c: 2', Language.Yaml, 4), 'a:\n    b: 1\n        c: 2')
		})

		it('should deepen YAML again when reformatting at a unit wider than 2', () => {
			const once = format('a:\n  b: 1', Language.Yaml, 4)
			assert.strictEqual(format(once, Language.Yaml, 4), 'a:\n        b: 1')
			assert.strictEqual(format(format('a:\n  b: 1', Language.Yaml, 2), Language.Yaml, 2), 'a:\n  b: 1')
		})
	})

	describe('Visual Basic', () => {
		it('should indent keyword blocks and outdent mid-block keywords', () => {
			const input = [
				'Public Class Foo',
				'Public Sub Bar()',
				'If x Then',
				'y = 1',
				'Else',
				'y = 2',
				'End If',
				'End Sub',
				'End Class',
			].join('\n')
			const expected = [
				'Public Class Foo',
				'    Public Sub Bar()',
				'        If x Then',
				'            y = 1',
				'        Else',
				'            y = 2',
				'        End If',
				'    End Sub',
				'End Class',
			].join('\n')
			assert.strictEqual(format(input, Language.VisualBasic), expected)
		})

		it('should not open a block for a single-line If', () => {
			assert.strictEqual(format('If x Then y = 1\nz = 2', Language.VisualBasic), 'If x Then y = 1\nz = 2')
		})

		it('should only open properties that have accessors', () => {
			const input = [
				'Class A',
				'Public Property Name As String',
				'Public ReadOnly Property Id As Integer',
				'Get',
				'Return 1',
				'End Get',
				'End Property',
				'End Class',
			].join('\n')
			const expected = [
				'Class A',
				'  Public Property Name As String',
				'  Public ReadOnly Property Id As Integer',
				'    Get',
				'      Return 1',
				'    End Get',
				'  End Property',
				'End Class',
			].join('\n')
			assert.strictEqual(format(input, Language.VisualBasic, 2), expected)
		})

		it('should not open MustOverride members', () => {
			assert.strictEqual(
				format('Public MustOverride Sub Run()\nx', Language.VisualBasic),
				'Public MustOverride Sub Run()\nx'
			)
		})

		it('should match keywords regardless of case', () => {
			assert.strictEqual(format('sub main()\nx\nend sub', Language.VisualBasic), 'sub main()\n    x\nend sub')
		})
	})

	describe('SQL', () => {
		it('should indent BEGIN ... END blocks', () => {
			assert.strictEqual(format('BEGIN\nSELECT 1\nEND', Language.MsSql), 'BEGIN\n    SELECT 1\nEND')
		})

		it('should reopen after END ELSE BEGIN', () => {
			const input = 'IF @x = 1\nBEGIN\nPRINT 1\nEND ELSE BEGIN\nPRINT 2\nEND'
			const expected = 'IF @x = 1\nBEGIN\n    PRINT 1\nEND ELSE BEGIN\n    PRINT 2\nEND'
			assert.strictEqual(format(input, Language.MsSql), expected)
		})

		it('should indent a CASE expression until its END', () => {
			const input = 'SELECT CASE\nWHEN a THEN 1\nEND AS x\nFROM t'
			const expected = 'SELECT CASE\n    WHEN a THEN 1\nEND AS x\nFROM t'
			assert.strictEqual(format(input, Language.MsSql), expected)
		})

		it('should not open a CASE closed on the same line', () => {
			const input = 'SELECT CASE WHEN a THEN 1 END\nFROM t'
			assert.strictEqual(format(input, Language.MsSql), input)
		})

		it('should not open a transaction', () => {
			const input = 'BEGIN TRANSACTION\nUPDATE t\nCOMMIT'
			assert.strictEqual(format(input, Language.MsSql), input)
		})

		it('should indent PL/SQL IF and ELSIF branches', () => {
			const input = 'BEGIN\nIF x > 0 THEN\ny := 1;\nELSIF x < 0 THEN\ny := 2;\nELSE\ny := 0;\nEND IF;\nEND;'
			const expected = [
				'BEGIN',
				'  IF x > 0 THEN',
				'    y := 1;',
				'  ELSIF x < 0 THEN',
				'    y := 2;',
				'  ELSE',
				'    y := 0;',
				'  END IF;',
				'END;',
			].join('\n')
			assert.strictEqual(format(input, Language.OracleSql, 2), expected)
		})

		it('should indent PL/SQL loops but not T-SQL ones', () => {
			const input = 'FOR i IN 1..3 LOOP\nx;\nEND LOOP;'
			assert.strictEqual(format(input, Language.OracleSql, 2), 'FOR i IN 1..3 LOOP\n  x;\nEND LOOP;')
			assert.strictEqual(format(input, Language.MsSql, 2), input)
		})
	})

	describe('Ruby', () => {
		it('should indent end-terminated blocks', () => {
			const input = 'class A\ndef f(x)\nif x\n1\nelse\n2\nend\nend\nend'
			const expected = 'class A\n  def f(x)\n    if x\n      1\n    else\n      2\n    end\n  end\nend'
			assert.strictEqual(format(input, Language.Ruby, 2), expected)
		})

		it('should open a do block with parameters', () => {
			assert.strictEqual(format('[1].each do |x|\nputs x\nend', Language.Ruby, 2), '[1].each do |x|\n  puts x\nend')
		})

		it('should open an assigned conditional', () => {
			assert.strictEqual(format('x = if y\n1\nelse\n2\nend', Language.Ruby, 2), 'x = if y\n  1\nelse\n  2\nend')
		})

		it('should not open endless methods or modifier conditionals', () => {
			assert.strictEqual(format('def sq(x) = x * x\nsq(2)', Language.Ruby), 'def sq(x) = x * x\nsq(2)')
			assert.strictEqual(format('return 1 if x\ny', Language.Ruby), 'return 1 if x\ny')
		})

		it('should ignore comment lines', () => {
			assert.strictEqual(format('# if x\ny', Language.Ruby), '# if x\ny')
		})
	})

	describe('Bash', () => {
		it('should indent if blocks with else', () => {
			const input = 'if [ -f x ]; then\necho a\nelse\necho b\nfi'
			const expected = 'if [ -f x ]; then\n  echo a\nelse\n  echo b\nfi'
			assert.strictEqual(format(input, Language.Bash, 2), expected)
		})

		it('should indent case items and their bodies', () => {
			const input = 'case $1 in\nstart)\nrun\n;;\nstop) halt ;;\nesac'
			const expected = 'case $1 in\n  start)\n    run\n    ;;\n  stop) halt ;;\nesac'
			assert.strictEqual(format(input, Language.Bash, 2), expected)
		})

		it('should indent bracket-class case patterns inside a function', () => {
			const input = 'f() {\ncase "$a" in\n[yY]|[yY][eE][sS])\necho yes\n;;\n*)\necho no\n;;\nesac\necho after\n}'
			const expected =
				'f() {\n    case "$a" in\n        [yY]|[yY][eE][sS])\n            echo yes\n            ;;\n        *)\n            echo no\n            ;;\n    esac\n    echo after\n}'
			assert.strictEqual(format(input, Language.Bash), expected)
		})

		it('should indent a quoted variable case pattern', () => {
			const input = 'case $x in\n"$X")\nrun\n;;\nesac\ny'
			assert.strictEqual(format(input, Language.Bash, 2), 'case $x in\n  "$X")\n    run\n    ;;\nesac\ny')
		})

		it('should not dedent on ;; when no case item was opened', () => {
			const input = 'case $x in\n$(cmd))\nrun\n;;\nesac\ny'
			assert.strictEqual(format(input, Language.Bash, 2), 'case $x in\n  $(cmd))\n  run\n  ;;\nesac\ny')
		})

		it('should close an item left open at esac', () => {
			const input = 'case $x in\na)\nrun\nesac\ny'
			assert.strictEqual(format(input, Language.Bash, 2), 'case $x in\n  a)\n    run\nesac\ny')
		})

		it('should not treat a line ending in ) outside a case as a pattern', () => {
			assert.strictEqual(format('x=$(f)\ny', Language.Bash, 2), 'x=$(f)\ny')
			assert.strictEqual(format('echo done)\ny', Language.Bash, 2), 'echo done)\ny')
		})

		it('should indent loops and function bodies', () => {
			assert.strictEqual(format('while true; do\nx\ndone', Language.Bash, 2), 'while true; do\n  x\ndone')
			assert.strictEqual(format('f() {\necho\n}', Language.Bash, 2), 'f() {\n  echo\n}')
		})
	})

	describe('PowerShell', () => {
		it('should indent brace blocks with a trailing else', () => {
			const input = 'function F {\nif ($x) {\na\n}\nelse {\nb\n}\n}'
			const expected = 'function F {\n    if ($x) {\n        a\n    }\n    else {\n        b\n    }\n}'
			assert.strictEqual(format(input, Language.PowerShell), expected)
		})

		it('should ignore comment lines', () => {
			assert.strictEqual(format('# {\nx', Language.PowerShell), '# {\nx')
		})
	})

	describe('HTML', () => {
		it('should indent block elements', () => {
			const input = '<div>\n<p>hi</p>\n<ul>\n<li>a</li>\n</ul>\n</div>'
			const expected = '<div>\n  <p>hi</p>\n  <ul>\n    <li>a</li>\n  </ul>\n</div>'
			assert.strictEqual(format(input, Language.Html, 2), expected)
		})

		it('should not indent after void or inline elements', () => {
			const input = '<div>\n<br>\n<span>\nx\n</span>\n</div>'
			const expected = '<div>\n  <br>\n  <span>\n  x\n  </span>\n</div>'
			assert.strictEqual(format(input, Language.Html, 2), expected)
		})

		it('should match closing tags regardless of case', () => {
			assert.strictEqual(format('<DIV>\n<p>x</P>\n</div>', Language.Html, 2), '<DIV>\n  <p>x</P>\n</div>')
		})

		it('should not indent after a doctype', () => {
			const input = '<!DOCTYPE html>\n<html>\n<body>\n</body>\n</html>'
			const expected = '<!DOCTYPE html>\n<html>\n  <body>\n  </body>\n</html>'
			assert.strictEqual(format(input, Language.Html, 2), expected)
		})
	})

	describe('XML', () => {
		it('should indent elements and skip prologs and self-closing tags', () => {
			const input = [
				'<?xml version="1.0"?>',
				'<root>',
				'<item id="1"/>',
				'<ns:item>text</ns:item>',
				'<group>',
				'</group>',
				'</root>',
			].join('\n')
			const expected = [
				'<?xml version="1.0"?>',
				'<root>',
				'  <item id="1"/>',
				'  <ns:item>text</ns:item>',
				'  <group>',
				'  </group>',
				'</root>',
			].join('\n')
			assert.strictEqual(format(input, Language.Xml, 2), expected)
		})
	})

	describe('CSS', () => {
		it('should indent rule blocks and nested at-rules', () => {
			const input = 'a {\ncolor: red;\n}\n@media print {\nb { x: y; }\n}'
			const expected = 'a {\n  color: red;\n}\n@media print {\n  b { x: y; }\n}'
			assert.strictEqual(format(input, Language.Css, 2), expected)
		})
	})

	describe('JSON', () => {
		it('should re-print objects and arrays', () => {
			const expected = '{\n  "a": 1,\n  "b": [\n    true,\n    null\n  ],\n  "c": {}\n}'
			assert.strictEqual(format('{"a":1,"b":[true,null],"c":{}}', Language.Json, 2), expected)
		})

		it('should drop whitespace outside strings only', () => {
			assert.strictEqual(format('{ "k" : "a b,{" }', Language.Json, 2), '{\n  "k": "a b,{"\n}')
		})

		it('should keep escaped quotes inside strings', () => {
			assert.strictEqual(format('["a\\"b"]', Language.Json, 2), '[\n  "a\\"b"\n]')
		})

		it('should keep empty containers compact', () => {
			assert.strictEqual(format('[ ]', Language.Json), '[]')
		})
	})

	describe('Dockerfile', () => {
		it('should indent continuation lines by one unit', () => {
			const input = 'FROM node\nRUN a && \\\nb\n\nCMD x'
			const expected = 'FROM node\nRUN a && \\\n    b\n\nCMD x'
			assert.strictEqual(format(input, Language.Dockerfile), expected)
		})

		it('should end a continuation at a blank line', () => {
			assert.strictEqual(format('RUN a \\\n\nb', Language.Dockerfile), 'RUN a \\\n\nb')
		})
	})
})
