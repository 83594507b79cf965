import { describe, expect, it } from 'vitest';
import type { LexerMode } from '../../src/LexUtil';
import { Lexer } from '../../src/LexUtil';
import type { Token } from '../../src/TokenUtil';
import { createToken } from '../../src/TokenUtil';

function lex(input: string, mode: LexerMode = 'line'): Token[] {
  const lexer = new Lexer(input, mode);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.nextToken();
    tokens.push(token);
    if (token.kind === 'EndOfInput') {
      return tokens;
    }
  }
}

function kindsAndTexts(tokens: Token[]): [ string, string ][] {
  return tokens.map((token): [ string, string ] => [ token.kind, token.text ]);
}

describe('Lexer', (): void => {
  describe('in line mode', (): void => {
    it('produces positioned tokens for a quad line.', (): void => {
      expect(lex('<http://a> _:b1 "x"@en .\n')).toEqual([
        createToken('AbsoluteIri', 'http://a', 1, 1),
        createToken('BlankNodeLabel', 'b1', 1, 12),
        createToken('Literal', 'x', 1, 17),
        createToken('LanguageTag', 'en', 1, 20),
        createToken('Dot', '.', 1, 24),
        createToken('EndOfLine', '', 1, 25),
        createToken('EndOfInput', '', 2, 1),
      ]);
    });

    it('rejects escapes of lone surrogates.', (): void => {
      expect(lex('"\\uD800"')[0])
        .toEqual(createToken('Error', 'invalid escape sequence in string literal: "\\', 1, 1));
      expect(lex('<http://a/\\uDFFF>')[0])
        .toEqual(createToken('Error', 'invalid escape sequence in IRI: <http://a/\\', 1, 1));
      expect(lex('"\\U0001F600"')[0]).toEqual(createToken('Literal', '\uD83D\uDE00', 1, 1));
    });

    it('recognizes datatype markers.', (): void => {
      expect(lex('"1"^^<http://www.w3.org/2001/XMLSchema#integer>')).toEqual([
        createToken('Literal', '1', 1, 1),
        createToken('DatatypeMarker', '^^', 1, 4),
        createToken('AbsoluteIri', 'http://www.w3.org/2001/XMLSchema#integer', 1, 6),
        createToken('EndOfInput', '', 1, 48),
      ]);
    });

    it('decodes escapes in literals and IRIs.', (): void => {
      expect(kindsAndTexts(lex('"a\\tb\\u0041\\"" <http://ex/\\u00E9>'))).toEqual([
        [ 'Literal', 'a\tbA"' ],
        [ 'AbsoluteIri', 'http://ex/\u00E9' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('distinguishes relative IRIs.', (): void => {
      expect(kindsAndTexts(lex('<foo/bar>'))).toEqual([
        [ 'RelativeIri', 'foo/bar' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('skips comments but not the line ends after them.', (): void => {
      expect(lex('# comment\n\n<http://a>')).toEqual([
        createToken('EndOfLine', '', 1, 10),
        createToken('EndOfLine', '', 2, 1),
        createToken('AbsoluteIri', 'http://a', 3, 1),
        createToken('EndOfInput', '', 3, 11),
      ]);
    });

    it('treats CRLF as a single line end.', (): void => {
      expect(lex('<http://a>\r\n<http://b>')).toEqual([
        createToken('AbsoluteIri', 'http://a', 1, 1),
        createToken('EndOfLine', '', 1, 11),
        createToken('AbsoluteIri', 'http://b', 2, 1),
        createToken('EndOfInput', '', 2, 11),
      ]);
    });

    it('reports unterminated literals at their start and stops afterwards.', (): void => {
      const tokens = lex('<http://a> <http://b> "abc');
      expect(tokens).toHaveLength(4);
      expect(tokens[2]).toEqual(createToken('Error', 'unterminated string literal: "abc', 1, 23));
      expect(tokens[3].kind).toBe('EndOfInput');
    });

    it('does not allow newlines in literals.', (): void => {
      expect(lex('"ab\ncd"')[0]).toEqual(createToken('Error', 'unterminated string literal: "ab', 1, 1));
    });

    it('rejects invalid IRI characters.', (): void => {
      expect(lex('<http://a b>')[0]).toEqual(createToken('Error', 'invalid character " " in IRI: <http://a', 1, 1));
    });

    it('rejects invalid escapes.', (): void => {
      expect(lex('"a\\qb"')[0]).toEqual(createToken('Error', 'invalid escape sequence in string literal: "a\\', 1, 1));
    });

    it('rejects Turtle syntax.', (): void => {
      expect(lex('<http://a> a')[1]).toEqual(createToken('Error', 'unexpected character "a"', 1, 12));
    });

    it('does not include a trailing dot in blank node labels.', (): void => {
      expect(kindsAndTexts(lex('_:a.b.'))).toEqual([
        [ 'BlankNodeLabel', 'a.b' ],
        [ 'Dot', '.' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('counts columns in code points.', (): void => {
      expect(lex('"\u{1F600}" .')[1]).toEqual(createToken('Dot', '.', 1, 5));
    });
  });

  describe('in turtle mode', (): void => {
    it('recognizes prefix directives.', (): void => {
      expect(lex('@prefix ex: <http://example.org/> .', 'turtle')).toEqual([
        createToken('PrefixDirective', 'prefix', 1, 1),
        createToken('PrefixedName', 'ex:', 1, 9),
        createToken('AbsoluteIri', 'http://example.org/', 1, 13),
        createToken('Dot', '.', 1, 35),
        createToken('EndOfInput', '', 1, 36),
      ]);
    });

    it('recognizes SPARQL style directives.', (): void => {
      expect(kindsAndTexts(lex('PREFIX : <http://e/>\nbase <http://b/>', 'turtle'))).toEqual([
        [ 'SparqlPrefix', 'PREFIX' ],
        [ 'PrefixedName', ':' ],
        [ 'AbsoluteIri', 'http://e/' ],
        [ 'SparqlBase', 'base' ],
        [ 'AbsoluteIri', 'http://b/' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('recognizes keywords, punctuation and numbers.', (): void => {
      expect(kindsAndTexts(lex('ex:s a ex:C ; ex:p 1, -2.5, 3e1, true .', 'turtle'))).toEqual([
        [ 'PrefixedName', 'ex:s' ],
        [ 'TypeKeyword', 'a' ],
        [ 'PrefixedName', 'ex:C' ],
        [ 'Semicolon', ';' ],
        [ 'PrefixedName', 'ex:p' ],
        [ 'Integer', '1' ],
        [ 'Comma', ',' ],
        [ 'Decimal', '-2.5' ],
        [ 'Comma', ',' ],
        [ 'Double', '3e1' ],
        [ 'Comma', ',' ],
        [ 'Boolean', 'true' ],
        [ 'Dot', '.' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('ends an integer at a statement dot.', (): void => {
      expect(kindsAndTexts(lex('42.', 'turtle'))).toEqual([
        [ 'Integer', '42' ],
        [ 'Dot', '.' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('recognizes brackets and parentheses.', (): void => {
      expect(lex('[ ] ( )', 'turtle').map((token): string => token.kind)).toEqual([
        'OpenBracket',
        'CloseBracket',
        'OpenParen',
        'CloseParen',
        'EndOfInput',
      ]);
    });

    it('supports long and single quoted strings.', (): void => {
      expect(kindsAndTexts(lex('"""line1\nline "2\'"""  \'single\' ""', 'turtle'))).toEqual([
        [ 'Literal', 'line1\nline "2\'' ],
        [ 'Literal', 'single' ],
        [ 'Literal', '' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('only reads language tags after literals.', (): void => {
      expect(kindsAndTexts(lex('"chat"@fr @base', 'turtle'))).toEqual([
        [ 'Literal', 'chat' ],
        [ 'LanguageTag', 'fr' ],
        [ 'BaseDirective', 'base' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('rejects unknown directives.', (): void => {
      expect(lex('@foo', 'turtle')[0]).toEqual(createToken('Error', 'unknown directive: @foo', 1, 1));
    });

    it('keeps dots inside local names but not at the end.', (): void => {
      expect(kindsAndTexts(lex('ex:a.b.', 'turtle'))).toEqual([
        [ 'PrefixedName', 'ex:a.b' ],
        [ 'Dot', '.' ],
        [ 'EndOfInput', '' ],
      ]);
    });

    it('decodes escapes in local names.', (): void => {
      expect(lex('ex:a\\-b%20', 'turtle')[0]).toEqual(createToken('PrefixedName', 'ex:a-b%20', 1, 1));
    });

    it('treats newlines as whitespace.', (): void => {
      expect(lex('<http://a>\n  <http://b>', 'turtle')).toEqual([
        createToken('AbsoluteIri', 'http://a', 1, 1),
        createToken('AbsoluteIri', 'http://b', 2, 3),
        createToken('EndOfInput', '', 2, 13),
      ]);
    });

    it('rejects unknown names.', (): void => {
      expect(lex('foo', 'turtle')[0]).toEqual(createToken('Error', 'unexpected name: foo', 1, 1));
    });
  });
});
