import { describe, expect, test } from 'vitest';
import { ExtractError } from '../../src/errors';
import { literalValue, parseStructure, tokenize, unquote, utf8Offsets } from '../../src/modules/hcl-scanner';

describe('tokenize', () => {
  test('should skip comments containing braces', () => {
    const tokens = tokenize('# open {\nlocals { // close }\n}\n/* { */', 'main.tf');
    expect(tokens.filter(t => t.type === 'open' || t.type === 'close').map(t => t.text)).toEqual(['{', '}']);
  });

  test('should keep interpolations with nested strings inside one token', () => {
    const tokens = tokenize('name = "${join("-", ["a", "}"])}-x"\n', 'main.tf');
    expect(tokens.map(t => t.type)).toEqual(['ident', 'assign', 'string', 'newline']);
  });

  test('should read heredocs up to the closing marker', () => {
    const source = 'policy = <<EOT\n{ "a": "}" }\nEOT\n';
    const heredoc = tokenize(source, 'main.tf').find(t => t.type === 'heredoc');
    expect(heredoc?.text).toBe('<<EOT\n{ "a": "}" }\nEOT');
  });

  test('should report unterminated constructs with their line', () => {
    expect(() => tokenize('a = 1\nb = "open\n', 'main.tf')).toThrow('main.tf:2: unterminated string');
    expect(() => tokenize('a = "${var.x\n', 'main.tf')).toThrow('unterminated template interpolation');
    expect(() => tokenize('a = <<EOT\nno end\n', 'main.tf')).toThrow('main.tf:1: unterminated heredoc <<EOT');
    expect(() => tokenize('/* never closed', 'main.tf')).toThrow('unterminated comment');
  });
});

describe('parseStructure', () => {
  test('should find attributes and nested blocks of a body', () => {
    const body = '  enabled = true\n  tags = {\n    a = "b"\n  }\n  lifecycle {\n    prevent_destroy = true\n  }\n';

    const { attributes, blocks } = parseStructure(body, 'main.tf');

    expect(attributes.map(a => [a.name, a.expression, a.line])).toEqual([
      ['enabled', 'true', 1],
      ['tags', '{\n    a = "b"\n  }', 2],
    ]);
    expect(blocks).toHaveLength(1);
    expect(blocks[0]).toMatchObject({ type: 'lifecycle', labels: [], line: 5 });
    expect(body.slice(blocks[0]?.openBrace, blocks[0]?.end)).toBe('{\n    prevent_destroy = true\n  }');
  });

  test('should offset line numbers by the first line', () => {
    const { attributes } = parseStructure('\n  name = "x"\n', 'main.tf', 10);
    expect(attributes[0]?.line).toBe(11);
  });

  test('should reject mismatched brackets', () => {
    expect(() => parseStructure('locals {\n  a = [1, 2)\n}\n', 'main.tf')).toThrow(
      "main.tf:2: unexpected ')', expected ']' to close '[' from line 2"
    );
    expect(() => parseStructure('}\n', 'main.tf')).toThrow("main.tf:1: unexpected '}'");
  });

  test('should reject unclosed blocks', () => {
    const error = (() => {
      try {
        parseStructure('resource "a" "b" {\n  name = "x"\n', 'main.tf');
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ExtractError);
    expect(error).toMatchObject({ kind: 'malformed', message: "main.tf:1: unclosed '{'" });
  });

  test('should reject attributes without a value', () => {
    expect(() => parseStructure('foo =\n', 'main.tf')).toThrow('main.tf:1: missing value for attribute "foo"');
  });
});

describe('unquote', () => {
  test('should decode escapes', () => {
    expect(unquote('"a\\nb \\"c\\" \\u00e9"')).toBe('a\nb "c" é');
    expect(unquote('"$${literal}"')).toBe('${literal}');
  });

  test('should return undefined for templates', () => {
    expect(unquote('"${var.name}-bucket"')).toBeUndefined();
    expect(unquote('"%{ if x }y%{ endif }"')).toBeUndefined();
  });
});

describe('literalValue', () => {
  test('should read plain and indented heredocs', () => {
    expect(literalValue('<<EOT\nhello\nEOT')).toBe('hello\n');
    expect(literalValue('<<-EOT\n    first\n      second\n  EOT')).toBe('first\n  second\n');
  });

  test('should return undefined for expressions', () => {
    expect(literalValue('var.region')).toBeUndefined();
    expect(literalValue('"a" + "b"')).toBeUndefined();
  });
});

describe('utf8Offsets', () => {
  test('should convert character indexes to byte offsets', () => {
    const toBytes = utf8Offsets('é€a');
    expect([toBytes(0), toBytes(1), toBytes(2), toBytes(3)]).toEqual([0, 2, 5, 6]);
  });
});
