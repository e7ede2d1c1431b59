import { describe, it, expect } from 'vitest';
import { FluentParseError } from '../src/core/errors';
import { parseFluent, parseResource } from '../src/core/fluent-parser';

describe('parseResource', () => {
  it('parses a simple message', () => {
    const { body } = parseResource('key = Value\n');
    expect(body).toHaveLength(1);
    expect(body[0]).toMatchObject({
      type: 'Message',
      id: { name: 'key' },
      value: { elements: [{ type: 'TextElement', value: 'Value' }] },
      attributes: [],
      comment: null
    });
  });

  it('parses terms with attributes', () => {
    const { body } = parseResource('-brand = Firefox\n    .gender = masculine\n');
    expect(body[0]).toMatchObject({
      type: 'Term',
      id: { name: 'brand' },
      value: { elements: [{ type: 'TextElement', value: 'Firefox' }] },
      attributes: [{ id: { name: 'gender' }, value: { elements: [{ type: 'TextElement', value: 'masculine' }] } }]
    });
  });

  it('parses messages with attributes and no value', () => {
    const { body } = parseResource('login =\n    .placeholder = Email\n');
    expect(body[0]).toMatchObject({ type: 'Message', value: null, attributes: [{ id: { name: 'placeholder' } }] });
  });

  it('removes the common indent of block values', () => {
    const { body } = parseResource('m =\n    line 1\n      line 2\n');
    expect(body[0]).toMatchObject({
      value: { elements: [{ type: 'TextElement', value: 'line 1\n  line 2' }] }
    });
  });

  it('normalises CRLF input', () => {
    const { body } = parseResource('key = Value\r\nother = Thing\r\n');
    expect(body.map(entry => entry.type)).toEqual(['Message', 'Message']);
    expect(body[0]).toMatchObject({ value: { elements: [{ value: 'Value' }] } });
  });

  it('parses select expressions and marks the default variant', () => {
    const { body } = parseResource(
      'emails = { $count ->\n    [one] One email\n   *[other] { $count } emails\n}\n'
    );
    expect(body[0]).toMatchObject({
      value: {
        elements: [
          {
            type: 'Placeable',
            expression: {
              type: 'SelectExpression',
              selector: { type: 'VariableReference', id: { name: 'count' } },
              variants: [
                { key: { type: 'Identifier', name: 'one' }, default: false },
                {
                  key: { type: 'Identifier', name: 'other' },
                  default: true,
                  value: {
                    elements: [
                      { type: 'Placeable', expression: { type: 'VariableReference' } },
                      { type: 'TextElement', value: ' emails' }
                    ]
                  }
                }
              ]
            }
          }
        ]
      }
    });
  });

  it('parses function calls with positional and named arguments', () => {
    const { body } = parseResource('time = { DATETIME($now, hour: "numeric") }\n');
    expect(body[0]).toMatchObject({
      value: {
        elements: [
          {
            expression: {
              type: 'FunctionReference',
              id: { name: 'DATETIME' },
              arguments: {
                positional: [{ type: 'VariableReference', id: { name: 'now' } }],
                named: [{ name: { name: 'hour' }, value: { type: 'StringLiteral', value: 'numeric' } }]
              }
            }
          }
        ]
      }
    });
  });

  it('attaches a comment directly above a message', () => {
    const { body } = parseResource('# Comment\nkey = Value\n');
    expect(body).toHaveLength(1);
    expect(body[0]).toMatchObject({ type: 'Message', comment: { type: 'Comment', content: 'Comment' } });
  });

  it('keeps a comment separated by a blank line standalone', () => {
    const { body } = parseResource('# Standalone\n\nkey = Value\n');
    expect(body.map(entry => entry.type)).toEqual(['Comment', 'Message']);
    expect(body[1]).toMatchObject({ comment: null });
  });

  it('reads group and resource comments', () => {
    const { body } = parseResource('### Resource\n\n## Group\n## more\n\nkey = v\n');
    expect(body[0]).toEqual({ type: 'ResourceComment', content: 'Resource', span: { start: 0, end: 12 } });
    expect(body[1]).toMatchObject({ type: 'GroupComment', content: 'Group\nmore' });
  });

  it('turns an unparseable line into junk and carries on', () => {
    const { body } = parseResource('key = ok\n= broken\nother = fine\n');
    expect(body.map(entry => entry.type)).toEqual(['Message', 'Junk', 'Message']);
    expect(body[1]).toMatchObject({
      content: '= broken\n',
      annotations: [{ code: 'E0002', position: 9 }]
    });
  });

  it('points a missing default variant at the opening brace of the select', () => {
    const { body } = parseResource('key = { $n ->\n    [one] One\n}\n');
    expect(body).toHaveLength(1);
    expect(body[0]).toMatchObject({
      type: 'Junk',
      annotations: [{ code: 'E0010', position: 6 }]
    });
  });

  it('points a term without value at its equals sign', () => {
    const { body } = parseResource('-my-term =\n    .first = First\n');
    expect(body[0]).toMatchObject({
      type: 'Junk',
      annotations: [{ code: 'E0006', position: 9, message: 'Expected term "-my-term" to have a value' }]
    });
  });
});

describe('parseFluent', () => {
  it('returns the resource when every entry parses', () => {
    expect(parseFluent('a = 1\nb = 2\n').body).toHaveLength(2);
  });

  it('throws with the first junk line and every problem', () => {
    let caught: unknown;
    try {
      parseFluent('message = hello\n# break\n.floating-attribute = yellow\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FluentParseError);
    if (caught instanceof FluentParseError) {
      expect(caught.problems).toEqual([
        {
          code: 'E0002',
          message: 'Expected an entry start',
          line: 3,
          column: 1,
          snippet: '.floating-attribute = yellow'
        }
      ]);
      expect(caught.message).toBe(
        'Parsing error for fluent source: .floating-attribute = yellow…\nE0002: Expected an entry start [line 3, column 1]'
      );
    }
  });

  it('refuses select expressions with two default variants', () => {
    expect(() => parseFluent('m = { $x ->\n   *[a] A\n   *[b] B\n}\n')).toThrow(
      /E0015: Only one variant can be marked as default \(\*\)/
    );
  });

  it('quotes the raw line when the junk is only whitespace', () => {
    expect(() => parseFluent('\t\n')).toThrow(
      'Parsing error for fluent source: \t…\nE0002: Expected an entry start [line 1, column 1]'
    );
  });

  it('reports the term line as the snippet', () => {
    expect(() => parseFluent('-my-term =\n    .first = First\n')).toThrow(
      'Parsing error for fluent source: -my-term =…\nE0006: Expected term "-my-term" to have a value [line 1, column 10]'
    );
  });
});
