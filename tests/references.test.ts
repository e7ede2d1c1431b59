import { describe, it, expect } from 'vitest';
import { Entry, TranslatableEntry, isTranslatableEntry } from '../src/core/fluent-ast';
import { resolveComments } from '../src/core/comment-resolver';
import { parseResource } from '../src/core/fluent-parser';
import { collectReferences } from '../src/core/references';

function firstEntry(source: string): TranslatableEntry {
  const [entry] = parseResource(source).body;
  if (!isTranslatableEntry(entry)) {
    throw new Error(`Expected a message or term, got ${entry.type}`);
  }
  return entry;
}

describe('collectReferences', () => {
  it('lists variables, terms and messages in order of appearance', () => {
    const entry = firstEntry('welcome = Hello { $user }, see { -brand } and { other.title }\n');
    expect(collectReferences(entry)).toEqual(['$user', '-brand', 'other.title']);
  });

  it('reports each reference once', () => {
    expect(collectReferences(firstEntry('m = { $a } { $a } { $b }\n'))).toEqual(['$a', '$b']);
  });

  it('includes references from attributes', () => {
    expect(collectReferences(firstEntry('m = Hi\n    .title = { $name }\n'))).toEqual(['$name']);
  });

  it('collects from variants but not from the selector alone', () => {
    const entry = firstEntry('m = { $num ->\n    [one] One apple.\n   *[other] { $num } apples.\n}\n');
    expect(collectReferences(entry)).toEqual(['$num']);

    const selectorOnly = firstEntry('m = { $num ->\n    [one] One\n   *[other] Many\n}\n');
    expect(collectReferences(selectorOnly)).toEqual([]);
  });

  it('looks inside function arguments', () => {
    const entry = firstEntry('time = Time is { DATETIME($now, hour: "numeric") }\n');
    expect(collectReferences(entry)).toEqual(['$now']);
  });

  it('does not report variables used by terms', () => {
    const entry = firstEntry('-term = { $case ->\n   *[nom] Foo { -other }\n    [gen] Bar\n}\n');
    expect(collectReferences(entry)).toEqual(['-other']);
  });
});

describe('resolveComments', () => {
  const comment: Entry = { type: 'Comment', content: 'note' };
  const group: Entry = { type: 'GroupComment', content: 'group' };

  it('emits a comment followed by a non-translatable entry on its own', () => {
    const body = resolveComments([
      { entry: comment, blankLinesAfter: 0, atEnd: false },
      { entry: group, blankLinesAfter: 0, atEnd: true }
    ]);
    expect(body).toEqual([comment, group]);
  });

  it('keeps a trailing comment at the end of the resource', () => {
    expect(resolveComments([{ entry: comment, blankLinesAfter: 0, atEnd: true }])).toEqual([comment]);
  });

  it('attaches only the comment directly above the entry', () => {
    const { body } = parseResource('# first\n\n# second\nkey = v\n');
    expect(body.map(entry => entry.type)).toEqual(['Comment', 'Message']);
    expect(body[0]).toMatchObject({ content: 'first' });
    expect(body[1]).toMatchObject({ comment: { content: 'second' } });
  });
});
