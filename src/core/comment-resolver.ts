import { Comment, Entry, isTranslatableEntry } from './fluent-ast';

export interface RawEntry {
  entry: Entry;
  /** Blank lines between this entry and the next one. */
  blankLinesAfter: number;
  atEnd: boolean;
}

type ResolverState = { kind: 'idle' } | { kind: 'pending'; comment: Comment };

/**
 * Attach `#` comments to the Message or Term that directly follows them.
 *
 * A comment stays pending only while nothing separates it from the next
 * entry. If that entry turns out to be anything other than a Message or
 * Term (Junk included), the comment is emitted on its own.
 */
export function resolveComments(entries: RawEntry[]): Entry[] {
  const body: Entry[] = [];
  let state: ResolverState = { kind: 'idle' };

  for (const { entry, blankLinesAfter, atEnd } of entries) {
    if (entry.type === 'Comment' && blankLinesAfter === 0 && !atEnd) {
      if (state.kind === 'pending') {
        body.push(state.comment);
      }
      state = { kind: 'pending', comment: entry };
      continue;
    }

    if (state.kind === 'pending') {
      if (isTranslatableEntry(entry)) {
        entry.comment = state.comment;
        if (entry.span !== undefined && state.comment.span !== undefined) {
          entry.span = { start: state.comment.span.start, end: entry.span.end };
        }
      } else {
        body.push(state.comment);
      }
      state = { kind: 'idle' };
    }

    body.push(entry);
  }

  if (state.kind === 'pending') {
    body.push(state.comment);
  }
  return body;
}
