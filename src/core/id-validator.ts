import { FluentType } from '../types';
import { InvalidIdError } from './errors';
import { IDENTIFIER_PATTERN } from './grammar';

const MESSAGE_ID = new RegExp(`^${IDENTIFIER_PATTERN}$`);
const TERM_ID = new RegExp(`^-${IDENTIFIER_PATTERN}$`);

export function isCommentType(fluentType: FluentType): boolean {
  return fluentType.endsWith('Comment');
}

/** Guess the entry type from an id: `-x` is a Term, an empty id a comment. */
export function inferFluentType(id: string): FluentType {
  if (id === '') {
    return 'DetachedComment';
  }
  return id.startsWith('-') ? 'Term' : 'Message';
}

/** Throws InvalidIdError if `id` cannot name an entry of `fluentType`. */
export function validateId(id: string, fluentType: FluentType): void {
  if (isCommentType(fluentType)) {
    if (id !== '') {
      throw new InvalidIdError(id, fluentType, 'comments do not carry an id');
    }
    return;
  }

  if (fluentType === 'Term') {
    if (!TERM_ID.test(id)) {
      throw new InvalidIdError(id, fluentType, 'expected "-" followed by a letter, then letters, digits, "_" or "-"');
    }
    return;
  }

  if (!MESSAGE_ID.test(id)) {
    throw new InvalidIdError(id, fluentType, 'expected a letter followed by letters, digits, "_" or "-"');
  }
}

export function isValidId(id: string, fluentType: FluentType): boolean {
  try {
    validateId(id, fluentType);
    return true;
  } catch (error) {
    if (error instanceof InvalidIdError) {
      return false;
    }
    throw error;
  }
}
