import { CallArguments, Expression, Pattern, TranslatableEntry } from './fluent-ast';

/**
 * Ids an entry depends on, in order of first appearance.
 *
 * Messages and message attributes appear as `id` or `id.attr`, terms as
 * `-id`, variables as `$name`. Variables are only reported for messages:
 * the variables a term reads are supplied by its callers within the same
 * locale. A select expression contributes what its variants use; the
 * selector alone does not make a reference.
 */
export function collectReferences(entry: TranslatableEntry): string[] {
  const found = new Set<string>();
  const includeVariables = entry.type === 'Message';

  const visitArguments = (args: CallArguments): void => {
    for (const argument of args.positional) {
      visitExpression(argument);
    }
  };

  const visitExpression = (expression: Expression): void => {
    switch (expression.type) {
      case 'MessageReference':
        found.add(
          expression.attribute === null ? expression.id.name : `${expression.id.name}.${expression.attribute.name}`
        );
        break;
      case 'TermReference':
        found.add(`-${expression.id.name}`);
        break;
      case 'VariableReference':
        if (includeVariables) {
          found.add(`$${expression.id.name}`);
        }
        break;
      case 'FunctionReference':
        visitArguments(expression.arguments);
        break;
      case 'SelectExpression':
        for (const variant of expression.variants) {
          visitPattern(variant.value);
        }
        break;
      case 'Placeable':
        visitExpression(expression.expression);
        break;
      case 'StringLiteral':
      case 'NumberLiteral':
        break;
    }
  };

  const visitPattern = (pattern: Pattern): void => {
    for (const element of pattern.elements) {
      if (element.type === 'Placeable') {
        visitExpression(element.expression);
      }
    }
  };

  if (entry.value !== null) {
    visitPattern(entry.value);
  }
  for (const attribute of entry.attributes) {
    visitPattern(attribute.value);
  }

  return [...found];
}
