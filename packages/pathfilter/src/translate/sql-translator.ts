/**
 * SQL translation of filter trees.
 *
 * Renders a tree to a Drizzle SQL fragment suitable for a WHERE clause.
 * Columns are referenced as `<alias>.<field>` using each predicate's join
 * alias, and values are bound through named placeholders taken from the
 * predicate's parameter names, so one fragment can be prepared once and
 * executed with `parameters`.
 */
import { type Placeholder, type SQL, sql } from "drizzle-orm";
import { z } from "zod";

import { UnsupportedPredicateError } from "../errors/index";
import { validateOptions } from "../errors/validation";
import { assertArity, valuesEqual } from "../filter/contextualize";
import {
  type FilterExpression,
  type FilterExpressionVisitor,
} from "../filter/expression";
import { type MatchingOperator, type Operator } from "../filter/operator";
import {
  escapeSpecialCharacter,
  type FilterPredicate,
  type NamedParameter,
} from "../filter/predicate";
import { canonicalJson } from "../utils/hash";

// ============================================================
// Options
// ============================================================

const RESERVED_ESCAPE_CHARACTERS = new Set(["'", "%", "_"]);

const translatorConfigSchema = z.object({
  /**
   * Character escaping LIKE wildcards in matching patterns. Letters are
   * rejected: insensitive patterns pass through LOWER(), which would no
   * longer match the ESCAPE clause.
   */
  escapeCharacter: z
    .string()
    .length(1)
    .refine((character) => !RESERVED_ESCAPE_CHARACTERS.has(character), {
      message: "The escape character cannot be a quote or a LIKE wildcard",
    })
    .refine(
      (character) => character.toLowerCase() === character.toUpperCase(),
      { message: "The escape character cannot be a cased letter" },
    )
    .default("\\"),
});

/**
 * Context passed to `onPredicateTranslated`.
 */
export type PredicateTranslationContext = Readonly<{
  predicate: FilterPredicate;
  alias: string;
  fieldPath: string;
  operator: Operator;
  parameterNames: readonly string[];
}>;

/**
 * Context passed to `onError`.
 */
export type TranslationErrorContext = Readonly<{
  /** The predicate being rendered when the error was raised, if any */
  predicate: FilterPredicate | undefined;
}>;

/**
 * Observability hooks for translation.
 *
 * @example
 * ```typescript
 * const hooks: TranslatorHooks = {
 *   onPredicateTranslated: (ctx) => {
 *     console.log(`${ctx.alias}.${ctx.fieldPath} ${ctx.operator}`);
 *   },
 *   onError: (ctx, error) => {
 *     console.error(`Failed on ${String(ctx.predicate)}:`, error);
 *   },
 * };
 * ```
 */
export type TranslatorHooks = Readonly<{
  /** Called after each predicate is rendered */
  onPredicateTranslated?: (ctx: PredicateTranslationContext) => void;
  /** Called before an error propagates out of translateFilter */
  onError?: (ctx: TranslationErrorContext, error: Error) => void;
}>;

export type TranslateFilterOptions = Readonly<{
  escapeCharacter?: string;
  hooks?: TranslatorHooks;
}>;

/**
 * Result of translating a filter tree.
 */
export type TranslatedFilter = Readonly<{
  /** WHERE-clause fragment with named placeholders */
  sql: SQL;
  /** Values keyed by placeholder name */
  parameters: Readonly<Record<string, unknown>>;
  /** Join aliases referenced by the fragment, in first-use order */
  aliases: readonly string[];
}>;

// ============================================================
// Rendering
// ============================================================

const VALID_IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_$]*$/i;

function assertIdentifier(
  name: string,
  label: string,
  predicate: FilterPredicate,
): void {
  if (!VALID_IDENTIFIER_PATTERN.test(name)) {
    throw new UnsupportedPredicateError(
      `${label} "${name}" is not a valid SQL identifier`,
      { predicate: predicate.toString(), [label.toLowerCase()]: name },
      {
        suggestion: `Use names that start with a letter or underscore and contain only letters, digits, underscores, or dollar signs.`,
      },
    );
  }
}

function likePattern(
  predicate: FilterPredicate,
  operator: MatchingOperator,
  escape: string,
): string {
  const escaped = escapeSpecialCharacter(
    escapeSpecialCharacter(
      predicate.escapedStringValue(escape, escape),
      "%",
      escape,
    ),
    "_",
    escape,
  );
  switch (operator) {
    case "prefix":
    case "prefixInsensitive": {
      return `${escaped}%`;
    }
    case "postfix":
    case "postfixInsensitive": {
      return `%${escaped}`;
    }
    case "infix":
    case "infixInsensitive": {
      return `%${escaped}%`;
    }
  }
}

type RenderedPredicate = Readonly<{
  sql: SQL;
  bindings: readonly NamedParameter[];
}>;

function placeholderList(parameters: readonly NamedParameter[]): SQL {
  return sql.join(
    parameters.map((parameter) => sql.placeholder(parameter.name)),
    sql.raw(", "),
  );
}

function lowerPlaceholderList(parameters: readonly NamedParameter[]): SQL {
  return sql.join(
    parameters.map(
      (parameter) => sql`LOWER(${sql.placeholder(parameter.name)})`,
    ),
    sql.raw(", "),
  );
}

function bindParameter(
  parameters: Record<string, unknown>,
  binding: NamedParameter,
  predicate: FilterPredicate,
): void {
  if (Object.hasOwn(parameters, binding.name)) {
    const bound = parameters[binding.name];
    if (
      !valuesEqual(bound, binding.value) &&
      canonicalJson(bound) !== canonicalJson(binding.value)
    ) {
      throw new UnsupportedPredicateError(
        `Parameter "${binding.name}" is already bound to a different value`,
        { predicate: predicate.toString(), parameter: binding.name },
        {
          suggestion: `Two distinct predicates produced the same parameter name. Translate them separately.`,
        },
      );
    }
    return;
  }
  parameters[binding.name] = binding.value;
}

function renderPredicate(
  predicate: FilterPredicate,
  escape: string,
): RenderedPredicate {
  const alias = predicate.alias();
  const field = predicate.field();
  assertIdentifier(alias, "Alias", predicate);
  assertIdentifier(field, "Field", predicate);
  assertArity(predicate.operator, predicate.values);

  const column = sql.raw(`${alias}.${field}`);
  const parameters = predicate.namedParameters();
  const [first, second] = parameters;
  const operator = predicate.operator;
  const namePrefix = predicate.parameterNamePrefix();

  const bound = (rendered: SQL): RenderedPredicate => ({
    sql: rendered,
    bindings: parameters,
  });
  const matching = (
    matchingOperator: MatchingOperator,
    caseInsensitive: boolean,
  ): RenderedPredicate => {
    const name = first?.name ?? namePrefix;
    const pattern = sql.placeholder(name);
    const escapeClause = sql.raw(`ESCAPE '${escape}'`);
    return {
      sql:
        caseInsensitive ?
          sql`LOWER(${column}) LIKE LOWER(${pattern}) ${escapeClause}`
        : sql`${column} LIKE ${pattern} ${escapeClause}`,
      bindings: [
        { name, value: likePattern(predicate, matchingOperator, escape) },
      ],
    };
  };
  const unsupported = (): never => {
    throw new UnsupportedPredicateError(
      `Operator "${operator}" cannot be rendered as SQL`,
      { predicate: predicate.toString(), operator },
    );
  };
  const single = (): Placeholder => sql.placeholder(first?.name ?? namePrefix);

  switch (operator) {
    case "eq": {
      return bound(sql`${column} = ${single()}`);
    }
    case "in": {
      return bound(sql`${column} IN (${placeholderList(parameters)})`);
    }
    case "notIn": {
      return bound(sql`${column} NOT IN (${placeholderList(parameters)})`);
    }
    case "inInsensitive": {
      return bound(
        sql`LOWER(${column}) IN (${lowerPlaceholderList(parameters)})`,
      );
    }
    case "notInInsensitive": {
      return bound(
        sql`LOWER(${column}) NOT IN (${lowerPlaceholderList(parameters)})`,
      );
    }
    case "prefix":
    case "postfix":
    case "infix": {
      return matching(operator, false);
    }
    case "prefixInsensitive":
    case "postfixInsensitive":
    case "infixInsensitive": {
      return matching(operator, true);
    }
    case "isNull": {
      return bound(sql`${column} IS NULL`);
    }
    case "notNull": {
      return bound(sql`${column} IS NOT NULL`);
    }
    case "lt": {
      return bound(sql`${column} < ${single()}`);
    }
    case "le": {
      return bound(sql`${column} <= ${single()}`);
    }
    case "gt": {
      return bound(sql`${column} > ${single()}`);
    }
    case "ge": {
      return bound(sql`${column} >= ${single()}`);
    }
    case "isTrue": {
      return bound(sql.raw("(1 = 1)"));
    }
    case "isFalse": {
      return bound(sql.raw("(1 = 0)"));
    }
    case "between":
    case "notBetween": {
      const lower = sql.placeholder(first?.name ?? namePrefix);
      const upper = sql.placeholder(second?.name ?? namePrefix);
      return bound(
        operator === "between" ?
          sql`${column} BETWEEN ${lower} AND ${upper}`
        : sql`${column} NOT BETWEEN ${lower} AND ${upper}`,
      );
    }
    case "isEmpty":
    case "notEmpty":
    case "hasMember":
    case "hasNoMember": {
      return unsupported();
    }
  }
}

// ============================================================
// Translation
// ============================================================

/**
 * Translates a filter tree into a SQL fragment with named placeholders.
 *
 * @throws UnsupportedPredicateError for collection operators or names that
 *   are not SQL identifiers
 * @throws OperatorArityError when a predicate's value count violates its
 *   operator's arity
 * @throws ValidationError when options are invalid
 *
 * @example
 * ```typescript
 * const { sql: where, parameters } = translateFilter(
 *   and(
 *     new FilterPredicate(dictionary.path(Book, "author.name"), "in", ["Ada"]),
 *     new FilterPredicate(dictionary.path(Book, "title"), "infixInsensitive", ["graph"]),
 *   ),
 * );
 * ```
 */
export function translateFilter(
  expression: FilterExpression,
  options: TranslateFilterOptions = {},
): TranslatedFilter {
  const config = validateOptions(
    translatorConfigSchema,
    { escapeCharacter: options.escapeCharacter },
    "translateFilter",
  );
  const hooks = options.hooks;
  const parameters: Record<string, unknown> = {};
  const aliases: string[] = [];
  let current: FilterPredicate | undefined;

  const translator: FilterExpressionVisitor<SQL> = {
    visitPredicate: (predicate) => {
      current = predicate;
      const rendered = renderPredicate(predicate, config.escapeCharacter);
      for (const binding of rendered.bindings) {
        bindParameter(parameters, binding, predicate);
      }
      const alias = predicate.alias();
      if (!aliases.includes(alias)) {
        aliases.push(alias);
      }
      hooks?.onPredicateTranslated?.({
        predicate,
        alias,
        fieldPath: predicate.fieldPath(),
        operator: predicate.operator,
        parameterNames: rendered.bindings.map((binding) => binding.name),
      });
      current = undefined;
      return rendered.sql;
    },
    visitAnd: (node) =>
      sql`(${node.left.accept(translator)} AND ${node.right.accept(translator)})`,
    visitOr: (node) =>
      sql`(${node.left.accept(translator)} OR ${node.right.accept(translator)})`,
    visitNot: (node) => sql`NOT (${node.negated.accept(translator)})`,
  };

  try {
    const fragment = expression.accept(translator);
    return { sql: fragment, parameters, aliases };
  } catch (error) {
    if (error instanceof Error) {
      hooks?.onError?.({ predicate: current }, error);
    }
    throw error;
  }
}
