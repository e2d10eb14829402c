/**
 * Example 02: SQL Translation
 *
 * This example demonstrates:
 * - Translating a filter tree to a Drizzle SQL fragment
 * - Named parameters derived from predicate identity
 * - Observing translation through hooks
 */
import {
  and,
  FilterPredicate,
  isPathFilterError,
  translateFilter,
} from "pathfilter";
import { Book, createCatalogDictionary } from "./_helpers";

export async function main() {
  const dictionary = createCatalogDictionary();

  const filter = and(
    new FilterPredicate(dictionary.path(Book, "author.name"), "prefix", [
      "Ada_",
    ]),
    new FilterPredicate(dictionary.path(Book, "year"), "between", [1900, 1999]),
  );

  const { parameters, aliases } = translateFilter(filter, {
    hooks: {
      onPredicateTranslated: (ctx) => {
        console.log(
          `Translated ${ctx.alias}.${ctx.fieldPath} (${ctx.operator}) -> ${ctx.parameterNames.join(", ")}`,
        );
      },
    },
  });

  console.log(`\nAliases: ${aliases.join(", ")}`);
  for (const [name, value] of Object.entries(parameters)) {
    console.log(`  :${name} = ${String(value)}`);
  }

  // Collection operators have no SQL rendering
  try {
    translateFilter(
      new FilterPredicate(dictionary.path(Book, "title"), "isEmpty"),
    );
  } catch (error) {
    if (!isPathFilterError(error)) throw error;
    console.log(`\n${error.toLogString()}`);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
