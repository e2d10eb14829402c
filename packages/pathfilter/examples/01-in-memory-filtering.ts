/**
 * Example 01: In-Memory Filtering
 *
 * This example demonstrates:
 * - Resolving traversal paths from entity definitions
 * - Building predicates and combining them with and/or/not
 * - Normalizing negations down to the predicates
 * - Evaluating a filter against plain objects
 */
import {
  and,
  createInMemoryFilter,
  createObjectGraphContext,
  FilterPredicate,
  normalizeFilterExpression,
  not,
  or,
} from "pathfilter";
import { Author, Book, createCatalogDictionary } from "./_helpers";

export async function main() {
  const dictionary = createCatalogDictionary();

  // ============================================================
  // Step 1: Predicates over traversal paths
  // ============================================================

  const byAuthor = new FilterPredicate(
    dictionary.path(Book, "author.name"),
    "inInsensitive",
    ["ada lovelace", "grace hopper"],
  );
  const recent = new FilterPredicate(dictionary.path(Book, "year"), "ge", [
    1950,
  ]);
  const inPrint = new FilterPredicate(dictionary.path(Book, "inPrint"), "in", [
    true,
  ]);

  console.log(`Predicate: ${byAuthor.toString()}`);
  console.log(`  alias: ${byAuthor.alias()}`);
  console.log(`  parameter: ${byAuthor.parameterNamePrefix()}`);

  // ============================================================
  // Step 2: Normalize negations
  // ============================================================

  const filter = normalizeFilterExpression(
    and(byAuthor, not(or(recent, not(inPrint)))),
  );

  // ============================================================
  // Step 3: Evaluate against materialized entities
  // ============================================================

  const ada = { name: "Ada Lovelace" };
  const grace = { name: "Grace Hopper" };
  const books = [
    { title: "Notes", year: 1843, inPrint: true, author: ada },
    { title: "Compilers", year: 1952, inPrint: true, author: grace },
    { title: "Letters", year: 1840, inPrint: false, author: ada },
  ];
  const test = createInMemoryFilter(filter, createObjectGraphContext());

  console.log("\nMatching books:");
  for (const book of books.filter(test)) {
    console.log(`  ${book.title} (${book.year})`);
  }

  // To-many hops fan out: any reached value may satisfy a predicate
  const prolific = new FilterPredicate(
    dictionary.path(Author, "books.year"),
    "lt",
    [1845],
  );
  console.log(
    `\n${prolific.toString()} crosses to-many: ${String(prolific.crossesToMany())}`,
  );
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
