/**
 * Shared helpers for examples
 *
 * Defines a small library catalog used by every example.
 */
import { z } from "zod";

import { createEntityDictionary, defineEntity } from "pathfilter";

export const Author = defineEntity("library.Author", {
  schema: z.object({
    name: z.string(),
    born: z.number().int(),
  }),
  relationships: {
    books: { target: "library.Book", cardinality: "toMany" },
  },
});

export const Book = defineEntity("library.Book", {
  schema: z.object({
    title: z.string(),
    year: z.number().int(),
    inPrint: z.boolean(),
  }),
  relationships: {
    author: { target: "library.Author", cardinality: "toOne" },
  },
});

export function createCatalogDictionary() {
  return createEntityDictionary([Author, Book]);
}
