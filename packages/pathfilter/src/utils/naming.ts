/**
 * Naming helpers for aliases and presentation.
 */
import { type TypeIdentifier } from "../core/types";

const NON_IDENTIFIER_CHARACTERS = /[^A-Za-z0-9_]/g;

/**
 * Segment after the last "." of a type name.
 *
 * @example
 * simpleTypeName({ name: "library.Book" }) // "Book"
 */
export function simpleTypeName(type: TypeIdentifier): string {
  const index = type.name.lastIndexOf(".");
  return index === -1 ? type.name : type.name.slice(index + 1);
}

/**
 * Alias for a type that is safe to embed in generated query text.
 *
 * @example
 * typeAlias({ name: "library.Book" }) // "library_Book"
 */
export function typeAlias(type: TypeIdentifier): string {
  return type.name.replace(NON_IDENTIFIER_CHARACTERS, "_");
}

/**
 * Lower-cases the first character.
 */
export function uncapitalize(value: string): string {
  if (value === "") return value;
  return value.charAt(0).toLowerCase() + value.slice(1);
}
