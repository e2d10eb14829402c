import { describe, expect, it, vi } from "vitest";

import {
  OperatorArityError,
  PredicateUsageError,
  UnsupportedPredicateError,
  ValidationError,
} from "../src/errors";
import {
  and,
  FilterPredicate,
  type NamedParameter,
  not,
  type Operator,
  or,
} from "../src/filter";
import { pathStep } from "../src/path";
import { translateFilter } from "../src/translate";
import { placeholderNames, toSqlString } from "./sql-test-utils";
import { Book, createTestDictionary } from "./test-utils";

const dictionary = createTestDictionary();

function onBook(
  field: string,
  operator: Operator,
  values: readonly unknown[] = [],
): FilterPredicate {
  return new FilterPredicate(dictionary.path(Book, field), operator, values);
}

/**
 * Binds every value under a fixed name, whatever its identity.
 */
class FixedNamePredicate extends FilterPredicate {
  override namedParameters(): readonly NamedParameter[] {
    return this.values.map((value, index) => ({
      name: `fixed_${index}`,
      value,
    }));
  }
}

function render(predicate: FilterPredicate): string {
  return toSqlString(translateFilter(predicate).sql);
}

describe("translateFilter", () => {
  describe("equality and membership", () => {
    it("renders eq with one placeholder", () => {
      const predicate = onBook("title", "eq", ["Dune"]);
      const base = predicate.parameterNamePrefix();
      const result = translateFilter(predicate);
      expect(toSqlString(result.sql)).toBe(`Book.title = :${base}_0`);
      expect(result.parameters).toEqual({ [`${base}_0`]: "Dune" });
    });

    it("renders in with one placeholder per value", () => {
      const predicate = onBook("author.name", "in", ["Ada", "Grace"]);
      const result = translateFilter(predicate);
      expect(toSqlString(result.sql)).toBe(
        "Book_author.name IN (:author_name_16c0d4d8_0, :author_name_16c0d4d8_1)",
      );
      expect(result.parameters).toEqual({
        author_name_16c0d4d8_0: "Ada",
        author_name_16c0d4d8_1: "Grace",
      });
    });

    it("renders notIn", () => {
      const predicate = onBook("year", "notIn", [1950]);
      expect(render(predicate)).toBe(
        `Book.year NOT IN (:${predicate.parameterNamePrefix()}_0)`,
      );
    });

    it("lowercases both sides for insensitive membership", () => {
      const predicate = onBook("author.name", "inInsensitive", ["ada", "GRACE"]);
      const base = predicate.parameterNamePrefix();
      expect(render(predicate)).toBe(
        `LOWER(Book_author.name) IN (LOWER(:${base}_0), LOWER(:${base}_1))`,
      );
      const negated = onBook("author.name", "notInInsensitive", ["ada"]);
      expect(render(negated)).toBe(
        `LOWER(Book_author.name) NOT IN (LOWER(:${negated.parameterNamePrefix()}_0))`,
      );
    });
  });

  describe("matching", () => {
    it("binds an escaped prefix pattern", () => {
      const predicate = onBook("title", "prefix", ["a\\b_c%"]);
      const name = `${predicate.parameterNamePrefix()}_0`;
      const result = translateFilter(predicate);
      expect(toSqlString(result.sql)).toBe(
        `Book.title LIKE :${name} ESCAPE '\\'`,
      );
      expect(result.parameters).toEqual({ [name]: "a\\\\b\\_c\\%%" });
    });

    it("wraps infix patterns and lowercases insensitive ones", () => {
      const predicate = onBook("title", "infixInsensitive", ["Dune"]);
      const name = `${predicate.parameterNamePrefix()}_0`;
      const result = translateFilter(predicate);
      expect(toSqlString(result.sql)).toBe(
        `LOWER(Book.title) LIKE LOWER(:${name}) ESCAPE '\\'`,
      );
      expect(result.parameters).toEqual({ [name]: "%Dune%" });
    });

    it("uses the configured escape character", () => {
      const predicate = onBook("title", "postfix", ["100%"]);
      const name = `${predicate.parameterNamePrefix()}_0`;
      const result = translateFilter(predicate, { escapeCharacter: "!" });
      expect(toSqlString(result.sql)).toBe(
        `Book.title LIKE :${name} ESCAPE '!'`,
      );
      expect(result.parameters).toEqual({ [name]: "%100!%" });
    });

    it("matches the string form of non-string values", () => {
      const predicate = onBook("year", "prefix", [19]);
      expect(translateFilter(predicate).parameters).toEqual({
        [`${predicate.parameterNamePrefix()}_0`]: "19%",
      });
    });

    it("keeps insensitive patterns escaped under LOWER()", () => {
      const predicate = onBook("title", "prefixInsensitive", ["50%"]);
      const name = `${predicate.parameterNamePrefix()}_0`;
      const result = translateFilter(predicate, { escapeCharacter: "#" });
      expect(toSqlString(result.sql)).toBe(
        `LOWER(Book.title) LIKE LOWER(:${name}) ESCAPE '#'`,
      );
      expect(result.parameters).toEqual({ [name]: "50#%%" });
    });

    it("binds the ISO form of a date", () => {
      const predicate = new FilterPredicate(
        pathStep(Book, "published"),
        "prefix",
        [new Date("2000-01-02T03:04:05.000Z")],
      );
      expect(translateFilter(predicate).parameters).toEqual({
        [`${predicate.parameterNamePrefix()}_0`]: "2000-01-02T03:04:05.000Z%",
      });
    });

    it("rejects values with no string form", () => {
      expect(() =>
        translateFilter(onBook("title", "infix", [{ text: "x" }])),
      ).toThrow(PredicateUsageError);
    });
  });

  describe("null checks and constants", () => {
    it("renders null checks without parameters", () => {
      const result = translateFilter(onBook("title", "isNull"));
      expect(toSqlString(result.sql)).toBe("Book.title IS NULL");
      expect(result.parameters).toEqual({});
      expect(render(onBook("title", "notNull"))).toBe("Book.title IS NOT NULL");
    });

    it("renders constant predicates", () => {
      expect(render(onBook("title", "isTrue"))).toBe("(1 = 1)");
      expect(render(onBook("title", "isFalse"))).toBe("(1 = 0)");
    });
  });

  describe("ordering and ranges", () => {
    it("renders comparison operators", () => {
      const cases: readonly (readonly [Operator, string])[] = [
        ["lt", "<"],
        ["le", "<="],
        ["gt", ">"],
        ["ge", ">="],
      ];
      for (const [operator, symbol] of cases) {
        const predicate = onBook("year", operator, [1950]);
        expect(render(predicate)).toBe(
          `Book.year ${symbol} :${predicate.parameterNamePrefix()}_0`,
        );
      }
    });

    it("renders between with two placeholders", () => {
      const predicate = onBook("year", "between", [1900, 2000]);
      const base = predicate.parameterNamePrefix();
      const result = translateFilter(predicate);
      expect(toSqlString(result.sql)).toBe(
        `Book.year BETWEEN :${base}_0 AND :${base}_1`,
      );
      expect(result.parameters).toEqual({
        [`${base}_0`]: 1900,
        [`${base}_1`]: 2000,
      });
    });

    it("renders notBetween", () => {
      const predicate = onBook("year", "notBetween", [1900, 2000]);
      const base = predicate.parameterNamePrefix();
      expect(render(predicate)).toBe(
        `Book.year NOT BETWEEN :${base}_0 AND :${base}_1`,
      );
    });
  });

  describe("composition", () => {
    const recent = onBook("year", "ge", [1950]);
    const byAda = onBook("author.name", "in", ["Ada"]);
    const untitled = onBook("title", "isNull");

    it("parenthesizes AND, OR and NOT", () => {
      const result = translateFilter(and(recent, or(byAda, not(untitled))));
      expect(toSqlString(result.sql)).toBe(
        `(Book.year >= :${recent.parameterNamePrefix()}_0 AND ` +
          `(Book_author.name IN (:${byAda.parameterNamePrefix()}_0) OR NOT (Book.title IS NULL)))`,
      );
    });

    it("binds exactly the parameters it renders", () => {
      const city = onBook("author.address.city", "eq", ["Paris"]);
      const result = translateFilter(or(and(recent, byAda), city));
      const names = placeholderNames(result.sql);
      expect(Object.keys(result.parameters).sort()).toEqual([...names].sort());
      expect(names).toEqual([
        `${recent.parameterNamePrefix()}_0`,
        `${byAda.parameterNamePrefix()}_0`,
        `${city.parameterNamePrefix()}_0`,
      ]);
    });

    it("lists aliases in first-use order", () => {
      const born = onBook("author.born", "lt", [1900]);
      const city = onBook("author.address.city", "eq", ["Paris"]);
      expect(translateFilter(and(byAda, recent, born, city)).aliases).toEqual([
        "Book_author",
        "Book",
        "Author_address",
      ]);
    });
  });

  describe("unsupported predicates", () => {
    it("rejects collection operators", () => {
      expect(() => translateFilter(onBook("tags", "hasMember", ["x"]))).toThrow(
        UnsupportedPredicateError,
      );
      expect(() => translateFilter(onBook("tags", "isEmpty"))).toThrow(
        'Operator "isEmpty" cannot be rendered as SQL',
      );
    });

    it("rejects fields that are not SQL identifiers", () => {
      const predicate = new FilterPredicate(pathStep(Book, "first name"), "eq", [
        "x",
      ]);
      expect(() => translateFilter(predicate)).toThrow(
        'Field "first name" is not a valid SQL identifier',
      );
    });

    it("rejects aliases that are not SQL identifiers", () => {
      const predicate = new FilterPredicate(
        pathStep({ name: "9Lives" }, "name"),
        "eq",
        ["x"],
      );
      expect(() => translateFilter(predicate)).toThrow(
        'Alias "9Lives" is not a valid SQL identifier',
      );
    });

    it("checks arity", () => {
      expect(() => translateFilter(onBook("year", "between", [1900]))).toThrow(
        OperatorArityError,
      );
    });
  });

  describe("options", () => {
    it("rejects escape characters that are not a single character", () => {
      expect(() =>
        translateFilter(onBook("title", "isNull"), { escapeCharacter: "ab" }),
      ).toThrow(ValidationError);
    });

    it("rejects a single quote as escape character", () => {
      expect(() =>
        translateFilter(onBook("title", "isNull"), { escapeCharacter: "'" }),
      ).toThrow(ValidationError);
    });

    it("rejects LIKE wildcards as escape character", () => {
      for (const escapeCharacter of ["%", "_"]) {
        expect(() =>
          translateFilter(onBook("title", "isNull"), { escapeCharacter }),
        ).toThrow(ValidationError);
      }
    });

    it("rejects cased letters as escape character", () => {
      for (const escapeCharacter of ["E", "e", "É"]) {
        expect(() =>
          translateFilter(onBook("title", "infixInsensitive", ["50%"]), {
            escapeCharacter,
          }),
        ).toThrow(ValidationError);
      }
    });

    it("accepts digits and symbols as escape character", () => {
      for (const escapeCharacter of ["1", "#", "!"]) {
        expect(
          translateFilter(onBook("title", "isNull"), { escapeCharacter })
            .parameters,
        ).toEqual({});
      }
    });
  });

  describe("parameter binding", () => {
    it("binds non-finite values and null under distinct names", () => {
      const unbounded = onBook("year", "lt", [Number.POSITIVE_INFINITY]);
      const missing = onBook("year", "lt", [null]);
      const result = translateFilter(or(unbounded, missing));

      expect(result.parameters).toEqual({
        [`${unbounded.parameterNamePrefix()}_0`]: Number.POSITIVE_INFINITY,
        [`${missing.parameterNamePrefix()}_0`]: null,
      });
      expect(Object.keys(result.parameters)).toHaveLength(2);
    });

    it("shares one binding between structurally equal predicates", () => {
      const first = onBook("title", "eq", ["Dune"]);
      const second = onBook("title", "eq", ["Dune"]);
      const result = translateFilter(or(first, second));
      expect(result.parameters).toEqual({
        [`${first.parameterNamePrefix()}_0`]: "Dune",
      });
    });

    it("fails when a name is bound to two different values", () => {
      const onError = vi.fn();
      const first = new FixedNamePredicate(
        dictionary.path(Book, "year"),
        "eq",
        [1950],
      );
      const second = new FixedNamePredicate(
        dictionary.path(Book, "year"),
        "eq",
        [1960],
      );

      expect(() =>
        translateFilter(or(first, second), { hooks: { onError } }),
      ).toThrow('Parameter "fixed_0" is already bound to a different value');
      expect(onError).toHaveBeenCalledWith(
        { predicate: second },
        expect.any(UnsupportedPredicateError),
      );
    });

    it("accepts a name bound twice to the same value", () => {
      const first = new FixedNamePredicate(
        dictionary.path(Book, "year"),
        "eq",
        [1950],
      );
      const second = new FixedNamePredicate(
        dictionary.path(Book, "year"),
        "ge",
        [1950],
      );
      expect(translateFilter(or(first, second)).parameters).toEqual({
        fixed_0: 1950,
      });
    });
  });

  describe("hooks", () => {
    it("reports each translated predicate in visit order", () => {
      const onPredicateTranslated = vi.fn();
      const recent = onBook("year", "ge", [1950]);
      const byAda = onBook("author.name", "in", ["Ada", "Grace"]);
      translateFilter(and(recent, byAda), { hooks: { onPredicateTranslated } });

      expect(onPredicateTranslated).toHaveBeenCalledTimes(2);
      expect(onPredicateTranslated).toHaveBeenNthCalledWith(1, {
        predicate: recent,
        alias: "Book",
        fieldPath: "year",
        operator: "ge",
        parameterNames: [`${recent.parameterNamePrefix()}_0`],
      });
      expect(onPredicateTranslated).toHaveBeenNthCalledWith(2, {
        predicate: byAda,
        alias: "Book_author",
        fieldPath: "author.name",
        operator: "in",
        parameterNames: ["author_name_16c0d4d8_0", "author_name_16c0d4d8_1"],
      });
    });

    it("reports errors with the failing predicate before rethrowing", () => {
      const onError = vi.fn();
      const recent = onBook("year", "ge", [1950]);
      const empty = onBook("tags", "isEmpty");

      expect(() =>
        translateFilter(and(recent, empty), { hooks: { onError } }),
      ).toThrow(UnsupportedPredicateError);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(
        { predicate: empty },
        expect.any(UnsupportedPredicateError),
      );
    });

    it("does not report option errors as predicate failures", () => {
      const onError = vi.fn();
      expect(() =>
        translateFilter(onBook("title", "isNull"), {
          escapeCharacter: "ab",
          hooks: { onError },
        }),
      ).toThrow(ValidationError);
      expect(onError).not.toHaveBeenCalled();
    });
  });
});
