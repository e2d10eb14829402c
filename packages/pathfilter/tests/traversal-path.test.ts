import { describe, expect, it } from "vitest";

import { InvalidPathError } from "../src/errors";
import { pathStep, stepsEqual, TraversalPath } from "../src/path";
import { Author, Book, Chapter } from "./test-utils";

describe("pathStep", () => {
  it("defaults to an attribute step", () => {
    expect(pathStep(Book, "title")).toEqual({
      sourceType: Book,
      fieldName: "title",
      cardinality: "none",
    });
  });

  it("is frozen", () => {
    expect(Object.isFrozen(pathStep(Book, "author", "toOne"))).toBe(true);
  });

  it("compares steps by type name, field and cardinality", () => {
    expect(
      stepsEqual(pathStep(Book, "author", "toOne"), {
        sourceType: { name: "Book" },
        fieldName: "author",
        cardinality: "toOne",
      }),
    ).toBe(true);
    expect(
      stepsEqual(pathStep(Book, "author", "toOne"), pathStep(Book, "author")),
    ).toBe(false);
  });
});

describe("TraversalPath", () => {
  const authorName = new TraversalPath([
    pathStep(Book, "author", "toOne"),
    pathStep(Author, "name"),
  ]);

  it("rejects an empty step list", () => {
    expect(() => new TraversalPath([])).toThrow(InvalidPathError);
    expect(() => new TraversalPath([])).toThrow(
      "A traversal path needs at least one step",
    );
  });

  it("wraps a single step", () => {
    const path = TraversalPath.of(pathStep(Book, "title"));
    expect(path.pathSteps()).toHaveLength(1);
    expect(path.terminalField()).toBe("title");
    expect(path.rootType()).toBe(Book);
  });

  it("exposes the root type and terminal step", () => {
    expect(authorName.rootType()).toBe(Book);
    expect(authorName.terminalStep()).toEqual(pathStep(Author, "name"));
    expect(authorName.terminalField()).toBe("name");
  });

  it("joins field names into a dotted path", () => {
    expect(authorName.terminalFieldDottedPath()).toBe("author.name");
  });

  it("renders the root simple name followed by the fields", () => {
    expect(authorName.toString()).toBe("Book.author.name");
    const namespaced = TraversalPath.of(
      pathStep({ name: "library.Book" }, "title"),
    );
    expect(namespaced.toString()).toBe("Book.title");
  });

  it("detects to-many steps", () => {
    expect(authorName.crossesToMany()).toBe(false);
    const chapterPages = new TraversalPath([
      pathStep(Book, "chapters", "toMany"),
      pathStep(Chapter, "pages"),
    ]);
    expect(chapterPages.crossesToMany()).toBe(true);
  });

  it("does not observe later changes to the source step list", () => {
    const steps = [pathStep(Book, "title")];
    const path = new TraversalPath(steps);
    steps.push(pathStep(Book, "year"));
    expect(path.pathSteps()).toHaveLength(1);
    expect(Object.isFrozen(path.pathSteps())).toBe(true);
  });

  it("copies into an independent, equal path", () => {
    const copy = authorName.copy();
    expect(copy).not.toBe(authorName);
    expect(copy.pathSteps()).not.toBe(authorName.pathSteps());
    expect(copy.equals(authorName)).toBe(true);
  });

  it("compares paths step by step", () => {
    expect(
      authorName.equals(TraversalPath.of(pathStep(Book, "author", "toOne"))),
    ).toBe(false);
    expect(
      authorName.equals(
        new TraversalPath([
          pathStep(Book, "author", "toOne"),
          pathStep(Author, "born"),
        ]),
      ),
    ).toBe(false);
  });
});
