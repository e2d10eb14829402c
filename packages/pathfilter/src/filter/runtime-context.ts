/**
 * Runtime contexts resolve field values from materialized entities.
 */

/**
 * An executable test against one candidate entity.
 */
export type BooleanTest<T = unknown> = (entity: T) => boolean;

/**
 * Capability passed to operator contextualization.
 *
 * Given an entity and a dotted field path, returns the value reached.
 * Paths crossing a to-many relationship return an array of reached values.
 */
export type RuntimeContext = Readonly<{
  getFieldValue: (entity: unknown, fieldPath: string) => unknown;
}>;

function readProperty(source: unknown, key: string): unknown {
  if (source instanceof Map) {
    return source.get(key);
  }
  if (typeof source === "object" && source !== null) {
    return Reflect.get(source, key);
  }
  return undefined;
}

/**
 * Runtime context over plain object graphs.
 *
 * Arrays met along the path fan out; the result is then the flattened
 * array of every value reached. A nullish link ends its branch.
 *
 * @example
 * ```typescript
 * const context = createObjectGraphContext();
 * context.getFieldValue({ author: { name: "Ada" } }, "author.name"); // "Ada"
 * context.getFieldValue({ posts: [{ title: "a" }, { title: "b" }] }, "posts.title"); // ["a", "b"]
 * ```
 */
export function createObjectGraphContext(): RuntimeContext {
  return {
    getFieldValue: (entity, fieldPath) => {
      let reached: unknown[] = [entity];
      let fannedOut = false;

      for (const segment of fieldPath.split(".")) {
        const next: unknown[] = [];
        for (const item of reached) {
          if (item === null || item === undefined) continue;
          const value = readProperty(item, segment);
          if (Array.isArray(value)) {
            fannedOut = true;
            next.push(...value);
          } else {
            next.push(value);
          }
        }
        reached = next;
      }

      return fannedOut ? reached : reached[0];
    },
  };
}
