import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import { main as inMemoryFiltering } from "../examples/01-in-memory-filtering";
import { main as sqlTranslation } from "../examples/02-sql-translation";

const EXAMPLES = [
  { name: "01-in-memory-filtering", main: inMemoryFiltering },
  { name: "02-sql-translation", main: sqlTranslation },
] as const;

describe("examples", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  for (const { name, main } of EXAMPLES) {
    it(`${name} runs without error`, async () => {
      await expect(main()).resolves.toBeUndefined();
    });
  }

  it("01-in-memory-filtering prints the matching books", async () => {
    await inMemoryFiltering();
    expect(consoleLogSpy).toHaveBeenCalledWith("  Notes (1843)");
    expect(consoleLogSpy).not.toHaveBeenCalledWith("  Compilers (1952)");
  });
});
