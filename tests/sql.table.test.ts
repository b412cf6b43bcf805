import { expect, test, describe, vi } from "vitest";
import { fileURLToPath } from "node:url";
import {
  compileAndRun,
  compareText,
  createTable,
  loadTable,
  parseDelimited,
  parseNumeric,
  tableFromRecords,
  tableNameFromPath,
  TableLoadError,
} from "../lib/sql";

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe("createTable", () => {
  test("infers column types from the values", () => {
    const table = createTable(
      [
        { id: 1, label: "one", mixed: 1 },
        { id: 2, label: "two", mixed: "2" },
      ],
      { name: "items" },
    );

    expect(table.name).toBe("items");
    expect(table.columns).toEqual([
      { name: "id", type: "number" },
      { name: "label", type: "string" },
      { name: "mixed", type: "string" },
    ]);
  });

  test("explicit column order", () => {
    const table = createTable([{ b: 1, a: 2 }], { columns: ["a", "b"] });
    expect(table.columns.map((c) => c.name)).toEqual(["a", "b"]);
    expect(Object.keys(table.rows[0])).toEqual(["a", "b"]);
  });

  test("empty tables have string columns", () => {
    const table = createTable([], { columns: ["n"] });
    expect(table.columns).toEqual([{ name: "n", type: "string" }]);
    expect(table.rows).toEqual([]);
  });

  test("rows missing a column are rejected", () => {
    expect(() => createTable([{ a: 1 }, { b: 2 }], { name: "broken", columns: ["a"] })).toThrow(
      "broken: Row 2 is missing column 'a'",
    );
  });

  test("a column named __proto__ is an ordinary column", () => {
    const record: Record<string, string> = JSON.parse('{"__proto__": "x", "b": "y"}');
    const table = createTable([record], { name: "t" });

    expect(table.columns.map((c) => c.name)).toEqual(["__proto__", "b"]);
    expect(Object.keys(table.rows[0])).toEqual(["__proto__", "b"]);
    expect(table.rows[0]["__proto__"]).toBe("x");
  });

  test("numeric columns may hold empty cells", () => {
    const table = createTable([{ n: 1 }, { n: "" }]);
    expect(table.columns).toEqual([{ name: "n", type: "number" }]);
  });

  test("duplicate column names are rejected", () => {
    expect(() => createTable([], { columns: ["a", "a"] })).toThrow(TableLoadError);
  });
});

describe("parseNumeric and compareText", () => {
  test("plain decimals only", () => {
    expect(parseNumeric("42")).toBe(42);
    expect(parseNumeric(" -3.5 ")).toBe(-3.5);
    expect(parseNumeric(".5")).toBe(0.5);
    expect(parseNumeric("7.")).toBe(7);
    expect(parseNumeric("")).toBeUndefined();
    expect(parseNumeric("1e3")).toBeUndefined();
    expect(parseNumeric("0x10")).toBeUndefined();
    expect(parseNumeric("Infinity")).toBeUndefined();
  });

  test("code point ordering", () => {
    expect(compareText("Zebra", "apple")).toBeLessThan(0);
    expect(compareText("apple", "éclair")).toBeLessThan(0);
    expect(compareText("ab", "abc")).toBeLessThan(0);
    expect(compareText("same", "same")).toBe(0);
  });
});

describe("parseDelimited", () => {
  test("quoted fields with delimiters, quotes and newlines", () => {
    const records = parseDelimited('a,b\n"x, y","say ""hi"""\n"two\nlines",z');

    expect(records).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["two\nlines", "z"],
    ]);
  });

  test("CRLF line endings and a trailing newline", () => {
    expect(parseDelimited("a,b\r\n1,2\r\n")).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  test("custom delimiter", () => {
    expect(parseDelimited("a\tb\n1\t2", "\t")).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  test("unterminated quotes", () => {
    expect(() => parseDelimited('a\n"open')).toThrow("Unterminated quoted field");
  });
});

describe("tableFromRecords", () => {
  test("header row names the columns and numeric columns are converted", () => {
    const table = tableFromRecords(
      [
        ["name", " age "],
        ["Ann", "22"],
        [""],
        ["Bo", "19"],
      ],
      "people",
    );

    expect(table).toEqual({
      name: "people",
      columns: [
        { name: "name", type: "string" },
        { name: "age", type: "number" },
      ],
      rows: [
        { name: "Ann", age: 22 },
        { name: "Bo", age: 19 },
      ],
    });
  });

  test("empty fields are nulls and do not decide the column type", () => {
    const table = tableFromRecords([["n", "s"], ["", ""], ["4", ""]]);

    expect(table.columns).toEqual([
      { name: "n", type: "number" },
      { name: "s", type: "string" },
    ]);
    expect(table.rows).toEqual([
      { n: "", s: "" },
      { n: 4, s: "" },
    ]);
  });

  test("a __proto__ header keeps its values", () => {
    const table = tableFromRecords([["__proto__", "b"], ["x", "1"]], "t");

    expect(Object.keys(table.rows[0])).toEqual(["__proto__", "b"]);
    expect(table.rows[0]["__proto__"]).toBe("x");

    const result = compileAndRun("SELECT __proto__, b FROM t WHERE __proto__ = 'x'", table);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.rows).toHaveLength(1);
      expect(result.rows[0]["__proto__"]).toBe("x");
      expect(result.rows[0].b).toBe(1);
    }
  });

  test("a column with any non-numeric value stays text", () => {
    const table = tableFromRecords([["zip"], ["02139"], ["n/a"]]);

    expect(table.columns).toEqual([{ name: "zip", type: "string" }]);
    expect(table.rows).toEqual([{ zip: "02139" }, { zip: "n/a" }]);
  });

  test("malformed input", () => {
    expect(() => tableFromRecords([])).toThrow("File has no header row");
    expect(() => tableFromRecords([["a", ""]])).toThrow("Header column 2 is empty");
    expect(() => tableFromRecords([["a", "a"]])).toThrow("Duplicate column 'a' in header");
    expect(() => tableFromRecords([["a", "b"], ["1"]])).toThrow("Row 1 has 1 fields, expected 2");
  });
});

describe("tableNameFromPath", () => {
  test("file names become identifiers", () => {
    expect(tableNameFromPath("data/students.csv")).toBe("students");
    expect(tableNameFromPath("data/2024 sales-report.csv")).toBe("_2024salesreport");
    expect(tableNameFromPath("select.csv")).toBe("select_");
    expect(tableNameFromPath("---.csv")).toBe("data");
  });
});

describe("loadTable", () => {
  test("loads a CSV file and logs a summary", async () => {
    const logger = { log: vi.fn() };
    const path = fixture("students.csv");

    const table = await loadTable(path, { logger });

    expect(table.name).toBe("students");
    expect(table.columns).toEqual([
      { name: "name", type: "string" },
      { name: "age", type: "number" },
      { name: "grade", type: "string" },
      { name: "city", type: "string" },
    ]);
    expect(table.rows[1]).toEqual({ name: "Bo", age: 19, grade: "B", city: "New York" });
    expect(logger.log).toHaveBeenCalledTimes(1);
    expect(logger.log).toHaveBeenCalledWith(
      `[SQL] Loaded table 'students' from ${path}: 3 rows, 4 columns`,
    );
  });

  test("loaded tables can be queried by their file name", async () => {
    const table = await loadTable(fixture("students.csv"), { logger: { log: vi.fn() } });
    const result = compileAndRun("SELECT name FROM students WHERE age > 20 ORDER BY name DESC", table);

    expect(result).toMatchObject({ success: true, rows: [{ name: "Cy" }, { name: "Ann" }] });
  });

  test("TSV files use tabs and skip blank lines", async () => {
    const table = await loadTable(fixture("scores.tsv"), { name: "scores", logger: { log: vi.fn() } });

    expect(table.columns.map((c) => c.type)).toEqual(["string", "number", "string"]);
    expect(table.rows).toEqual([
      { player: "Dee", score: 14.5, team: "red" },
      { player: "Eli", score: 9, team: "blue" },
      { player: "Fay", score: 21, team: "red, dark" },
    ]);
  });

  test("missing files raise TableLoadError", async () => {
    const path = fixture("missing.csv");

    await expect(loadTable(path, { logger: { log: vi.fn() } })).rejects.toThrow(TableLoadError);
    await expect(loadTable(path, { logger: { log: vi.fn() } })).rejects.toThrow(
      `${path}: Could not read file:`,
    );
  });
});
