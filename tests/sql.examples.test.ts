import { expect, test, describe } from "vitest";
import { compileAndRun, createTable, suggestQueries } from "../lib/sql";
import { studentsTable } from "./helpers";

describe("Example queries", () => {
  test("suggestions are built from the schema and first row", () => {
    expect(suggestQueries(studentsTable())).toEqual([
      "SELECT * FROM students",
      "SELECT name, age FROM students",
      "SELECT * FROM students WHERE age >= 22",
      "SELECT * FROM students WHERE name = 'Ann'",
      "SELECT * FROM students ORDER BY age DESC LIMIT 5",
    ]);
  });

  test("every suggestion runs", () => {
    const table = studentsTable();

    for (const sql of suggestQueries(table)) {
      expect(compileAndRun(sql, table).success).toBe(true);
    }
  });

  test("unnamed tables are queried as data", () => {
    const table = createTable([{ label: "it's" }]);

    expect(suggestQueries(table)).toEqual([
      "SELECT * FROM data",
      `SELECT * FROM data WHERE label = "it's"`,
      "SELECT * FROM data ORDER BY label DESC LIMIT 5",
    ]);
  });

  test("columns that cannot be named in a query are skipped", () => {
    const table = createTable([{ "first name": "Ann", order: 3, total: 9 }], { name: "orders" });

    expect(suggestQueries(table)).toEqual([
      "SELECT * FROM orders",
      "SELECT * FROM orders WHERE total >= 9",
      "SELECT * FROM orders ORDER BY total DESC LIMIT 5",
    ]);
  });
});
