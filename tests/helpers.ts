import { createTable, type Table } from "../lib/sql";

export function studentsTable(): Table {
  return createTable(
    [
      { name: "Ann", age: 22, grade: "A", city: "Chicago" },
      { name: "Bo", age: 19, grade: "B", city: "New York" },
      { name: "Cy", age: 22, grade: "A", city: "Chicago" },
    ],
    { name: "students" },
  );
}
